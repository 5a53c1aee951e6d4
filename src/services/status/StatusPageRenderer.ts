import {
  FixSnapshot,
  GGAFragment,
  GSAFragment,
  GSVFragment,
  RMCFragment,
  VTGFragment,
} from "@core/types";
import {
  formatDMS,
  formatDegreesMinutes,
  hemisphere,
  mapEmbedUrl,
  mapLink,
} from "@utils/geo";

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function row(label: string, value: string | number): string {
  return `<tr><th>${escapeHtml(label)}</th><td>${escapeHtml(String(value))}</td></tr>`;
}

function table(title: string, rows: string[]): string {
  return [
    `<h2>${escapeHtml(title)}</h2>`,
    "<table>",
    ...rows,
    "</table>",
  ].join("\n");
}

/**
 * NMEA notation with hemisphere, e.g. "4807.0380 N"
 */
function nmeaCoordinate(value: number, axis: "latitude" | "longitude"): string {
  return `${formatDegreesMinutes(value)} ${hemisphere(value, axis)}`;
}

function dmsCoordinate(value: number, axis: "latitude" | "longitude"): string {
  return `${formatDMS(value)} ${hemisphere(value, axis)}`;
}

/**
 * Renders the human-readable status page from a fix store snapshot
 */
export class StatusPageRenderer {
  constructor(private readonly mapsApiKey?: string) {}

  render(snapshot: FixSnapshot): string {
    const sections: string[] = [];
    const position = snapshot.rmc ?? snapshot.gga;

    if (position) {
      sections.push(this.renderMap(position.latitude, position.longitude));
    } else {
      sections.push("<p>No GPS data</p>");
    }
    if (snapshot.rmc) sections.push(this.renderRMC(snapshot.rmc));
    if (snapshot.gga) sections.push(this.renderGGA(snapshot.gga));
    if (snapshot.gsa) sections.push(this.renderGSA(snapshot.gsa));
    if (snapshot.gsv) sections.push(this.renderGSV(snapshot.gsv));
    if (snapshot.vtg) sections.push(this.renderVTG(snapshot.vtg));

    const updated = snapshot.updatedAt
      ? `<p>Last update: ${escapeHtml(snapshot.updatedAt.toISOString())}</p>`
      : "";

    return [
      "<!DOCTYPE html>",
      '<html lang="en">',
      "<head>",
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      "<title>GPS Status</title>",
      "</head>",
      "<body>",
      "<h1>GPS Status</h1>",
      ...sections,
      updated,
      "</body>",
      "</html>",
      "",
    ].join("\n");
  }

  private renderMap(latitude: number, longitude: number): string {
    const link = `<p><a href="${escapeHtml(mapLink(latitude, longitude))}">Open in Google Maps</a></p>`;
    if (!this.mapsApiKey) {
      return link;
    }
    const src = escapeHtml(mapEmbedUrl(this.mapsApiKey, latitude, longitude));
    return [
      link,
      `<iframe width="600" height="450" style="border:0" loading="lazy" src="${src}"></iframe>`,
    ].join("\n");
  }

  private renderRMC(rmc: RMCFragment): string {
    return table("Position (RMC)", [
      row("Validity", rmc.validity === "A" ? "A (active)" : "V (void)"),
      row("Date", rmc.date),
      row("Time", rmc.time),
      row("Latitude", nmeaCoordinate(rmc.latitude, "latitude")),
      row("Latitude (DMS)", dmsCoordinate(rmc.latitude, "latitude")),
      row("Longitude", nmeaCoordinate(rmc.longitude, "longitude")),
      row("Longitude (DMS)", dmsCoordinate(rmc.longitude, "longitude")),
      row("Speed (knots)", rmc.speed),
      row("Course (°)", rmc.course),
      row("Variation (°)", rmc.variation),
    ]);
  }

  private renderGGA(gga: GGAFragment): string {
    return table("Fix (GGA)", [
      row("Time", gga.time),
      row("Latitude", nmeaCoordinate(gga.latitude, "latitude")),
      row("Longitude", nmeaCoordinate(gga.longitude, "longitude")),
      row("Fix quality", gga.fixQuality),
      row("Satellites in use", gga.satellitesInUse),
      row("HDOP", gga.hdop),
      row("Altitude (m)", gga.altitude),
      row("Geoid separation (m)", gga.separation),
    ]);
  }

  private renderGSA(gsa: GSAFragment): string {
    return table("Active satellites (GSA)", [
      row("Mode", gsa.mode),
      row("Fix type", gsa.fixType),
      row("Satellites", gsa.satelliteIds.join(", ")),
      row("PDOP", gsa.pdop),
      row("HDOP", gsa.hdop),
      row("VDOP", gsa.vdop),
    ]);
  }

  private renderGSV(gsv: GSVFragment): string {
    const satellites = gsv.satellites.map(
      (sat) =>
        `<tr><td>${sat.prn}</td><td>${sat.elevation}</td><td>${sat.azimuth}</td><td>${sat.snr}</td></tr>`,
    );
    return [
      table("Satellites in view (GSV)", [
        row("Message", `${gsv.messageNumber} of ${gsv.totalMessages}`),
        row("In view", gsv.satellitesInView),
      ]),
      "<table>",
      "<tr><th>PRN</th><th>Elevation</th><th>Azimuth</th><th>SNR</th></tr>",
      ...satellites,
      "</table>",
    ].join("\n");
  }

  private renderVTG(vtg: VTGFragment): string {
    return table("Track (VTG)", [
      row("True track (°)", vtg.trueTrack),
      row("Magnetic track (°)", vtg.magneticTrack),
      row("Speed (knots)", vtg.speedKnots),
      row("Speed (km/h)", vtg.speedKph),
    ]);
  }
}
