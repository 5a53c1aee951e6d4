import {
  FixFragment,
  GGAFragment,
  GSAFragment,
  GSVFragment,
  RMCFragment,
  Result,
  SatelliteInView,
  VTGFragment,
  failure,
  success,
} from "@core/types";
import { SentenceError } from "@core/errors";
import { toGPSFixQuality } from "@utils/typeGuards";

/**
 * Minimum number of comma separated fields, address field included
 */
const MIN_FIELDS = {
  RMC: 12,
  GGA: 15,
  GSA: 18,
  GSV: 4,
  VTG: 9,
} as const;

type SentenceType = keyof typeof MIN_FIELDS;

type Decoded<T> = Result<T, SentenceError>;

/**
 * Decode one NMEA 0183 sentence into a fix fragment.
 *
 * The sentence must be `$`-prefixed and carry a two digit hex checksum
 * equal to the XOR of every character between `$` and `*`. Supported
 * sentence types are RMC, GGA, GSA, GSV and VTG from any talker; other
 * well-formed sentences fail with SENTENCE_UNSUPPORTED_TYPE.
 *
 * @example
 * const result = parseSentence("$GPGGA,...*47");
 * if (isSuccess(result) && result.data.kind === "GGA") {
 *   console.log(result.data.altitude);
 * }
 */
export function parseSentence(sentence: string): Decoded<FixFragment> {
  if (!sentence.startsWith("$")) {
    return failure(SentenceError.malformed(sentence, "missing $ prefix"));
  }

  const asteriskIndex = sentence.lastIndexOf("*");
  if (asteriskIndex === -1) {
    return failure(SentenceError.malformed(sentence, "missing checksum"));
  }

  const checksumField = sentence.substring(asteriskIndex + 1);
  if (!/^[0-9A-Fa-f]{2}$/.test(checksumField)) {
    return failure(
      SentenceError.malformed(sentence, `invalid checksum "${checksumField}"`),
    );
  }

  const body = sentence.substring(1, asteriskIndex);
  const expected = checksumField.toUpperCase();
  const actual = calculateChecksum(body);
  if (expected !== actual) {
    return failure(SentenceError.checksumMismatch(sentence, expected, actual));
  }

  const fields = body.split(",");
  const address = fields[0];
  if (!/^[A-Z0-9]{5,}$/.test(address)) {
    return failure(
      SentenceError.malformed(sentence, `invalid address "${address}"`),
    );
  }

  const talker = address.slice(0, -3);
  const type = address.slice(-3);

  switch (type) {
    case "RMC":
      return parseRMC(new FieldReader("RMC", talker, fields));
    case "GGA":
      return parseGGA(new FieldReader("GGA", talker, fields));
    case "GSA":
      return parseGSA(new FieldReader("GSA", talker, fields));
    case "GSV":
      return parseGSV(new FieldReader("GSV", talker, fields));
    case "VTG":
      return parseVTG(new FieldReader("VTG", talker, fields));
    default:
      return failure(SentenceError.unsupportedType(address));
  }
}

/**
 * XOR of every character code, as two uppercase hex digits
 */
export function calculateChecksum(body: string): string {
  let checksum = 0;
  for (let i = 0; i < body.length; i++) {
    checksum ^= body.charCodeAt(i);
  }
  return checksum.toString(16).toUpperCase().padStart(2, "0");
}

/**
 * $xxRMC,time,status,lat,N/S,lon,E/W,speed,course,date,magVar,E/W[,mode]
 */
function parseRMC(reader: FieldReader): Decoded<RMCFragment> {
  const variation = reader.number(10, "variation");
  return reader.build<RMCFragment>(() => ({
    kind: "RMC",
    talker: reader.talker,
    time: reader.time(1),
    validity: reader.validity(2),
    latitude: reader.coordinate(3, "latitude"),
    longitude: reader.coordinate(5, "longitude"),
    speed: reader.number(7, "speed"),
    course: reader.number(8, "course"),
    date: reader.date(9),
    variation: reader.raw(11) === "W" ? -variation : variation,
  }));
}

/**
 * $xxGGA,time,lat,N/S,lon,E/W,quality,satellites,hdop,altitude,M,separation,M,age,station
 */
function parseGGA(reader: FieldReader): Decoded<GGAFragment> {
  return reader.build<GGAFragment>(() => ({
    kind: "GGA",
    talker: reader.talker,
    time: reader.time(1),
    latitude: reader.coordinate(2, "latitude"),
    longitude: reader.coordinate(4, "longitude"),
    fixQuality: toGPSFixQuality(reader.number(6, "fix quality")),
    satellitesInUse: reader.number(7, "satellites in use"),
    hdop: reader.number(8, "hdop"),
    altitude: reader.number(9, "altitude"),
    separation: reader.number(11, "separation"),
  }));
}

/**
 * $xxGSA,mode,fixType,sat1,...,sat12,pdop,hdop,vdop[,systemId]
 */
function parseGSA(reader: FieldReader): Decoded<GSAFragment> {
  const satelliteIds: number[] = [];
  for (let i = 3; i <= 14; i++) {
    if (reader.raw(i) !== "") {
      satelliteIds.push(reader.number(i, `satellite ${i - 2}`));
    }
  }

  return reader.build<GSAFragment>(() => ({
    kind: "GSA",
    talker: reader.talker,
    mode: reader.raw(1),
    fixType: reader.number(2, "fix type"),
    satelliteIds,
    pdop: reader.number(15, "pdop"),
    hdop: reader.number(16, "hdop"),
    vdop: reader.number(17, "vdop"),
  }));
}

/**
 * $xxGSV,total,number,inView[,prn,elevation,azimuth,snr]*4[,signalId]
 */
function parseGSV(reader: FieldReader): Decoded<GSVFragment> {
  const satellites: SatelliteInView[] = [];
  for (let i = 4; i + 3 < reader.length; i += 4) {
    satellites.push({
      prn: reader.number(i, "prn"),
      elevation: reader.number(i + 1, "elevation"),
      azimuth: reader.number(i + 2, "azimuth"),
      snr: reader.number(i + 3, "snr"),
    });
  }

  return reader.build<GSVFragment>(() => ({
    kind: "GSV",
    talker: reader.talker,
    totalMessages: reader.number(1, "total messages"),
    messageNumber: reader.number(2, "message number"),
    satellitesInView: reader.number(3, "satellites in view"),
    satellites,
  }));
}

/**
 * $xxVTG,trueTrack,T,magneticTrack,M,knots,N,kph,K[,mode]
 */
function parseVTG(reader: FieldReader): Decoded<VTGFragment> {
  return reader.build<VTGFragment>(() => ({
    kind: "VTG",
    talker: reader.talker,
    trueTrack: reader.number(1, "true track"),
    magneticTrack: reader.number(3, "magnetic track"),
    speedKnots: reader.number(5, "speed knots"),
    speedKph: reader.number(7, "speed kph"),
  }));
}

/**
 * Reads typed values out of a split sentence, remembering the first
 * invalid field so decoders can build their fragment in one expression.
 */
class FieldReader {
  private error: SentenceError | null = null;

  constructor(
    private readonly type: SentenceType,
    readonly talker: string,
    private readonly fields: string[],
  ) {
    if (fields.length < MIN_FIELDS[type]) {
      this.error = SentenceError.fieldCount(type, MIN_FIELDS[type], fields.length);
    }
  }

  get length(): number {
    return this.fields.length;
  }

  raw(index: number): string {
    return this.fields[index] ?? "";
  }

  /**
   * Decimal field; empty decodes as 0
   */
  number(index: number, name: string): number {
    const value = this.raw(index);
    if (value === "") {
      return 0;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      this.invalid(name, value);
      return 0;
    }
    return parsed;
  }

  /**
   * (D)DDMM.MMMM value at `index` with its hemisphere letter at
   * `index + 1`, as signed decimal degrees; empty decodes as 0
   */
  coordinate(index: number, axis: "latitude" | "longitude"): number {
    const value = this.raw(index);
    const direction = this.raw(index + 1);
    if (value === "") {
      return 0;
    }

    const allowed = axis === "latitude" ? ["N", "S"] : ["E", "W"];
    if (!allowed.includes(direction)) {
      this.invalid(`${axis} hemisphere`, direction);
      return 0;
    }

    const match = /^(\d+)(\d{2}(?:\.\d+)?)$/.exec(value);
    if (!match) {
      this.invalid(axis, value);
      return 0;
    }
    const degrees = Number(match[1]);
    const minutes = Number(match[2]);
    const limit = axis === "latitude" ? 90 : 180;
    if (minutes >= 60 || degrees > limit) {
      this.invalid(axis, value);
      return 0;
    }

    const decimal = degrees + minutes / 60;
    return direction === "S" || direction === "W" ? -decimal : decimal;
  }

  /**
   * RMC status, A=Active or V=Void
   */
  validity(index: number): "A" | "V" {
    const value = this.raw(index);
    if (value === "A" || value === "V") {
      return value;
    }
    this.invalid("validity", value);
    return "V";
  }

  /**
   * HHMMSS[.sss] as HH:MM:SS.mmm; empty stays empty
   */
  time(index: number): string {
    const value = this.raw(index);
    if (value === "") {
      return "";
    }
    const match = /^(\d{2})(\d{2})(\d{2})(?:\.(\d+))?$/.exec(value);
    if (!match) {
      this.invalid("time", value);
      return "";
    }
    const millis = `${match[4] ?? ""}000`.slice(0, 3);
    return `${match[1]}:${match[2]}:${match[3]}.${millis}`;
  }

  /**
   * DDMMYY as DD/MM/YY; empty stays empty
   */
  date(index: number): string {
    const value = this.raw(index);
    if (value === "") {
      return "";
    }
    const match = /^(\d{2})(\d{2})(\d{2})$/.exec(value);
    if (!match) {
      this.invalid("date", value);
      return "";
    }
    return `${match[1]}/${match[2]}/${match[3]}`;
  }

  /**
   * Run the builder and return its value unless a field was invalid
   */
  build<T>(builder: () => T): Decoded<T> {
    if (this.error) {
      return failure(this.error);
    }
    const value = builder();
    if (this.error) {
      return failure(this.error);
    }
    Object.freeze(value);
    return success(value);
  }

  private invalid(field: string, value: string): void {
    if (!this.error) {
      this.error = SentenceError.invalidField(this.type, field, value);
    }
  }
}
