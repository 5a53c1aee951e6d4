import { FixFragment, FixKind } from "@core/types";
import { parseSentence } from "@services/nmea/NMEAParser";

/**
 * Checksummed sentences shared by the parser, stream and sampler tests
 */
export const SENTENCES = {
  rmc: "$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W*6A",
  rmcSample:
    "$GPRMC,103000.00,A,4807.038,N,01131.000,E,0.5,90.0,150624,,*0B",
  rmcSouthern:
    "$GNRMC,103000.25,A,3351.400,S,15112.600,E,1.25,270.5,150624,,,A*6A",
  rmcVoid: "$GPRMC,103000,V,,,,,,,,,*33",
  rmcBadDate:
    "$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,310294,003.1,W*68",
  gga: "$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,*47",
  ggaSample:
    "$GPGGA,103000.00,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,*66",
  gsa: "$GPGSA,A,3,04,05,,09,12,,,24,,,,,2.5,1.3,2.1*39",
  gsv: "$GPGSV,2,1,08,01,40,083,46,02,17,308,41,12,07,344,39,14,22,228,45*75",
  vtg: "$GPVTG,054.7,T,034.4,M,005.5,N,010.2,K*48",
  txt: "$GPTXT,01,01,02,ANTSTATUS=OK*3B",
} as const;

/**
 * Decode a fixture, failing the test on a parse error
 */
export function decode(sentence: string): FixFragment {
  const result = parseSentence(sentence);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

function isKind<K extends FixKind>(
  fragment: FixFragment,
  kind: K,
): fragment is Extract<FixFragment, { kind: K }> {
  return fragment.kind === kind;
}

/**
 * Decode a fixture and narrow it to the expected sentence variant
 */
export function decodeAs<K extends FixKind>(
  sentence: string,
  kind: K,
): Extract<FixFragment, { kind: K }> {
  const fragment = decode(sentence);
  if (!isKind(fragment, kind)) {
    throw new Error(`expected ${kind}, got ${fragment.kind}`);
  }
  return fragment;
}
