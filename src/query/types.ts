/**
 * Request for one input line, ready to send to the calculator.
 * Degree and minute strings are kept as typed for display;
 * longitude is stored positive for West.
 */
export interface RequestRecord {
  readonly year: string;
  readonly month: string;
  readonly day: string;
  readonly latitudeDegrees: string;
  readonly latitudeMinutes: string;
  readonly longitudeDegrees: string;
  readonly longitudeMinutes: string;
  /** Decimal latitude, North */
  readonly latitude: number;
  /** Decimal longitude, West */
  readonly longitude: number;
  /** Angle from true north to local grid north, in degrees */
  readonly gridOffset: number;
}
