/**
 * Decoded calculator answer for one request.
 * Longitude is positive for West, matching the request convention.
 */
export interface ResultRecord {
  readonly decimalYear: number;
  readonly latitude: number;
  readonly longitude: number;
  /** Degrees east of true north */
  readonly declination: number;
  readonly elevation?: number;
  /** Annual change in declination, degrees per year */
  readonly secularVariation?: number;
  readonly uncertainty?: number;
}
