import { NumericConversionError } from '../errors/index.js';
import type { FieldSequence } from '../parser/types.js';
import { parseDecimal } from '../utils/number.js';
import { ok, err, type Result } from '../utils/result.js';
import type { RequestRecord } from './types.js';

// Positions within the input field sequence
const FIELD = {
  YEAR: 0,
  MONTH: 1,
  DAY: 2,
  LAT_DEG: 3,
  LAT_MIN: 4,
  LON_DEG: 5,
  LON_MIN: 6,
  GRID_OFFSET: 7,
} as const;

const FIELD_NAMES: Record<number, string> = {
  [FIELD.LAT_DEG]: 'latitude degrees',
  [FIELD.LAT_MIN]: 'latitude minutes',
  [FIELD.LON_DEG]: 'longitude degrees',
  [FIELD.LON_MIN]: 'longitude minutes',
  [FIELD.GRID_OFFSET]: 'grid offset',
};

/**
 * Convert degrees and minutes to decimal degrees.
 * Minutes are not range-checked: 375' is taken arithmetically as 6.25°.
 */
export function toDecimalDegrees(degrees: number, minutes: number): number {
  return degrees + minutes / 60;
}

/**
 * Build the calculator request for a data line's fields
 */
export function buildRequest(fields: FieldSequence): Result<RequestRecord, NumericConversionError> {
  const numbers: number[] = [];

  for (const position of [FIELD.LAT_DEG, FIELD.LAT_MIN, FIELD.LON_DEG, FIELD.LON_MIN, FIELD.GRID_OFFSET]) {
    const token = fields[position] ?? '';
    const value = parseDecimal(token);
    if (value === undefined) {
      return err(new NumericConversionError(FIELD_NAMES[position], token));
    }
    numbers.push(value);
  }

  const [latDeg, latMin, lonDeg, lonMin, gridOffset] = numbers;

  return ok({
    year: fields[FIELD.YEAR],
    month: fields[FIELD.MONTH],
    day: fields[FIELD.DAY],
    latitudeDegrees: fields[FIELD.LAT_DEG],
    latitudeMinutes: fields[FIELD.LAT_MIN],
    longitudeDegrees: fields[FIELD.LON_DEG],
    longitudeMinutes: fields[FIELD.LON_MIN],
    latitude: toDecimalDegrees(latDeg, latMin),
    longitude: toDecimalDegrees(lonDeg, lonMin),
    gridOffset,
  });
}
