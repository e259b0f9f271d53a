import { DecodeError } from '../errors/index.js';
import { parseDecimal } from '../utils/number.js';
import { ok, err, type Result } from '../utils/result.js';
import type { ResultRecord } from './types.js';

// Column positions in the calculator's CSV data row
const COLUMN = {
  DECIMAL_YEAR: 0,
  LATITUDE: 1,
  LONGITUDE: 2,
  ELEVATION: 3,
  DECLINATION: 4,
  SECULAR_VARIATION: 5,
  UNCERTAINTY: 6,
} as const;

const MIN_COLUMNS = COLUMN.DECLINATION + 1;

const REQUIRED: Array<[number, string]> = [
  [COLUMN.DECIMAL_YEAR, 'decimal year'],
  [COLUMN.LATITUDE, 'latitude'],
  [COLUMN.LONGITUDE, 'longitude'],
  [COLUMN.DECLINATION, 'declination'],
];

/**
 * Decode the calculator's CSV answer.
 *
 * The data row is the second-to-last line: the service ends its answer
 * with a newline (or trailing commentary) after the row.
 */
export function decodeResponse(text: string): Result<ResultRecord, DecodeError> {
  const lines = text.split('\n');
  if (lines.length < 2) {
    return err(new DecodeError('Response has fewer than 2 lines'));
  }

  const dataRow = lines[lines.length - 2].trim();
  const columns = dataRow.split(',');
  if (columns.length < MIN_COLUMNS) {
    return err(
      new DecodeError(
        `Expected at least ${MIN_COLUMNS} comma-separated fields, found ${columns.length}`,
        dataRow
      )
    );
  }

  const required: number[] = [];
  for (const [position, name] of REQUIRED) {
    const value = parseDecimal(columns[position]);
    if (value === undefined) {
      return err(new DecodeError(`Field ${name} '${columns[position]}' is not numeric`, dataRow));
    }
    required.push(value);
  }
  const [decimalYear, latitude, longitude, declination] = required;

  const optional = (position: number): number | undefined =>
    position < columns.length ? parseDecimal(columns[position]) : undefined;

  return ok({
    decimalYear,
    latitude,
    // East is least: the service reports East-positive
    longitude: -longitude,
    declination,
    elevation: optional(COLUMN.ELEVATION),
    secularVariation: optional(COLUMN.SECULAR_VARIATION),
    uncertainty: optional(COLUMN.UNCERTAINTY),
  });
}
