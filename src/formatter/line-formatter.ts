import { OUTPUT_FORMAT } from '../config/constants.js';
import type { ResultRecord } from '../decoder/types.js';
import type { RequestRecord } from '../query/types.js';

const { DEGREE, PRIME, PRECISION, COLUMN_WIDTH } = OUTPUT_FORMAT;

// A value exactly halfway between two outputs is an odd multiple of 1 / TIE_SCALE
const TIE_SCALE = 2 ** (PRECISION + 1);
const DECIMAL_SCALE = 10 ** PRECISION;

/**
 * Fixed-point rendering as printf's %.3f does it: exact ties round to
 * even and negative zero keeps its sign. toFixed rounds ties away from
 * zero and drops the sign of -0.
 */
function fixed(value: number): string {
  const negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);
  const scaled = magnitude * TIE_SCALE;

  let text: string;
  if (Number.isInteger(scaled) && scaled % 2 === 1) {
    let units = Math.floor(magnitude * DECIMAL_SCALE);
    if (units % 2 === 1) {
      units += 1;
    }
    const digits = String(units).padStart(PRECISION + 1, '0');
    text = `${digits.slice(0, -PRECISION)}.${digits.slice(-PRECISION)}`;
  } else {
    text = magnitude.toFixed(PRECISION);
  }

  return negative ? `-${text}` : text;
}

function column(value: number): string {
  return fixed(value).padStart(COLUMN_WIDTH);
}

/**
 * Declination relative to local grid north
 */
export function gridDeclination(request: RequestRecord, result: ResultRecord): number {
  return result.declination - request.gridOffset;
}

/**
 * Render one report line:
 *
 *   2015-08-28 63° 375′ 96° 15′ -2.460 | 2015.548 61.100° 101.100° 5.525 7.985°
 *   date       lat      lon     grid     dec. yr  lat     lon      decl  grid decl
 */
export function formatLine(request: RequestRecord, result: ResultRecord): string {
  const date = [
    request.year.padEnd(4),
    request.month.padStart(2, '0'),
    request.day.padStart(2, '0'),
  ].join('-');

  return [
    date,
    `${request.latitudeDegrees}${DEGREE} ${request.latitudeMinutes}${PRIME}`,
    `${request.longitudeDegrees}${DEGREE} ${request.longitudeMinutes}${PRIME}`,
    `${column(request.gridOffset)} |`,
    `${fixed(result.decimalYear)} ${column(result.latitude)}${DEGREE}`,
    `${column(result.longitude)}${DEGREE}`,
    `${fixed(result.declination)} ${fixed(gridDeclination(request, result))}${DEGREE}`,
  ].join(' ');
}

export function formatHeader(): string {
  return OUTPUT_FORMAT.HEADER;
}
