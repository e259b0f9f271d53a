/**
 * Centralized Configuration Constants
 *
 * Default values and fixed conventions used throughout the declination
 * pipeline. Runtime overrides are resolved in ./env.ts.
 */

export const VERSION = '0.1.0';

// ============================================
// Input Format
// ============================================

export const INPUT_FORMAT = {
  /** First non-whitespace character of a comment line */
  COMMENT_INDICATOR: '#',
  /** YYYY MM DD LAT_DEG LAT_MIN LON_DEG LON_MIN GRID_OFFSET */
  MIN_FIELDS: 8,
} as const;

// ============================================
// Output Format
// ============================================

export const OUTPUT_FORMAT = {
  HEADER:
    '   DATE    Latit   Longit    grid    decDate  decLat  decLong  Decl  gridDec',
  MALFORMED_MARKER: '#! The following line is malformed:',
  ERROR_MARKER: '#! Error',
  DEGREE: '°',
  PRIME: '′',
  /** Decimal places for every numeric column */
  PRECISION: 3,
  /** Width of the right-aligned offset and coordinate columns */
  COLUMN_WIDTH: 6,
} as const;

// ============================================
// Remote Calculator
// ============================================

export const CALCULATOR_DEFAULTS = {
  ENDPOINT: 'https://www.ngdc.noaa.gov/geomag-web/calculators/calculateDeclination',
  /** Only the northern hemisphere is supported */
  LATITUDE_HEMISPHERE: 'N',
  /** Only the western hemisphere is supported */
  LONGITUDE_HEMISPHERE: 'W',
  RESULT_FORMAT: 'csv',
} as const;

// ============================================
// HTTP Client Configuration
// ============================================

export const HTTP_DEFAULTS = {
  /** Per-request deadline in milliseconds */
  TIMEOUT_MS: 30000,
  /** One attempt: the calculator is queried without retry unless configured */
  MAX_ATTEMPTS: 1,
  /** Initial delay between retries in milliseconds */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay between retries in milliseconds */
  MAX_DELAY_MS: 30000,
  /** Largest delay a Node timer accepts; longer timeouts fire after 1ms */
  MAX_TIMER_MS: 2147483647,
  ACCEPT: 'text/csv, text/plain;q=0.9, */*;q=0.1',
} as const;

// ============================================
// Pipeline Configuration
// ============================================

export const PIPELINE_DEFAULTS = {
  FAILURE_POLICY: 'continue' as const,
  INCLUDE_HEADER: true,
} as const;

// ============================================
// Type Definitions for Configuration
// ============================================

/** What happens when a remote stage (fetch or decode) fails for a line */
export type FailurePolicy = 'continue' | 'fail-fast';

/** Retry settings; delays grow exponentially from initialDelay */
export type HttpRetryConfig = {
  maxAttempts?: number;
  initialDelay?: number;
};
