// Optional sign, digits with optional fraction (or a bare fraction), optional exponent.
// An exponent can still overflow to Infinity, so the value is checked as well.
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a decimal number token.
 * Returns undefined for anything Number() would coerce loosely:
 * empty strings, hex, NaN and Infinity, including exponents that overflow.
 */
export function parseDecimal(token: string): number | undefined {
  const trimmed = token.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}
