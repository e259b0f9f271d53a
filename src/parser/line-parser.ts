import { INPUT_FORMAT } from '../config/constants.js';
import type { LineClassification } from './types.js';

/**
 * Classify one raw input line. Total: never throws.
 */
export function parseLine(
  raw: string,
  minFields: number = INPUT_FORMAT.MIN_FIELDS
): LineClassification {
  const stripped = raw.trim();

  if (stripped === '') {
    return { kind: 'blank', raw };
  }

  if (stripped.startsWith(INPUT_FORMAT.COMMENT_INDICATOR)) {
    return { kind: 'comment', raw };
  }

  const fields = stripped.split(/\s+/);
  if (fields.length < minFields) {
    return { kind: 'malformed', raw, fieldCount: fields.length };
  }

  return { kind: 'data', raw, fields };
}
