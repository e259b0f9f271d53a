/**
 * Whitespace-separated tokens of a data line:
 * YYYY MM DD LAT_DEG LAT_MIN LON_DEG LON_MIN GRID_OFFSET [ignored...]
 */
export type FieldSequence = readonly string[];

export interface BlankLine {
  kind: 'blank';
  raw: string;
}

export interface CommentLine {
  kind: 'comment';
  raw: string;
}

export interface MalformedLine {
  kind: 'malformed';
  raw: string;
  fieldCount: number;
}

export interface DataLine {
  kind: 'data';
  raw: string;
  fields: FieldSequence;
}

export type LineClassification = BlankLine | CommentLine | MalformedLine | DataLine;
