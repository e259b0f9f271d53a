export { parseLine } from './line-parser.js';
export type {
  LineClassification,
  FieldSequence,
  BlankLine,
  CommentLine,
  MalformedLine,
  DataLine,
} from './types.js';
