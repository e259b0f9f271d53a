export { decodeResponse } from './response-decoder.js';
export type { ResultRecord } from './types.js';
