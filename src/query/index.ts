export { buildRequest, toDecimalDegrees } from './builder.js';
export type { RequestRecord } from './types.js';
