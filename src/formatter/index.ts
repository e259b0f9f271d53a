export { formatLine, formatHeader, gridDeclination } from './line-formatter.js';
