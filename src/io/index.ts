export { splitLines, readInputFile, readStreamLines, writeOutput } from './lines.js';
