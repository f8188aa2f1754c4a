export { validateCommand } from './validate.js';
export { rewriteElevation, shellQuote } from './elevation.js';
export { splitSegments, tokenize } from './shell-syntax.js';
