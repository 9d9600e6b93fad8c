export { tokenizeFileName, tokenizeContent } from './tokenize.js';
