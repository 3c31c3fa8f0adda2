/**
 * lenient-style-lines
 *
 * Error-tolerant line classifier for CSS, SCSS, Sass and Less.
 *
 * ## Recommended API:
 * - LenientStyleParser - Pull lines one at a time from a character source
 * - StylesheetLineParser - Parse, summarize and reformat whole files
 * - StyleLine - Classified line (block opening, property, block closure)
 *
 * ## Lower level:
 * - StyleTokenizer, tokenize - Token stream
 * - joinTokens - Text reconstruction from tokens
 */

export * from './parser/index.js';
export * from './lines/index.js';
export * from './stylesheet/index.js';
export * from './tokenizer/index.js';
