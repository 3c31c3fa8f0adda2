/**
 * Stylesheet line parser
 *
 * Parses whole CSS/SCSS/Sass/Less files into classified lines.
 *
 * @since 2026-10-19
 */

export { StylesheetLineParser } from './StylesheetLineParser.js';
export type {
  StylesheetDialect,
  StylesheetInfo,
  StylesheetParseResult,
  StylesheetParseOptions,
  StylesheetFormatOptions,
} from './types.js';
