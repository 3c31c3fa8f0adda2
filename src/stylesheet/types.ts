/**
 * Types for the stylesheet line parser
 *
 * @since 2026-10-19
 */

import type { StyleLine } from '../lines/StyleLine.js';

export type StylesheetDialect = 'css' | 'scss' | 'sass' | 'less';

/**
 * Stylesheet summary
 */
export interface StylesheetInfo {
  /** Unique identifier */
  uuid: string;

  /** File path */
  file: string;

  /** Content hash */
  hash: string;

  /** Dialect, from the file extension */
  dialect: StylesheetDialect;

  /** Total lines of source text */
  linesOfCode: number;

  /** Number of classified lines */
  lineCount: number;

  /** Number of block openings */
  blockCount: number;

  /** Number of property lines */
  propertyCount: number;

  /** Number of lines left unclassified */
  unknownCount: number;

  /** Deepest block nesting reached */
  maxDepth: number;

  /** Blocks still open when the source ended */
  unclosedBlocks: number;

  /** Closures read with no block open */
  strayClosures: number;
}

export interface StylesheetParseResult {
  stylesheet: StylesheetInfo;
  lines: StyleLine[];
}

export interface StylesheetParseOptions {
  /** Keep the classified lines in the result (default: true) */
  includeLines?: boolean;

  /** Warn about unbalanced braces on the console (default: false) */
  verbose?: boolean;
}

export interface StylesheetFormatOptions {
  /** Indentation unit (default: tab) */
  indent?: string;
}
