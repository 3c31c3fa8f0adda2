/**
 * Stylesheet lines
 *
 * @since 2026-10-19
 */

export { StyleLine } from './StyleLine.js';
export { joinTokens, tokenText } from './join.js';
export type { LineKind } from './types.js';
