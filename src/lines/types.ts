/**
 * Types for stylesheet lines
 *
 * @since 2026-10-19
 */

/**
 * Kind of a classified line
 * - `unknown`: text left at the end of the source with no delimiter
 * - `block-opening`: statement ended by `{`
 * - `property`: statement ended by `;`, or text left before a `}`
 * - `block-closure`: a bare `}`
 */
export type LineKind = 'unknown' | 'block-opening' | 'property' | 'block-closure';
