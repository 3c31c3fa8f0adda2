/**
 * Lenient stylesheet parser
 *
 * @since 2026-10-19
 */

export { LenientStyleParser } from './LenientStyleParser.js';
export { StatementBuffer, INITIAL_CAPACITY, GROWTH_INCREMENT } from './StatementBuffer.js';
