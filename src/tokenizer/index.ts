/**
 * Stylesheet tokenizer
 *
 * Splits CSS-family text into words, quoted strings and significant characters.
 *
 * @since 2026-10-19
 */

export { StyleTokenizer, classifyCharacter, tokenize } from './StyleTokenizer.js';
export type {
  CharacterSource,
  CharacterClass,
  QuoteCharacter,
  WordToken,
  StringToken,
  CharToken,
  EndOfStreamToken,
  ContentToken,
  StyleToken,
} from './types.js';
