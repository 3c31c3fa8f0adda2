/**
 * Types for the stylesheet tokenizer
 *
 * @since 2026-10-19
 */

/**
 * Anything that yields stylesheet text: a whole string, or chunks of it
 * (lines of a file, pieces of a stream already decoded to text).
 */
export type CharacterSource = string | Iterable<string>;

/** Quote characters that open a string token */
export type QuoteCharacter = '"' | "'";

/**
 * Character class from the fixed tokenizer table
 */
export type CharacterClass = 'word' | 'whitespace' | 'quote' | 'ordinary';

/** Identifier, number, unit, color, `$var`, `@var`... */
export interface WordToken {
  type: 'word';
  text: string;
}

/** Quoted string, quotes removed, content kept verbatim */
export interface StringToken {
  type: 'string';
  text: string;
  quote: QuoteCharacter;
}

/** Any single significant character: `{`, `}`, `;`, `:`, `(`, `/`... */
export interface CharToken {
  type: 'char';
  char: string;
}

export interface EndOfStreamToken {
  type: 'eof';
}

/**
 * Token that can be buffered in a statement
 */
export type ContentToken = WordToken | StringToken | CharToken;

export type StyleToken = ContentToken | EndOfStreamToken;
