/**
 * StyleTokenizer
 *
 * Pull-based tokenizer for CSS, SCSS, Sass and Less text.
 * Splits a character source into words, quoted strings and single
 * significant characters. Whitespace separates tokens and is never reported.
 *
 * @since 2026-10-19
 */

import type {
  CharacterClass,
  CharacterSource,
  ContentToken,
  QuoteCharacter,
  StyleToken,
} from './types.js';

/** Characters, besides letters and digits, that belong to a word */
const EXTRA_WORD_CHARACTERS = new Set(['-', '.', '%', '#', '$', '@']);

/** First code point treated as a word character (non-breaking space and up) */
const FIRST_EXTENDED_WORD_CODE_POINT = 160;

/**
 * Classify a code point with the fixed tokenizer table
 */
export function classifyCharacter(codePoint: number): CharacterClass {
  if (codePoint <= 0x20) {
    return 'whitespace';
  }
  if (codePoint >= FIRST_EXTENDED_WORD_CODE_POINT) {
    return 'word';
  }
  if (
    (codePoint >= 0x61 && codePoint <= 0x7a) || // a-z
    (codePoint >= 0x41 && codePoint <= 0x5a) || // A-Z
    (codePoint >= 0x30 && codePoint <= 0x39) // 0-9
  ) {
    return 'word';
  }

  const char = String.fromCodePoint(codePoint);
  if (EXTRA_WORD_CHARACTERS.has(char)) {
    return 'word';
  }
  if (char === '"' || char === "'") {
    return 'quote';
  }
  return 'ordinary';
}

function classOf(char: string): CharacterClass {
  return classifyCharacter(char.codePointAt(0) ?? 0);
}

function isQuote(char: string): char is QuoteCharacter {
  return char === '"' || char === "'";
}

/**
 * StyleTokenizer - single pass, forward only, one instance per source
 */
export class StyleTokenizer {
  private readonly chunks: Iterator<string>;
  private chunk: Iterator<string> | null = null;
  private pushedBack: string | null = null;
  private exhausted = false;

  constructor(source: CharacterSource) {
    if (source == null) {
      throw new TypeError('StyleTokenizer requires a character source');
    }
    this.chunks =
      typeof source === 'string' ? [source][Symbol.iterator]() : source[Symbol.iterator]();
  }

  /**
   * Read the next token. Returns `eof` forever once the source is exhausted.
   */
  next(): StyleToken {
    let char = this.readChar();
    while (char !== null && classOf(char) === 'whitespace') {
      char = this.readChar();
    }

    if (char === null) {
      return { type: 'eof' };
    }

    if (isQuote(char)) {
      return { type: 'string', text: this.readQuoted(char), quote: char };
    }

    if (classOf(char) === 'word') {
      return { type: 'word', text: this.readWord(char) };
    }

    return { type: 'char', char };
  }

  private readWord(first: string): string {
    let text = first;
    let char = this.readChar();
    while (char !== null && classOf(char) === 'word') {
      text += char;
      char = this.readChar();
    }
    this.pushBack(char);
    return text;
  }

  /**
   * Read up to the closing quote. A line break or the end of the source
   * also ends the string; the line break is left for the next token.
   */
  private readQuoted(quote: QuoteCharacter): string {
    let text = '';
    let char = this.readChar();
    while (char !== null && char !== quote) {
      if (char === '\n' || char === '\r') {
        this.pushBack(char);
        break;
      }
      text += char;
      if (char === '\\') {
        const escaped = this.readChar();
        if (escaped === null) {
          break;
        }
        text += escaped;
      }
      char = this.readChar();
    }
    return text;
  }

  private pushBack(char: string | null): void {
    this.pushedBack = char;
  }

  /**
   * Pull one code point from the source, or null at the end
   */
  private readChar(): string | null {
    if (this.pushedBack !== null) {
      const char = this.pushedBack;
      this.pushedBack = null;
      return char;
    }

    while (!this.exhausted) {
      if (this.chunk) {
        const next = this.chunk.next();
        if (!next.done) {
          return next.value;
        }
        this.chunk = null;
      }

      const nextChunk = this.chunks.next();
      if (nextChunk.done) {
        this.exhausted = true;
      } else {
        this.chunk = nextChunk.value[Symbol.iterator]();
      }
    }

    return null;
  }
}

/**
 * Iterate over every token of a source, end of stream excluded
 */
export function* tokenize(source: CharacterSource): Generator<ContentToken> {
  const tokenizer = new StyleTokenizer(source);
  for (;;) {
    const token = tokenizer.next();
    if (token.type === 'eof') {
      return;
    }
    yield token;
  }
}
