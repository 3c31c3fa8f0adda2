/**
 * LenientStyleParser
 *
 * Reads a CSS, SCSS, Sass or Less source one line at a time, tracking block
 * nesting. Comments are skipped. Property values are not interpreted, and
 * malformed input never fails: missing semicolons, unmatched braces and
 * trailing text all come out as some line.
 *
 * @since 2026-10-19
 */

import { StyleLine } from '../lines/StyleLine.js';
import { StyleTokenizer } from '../tokenizer/StyleTokenizer.js';
import type { CharacterSource } from '../tokenizer/types.js';
import { StatementBuffer } from './StatementBuffer.js';

export class LenientStyleParser implements Iterable<StyleLine> {
  private readonly tokenizer: StyleTokenizer;
  private readonly buffer = new StatementBuffer();
  private parent: StyleLine | null = null;
  /** Set when a `}` closed a block right after a property with no `;` */
  private pendingClosure = false;

  constructor(source: CharacterSource) {
    if (source == null) {
      throw new TypeError('LenientStyleParser requires a character source');
    }
    this.tokenizer = new StyleTokenizer(source);
  }

  /**
   * Parse a whole source into lines
   */
  static parseAll(source: CharacterSource): StyleLine[] {
    return Array.from(new LenientStyleParser(source));
  }

  /**
   * Innermost open block, null at top level
   */
  get currentBlock(): StyleLine | null {
    return this.parent;
  }

  /**
   * Number of blocks currently open
   */
  get depth(): number {
    return this.parent === null ? 0 : this.parent.ancestors().length + 1;
  }

  get hasPendingClosure(): boolean {
    return this.pendingClosure;
  }

  /**
   * Read the next line.
   *
   * @returns the line, or null once the source is exhausted
   */
  nextLine(): StyleLine | null {
    if (this.pendingClosure) {
      this.pendingClosure = false;
      const closure = StyleLine.closing(this.parent);
      this.closeBlock();
      return closure;
    }

    const buffer = this.buffer;
    buffer.clear();
    let inComment = false;
    let lastCommentChar: string | null = null;

    for (;;) {
      const token = this.tokenizer.next();
      if (token.type === 'eof') {
        break;
      }

      const char = token.type === 'char' ? token.char : null;

      if (inComment) {
        if (char === '/' && lastCommentChar === '*') {
          inComment = false;
          // so that `*//*` does not read as the end of another comment
          lastCommentChar = null;
        } else {
          lastCommentChar = char;
        }
        continue;
      }

      switch (char) {
        case ';':
          buffer.push(token);
          return StyleLine.fromStatement(this.parent, buffer.toArray());

        case '{': {
          buffer.push(token);
          const opening = StyleLine.fromStatement(this.parent, buffer.toArray());
          this.parent = opening;
          return opening;
        }

        case '}': {
          buffer.push(token);
          const line = StyleLine.fromStatement(this.parent, buffer.toArray());
          if (line.kind === 'property') {
            this.pendingClosure = true;
          } else {
            this.closeBlock();
          }
          return line;
        }

        case '*': {
          const previous = buffer.last();
          if (previous !== undefined && previous.type === 'char' && previous.char === '/') {
            buffer.retract();
            inComment = true;
            continue;
          }
          break;
        }
      }

      buffer.push(token);
    }

    // Text with no delimiter at the end of the source
    return buffer.length > 0 ? StyleLine.fromStatement(this.parent, buffer.toArray()) : null;
  }

  *[Symbol.iterator](): Iterator<StyleLine> {
    for (let line = this.nextLine(); line !== null; line = this.nextLine()) {
      yield line;
    }
  }

  private closeBlock(): void {
    if (this.parent !== null) {
      this.parent = this.parent.parent;
    }
  }
}
