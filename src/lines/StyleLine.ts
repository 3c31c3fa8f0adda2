/**
 * StyleLine
 *
 * One classified statement of a stylesheet: a block opening, a property
 * declaration or a block closure. Values are kept as text, never interpreted.
 *
 * @since 2026-10-19
 */

import type { ContentToken } from '../tokenizer/types.js';
import { joinTokens } from './join.js';
import type { LineKind } from './types.js';

const KIND_LABELS: Record<LineKind, string> = {
  unknown: 'UNKNOWN',
  'block-opening': 'BLOCK_OPENING',
  property: 'PROPERTY',
  'block-closure': 'BLOCK_CLOSURE',
};

function lastChar(tokens: readonly ContentToken[]): string | null {
  const last = tokens[tokens.length - 1];
  return last !== undefined && last.type === 'char' ? last.char : null;
}

/**
 * Index of the first `:` character token in `[0, end)`, or -1
 */
function findColon(tokens: readonly ContentToken[], end: number): number {
  for (let i = 0; i < end; i++) {
    const token = tokens[i];
    if (token.type === 'char' && token.char === ':') {
      return i;
    }
  }
  return -1;
}

export class StyleLine {
  private constructor(
    readonly kind: LineKind,
    /** Innermost block still open when the line was read, null at top level */
    readonly parent: StyleLine | null,
    /** Text before `{`, before `:` or before `;`; empty for a `}` */
    readonly declaration: string,
    /** Text after `:`, only for properties that have one */
    readonly value?: string
  ) {}

  /**
   * Classify a buffered statement. The last token is the delimiter that ended
   * it (`{`, `}` or `;`), or any token when the source ended first.
   *
   * @param tokens - at least one token
   */
  static fromStatement(parent: StyleLine | null, tokens: readonly ContentToken[]): StyleLine {
    const length = tokens.length;

    switch (lastChar(tokens)) {
      case '{':
        return new StyleLine('block-opening', parent, joinTokens(tokens, 0, length - 1));

      case '}': {
        const declaration = joinTokens(tokens, 0, length - 1);
        if (declaration === '') {
          return new StyleLine('block-closure', parent, '');
        }
        // `;` missing before `}`
        return StyleLine.property(parent, tokens, length - 1);
      }

      case ';':
        return StyleLine.property(parent, tokens, length - 1);
    }

    return new StyleLine('unknown', parent, joinTokens(tokens, 0, length));
  }

  /**
   * Closure of `block` that was not written out as a bare `}`
   */
  static closing(block: StyleLine | null): StyleLine {
    return new StyleLine('block-closure', block, '');
  }

  private static property(
    parent: StyleLine | null,
    tokens: readonly ContentToken[],
    end: number
  ): StyleLine {
    const colon = findColon(tokens, end);
    if (colon < 0) {
      return new StyleLine('property', parent, joinTokens(tokens, 0, end));
    }
    return new StyleLine(
      'property',
      parent,
      joinTokens(tokens, 0, colon),
      joinTokens(tokens, colon + 1, end)
    );
  }

  /**
   * Parent chain, innermost block first
   */
  ancestors(): StyleLine[] {
    const chain: StyleLine[] = [];
    for (let line = this.parent; line !== null; line = line.parent) {
      chain.push(line);
    }
    return chain;
  }

  /**
   * Indentation level. A closure lines up with the block it closes.
   */
  get depth(): number {
    const depth = this.ancestors().length;
    return this.kind === 'block-closure' && depth > 0 ? depth - 1 : depth;
  }

  /**
   * Render the line as stylesheet code
   */
  toCssCode(indent = '\t'): string {
    const prefix = indent.repeat(this.depth);

    switch (this.kind) {
      case 'property':
        return this.value === undefined
          ? `${prefix}${this.declaration};`
          : `${prefix}${this.declaration}: ${this.value};`;
      case 'block-opening':
        return `${prefix}${this.declaration} {`;
      case 'block-closure':
        return `${prefix}${this.declaration}}`;
      default:
        return `${prefix}${this.declaration}`;
    }
  }

  toString(): string {
    return `${this.toCssCode()} /* ${KIND_LABELS[this.kind]} */`;
  }
}
