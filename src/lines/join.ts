/**
 * Rebuild display text from a run of buffered tokens.
 */

import type { ContentToken } from '../tokenizer/types.js';

/** Characters never preceded by a space */
const TIGHT_BEFORE = new Set(['(', ')', ',', ';', ':', '{', '}']);

/**
 * Literal text of a token. Quoted strings give their content, without quotes.
 */
export function tokenText(token: ContentToken): string {
  return token.type === 'char' ? token.char : token.text;
}

function rawChar(token: ContentToken | undefined): string | null {
  return token !== undefined && token.type === 'char' ? token.char : null;
}

/**
 * Join tokens `[start, end)` with single spaces, except before
 * `( ) , ; : { }`, right after `(`, and after a `,` inside parentheses.
 *
 * @example
 * // rgba ( 0 , 0 , 0 , .5 ) -> "rgba(0,0,0,.5)"
 * // margin : 0 auto -> "margin: 0 auto"
 */
export function joinTokens(
  tokens: readonly ContentToken[],
  start = 0,
  end = tokens.length
): string {
  let text = '';
  let parenDepth = 0;

  for (let i = start; i < end; i++) {
    const token = tokens[i];
    if (token === undefined) {
      break;
    }
    const char = rawChar(token);

    if (i > start) {
      const previous = rawChar(tokens[i - 1]);
      const tight =
        (char !== null && TIGHT_BEFORE.has(char)) ||
        previous === '(' ||
        (previous === ',' && parenDepth > 0);
      if (!tight) {
        text += ' ';
      }
    }

    if (char === '(') {
      parenDepth++;
    } else if (char === ')' && parenDepth > 0) {
      parenDepth--;
    }
    text += tokenText(token);
  }

  return text;
}
