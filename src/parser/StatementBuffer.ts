/**
 * Growable buffer holding the tokens of the statement being read.
 */

import type { ContentToken } from '../tokenizer/types.js';

/** Token slots allocated for a new statement */
export const INITIAL_CAPACITY = 256;

/** Token slots added each time the buffer fills up */
export const GROWTH_INCREMENT = 256;

export class StatementBuffer {
  private slots: Array<ContentToken | undefined> = new Array(INITIAL_CAPACITY);
  private size = 0;

  get length(): number {
    return this.size;
  }

  get capacity(): number {
    return this.slots.length;
  }

  push(token: ContentToken): void {
    if (this.size === this.slots.length) {
      this.grow();
    }
    this.slots[this.size++] = token;
  }

  /**
   * Drop the last buffered token
   */
  retract(): void {
    if (this.size > 0) {
      this.size--;
      this.slots[this.size] = undefined;
    }
  }

  /**
   * Forget every buffered token, keeping the current capacity
   */
  clear(): void {
    this.slots.fill(undefined, 0, this.size);
    this.size = 0;
  }

  last(): ContentToken | undefined {
    return this.size > 0 ? this.slots[this.size - 1] : undefined;
  }

  /**
   * Buffered tokens, in reading order
   */
  toArray(): ContentToken[] {
    const tokens: ContentToken[] = [];
    for (let i = 0; i < this.size; i++) {
      const token = this.slots[i];
      if (token !== undefined) {
        tokens.push(token);
      }
    }
    return tokens;
  }

  private grow(): void {
    const grown: Array<ContentToken | undefined> = new Array(this.slots.length + GROWTH_INCREMENT);
    for (let i = 0; i < this.size; i++) {
      grown[i] = this.slots[i];
    }
    this.slots = grown;
  }
}
