import { describe, it, expect } from 'vitest';
import { GROWTH_INCREMENT, INITIAL_CAPACITY, StatementBuffer } from '../src/parser/index.js';
import type { WordToken } from '../src/tokenizer/index.js';

function words(count: number): WordToken[] {
  return Array.from({ length: count }, (_, i): WordToken => ({ type: 'word', text: `w${i}` }));
}

describe('StatementBuffer', () => {
  it('should start empty', () => {
    const buffer = new StatementBuffer();
    expect(buffer.length).toBe(0);
    expect(buffer.capacity).toBe(INITIAL_CAPACITY);
    expect(buffer.last()).toBeUndefined();
    expect(buffer.toArray()).toEqual([]);
  });

  it('should not grow until full', () => {
    const buffer = new StatementBuffer();
    words(INITIAL_CAPACITY).forEach((token) => buffer.push(token));
    expect(buffer.capacity).toBe(INITIAL_CAPACITY);

    buffer.push({ type: 'char', char: ';' });
    expect(buffer.capacity).toBe(INITIAL_CAPACITY + GROWTH_INCREMENT);
  });

  it('should keep every token in order across growth', () => {
    const buffer = new StatementBuffer();
    const tokens = words(600);
    tokens.forEach((token) => buffer.push(token));

    expect(buffer.length).toBe(600);
    expect(buffer.capacity).toBe(768);
    expect(buffer.toArray()).toEqual(tokens);
    expect(buffer.last()).toEqual({ type: 'word', text: 'w599' });
  });

  it('should empty the buffer and keep its capacity on clear', () => {
    const buffer = new StatementBuffer();
    words(300).forEach((token) => buffer.push(token));

    buffer.clear();
    expect(buffer.length).toBe(0);
    expect(buffer.capacity).toBe(INITIAL_CAPACITY + GROWTH_INCREMENT);
    expect(buffer.last()).toBeUndefined();
    expect(buffer.toArray()).toEqual([]);

    buffer.push({ type: 'word', text: 'next' });
    expect(buffer.toArray()).toEqual([{ type: 'word', text: 'next' }]);
  });

  it('should retract the last token', () => {
    const buffer = new StatementBuffer();
    buffer.push({ type: 'word', text: 'a' });
    buffer.push({ type: 'char', char: '/' });

    buffer.retract();
    expect(buffer.length).toBe(1);
    expect(buffer.last()).toEqual({ type: 'word', text: 'a' });

    buffer.retract();
    buffer.retract();
    expect(buffer.length).toBe(0);
  });
});
