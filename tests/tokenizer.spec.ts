/**
 * Tests for StyleTokenizer
 */
import { describe, it, expect } from 'vitest';
import { StyleTokenizer, classifyCharacter, tokenize } from '../src/tokenizer/index.js';

describe('classifyCharacter', () => {
  it('should treat control characters and space as whitespace', () => {
    expect(classifyCharacter(0x00)).toBe('whitespace');
    expect(classifyCharacter(0x09)).toBe('whitespace');
    expect(classifyCharacter(0x0a)).toBe('whitespace');
    expect(classifyCharacter(0x20)).toBe('whitespace');
  });

  it('should accept preprocessor prefixes and units in words', () => {
    for (const char of ['a', 'Z', '7', '-', '.', '%', '#', '$', '@']) {
      expect(classifyCharacter(char.codePointAt(0) ?? 0)).toBe('word');
    }
  });

  it('should treat code points from 160 up as word characters', () => {
    expect(classifyCharacter(0x9f)).toBe('ordinary');
    expect(classifyCharacter(0xa0)).toBe('word');
    expect(classifyCharacter(0x1f600)).toBe('word');
  });

  it('should classify quotes and punctuation', () => {
    expect(classifyCharacter(0x22)).toBe('quote');
    expect(classifyCharacter(0x27)).toBe('quote');
    for (const char of ['{', '}', ';', ':', '(', ')', ',', '/', '*', '&', '_', '!']) {
      expect(classifyCharacter(char.codePointAt(0) ?? 0)).toBe('ordinary');
    }
  });
});

describe('StyleTokenizer', () => {
  it('should split a declaration into words and characters', () => {
    expect(Array.from(tokenize('margin: 0 auto;'))).toEqual([
      { type: 'word', text: 'margin' },
      { type: 'char', char: ':' },
      { type: 'word', text: '0' },
      { type: 'word', text: 'auto' },
      { type: 'char', char: ';' },
    ]);
  });

  it('should keep sass and less variables and colors as single words', () => {
    expect(Array.from(tokenize('$primary:#fff;@size:1.5em'))).toEqual([
      { type: 'word', text: '$primary' },
      { type: 'char', char: ':' },
      { type: 'word', text: '#fff' },
      { type: 'char', char: ';' },
      { type: 'word', text: '@size' },
      { type: 'char', char: ':' },
      { type: 'word', text: '1.5em' },
    ]);
  });

  it('should report every punctuation character on its own', () => {
    expect(Array.from(tokenize('rgba(0,.5)/*'))).toEqual([
      { type: 'word', text: 'rgba' },
      { type: 'char', char: '(' },
      { type: 'word', text: '0' },
      { type: 'char', char: ',' },
      { type: 'word', text: '.5' },
      { type: 'char', char: ')' },
      { type: 'char', char: '/' },
      { type: 'char', char: '*' },
    ]);
  });

  it('should read quoted strings without their quotes', () => {
    expect(Array.from(tokenize(`content: "a b" 'c';`))).toEqual([
      { type: 'word', text: 'content' },
      { type: 'char', char: ':' },
      { type: 'string', text: 'a b', quote: '"' },
      { type: 'string', text: 'c', quote: "'" },
      { type: 'char', char: ';' },
    ]);
  });

  it('should keep escaped quotes verbatim inside strings', () => {
    expect(Array.from(tokenize(`'it\\'s'`))).toEqual([
      { type: 'string', text: "it\\'s", quote: "'" },
    ]);
  });

  it('should end an unterminated string at the line break', () => {
    expect(Array.from(tokenize('"abc\nx'))).toEqual([
      { type: 'string', text: 'abc', quote: '"' },
      { type: 'word', text: 'x' },
    ]);
  });

  it('should read non-ASCII identifiers as one word', () => {
    expect(Array.from(tokenize('.café-ü'))).toEqual([{ type: 'word', text: '.café-ü' }]);
  });

  it('should read words spanning several chunks', () => {
    expect(Array.from(tokenize(['col', 'or: r', '', 'ed;']))).toEqual([
      { type: 'word', text: 'color' },
      { type: 'char', char: ':' },
      { type: 'word', text: 'red' },
      { type: 'char', char: ';' },
    ]);
  });

  it('should keep returning eof once the source is exhausted', () => {
    const tokenizer = new StyleTokenizer('  \n\t');
    expect(tokenizer.next()).toEqual({ type: 'eof' });
    expect(tokenizer.next()).toEqual({ type: 'eof' });
  });

  it('should propagate errors raised by the source', () => {
    function* failing(): Generator<string> {
      yield 'a ';
      throw new Error('read failed');
    }

    const tokenizer = new StyleTokenizer(failing());
    expect(tokenizer.next()).toEqual({ type: 'word', text: 'a' });
    expect(() => tokenizer.next()).toThrow('read failed');
  });

  it('should reject a missing source', () => {
    expect(() => Reflect.construct(StyleTokenizer, [null])).toThrow(TypeError);
  });
});
