import { describe, it, expect } from 'vitest';
import { wrapText, padCell, textLength } from '../../../src/domain/services/TextWrapper.js';

describe('wrapText', () => {
  it('should return a single empty segment for empty text', () => {
    expect(wrapText('', 10)).toEqual(['']);
  });

  it('should return a single empty segment for whitespace-only text', () => {
    expect(wrapText('  \t ', 10)).toEqual(['']);
  });

  it('should keep text that fits on one segment', () => {
    expect(wrapText('hello world', 20)).toEqual(['hello world']);
  });

  it('should break between words', () => {
    expect(wrapText('the quick brown fox', 10)).toEqual(['the quick', 'brown fox']);
  });

  it('should split a word longer than the width', () => {
    expect(wrapText('a'.repeat(50), 20)).toEqual(['a'.repeat(20), 'a'.repeat(20), 'a'.repeat(10)]);
  });

  it('should fill the current segment before splitting a long word', () => {
    expect(wrapText(`ab ${'x'.repeat(25)}`, 10)).toEqual(['ab xxxxxxx', 'x'.repeat(10), 'x'.repeat(8)]);
  });

  it('should turn tabs and line breaks into spaces', () => {
    expect(wrapText('a  \t b\nc', 20)).toEqual(['a    b c']);
  });

  it('should keep runs of spaces inside a segment', () => {
    expect(wrapText('Main St   Apt 4', 15)).toEqual(['Main St   Apt 4']);
  });

  it('should drop spaces only where a segment breaks', () => {
    expect(wrapText('ab  cd   efgh', 6)).toEqual(['ab  cd', 'efgh']);
  });

  it('should never produce a segment longer than the width', () => {
    const text = 'Lorem ipsum dolor sit amet, consectetur adipiscing elit, sed do eiusmod tempor incididunt';
    for (const segment of wrapText(text, 12)) {
      expect(textLength(segment)).toBeLessThanOrEqual(12);
    }
  });

  it('should reconstruct the text up to whitespace at wrap points', () => {
    const text = 'Lorem ipsum dolor sit amet,   consectetur adipiscing elit';
    expect(wrapText(text, 12).join(' ')).toBe('Lorem ipsum dolor sit amet, consectetur adipiscing elit');
  });

  it('should count characters rather than UTF-16 units', () => {
    expect(wrapText('😀😀😀😀', 2)).toEqual(['😀😀', '😀😀']);
  });

  it('should reject a width below 1', () => {
    expect(() => wrapText('abc', 0)).toThrow('Wrap width must be at least 1');
  });
});

describe('padCell', () => {
  it('should pad with trailing spaces to the width', () => {
    expect(padCell('ab', 5)).toBe('ab   ');
  });

  it('should leave text wider than the width untouched', () => {
    expect(padCell('abcdef', 3)).toBe('abcdef');
  });

  it('should pad by characters', () => {
    expect(padCell('é😀', 4)).toBe('é😀  ');
  });
});

describe('textLength', () => {
  it('should count code points', () => {
    expect(textLength('héllo')).toBe(5);
    expect(textLength('😀')).toBe(1);
  });
});
