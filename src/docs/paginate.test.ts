/**
 * Unit tests for body pagination
 */

import { describe, it, expect } from '@jest/globals';
import { paginate } from './paginate.js';

describe('paginate', () => {
  const text = 'abcdefghij';

  it('should return the whole text when it fits', () => {
    expect(paginate(text, 0, 100, 1000)).toEqual({
      text,
      totalLength: 10,
      returnedLength: 10,
      startIndex: 0,
      truncated: false,
    });
  });

  it('should truncate and point at the next window', () => {
    expect(paginate(text, 0, 4, 1000)).toEqual({
      text: 'abcd',
      totalLength: 10,
      returnedLength: 4,
      startIndex: 0,
      truncated: true,
      nextIndex: 4,
    });
  });

  it('should return the final window untruncated', () => {
    const slice = paginate(text, 8, 4, 1000);

    expect(slice.text).toBe('ij');
    expect(slice.truncated).toBe(false);
    expect(slice.nextIndex).toBeUndefined();
  });

  it('should return an empty slice past the end', () => {
    expect(paginate(text, 10, 4, 1000)).toEqual({
      text: '',
      totalLength: 10,
      returnedLength: 0,
      startIndex: 10,
      truncated: false,
    });
    expect(paginate(text, 25, 4, 1000).startIndex).toBe(25);
  });

  it('should cap the window at the ceiling', () => {
    const slice = paginate(text, 0, 100, 3);

    expect(slice.text).toBe('abc');
    expect(slice.nextIndex).toBe(3);
  });

  it('should treat negative and fractional inputs as floored indexes', () => {
    expect(paginate(text, -5, 2.9, 1000).text).toBe('ab');
    expect(paginate(text, 1.7, 3, 1000).text).toBe('bcd');
  });

  it('should reassemble the text by following nextIndex', () => {
    const body = 'The quick brown fox jumps over the lazy dog.';
    let assembled = '';
    let start: number | undefined = 0;
    let pages = 0;

    while (start !== undefined) {
      const slice = paginate(body, start, 7, 1000);
      assembled += slice.text;
      start = slice.nextIndex;
      pages++;
    }

    expect(assembled).toBe(body);
    expect(pages).toBe(Math.ceil(body.length / 7));
  });

  it('should not split a surrogate pair at the window end', () => {
    const emoji = 'ab\u{1F600}cd';

    expect(paginate(emoji, 0, 3, 100)).toEqual({
      text: 'ab',
      totalLength: 6,
      returnedLength: 2,
      startIndex: 0,
      truncated: true,
      nextIndex: 2,
    });
    expect(paginate(emoji, 2, 3, 100).text).toBe('\u{1F600}c');
  });

  it('should handle empty text', () => {
    expect(paginate('', 0, 10, 100)).toEqual({
      text: '',
      totalLength: 0,
      returnedLength: 0,
      startIndex: 0,
      truncated: false,
    });
  });
});
