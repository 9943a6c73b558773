/**
 * Pagination Gate
 * Character windows over converted bodies
 */

import type { PageSlice } from '../types/docs.js';

function toIndex(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Slice `text` from `startIndex`, returning at most `maxLength`
 * characters (itself capped at `ceiling`).
 */
export function paginate(text: string, startIndex: number, maxLength: number, ceiling: number): PageSlice {
  const totalLength = text.length;
  const start = toIndex(startIndex);
  const length = Math.min(toIndex(maxLength), toIndex(ceiling));

  if (start >= totalLength) {
    return { text: '', totalLength, returnedLength: 0, startIndex: start, truncated: false };
  }

  let end = Math.min(start + length, totalLength);
  // Never end between the halves of a surrogate pair, unless that leaves nothing
  if (end - start > 1 && end < totalLength && isHighSurrogate(text.charCodeAt(end - 1))) {
    end--;
  }
  const slice = text.slice(start, end);
  const truncated = end < totalLength;

  return {
    text: slice,
    totalLength,
    returnedLength: slice.length,
    startIndex: start,
    truncated,
    ...(truncated ? { nextIndex: end } : {}),
  };
}
