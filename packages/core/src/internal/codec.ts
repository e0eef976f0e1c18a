/**
 * Index codec: maps 0-based offsets onto the tail or onto trie slots.
 */

import { BITS, BRANCH_FACTOR, MASK } from './constants';

/** First offset held by the tail. Everything below it lives in the trie. */
export function tailOffset(size: number): number {
  if (size === 0) return 0;
  return ((size - 1) >>> BITS) << BITS;
}

export function tailSize(size: number): number {
  return size === 0 ? 0 : ((size - 1) & MASK) + 1;
}

/** Child slot to follow at `level` (a multiple of BITS, 0 = inside the leaf). */
export function selector(offset: number, level: number): number {
  return (offset >>> level) & MASK;
}

/**
 * True when `offset` is the first offset of an aligned block of 2^level
 * elements, i.e. `offset` and `offset - 1` differ at or above bit `level`.
 */
export function startsBlock(offset: number, level: number): boolean {
  return ((offset ^ (offset - 1)) >>> level) !== 0;
}

/** With a full tail, whether the trie has no room left for one more leaf at its height. */
export function trieIsFull(size: number, shift: number): boolean {
  return size >>> BITS > 1 << shift;
}

/** Whether removing the last tail element leaves a trie that fits one level lower. */
export function trieShrinks(size: number, shift: number): boolean {
  return size - (BRANCH_FACTOR + 1) === 1 << shift;
}
