/**
 * Ordered iteration over a Vec.
 *
 * Keeps the current leaf plus the chain of branches above it. Crossing a
 * leaf boundary only re-resolves the levels whose slot actually changed, so
 * most boundaries cost a single array read.
 */

import { BITS, BRANCH_FACTOR } from './constants';
import { tailOffset, selector, startsBlock } from './codec';
import { expectBranch, expectLeaf } from './trie';
import type { Branch, Vec } from './types';

export function* vecIter<T>(vec: Vec<T>): Generator<T, void, undefined> {
  const { size, shift, root, tail } = vec;
  const treeCount = tailOffset(size);

  if (root !== undefined && treeCount > 0) {
    if (root.kind === 'leaf') {
      yield* root.arr;
    } else {
      // stack[k] is the branch at level (k + 1) * BITS on the current path
      const depth = shift / BITS;
      const stack: Branch<T>[] = new Array<Branch<T>>(depth);
      stack[depth - 1] = root;
      for (let k = depth - 2; k >= 0; k--) {
        stack[k] = expectBranch(stack[k + 1].arr[0]);
      }

      for (let offset = 0; offset < treeCount; offset += BRANCH_FACTOR) {
        if (offset > 0) {
          let stale = 0;
          while (stale < depth - 1 && startsBlock(offset, (stale + 2) * BITS)) stale++;
          for (let k = stale - 1; k >= 0; k--) {
            stack[k] = expectBranch(stack[k + 1].arr[selector(offset, (k + 2) * BITS)]);
          }
        }
        yield* expectLeaf(stack[0].arr[selector(offset, BITS)]).arr;
      }
    }
  }

  yield* tail;
}

/** `[index, value]` pairs with 1-based indices. */
export function* vecEntries<T>(vec: Vec<T>): Generator<[number, T], void, undefined> {
  let index = 0;
  for (const value of vecIter(vec)) {
    yield [++index, value];
  }
}
