/**
 * Vec - bit-trie persistent vector with tail buffer
 *
 * All operations take an `owner`: undefined for persistent updates (every
 * touched node is copied), or a transient owner whose nodes and tail are
 * mutated in place. Offsets are 0-based; bounds are the caller's concern.
 */

import { BITS, BRANCH_FACTOR } from './constants';
import { tailOffset, tailSize, selector, trieIsFull, trieShrinks } from './codec';
import {
  assocLeaf,
  expectBranch,
  expectLeaf,
  leafFor,
  lowerTrie,
  newPath,
  popLeaf,
  pushLeaf,
} from './trie';
import { vecIter } from './iter';
import type { Owner, Leaf, Vec } from './types';

export function emptyVec<T>(): Vec<T> {
  return { size: 0, shift: 0, root: undefined, tail: [] };
}

function ensureEditableTail<T>(vec: Vec<T>, owner: Owner): T[] {
  if (owner && vec.tailOwner === owner) return vec.tail;
  return vec.tail.slice();
}

// A leaf promoted to tail stays editable only for the owner that built it
function tailOwnerOf<T>(leaf: Leaf<T>, owner: Owner): Owner {
  return owner && leaf.owner === owner ? owner : undefined;
}

export function vecGet<T>(vec: Vec<T>, offset: number): T {
  const { size, shift, root, tail } = vec;
  const treeCount = tailOffset(size);
  if (offset >= treeCount || root === undefined) {
    return tail[offset - treeCount];
  }
  return leafFor(root, shift, offset).arr[selector(offset, 0)];
}

export function vecAssoc<T>(vec: Vec<T>, owner: Owner, offset: number, value: T): Vec<T> {
  const { size, shift, root } = vec;
  const treeCount = tailOffset(size);

  if (offset >= treeCount || root === undefined) {
    const tail = ensureEditableTail(vec, owner);
    tail[offset - treeCount] = value;
    return { size, shift, root, tail, tailOwner: owner };
  }

  return {
    size,
    shift,
    root: assocLeaf(root, shift, offset, value, owner),
    tail: vec.tail,
    tailOwner: vec.tailOwner,
  };
}

export function vecPush<T>(vec: Vec<T>, owner: Owner, value: T): Vec<T> {
  const { size, shift, root } = vec;

  if (tailSize(size) < BRANCH_FACTOR) {
    const tail = ensureEditableTail(vec, owner);
    tail.push(value);
    return { size: size + 1, shift, root, tail, tailOwner: owner };
  }

  // Tail is full: it moves into the trie as a leaf and a new tail starts
  const leaf: Leaf<T> = {
    kind: 'leaf',
    owner: owner && vec.tailOwner === owner ? owner : undefined,
    arr: vec.tail,
  };
  const next = { size: size + 1, tail: [value], tailOwner: owner };

  if (root === undefined) {
    return { ...next, shift: 0, root: leaf };
  }

  if (trieIsFull(size, shift)) {
    return {
      ...next,
      shift: shift + BITS,
      root: { kind: 'branch', owner, arr: [root, newPath(shift, leaf, owner)] },
    };
  }

  return {
    ...next,
    shift,
    root: pushLeaf(expectBranch(root), shift, size - BRANCH_FACTOR, leaf, owner),
  };
}

export function vecPop<T>(vec: Vec<T>, owner: Owner): Vec<T> {
  const { size, shift, root } = vec;

  if (tailSize(size) > 1) {
    const tail = ensureEditableTail(vec, owner);
    tail.pop();
    return { size: size - 1, shift, root, tail, tailOwner: owner };
  }

  if (root === undefined) {
    return emptyVec();
  }

  // The last tail element goes; the rightmost trie leaf becomes the tail
  if (size === BRANCH_FACTOR + 1) {
    const leaf = expectLeaf(root);
    return { size: size - 1, shift: 0, root: undefined, tail: leaf.arr, tailOwner: tailOwnerOf(leaf, owner) };
  }

  if (trieShrinks(size, shift)) {
    const lowered = lowerTrie(expectBranch(root));
    return {
      size: size - 1,
      shift: shift - BITS,
      root: lowered.root,
      tail: lowered.leaf.arr,
      tailOwner: tailOwnerOf(lowered.leaf, owner),
    };
  }

  const popped = popLeaf(expectBranch(root), shift, size - 1 - BRANCH_FACTOR, owner);
  return {
    size: size - 1,
    shift,
    root: popped.root,
    tail: popped.leaf.arr,
    tailOwner: tailOwnerOf(popped.leaf, owner),
  };
}

export function vecFromArray<T>(items: Iterable<T>): Vec<T> {
  const owner: Owner = {};
  let vec = emptyVec<T>();
  for (const item of items) {
    vec = vecPush(vec, owner, item);
  }
  return { ...vec, tailOwner: undefined };
}

export function vecToArray<T>(vec: Vec<T>): T[] {
  const out: T[] = new Array<T>(vec.size);
  let i = 0;
  for (const v of vecIter(vec)) {
    out[i++] = v;
  }
  return out;
}
