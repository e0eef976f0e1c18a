/**
 * Tests for Vec record operations and trie shape
 */

import { describe, it, expect } from 'vitest';
import { emptyVec, vecGet, vecAssoc, vecPush, vecPop, vecFromArray, vecToArray } from './vec';
import { expectBranch, expectLeaf } from './trie';
import type { Owner, Node, Branch, Vec } from './types';

function build(n: number, owner?: Owner): Vec<number> {
  let vec = emptyVec<number>();
  for (let i = 1; i <= n; i++) {
    vec = vecPush(vec, owner, i);
  }
  return vec;
}

function rootNode<T>(vec: Vec<T>): Node<T> {
  if (vec.root === undefined) throw new Error('vector has no trie');
  return vec.root;
}

function rootBranch<T>(vec: Vec<T>): Branch<T> {
  return expectBranch(rootNode(vec));
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

describe('Vec trie shape', () => {
  it('should keep up to 32 elements in the tail without a root', () => {
    const vec = build(32);
    expect(vec.root).toBeUndefined();
    expect(vec.shift).toBe(0);
    expect(vec.tail).toEqual(range(1, 32));
  });

  it('should turn the full tail into the root leaf on the 33rd push', () => {
    const vec = build(33);
    expect(vec.shift).toBe(0);
    expect(vec.root?.kind).toBe('leaf');
    expect(vec.tail).toEqual([33]);
  });

  it('should grow a level once the single root leaf is full', () => {
    const vec = build(65);
    expect(vec.shift).toBe(5);
    expect(rootBranch(vec).arr).toHaveLength(2);
    expect(vec.tail).toEqual([65]);
  });

  it('should grow to three levels at 1057 elements', () => {
    const before = build(1056);
    expect(before.shift).toBe(5);

    const vec = vecPush(before, undefined, 1057);
    expect(vec.shift).toBe(10);
    const root = rootBranch(vec);
    expect(root.arr).toHaveLength(2);
    expect(expectBranch(root.arr[1]).arr).toHaveLength(1);
    expect(vecGet(vec, 1055)).toBe(1056);
    expect(vecGet(vec, 1056)).toBe(1057);
  });
});

describe('Vec structural sharing', () => {
  it('should copy only the path to an updated trie element', () => {
    const vec = build(1100);
    const next = vecAssoc(vec, undefined, 0, -1);

    const oldRoot = rootBranch(vec);
    const newRoot = rootBranch(next);
    expect(newRoot).not.toBe(oldRoot);
    expect(newRoot.arr[1]).toBe(oldRoot.arr[1]);

    const oldMid = expectBranch(oldRoot.arr[0]);
    const newMid = expectBranch(newRoot.arr[0]);
    expect(newMid).not.toBe(oldMid);
    expect(newMid.arr[1]).toBe(oldMid.arr[1]);
    expect(expectLeaf(newMid.arr[0]).arr[0]).toBe(-1);
    expect(expectLeaf(oldMid.arr[0]).arr[0]).toBe(1);

    expect(next.tail).toBe(vec.tail);
  });

  it('should copy only the tail for updates inside it', () => {
    const vec = build(40);
    const next = vecAssoc(vec, undefined, 35, 0);
    expect(next.root).toBe(vec.root);
    expect(next.tail).not.toBe(vec.tail);
    expect(vec.tail[3]).toBe(36);
    expect(next.tail[3]).toBe(0);
  });

  it('should share the root when pushing into a tail with room', () => {
    const vec = build(40);
    const next = vecPush(vec, undefined, 41);
    expect(next.root).toBe(vec.root);
    expect(vec.tail).toHaveLength(8);
    expect(next.tail).toHaveLength(9);
  });

  it('should promote the rightmost leaf to the tail on pop', () => {
    const vec = build(97);
    const next = vecPop(vec, undefined);
    const oldRoot = rootBranch(vec);
    const newRoot = rootBranch(next);

    expect(next.size).toBe(96);
    expect(next.shift).toBe(5);
    expect(newRoot.arr).toHaveLength(2);
    expect(oldRoot.arr).toHaveLength(3);
    expect(next.tail).toBe(expectLeaf(oldRoot.arr[2]).arr);
    expect(next.tail).toEqual(range(65, 96));
  });

  it('should drop the whole subtree at the diverging ancestor', () => {
    const vec = build(2081);
    expect(rootBranch(vec).arr).toHaveLength(3);

    const next = vecPop(vec, undefined);
    const root = rootBranch(next);
    expect(next.shift).toBe(10);
    expect(root.arr).toHaveLength(2);
    expect(next.tail).toEqual(range(2049, 2080));
  });

  it('should copy down to the leaf parent when the diverging level is low', () => {
    const vec = build(1089);
    const next = vecPop(vec, undefined);
    const oldRoot = rootBranch(vec);
    const newRoot = rootBranch(next);

    expect(newRoot.arr[0]).toBe(oldRoot.arr[0]);
    expect(expectBranch(oldRoot.arr[1]).arr).toHaveLength(2);
    expect(expectBranch(newRoot.arr[1]).arr).toHaveLength(1);
    expect(next.tail).toEqual(range(1057, 1088));
  });

  it('should lower the trie when only one full subtree remains', () => {
    const vec = build(65);
    const next = vecPop(vec, undefined);
    expect(next.shift).toBe(0);
    expect(expectLeaf(rootNode(next)).arr).toEqual(range(1, 32));
    expect(next.tail).toEqual(range(33, 64));
  });

  it('should drop the root entirely when popping from 33 elements', () => {
    const next = vecPop(build(33), undefined);
    expect(next.root).toBeUndefined();
    expect(next.tail).toEqual(range(1, 32));
  });
});

describe('Vec with owner', () => {
  it('should edit an owned tail in place', () => {
    const owner: Owner = {};
    const a = vecPush(emptyVec<number>(), owner, 1);
    const b = vecPush(a, owner, 2);
    expect(b.tail).toBe(a.tail);
    expect(b.tailOwner).toBe(owner);
  });

  it('should copy a tail that belongs to nobody', () => {
    const a = vecPush(emptyVec<number>(), undefined, 1);
    const b = vecPush(a, {}, 2);
    expect(b.tail).not.toBe(a.tail);
    expect(a.tail).toEqual([1]);
  });

  it('should edit owned trie nodes in place and copy foreign ones', () => {
    const owner: Owner = {};
    const owned = build(100, owner);
    const root = owned.root;
    const edited = vecAssoc(owned, owner, 0, -1);
    expect(edited.root).toBe(root);

    const foreign = vecAssoc(edited, {}, 1, -2);
    expect(foreign.root).not.toBe(root);
    expect(vecGet(edited, 1)).toBe(2);
    expect(vecGet(foreign, 1)).toBe(-2);
  });

  it('should build the same contents as persistent pushes', () => {
    const items = range(1, 1100);
    expect(vecToArray(vecFromArray(items))).toEqual(items);
    expect(vecToArray(build(1100))).toEqual(items);
  });

  it('should release tail ownership after a bulk build', () => {
    expect(vecFromArray([1, 2, 3]).tailOwner).toBeUndefined();
  });
});
