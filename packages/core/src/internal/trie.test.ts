/**
 * Tests for trie engine helpers
 */

import { describe, it, expect } from 'vitest';
import { newPath, leftmostLeaf, expectBranch, expectLeaf, editableBranch, editableLeaf } from './trie';
import { TrieInvariantError } from './errors';
import type { Leaf, Owner } from './types';

const leaf: Leaf<number> = { kind: 'leaf', arr: Array.from({ length: 32 }, (_, i) => i) };

describe('trie helpers', () => {
  it('should wrap a leaf in one branch per level', () => {
    expect(newPath(0, leaf, undefined)).toBe(leaf);

    const path = expectBranch(newPath(10, leaf, undefined));
    expect(path.arr).toHaveLength(1);
    expect(expectBranch(path.arr[0]).arr[0]).toBe(leaf);
    expect(leftmostLeaf(path)).toBe(leaf);
  });

  it('should reject nodes of the wrong kind', () => {
    expect(() => expectBranch(leaf)).toThrow(TrieInvariantError);
    expect(() => expectLeaf(newPath(5, leaf, undefined))).toThrow('Expected leaf node, found branch');
  });

  it('should reuse only nodes tagged with the same owner', () => {
    const owner: Owner = {};
    const owned: Leaf<number> = { kind: 'leaf', owner, arr: [1] };
    expect(editableLeaf(owned, owner)).toBe(owned);
    expect(editableLeaf(owned, {})).not.toBe(owned);
    expect(editableLeaf(owned, undefined)).not.toBe(owned);

    const branch = expectBranch(newPath(5, owned, owner));
    expect(editableBranch(branch, owner)).toBe(branch);
    const copy = editableBranch(branch, undefined);
    expect(copy).not.toBe(branch);
    expect(copy.arr[0]).toBe(owned);
  });
});
