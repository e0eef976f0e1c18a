/**
 * Trie engine - copy-on-write path walks over the 32-way bit-trie.
 *
 * Every function takes an `owner`. Nodes tagged with that owner belong to
 * the running transient and are edited in place; anything else is copied
 * before it is touched. An undefined owner never matches, so persistent
 * callers always copy.
 */

import { BITS } from './constants';
import { selector, startsBlock } from './codec';
import { TrieInvariantError } from './errors';
import type { Owner, Node, Leaf, Branch } from './types';

export function expectBranch<T>(node: Node<T>): Branch<T> {
  if (node.kind !== 'branch') {
    throw new TrieInvariantError('Expected branch node, found leaf');
  }
  return node;
}

export function expectLeaf<T>(node: Node<T>): Leaf<T> {
  if (node.kind !== 'leaf') {
    throw new TrieInvariantError('Expected leaf node, found branch');
  }
  return node;
}

export function editableBranch<T>(node: Branch<T>, owner: Owner): Branch<T> {
  if (owner && node.owner === owner) return node;
  return { kind: 'branch', owner, arr: node.arr.slice() };
}

export function editableLeaf<T>(node: Leaf<T>, owner: Owner): Leaf<T> {
  if (owner && node.owner === owner) return node;
  return { kind: 'leaf', owner, arr: node.arr.slice() };
}

/**
 * Make the branch at `parent.arr[slot]` editable and link it back into
 * `parent`, which must already be editable.
 */
export function editableChild<T>(parent: Branch<T>, slot: number, owner: Owner): Branch<T> {
  const child = editableBranch(expectBranch(parent.arr[slot]), owner);
  parent.arr[slot] = child;
  return child;
}

/** Wrap `leaf` in single-child branches until it sits `level` bits below the top. */
export function newPath<T>(level: number, leaf: Leaf<T>, owner: Owner): Node<T> {
  let node: Node<T> = leaf;
  for (let l = level; l > 0; l -= BITS) {
    node = { kind: 'branch', owner, arr: [node] };
  }
  return node;
}

export function leftmostLeaf<T>(node: Node<T>): Leaf<T> {
  let cursor = node;
  while (cursor.kind === 'branch') {
    cursor = cursor.arr[0];
  }
  return cursor;
}

/** Walk down to the leaf holding `offset` without copying anything. */
export function leafFor<T>(root: Node<T>, shift: number, offset: number): Leaf<T> {
  let node = root;
  for (let level = shift; level > 0; level -= BITS) {
    node = expectBranch(node).arr[selector(offset, level)];
  }
  return expectLeaf(node);
}

/** Path-copying update of the trie element at `offset`. */
export function assocLeaf<T>(
  root: Node<T>,
  shift: number,
  offset: number,
  value: T,
  owner: Owner
): Node<T> {
  if (root.kind === 'leaf') {
    const leaf = editableLeaf(root, owner);
    leaf.arr[selector(offset, 0)] = value;
    return leaf;
  }

  const newRoot = editableBranch(root, owner);
  let node = newRoot;
  for (let level = shift; level > BITS; level -= BITS) {
    node = editableChild(node, selector(offset, level), owner);
  }

  const slot = selector(offset, BITS);
  const leaf = editableLeaf(expectLeaf(node.arr[slot]), owner);
  node.arr[slot] = leaf;
  leaf.arr[selector(offset, 0)] = value;
  return newRoot;
}

/**
 * Insert a full `leaf` whose first element has index `offset`. The trie must
 * have room for it at its current height. Missing intermediate branches are
 * created on the way down; existing ones are copied.
 */
export function pushLeaf<T>(
  root: Branch<T>,
  shift: number,
  offset: number,
  leaf: Leaf<T>,
  owner: Owner
): Branch<T> {
  const newRoot = editableBranch(root, owner);
  let node = newRoot;
  for (let level = shift; level > BITS; level -= BITS) {
    const slot = selector(offset, level);
    if (slot === node.arr.length) {
      node.arr.push(newPath(level - BITS, leaf, owner));
      return newRoot;
    }
    node = editableChild(node, slot, owner);
  }
  node.arr.push(leaf);
  return newRoot;
}

/**
 * Detach the rightmost leaf, whose first element has index `offset`.
 *
 * Nodes are copied down to the highest level at which `offset` starts a
 * block: the subtree hanging there holds nothing but the leaf, so its slot
 * is dropped and the rest of the path is left alone.
 */
export function popLeaf<T>(
  root: Branch<T>,
  shift: number,
  offset: number,
  owner: Owner
): { root: Branch<T>; leaf: Leaf<T> } {
  const newRoot = editableBranch(root, owner);
  let node = newRoot;
  let level = shift;
  while (!startsBlock(offset, level)) {
    node = editableChild(node, selector(offset, level), owner);
    level -= BITS;
  }

  const detached = node.arr[selector(offset, level)];
  node.arr.pop();
  return { root: newRoot, leaf: leftmostLeaf(detached) };
}

/**
 * Height shrink: the root holds exactly one full subtree plus one leaf.
 * The subtree becomes the root and the leaf becomes the tail.
 */
export function lowerTrie<T>(root: Branch<T>): { root: Node<T>; leaf: Leaf<T> } {
  return { root: root.arr[0], leaf: leftmostLeaf(root.arr[1]) };
}
