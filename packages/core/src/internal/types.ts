/**
 * Core type definitions
 */

// Transient owner for structural sharing
export type Owner = object | undefined;

// Bottom-level trie node: always holds exactly BRANCH_FACTOR elements
export interface Leaf<T> {
  kind: 'leaf';
  owner?: Owner;
  arr: T[];
}

// Inner trie node: 1..BRANCH_FACTOR children, filled left to right
export interface Branch<T> {
  kind: 'branch';
  owner?: Owner;
  arr: Node<T>[];
}

export type Node<T> = Leaf<T> | Branch<T>;

// Bit-trie persistent vector
export interface Vec<T> {
  size: number;
  shift: number;
  root?: Node<T>;
  tail: T[];
  tailOwner?: Owner;
}
