/**
 * Internal modules barrel export
 */

// Constants
export { BITS, BRANCH_FACTOR, MASK, REDUCED } from './constants';

// Index codec
export { tailOffset, tailSize, selector, startsBlock, trieIsFull, trieShrinks } from './codec';

// Trie engine
export {
  assocLeaf,
  pushLeaf,
  popLeaf,
  lowerTrie,
  newPath,
  leafFor,
  leftmostLeaf,
  editableBranch,
  editableLeaf,
  editableChild,
  expectBranch,
  expectLeaf,
} from './trie';

// Vec
export { emptyVec, vecGet, vecAssoc, vecPush, vecPop, vecFromArray, vecToArray } from './vec';

// Iteration
export { vecIter, vecEntries } from './iter';

// Errors
export {
  IndexOutOfRangeError,
  EmptyVectorError,
  TrieInvariantError,
  checkIndex,
  checkNotEmpty,
  type VectorErrorCode,
} from './errors';

// Types
export type { Owner, Node, Leaf, Branch, Vec } from './types';
