/**
 * Core constants for the persistent vector
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Marker for early termination of reduce()
export const REDUCED = Symbol('REDUCED');
