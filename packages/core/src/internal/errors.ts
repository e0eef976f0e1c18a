/**
 * Error types raised by vector operations
 */

export type VectorErrorCode = 'OUT_OF_RANGE' | 'EMPTY_VECTOR';

export class IndexOutOfRangeError extends RangeError {
  readonly code: VectorErrorCode = 'OUT_OF_RANGE';

  constructor(readonly index: number, readonly size: number) {
    super(
      size === 0
        ? `Index ${index} out of range for empty vector`
        : `Index ${index} out of range [1, ${size}]`
    );
    this.name = 'IndexOutOfRangeError';
  }
}

export class EmptyVectorError extends RangeError {
  readonly code: VectorErrorCode = 'EMPTY_VECTOR';

  constructor() {
    super('Cannot pop from an empty vector');
    this.name = 'EmptyVectorError';
  }
}

// Raised only if the trie shape contradicts its own size/shift
export class TrieInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrieInvariantError';
  }
}

export function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 1 || index > size) {
    throw new IndexOutOfRangeError(index, size);
  }
}

export function checkNotEmpty(size: number): void {
  if (size === 0) throw new EmptyVectorError();
}
