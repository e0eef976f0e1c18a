/**
 * Persistent vector – bit-trie with tail buffer and transients
 *
 * - pvec([...])       → PersistentVector (every update returns a new version)
 * - vec.asTransient() → TransientVector (in-place bulk edits, then persistent())
 * - produce(vec, fn)  → run a batch of edits against a transient draft
 *
 * Indices are 1-based: get(1) is the first element, get(vec.length) the last.
 */

// Internal modules
import {
  REDUCED,
  type Owner,
  type Vec,
  emptyVec,
  vecGet,
  vecAssoc,
  vecPush,
  vecPop,
  vecFromArray,
  vecToArray,
  vecIter,
  vecEntries,
  checkIndex,
  checkNotEmpty,
} from './internal';

export {
  IndexOutOfRangeError,
  EmptyVectorError,
  TrieInvariantError,
  type VectorErrorCode,
} from './internal';

// =====================================================
// Early exit for reduce()
// =====================================================

export interface Reduced<A> {
  readonly [REDUCED]: true;
  readonly value: A;
}

/** Wrap an accumulator to stop `reduce` after the current element. */
export function reduced<A>(value: A): Reduced<A> {
  return { [REDUCED]: true, value };
}

export function isReduced<A>(x: A | Reduced<A>): x is Reduced<A> {
  return typeof x === 'object' && x !== null && REDUCED in x;
}

// =====================================================
// Persistent Vector
// =====================================================

// Both constructors are private; each class hands the other a wrapper here
let persistentOf: <T>(vec: Vec<T>) => PersistentVector<T>;
let transientOf: <T>(vec: Vec<T>) => TransientVector<T>;

export class PersistentVector<T> implements Iterable<T> {
  private static readonly EMPTY = new PersistentVector<never>(emptyVec());

  static {
    persistentOf = vec => PersistentVector.wrap(vec);
  }

  private constructor(private readonly vec: Vec<T>) {}

  // Every size-0 result collapses to the shared empty instance
  private static wrap<T>(vec: Vec<T>): PersistentVector<T> {
    return vec.size === 0 ? PersistentVector.empty() : new PersistentVector(vec);
  }

  static empty<T>(): PersistentVector<T> {
    return PersistentVector.EMPTY;
  }

  static from<T>(items: Iterable<T>): PersistentVector<T> {
    return PersistentVector.wrap(vecFromArray(items));
  }

  static of<T>(...items: T[]): PersistentVector<T> {
    return PersistentVector.from(items);
  }

  get length(): number {
    return this.vec.size;
  }

  get(index: number): T {
    checkIndex(index, this.vec.size);
    return vecGet(this.vec, index - 1);
  }

  last(): T | undefined {
    const { size } = this.vec;
    return size === 0 ? undefined : vecGet(this.vec, size - 1);
  }

  set(index: number, value: T): PersistentVector<T> {
    checkIndex(index, this.vec.size);
    return new PersistentVector(vecAssoc(this.vec, undefined, index - 1, value));
  }

  push(value: T): PersistentVector<T> {
    return new PersistentVector(vecPush(this.vec, undefined, value));
  }

  pop(): PersistentVector<T> {
    checkNotEmpty(this.vec.size);
    return PersistentVector.wrap(vecPop(this.vec, undefined));
  }

  [Symbol.iterator](): Iterator<T> {
    return vecIter(this.vec);
  }

  values(): IterableIterator<T> {
    return vecIter(this.vec);
  }

  entries(): IterableIterator<[number, T]> {
    return vecEntries(this.vec);
  }

  forEach(fn: (value: T, index: number, vector: this) => void): void {
    for (const [i, v] of vecEntries(this.vec)) {
      fn(v, i, this);
    }
  }

  map<U>(fn: (value: T, index: number, vector: this) => U): PersistentVector<U> {
    const out = transientOf(emptyVec<U>());
    for (const [i, v] of vecEntries(this.vec)) {
      out.push(fn(v, i, this));
    }
    return out.persistent();
  }

  filter(pred: (value: T, index: number, vector: this) => boolean): PersistentVector<T> {
    const out = transientOf(emptyVec<T>());
    for (const [i, v] of vecEntries(this.vec)) {
      if (pred(v, i, this)) out.push(v);
    }
    return out.persistent();
  }

  reduce<A>(fn: (acc: A, value: T, index: number, vector: this) => A | Reduced<A>, init: A): A {
    let acc = init;
    for (const [i, v] of vecEntries(this.vec)) {
      const next = fn(acc, v, i, this);
      if (isReduced(next)) return next.value;
      acc = next;
    }
    return acc;
  }

  toArray(): T[] {
    return vecToArray(this.vec);
  }

  toJSON(): T[] {
    return vecToArray(this.vec);
  }

  asTransient(): TransientVector<T> {
    return transientOf(this.vec);
  }
}

// =====================================================
// Transient Vector
// =====================================================

/**
 * Mutable builder over the same trie. Nodes it creates are tagged with its
 * owner and edited in place; nodes shared with persistent vectors are copied
 * on first touch.
 */
export class TransientVector<T> {
  private owner: Owner = {};
  private edited = false;

  static {
    transientOf = vec => new TransientVector(vec);
  }

  private constructor(private vec: Vec<T>) {}

  get length(): number {
    return this.vec.size;
  }

  /** Whether any set/push/pop ran since the last `persistent()`. */
  get modified(): boolean {
    return this.edited;
  }

  get(index: number): T {
    checkIndex(index, this.vec.size);
    return vecGet(this.vec, index - 1);
  }

  set(index: number, value: T): this {
    checkIndex(index, this.vec.size);
    this.vec = vecAssoc(this.vec, this.owner, index - 1, value);
    this.edited = true;
    return this;
  }

  push(value: T): this {
    this.vec = vecPush(this.vec, this.owner, value);
    this.edited = true;
    return this;
  }

  pop(): this {
    checkNotEmpty(this.vec.size);
    this.vec = vecPop(this.vec, this.owner);
    this.edited = true;
    return this;
  }

  /**
   * Freeze the current contents. The transient stays usable, but under a new
   * owner, so later edits copy whatever the returned vector shares.
   */
  persistent(): PersistentVector<T> {
    this.owner = {};
    this.edited = false;
    return persistentOf({ ...this.vec, tailOwner: undefined });
  }
}

// =====================================================
// Functional API
// =====================================================

/** Create a persistent vector from any iterable (empty when omitted). */
export function pvec<T>(items: Iterable<T> = []): PersistentVector<T> {
  return PersistentVector.from(items);
}

/**
 * Apply a batch of edits through a transient draft.
 * Returns `base` itself when the recipe made no edit.
 */
export function produce<T>(
  base: PersistentVector<T>,
  recipe: (draft: TransientVector<T>) => void
): PersistentVector<T> {
  const draft = base.asTransient();
  recipe(draft);
  if (!draft.modified) return base;
  return draft.persistent();
}
