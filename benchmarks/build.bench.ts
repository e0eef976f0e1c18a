/**
 * Benchmark: bulk construction and iteration
 */

import { bench, describe } from 'vitest';
import { PersistentVector, pvec } from '../packages/core/src/index';

// ===== Setup =====
const LARGE = 10000;

function createArray(size: number): number[] {
  return Array.from({ length: size }, (_, i) => i);
}

// ===== Construction =====
describe('Large array (10000 items) - Build', () => {
  const native = createArray(LARGE);

  bench('Persistent push', () => {
    let vec = PersistentVector.empty<number>();
    for (const v of native) vec = vec.push(v);
  });

  bench('Transient push (pvec)', () => {
    pvec(native);
  });
});

// ===== Iteration =====
describe('Large array (10000 items) - Sum', () => {
  const native = createArray(LARGE);
  const vec = pvec(native);

  bench('Native for-of', () => {
    let sum = 0;
    for (const v of native) sum += v;
  });

  bench('Vector for-of', () => {
    let sum = 0;
    for (const v of vec) sum += v;
  });

  bench('Vector get(i)', () => {
    let sum = 0;
    for (let i = 1; i <= vec.length; i++) sum += vec.get(i);
  });

  bench('Vector reduce()', () => {
    vec.reduce((acc, v) => acc + v, 0);
  });
});

describe('Large array (10000 items) - toArray', () => {
  const native = createArray(LARGE);
  const vec = pvec(native);

  bench('Native slice', () => {
    native.slice();
  });

  bench('Vector toArray()', () => {
    vec.toArray();
  });
});
