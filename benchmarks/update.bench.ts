/**
 * Benchmark: persistent vector vs native copy vs Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { pvec, produce } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const vec = pvec(nativeArr);

describe('Single update at index 500', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[499] = 999;
  });

  bench('PersistentVector.set()', () => {
    vec.set(500, 999);
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      draft[499] = 999;
    });
  });
});

// ===== Push operations =====
describe('Push 10 items', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) {
      copy.push(i);
    }
  });

  bench('PersistentVector.push()', () => {
    let next = vec;
    for (let i = 0; i < 10; i++) {
      next = next.push(i);
    }
  });

  bench('Transient produce()', () => {
    produce(vec, draft => {
      for (let i = 0; i < 10; i++) {
        draft.push(i);
      }
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      for (let i = 0; i < 10; i++) {
        draft.push(i);
      }
    });
  });
});

// ===== Pop operations =====
describe('Pop 10 items', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) {
      copy.pop();
    }
  });

  bench('PersistentVector.pop()', () => {
    let next = vec;
    for (let i = 0; i < 10; i++) {
      next = next.pop();
    }
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      for (let i = 0; i < 10; i++) {
        draft.pop();
      }
    });
  });
});

// ===== Multiple updates =====
describe('Update 100 random indices', () => {
  const indices = Array.from({ length: 100 }, () => Math.floor(Math.random() * SIZE));

  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (const idx of indices) {
      copy[idx] = 999;
    }
  });

  bench('Transient produce()', () => {
    produce(vec, draft => {
      for (const idx of indices) {
        draft.set(idx + 1, 999);
      }
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      for (const idx of indices) {
        draft[idx] = 999;
      }
    });
  });
});
