/**
 * Error handling - out-of-range indices and popping an empty vector
 */

import { pvec, IndexOutOfRangeError, EmptyVectorError } from '../packages/core/src/index';

console.log('=== Error Handling ===\n');

const vec = pvec(['a', 'b', 'c']);

try {
  vec.get(0);
} catch (err) {
  if (err instanceof IndexOutOfRangeError) {
    console.log(`${err.name} [${err.code}]: ${err.message}`);
  } else {
    throw err;
  }
}

try {
  pvec<string>().pop();
} catch (err) {
  if (err instanceof EmptyVectorError) {
    console.log(`${err.name} [${err.code}]: ${err.message}`);
  } else {
    throw err;
  }
}

const draft = vec.asTransient();
try {
  draft.set(10, 'z');
} catch (err) {
  if (!(err instanceof RangeError)) throw err;
  console.log('Transient untouched after failed set:', draft.length, draft.get(3));
}
