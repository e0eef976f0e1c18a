/**
 * Simple usage - persistent updates, transients and produce()
 */

import { pvec, produce } from '../packages/core/src/index';

console.log('=== Persistent Vector ===\n');

// ===== Create =====
console.log('1️⃣ Create a vector with pvec()');
const v1 = pvec([1, 2, 3]);
console.log('v1:', v1.toArray(), 'length:', v1.length);

// ===== Persistent updates =====
console.log('\n2️⃣ Every update returns a new version');
const v2 = v1.push(4);
const v3 = v2.set(1, 100);
const v4 = v3.pop();
console.log('v1:', v1.toArray());
console.log('v2:', v2.toArray());
console.log('v3:', v3.toArray());
console.log('v4:', v4.toArray());
console.log('✅ Earlier versions unchanged');

// ===== Indexing =====
console.log('\n3️⃣ Indices are 1-based');
console.log('v2.get(1):', v2.get(1), ' v2.get(v2.length):', v2.get(v2.length));

// ===== Transient bulk build =====
console.log('\n4️⃣ Transient for bulk construction');
const draft = v1.asTransient();
for (let i = 4; i <= 2000; i++) {
  draft.push(i);
}
const big = draft.persistent();
console.log('big.length:', big.length, ' big.get(2000):', big.get(2000));
console.log('v1 still:', v1.toArray());

// ===== produce =====
console.log('\n5️⃣ produce() batches edits through a draft');
const v5 = produce(v1, d => {
  d.push(4).push(5);
  d.set(1, 0);
});
console.log('v5:', v5.toArray());
console.log('produce without edits returns base:', produce(v1, () => {}) === v1);

// ===== Derived operations =====
console.log('\n6️⃣ map / filter / reduce');
console.log('doubled:', big.map(v => v * 2).get(2000));
console.log('evens:', big.filter(v => v % 2 === 0).length);
console.log('sum:', big.reduce((acc, v) => acc + v, 0));
