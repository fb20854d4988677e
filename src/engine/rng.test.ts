import test from 'node:test';
import assert from 'node:assert/strict';
import { SeededRandom } from './rng.js';

test('SeededRandom: same seed yields the same sequence', () => {
  const a = new SeededRandom(7);
  const b = new SeededRandom(7);
  const seqA = Array.from({ length: 10 }, () => a.next());
  const seqB = Array.from({ length: 10 }, () => b.next());
  assert.deepEqual(seqA, seqB);
  assert.ok(seqA.every(x => x >= 0 && x < 1));
});

test('SeededRandom: different seeds diverge', () => {
  const a = new SeededRandom(1);
  const b = new SeededRandom(2);
  assert.notEqual(a.next(), b.next());
});

test('SeededRandom: int stays in range', () => {
  const rng = new SeededRandom(3);
  for (let i = 0; i < 200; i++) {
    const n = rng.int(5);
    assert.ok(Number.isInteger(n) && n >= 0 && n < 5);
  }
});

test('SeededRandom: shuffle is a permutation and reproducible', () => {
  const items = [1, 2, 3, 4, 5, 6, 7, 8];
  const once = new SeededRandom(11).shuffle([...items]);
  const again = new SeededRandom(11).shuffle([...items]);
  assert.deepEqual(once, again);
  assert.deepEqual([...once].sort((x, y) => x - y), items);
});

test('SeededRandom: pick from an empty list throws', () => {
  assert.throws(() => new SeededRandom(1).pick([]), /empty/);
});
