import test from 'node:test';
import assert from 'node:assert/strict';
import { combinations, slugify } from './utils.js';

test('combinations lists k-subsets in index order', () => {
  assert.deepEqual(combinations([1, 2, 3, 4], 2), [
    [1, 2],
    [1, 3],
    [1, 4],
    [2, 3],
    [2, 4],
    [3, 4],
  ]);
  assert.equal(combinations([1, 2, 3, 4, 5], 3).length, 10);
  assert.equal(combinations([1, 2, 3, 4, 5, 6, 7], 5).length, 21);
  assert.deepEqual(combinations([1, 2], 3), []);
  assert.deepEqual(combinations([1, 2], 0), []);
});

test('slugify keeps lowercase words joined by dashes', () => {
  assert.equal(slugify('  Lab One/Mini  '), 'lab-one-mini');
  assert.equal(slugify('***'), 'player');
});
