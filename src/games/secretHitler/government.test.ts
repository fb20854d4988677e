import test from 'node:test';
import assert from 'node:assert/strict';
import { SeededRandom } from '../../engine/rng.js';
import {
  countElection,
  describePowerTrack,
  eligibleChancellors,
  nextPresidentSeat,
  powerFor,
  termLimited,
} from './government.js';
import {
  FASCIST_POLICY_COUNT,
  LIBERAL_POLICY_COUNT,
  createPolicyDeck,
  discardPolicies,
  drawPolicies,
  formatPolicies,
  peekPolicies,
} from './policyDeck.js';

test('the power track depends on the table size', () => {
  assert.equal(powerFor(5, 1), null);
  assert.equal(powerFor(5, 3), 'peek');
  assert.equal(powerFor(6, 4), 'execute');
  assert.equal(powerFor(7, 2), 'investigate');
  assert.equal(powerFor(8, 3), 'special_election');
  assert.equal(powerFor(9, 1), 'investigate');
  assert.equal(powerFor(10, 5), 'execute');
  assert.equal(powerFor(5, 6), null);
  assert.equal(describePowerTrack(5), '1: -, 2: -, 3: peek, 4: execute, 5: execute');
});

test('term limits cover the last chancellor, and the last president above five players', () => {
  const five = ['p1', 'p2', 'p3', 'p4', 'p5'];
  assert.deepEqual(termLimited({ alive: five, previousPresident: 'p1', previousChancellor: 'p2' }), ['p2']);
  assert.deepEqual(
    termLimited({ alive: [...five, 'p6'], previousPresident: 'p1', previousChancellor: 'p2' }),
    ['p2', 'p1']
  );
  assert.deepEqual(termLimited({ alive: ['p1', 'p3', 'p4', 'p5', 'p6', 'p7'], previousPresident: 'p1', previousChancellor: 'p2' }), ['p1']);
  assert.deepEqual(
    eligibleChancellors({
      alive: [...five, 'p6'],
      president: 'p3',
      previousPresident: 'p1',
      previousChancellor: 'p2',
    }),
    ['p4', 'p5', 'p6']
  );
});

test('the presidency rotates past dead seats', () => {
  const seats = ['a', 'b', 'c', 'd'];
  assert.equal(nextPresidentSeat(seats, ['a', 'c', 'd'], 0), 2);
  assert.equal(nextPresidentSeat(seats, ['a', 'c', 'd'], 3), 0);
  assert.throws(() => nextPresidentSeat(seats, [], 0), /No living player can be president/);
});

test('an election needs a strict majority of ja', () => {
  assert.deepEqual(countElection({ a: 'ja', b: 'ja', c: 'nein' }), { ja: 2, nein: 1, passed: true });
  assert.deepEqual(countElection({ a: 'ja', b: 'nein' }), { ja: 1, nein: 1, passed: false });
  assert.deepEqual(countElection({}), { ja: 0, nein: 0, passed: false });
});

test('the policy deck draws, peeks and reshuffles its discards', () => {
  const rng = new SeededRandom(1);
  const deck = createPolicyDeck(rng);
  assert.equal(deck.drawPile.length, 17);
  assert.equal(deck.drawPile.filter(p => p === 'liberal').length, LIBERAL_POLICY_COUNT);
  assert.equal(deck.drawPile.filter(p => p === 'fascist').length, FASCIST_POLICY_COUNT);

  const top = deck.drawPile.slice(0, 3);
  assert.deepEqual(peekPolicies(deck, 3, rng), top);
  assert.equal(deck.drawPile.length, 17);
  assert.deepEqual(drawPolicies(deck, 3, rng), top);
  assert.equal(deck.drawPile.length, 14);

  const small = { drawPile: deck.drawPile.slice(0, 2), discardPile: deck.drawPile.slice(2, 7) };
  drawPolicies(small, 3, rng);
  assert.equal(small.drawPile.length, 4);
  assert.equal(small.discardPile.length, 0);

  discardPolicies(small, ['liberal']);
  assert.deepEqual(small.discardPile, ['liberal']);
  assert.throws(() => drawPolicies({ drawPile: ['liberal'], discardPile: [] }, 3, rng), /Policy deck has 1 cards, cannot draw 3/);
  assert.equal(formatPolicies(['liberal', 'fascist']), '[0] Liberal, [1] Fascist');
});
