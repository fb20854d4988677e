import test from 'node:test';
import assert from 'node:assert/strict';
import { IllegalActionError } from '../../engine/errors.js';
import {
  applyMove,
  buildPots,
  buildQueue,
  checkMove,
  createBettingState,
  isBettingComplete,
  minRaiseTo,
  potTotal,
  seatsAfter,
  splitPot,
  startStreet,
} from './betting.js';

test('bets, raises and calls close a street', () => {
  const bet = createBettingState(['a', 'b', 'c'], 10);
  const acc = { a: { chips: 100 }, b: { chips: 100 }, c: { chips: 100 } };
  bet.queue = buildQueue(bet, 'c');
  assert.deepEqual(bet.queue, ['a', 'b', 'c']);

  assert.throws(() => checkMove(bet, acc.a, 'a', { kind: 'bet', amount: 5 }, 10), /Minimum bet is 10 \(or all-in for 100\)/);
  assert.throws(() => checkMove(bet, acc.a, 'a', { kind: 'raise', to: 20 }, 10), /Nothing to raise; bet instead/);
  assert.throws(() => checkMove(bet, acc.a, 'a', { kind: 'call' }, 10), /Nothing to call; check instead/);

  assert.equal(applyMove(bet, acc.a, 'a', { kind: 'bet', amount: 20 }, 10), 'bets 20');
  assert.equal(bet.currentBet, 20);
  assert.deepEqual(bet.queue, ['b', 'c']);

  assert.throws(() => checkMove(bet, acc.b, 'b', { kind: 'check' }, 10), /Cannot check: 20 to call/);
  assert.throws(
    () => checkMove(bet, acc.b, 'b', { kind: 'raise', to: 30 }, 10),
    /Minimum raise is to 40 \(or all-in to 100\)/
  );
  assert.equal(applyMove(bet, acc.b, 'b', { kind: 'raise', to: 50 }, 10), 'raises to 50');
  assert.equal(minRaiseTo(bet), 80);
  assert.deepEqual(bet.queue, ['c', 'a']);

  assert.equal(applyMove(bet, acc.c, 'c', { kind: 'fold' }, 10), 'folds');
  assert.equal(isBettingComplete(bet), false);
  assert.throws(() => checkMove(bet, acc.c, 'c', { kind: 'call' }, 10), IllegalActionError);
  assert.equal(applyMove(bet, acc.a, 'a', { kind: 'call' }, 10), 'calls 30');
  assert.equal(isBettingComplete(bet), true);

  assert.equal(potTotal(bet), 100);
  assert.deepEqual([acc.a.chips, acc.b.chips, acc.c.chips], [50, 50, 100]);

  startStreet(bet, 10);
  assert.equal(bet.currentBet, 0);
  assert.deepEqual(bet.committed, { a: 0, b: 0, c: 0 });
  assert.equal(potTotal(bet), 100);
});

test('an all-in leaves nothing to decide on later streets', () => {
  const bet = createBettingState(['a', 'b'], 10);
  const a = { chips: 30 };
  const b = { chips: 100 };
  bet.queue = buildQueue(bet, 'b');
  assert.equal(applyMove(bet, a, 'a', { kind: 'bet', amount: 30 }, 10), 'bets 30 and is all-in');
  assert.deepEqual(bet.queue, ['b']);
  assert.throws(() => checkMove(bet, a, 'a', { kind: 'check' }, 10), /You cannot act in this hand/);
  assert.equal(applyMove(bet, b, 'b', { kind: 'call' }, 10), 'calls 30');
  assert.equal(isBettingComplete(bet), true);

  startStreet(bet, 10);
  assert.deepEqual(buildQueue(bet, 'b'), []);
});

test('a short all-in raise does not change the minimum raise', () => {
  const bet = createBettingState(['a', 'b', 'c'], 10);
  const a = { chips: 100 };
  const b = { chips: 25 };
  applyMove(bet, a, 'a', { kind: 'bet', amount: 20 }, 10);
  assert.equal(applyMove(bet, b, 'b', { kind: 'raise', to: 25 }, 10), 'raises to 25 and is all-in');
  assert.equal(bet.currentBet, 25);
  assert.equal(minRaiseTo(bet), 45);
  assert.deepEqual(bet.queue, ['c', 'a']);
});

test('side pots follow contribution levels', () => {
  const bet = createBettingState(['a', 'b', 'c', 'd'], 10);
  bet.contributed = { a: 50, b: 100, c: 100, d: 20 };
  bet.folded = ['d'];
  assert.deepEqual(buildPots(bet), [
    { amount: 170, eligible: ['a', 'b', 'c'] },
    { amount: 100, eligible: ['b', 'c'] },
  ]);

  // Chips above every live player's level fall back into the pot below.
  const folded = createBettingState(['a', 'b', 'c'], 10);
  folded.contributed = { a: 50, b: 100, c: 50 };
  folded.folded = ['b'];
  assert.deepEqual(buildPots(folded), [{ amount: 200, eligible: ['a', 'c'] }]);
});

test('split pots give odd chips from the dealer\'s left', () => {
  const shares = splitPot(101, ['c', 'a'], ['b', 'c', 'a']);
  assert.deepEqual([...shares], [
    ['c', 51],
    ['a', 50],
  ]);
  assert.equal(splitPot(10, [], ['a']).size, 0);
  assert.deepEqual(seatsAfter(['a', 'b', 'c'], 'b'), ['c', 'a', 'b']);
  assert.deepEqual(seatsAfter(['a', 'b', 'c'], 'z'), ['a', 'b', 'c']);
});
