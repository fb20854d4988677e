import test from 'node:test';
import assert from 'node:assert/strict';
import { parseCards } from './cards.js';
import {
  HandCategory,
  compareHandRanks,
  describeHand,
  evaluateFive,
  evaluateHand,
} from './handEval.js';

const five = (text: string) => evaluateFive(parseCards(text));

test('categories are recognised from five cards', () => {
  assert.deepEqual(five('Ah Kh Qh Jh Th').category, HandCategory.RoyalFlush);
  assert.deepEqual(five('9s 8s 7s 6s 5s').tiebreaks, [7]);
  assert.equal(five('9s 8s 7s 6s 5s').category, HandCategory.StraightFlush);
  assert.equal(five('Kc Kd Ks Kh 2c').category, HandCategory.FourOfAKind);
  assert.deepEqual(five('Kc Kd Ks Kh 2c').tiebreaks, [11, 0]);
  assert.equal(five('7c 7d 7h Kd Ks').category, HandCategory.FullHouse);
  assert.equal(five('2d 9d Jd Qd 4d').category, HandCategory.Flush);
  assert.equal(five('Tc Jd Qh Ks Ac').category, HandCategory.Straight);
  assert.equal(five('5c 5d 5h Kd 2s').category, HandCategory.ThreeOfAKind);
  assert.deepEqual(five('Kh Kd 4c 4s Ad').tiebreaks, [11, 2, 12]);
  assert.equal(five('Kh Kd 4c 4s Ad').category, HandCategory.TwoPair);
  assert.equal(five('Kh Kd 4c 7s Ad').category, HandCategory.OnePair);
  assert.deepEqual(five('Ah Jd 9c 4s 2d').tiebreaks, [12, 9, 7, 2, 0]);
  assert.equal(five('Ah Jd 9c 4s 2d').category, HandCategory.HighCard);
});

test('the wheel is a five-high straight', () => {
  const wheel = five('As 2d 3c 4h 5s');
  assert.equal(wheel.category, HandCategory.Straight);
  assert.deepEqual(wheel.tiebreaks, [3]);
  assert.ok(compareHandRanks(five('2s 3d 4c 5h 6s'), wheel) > 0);
  assert.equal(describeHand(wheel), 'Straight (As 2d 3c 4h 5s)');
});

test('comparison goes by category, then tiebreaks in order', () => {
  assert.ok(compareHandRanks(five('7c 7d 7h Kd Ks'), five('2d 9d Jd Qd 4d')) > 0);
  assert.ok(compareHandRanks(five('Kh Kd 4c 4s Ad'), five('Kh Kd 4c 4s Qd')) > 0);
  assert.ok(compareHandRanks(five('Qh Qd 4c 4s Ad'), five('Kh Kd 3c 3s 2d')) < 0);
  assert.equal(compareHandRanks(five('Ah Kd Qc Jc 9s'), five('As Kc Qd Jh 9c')), 0);
});

test('evaluateHand picks the best five of seven', () => {
  const best = evaluateHand(parseCards('7c 7d'), parseCards('7h Kd Ks 2c 3d'));
  assert.equal(best.category, HandCategory.FullHouse);
  assert.deepEqual(best.tiebreaks, [5, 11]);

  // The board plays for both hands.
  const a = evaluateHand(parseCards('2c 3d'), parseCards('Ah Kd Qc Jc 9s'));
  const b = evaluateHand(parseCards('2h 3s'), parseCards('Ah Kd Qc Jc 9s'));
  assert.equal(compareHandRanks(a, b), 0);

  const royal = evaluateHand(parseCards('Ah Kh'), parseCards('Qh Jh Th 2c 3d'));
  assert.equal(royal.category, HandCategory.RoyalFlush);
  assert.deepEqual(royal.tiebreaks, [12]);
});

test('input checks', () => {
  assert.throws(() => evaluateFive(parseCards('Ah Kh Qh Jh')), /needs 5 cards, got 4/);
  assert.throws(() => evaluateHand(parseCards('Ah Kh'), parseCards('Qh Jh')), /Need at least 5 cards/);
  assert.deepEqual(parseCards('Ah Kd,7c'), ['Ah', 'Kd', '7c']);
  assert.throws(() => parseCards('Ah Zz'), /Not a card: Zz/);
});
