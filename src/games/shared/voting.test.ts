import test from 'node:test';
import assert from 'node:assert/strict';
import { formatTally, tallyVotes } from './voting.js';

test('tallyVotes: strict plurality eliminates', () => {
  const tally = tallyVotes([
    ['a', 'c'],
    ['b', 'c'],
    ['c', 'a'],
    ['d', null],
  ]);
  assert.equal(tally.eliminated, 'c');
  assert.equal(tally.tied, false);
  assert.deepEqual(tally.counts, [
    { target: 'c', votes: 2 },
    { target: 'a', votes: 1 },
  ]);
  assert.equal(tally.skips, 1);
});

test('tallyVotes: a tie at the top eliminates nobody', () => {
  const tally = tallyVotes([
    ['a', 'c'],
    ['b', 'd'],
  ]);
  assert.equal(tally.eliminated, null);
  assert.equal(tally.tied, true);
});

test('tallyVotes: skip must be beaten outright', () => {
  const tied = tallyVotes([
    ['a', 'c'],
    ['b', null],
  ]);
  assert.equal(tied.eliminated, null);
  assert.equal(tied.tied, true);

  const skipWins = tallyVotes([
    ['a', 'c'],
    ['b', null],
    ['c', null],
  ]);
  assert.equal(skipWins.eliminated, null);
  assert.equal(skipWins.tied, false);
});

test('tallyVotes: no ballots', () => {
  const tally = tallyVotes([]);
  assert.equal(tally.eliminated, null);
  assert.equal(tally.tied, false);
});

test('formatTally: names targets and skips', () => {
  const tally = tallyVotes([
    ['a', 'c'],
    ['b', 'c'],
    ['c', null],
  ]);
  assert.equal(formatTally(tally, id => id.toUpperCase()), 'C: 2, skip: 1');
  assert.equal(formatTally(tallyVotes([]), id => id), 'no votes');
});

test('tallyVotes: abstentions do not block a plurality when skips do not compete', () => {
  const ballots = [
    ['a', 'c'],
    ['b', 'c'],
    ['c', 'd'],
    ['d', null],
    ['e', null],
  ] as const;
  const plurality = tallyVotes(ballots, { skipsCompete: false });
  assert.equal(plurality.eliminated, 'c');
  assert.equal(plurality.tied, false);
  assert.equal(plurality.skips, 2);

  assert.equal(tallyVotes(ballots).eliminated, null);
  assert.equal(tallyVotes(ballots).tied, true);
});

test('tallyVotes: with abstentions only target ties count as ties', () => {
  const split = tallyVotes(
    [
      ['a', 'c'],
      ['b', 'd'],
      ['c', null],
      ['d', null],
    ],
    { skipsCompete: false }
  );
  assert.equal(split.eliminated, null);
  assert.equal(split.tied, true);

  const lone = tallyVotes(
    [
      ['a', 'c'],
      ['b', null],
      ['c', null],
    ],
    { skipsCompete: false }
  );
  assert.equal(lone.eliminated, 'c');

  const silent = tallyVotes(
    [
      ['a', null],
      ['b', null],
    ],
    { skipsCompete: false }
  );
  assert.equal(silent.eliminated, null);
  assert.equal(silent.tied, false);
  assert.equal(formatTally(silent, id => id, 'abstain'), 'abstain: 2');
});
