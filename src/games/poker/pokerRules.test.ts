import test from 'node:test';
import assert from 'node:assert/strict';
import { ScriptedOracle } from '../../agent.js';
import { GameEngine } from '../../engine/gameEngine.js';
import type { DecisionOracle } from '../../engine/oracle.js';
import type { GameSetup } from '../../engine/types.js';
import { createGame } from '../registry.js';
import { pokerRules } from './pokerRules.js';

function setup(options: Record<string, unknown>, maxRounds = 50): GameSetup {
  return {
    gameId: 'poker-test',
    gameType: 'poker',
    seed: 11,
    players: [
      { id: 'a', name: 'Ann' },
      { id: 'b', name: 'Bob' },
    ],
    maxRounds,
    options,
  };
}

test('a heads-up hand: blinds, streets, a fold and the button moving', () => {
  const game = new GameEngine(pokerRules, setup({ starting_chips: 100, small_blind: 5, big_blind: 10 }), {
    oracle: new ScriptedOracle(),
  });
  game.start();
  assert.equal(game.phaseInfo().id, 'DEAL');
  assert.equal(game.advance()?.id, 'BETTING');

  // Heads-up the dealer posts the small blind and acts first preflop.
  assert.deepEqual(game.eligibleActors(), ['a', 'b']);
  const ann = game.view('a');
  assert.equal(ann.you.chips, 95);
  assert.equal(ann.you.toCall, 5);
  assert.equal(ann.you.holeCards.length, 2);
  assert.equal(ann.pot, 15);
  assert.equal(ann.dealer, 'Ann');
  assert.deepEqual(
    game.legalActions('a').map(a => a.tool),
    ['call', 'raise', 'fold']
  );
  assert.deepEqual(game.legalActions('a')[1]?.params.to, {
    type: 'integer',
    description: 'Total bet after raising',
    min: 20,
    max: 100,
  });
  assert.deepEqual(pokerRules.defaultAction(game.state, 'a'), { tool: 'fold', args: {} });

  // Nobody sees another player's hole cards.
  const bobCards = game.view('b').you.holeCards;
  const annJson = JSON.stringify(ann);
  for (const card of bobCards) assert.equal(annJson.includes(`"${card}"`), false);

  assert.equal(game.applyAction('a', { tool: 'call' }).description, 'Ann calls 5.');
  assert.deepEqual(pokerRules.defaultAction(game.state, 'b'), { tool: 'check', args: {} });
  assert.equal(game.applyAction('b', { tool: 'check' }).description, 'Bob checks.');

  assert.equal(game.advance()?.id, 'BETTING');
  const flop = game.view('b');
  assert.equal(flop.street, 'flop');
  assert.equal(flop.board.length, 3);
  assert.equal(flop.pot, 20);
  // After the flop the player left of the dealer acts first.
  assert.deepEqual(game.eligibleActors(), ['b', 'a']);

  assert.equal(game.applyAction('b', { tool: 'bet', amount: 10 }).description, 'Bob bets 10.');
  assert.equal(game.applyAction('a', { tool: 'raise', args: { to: '30' } }).description, 'Ann raises to 30.');
  assert.equal(game.applyAction('b', { tool: 'fold' }).description, 'Bob folds.');

  const next = game.advance();
  assert.equal(next?.id, 'DEAL');
  assert.equal(next?.round, 2);
  const table = game.state.publicLog.map(l => l.text);
  assert.ok(table.includes('Ann wins 60 uncontested.'));

  // Hand two: Bob has the button and the small blind, Ann the big blind.
  assert.equal(game.view('a').you.chips, 110);
  assert.equal(game.view('b').you.chips, 75);
  assert.equal(game.view('a').dealer, 'Bob');
  assert.equal(game.state.participants.find(p => p.id === 'a')?.attrs.handsWon, 1);
});

test('illegal bets are rejected with the reason', () => {
  const game = new GameEngine(pokerRules, setup({ starting_chips: 100, small_blind: 5, big_blind: 10 }), {
    oracle: new ScriptedOracle(),
  });
  game.start();
  game.advance();
  assert.throws(() => game.applyAction('a', { tool: 'check' }), /"check" is not allowed now \(legal: call, raise, fold\)/);
  assert.throws(() => game.applyAction('a', { tool: 'bet', amount: 20 }), /"bet" is not allowed now/);
  assert.throws(() => game.applyAction('a', { tool: 'raise', to: 15 }), /Minimum raise is to 20 \(or all-in to 100\)/);
  assert.throws(() => game.applyAction('a', { tool: 'raise', to: -5 }), /Could not parse action/);
  assert.throws(() => game.applyAction('b', { tool: 'fold' }), /It is a's turn, not b's/);
});

test('all-in hands run until one player holds every chip', async () => {
  const oracle: DecisionOracle = {
    decide: async req => ({ tool: req.legalActions.some(a => a.tool === 'call') ? 'call' : 'check' }),
  };
  const game = new GameEngine(pokerRules, setup({ starting_chips: 20, small_blind: 10, big_blind: 20 }), { oracle });

  const outcome = await game.run();

  assert.equal(outcome.kind, 'win');
  assert.equal(outcome.termination, 'last_player_standing');
  assert.equal(outcome.reason, `${outcome.winners[0] === 'a' ? 'Ann' : 'Bob'} holds all 40 chips.`);
  assert.equal(outcome.winners.length, 1);
  assert.deepEqual(outcome.ranking, [outcome.winners[0], outcome.losers[0]]);
  const winner = outcome.participants.find(p => p.id === outcome.winners[0]);
  const loser = outcome.participants.find(p => p.id === outcome.losers[0]);
  assert.equal(winner?.stats.chips, 40);
  assert.equal(loser?.stats.chips, 0);
  assert.equal(loser?.alive, false);
  assert.equal(loser?.stats.bustedHand, outcome.rounds);
});

test('the hand cap ends the game as a draw', async () => {
  const oracle: DecisionOracle = {
    decide: async req => ({ tool: req.legalActions.some(a => a.tool === 'check') ? 'check' : 'call' }),
  };
  const outcome = await new GameEngine(pokerRules, setup({ max_hands: 1 }), { oracle }).run();

  assert.equal(outcome.kind, 'draw');
  assert.equal(outcome.termination, 'safety_valve');
  assert.equal(outcome.reason, 'Round cap of 1 reached');
  const chips = outcome.participants.map(p => Number(p.stats.chips));
  assert.equal(chips.reduce((sum, n) => sum + n, 0), 2000);
});

test('blinds must be ordered', () => {
  assert.throws(
    () => pokerRules.setup(setup({ small_blind: 50, big_blind: 20 })),
    /small_blind \(50\) cannot exceed big_blind \(20\)/
  );
});

test('a ten-seat table deals two distinct hole cards to every player', () => {
  const seats = (count: number): GameSetup => ({
    ...setup({}),
    players: Array.from({ length: count }, (_, i) => ({ id: `s${i + 1}`, name: `Seat${i + 1}` })),
  });
  assert.throws(() => createGame(seats(11), { oracle: new ScriptedOracle() }), /Texas Hold'em needs 2-10 players, got 11/);
  assert.equal(createGame(seats(10), { oracle: new ScriptedOracle() }).participants.length, 10);

  const game = new GameEngine(pokerRules, seats(10), { oracle: new ScriptedOracle() });
  game.start();
  assert.equal(game.advance()?.id, 'BETTING');

  const hands = game.state.participants.map(p => game.view(p.id).you.holeCards);
  assert.equal(hands.length, 10);
  assert.ok(hands.every(cards => cards.length === 2));
  assert.equal(new Set(hands.flat()).size, 20);
});
