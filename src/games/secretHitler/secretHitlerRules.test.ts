import test from 'node:test';
import assert from 'node:assert/strict';
import { ScriptedOracle } from '../../agent.js';
import { GameEngine } from '../../engine/gameEngine.js';
import type { ParticipantId } from '../../engine/types.js';
import type { SecretHitlerRole } from './roles.js';
import {
  secretHitlerRules,
  type SecretHitlerAction,
  type SecretHitlerResolution,
  type SecretHitlerState,
  type SecretHitlerView,
} from './secretHitlerRules.js';

type ShGame = GameEngine<SecretHitlerState, SecretHitlerAction, SecretHitlerView, SecretHitlerResolution>;

const NAMES = ['Ava', 'Ben', 'Cy', 'Dee', 'Eli'];

function newGame(): ShGame {
  return new GameEngine(
    secretHitlerRules,
    {
      gameId: 'sh-test',
      gameType: 'secret-hitler',
      seed: 8,
      players: NAMES.map((name, i) => ({ id: `p${i + 1}`, name })),
      maxRounds: 20,
      options: {},
    },
    { oracle: new ScriptedOracle() }
  );
}

function seatsWith(game: ShGame, role: SecretHitlerRole): Array<{ id: ParticipantId; name: string; seat: number }> {
  return game.state.participants.filter(p => p.role === role).map(p => ({ id: p.id, name: p.name, seat: p.seat }));
}

function passDiscussion(game: ShGame): void {
  for (let actor = game.eligibleActors()[0]; actor !== undefined; actor = game.eligibleActors()[0]) {
    game.applyAction(actor, { tool: 'pass' });
  }
}

function voteAll(game: ShGame, vote: string): void {
  for (const id of game.eligibleActors()) game.applyAction(id, { tool: 'vote', vote });
}

/**
 * Moves three Fascist policies from the deck to the board and stacks the
 * remaining Fascist cards on top of the draw pile. `president` holds the
 * first presidency.
 */
function prepareBoard(game: ShGame, president: { id: ParticipantId; seat: number }): void {
  const { deck } = game.state;
  const fascist = deck.drawPile.filter(p => p === 'fascist');
  const liberal = deck.drawPile.filter(p => p === 'liberal');
  deck.drawPile = [...fascist.slice(3), ...liberal];
  game.state.fascistPolicies = 3;
  game.state.president = president.id;
  game.state.presidentSeat = president.seat;
}

function table(game: ShGame): string[] {
  return game.state.publicLog.map(line => line.text);
}

test('five players: Hitler and the Fascist know each other, Liberals know nobody', () => {
  const game = newGame();
  game.start();
  assert.deepEqual(
    game.state.participants.map(p => p.role).sort(),
    ['fascist', 'hitler', 'liberal', 'liberal', 'liberal']
  );
  const [hitler] = seatsWith(game, 'hitler');
  const [fascist] = seatsWith(game, 'fascist');
  const [liberal] = seatsWith(game, 'liberal');
  assert.ok(hitler && fascist && liberal);

  assert.equal(game.view(hitler.id).fascistTeam?.length, 2);
  assert.equal(game.view(fascist.id).fascistTeam?.length, 2);
  assert.equal(game.view(liberal.id).fascistTeam, undefined);
  assert.equal(game.view(liberal.id).players.find(p => p.id === hitler.id)?.team, undefined);
  assert.equal(table(game)[0], 'Round 1. Presidential candidate: Ava. Board: 0 Liberal, 0 Fascist. Election tracker: 0.');
});

test('a full legislative session moves the presidency and sets term limits', () => {
  const game = newGame();
  game.start();
  passDiscussion(game);
  assert.equal(game.advance()?.id, 'NOMINATION');
  assert.deepEqual(game.eligibleActors(), ['p1']);
  assert.deepEqual(game.view('p1').eligibleChancellors, ['Ben', 'Cy', 'Dee', 'Eli']);
  assert.throws(
    () => game.applyAction('p1', { tool: 'nominate', target: 'p1' }),
    /Ava is not eligible for Chancellor\. Eligible: Ben, Cy, Dee, Eli/
  );
  game.applyAction('p1', { tool: 'nominate', target: 'Ben' });
  assert.equal(game.advance()?.id, 'ELECTION');

  voteAll(game, ' JA ');
  assert.equal(game.advance()?.id, 'LEGISLATIVE_PRESIDENT');
  assert.ok(table(game).includes('The government of Ava and Ben is elected.'));
  assert.match(game.view('p1').yourPolicies ?? '', /^\[0\] (Liberal|Fascist), \[1\] (Liberal|Fascist), \[2\] (Liberal|Fascist)$/);
  assert.equal(game.view('p2').yourPolicies, undefined);
  assert.throws(() => game.applyAction('p1', { tool: 'discard', index: 3 }), /Choose an index from 0 to 2/);

  game.applyAction('p1', { tool: 'discard', index: 0 });
  assert.equal(game.advance()?.id, 'LEGISLATIVE_CHANCELLOR');
  assert.deepEqual(game.eligibleActors(), ['p2']);
  assert.equal(game.state.chancellorHand.length, 2);
  const chosen = game.state.chancellorHand[1];
  assert.ok(game.view('p2').privateNotes.some(note => note.startsWith('[round 1] The President hands you: ')));

  game.applyAction('p2', { tool: 'enact', index: 1 });
  const next = game.advance();
  assert.equal(next?.id, 'DISCUSSION');
  assert.equal(next?.round, 2);
  assert.deepEqual(game.state.enacted, [{ round: 1, policy: chosen, president: 'p1', chancellor: 'p2' }]);
  assert.equal(game.state.president, 'p2');
  assert.deepEqual(game.view('p3').termLimited, ['Ben']);
  assert.deepEqual(game.view('p3').policyHistory, [`Round 1: ${chosen === 'liberal' ? 'Liberal' : 'Fascist'} (Ava / Ben)`]);
});

test('three rejected governments enact the top policy and reset term limits', () => {
  const game = newGame();
  game.start();
  for (let round = 1; round <= 3; round++) {
    passDiscussion(game);
    game.advance();
    const [nominee] = secretHitlerRules.eligibleChancellors(game.state);
    assert.ok(nominee);
    game.applyAction(game.state.president, { tool: 'nominate', target: nominee });
    game.advance();
    voteAll(game, 'nein');
    const top = game.state.deck.drawPile[0];
    game.advance();
    if (round < 3) {
      assert.equal(game.state.electionTracker, round);
      assert.ok(table(game).includes(`The government is rejected. Election tracker: ${round}.`));
    } else {
      assert.equal(game.state.electionTracker, 0);
      assert.deepEqual(game.state.enacted, [{ round: 3, policy: top, president: null, chancellor: null }]);
      assert.ok(
        table(game).includes(
          `Three failed elections: a ${top === 'liberal' ? 'Liberal' : 'Fascist'} policy is enacted from the top of the deck. Term limits are reset.`
        )
      );
    }
  }
  assert.equal(game.phaseInfo().id, 'DISCUSSION');
  assert.equal(game.phaseInfo().round, 4);
  assert.equal(game.state.president, 'p4');
  assert.equal(game.state.previousChancellor, null);
});

test('electing Hitler Chancellor after three Fascist policies wins for the Fascists', () => {
  const game = newGame();
  const [hitler] = seatsWith(game, 'hitler');
  const [liberal] = seatsWith(game, 'liberal');
  assert.ok(hitler && liberal);
  prepareBoard(game, liberal);
  game.start();

  passDiscussion(game);
  game.advance();
  game.applyAction(liberal.id, { tool: 'nominate', target: hitler.id });
  game.advance();
  voteAll(game, 'ja');
  assert.equal(game.advance(), null);

  const outcome = game.getOutcome();
  assert.equal(outcome?.termination, 'hitler_elected');
  assert.equal(outcome?.reason, 'Hitler was elected Chancellor after 3 Fascist policies.');
  assert.deepEqual(
    outcome?.winners,
    game.state.participants.filter(p => p.role !== 'liberal').map(p => p.id)
  );
  assert.ok(table(game).includes(`${hitler.name} is Hitler!`));
});

test('the fourth Fascist policy grants an execution; executing Hitler wins for the Liberals', () => {
  const game = newGame();
  const [hitler] = seatsWith(game, 'hitler');
  const [president, chancellor] = seatsWith(game, 'liberal');
  assert.ok(hitler && president && chancellor);
  prepareBoard(game, president);
  game.start();

  passDiscussion(game);
  game.advance();
  game.applyAction(president.id, { tool: 'nominate', target: chancellor.id });
  game.advance();
  voteAll(game, 'ja');
  game.advance();
  assert.deepEqual(game.state.presidentHand, ['fascist', 'fascist', 'fascist']);
  game.applyAction(president.id, { tool: 'discard', index: 0 });
  game.advance();
  game.applyAction(chancellor.id, { tool: 'enact', index: 0 });

  const power = game.advance();
  assert.equal(power?.id, 'EXECUTIVE_ACTION');
  assert.equal(game.state.fascistPolicies, 4);
  assert.equal(game.view(president.id).pendingPower, 'execute');
  assert.deepEqual(
    game.legalActions(president.id).map(a => a.tool),
    ['execute']
  );
  assert.throws(() => game.applyAction(president.id, { tool: 'execute', target: president.id }), /You cannot choose yourself/);

  game.applyAction(president.id, { tool: 'execute', target: hitler.name });
  const outcome = game.getOutcome();
  assert.equal(outcome?.termination, 'hitler_executed');
  assert.deepEqual(
    outcome?.winners,
    game.state.participants.filter(p => p.role === 'liberal').map(p => p.id)
  );
  assert.ok(table(game).includes(`${president.name} executes ${hitler.name}. ${hitler.name} was Hitler!`));
  assert.equal(outcome?.participants.find(p => p.id === hitler.id)?.stats.executedRound, 1);
});
