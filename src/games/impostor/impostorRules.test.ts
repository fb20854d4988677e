import test from 'node:test';
import assert from 'node:assert/strict';
import { ScriptedOracle } from '../../agent.js';
import { GameEngine } from '../../engine/gameEngine.js';
import type { GameSetup, ParticipantId } from '../../engine/types.js';
import {
  impostorRules,
  type ImpostorAction,
  type ImpostorResolution,
  type ImpostorState,
  type ImpostorView,
} from './impostorRules.js';

type ImpostorGame = GameEngine<ImpostorState, ImpostorAction, ImpostorView, ImpostorResolution>;

interface Seat {
  id: ParticipantId;
  name: string;
}

const NAMES = ['Ava', 'Ben', 'Cy', 'Dee', 'Eli'];

function setupFor(players: number): GameSetup {
  return {
    gameId: 'impostor-test',
    gameType: 'impostor',
    seed: 17,
    players: NAMES.slice(0, players).map((name, i) => ({ id: `p${i + 1}`, name })),
    maxRounds: 20,
    options: {},
  };
}

function newGame(): { game: ImpostorGame; impostor: Seat; crew: Seat[] } {
  const game = new GameEngine(impostorRules, setupFor(5), { oracle: new ScriptedOracle() });
  const seats = game.state.participants.map(p => ({ id: p.id, name: p.name, role: p.role }));
  const impostor = seats.find(p => p.role === 'impostor');
  if (!impostor) throw new Error('No impostor seated');
  return { game, impostor, crew: seats.filter(p => p.role === 'crewmate') };
}

/** Lets the head of the turn order act until the phase is over. */
function playPhase(game: ImpostorGame, choose: (actor: ParticipantId) => unknown): void {
  for (let actor = game.eligibleActors()[0]; actor !== undefined; actor = game.eligibleActors()[0]) {
    game.applyAction(actor, choose(actor));
  }
}

const wait = { tool: 'wait' };

function notes(game: ImpostorGame, id: ParticipantId): string[] {
  return game.view(id).privateNotes;
}

function table(game: ImpostorGame): string[] {
  return game.state.publicLog.map(line => line.text);
}

test('five players get one impostor; crewmates get three tasks each', () => {
  const { game, impostor, crew } = newGame();
  game.start();
  assert.equal(crew.length, 4);
  assert.equal(game.state.totalTasks, 12);

  const [first] = crew;
  assert.ok(first);
  const crewView = game.view(first.id);
  assert.equal(crewView.you.location, 'Cafeteria');
  assert.equal(crewView.you.tasks?.length, 3);
  assert.equal(crewView.you.killCooldown, undefined);
  assert.equal(crewView.fellowImpostors, undefined);
  assert.equal(crewView.playersHere.length, 4);
  assert.equal(crewView.players.find(p => p.id === impostor.id)?.role, undefined);

  const impostorView = game.view(impostor.id);
  assert.equal(impostorView.you.tasks, undefined);
  assert.equal(impostorView.you.killCooldown, 0);
  assert.deepEqual(impostorView.fellowImpostors, []);
  assert.deepEqual(
    game.legalActions(impostor.id).find(a => a.tool === 'kill')?.params.target?.options,
    crew.map(c => c.id)
  );
});

test('a kill is seen only by the room; a reported body leads to an ejection', () => {
  const { game, impostor, crew } = newGame();
  const [victim, witness, away1, away2] = crew;
  assert.ok(victim && witness && away1 && away2);
  for (const p of game.state.participants) {
    if (p.id === away1.id || p.id === away2.id) p.attrs.location = 'Electrical';
  }
  game.start();

  playPhase(game, actor => (actor === impostor.id ? { tool: 'kill', target: victim.name } : wait));
  assert.ok(notes(game, victim.id).includes(`[round 1] You were killed by ${impostor.name} in Cafeteria.`));
  assert.ok(notes(game, witness.id).includes(`[round 1] You saw ${impostor.name} kill ${victim.name} in Cafeteria!`));
  assert.deepEqual(notes(game, away1.id), []);
  assert.equal(game.view(witness.id).players.find(p => p.id === victim.id)?.alive, false);
  assert.equal(game.view(away1.id).players.find(p => p.id === victim.id)?.alive, true);
  assert.deepEqual(table(game), []);

  assert.equal(game.advance()?.round, 2);
  assert.equal(game.view(impostor.id).you.killCooldown, 1);
  assert.deepEqual(game.view(witness.id).bodiesHere, [victim.name]);
  assert.throws(
    () => impostorRules.validate(game.state, impostor.id, { tool: 'kill', args: { target: witness.id } }),
    /Kill is on cooldown for 1 more round\(s\)/
  );

  playPhase(game, actor => (actor === witness.id ? { tool: 'report_body' } : wait));
  assert.ok(table(game).includes(`${witness.name} reports the body of ${victim.name} in Cafeteria! Emergency meeting.`));
  assert.equal(game.view(away1.id).players.find(p => p.id === victim.id)?.alive, false);

  const discussion = game.advance();
  assert.equal(discussion?.id, 'DISCUSSION');
  assert.equal(discussion?.round, 2);
  assert.deepEqual(game.view(away2.id).meeting, {
    trigger: 'body_report',
    caller: witness.name,
    bodies: [victim.name],
    location: 'Cafeteria',
  });
  playPhase(game, () => ({ tool: 'pass' }));
  assert.equal(game.advance()?.id, 'VOTING');

  for (const id of game.eligibleActors()) {
    game.applyAction(id, { tool: 'cast_vote', target: id === impostor.id ? witness.id : impostor.id });
  }
  assert.equal(game.advance(), null);

  const outcome = game.getOutcome();
  assert.equal(outcome?.termination, 'impostors_eliminated');
  assert.deepEqual(outcome?.winners, crew.map(c => c.id));
  assert.deepEqual(outcome?.losers, [impostor.id]);
  assert.ok(table(game).includes(`${impostor.name} was ejected. They were an Impostor.`));
  const stats = (id: ParticipantId) => outcome?.participants.find(p => p.id === id)?.stats;
  assert.deepEqual(stats(impostor.id), { kills: 1, ejectedRound: 2 });
  assert.equal(stats(victim.id)?.killedRound, 1);
});

test('an unreported kill stays hidden through an emergency meeting vote', () => {
  const { game, impostor, crew } = newGame();
  const [victim, witness, away1, away2] = crew;
  assert.ok(victim && witness && away1 && away2);
  for (const p of game.state.participants) {
    if (p.id === away1.id || p.id === away2.id) p.attrs.location = 'Electrical';
  }
  game.start();

  playPhase(game, actor => (actor === impostor.id ? { tool: 'kill', target: victim.id } : wait));
  game.advance();
  playPhase(game, actor => (actor === away1.id ? { tool: 'call_meeting' } : wait));
  game.advance();
  playPhase(game, () => ({ tool: 'pass' }));
  assert.equal(game.advance()?.id, 'VOTING');

  const everyone = game.state.participants.map(p => p.id);
  const voteOptions = (id: ParticipantId) =>
    game.legalActions(id).find(a => a.tool === 'cast_vote')?.params.target?.options;
  assert.deepEqual(voteOptions(away1.id), everyone.filter(id => id !== away1.id));
  assert.deepEqual(voteOptions(witness.id), everyone.filter(id => id !== witness.id && id !== victim.id));
  assert.deepEqual(game.phaseInfo(away1.id).actors, everyone);
  assert.deepEqual(game.phaseInfo(witness.id).actors, everyone.filter(id => id !== victim.id));
  assert.deepEqual(game.phaseInfo().actors, everyone.filter(id => id !== victim.id));
  assert.throws(() => game.applyAction(witness.id, { tool: 'cast_vote', target: victim.id }), new RegExp(`${victim.name} is dead`));

  game.applyAction(away1.id, { tool: 'cast_vote', target: victim.id });
  game.applyAction(away2.id, { tool: 'cast_vote', target: victim.name });
  game.applyAction(witness.id, { tool: 'cast_vote', target: impostor.id });
  game.applyAction(impostor.id, { tool: 'cast_vote', target: witness.id });
  assert.equal(game.advance()?.id, 'ACTION');

  // The two votes for the hidden victim are wasted and count as skips.
  assert.equal(table(game).at(-1), 'Nobody was ejected.');
  assert.deepEqual(game.state.ejected, []);
  assert.deepEqual(game.state.publicDeaths, []);
  assert.equal(game.view(away2.id).players.find(p => p.id === victim.id)?.alive, true);
});

test('moving reports who is in the new room; finishing every task wins for the crew', () => {
  const { game, impostor, crew } = newGame();
  for (const p of game.state.participants) {
    p.attrs.tasks = p.role === 'crewmate' ? [{ location: 'Reactor', task: 'Unlock manifolds', completed: false }] : [];
  }
  game.state.totalTasks = crew.length;
  game.start();

  const [first, second] = crew;
  assert.ok(first && second);
  assert.deepEqual(
    game.legalActions(first.id).map(a => a.tool),
    ['move', 'call_meeting', 'wait']
  );
  const check = (action: ImpostorAction) => () => impostorRules.validate(game.state, first.id, action);
  assert.throws(check({ tool: 'do_task', args: {} }), /You have no task in Cafeteria/);
  assert.throws(check({ tool: 'move', args: { location: 'Cafeteria' } }), /You are already in Cafeteria/);
  assert.throws(check({ tool: 'move', args: { location: 'Bridge' } }), /Unknown room "Bridge"/);

  playPhase(game, actor => (actor === impostor.id ? wait : { tool: 'move', location: 'reactor' }));
  assert.ok(notes(game, first.id).includes('[round 1] You move from Cafeteria to Reactor. Nobody else is here.'));
  assert.ok(notes(game, second.id).includes(`[round 1] You move from Cafeteria to Reactor. Here: ${first.name}.`));
  assert.deepEqual(game.view(impostor.id).playersHere, []);

  game.advance();
  assert.deepEqual(game.view(first.id).taskProgress, { completed: 0, total: 4 });
  playPhase(game, actor => (actor === impostor.id ? wait : { tool: 'do_task' }));
  assert.ok(notes(game, first.id).includes('[round 2] Task done: Unlock manifolds in Reactor. 0 of your tasks left.'));

  const outcome = game.getOutcome();
  assert.equal(outcome?.termination, 'tasks_completed');
  assert.equal(outcome?.reason, 'The crew finished every task.');
  assert.deepEqual(outcome?.winners, crew.map(c => c.id));
  assert.deepEqual(outcome?.participants.find(p => p.id === first.id)?.stats, { tasksDone: 1, tasks: 1 });
});

test('an emergency meeting can be called once; a skip majority ejects nobody', () => {
  const { game } = newGame();
  game.start();

  game.applyAction('p1', { tool: 'call_meeting' });
  assert.deepEqual(game.eligibleActors(), []);
  assert.deepEqual(table(game), ['Ava calls an emergency meeting!']);
  assert.equal(game.advance()?.id, 'DISCUSSION');
  assert.equal(game.view('p2').meeting?.trigger, 'emergency_meeting');

  playPhase(game, () => ({ tool: 'pass' }));
  game.advance();
  game.applyAction('p2', { tool: 'cast_vote', target: 'p3' });
  for (const id of game.eligibleActors()) game.applyAction(id, { tool: 'skip_vote' });
  const next = game.advance();
  assert.equal(next?.id, 'ACTION');
  assert.equal(next?.round, 2);
  assert.equal(table(game).at(-1), 'Nobody was ejected.');
  assert.equal(game.state.participants.every(p => p.alive), true);

  assert.equal(game.view('p1').you.meetingsLeft, 0);
  assert.throws(() => game.applyAction('p1', { tool: 'call_meeting' }), /"call_meeting" is not allowed now/);
});

test('the impostors win once they match the crew', () => {
  const state = impostorRules.setup(setupFor(4));
  assert.equal(impostorRules.evaluate(state), null);

  const crew = state.participants.filter(p => p.role === 'crewmate');
  for (const p of crew.slice(0, 2)) p.alive = false;
  const result = impostorRules.evaluate(state);
  assert.equal(result?.termination, 'impostor_majority');
  assert.equal(result?.reason, 'Impostors (1) equal or outnumber the crew (1).');
  assert.deepEqual(
    result?.winners,
    state.participants.filter(p => p.role === 'impostor').map(p => p.id)
  );
});
