import test from 'node:test';
import assert from 'node:assert/strict';
import { DryRunOracle, ScriptedOracle, describeActions, normalizeModelId, tryParseJsonObject } from './agent.js';
import { AgentIO, DecisionTimeoutError, withTimeout } from './agentIo.js';
import type { DecisionOracle, DecisionRequest } from './engine/oracle.js';
import type { ActionSchema } from './engine/types.js';
import { logger } from './logger.js';

logger.setConsoleOutputEnabled(false);

function request(actor: string, legalActions: ActionSchema[], overrides: Partial<DecisionRequest> = {}): DecisionRequest {
  return {
    gameId: 'test-game',
    gameType: 'mafia',
    rulesText: 'Test rules.',
    actor: { id: actor, name: actor.toUpperCase() },
    phase: { id: 'VOTING', round: 1, discipline: 'simultaneous', description: 'Vote', actors: [actor] },
    view: {},
    legalActions,
    attempt: 1,
    ...overrides,
  };
}

const VOTE: ActionSchema = {
  tool: 'cast_vote',
  description: 'Vote to eliminate a player.',
  params: { target: { type: 'string', description: 'Player', options: ['b', 'c'] } },
};

test('tryParseJsonObject: bare, fenced and embedded JSON', () => {
  assert.deepEqual(tryParseJsonObject('{"tool":"pass","args":{}}'), { tool: 'pass', args: {} });
  assert.deepEqual(tryParseJsonObject('```json\n{"tool":"pass"}\n```'), { tool: 'pass' });
  assert.deepEqual(tryParseJsonObject('I will vote. {"tool":"cast_vote","args":{"target":"b"}} Done.'), {
    tool: 'cast_vote',
    args: { target: 'b' },
  });
});

test('tryParseJsonObject: rejects non-objects and garbage', () => {
  assert.equal(tryParseJsonObject('[1,2]'), null);
  assert.equal(tryParseJsonObject('no json here'), null);
  assert.equal(tryParseJsonObject('{not: valid}'), null);
});

test('describeActions: lists tools with their parameters', () => {
  assert.equal(
    describeActions([VOTE, { tool: 'abstain', description: 'Skip.', params: {} }]),
    '- cast_vote: Vote to eliminate a player.\n    - target (string, one of ["b","c"]): Player\n- abstain: Skip.'
  );
});

test('normalizeModelId: requires provider/model', () => {
  assert.equal(normalizeModelId('openai/gpt-4o'), 'openai/gpt-4o');
  assert.throws(() => normalizeModelId('gpt-4o'), /provider\/model/);
});

test('DryRunOracle: deterministic and always legal', async () => {
  const legal: ActionSchema[] = [VOTE, { tool: 'abstain', description: 'Skip.', params: {} }];
  const a = new DryRunOracle({ seed: 5 });
  const b = new DryRunOracle({ seed: 5 });
  for (let i = 0; i < 5; i++) {
    const fromA = await a.decide(request('a', legal));
    const fromB = await b.decide(request('a', legal));
    assert.deepEqual(fromA, fromB);
    const choice = fromA;
    assert.ok(
      (typeof choice === 'object' && choice !== null && 'tool' in choice && choice.tool === 'abstain') ||
        JSON.stringify(choice) === '{"tool":"cast_vote","args":{"target":"b"}}' ||
        JSON.stringify(choice) === '{"tool":"cast_vote","args":{"target":"c"}}'
    );
  }
});

test('DryRunOracle: avoids resign while anything else is legal', async () => {
  const oracle = new DryRunOracle({ seed: 1 });
  const legal: ActionSchema[] = [
    { tool: 'resign', description: 'Resign.', params: {} },
    { tool: 'make_move', description: 'Move.', params: { move: { type: 'string', description: 'UCI', options: ['e2e4'] } } },
  ];
  for (let i = 0; i < 5; i++) {
    assert.deepEqual(await oracle.decide(request('w', legal)), { tool: 'make_move', args: { move: 'e2e4' } });
  }
  assert.deepEqual(await oracle.decide(request('w', [legal[0] ?? VOTE])), { tool: 'resign', args: {} });
});

test('DryRunOracle: integer parameters take their minimum', async () => {
  const oracle = new DryRunOracle({ seed: 1 });
  const bet: ActionSchema = { tool: 'bet', description: 'Bet.', params: { amount: { type: 'integer', description: 'Chips', min: 20, max: 500 } } };
  assert.deepEqual(await oracle.decide(request('p', [bet])), { tool: 'bet', args: { amount: 20 } });
});

test('ScriptedOracle: plays back per actor in order, then throws', async () => {
  const oracle = new ScriptedOracle([
    ['a', { tool: 'pass', args: {} }],
    ['b', { tool: 'abstain', args: {} }],
    ['a', { tool: 'cast_vote', args: { target: 'b' } }],
  ]);
  assert.equal(oracle.remaining(), 3);
  assert.deepEqual(await oracle.decide(request('a', [])), { tool: 'pass', args: {} });
  assert.deepEqual(await oracle.decide(request('a', [])), { tool: 'cast_vote', args: { target: 'b' } });
  assert.equal(oracle.remaining('a'), 0);
  await assert.rejects(oracle.decide(request('a', [])), /No scripted action left for a/);
});

test('withTimeout: rejects when the promise takes too long', async () => {
  const never = new Promise<string>(() => {});
  await assert.rejects(withTimeout(never, 10), DecisionTimeoutError);
  assert.equal(await withTimeout(Promise.resolve('ok'), 10), 'ok');
});

test('AgentIO: routes to the seated agent', async () => {
  const calls: string[] = [];
  const make = (label: string): DecisionOracle => ({
    decide: async req => {
      calls.push(`${label}:${req.actor.id}`);
      return { tool: 'pass', args: {} };
    },
  });
  const io = new AgentIO({ a: make('A'), b: make('B') });
  await io.decide(request('b', []));
  await io.decide(request('a', []));
  assert.deepEqual(calls, ['B:b', 'A:a']);
  await assert.rejects(io.decide(request('zed', [])), /No agent seated for zed/);
});

test('AgentIO: retries failures, then throws the last error', async () => {
  let attempts = 0;
  const flaky: DecisionOracle = {
    decide: async () => {
      attempts++;
      if (attempts === 1) throw new Error('network down');
      return { tool: 'pass', args: {} };
    },
  };
  assert.deepEqual(await new AgentIO({ a: flaky }, { maxAttempts: 2 }).decide(request('a', [])), { tool: 'pass', args: {} });
  assert.equal(attempts, 2);

  const broken: DecisionOracle = {
    decide: async () => {
      throw new Error('still down');
    },
  };
  await assert.rejects(new AgentIO({ a: broken }, { maxAttempts: 3 }).decide(request('a', [])), /still down/);
});
