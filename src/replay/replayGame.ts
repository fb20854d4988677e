import { ScriptedOracle } from '../agent.js';
import type { GameEvent } from '../events/index.js';
import type { Outcome } from '../engine/types.js';
import { createGame } from '../games/registry.js';
import {
  ActionAppliedRecordSchema,
  GameEndedRecordSchema,
  GameStartedRecordSchema,
  type RecordedOutcome,
} from './loadReplay.js';

export interface ReplayResult {
  outcome: Outcome;
  recorded: RecordedOutcome | null;
  matches: boolean;
  // Human-readable field differences; empty when the outcomes agree.
  differences: string[];
  actionsReplayed: number;
  events: GameEvent[];
}

const COMPARED_FIELDS = ['kind', 'termination', 'winners', 'losers', 'ranking', 'rounds'] as const;

export function compareOutcomes(recorded: RecordedOutcome, replayed: Outcome): string[] {
  const differences: string[] = [];
  for (const field of COMPARED_FIELDS) {
    const a = JSON.stringify(recorded[field] ?? null);
    const b = JSON.stringify(replayed[field] ?? null);
    if (a !== b) differences.push(`${field}: recorded ${a}, replayed ${b}`);
  }
  return differences;
}

/**
 * Rebuilds a game from its `game_started` event and feeds every recorded
 * action back in order. Games are deterministic given seed and actions, so
 * the replayed outcome should equal the recorded one.
 */
export async function replayGame(events: ReadonlyArray<{ type: string }>): Promise<ReplayResult> {
  const startedEvent = events.find(e => e.type === 'game_started');
  const started = GameStartedRecordSchema.safeParse(startedEvent);
  if (!started.success) throw new Error('Event log has no valid game_started event');

  const oracle = new ScriptedOracle();
  let actionsReplayed = 0;
  for (const event of events) {
    const applied = ActionAppliedRecordSchema.safeParse(event);
    if (!applied.success) continue;
    oracle.push(applied.data.actor, applied.data.action);
    actionsReplayed++;
  }

  const endedEvent = events.find(e => e.type === 'game_ended');
  const ended = GameEndedRecordSchema.safeParse(endedEvent);
  const recorded = ended.success ? ended.data.outcome : null;

  const { gameId, gameType, seed, maxRounds, options, participants } = started.data;
  // One attempt per decision: the script holds exactly the committed actions.
  const game = createGame(
    { gameId, gameType, seed, maxRounds, options, players: participants },
    { oracle, maxAttempts: 1 }
  );
  const replayedEvents: GameEvent[] = [];
  game.events.subscribe(event => replayedEvents.push(event));
  const outcome = await game.run();

  const differences = recorded ? compareOutcomes(recorded, outcome) : ['recorded log has no game_ended event'];
  return {
    outcome,
    recorded,
    matches: differences.length === 0,
    differences,
    actionsReplayed,
    events: replayedEvents,
  };
}
