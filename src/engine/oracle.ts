import type { GameType } from '../types.js';
import type { ActionSchema, ParticipantId, PhaseInfo } from './types.js';

export interface DecisionRequest {
  gameId: string;
  gameType: GameType;
  rulesText: string;
  actor: { id: ParticipantId; name: string };
  phase: PhaseInfo;
  // The actor's filtered view; JSON-serialisable.
  view: unknown;
  legalActions: ActionSchema[];
  attempt: number;
  // Why the previous attempt was rejected, if it was.
  lastError?: string;
}

/**
 * Picks an action for one actor. The result is untrusted: the engine parses it
 * against the game's action schema and checks it against the legal grammar.
 * Throwing (or timing out, at the host's discretion) makes the engine
 * substitute the game's default action.
 */
export interface DecisionOracle {
  decide(request: DecisionRequest): Promise<unknown>;
}
