import type {
  ActionOutcome,
  GameAction,
  Outcome,
  ParticipantId,
  PhaseInfo,
  PrivateNote,
  Reveal,
} from '../engine/types.js';
import type { GameType } from '../types.js';

export { EventBus, type Unsubscribe } from './eventBus.js';

export type SubstitutionReason = 'oracle_error' | 'max_attempts' | 'rejected_on_apply';

export type GameEventBody =
  | {
      type: 'game_started';
      gameType: GameType;
      seed: number;
      maxRounds: number;
      options: Record<string, unknown>;
      participants: Array<{ id: ParticipantId; name: string }>;
    }
  | { type: 'phase_changed'; phase: PhaseInfo }
  | {
      type: 'action_rejected';
      phase: string;
      round: number;
      actor: ParticipantId;
      attempt: number;
      error: 'illegal' | 'malformed' | 'oracle';
      message: string;
    }
  | {
      type: 'action_applied';
      phase: string;
      round: number;
      actor: ParticipantId;
      action: GameAction;
      outcome: ActionOutcome;
      substituted: SubstitutionReason | null;
      attempts: number;
      snapshot: Record<string, unknown>;
      reveals: Reveal[];
      notes: PrivateNote[];
    }
  | {
      type: 'phase_resolved';
      phase: string;
      round: number;
      resolution: { kind: string; summary: string[] };
      // Reveals and private notes made during this resolution, with their audiences.
      reveals: Reveal[];
      notes: PrivateNote[];
    }
  | { type: 'safety_valve_triggered'; round: number; limit: number; reason: string }
  | { type: 'game_aborted'; reason: string }
  | { type: 'game_ended'; outcome: Outcome };

/** Everything the engine emits, in order. */
export type GameEvent = GameEventBody & {
  seq: number;
  gameId: string;
  timestamp: string;
};
