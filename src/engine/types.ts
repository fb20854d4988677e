import type { z } from 'zod';
import type { GameType } from '../types.js';
import type { SeededRandom } from './rng.js';

export type ParticipantId = string;

/** Who may see a piece of information. */
export type Audience = 'all' | ParticipantId[];

export interface Participant<TRole extends string, TAttrs> {
  readonly id: ParticipantId;
  readonly name: string;
  readonly seat: number;
  // Fixed at setup.
  readonly role: TRole;
  alive: boolean;
  attrs: TAttrs;
}

export type TurnDiscipline = 'sequential' | 'simultaneous';

export interface PublicLogLine {
  round: number;
  phase: string;
  speaker?: ParticipantId;
  text: string;
}

export interface PrivateNote {
  round: number;
  to: ParticipantId[];
  text: string;
}

export interface Reveal {
  round: number;
  subject: ParticipantId;
  fact: 'role' | 'team';
  value: string;
  to: Audience;
}

/**
 * Fields every game state carries. The engine owns `phase`, `round` and
 * `actedThisPhase`; everything else belongs to the game's rules. The three
 * logs are append-only, which keeps views monotonic.
 */
export interface BaseGameState<TPhase extends string, TRole extends string, TAttrs> {
  readonly gameId: string;
  readonly gameType: GameType;
  readonly seed: number;
  readonly rng: SeededRandom;
  phase: TPhase;
  round: number;
  participants: Participant<TRole, TAttrs>[];
  actedThisPhase: ParticipantId[];
  publicLog: PublicLogLine[];
  privateNotes: PrivateNote[];
  reveals: Reveal[];
}

export type AnyGameState = BaseGameState<string, string, unknown>;

export interface GameAction {
  tool: string;
  args: Record<string, unknown>;
}

export interface ParamSpec {
  type: 'string' | 'integer';
  description: string;
  options?: ReadonlyArray<string | number>;
  min?: number;
  max?: number;
}

/** One entry of the legal-action grammar handed to a decision oracle. */
export interface ActionSchema {
  tool: string;
  description: string;
  params: Record<string, ParamSpec>;
}

export interface ActionOutcome {
  success: boolean;
  description: string;
  visibleTo: Audience;
  delta?: Record<string, unknown>;
}

export interface PhaseInfo {
  id: string;
  round: number;
  discipline: TurnDiscipline;
  description: string;
  actors: ParticipantId[];
}

export interface Resolution<TKind extends string = string> {
  kind: TKind;
  // Public lines describing what happened.
  summary: string[];
}

export interface NextPhase<TPhase extends string> {
  phase: TPhase;
  round: number;
}

export type OutcomeKind = 'win' | 'draw' | 'aborted';

export interface TerminalResult {
  kind: 'win' | 'draw';
  termination: string;
  reason: string;
  winners: ParticipantId[];
  ranking?: ParticipantId[];
  metadata?: Record<string, unknown>;
}

export interface ParticipantSummary {
  id: ParticipantId;
  name: string;
  role: string;
  team: string;
  alive: boolean;
  stats: Record<string, string | number>;
}

/** Canonical end-of-game value handed to ratings and tournaments. */
export interface Outcome {
  gameId: string;
  gameType: GameType;
  kind: OutcomeKind;
  termination: string;
  reason: string;
  winners: ParticipantId[];
  losers: ParticipantId[];
  ranking?: ParticipantId[];
  rounds: number;
  participants: ParticipantSummary[];
  metadata: Record<string, unknown>;
}

export interface GameSetup {
  gameId: string;
  gameType: GameType;
  seed: number;
  players: ReadonlyArray<{ id: ParticipantId; name: string }>;
  maxRounds: number;
  options: Record<string, unknown>;
}

/**
 * Capability object a game hands to the engine. All methods take the state
 * explicitly; nothing is captured.
 */
export interface GameRules<
  TState extends AnyGameState,
  TAction extends GameAction,
  TView,
  TResolution extends Resolution,
> {
  readonly gameType: GameType;
  readonly rulesText: string;
  // Input is whatever the oracle produced; output is the typed action.
  readonly actionSchema: z.ZodType<TAction, z.ZodTypeDef, unknown>;

  setup(setup: GameSetup): TState;
  /** Per-phase initialisation, run every time a phase is entered. */
  enterPhase(state: TState): void;
  describePhase(state: TState): { discipline: TurnDiscipline; description: string };
  /** Ordered; for sequential phases the head acts next. */
  eligibleActors(state: TState): ParticipantId[];
  /** Who `viewer` believes is still to act, where that differs from eligibleActors. */
  visibleActors?(state: TState, viewer: ParticipantId): ParticipantId[];
  isPhaseComplete(state: TState): boolean;

  legalActions(state: TState, actor: ParticipantId): ActionSchema[];
  /** Throws IllegalActionError; must not mutate. */
  validate(state: TState, actor: ParticipantId, action: TAction): void;
  apply(state: TState, actor: ParticipantId, action: TAction): ActionOutcome;
  defaultAction(state: TState, actor: ParticipantId): TAction;

  resolve(state: TState): TResolution;
  nextPhase(state: TState, resolution: TResolution): NextPhase<TState['phase']>;

  view(state: TState, viewer: ParticipantId): TView;
  publicView(state: TState): Record<string, unknown>;

  evaluate(state: TState): TerminalResult | null;
  roundLimit(state: TState): number;
  summarize(state: TState): ParticipantSummary[];
  /** Throws InvariantViolationError. */
  checkInvariants?(state: TState): void;
}
