import { EventBus, type GameEvent, type GameEventBody, type SubstitutionReason } from '../events/index.js';
import type { GameType } from '../types.js';
import { isRecord } from '../utils.js';
import {
  GameRuleError,
  IllegalActionError,
  InvariantViolationError,
  MalformedActionError,
  errorMessage,
} from './errors.js';
import type { DecisionOracle } from './oracle.js';
import type {
  ActionOutcome,
  ActionSchema,
  AnyGameState,
  GameAction,
  GameRules,
  GameSetup,
  Outcome,
  ParticipantId,
  PhaseInfo,
  Resolution,
  TerminalResult,
} from './types.js';

export interface EngineOptions {
  oracle: DecisionOracle;
  // Oracle answers per decision before the default action is substituted.
  maxAttempts?: number;
  // Hard cap on applied actions, on top of each game's round cap.
  maxSteps?: number;
}

/** A running game as the host sees it, whatever its concrete state type. */
export interface ArenaGame {
  readonly gameId: string;
  readonly gameType: GameType;
  readonly events: EventBus<GameEvent>;
  readonly participants: ReadonlyArray<{ id: ParticipantId; name: string }>;
  run(): Promise<Outcome>;
  abort(reason: string): void;
  getOutcome(): Outcome | null;
}

interface Decision<TAction> {
  action: TAction;
  attempts: number;
  substituted: SubstitutionReason | null;
  rejections: GameEventBody[];
}

/**
 * Accepts `{tool, args}` as well as the flat `{tool, target: ...}` shape models
 * tend to produce.
 */
export function normalizeRawAction(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  if (isRecord(raw.args)) return { tool: raw.tool, args: raw.args };
  const { tool, args: _args, reasoning: _reasoning, ...rest } = raw;
  return { tool, args: rest };
}

export class GameEngine<
  TState extends AnyGameState,
  TAction extends GameAction,
  TView,
  TResolution extends Resolution,
> implements ArenaGame
{
  readonly events = new EventBus<GameEvent>();
  readonly state: TState;

  private readonly rules: GameRules<TState, TAction, TView, TResolution>;
  private readonly setup: GameSetup;
  private readonly oracle: DecisionOracle;
  private readonly maxAttempts: number;
  private readonly maxSteps: number;

  private seq = 0;
  private steps = 0;
  private started = false;
  private outcome: Outcome | null = null;
  private abortReason: string | null = null;

  constructor(rules: GameRules<TState, TAction, TView, TResolution>, setup: GameSetup, options: EngineOptions) {
    this.rules = rules;
    this.setup = setup;
    this.oracle = options.oracle;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    this.maxSteps = options.maxSteps ?? 10_000;
    this.state = rules.setup(setup);
  }

  get gameId(): string {
    return this.state.gameId;
  }

  get gameType(): GameType {
    return this.state.gameType;
  }

  get participants(): ReadonlyArray<{ id: ParticipantId; name: string }> {
    return this.state.participants.map(p => ({ id: p.id, name: p.name }));
  }

  getOutcome(): Outcome | null {
    return this.outcome;
  }

  /** Emits `game_started` and enters the opening phase. Idempotent. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.emit({
      type: 'game_started',
      gameType: this.setup.gameType,
      seed: this.setup.seed,
      maxRounds: this.setup.maxRounds,
      options: this.setup.options,
      participants: this.setup.players.map(p => ({ id: p.id, name: p.name })),
    });
    this.enterPhase();
  }

  /** Requests an abort; honoured at the next phase boundary. */
  abort(reason: string): void {
    if (this.outcome) return;
    this.abortReason = reason;
  }

  /** With a viewer, `actors` is what that participant can know of the turn. */
  phaseInfo(viewer?: ParticipantId): PhaseInfo {
    const { discipline, description } = this.rules.describePhase(this.state);
    let actors = this.eligibleActors();
    if (viewer !== undefined && this.rules.visibleActors && !this.outcome) {
      actors = this.rules.visibleActors(this.state, viewer);
    }
    return { id: this.state.phase, round: this.state.round, discipline, description, actors };
  }

  eligibleActors(): ParticipantId[] {
    if (this.outcome) return [];
    return this.rules.eligibleActors(this.state);
  }

  legalActions(actor: ParticipantId): ActionSchema[] {
    return this.rules.legalActions(this.state, actor);
  }

  view(actor: ParticipantId): TView {
    return this.rules.view(this.state, actor);
  }

  isPhaseComplete(): boolean {
    return this.rules.isPhaseComplete(this.state) || this.rules.eligibleActors(this.state).length === 0;
  }

  isTerminal(): Outcome | null {
    return this.outcome;
  }

  parseAction(raw: unknown): TAction {
    const parsed = this.rules.actionSchema.safeParse(normalizeRawAction(raw));
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'action'}: ${issue.message}`)
        .join('; ');
      throw new MalformedActionError(`Could not parse action (${detail})`);
    }
    return parsed.data;
  }

  /** Throws IllegalActionError when the actor may not take this action now. */
  checkAction(actor: ParticipantId, action: TAction): void {
    if (this.outcome) throw new IllegalActionError('The game is over');
    const eligible = this.rules.eligibleActors(this.state);
    if (!eligible.includes(actor)) {
      throw new IllegalActionError(`${actor} is not eligible to act in ${this.state.phase}`);
    }
    if (this.rules.describePhase(this.state).discipline === 'sequential' && eligible[0] !== actor) {
      throw new IllegalActionError(`It is ${eligible[0] ?? 'nobody'}'s turn, not ${actor}'s`);
    }
    const legal = this.rules.legalActions(this.state, actor);
    if (!legal.some(schema => schema.tool === action.tool)) {
      const tools = legal.map(schema => schema.tool).join(', ');
      throw new IllegalActionError(`"${action.tool}" is not allowed now (legal: ${tools || 'none'})`);
    }
    this.rules.validate(this.state, actor, action);
  }

  /** Parses, checks and applies one action. Throws GameRuleError on rejection. */
  applyAction(actor: ParticipantId, raw: unknown): ActionOutcome {
    const action = this.parseAction(raw);
    this.checkAction(actor, action);
    return this.commit(actor, action, 1, null);
  }

  /**
   * Resolves the completed phase and moves to the next one. Returns the new
   * phase, or null when the game ended on the way.
   */
  advance(): PhaseInfo | null {
    if (this.outcome) return null;
    if (!this.isPhaseComplete()) {
      throw new IllegalActionError(`Phase ${this.state.phase} is not complete`);
    }

    const phase = this.state.phase;
    const round = this.state.round;
    const revealMark = this.state.reveals.length;
    const noteMark = this.state.privateNotes.length;

    const resolution = this.rules.resolve(this.state);
    this.emit({
      type: 'phase_resolved',
      phase,
      round,
      resolution: { kind: resolution.kind, summary: resolution.summary },
      reveals: this.state.reveals.slice(revealMark),
      notes: this.state.privateNotes.slice(noteMark),
    });
    this.rules.checkInvariants?.(this.state);
    if (this.checkTerminal()) return null;

    const next = this.rules.nextPhase(this.state, resolution);
    const limit = this.rules.roundLimit(this.state);
    if (next.round > limit) {
      this.triggerSafetyValve(limit, `Round cap of ${limit} reached`);
      return null;
    }

    this.state.phase = next.phase;
    this.state.round = next.round;
    this.enterPhase();
    return this.outcome ? null : this.phaseInfo();
  }

  async run(): Promise<Outcome> {
    try {
      await this.loop();
    } catch (error) {
      if (this.outcome) throw error;
      const termination = error instanceof InvariantViolationError ? 'invariant_violation' : 'engine_error';
      this.finishAborted(termination, errorMessage(error));
    }
    return this.outcome ?? this.finishAborted('engine_error', 'Game loop exited without an outcome');
  }

  private async loop(): Promise<void> {
    if (this.abortReason !== null && !this.started) {
      this.finishAborted('aborted', this.abortReason);
      return;
    }
    this.start();

    while (!this.outcome) {
      if (this.isPhaseComplete()) {
        if (this.abortReason !== null) {
          this.finishAborted('aborted', this.abortReason);
          return;
        }
        this.advance();
        continue;
      }
      if (this.steps >= this.maxSteps) {
        this.triggerSafetyValve(this.maxSteps, `Step cap of ${this.maxSteps} actions reached`);
        return;
      }
      await this.playPhase();
    }
  }

  private async playPhase(): Promise<void> {
    const { discipline } = this.rules.describePhase(this.state);
    if (discipline === 'simultaneous') {
      await this.playSimultaneous();
      return;
    }
    await this.playSequential();
  }

  private async playSequential(): Promise<void> {
    while (!this.outcome && !this.isPhaseComplete() && this.steps < this.maxSteps) {
      const actor = this.rules.eligibleActors(this.state)[0];
      if (actor === undefined) return;
      // Each actor sees everything applied before it in this phase.
      const decision = await this.decide(actor);
      this.commitDecision(actor, decision);
    }
  }

  private async playSimultaneous(): Promise<void> {
    const actors = this.rules.eligibleActors(this.state);
    // All views are taken before anything is applied, so nobody sees a
    // pending action; results are applied in eligibility order.
    const decisions = await Promise.all(actors.map(actor => this.decide(actor)));
    for (let i = 0; i < actors.length; i++) {
      const actor = actors[i];
      const decision = decisions[i];
      if (this.outcome || actor === undefined || decision === undefined) return;
      this.commitDecision(actor, decision);
    }
  }

  private async decide(actor: ParticipantId): Promise<Decision<TAction>> {
    const rejections: GameEventBody[] = [];
    const participant = this.state.participants.find(p => p.id === actor);
    const phase = this.phaseInfo(actor);
    const view = this.rules.view(this.state, actor);
    const legalActions = this.rules.legalActions(this.state, actor);

    let lastError: string | undefined;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      let raw: unknown;
      try {
        raw = await this.oracle.decide({
          gameId: this.state.gameId,
          gameType: this.state.gameType,
          rulesText: this.rules.rulesText,
          actor: { id: actor, name: participant?.name ?? actor },
          phase,
          view,
          legalActions,
          attempt,
          lastError,
        });
      } catch (error) {
        // Oracle failures and timeouts are the host's business; the game moves on.
        rejections.push({
          type: 'action_rejected',
          phase: phase.id,
          round: phase.round,
          actor,
          attempt,
          error: 'oracle',
          message: errorMessage(error),
        });
        return {
          action: this.rules.defaultAction(this.state, actor),
          attempts: attempt,
          substituted: 'oracle_error',
          rejections,
        };
      }

      try {
        const action = this.parseAction(raw);
        this.checkAction(actor, action);
        return { action, attempts: attempt, substituted: null, rejections };
      } catch (error) {
        if (!(error instanceof GameRuleError)) throw error;
        lastError = error.message;
        rejections.push({
          type: 'action_rejected',
          phase: phase.id,
          round: phase.round,
          actor,
          attempt,
          error: error.kind,
          message: error.message,
        });
      }
    }

    return {
      action: this.rules.defaultAction(this.state, actor),
      attempts: this.maxAttempts,
      substituted: 'max_attempts',
      rejections,
    };
  }

  private commitDecision(actor: ParticipantId, decision: Decision<TAction>): void {
    for (const rejection of decision.rejections) this.emit(rejection);

    let action = decision.action;
    let substituted = decision.substituted;
    try {
      this.checkAction(actor, action);
    } catch (error) {
      if (!(error instanceof GameRuleError)) throw error;
      action = this.rules.defaultAction(this.state, actor);
      substituted = 'rejected_on_apply';
      try {
        this.checkAction(actor, action);
      } catch (fallbackError) {
        if (!(fallbackError instanceof GameRuleError)) throw fallbackError;
        throw new InvariantViolationError(
          `Default action "${action.tool}" for ${actor} is illegal in ${this.state.phase}: ${fallbackError.message}`
        );
      }
    }
    this.commit(actor, action, decision.attempts, substituted);
  }

  private commit(
    actor: ParticipantId,
    action: TAction,
    attempts: number,
    substituted: SubstitutionReason | null
  ): ActionOutcome {
    const phase = this.state.phase;
    const round = this.state.round;
    const revealMark = this.state.reveals.length;
    const noteMark = this.state.privateNotes.length;

    const outcome = this.rules.apply(this.state, actor, action);
    this.state.actedThisPhase.push(actor);
    this.steps++;

    this.emit({
      type: 'action_applied',
      phase,
      round,
      actor,
      action: { tool: action.tool, args: action.args },
      outcome,
      substituted,
      attempts,
      snapshot: this.rules.publicView(this.state),
      reveals: this.state.reveals.slice(revealMark),
      notes: this.state.privateNotes.slice(noteMark),
    });
    this.rules.checkInvariants?.(this.state);
    this.checkTerminal();
    return outcome;
  }

  private enterPhase(): void {
    this.state.actedThisPhase = [];
    this.rules.enterPhase(this.state);
    this.rules.checkInvariants?.(this.state);
    this.emit({ type: 'phase_changed', phase: this.phaseInfo() });
    this.checkTerminal();
  }

  private checkTerminal(): boolean {
    if (this.outcome) return true;
    const result = this.rules.evaluate(this.state);
    if (!result) return false;
    this.finish(this.buildOutcome(result));
    return true;
  }

  private triggerSafetyValve(limit: number, reason: string): void {
    this.emit({ type: 'safety_valve_triggered', round: this.state.round, limit, reason });
    this.finish(
      this.buildOutcome({ kind: 'draw', termination: 'safety_valve', reason, winners: [] })
    );
  }

  private finishAborted(termination: string, reason: string): Outcome {
    this.emit({ type: 'game_aborted', reason });
    const outcome: Outcome = {
      ...this.buildOutcome({ kind: 'draw', termination, reason, winners: [] }),
      kind: 'aborted',
    };
    this.finish(outcome);
    return outcome;
  }

  private buildOutcome(result: TerminalResult): Outcome {
    const winners = new Set(result.winners);
    const losers =
      result.kind === 'win' ? this.state.participants.filter(p => !winners.has(p.id)).map(p => p.id) : [];
    return {
      gameId: this.state.gameId,
      gameType: this.state.gameType,
      kind: result.kind,
      termination: result.termination,
      reason: result.reason,
      winners: [...result.winners],
      losers,
      ...(result.ranking ? { ranking: result.ranking } : {}),
      rounds: this.state.round,
      participants: this.rules.summarize(this.state),
      metadata: result.metadata ?? {},
    };
  }

  private finish(outcome: Outcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    this.emit({ type: 'game_ended', outcome });
  }

  private emit(body: GameEventBody): void {
    const event: GameEvent = {
      ...body,
      seq: ++this.seq,
      gameId: this.state.gameId,
      timestamp: new Date().toISOString(),
    };
    this.events.emit(event);
  }
}
