export type RuleErrorKind = 'illegal' | 'malformed';

/**
 * A participant-level error: the action is rejected and the actor re-prompted
 * (or substituted with the game's default action). Never fatal.
 */
export class GameRuleError extends Error {
  readonly kind: RuleErrorKind;

  constructor(kind: RuleErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'GameRuleError';
  }
}

/** Actor not eligible, or action outside the phase's legal grammar. */
export class IllegalActionError extends GameRuleError {
  constructor(message: string) {
    super('illegal', message);
    this.name = 'IllegalActionError';
  }
}

/** The decision oracle returned something that does not parse as an action. */
export class MalformedActionError extends GameRuleError {
  constructor(message: string) {
    super('malformed', message);
    this.name = 'MalformedActionError';
  }
}

/** A broken engine invariant. Aborts the game instance. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
