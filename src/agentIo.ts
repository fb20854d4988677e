import type { DecisionOracle, DecisionRequest } from './engine/oracle.js';
import type { ParticipantId } from './engine/types.js';
import { errorMessage } from './engine/errors.js';
import { logger } from './logger.js';

export interface AgentIOConfig {
  decisionTimeoutMs: number;
  // Transport-level attempts per decision; rule-level retries belong to the engine.
  maxAttempts: number;
}

export class DecisionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'DecisionTimeoutError';
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let t: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      t = setTimeout(() => reject(new DecisionTimeoutError(timeoutMs)), timeoutMs);
    }),
  ]).finally(() => {
    if (t) clearTimeout(t);
  });
}

/**
 * Routes each decision to the oracle seated for that actor, with a timeout
 * and a few attempts. When every attempt fails it throws, and the engine
 * substitutes the game's default action.
 */
export class AgentIO implements DecisionOracle {
  private agents: Map<ParticipantId, DecisionOracle>;
  private cfg: AgentIOConfig;

  constructor(agents: Map<ParticipantId, DecisionOracle> | Record<ParticipantId, DecisionOracle>, cfg?: Partial<AgentIOConfig>) {
    this.agents = agents instanceof Map ? agents : new Map(Object.entries(agents));
    this.cfg = {
      decisionTimeoutMs: cfg?.decisionTimeoutMs ?? 60_000,
      maxAttempts: Math.max(1, cfg?.maxAttempts ?? 2),
    };
  }

  async decide(request: DecisionRequest): Promise<unknown> {
    const actor = request.actor.id;
    const agent = this.agents.get(actor);
    if (!agent) throw new Error(`No agent seated for ${actor}`);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.cfg.maxAttempts; attempt++) {
      try {
        return await withTimeout(agent.decide(request), this.cfg.decisionTimeoutMs);
      } catch (err) {
        lastError = err;
      }

      logger.log({
        type: 'SYSTEM',
        content: `AgentIO: ${request.actor.name} decision failed (attempt ${attempt}/${this.cfg.maxAttempts}): ${errorMessage(lastError)}`,
        metadata: { actor, attempt, gameId: request.gameId, visibility: 'private' },
      });
    }

    throw lastError instanceof Error ? lastError : new Error(errorMessage(lastError));
  }
}
