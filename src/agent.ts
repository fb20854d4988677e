import { generateText, gateway } from 'ai';
import type { DecisionOracle, DecisionRequest } from './engine/oracle.js';
import type { ActionSchema, ParamSpec, ParticipantId } from './engine/types.js';
import { logger } from './logger.js';
import type { PlayerConfig } from './types.js';
import { fnv1a32, isRecord } from './utils.js';

/**
 * Parses a JSON object out of model output. Accepts bare JSON, fenced JSON
 * and JSON embedded in prose; returns null when nothing parses.
 */
export function tryParseJsonObject(text: string): Record<string, unknown> | null {
  const trimmed = text.trim();
  const attempt = (candidate: string): Record<string, unknown> | null => {
    try {
      const parsed: unknown = JSON.parse(candidate);
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  };

  const direct = attempt(trimmed);
  if (direct) return direct;

  // Common case: model wraps JSON in prose or code fences.
  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced?.[1]) {
    const inner = attempt(fenced[1].trim());
    if (inner) return inner;
  }
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start >= 0 && end > start) return attempt(trimmed.slice(start, end + 1));
  return null;
}

export function describeActions(actions: readonly ActionSchema[]): string {
  return actions
    .map(a => {
      const params = Object.entries(a.params).map(([name, spec]) => {
        const bits: string[] = [spec.type];
        if (spec.options) bits.push(`one of ${JSON.stringify(spec.options)}`);
        if (spec.min !== undefined) bits.push(`min ${spec.min}`);
        if (spec.max !== undefined) bits.push(`max ${spec.max}`);
        return `    - ${name} (${bits.join(', ')}): ${spec.description}`;
      });
      return [`- ${a.tool}: ${a.description}`, ...params].join('\n');
    })
    .join('\n');
}

export interface LlmAgentOptions {
  logThoughts?: boolean;
  // Tail of the agent's own reasoning kept between decisions.
  notebookMaxChars?: number;
}

/** One seat driven by a model through the AI Gateway. */
export class LlmAgent implements DecisionOracle {
  private config: PlayerConfig;
  private logThoughts: boolean;
  private readonly notebookMaxChars: number;
  private privateNotebook = '';
  private cachedModelId?: string;
  private cachedModel?: ReturnType<typeof gateway>;

  constructor(config: PlayerConfig, opts?: LlmAgentOptions) {
    this.config = config;
    this.logThoughts = opts?.logThoughts ?? false;
    this.notebookMaxChars = opts?.notebookMaxChars ?? 6000;
  }

  get name() {
    return this.config.name;
  }

  get model() {
    return this.config.model;
  }

  private getModel() {
    const modelId = normalizeModelId(this.config.model);
    if (this.cachedModel && this.cachedModelId === modelId) return this.cachedModel;

    this.cachedModelId = modelId;
    this.cachedModel = gateway(modelId);
    logger.log({ type: 'SYSTEM', content: `Model ready for ${this.config.name}: ${modelId}` });
    return this.cachedModel;
  }

  buildSystemPrompt(request: DecisionRequest): string {
    const persona = this.config.persona?.trim() || 'You are a sharp, focused player.';
    return `
Game Rules:
${request.rulesText}

Your Name: ${request.actor.name}
Your Persona: ${persona}

Rules:
- Primary objective: maximize your own (or your team's) chance of winning this game.
- Only the information in your view is real. Do not invent events that are not in it.
- Hidden information stays hidden unless revealing it helps you win.

Output format:
- Return a single JSON object: {"tool": string, "args": object, "reasoning": string}
- "tool" MUST be one of the legal actions listed.
- "args" holds that action's parameters, exactly as named.
- "reasoning" is one or two private sentences; nobody else sees it.
    `.trim();
  }

  buildUserPrompt(request: DecisionRequest): string {
    const sections = [
      `Phase: ${request.phase.description} (${request.phase.id}, round ${request.phase.round}, ${request.phase.discipline})`,
      `Your view:\n${JSON.stringify(request.view, null, 2)}`,
      `Legal actions:\n${describeActions(request.legalActions)}`,
    ];
    const notebook = this.privateNotebook.trim();
    if (notebook) sections.unshift(`Your earlier private reasoning (tail):\n${notebook}`);
    if (request.lastError) {
      sections.push(`Your previous answer was rejected: ${request.lastError}\nChoose a legal action this time.`);
    }
    sections.push('Choose your action now.');
    return sections.join('\n\n');
  }

  async decide(request: DecisionRequest): Promise<unknown> {
    const result = await generateText({
      model: this.getModel(),
      system: this.buildSystemPrompt(request),
      prompt: this.buildUserPrompt(request),
      temperature: this.config.temperature,
    });

    const parsed = tryParseJsonObject(result.text);
    if (!parsed) return result.text;

    const reasoning = typeof parsed.reasoning === 'string' ? parsed.reasoning.trim() : '';
    if (reasoning) {
      this.appendToNotebook(`[round ${request.phase.round} ${request.phase.id}] ${reasoning}`);
      if (this.logThoughts) {
        logger.log({
          type: 'THOUGHT',
          player: this.config.name,
          content: reasoning,
          metadata: { visibility: 'private', gameId: request.gameId, phase: request.phase.id, round: request.phase.round },
        });
      }
    }
    return parsed;
  }

  private appendToNotebook(text: string): void {
    const normalized = text.replace(/\n/g, ' ').trim();
    if (!normalized) return;
    this.privateNotebook = this.privateNotebook ? `${this.privateNotebook}\n${normalized}` : normalized;
    if (this.privateNotebook.length > this.notebookMaxChars) {
      this.privateNotebook = this.privateNotebook.slice(-this.notebookMaxChars);
    }
  }
}

export function normalizeModelId(modelId: string): string {
  // AI Gateway expects `provider/model` (e.g. `openai/gpt-4o`).
  if (!modelId.includes('/')) {
    throw new Error(`Invalid model id "${modelId}". Use AI Gateway format "provider/model" (e.g. "openai/gpt-4o").`);
  }
  return modelId;
}

const DRY_RUN_LINES = [
  'No strong reads yet; let us compare notes.',
  'I am watching how people vote.',
  'Something about the last round does not add up.',
  'I will follow the evidence.',
];

export interface DryRunOracleOptions {
  seed?: number;
  // Tools picked only when nothing else is legal.
  avoidTools?: readonly string[];
}

/**
 * Deterministic stand-in for a model: picks among the legal actions by an
 * FNV-1a hash of the seed, call number, actor, phase and round, and fills
 * the parameters from their options or minimum.
 */
export class DryRunOracle implements DecisionOracle {
  private readonly seed: number;
  private readonly avoidTools: ReadonlySet<string>;
  private calls = 0;

  constructor(opts?: DryRunOracleOptions) {
    this.seed = opts?.seed ?? 1;
    this.avoidTools = new Set(opts?.avoidTools ?? ['resign']);
  }

  async decide(request: DecisionRequest): Promise<unknown> {
    const call = ++this.calls;
    const key = `${this.seed}|${call}|${request.actor.id}|${request.phase.id}|${request.phase.round}|${request.attempt}`;
    const preferred = request.legalActions.filter(a => !this.avoidTools.has(a.tool));
    const pool = preferred.length > 0 ? preferred : request.legalActions;
    const schema = pickByHash(pool, `${key}|${pool.map(a => a.tool).join(',')}`);
    if (!schema) return { tool: 'pass', args: {} };

    const args: Record<string, unknown> = {};
    for (const [name, spec] of Object.entries(schema.params)) {
      args[name] = fillParam(spec, `${key}|${schema.tool}|${name}`);
    }
    return { tool: schema.tool, args };
  }
}

function pickByHash<T>(items: readonly T[], key: string): T | undefined {
  if (items.length === 0) return undefined;
  return items[fnv1a32(key) % items.length];
}

function fillParam(spec: ParamSpec, key: string): string | number {
  const option = spec.options ? pickByHash(spec.options, key) : undefined;
  if (option !== undefined) return option;
  if (spec.type === 'integer') return spec.min ?? 0;
  return pickByHash(DRY_RUN_LINES, key) ?? '...';
}

/**
 * Plays back recorded actions, first in first out per actor. Running out of
 * actions for an actor is an error, which the engine turns into a default.
 */
export class ScriptedOracle implements DecisionOracle {
  private queues = new Map<ParticipantId, unknown[]>();

  constructor(script?: Iterable<readonly [ParticipantId, unknown]>) {
    if (script) for (const [actor, action] of script) this.push(actor, action);
  }

  push(actor: ParticipantId, action: unknown): void {
    const queue = this.queues.get(actor);
    if (queue) queue.push(action);
    else this.queues.set(actor, [action]);
  }

  remaining(actor?: ParticipantId): number {
    if (actor !== undefined) return this.queues.get(actor)?.length ?? 0;
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  async decide(request: DecisionRequest): Promise<unknown> {
    const queue = this.queues.get(request.actor.id);
    if (!queue || queue.length === 0) {
      throw new Error(`No scripted action left for ${request.actor.id}`);
    }
    return queue.shift();
  }
}
