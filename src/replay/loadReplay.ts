import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GameTypeSchema } from '../types.js';

/** The envelope every persisted engine event carries; the rest passes through. */
export const RecordedEventSchema = z
  .object({
    seq: z.number().int().positive(),
    gameId: z.string().min(1),
    timestamp: z.string(),
    type: z.string().min(1),
  })
  .passthrough();
export type RecordedEvent = z.infer<typeof RecordedEventSchema>;

export const GameStartedRecordSchema = RecordedEventSchema.extend({
  type: z.literal('game_started'),
  gameType: GameTypeSchema,
  seed: z.number().int(),
  maxRounds: z.number().int().positive(),
  options: z.record(z.string(), z.unknown()),
  participants: z.array(z.object({ id: z.string().min(1), name: z.string().min(1) })).min(1),
});
export type GameStartedRecord = z.infer<typeof GameStartedRecordSchema>;

export const ActionAppliedRecordSchema = RecordedEventSchema.extend({
  type: z.literal('action_applied'),
  phase: z.string(),
  round: z.number().int(),
  actor: z.string().min(1),
  action: z.object({ tool: z.string().min(1), args: z.record(z.string(), z.unknown()) }),
});
export type ActionAppliedRecord = z.infer<typeof ActionAppliedRecordSchema>;

export const RecordedOutcomeSchema = z
  .object({
    kind: z.enum(['win', 'draw', 'aborted']),
    termination: z.string(),
    reason: z.string(),
    winners: z.array(z.string()),
    losers: z.array(z.string()),
    ranking: z.array(z.string()).optional(),
    rounds: z.number().int(),
  })
  .passthrough();
export type RecordedOutcome = z.infer<typeof RecordedOutcomeSchema>;

export const GameEndedRecordSchema = RecordedEventSchema.extend({
  type: z.literal('game_ended'),
  outcome: RecordedOutcomeSchema,
});

/**
 * Resolves a replay path. 'latest' picks the most recent game-*.json in the
 * log directory; bare names are also looked up there, with or without .json.
 */
export function resolveReplayPath(arg: string, logDir: string = path.join(process.cwd(), 'logs')): string {
  if (arg === 'latest') {
    if (!fs.existsSync(logDir)) {
      throw new Error(`Log directory not found: ${logDir}`);
    }
    const files = fs
      .readdirSync(logDir)
      .filter(f => f.startsWith('game-') && f.endsWith('.json'))
      .sort()
      .reverse();

    const newest = files[0];
    if (newest === undefined) {
      throw new Error(`No game logs found in ${logDir}`);
    }
    return path.join(logDir, newest);
  }

  if (!fs.existsSync(arg)) {
    const inLogs = path.join(logDir, arg);
    if (fs.existsSync(inLogs)) return inLogs;

    if (!arg.endsWith('.json')) {
      const withJson = `${arg}.json`;
      if (fs.existsSync(withJson)) return path.resolve(withJson);
      const inLogsWithJson = path.join(logDir, withJson);
      if (fs.existsSync(inLogsWithJson)) return inLogsWithJson;
    }
  }

  return path.resolve(process.cwd(), arg);
}

/** Loads and validates a persisted event log. */
export function loadReplayEvents(filePath: string): RecordedEvent[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Replay file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Failed to parse replay file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = z.array(RecordedEventSchema).safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Replay file is not an event log: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }
  return parsed.data;
}
