import { z } from 'zod';

// --- Configuration Types ---

export const GameTypeSchema = z.enum(['chess', 'poker', 'mafia', 'secret-hitler', 'impostor']);
export type GameType = z.infer<typeof GameTypeSchema>;

export const PlayerConfigSchema = z.object({
  // Stable participant id; defaults to a slug of the name.
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o`.
  model: z.string().default('openai/gpt-4o'),
  temperature: z.number().default(0.7),
  persona: z.string().optional(),
});
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

export const ArenaConfigSchema = z.object({
  game: GameTypeSchema,
  players: z.array(PlayerConfigSchema).min(2),
  seed: z.number().int().optional(),
  max_rounds: z.number().int().positive().default(50),
  // Validated again by the selected game's own options schema.
  options: z.record(z.string(), z.unknown()).default({}),
  decision_timeout_ms: z.number().int().nonnegative().default(60_000),
  max_attempts: z.number().int().positive().default(2),
  log_thoughts: z.boolean().default(false),
});
export type ArenaConfig = z.infer<typeof ArenaConfigSchema>;

export const TournamentConfigSchema = z.object({
  game: GameTypeSchema,
  models: z.array(z.string().min(1)).min(2),
  players_per_game: z.number().int().positive().optional(),
  games_per_matchup: z.number().int().positive().default(1),
  seed: z.number().int().optional(),
  max_rounds: z.number().int().positive().default(50),
  options: z.record(z.string(), z.unknown()).default({}),
  temperature: z.number().default(0.7),
  decision_timeout_ms: z.number().int().nonnegative().default(60_000),
  max_attempts: z.number().int().positive().default(2),
  ratings_file: z.string().default('ratings.json'),
});
export type TournamentConfig = z.infer<typeof TournamentConfigSchema>;

// --- Logging Types ---

export type LogType =
  | 'SYSTEM'
  | 'PHASE'
  | 'CHAT'
  | 'ACTION'
  | 'VOTE'
  | 'REJECTED'
  | 'RESOLUTION'
  | 'WIN'
  | 'THOUGHT';

export type LogVisibility = 'public' | 'private';

export interface GameLogMetadata {
  visibility?: LogVisibility;
  gameId?: string;
  phase?: string;
  round?: number;
  tool?: string;
  // Ids allowed to see a private entry.
  audience?: string[];

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}
