import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GameTypeSchema, type GameType } from '../types.js';
import { DEFAULT_RATING, updateRatings, type RatedResult } from './elo.js';

const RatingRecordSchema = z.object({
  rating: z.number(),
  games: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  draws: z.number().int().nonnegative(),
  lastUpdated: z.string(),
});
export type RatingRecord = z.infer<typeof RatingRecordSchema>;

const MatchRecordSchema = z.object({
  gameId: z.string(),
  gameType: GameTypeSchema,
  kind: z.enum(['win', 'draw', 'aborted']),
  termination: z.string(),
  players: z.array(z.string()),
  winners: z.array(z.string()),
  losers: z.array(z.string()),
  ratingChanges: z.record(z.string(), z.number()),
  timestamp: z.string(),
});
export type MatchRecord = z.infer<typeof MatchRecordSchema>;

const RatingFileSchema = z.object({
  version: z.literal(1),
  ratings: z.record(z.string(), z.record(z.string(), RatingRecordSchema)),
  history: z.array(MatchRecordSchema),
});
type RatingFile = z.infer<typeof RatingFileSchema>;

export interface LeaderboardRow extends RatingRecord {
  gameType: GameType;
  model: string;
}

/** A finished game keyed by model id, as the store records it. */
export interface RatedMatch extends RatedResult {
  gameId: string;
  gameType: GameType;
  termination: string;
}

/**
 * Elo ratings per game type and model, persisted as one JSON file together
 * with the history of rated matches.
 */
export class RatingStore {
  readonly filePath: string;
  private data: RatingFile;

  constructor(filePath: string = 'ratings.json') {
    this.filePath = path.resolve(filePath);
    this.data = RatingStore.read(this.filePath);
  }

  private static read(filePath: string): RatingFile {
    if (!fs.existsSync(filePath)) return { version: 1, ratings: {}, history: [] };
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const parsed = RatingFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Ratings file ${filePath} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
    }
    return parsed.data;
  }

  getRating(gameType: GameType, model: string): number {
    return this.data.ratings[gameType]?.[model]?.rating ?? DEFAULT_RATING;
  }

  getRecord(gameType: GameType, model: string): RatingRecord | undefined {
    const record = this.data.ratings[gameType]?.[model];
    return record ? { ...record } : undefined;
  }

  /** Applies one match and returns each player's rating change. */
  record(match: RatedMatch): Record<string, number> {
    const table = (this.data.ratings[match.gameType] ??= {});
    const before: Record<string, number> = {};
    for (const model of match.players) before[model] = this.getRating(match.gameType, model);
    const after = updateRatings(before, match);

    const now = new Date().toISOString();
    const winners = new Set(match.winners);
    const changes: Record<string, number> = {};
    const losers: string[] = [];
    for (const model of match.players) {
      const rating = after[model] ?? DEFAULT_RATING;
      changes[model] = rating - (before[model] ?? DEFAULT_RATING);
      if (match.kind === 'aborted') continue;

      const prev = table[model] ?? { rating: DEFAULT_RATING, games: 0, wins: 0, losses: 0, draws: 0, lastUpdated: now };
      const isWinner = winners.has(model);
      if (match.kind === 'win' && !isWinner) losers.push(model);
      table[model] = {
        rating,
        games: prev.games + 1,
        wins: prev.wins + (match.kind === 'win' && isWinner ? 1 : 0),
        losses: prev.losses + (match.kind === 'win' && !isWinner ? 1 : 0),
        draws: prev.draws + (match.kind === 'draw' ? 1 : 0),
        lastUpdated: now,
      };
    }

    this.data.history.push({
      gameId: match.gameId,
      gameType: match.gameType,
      kind: match.kind,
      termination: match.termination,
      players: [...match.players],
      winners: [...match.winners],
      losers,
      ratingChanges: changes,
      timestamp: now,
    });
    return changes;
  }

  /** Sorted by rating, highest first; all game types unless one is given. */
  leaderboard(gameType?: GameType): LeaderboardRow[] {
    const rows: LeaderboardRow[] = [];
    for (const type of GameTypeSchema.options) {
      if (gameType && type !== gameType) continue;
      for (const [model, record] of Object.entries(this.data.ratings[type] ?? {})) {
        rows.push({ gameType: type, model, ...record });
      }
    }
    return rows.sort((a, b) => b.rating - a.rating || a.model.localeCompare(b.model));
  }

  history(): MatchRecord[] {
    return this.data.history.map(m => ({ ...m }));
  }

  save(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.data, null, 2));
  }
}
