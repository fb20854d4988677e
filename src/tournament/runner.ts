import type { DecisionOracle } from '../engine/oracle.js';
import { randomSeed } from '../engine/rng.js';
import type { Outcome, ParticipantId } from '../engine/types.js';
import { createGame, getGameDefinition } from '../games/registry.js';
import type { GameLogger } from '../logger.js';
import type { RatingStore } from '../ratings/store.js';
import type { PlayerConfig, TournamentConfig } from '../types.js';
import { combinations, fnv1a32, slugify } from '../utils.js';

export interface SeatedPlayer {
  id: ParticipantId;
  model: string;
  config: PlayerConfig;
}

export interface TournamentDeps {
  store: RatingStore;
  // Builds the oracle for one game; `seed` is that game's seed.
  createOracle(players: readonly SeatedPlayer[], seed: number): DecisionOracle;
  logger?: GameLogger;
}

export interface TournamentGameResult {
  matchup: number;
  game: number;
  seed: number;
  seats: string[];
  outcome: Outcome;
  winners: string[];
  ratingChanges: Record<string, number>;
}

export interface ModelStanding {
  model: string;
  rating: number;
  wins: number;
  losses: number;
  draws: number;
  aborted: number;
}

export interface TournamentSummary {
  gameType: TournamentConfig['game'];
  seed: number;
  matchups: number;
  games: TournamentGameResult[];
  standings: ModelStanding[];
}

export function rotate<T>(items: readonly T[], by: number): T[] {
  if (items.length === 0) return [];
  const n = ((by % items.length) + items.length) % items.length;
  return [...items.slice(n), ...items.slice(0, n)];
}

function displayName(model: string): string {
  return model.split('/').pop() || model;
}

export function seatPlayers(models: readonly string[], temperature: number): SeatedPlayer[] {
  const names = new Map<string, number>();
  return models.map((model, seat) => {
    const base = displayName(model);
    const seen = names.get(base) ?? 0;
    names.set(base, seen + 1);
    const name = seen === 0 ? base : `${base}-${seen + 1}`;
    return {
      id: `p${seat + 1}-${slugify(name)}`,
      model,
      config: { name, model, temperature },
    };
  });
}

/**
 * Round robin over every `players_per_game` combination of models. Games of
 * one matchup run in parallel with seats rotated; ratings are applied after
 * the matchup in game order, then saved.
 */
export async function runTournament(config: TournamentConfig, deps: TournamentDeps): Promise<TournamentSummary> {
  const def = getGameDefinition(config.game);
  const perGame = config.players_per_game ?? def.defaultPlayers;
  if (perGame < def.minPlayers || perGame > def.maxPlayers) {
    throw new Error(`${def.displayName} needs ${def.minPlayers}-${def.maxPlayers} players per game, got ${perGame}`);
  }
  const models = [...new Set(config.models)];
  if (models.length < perGame) {
    throw new Error(`Need at least ${perGame} distinct models for ${def.displayName}, got ${models.length}`);
  }

  const seed = config.seed ?? randomSeed();
  const matchups = combinations(models, perGame);
  const results: TournamentGameResult[] = [];
  const tallies = new Map<string, Omit<ModelStanding, 'model' | 'rating'>>(
    models.map(m => [m, { wins: 0, losses: 0, draws: 0, aborted: 0 }] as const)
  );

  for (const [m, matchup] of matchups.entries()) {
    deps.logger?.log({ type: 'SYSTEM', content: `Matchup ${m + 1}/${matchups.length}: ${matchup.join(' vs ')}` });

    const runs = Array.from({ length: config.games_per_matchup }, (_, g) => {
      const seats = rotate(matchup, g);
      const players = seatPlayers(seats, config.temperature);
      const gameSeed = fnv1a32(`${seed}|${m}|${g}`);
      const game = createGame(
        {
          gameId: `${config.game}-${seed}-m${m + 1}-g${g + 1}`,
          gameType: config.game,
          seed: gameSeed,
          players: players.map(p => ({ id: p.id, name: p.config.name })),
          maxRounds: config.max_rounds,
          options: config.options,
        },
        { oracle: deps.createOracle(players, gameSeed), maxAttempts: config.max_attempts }
      );
      const detach = deps.logger?.attach(game);
      return game
        .run()
        .finally(() => detach?.())
        .then(outcome => ({ g, seats, players, gameSeed, outcome }));
    });
    const finished = await Promise.all(runs);

    for (const { g, seats, players, gameSeed, outcome } of finished) {
      const modelOf = new Map(players.map(p => [p.id, p.model] as const));
      const winners = outcome.winners.flatMap(id => modelOf.get(id) ?? []);
      const ratingChanges = deps.store.record({
        gameId: outcome.gameId,
        gameType: config.game,
        termination: outcome.termination,
        kind: outcome.kind,
        players: seats,
        winners,
      });

      for (const model of seats) {
        const tally = tallies.get(model);
        if (!tally) continue;
        if (outcome.kind === 'aborted') tally.aborted++;
        else if (outcome.kind === 'draw') tally.draws++;
        else if (winners.includes(model)) tally.wins++;
        else tally.losses++;
      }

      results.push({ matchup: m + 1, game: g + 1, seed: gameSeed, seats, outcome, winners, ratingChanges });
      const label = outcome.kind === 'win' ? `winners ${winners.map(displayName).join(', ')}` : outcome.kind;
      deps.logger?.log({ type: 'SYSTEM', content: `  Game ${g + 1}: ${label} (${outcome.termination})` });
    }
    deps.store.save();
  }

  const standings = models
    .map(model => ({
      model,
      rating: deps.store.getRating(config.game, model),
      ...(tallies.get(model) ?? { wins: 0, losses: 0, draws: 0, aborted: 0 }),
    }))
    .sort((a, b) => b.rating - a.rating || a.model.localeCompare(b.model));

  return { gameType: config.game, seed, matchups: matchups.length, games: results, standings };
}
