#!/usr/bin/env node
import * as path from 'path';
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import { DryRunOracle, LlmAgent } from './agent.js';
import { AgentIO } from './agentIo.js';
import { loadConfig, loadTournamentConfig } from './config.js';
import type { DecisionOracle } from './engine/oracle.js';
import { randomSeed } from './engine/rng.js';
import type { Outcome } from './engine/types.js';
import { createGame, listGames } from './games/registry.js';
import { logger } from './logger.js';
import { RatingStore } from './ratings/store.js';
import { loadReplayEvents, resolveReplayPath } from './replay/loadReplay.js';
import { replayGame } from './replay/replayGame.js';
import { runTournament } from './tournament/runner.js';
import { GameTypeSchema, type GameType } from './types.js';
import { dryRunSeed, isDryRun, slugify } from './utils.js';

type Command = 'play' | 'tournament' | 'leaderboard' | 'replay' | 'games';
const COMMANDS: readonly Command[] = ['play', 'tournament', 'leaderboard', 'replay', 'games'];

interface CliArgs {
  command: Command;
  configFile?: string;
  dryRun: boolean;
  seed?: number;
  game?: GameType;
  store?: string;
  positional: string[];
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'play', dryRun: false, positional: [] };
  const rest = [...argv];
  const first = rest[0];
  if (first !== undefined && isCommand(first)) {
    args.command = first;
    rest.shift();
  }

  const valueFor = (flag: string, i: number): string => {
    const next = rest[i + 1];
    if (next === undefined) throw new Error(`Missing value for ${flag}`);
    return next;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) continue;

    // Package managers often forward a literal `--`.
    if (arg === '--') continue;

    if (arg === '--dry-run' || arg === '--dryrun') {
      args.dryRun = true;
      continue;
    }

    if (arg === '--seed') {
      const raw = valueFor(arg, i);
      const n = Number(raw);
      if (!Number.isInteger(n)) throw new Error(`Invalid seed "${raw}" for ${arg}`);
      args.seed = n;
      i++;
      continue;
    }

    if (arg === '--config') {
      args.configFile = valueFor(arg, i);
      i++;
      continue;
    }

    if (arg === '--game') {
      const raw = valueFor(arg, i);
      const parsed = GameTypeSchema.safeParse(raw);
      if (!parsed.success) throw new Error(`Unknown game "${raw}" (known: ${GameTypeSchema.options.join(', ')})`);
      args.game = parsed.data;
      i++;
      continue;
    }

    if (arg === '--store') {
      args.store = valueFor(arg, i);
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    args.positional.push(arg);
  }

  // `play game.yaml` works as well as `play --config game.yaml`.
  if (!args.configFile && args.command !== 'replay' && args.positional[0] !== undefined) {
    args.configFile = args.positional[0];
  }
  return args;
}

function requireGatewayKey(dryRun: boolean) {
  if (!dryRun && !process.env.AI_GATEWAY_API_KEY) {
    throw new Error(
      'Missing AI_GATEWAY_API_KEY. Add it to your .env file to authenticate with Vercel AI Gateway, or run with --dry-run.'
    );
  }
}

function enableDryRun(seed: number | undefined) {
  process.env.ARENA_DRY_RUN = '1';
  if (seed !== undefined) process.env.ARENA_DRY_RUN_SEED = String(seed);
  // Development runs should not accumulate logs/game-*.json files.
  logger.setPersistenceEnabled(false);
  logger.log({ type: 'SYSTEM', content: `Dry-run mode enabled (seed: ${process.env.ARENA_DRY_RUN_SEED ?? 'default'})` });
}

function printOutcome(outcome: Outcome) {
  const names = new Map(outcome.participants.map(p => [p.id, p.name] as const));
  const label = (id: string) => names.get(id) ?? id;
  console.log('');
  console.log(chalk.bold(`Result: ${outcome.kind} (${outcome.termination}) after ${outcome.rounds} round(s)`));
  console.log(`  ${outcome.reason}`);
  if (outcome.winners.length) console.log(`  Winners: ${outcome.winners.map(label).join(', ')}`);
  if (outcome.ranking) console.log(`  Ranking: ${outcome.ranking.map(label).join(' > ')}`);
  for (const p of outcome.participants) {
    const stats = Object.entries(p.stats)
      .map(([k, v]) => `${k}=${v}`)
      .join(' ');
    const status = p.alive ? chalk.green('alive') : chalk.gray('out');
    console.log(`  - ${p.name} [${p.role}/${p.team}] ${status}${stats ? ` ${stats}` : ''}`);
  }
}

async function play(args: CliArgs) {
  const dryRun = args.dryRun || isDryRun();
  if (dryRun) enableDryRun(args.seed);
  requireGatewayKey(dryRun);

  const config = loadConfig(path.resolve(process.cwd(), args.configFile ?? 'game-config.yaml'));
  const seed = args.seed ?? config.seed ?? randomSeed();

  const players = config.players.map(p => ({ ...p, id: p.id ?? slugify(p.name) }));
  const oracle: DecisionOracle = dryRun
    ? new DryRunOracle({ seed: dryRunSeed() })
    : new AgentIO(
        new Map(players.map(p => [p.id, new LlmAgent(p, { logThoughts: config.log_thoughts })] as const)),
        { decisionTimeoutMs: config.decision_timeout_ms }
      );

  const game = createGame(
    {
      gameId: `${config.game}-${new Date().toISOString().replace(/[:.]/g, '-')}`,
      gameType: config.game,
      seed,
      players: players.map(p => ({ id: p.id, name: p.name })),
      maxRounds: config.max_rounds,
      options: config.options,
    },
    { oracle, maxAttempts: config.max_attempts }
  );
  const detach = logger.attach(game);
  const onSigint = () => {
    logger.log({ type: 'SYSTEM', content: 'Interrupted; stopping at the next phase boundary.' });
    game.abort('interrupted by user');
  };
  process.once('SIGINT', onSigint);

  try {
    const outcome = await game.run();
    printOutcome(outcome);
    const file = logger.eventFileFor(game.gameId);
    if (!dryRun && file) console.log(chalk.gray(`\nEvent log: ${file}`));
  } finally {
    process.off('SIGINT', onSigint);
    detach();
  }
}

async function tournament(args: CliArgs) {
  if (!args.configFile) throw new Error('tournament needs --config <file>');
  const dryRun = args.dryRun || isDryRun();
  if (dryRun) enableDryRun(args.seed);
  requireGatewayKey(dryRun);

  const config = loadTournamentConfig(path.resolve(process.cwd(), args.configFile));
  if (args.seed !== undefined) config.seed = args.seed;
  const store = new RatingStore(args.store ?? config.ratings_file);

  const summary = await runTournament(config, {
    store,
    logger,
    createOracle: (players, seed) => {
      if (dryRun) return new DryRunOracle({ seed });
      const agents = new Map<string, DecisionOracle>();
      for (const p of players) agents.set(p.id, new LlmAgent(p.config));
      return new AgentIO(agents, { decisionTimeoutMs: config.decision_timeout_ms });
    },
  });

  console.log('');
  console.log(chalk.bold(`Tournament: ${summary.gameType}, ${summary.matchups} matchup(s), ${summary.games.length} game(s), seed ${summary.seed}`));
  for (const s of summary.standings) {
    console.log(
      `  ${s.rating.toFixed(1).padStart(7)}  ${s.model.padEnd(32)} W${s.wins} L${s.losses} D${s.draws}${s.aborted ? ` A${s.aborted}` : ''}`
    );
  }
  console.log(chalk.gray(`\nRatings saved to ${store.filePath}`));
}

function leaderboard(args: CliArgs) {
  const store = new RatingStore(args.store ?? 'ratings.json');
  const rows = store.leaderboard(args.game);
  if (rows.length === 0) {
    console.log('No rated games yet.');
    return;
  }
  console.log(chalk.bold(`Leaderboard${args.game ? ` (${args.game})` : ''}`));
  rows.forEach((row, i) => {
    console.log(
      `${String(i + 1).padStart(3)}. ${row.rating.toFixed(1).padStart(7)}  ${row.model.padEnd(32)} ${row.gameType.padEnd(14)} ` +
        `games ${row.games}  W${row.wins} L${row.losses} D${row.draws}`
    );
  });
}

async function replay(args: CliArgs) {
  const target = args.positional[0] ?? 'latest';
  const file = resolveReplayPath(target);
  logger.setPersistenceEnabled(false);
  logger.setConsoleOutputEnabled(false);
  const events = loadReplayEvents(file);
  const result = await replayGame(events);
  logger.setConsoleOutputEnabled(true);

  console.log(`Replayed ${result.actionsReplayed} action(s) from ${file}`);
  printOutcome(result.outcome);
  if (result.matches) {
    console.log(chalk.green('\nOutcome matches the recorded game.'));
    return;
  }
  console.log(chalk.red('\nOutcome differs from the recorded game:'));
  for (const d of result.differences) console.log(`  - ${d}`);
  process.exitCode = 1;
}

function games() {
  for (const def of listGames()) {
    const range = def.minPlayers === def.maxPlayers ? `${def.minPlayers}` : `${def.minPlayers}-${def.maxPlayers}`;
    console.log(`${chalk.bold(def.type.padEnd(14))} ${def.displayName.padEnd(16)} players ${range} (default ${def.defaultPlayers})`);
  }
}

async function main() {
  // Load local environment variables from .env
  dotenv.config();

  try {
    const args = parseArgs(process.argv.slice(2));
    switch (args.command) {
      case 'play':
        await play(args);
        return;
      case 'tournament':
        await tournament(args);
        return;
      case 'leaderboard':
        leaderboard(args);
        return;
      case 'replay':
        await replay(args);
        return;
      case 'games':
        games();
        return;
    }
  } catch (error) {
    console.error(chalk.red('Fatal Error:'), error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
