import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { EventBus, GameEvent, Unsubscribe } from './events/index.js';
import type { GameLogEntry, GameLogMetadata, LogType } from './types.js';
import { envFlag, slugify } from './utils.js';

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  PHASE: chalk.cyan.bold,
  CHAT: chalk.white,
  ACTION: chalk.yellow,
  VOTE: chalk.blue,
  REJECTED: chalk.red,
  RESOLUTION: chalk.magenta,
  WIN: chalk.green.bold,
  THOUGHT: chalk.gray.italic,
};

const PLAYER_COLOR = chalk.hex('#FFA500');

const VOTE_TOOLS = new Set(['vote', 'cast_vote', 'skip_vote', 'nominate']);

function entryTypeForTool(tool: string): LogType {
  if (tool === 'make_statement') return 'CHAT';
  if (VOTE_TOOLS.has(tool)) return 'VOTE';
  return 'ACTION';
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** A game being recorded: its raw events plus the log entries derived from them. */
interface GameRecording {
  gameId: string;
  names: Map<string, string>;
  events: GameEvent[];
  entries: GameLogEntry[];
  eventFile: string;
  transcriptFile: string;
}

export interface GameLoggerOptions {
  logDir?: string;
}

export class GameLogger {
  private logDir: string;
  private knownPlayers: Set<string> = new Set();
  private consoleOutputEnabled = true;
  private persistenceEnabled = true;
  private readonly printThoughts = envFlag('ARENA_PRINT_THOUGHTS');
  private subscribers: Set<(entry: GameLogEntry) => void> = new Set();
  private recordings = new Map<string, GameRecording>();

  constructor(opts?: GameLoggerOptions) {
    this.logDir = opts?.logDir ?? path.join(process.cwd(), 'logs');
  }

  /**
   * Enable or disable writing event logs / transcripts to disk. Dry runs and
   * tests turn this off so they don't accumulate files under logs/.
   */
  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  subscribe(cb: (entry: GameLogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  /** Where the event log of an attached game is (or would be) written. */
  eventFileFor(gameId: string): string | undefined {
    return this.recordings.get(gameId)?.eventFile;
  }

  log(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry: GameLogEntry = {
      id: crypto.randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    this.handleEntry(fullEntry);
    return fullEntry;
  }

  /**
   * Records every event a game emits, prints the derived log lines and
   * persists the event list and a public transcript as the game goes.
   */
  attach(game: { gameId: string; events: EventBus<GameEvent> }): Unsubscribe {
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const suffix = slugify(game.gameId);
    const recording: GameRecording = {
      gameId: game.gameId,
      names: new Map(),
      events: [],
      entries: [],
      eventFile: path.join(this.logDir, `game-${stamp}-${suffix}.json`),
      transcriptFile: path.join(this.logDir, `transcript-${stamp}-${suffix}.txt`),
    };
    this.recordings.set(game.gameId, recording);

    return game.events.subscribe(event => {
      recording.events.push(event);
      if (event.type === 'game_started') {
        for (const p of event.participants) recording.names.set(p.id, p.name);
        this.knownPlayers = new Set([...this.knownPlayers, ...event.participants.map(p => p.name)]);
      }
      for (const entry of this.entriesFor(event, recording)) {
        recording.entries.push(entry);
        this.handleEntry(entry);
      }
      this.flush(recording);
    });
  }

  private entriesFor(event: GameEvent, rec: GameRecording): GameLogEntry[] {
    const name = (id: string) => rec.names.get(id) ?? id;
    const base = (type: LogType, content: string, metadata: GameLogMetadata, player?: string): GameLogEntry => ({
      id: crypto.randomUUID(),
      timestamp: event.timestamp,
      type,
      content,
      ...(player ? { player } : {}),
      metadata: { gameId: event.gameId, seq: event.seq, ...metadata },
    });

    switch (event.type) {
      case 'game_started':
        return [
          base(
            'SYSTEM',
            `Starting ${event.gameType} (seed ${event.seed}) with ${event.participants.map(p => p.name).join(', ')}`,
            { visibility: 'public' }
          ),
        ];
      case 'phase_changed': {
        const { phase } = event;
        return [
          base('PHASE', `${phase.description} [${phase.discipline}]`, {
            visibility: 'public',
            phase: phase.id,
            round: phase.round,
          }),
        ];
      }
      case 'action_rejected':
        return [
          base(
            'REJECTED',
            `attempt ${event.attempt} rejected (${event.error}): ${event.message}`,
            { visibility: 'private', audience: [event.actor], phase: event.phase, round: event.round },
            name(event.actor)
          ),
        ];
      case 'action_applied': {
        const { outcome } = event;
        const substituted = event.substituted ? ` (default action: ${event.substituted})` : '';
        return [
          base(
            entryTypeForTool(event.action.tool),
            `${outcome.description}${substituted}`,
            {
              visibility: outcome.visibleTo === 'all' ? 'public' : 'private',
              ...(outcome.visibleTo === 'all' ? {} : { audience: outcome.visibleTo }),
              phase: event.phase,
              round: event.round,
              tool: event.action.tool,
            },
            name(event.actor)
          ),
        ];
      }
      case 'phase_resolved':
        return event.resolution.summary.map(line =>
          base('RESOLUTION', line, { visibility: 'public', phase: event.phase, round: event.round, kind: event.resolution.kind })
        );
      case 'safety_valve_triggered':
        return [base('SYSTEM', `Safety valve: ${event.reason}`, { visibility: 'public', round: event.round })];
      case 'game_aborted':
        return [base('SYSTEM', `Game aborted: ${event.reason}`, { visibility: 'public' })];
      case 'game_ended': {
        const { outcome } = event;
        const winners = outcome.winners.map(name).join(', ');
        const headline =
          outcome.kind === 'win'
            ? `${winners} win (${outcome.termination}): ${outcome.reason}`
            : `Game ended in ${outcome.kind === 'draw' ? 'a draw' : 'an abort'} (${outcome.termination}): ${outcome.reason}`;
        return [base('WIN', headline, { visibility: 'public', round: outcome.rounds })];
      }
    }
  }

  private handleEntry(entry: GameLogEntry) {
    for (const sub of this.subscribers) {
      try {
        sub(entry);
      } catch (error) {
        // A broken subscriber is reported, never rethrown into the game loop.
        if (this.consoleOutputEnabled) console.error(chalk.red(`Log subscriber failed: ${String(error)}`));
      }
    }

    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'THOUGHT' && !this.printThoughts) return;
    console.log(this.formatLine(entry));
  }

  formatLine(entry: GameLogEntry): string {
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);
    const privateTag = entry.metadata?.visibility === 'private' ? chalk.gray(' (private)') : '';
    const playerInfo = entry.player ? ` <${PLAYER_COLOR(entry.player)}>` : '';

    let content = entry.content;
    if (this.knownPlayers.size > 0) {
      const names = Array.from(this.knownPlayers).map(escapeRegExp);
      const playerPattern = new RegExp(`\\b(${names.join('|')})\\b`, 'g');
      content = content.replace(playerPattern, match => PLAYER_COLOR(match));
    }

    return `${prefix} ${typeStr}${privateTag}${playerInfo}: ${content}`;
  }

  private flush(rec: GameRecording) {
    if (!this.persistenceEnabled) return;
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.writeFileSync(rec.eventFile, JSON.stringify(rec.events, null, 2));
    fs.writeFileSync(rec.transcriptFile, buildTranscriptText(rec.entries));
  }
}

/** Public lines only; private entries and thoughts never reach the transcript. */
export function buildTranscriptText(entries: readonly GameLogEntry[]): string {
  const lines: string[] = [];

  for (const entry of entries) {
    if (entry.metadata?.visibility !== 'public') continue;
    if (entry.type === 'THOUGHT' || entry.type === 'REJECTED') continue;

    switch (entry.type) {
      case 'PHASE':
        lines.push('', `== ${entry.content} ==`);
        break;
      case 'CHAT':
        lines.push(entry.content);
        break;
      case 'WIN':
        lines.push('', `[WIN] ${entry.content}`);
        break;
      default:
        lines.push(`[${entry.type}] ${entry.content}`);
    }
  }

  return `${lines.join('\n').trimStart()}\n`;
}

export const logger = new GameLogger();
