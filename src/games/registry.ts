import type { ArenaGame, EngineOptions } from '../engine/gameEngine.js';
import type { GameSetup } from '../engine/types.js';
import type { GameType } from '../types.js';
import { chessGame } from './chess/index.js';
import { impostorGame } from './impostor/index.js';
import { mafiaGame } from './mafia/index.js';
import { pokerGame } from './poker/index.js';
import { secretHitlerGame } from './secretHitler/index.js';
import type { GameDefinition } from './types.js';

export type { GameDefinition } from './types.js';

/** Built once at load; never mutated afterwards. */
export const GAME_REGISTRY: ReadonlyMap<GameType, GameDefinition> = new Map(
  [chessGame, pokerGame, mafiaGame, secretHitlerGame, impostorGame].map(def => [def.type, def] as const)
);

export function getGameDefinition(type: GameType): GameDefinition {
  const def = GAME_REGISTRY.get(type);
  if (!def) throw new Error(`Unknown game type: ${type}`);
  return def;
}

export function listGames(): GameDefinition[] {
  return [...GAME_REGISTRY.values()];
}

export function createGame(setup: GameSetup, options: EngineOptions): ArenaGame {
  const def = getGameDefinition(setup.gameType);
  const count = setup.players.length;
  if (count < def.minPlayers || count > def.maxPlayers) {
    const range = def.minPlayers === def.maxPlayers ? `${def.minPlayers}` : `${def.minPlayers}-${def.maxPlayers}`;
    throw new Error(`${def.displayName} needs ${range} players, got ${count}`);
  }
  const ids = new Set(setup.players.map(p => p.id));
  if (ids.size !== count) throw new Error('Player ids must be unique');
  return def.create(setup, options);
}
