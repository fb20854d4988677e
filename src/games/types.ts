import type { ArenaGame, EngineOptions } from '../engine/gameEngine.js';
import type { GameSetup } from '../engine/types.js';
import type { GameType } from '../types.js';

export interface GameDefinition {
  type: GameType;
  displayName: string;
  minPlayers: number;
  maxPlayers: number;
  defaultPlayers: number;
  rulesText: string;
  create(setup: GameSetup, options: EngineOptions): ArenaGame;
}
