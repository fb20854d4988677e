import { GameEngine } from '../../engine/gameEngine.js';
import type { GameDefinition } from '../types.js';
import { chessRules } from './chessRules.js';

export const chessGame: GameDefinition = {
  type: 'chess',
  displayName: 'Chess',
  minPlayers: 2,
  maxPlayers: 2,
  defaultPlayers: 2,
  rulesText: chessRules.rulesText,
  create: (setup, options) => new GameEngine(chessRules, setup, options),
};
