import { GameEngine } from '../../engine/gameEngine.js';
import type { GameDefinition } from '../types.js';
import { pokerRules } from './pokerRules.js';

export const pokerGame: GameDefinition = {
  type: 'poker',
  displayName: "Texas Hold'em",
  minPlayers: 2,
  maxPlayers: 10,
  defaultPlayers: 4,
  rulesText: pokerRules.rulesText,
  create: (setup, options) => new GameEngine(pokerRules, setup, options),
};
