import { GameEngine } from '../../engine/gameEngine.js';
import type { GameDefinition } from '../types.js';
import { mafiaRules } from './mafiaRules.js';
import { MAX_MAFIA_PLAYERS, MIN_MAFIA_PLAYERS } from './roles.js';

export const mafiaGame: GameDefinition = {
  type: 'mafia',
  displayName: 'Mafia',
  minPlayers: MIN_MAFIA_PLAYERS,
  maxPlayers: MAX_MAFIA_PLAYERS,
  defaultPlayers: 7,
  rulesText: mafiaRules.rulesText,
  create: (setup, options) => new GameEngine(mafiaRules, setup, options),
};
