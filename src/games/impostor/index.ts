import { GameEngine } from '../../engine/gameEngine.js';
import type { GameDefinition } from '../types.js';
import { impostorRules } from './impostorRules.js';
import { MAX_IMPOSTOR_PLAYERS, MIN_IMPOSTOR_PLAYERS } from './roles.js';

export const impostorGame: GameDefinition = {
  type: 'impostor',
  displayName: 'Impostor',
  minPlayers: MIN_IMPOSTOR_PLAYERS,
  maxPlayers: MAX_IMPOSTOR_PLAYERS,
  defaultPlayers: 6,
  rulesText: impostorRules.rulesText,
  create: (setup, options) => new GameEngine(impostorRules, setup, options),
};
