import { GameEngine } from '../../engine/gameEngine.js';
import type { GameDefinition } from '../types.js';
import { MAX_SH_PLAYERS, MIN_SH_PLAYERS } from './roles.js';
import { secretHitlerRules } from './secretHitlerRules.js';

export const secretHitlerGame: GameDefinition = {
  type: 'secret-hitler',
  displayName: 'Secret Hitler',
  minPlayers: MIN_SH_PLAYERS,
  maxPlayers: MAX_SH_PLAYERS,
  defaultPlayers: 7,
  rulesText: secretHitlerRules.rulesText,
  create: (setup, options) => new GameEngine(secretHitlerRules, setup, options),
};
