import type { SeededRandom } from '../../engine/rng.js';
import { allTaskSlots, type TaskAssignment } from './map.js';

export type ImpostorRole = 'impostor' | 'crewmate';
export type ImpostorTeam = 'impostor' | 'crew';

export const MIN_IMPOSTOR_PLAYERS = 4;
export const MAX_IMPOSTOR_PLAYERS = 10;
export const TASKS_PER_CREWMATE = 3;

export function teamOf(role: ImpostorRole): ImpostorTeam {
  switch (role) {
    case 'impostor':
      return 'impostor';
    case 'crewmate':
      return 'crew';
  }
}

/** Six-player tables get one or two impostors at random. */
export function impostorCountFor(playerCount: number, rng: SeededRandom): number {
  if (playerCount <= 5) return 1;
  if (playerCount === 6) return rng.pick([1, 2]);
  return 2;
}

export function assignRoles(playerCount: number, rng: SeededRandom): ImpostorRole[] {
  if (playerCount < MIN_IMPOSTOR_PLAYERS || playerCount > MAX_IMPOSTOR_PLAYERS) {
    throw new Error(`Impostor needs ${MIN_IMPOSTOR_PLAYERS}-${MAX_IMPOSTOR_PLAYERS} players, got ${playerCount}`);
  }
  const impostors = impostorCountFor(playerCount, rng);
  const roles: ImpostorRole[] = [];
  for (let i = 0; i < playerCount; i++) roles.push(i < impostors ? 'impostor' : 'crewmate');
  return rng.shuffle(roles);
}

/** Three distinct (room, task) pairs for a crewmate; impostors get none. */
export function generateTasks(role: ImpostorRole, rng: SeededRandom): TaskAssignment[] {
  if (role === 'impostor') return [];
  return rng
    .shuffle(allTaskSlots())
    .slice(0, TASKS_PER_CREWMATE)
    .map(slot => ({ ...slot, completed: false }));
}
