import type { SeededRandom } from '../../engine/rng.js';

export const MAFIA_ROLES = ['mafia', 'doctor', 'detective', 'villager'] as const;
export type MafiaRole = (typeof MAFIA_ROLES)[number];
export type MafiaTeam = 'mafia' | 'town';

export const MIN_MAFIA_PLAYERS = 5;
export const MAX_MAFIA_PLAYERS = 16;

export interface RoleDefinition {
  role: MafiaRole;
  team: MafiaTeam;
  summary: string;
  abilities: string[];
}

export const ROLE_DEFINITIONS: Record<MafiaRole, RoleDefinition> = {
  mafia: {
    role: 'mafia',
    team: 'mafia',
    summary: 'Informed minority. Knows the other Mafia members.',
    abilities: ['Night: the first living Mafia member by seat chooses a non-Mafia player to kill.'],
  },
  doctor: {
    role: 'doctor',
    team: 'town',
    summary: 'Town protector.',
    abilities: ['Night: protect one player from the kill. Cannot protect the same player two nights in a row.'],
  },
  detective: {
    role: 'detective',
    team: 'town',
    summary: 'Town investigator.',
    abilities: ['Night: investigate one player and privately learn whether they are Mafia.'],
  },
  villager: {
    role: 'villager',
    team: 'town',
    summary: 'Uninformed town member.',
    abilities: ['No night action; wins by finding the Mafia through discussion and votes.'],
  },
};

export function teamOf(role: MafiaRole): MafiaTeam {
  switch (role) {
    case 'mafia':
      return 'mafia';
    case 'doctor':
    case 'detective':
    case 'villager':
      return 'town';
  }
}

export function mafiaCountFor(playerCount: number): number {
  return playerCount >= 7 ? 2 : 1;
}

/** Role list for a table size, unshuffled. */
export function roleListFor(playerCount: number): MafiaRole[] {
  if (playerCount < MIN_MAFIA_PLAYERS || playerCount > MAX_MAFIA_PLAYERS) {
    throw new Error(`Mafia needs ${MIN_MAFIA_PLAYERS}-${MAX_MAFIA_PLAYERS} players, got ${playerCount}`);
  }
  const mafia = mafiaCountFor(playerCount);
  const roles: MafiaRole[] = [];
  for (let i = 0; i < mafia; i++) roles.push('mafia');
  roles.push('doctor', 'detective');
  while (roles.length < playerCount) roles.push('villager');
  return roles;
}

export function assignRoles(playerCount: number, rng: SeededRandom): MafiaRole[] {
  return rng.shuffle(roleListFor(playerCount));
}

export function formatRoleSetup(playerCount: number): string {
  const counts = new Map<MafiaRole, number>();
  for (const role of roleListFor(playerCount)) counts.set(role, (counts.get(role) ?? 0) + 1);
  return MAFIA_ROLES.filter(r => counts.has(r))
    .map(r => `${counts.get(r) ?? 0}x ${r}`)
    .join(', ');
}
