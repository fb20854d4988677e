import type { SeededRandom } from '../../engine/rng.js';

export const SECRET_HITLER_ROLES = ['liberal', 'fascist', 'hitler'] as const;
export type SecretHitlerRole = (typeof SECRET_HITLER_ROLES)[number];
export type SecretHitlerTeam = 'liberal' | 'fascist';

export const MIN_SH_PLAYERS = 5;
export const MAX_SH_PLAYERS = 10;

export const ROLE_BRIEFS: Record<SecretHitlerRole, string> = {
  liberal: 'Enact 5 Liberal policies or execute Hitler. You know nobody else\'s role.',
  fascist: 'Enact 6 Fascist policies, or get Hitler elected Chancellor once 3 Fascist policies are on the board. You know the Fascist team, Hitler included.',
  hitler: 'Same goals as the Fascists. Look trustworthy; if you are executed, the Liberals win.',
};

export function teamOf(role: SecretHitlerRole): SecretHitlerTeam {
  switch (role) {
    case 'liberal':
      return 'liberal';
    case 'fascist':
    case 'hitler':
      return 'fascist';
  }
}

/** Regular Fascists, not counting Hitler. */
export function fascistCountFor(playerCount: number): number {
  if (playerCount <= 6) return 1;
  if (playerCount <= 8) return 2;
  return 3;
}

export function hitlerKnowsFascists(playerCount: number): boolean {
  return playerCount <= 6;
}

export function roleListFor(playerCount: number): SecretHitlerRole[] {
  if (playerCount < MIN_SH_PLAYERS || playerCount > MAX_SH_PLAYERS) {
    throw new Error(`Secret Hitler needs ${MIN_SH_PLAYERS}-${MAX_SH_PLAYERS} players, got ${playerCount}`);
  }
  const roles: SecretHitlerRole[] = ['hitler'];
  for (let i = 0; i < fascistCountFor(playerCount); i++) roles.push('fascist');
  while (roles.length < playerCount) roles.push('liberal');
  return roles;
}

export function assignRoles(playerCount: number, rng: SeededRandom): SecretHitlerRole[] {
  return rng.shuffle(roleListFor(playerCount));
}
