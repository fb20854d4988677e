import type { ParticipantId } from '../../engine/types.js';
import type { MafiaRole } from './roles.js';

export type NightActionIntent =
  | { kind: 'kill'; actor: ParticipantId; target: ParticipantId }
  | { kind: 'protect'; actor: ParticipantId; target: ParticipantId }
  | { kind: 'investigate'; actor: ParticipantId; target: ParticipantId };

export type InvestigationResult = 'MAFIA' | 'NOT_MAFIA';

export interface ResolvedInvestigation {
  actor: ParticipantId;
  target: ParticipantId;
  result: InvestigationResult;
}

export interface ResolvedKill {
  actor: ParticipantId;
  target: ParticipantId;
  prevented: boolean;
}

export interface ResolvedNightActions {
  protectedPlayers: Set<ParticipantId>;
  kills: ResolvedKill[];
  deaths: Set<ParticipantId>;
  investigations: ResolvedInvestigation[];
}

export interface NightResolutionInput {
  actions: NightActionIntent[];
  rolesById: Record<ParticipantId, MafiaRole>;
  alive: ParticipantId[];
}

/**
 * Applies a night's intents in role order: protections first, then kills,
 * then investigations. Pure; the caller mutates state from the result.
 */
export function resolveNightActions(input: NightResolutionInput): ResolvedNightActions {
  const alive = new Set(input.alive);
  const protectedPlayers = new Set<ParticipantId>();
  const kills: ResolvedKill[] = [];
  const deaths = new Set<ParticipantId>();
  const investigations: ResolvedInvestigation[] = [];

  // 1. Protection.
  for (const a of input.actions) {
    if (a.kind !== 'protect') continue;
    if (!alive.has(a.actor) || !alive.has(a.target)) continue;
    protectedPlayers.add(a.target);
  }

  // 2. Kills.
  for (const a of input.actions) {
    if (a.kind !== 'kill') continue;
    if (!alive.has(a.actor) || !alive.has(a.target)) continue;
    // Mafia never kill their own.
    if (input.rolesById[a.target] === 'mafia') continue;
    const prevented = protectedPlayers.has(a.target);
    kills.push({ actor: a.actor, target: a.target, prevented });
    if (!prevented) deaths.add(a.target);
  }

  // 3. Investigations see the true alignment.
  for (const a of input.actions) {
    if (a.kind !== 'investigate') continue;
    if (!alive.has(a.actor)) continue;
    const result: InvestigationResult = input.rolesById[a.target] === 'mafia' ? 'MAFIA' : 'NOT_MAFIA';
    investigations.push({ actor: a.actor, target: a.target, result });
  }

  return { protectedPlayers, kills, deaths, investigations };
}
