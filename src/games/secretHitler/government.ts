import type { ParticipantId } from '../../engine/types.js';

export type ExecutivePower = 'investigate' | 'special_election' | 'peek' | 'execute';

export const CHAOS_THRESHOLD = 3;
export const LIBERAL_POLICIES_TO_WIN = 5;
export const FASCIST_POLICIES_TO_WIN = 6;
// Fascist policies on the board before a Hitler chancellorship wins.
export const HITLER_ZONE = 3;

const SMALL: Record<number, ExecutivePower | null> = { 1: null, 2: null, 3: 'peek', 4: 'execute', 5: 'execute' };
const MEDIUM: Record<number, ExecutivePower | null> = { 1: null, 2: 'investigate', 3: 'special_election', 4: 'execute', 5: 'execute' };
const LARGE: Record<number, ExecutivePower | null> = {
  1: 'investigate',
  2: 'investigate',
  3: 'special_election',
  4: 'execute',
  5: 'execute',
};

/** Power granted by the Nth Fascist policy, keyed on the starting table size. */
export function powerFor(playerCount: number, fascistPolicies: number): ExecutivePower | null {
  const table = playerCount <= 6 ? SMALL : playerCount <= 8 ? MEDIUM : LARGE;
  return table[fascistPolicies] ?? null;
}

export function describePowerTrack(playerCount: number): string {
  const slots: string[] = [];
  for (let n = 1; n <= 5; n++) slots.push(`${n}: ${powerFor(playerCount, n) ?? '-'}`);
  return slots.join(', ');
}

export interface TermLimitInput {
  alive: readonly ParticipantId[];
  previousPresident: ParticipantId | null;
  previousChancellor: ParticipantId | null;
}

/**
 * The last elected Chancellor is always term-limited; the last elected
 * President only while more than five players are alive.
 */
export function termLimited(input: TermLimitInput): ParticipantId[] {
  const limited: ParticipantId[] = [];
  if (input.previousChancellor && input.alive.includes(input.previousChancellor)) {
    limited.push(input.previousChancellor);
  }
  if (input.alive.length > 5 && input.previousPresident && input.alive.includes(input.previousPresident)) {
    limited.push(input.previousPresident);
  }
  return limited;
}

export function eligibleChancellors(input: TermLimitInput & { president: ParticipantId }): ParticipantId[] {
  const limited = new Set(termLimited(input));
  return input.alive.filter(id => id !== input.president && !limited.has(id));
}

/**
 * Next president in seat rotation after `fromSeat`, skipping dead seats.
 * Returns the seat index.
 */
export function nextPresidentSeat(seats: readonly ParticipantId[], alive: readonly ParticipantId[], fromSeat: number): number {
  for (let step = 1; step <= seats.length; step++) {
    const seat = (fromSeat + step) % seats.length;
    const id = seats[seat];
    if (id !== undefined && alive.includes(id)) return seat;
  }
  throw new Error('No living player can be president');
}

export type Ballot = 'ja' | 'nein';

export interface ElectionResult {
  ja: number;
  nein: number;
  passed: boolean;
}

/** Strict majority of cast votes; a tie fails. */
export function countElection(votes: Readonly<Record<ParticipantId, Ballot>>): ElectionResult {
  let ja = 0;
  let nein = 0;
  for (const vote of Object.values(votes)) {
    if (vote === 'ja') ja++;
    else nein++;
  }
  return { ja, nein, passed: ja > nein };
}
