import type { OutcomeKind } from '../engine/types.js';

export const DEFAULT_RATING = 1500;
export const K_FACTOR = 32;

export function expectedScore(ratingA: number, ratingB: number): number {
  return 1 / (1 + 10 ** ((ratingB - ratingA) / 400));
}

/** A finished game in rating terms; keys are whatever the ratings are keyed by. */
export interface RatedResult {
  kind: OutcomeKind;
  players: readonly string[];
  winners: readonly string[];
}

/**
 * Pairwise Elo for any table size. Each player's change is the average of
 * K * (actual - expected) over the opponents it is scored against: a winner
 * against every loser (1 / 0), or everyone against everyone at 0.5 in a
 * draw. Teammates are not scored against each other. Aborted games change
 * nothing.
 */
export function updateRatings(
  ratings: Readonly<Record<string, number>>,
  result: RatedResult,
  k: number = K_FACTOR
): Record<string, number> {
  const current = (id: string) => ratings[id] ?? DEFAULT_RATING;
  const next: Record<string, number> = { ...ratings };
  for (const id of result.players) next[id] = current(id);
  if (result.kind === 'aborted' || result.players.length < 2) return next;

  const winners = new Set(result.winners);
  for (const p1 of result.players) {
    let total = 0;
    let opponents = 0;
    for (const p2 of result.players) {
      if (p1 === p2) continue;
      let actual: number;
      if (result.kind === 'draw') actual = 0.5;
      else if (winners.has(p1) === winners.has(p2)) continue;
      else actual = winners.has(p1) ? 1 : 0;
      total += k * (actual - expectedScore(current(p1), current(p2)));
      opponents++;
    }
    if (opponents > 0) next[p1] = current(p1) + total / opponents;
  }
  return next;
}
