import type { ParticipantId } from '../../engine/types.js';

/** A cast ballot: a target id, or null for skip/abstain. */
export type Ballot = ParticipantId | null;

export interface VoteCount {
  target: ParticipantId;
  votes: number;
}

export interface VoteTally {
  // Sorted by votes (desc), then by first vote received.
  counts: VoteCount[];
  skips: number;
  eliminated: ParticipantId | null;
  // True when the top of the tally is shared (with skip, when skips compete).
  tied: boolean;
}

export interface TallyOptions {
  /**
   * When true (the default) null ballots form a pile the leader must beat
   * outright. When false they are abstentions: counted for the record only.
   */
  skipsCompete?: boolean;
}

/**
 * One ballot per voter. A target is eliminated only with strictly more votes
 * than every other target (and than the skip pile, when skips compete); any
 * tie at the top means nobody goes.
 */
export function tallyVotes(
  ballots: ReadonlyArray<readonly [ParticipantId, Ballot]>,
  { skipsCompete = true }: TallyOptions = {}
): VoteTally {
  const byTarget = new Map<ParticipantId, number>();
  let skips = 0;
  for (const [, ballot] of ballots) {
    if (ballot === null) {
      skips++;
      continue;
    }
    byTarget.set(ballot, (byTarget.get(ballot) ?? 0) + 1);
  }

  const counts = [...byTarget.entries()]
    .map(([target, votes]) => ({ target, votes }))
    .sort((a, b) => b.votes - a.votes);

  const blocking = skipsCompete ? skips : 0;
  const leader = counts[0];
  const runnerUp = counts[1]?.votes ?? 0;
  if (!leader || leader.votes <= blocking || leader.votes === runnerUp) {
    const top = Math.max(leader?.votes ?? 0, blocking);
    const atTop = counts.filter(c => c.votes === top).length + (blocking === top && top > 0 ? 1 : 0);
    return { counts, skips, eliminated: null, tied: atTop > 1 };
  }
  return { counts, skips, eliminated: leader.target, tied: false };
}

export function formatTally(tally: VoteTally, nameOf: (id: ParticipantId) => string, skipLabel = 'skip'): string {
  const parts = tally.counts.map(c => `${nameOf(c.target)}: ${c.votes}`);
  if (tally.skips > 0) parts.push(`${skipLabel}: ${tally.skips}`);
  return parts.length ? parts.join(', ') : 'no votes';
}
