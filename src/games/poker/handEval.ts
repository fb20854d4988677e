import { combinations } from '../../utils.js';
import { rankValue, suitOf, type Card } from './cards.js';

export const HandCategory = {
  HighCard: 0,
  OnePair: 1,
  TwoPair: 2,
  ThreeOfAKind: 3,
  Straight: 4,
  Flush: 5,
  FullHouse: 6,
  FourOfAKind: 7,
  StraightFlush: 8,
  RoyalFlush: 9,
} as const;
export type HandCategory = (typeof HandCategory)[keyof typeof HandCategory];

export const CATEGORY_NAMES: Record<HandCategory, string> = {
  0: 'High Card',
  1: 'One Pair',
  2: 'Two Pair',
  3: 'Three of a Kind',
  4: 'Straight',
  5: 'Flush',
  6: 'Full House',
  7: 'Four of a Kind',
  8: 'Straight Flush',
  9: 'Royal Flush',
};

export interface HandRank {
  category: HandCategory;
  // Compared left to right after the category.
  tiebreaks: number[];
  cards: Card[];
}

/** High card of a five-value straight, or null. The wheel (A-2-3-4-5) is five-high. */
function straightHigh(valuesDesc: readonly number[]): number | null {
  const unique = [...new Set(valuesDesc)];
  if (unique.length !== 5) return null;
  const [hi, , , , lo] = unique;
  if (hi === undefined || lo === undefined) return null;
  if (hi - lo === 4) return hi;
  if (unique.join(',') === '12,3,2,1,0') return 3;
  return null;
}

export function evaluateFive(cards: readonly Card[]): HandRank {
  if (cards.length !== 5) throw new Error(`evaluateFive needs 5 cards, got ${cards.length}`);
  const values = cards.map(rankValue).sort((a, b) => b - a);
  const flush = new Set(cards.map(suitOf)).size === 1;
  const high = straightHigh(values);

  // Groups ordered by size, then by rank.
  const counts = new Map<number, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  const groups = [...counts.entries()].sort((a, b) => b[1] - a[1] || b[0] - a[0]);
  const shape = groups.map(g => g[1]).join('');
  const byGroup = groups.map(g => g[0]);
  const rank = (category: HandCategory, tiebreaks: number[]): HandRank => ({ category, tiebreaks, cards: [...cards] });

  if (flush && high !== null) {
    return high === 12 ? rank(HandCategory.RoyalFlush, [12]) : rank(HandCategory.StraightFlush, [high]);
  }
  if (shape === '41') return rank(HandCategory.FourOfAKind, byGroup);
  if (shape === '32') return rank(HandCategory.FullHouse, byGroup);
  if (flush) return rank(HandCategory.Flush, values);
  if (high !== null) return rank(HandCategory.Straight, [high]);
  if (shape === '311') return rank(HandCategory.ThreeOfAKind, byGroup);
  if (shape === '221') return rank(HandCategory.TwoPair, byGroup);
  if (shape === '2111') return rank(HandCategory.OnePair, byGroup);
  return rank(HandCategory.HighCard, values);
}

/** Positive when `a` beats `b`, negative when it loses, 0 on an exact tie. */
export function compareHandRanks(a: HandRank, b: HandRank): number {
  if (a.category !== b.category) return a.category - b.category;
  const n = Math.max(a.tiebreaks.length, b.tiebreaks.length);
  for (let i = 0; i < n; i++) {
    const diff = (a.tiebreaks[i] ?? -1) - (b.tiebreaks[i] ?? -1);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** Best five-card hand out of hole + board (21 subsets for a full board). */
export function evaluateHand(hole: readonly Card[], board: readonly Card[]): HandRank {
  const all = [...hole, ...board];
  if (all.length < 5) throw new Error(`Need at least 5 cards to evaluate, got ${all.length}`);
  let best: HandRank | null = null;
  for (const five of combinations(all, 5)) {
    const candidate = evaluateFive(five);
    if (!best || compareHandRanks(candidate, best) > 0) best = candidate;
  }
  if (!best) throw new Error('No hand evaluated');
  return best;
}

export function describeHand(hand: HandRank): string {
  return `${CATEGORY_NAMES[hand.category]} (${hand.cards.join(' ')})`;
}
