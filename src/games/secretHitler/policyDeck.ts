import type { SeededRandom } from '../../engine/rng.js';

export type Policy = 'liberal' | 'fascist';

export const LIBERAL_POLICY_COUNT = 6;
export const FASCIST_POLICY_COUNT = 11;
export const TOTAL_POLICIES = LIBERAL_POLICY_COUNT + FASCIST_POLICY_COUNT;

export interface PolicyDeck {
  // Index 0 is the top of the pile.
  drawPile: Policy[];
  discardPile: Policy[];
}

export function createPolicyDeck(rng: SeededRandom): PolicyDeck {
  const drawPile: Policy[] = [];
  for (let i = 0; i < LIBERAL_POLICY_COUNT; i++) drawPile.push('liberal');
  for (let i = 0; i < FASCIST_POLICY_COUNT; i++) drawPile.push('fascist');
  return { drawPile: rng.shuffle(drawPile), discardPile: [] };
}

/** Shuffles the discards back in when fewer than `needed` cards remain. */
export function ensureDeckSize(deck: PolicyDeck, needed: number, rng: SeededRandom): boolean {
  if (deck.drawPile.length >= needed) return false;
  deck.drawPile.push(...deck.discardPile);
  deck.discardPile = [];
  rng.shuffle(deck.drawPile);
  return true;
}

export function drawPolicies(deck: PolicyDeck, count: number, rng: SeededRandom): Policy[] {
  ensureDeckSize(deck, count, rng);
  if (deck.drawPile.length < count) {
    throw new Error(`Policy deck has ${deck.drawPile.length} cards, cannot draw ${count}`);
  }
  return deck.drawPile.splice(0, count);
}

export function peekPolicies(deck: PolicyDeck, count: number, rng: SeededRandom): Policy[] {
  ensureDeckSize(deck, count, rng);
  return deck.drawPile.slice(0, count);
}

export function discardPolicies(deck: PolicyDeck, policies: readonly Policy[]): void {
  deck.discardPile.push(...policies);
}

export function formatPolicies(policies: readonly Policy[]): string {
  return policies.map((p, i) => `[${i}] ${p === 'liberal' ? 'Liberal' : 'Fascist'}`).join(', ');
}
