import type { SeededRandom } from '../../engine/rng.js';

export const RANK_CHARS = ['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A'] as const;
export const SUIT_CHARS = ['c', 'd', 'h', 's'] as const;

export type RankChar = (typeof RANK_CHARS)[number];
export type SuitChar = (typeof SUIT_CHARS)[number];
export type Card = `${RankChar}${SuitChar}`;

const RANKS = RANK_CHARS.join('');

function buildDeck(): Card[] {
  const deck: Card[] = [];
  for (const r of RANK_CHARS) {
    for (const s of SUIT_CHARS) {
      const card: Card = `${r}${s}`;
      deck.push(card);
    }
  }
  return deck;
}

export const FULL_DECK: readonly Card[] = buildDeck();

/** 0 for a deuce up to 12 for an ace. */
export function rankValue(card: Card): number {
  return RANKS.indexOf(card.charAt(0));
}

export function suitOf(card: Card): string {
  return card.charAt(1);
}

export function isCard(value: string): value is Card {
  return FULL_DECK.some(card => card === value);
}

/** Parses a space- or comma-separated card list such as "Ah Kd 7c". */
export function parseCards(text: string): Card[] {
  return text
    .split(/[\s,]+/)
    .filter(Boolean)
    .map(token => {
      if (!isCard(token)) throw new Error(`Not a card: ${token}`);
      return token;
    });
}

export function shuffledDeck(rng: SeededRandom): Card[] {
  return rng.shuffle([...FULL_DECK]);
}

export function formatCards(cards: readonly Card[]): string {
  return cards.length ? cards.join(' ') : '(none)';
}
