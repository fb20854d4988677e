import { IllegalActionError } from '../../engine/errors.js';
import type { ParticipantId } from '../../engine/types.js';

export type Street = 'preflop' | 'flop' | 'turn' | 'river';

export interface ChipAccount {
  chips: number;
}

/** Betting bookkeeping for one hand. Chips themselves live on the accounts. */
export interface BettingState {
  // Players dealt into the hand, in seat order.
  order: ParticipantId[];
  // This street.
  committed: Record<ParticipantId, number>;
  // Whole hand; drives side pots.
  contributed: Record<ParticipantId, number>;
  currentBet: number;
  lastRaiseSize: number;
  folded: ParticipantId[];
  allIn: ParticipantId[];
  // Still owed a decision, in acting order.
  queue: ParticipantId[];
}

export type BettingMove =
  | { kind: 'fold' }
  | { kind: 'check' }
  | { kind: 'call' }
  | { kind: 'bet'; amount: number }
  | { kind: 'raise'; to: number };

export interface Pot {
  amount: number;
  eligible: ParticipantId[];
}

export function createBettingState(order: ParticipantId[], bigBlind: number): BettingState {
  const zero = (): Record<ParticipantId, number> => Object.fromEntries(order.map(id => [id, 0]));
  return {
    order: [...order],
    committed: zero(),
    contributed: zero(),
    currentBet: 0,
    lastRaiseSize: bigBlind,
    folded: [],
    allIn: [],
    queue: [],
  };
}

export function isLive(bet: BettingState, id: ParticipantId): boolean {
  return bet.order.includes(id) && !bet.folded.includes(id);
}

export function canAct(bet: BettingState, id: ParticipantId): boolean {
  return isLive(bet, id) && !bet.allIn.includes(id);
}

export function potTotal(bet: BettingState): number {
  return bet.order.reduce((sum, id) => sum + (bet.contributed[id] ?? 0), 0);
}

export function toCall(bet: BettingState, id: ParticipantId): number {
  return Math.max(0, bet.currentBet - (bet.committed[id] ?? 0));
}

/** Seat order starting with the seat after `after` (wrapping). */
export function seatsAfter(order: readonly ParticipantId[], after: ParticipantId): ParticipantId[] {
  const idx = order.indexOf(after);
  if (idx < 0) return [...order];
  return [...order.slice(idx + 1), ...order.slice(0, idx + 1)];
}

/**
 * Players who still owe a decision on a fresh street (or preflop), starting
 * after `after`. With fewer than two players able to bet there is nothing to
 * decide unless someone still has to call.
 */
export function buildQueue(bet: BettingState, after: ParticipantId): ParticipantId[] {
  const actors = seatsAfter(bet.order, after).filter(id => canAct(bet, id));
  if (actors.length <= 1 && actors.every(id => toCall(bet, id) === 0)) return [];
  return actors;
}

/** Moves up to `amount` chips from the account into the pot; returns what moved. */
export function commitChips(bet: BettingState, account: ChipAccount, id: ParticipantId, amount: number): number {
  const paid = Math.max(0, Math.min(amount, account.chips));
  account.chips -= paid;
  bet.committed[id] = (bet.committed[id] ?? 0) + paid;
  bet.contributed[id] = (bet.contributed[id] ?? 0) + paid;
  if (account.chips === 0 && !bet.allIn.includes(id)) bet.allIn.push(id);
  return paid;
}

/**
 * Complete once nobody who can still bet owes a decision, or when at most
 * one player is left in the hand.
 */
export function isBettingComplete(bet: BettingState): boolean {
  const live = bet.order.filter(id => isLive(bet, id));
  if (live.length <= 1) return true;
  return !bet.queue.some(id => canAct(bet, id));
}

export function minRaiseTo(bet: BettingState): number {
  return bet.currentBet + bet.lastRaiseSize;
}

/** Throws IllegalActionError when `move` is not available to `id` right now. */
export function checkMove(bet: BettingState, account: ChipAccount, id: ParticipantId, move: BettingMove, bigBlind: number): void {
  if (!canAct(bet, id)) throw new IllegalActionError('You cannot act in this hand');
  const owed = toCall(bet, id);
  const committed = bet.committed[id] ?? 0;

  switch (move.kind) {
    case 'fold':
      return;
    case 'check':
      if (owed > 0) throw new IllegalActionError(`Cannot check: ${owed} to call`);
      return;
    case 'call':
      if (owed === 0) throw new IllegalActionError('Nothing to call; check instead');
      return;
    case 'bet': {
      if (bet.currentBet > 0) throw new IllegalActionError(`There is already a bet of ${bet.currentBet}; raise instead`);
      if (move.amount <= 0) throw new IllegalActionError('Bet amount must be positive');
      if (move.amount < bigBlind && move.amount < account.chips) {
        throw new IllegalActionError(`Minimum bet is ${bigBlind} (or all-in for ${account.chips})`);
      }
      return;
    }
    case 'raise': {
      if (bet.currentBet === 0) throw new IllegalActionError('Nothing to raise; bet instead');
      if (account.chips <= owed) throw new IllegalActionError('Not enough chips to raise; call or fold');
      const allInTo = committed + account.chips;
      if (move.to <= bet.currentBet) throw new IllegalActionError(`Raise must be above the current bet of ${bet.currentBet}`);
      if (move.to < minRaiseTo(bet) && move.to < allInTo) {
        throw new IllegalActionError(`Minimum raise is to ${minRaiseTo(bet)} (or all-in to ${allInTo})`);
      }
      return;
    }
  }
}

function reopenAfter(bet: BettingState, raiser: ParticipantId): void {
  bet.queue = seatsAfter(bet.order, raiser).filter(id => id !== raiser && canAct(bet, id));
}

function finishTurn(bet: BettingState, id: ParticipantId): void {
  bet.queue = bet.queue.filter(q => q !== id);
}

/** Applies a checked move; returns a short description such as "calls 20". */
export function applyMove(bet: BettingState, account: ChipAccount, id: ParticipantId, move: BettingMove, bigBlind: number): string {
  const allInNote = () => (bet.allIn.includes(id) ? ' and is all-in' : '');

  switch (move.kind) {
    case 'fold':
      bet.folded.push(id);
      finishTurn(bet, id);
      return 'folds';
    case 'check':
      finishTurn(bet, id);
      return 'checks';
    case 'call': {
      const paid = commitChips(bet, account, id, toCall(bet, id));
      finishTurn(bet, id);
      return `calls ${paid}${allInNote()}`;
    }
    case 'bet': {
      commitChips(bet, account, id, move.amount);
      const total = bet.committed[id] ?? 0;
      bet.currentBet = total;
      bet.lastRaiseSize = Math.max(total, bigBlind);
      reopenAfter(bet, id);
      return `bets ${total}${allInNote()}`;
    }
    case 'raise': {
      const committed = bet.committed[id] ?? 0;
      commitChips(bet, account, id, move.to - committed);
      const total = bet.committed[id] ?? 0;
      const increment = total - bet.currentBet;
      // A short all-in raise does not change the minimum raise size.
      if (increment >= bet.lastRaiseSize) bet.lastRaiseSize = increment;
      bet.currentBet = Math.max(bet.currentBet, total);
      reopenAfter(bet, id);
      return `raises to ${total}${allInNote()}`;
    }
  }
}

/** Resets per-street state; the caller builds the new queue. */
export function startStreet(bet: BettingState, bigBlind: number): void {
  for (const id of bet.order) bet.committed[id] = 0;
  bet.currentBet = 0;
  bet.lastRaiseSize = bigBlind;
  bet.queue = [];
}

/**
 * Main pot plus side pots by contribution level. Chips from folded players
 * stay in the pot they reached; a level nobody live reached joins the pot
 * below it.
 */
export function buildPots(bet: BettingState): Pot[] {
  const levels = [...new Set(bet.order.map(id => bet.contributed[id] ?? 0).filter(v => v > 0))].sort((a, b) => a - b);
  const pots: Pot[] = [];
  let carry = 0;
  let prev = 0;

  for (const level of levels) {
    let amount = carry;
    carry = 0;
    for (const id of bet.order) {
      const c = bet.contributed[id] ?? 0;
      amount += Math.max(0, Math.min(c, level) - prev);
    }
    const eligible = bet.order.filter(id => isLive(bet, id) && (bet.contributed[id] ?? 0) >= level);
    prev = level;

    const last = pots[pots.length - 1];
    if (eligible.length === 0) {
      if (last) last.amount += amount;
      else carry = amount;
      continue;
    }
    if (last && last.eligible.join(',') === eligible.join(',')) {
      last.amount += amount;
      continue;
    }
    pots.push({ amount, eligible });
  }
  return pots;
}

/**
 * Even split; odd chips go one at a time to the winners in `payoutOrder`
 * (seats clockwise from the dealer's left).
 */
export function splitPot(amount: number, winners: readonly ParticipantId[], payoutOrder: readonly ParticipantId[]): Map<ParticipantId, number> {
  const ordered = payoutOrder.filter(id => winners.includes(id));
  const shares = new Map<ParticipantId, number>();
  if (ordered.length === 0) return shares;
  const base = Math.floor(amount / ordered.length);
  let remainder = amount - base * ordered.length;
  for (const id of ordered) {
    const extra = remainder > 0 ? 1 : 0;
    remainder -= extra;
    shares.set(id, base + extra);
  }
  return shares;
}
