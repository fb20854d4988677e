import { z } from 'zod';
import { InvariantViolationError } from '../../engine/errors.js';
import { SeededRandom } from '../../engine/rng.js';
import type {
  ActionOutcome,
  ActionSchema,
  BaseGameState,
  GameRules,
  GameSetup,
  NextPhase,
  ParticipantId,
  ParticipantSummary,
  Resolution,
  TerminalResult,
  TurnDiscipline,
} from '../../engine/types.js';
import { announce, nameOf, notesFor, publicLogLines, requireParticipant, seatParticipants, tellPrivately } from '../shared/participants.js';
import {
  applyMove,
  buildPots,
  buildQueue,
  canAct,
  checkMove,
  commitChips,
  createBettingState,
  isBettingComplete,
  isLive,
  minRaiseTo,
  potTotal,
  seatsAfter,
  splitPot,
  startStreet,
  toCall,
  type BettingMove,
  type BettingState,
  type Street,
} from './betting.js';
import { formatCards, shuffledDeck, type Card } from './cards.js';
import { compareHandRanks, describeHand, evaluateHand, type HandRank } from './handEval.js';

export type PokerPhase = 'DEAL' | 'BETTING' | 'SHOWDOWN';
export type PokerRole = 'player';

export interface PokerAttrs {
  chips: number;
  handsWon: number;
  // Hand number in which the player ran out of chips.
  bustedHand: number | null;
}

export interface HandState {
  number: number;
  dealer: ParticipantId;
  smallBlind: ParticipantId;
  bigBlind: ParticipantId;
  deck: Card[];
  hole: Record<ParticipantId, Card[]>;
  board: Card[];
  street: Street;
  bet: BettingState;
  actions: string[];
  settled: boolean;
}

export const PokerOptionsSchema = z.object({
  starting_chips: z.number().int().positive().default(1000),
  small_blind: z.number().int().positive().default(10),
  big_blind: z.number().int().positive().default(20),
  max_hands: z.number().int().positive().optional(),
});

export interface PokerState extends BaseGameState<PokerPhase, PokerRole, PokerAttrs> {
  smallBlindAmount: number;
  bigBlindAmount: number;
  totalChips: number;
  maxHands: number;
  dealer: ParticipantId;
  hand: HandState | null;
}

const amount = z.coerce.number().int().positive();

export const PokerActionSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('fold'), args: z.object({}) }),
  z.object({ tool: z.literal('check'), args: z.object({}) }),
  z.object({ tool: z.literal('call'), args: z.object({}) }),
  z.object({ tool: z.literal('bet'), args: z.object({ amount }) }),
  z.object({ tool: z.literal('raise'), args: z.object({ to: amount }) }),
]);
export type PokerAction = z.infer<typeof PokerActionSchema>;

export type PokerResolution = Resolution<'hand_dealt' | 'street_dealt' | 'betting_closed' | 'hand_won' | 'showdown'>;

export interface PokerView {
  you: {
    id: ParticipantId;
    name: string;
    chips: number;
    holeCards: Card[];
    committedThisStreet: number;
    toCall: number;
  };
  hand: number;
  street: Street | null;
  board: Card[];
  pot: number;
  currentBet: number;
  minRaiseTo: number;
  dealer: string;
  blinds: string;
  players: Array<{ name: string; chips: number; committed: number; folded: boolean; allIn: boolean; busted: boolean }>;
  handActions: string[];
  table: string[];
  privateNotes: string[];
}

export const POKER_RULES_TEXT = `
No-limit Texas Hold'em. Everyone starts with the same stack; blinds are fixed.
Each hand: two hole cards each, betting preflop, flop (3 cards), turn and river (1 card each).
On your turn: fold, check (nothing to call), call, bet (no bet yet; minimum the big blind unless all-in), or raise to a total for this street (at least the current bet plus the last raise size, unless all-in).
The best five-card hand from hole and board cards wins; side pots form when players are all-in. Odd chips from a split pot go to the winners closest to the dealer's left.
The last player with chips wins.
`.trim();

function toMove(action: PokerAction): BettingMove {
  switch (action.tool) {
    case 'fold':
      return { kind: 'fold' };
    case 'check':
      return { kind: 'check' };
    case 'call':
      return { kind: 'call' };
    case 'bet':
      return { kind: 'bet', amount: action.args.amount };
    case 'raise':
      return { kind: 'raise', to: action.args.to };
  }
}

function nextStreet(street: Street): Street {
  switch (street) {
    case 'preflop':
      return 'flop';
    case 'flop':
      return 'turn';
    case 'turn':
    case 'river':
      return 'river';
  }
}

function draw(hand: HandState): Card {
  const card = hand.deck.shift();
  if (!card) throw new InvariantViolationError(`Deck exhausted in hand ${hand.number}`);
  return card;
}

export class PokerRules implements GameRules<PokerState, PokerAction, PokerView, PokerResolution> {
  readonly gameType = 'poker' as const;
  readonly rulesText = POKER_RULES_TEXT;
  readonly actionSchema = PokerActionSchema;

  setup(setup: GameSetup): PokerState {
    const options = PokerOptionsSchema.parse(setup.options);
    if (options.small_blind > options.big_blind) {
      throw new Error(`small_blind (${options.small_blind}) cannot exceed big_blind (${options.big_blind})`);
    }
    const participants = seatParticipants<PokerRole, PokerAttrs>(
      setup.players,
      setup.players.map(() => 'player'),
      () => ({ chips: options.starting_chips, handsWon: 0, bustedHand: null })
    );
    const first = participants[0];
    if (!first || participants.length < 2) throw new Error('Poker needs at least 2 players');

    return {
      gameId: setup.gameId,
      gameType: 'poker',
      seed: setup.seed,
      rng: new SeededRandom(setup.seed),
      phase: 'DEAL',
      round: 1,
      participants,
      actedThisPhase: [],
      publicLog: [],
      privateNotes: [],
      reveals: [],
      smallBlindAmount: options.small_blind,
      bigBlindAmount: options.big_blind,
      totalChips: options.starting_chips * participants.length,
      maxHands: options.max_hands ?? setup.maxRounds,
      dealer: first.id,
      hand: null,
    };
  }

  enterPhase(state: PokerState): void {
    switch (state.phase) {
      case 'DEAL':
        this.startHand(state);
        return;
      case 'BETTING': {
        const hand = this.requireHand(state);
        if (hand.street === 'preflop') {
          hand.bet.queue = buildQueue(hand.bet, hand.bigBlind);
          return;
        }
        startStreet(hand.bet, state.bigBlindAmount);
        hand.bet.queue = buildQueue(hand.bet, hand.dealer);
        return;
      }
      case 'SHOWDOWN':
        return;
    }
  }

  describePhase(state: PokerState): { discipline: TurnDiscipline; description: string } {
    const street = state.hand?.street ?? 'preflop';
    switch (state.phase) {
      case 'DEAL':
        return { discipline: 'sequential', description: `Hand ${state.round}: dealing` };
      case 'BETTING':
        return { discipline: 'sequential', description: `Hand ${state.round}: ${street} betting` };
      case 'SHOWDOWN':
        return { discipline: 'sequential', description: `Hand ${state.round}: showdown` };
    }
  }

  eligibleActors(state: PokerState): ParticipantId[] {
    const hand = state.hand;
    if (state.phase !== 'BETTING' || !hand || isBettingComplete(hand.bet)) return [];
    return hand.bet.queue.filter(id => canAct(hand.bet, id));
  }

  isPhaseComplete(state: PokerState): boolean {
    return this.eligibleActors(state).length === 0;
  }

  legalActions(state: PokerState, actor: ParticipantId): ActionSchema[] {
    if (this.eligibleActors(state)[0] !== actor) return [];
    const hand = this.requireHand(state);
    const chips = requireParticipant(state.participants, actor).attrs.chips;
    const owed = toCall(hand.bet, actor);
    const committed = hand.bet.committed[actor] ?? 0;
    const fold: ActionSchema = { tool: 'fold', description: 'Give up the hand.', params: {} };

    if (owed === 0) {
      const actions: ActionSchema[] = [{ tool: 'check', description: 'Pass without betting.', params: {} }];
      if (hand.bet.currentBet === 0) {
        actions.push({
          tool: 'bet',
          description: 'Open the betting.',
          params: {
            amount: { type: 'integer', description: 'Chips to bet', min: Math.min(state.bigBlindAmount, chips), max: chips },
          },
        });
      } else if (chips > 0) {
        actions.push(this.raiseSchema(hand.bet, committed, chips));
      }
      actions.push(fold);
      return actions;
    }

    const actions: ActionSchema[] = [
      { tool: 'call', description: `Call ${Math.min(owed, chips)}.`, params: {} },
    ];
    if (chips > owed) actions.push(this.raiseSchema(hand.bet, committed, chips));
    actions.push(fold);
    return actions;
  }

  validate(state: PokerState, actor: ParticipantId, action: PokerAction): void {
    const hand = this.requireHand(state);
    const account = requireParticipant(state.participants, actor).attrs;
    checkMove(hand.bet, account, actor, toMove(action), state.bigBlindAmount);
  }

  apply(state: PokerState, actor: ParticipantId, action: PokerAction): ActionOutcome {
    const hand = this.requireHand(state);
    const player = requireParticipant(state.participants, actor);
    const text = applyMove(hand.bet, player.attrs, actor, toMove(action), state.bigBlindAmount);
    const line = `${player.name} ${text}.`;
    hand.actions.push(`[${hand.street}] ${line}`);
    announce(state, text, actor);
    return {
      success: true,
      description: line,
      visibleTo: 'all',
      delta: { street: hand.street, chips: player.attrs.chips, pot: potTotal(hand.bet) },
    };
  }

  defaultAction(state: PokerState, actor: ParticipantId): PokerAction {
    const hand = state.hand;
    if (hand && toCall(hand.bet, actor) === 0) return { tool: 'check', args: {} };
    return { tool: 'fold', args: {} };
  }

  resolve(state: PokerState): PokerResolution {
    const hand = this.requireHand(state);
    switch (state.phase) {
      case 'DEAL': {
        const summary = [
          `Hand ${hand.number}. Dealer: ${nameOf(state, hand.dealer)}.`,
          ...hand.actions,
        ];
        return { kind: 'hand_dealt', summary };
      }
      case 'BETTING':
        return this.resolveBetting(state, hand);
      case 'SHOWDOWN':
        return this.resolveShowdown(state, hand);
    }
  }

  nextPhase(state: PokerState, resolution: PokerResolution): NextPhase<PokerPhase> {
    switch (resolution.kind) {
      case 'hand_dealt':
      case 'street_dealt':
        return { phase: 'BETTING', round: state.round };
      case 'betting_closed':
        return { phase: 'SHOWDOWN', round: state.round };
      case 'hand_won':
      case 'showdown':
        return { phase: 'DEAL', round: state.round + 1 };
    }
  }

  view(state: PokerState, viewer: ParticipantId): PokerView {
    const me = requireParticipant(state.participants, viewer);
    const hand = state.hand;
    const bet = hand?.bet;
    return {
      you: {
        id: me.id,
        name: me.name,
        chips: me.attrs.chips,
        holeCards: hand ? [...(hand.hole[viewer] ?? [])] : [],
        committedThisStreet: bet ? bet.committed[viewer] ?? 0 : 0,
        toCall: bet ? Math.min(toCall(bet, viewer), me.attrs.chips) : 0,
      },
      hand: state.round,
      street: hand && !hand.settled ? hand.street : null,
      board: hand ? [...hand.board] : [],
      pot: bet && hand && !hand.settled ? potTotal(bet) : 0,
      currentBet: bet ? bet.currentBet : 0,
      minRaiseTo: bet ? minRaiseTo(bet) : state.bigBlindAmount,
      dealer: nameOf(state, hand?.dealer ?? state.dealer),
      blinds: `${state.smallBlindAmount}/${state.bigBlindAmount}`,
      players: state.participants.map(p => ({
        name: p.name,
        chips: p.attrs.chips,
        committed: bet ? bet.committed[p.id] ?? 0 : 0,
        folded: bet ? bet.folded.includes(p.id) : false,
        allIn: bet ? bet.allIn.includes(p.id) : false,
        busted: !p.alive,
      })),
      handActions: hand ? [...hand.actions] : [],
      table: publicLogLines(state, 40),
      privateNotes: notesFor(state, viewer).slice(-5),
    };
  }

  publicView(state: PokerState): Record<string, unknown> {
    const hand = state.hand;
    return {
      hand: state.round,
      street: hand?.street ?? null,
      board: hand ? formatCards(hand.board) : '',
      pot: hand && !hand.settled ? potTotal(hand.bet) : 0,
      chips: Object.fromEntries(state.participants.map(p => [p.name, p.attrs.chips])),
    };
  }

  evaluate(state: PokerState): TerminalResult | null {
    if (state.hand && !state.hand.settled) return null;
    const holders = state.participants.filter(p => p.attrs.chips > 0);
    const winner = holders[0];
    if (holders.length !== 1 || !winner) return null;
    return {
      kind: 'win',
      termination: 'last_player_standing',
      reason: `${winner.name} holds all ${state.totalChips} chips.`,
      winners: [winner.id],
      ranking: this.ranking(state),
      metadata: { hands_played: state.hand?.number ?? 0 },
    };
  }

  roundLimit(state: PokerState): number {
    return state.maxHands;
  }

  summarize(state: PokerState): ParticipantSummary[] {
    return state.participants.map(p => ({
      id: p.id,
      name: p.name,
      role: p.role,
      team: p.id,
      alive: p.alive,
      stats: {
        chips: p.attrs.chips,
        handsWon: p.attrs.handsWon,
        ...(p.attrs.bustedHand !== null ? { bustedHand: p.attrs.bustedHand } : {}),
      },
    }));
  }

  checkInvariants(state: PokerState): void {
    const stacks = state.participants.reduce((sum, p) => sum + p.attrs.chips, 0);
    const inPot = state.hand && !state.hand.settled ? potTotal(state.hand.bet) : 0;
    if (stacks + inPot !== state.totalChips) {
      throw new InvariantViolationError(
        `Chip count mismatch: ${stacks} in stacks + ${inPot} in pot != ${state.totalChips}`
      );
    }
    for (const p of state.participants) {
      if (p.attrs.chips < 0) throw new InvariantViolationError(`${p.name} has a negative stack`);
    }
  }

  /** Chips first; among busted players, the later bust ranks higher. */
  ranking(state: PokerState): ParticipantId[] {
    return [...state.participants]
      .sort(
        (a, b) =>
          b.attrs.chips - a.attrs.chips ||
          (b.attrs.bustedHand ?? Infinity) - (a.attrs.bustedHand ?? Infinity) ||
          a.seat - b.seat
      )
      .map(p => p.id);
  }

  private raiseSchema(bet: BettingState, committed: number, chips: number): ActionSchema {
    const allInTo = committed + chips;
    return {
      tool: 'raise',
      description: 'Raise to a new total bet for this street.',
      params: {
        to: { type: 'integer', description: 'Total bet after raising', min: Math.min(minRaiseTo(bet), allInTo), max: allInTo },
      },
    };
  }

  private requireHand(state: PokerState): HandState {
    if (!state.hand) throw new InvariantViolationError('No hand in progress');
    return state.hand;
  }

  private startHand(state: PokerState): void {
    const seated = state.participants.filter(p => p.attrs.chips > 0).map(p => p.id);
    if (!seated.includes(state.dealer)) {
      const order = state.participants.map(p => p.id);
      state.dealer = seatsAfter(order, state.dealer).find(id => seated.includes(id)) ?? state.dealer;
    }
    const dealer = state.dealer;
    const afterDealer = seatsAfter(seated, dealer);
    // Heads-up the dealer posts the small blind.
    const smallBlind = seated.length === 2 ? dealer : afterDealer[0];
    const bigBlind = smallBlind === undefined ? undefined : seatsAfter(seated, smallBlind)[0];
    if (smallBlind === undefined || bigBlind === undefined) {
      throw new InvariantViolationError('A hand needs at least two players with chips');
    }

    const bet = createBettingState(seated, state.bigBlindAmount);
    const hand: HandState = {
      number: state.round,
      dealer,
      smallBlind,
      bigBlind,
      deck: shuffledDeck(state.rng),
      hole: {},
      board: [],
      street: 'preflop',
      bet,
      actions: [],
      settled: false,
    };
    state.hand = hand;

    for (let pass = 0; pass < 2; pass++) {
      for (const id of afterDealer) (hand.hole[id] ??= []).push(draw(hand));
    }
    for (const id of seated) {
      tellPrivately(state, [id], `Hand ${hand.number}: your hole cards are ${formatCards(hand.hole[id] ?? [])}.`);
    }

    const post = (id: ParticipantId, size: number, label: string) => {
      const player = requireParticipant(state.participants, id);
      const paid = commitChips(bet, player.attrs, id, size);
      const line = `${player.name} posts the ${label} of ${paid}${bet.allIn.includes(id) ? ' and is all-in' : ''}.`;
      hand.actions.push(`[preflop] ${line}`);
      announce(state, line);
    };
    post(smallBlind, state.smallBlindAmount, 'small blind');
    post(bigBlind, state.bigBlindAmount, 'big blind');
    bet.currentBet = Math.max(bet.committed[smallBlind] ?? 0, bet.committed[bigBlind] ?? 0);
  }

  private resolveBetting(state: PokerState, hand: HandState): PokerResolution {
    const live = hand.bet.order.filter(id => isLive(hand.bet, id));
    const lone = live[0];
    if (live.length === 1 && lone !== undefined) {
      const pot = potTotal(hand.bet);
      const winner = requireParticipant(state.participants, lone);
      winner.attrs.chips += pot;
      winner.attrs.handsWon += 1;
      const line = `${winner.name} wins ${pot} uncontested.`;
      announce(state, line);
      this.settleHand(state, hand);
      return { kind: 'hand_won', summary: [line] };
    }

    const bettors = live.filter(id => canAct(hand.bet, id));
    if (hand.street === 'river' || bettors.length < 2) {
      return { kind: 'betting_closed', summary: [`Betting closed with ${potTotal(hand.bet)} in the pot.`] };
    }

    hand.street = nextStreet(hand.street);
    draw(hand);
    const count = hand.street === 'flop' ? 3 : 1;
    for (let i = 0; i < count; i++) hand.board.push(draw(hand));
    const line = `${hand.street.toUpperCase()}: ${formatCards(hand.board)}`;
    hand.actions.push(`[${hand.street}] ${line}`);
    announce(state, line);
    return { kind: 'street_dealt', summary: [line] };
  }

  private resolveShowdown(state: PokerState, hand: HandState): PokerResolution {
    const summary: string[] = [];
    if (hand.board.length < 5) {
      while (hand.board.length < 5) hand.board.push(draw(hand));
      summary.push(`Board runs out: ${formatCards(hand.board)}`);
    }

    const live = hand.bet.order.filter(id => isLive(hand.bet, id));
    const ranks = new Map<ParticipantId, HandRank>();
    for (const id of live) {
      const rank = evaluateHand(hand.hole[id] ?? [], hand.board);
      ranks.set(id, rank);
      summary.push(`${nameOf(state, id)} shows ${formatCards(hand.hole[id] ?? [])}: ${describeHand(rank)}.`);
    }

    const payoutOrder = seatsAfter(hand.bet.order, hand.dealer);
    const pots = buildPots(hand.bet);
    const paid = new Set<ParticipantId>();
    pots.forEach((pot, index) => {
      let best: HandRank | null = null;
      let winners: ParticipantId[] = [];
      for (const id of pot.eligible) {
        const rank = ranks.get(id);
        if (!rank) continue;
        const cmp = best ? compareHandRanks(rank, best) : 1;
        if (cmp > 0) {
          best = rank;
          winners = [id];
        } else if (cmp === 0) {
          winners.push(id);
        }
      }
      const label = index === 0 ? 'main pot' : `side pot ${index}`;
      for (const [id, share] of splitPot(pot.amount, winners, payoutOrder)) {
        const winner = requireParticipant(state.participants, id);
        winner.attrs.chips += share;
        paid.add(id);
        summary.push(`${winner.name} wins ${share} from the ${label}.`);
      }
    });
    for (const id of paid) requireParticipant(state.participants, id).attrs.handsWon += 1;

    for (const line of summary) announce(state, line);
    this.settleHand(state, hand);
    return { kind: 'showdown', summary };
  }

  private settleHand(state: PokerState, hand: HandState): void {
    hand.settled = true;
    for (const p of state.participants) {
      if (p.alive && p.attrs.chips === 0) {
        p.alive = false;
        p.attrs.bustedHand = hand.number;
        announce(state, `${p.name} is out of chips.`);
      }
    }
    const order = state.participants.map(p => p.id);
    const next = seatsAfter(order, hand.dealer).find(id => requireParticipant(state.participants, id).attrs.chips > 0);
    if (next) state.dealer = next;
  }
}

export const pokerRules = new PokerRules();
