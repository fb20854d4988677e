import { z } from 'zod';
import { IllegalActionError, InvariantViolationError } from '../../engine/errors.js';
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
import {
  aliveIds,
  announce,
  knownPlayers,
  nameOf,
  notesFor,
  publicLogLines,
  requireParticipant,
  resolveTarget,
  reveal,
  seatParticipants,
  tellPrivately,
  type KnownPlayer,
} from '../shared/participants.js';
import {
  CHAOS_THRESHOLD,
  FASCIST_POLICIES_TO_WIN,
  HITLER_ZONE,
  LIBERAL_POLICIES_TO_WIN,
  countElection,
  describePowerTrack,
  eligibleChancellors,
  nextPresidentSeat,
  powerFor,
  termLimited,
  type Ballot,
  type ExecutivePower,
} from './government.js';
import {
  TOTAL_POLICIES,
  createPolicyDeck,
  discardPolicies,
  drawPolicies,
  formatPolicies,
  peekPolicies,
  type Policy,
  type PolicyDeck,
} from './policyDeck.js';
import { ROLE_BRIEFS, assignRoles, hitlerKnowsFascists, teamOf, type SecretHitlerRole } from './roles.js';

export type SecretHitlerPhase =
  | 'DISCUSSION'
  | 'NOMINATION'
  | 'ELECTION'
  | 'LEGISLATIVE_PRESIDENT'
  | 'LEGISLATIVE_CHANCELLOR'
  | 'EXECUTIVE_ACTION';

export interface EnactedPolicy {
  round: number;
  policy: Policy;
  // Null when the policy came off the top of the deck after three failed elections.
  president: ParticipantId | null;
  chancellor: ParticipantId | null;
}

export interface SecretHitlerState extends BaseGameState<SecretHitlerPhase, SecretHitlerRole, Record<string, never>> {
  maxRounds: number;
  playerCount: number;
  deck: PolicyDeck;
  liberalPolicies: number;
  fascistPolicies: number;
  enacted: EnactedPolicy[];
  electionTracker: number;

  presidentSeat: number;
  president: ParticipantId;
  nominee: ParticipantId | null;
  chancellor: ParticipantId | null;
  previousPresident: ParticipantId | null;
  previousChancellor: ParticipantId | null;
  specialElectionPick: ParticipantId | null;

  votes: Record<ParticipantId, Ballot>;
  presidentHand: Policy[];
  chancellorHand: Policy[];
  pendingPower: ExecutivePower | null;
  peeked: Policy[];
  investigated: ParticipantId[];
  executed: Array<{ round: number; id: ParticipantId }>;
  hitlerElected: boolean;
  hitlerExecuted: boolean;
}

const target = z.string().min(1);
const index = z.coerce.number().int().min(0);

export const SecretHitlerActionSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('make_statement'), args: z.object({ statement: z.string().min(1) }) }),
  z.object({ tool: z.literal('pass'), args: z.object({}) }),
  z.object({ tool: z.literal('nominate'), args: z.object({ target }) }),
  z.object({ tool: z.literal('vote'), args: z.object({ vote: z.string().trim().toLowerCase().pipe(z.enum(['ja', 'nein'])) }) }),
  z.object({ tool: z.literal('discard'), args: z.object({ index }) }),
  z.object({ tool: z.literal('enact'), args: z.object({ index }) }),
  z.object({ tool: z.literal('investigate'), args: z.object({ target }) }),
  z.object({ tool: z.literal('special_election'), args: z.object({ target }) }),
  z.object({ tool: z.literal('acknowledge'), args: z.object({}) }),
  z.object({ tool: z.literal('execute'), args: z.object({ target }) }),
]);
export type SecretHitlerAction = z.infer<typeof SecretHitlerActionSchema>;

export type SecretHitlerResolution = Resolution<
  | 'discussion_closed'
  | 'nominated'
  | 'government_formed'
  | 'government_rejected'
  | 'chaos'
  | 'hitler_elected'
  | 'policies_passed'
  | 'policy_enacted'
  | 'power_granted'
  | 'power_used'
>;

export interface SecretHitlerView {
  you: { id: ParticipantId; name: string; role: SecretHitlerRole; team: string; alive: boolean; goal: string };
  phase: SecretHitlerPhase;
  round: number;
  players: KnownPlayer[];
  fascistTeam?: Array<{ name: string; role: SecretHitlerRole }>;
  board: {
    liberalPolicies: number;
    fascistPolicies: number;
    electionTracker: number;
    drawPile: number;
    discardPile: number;
    powerTrack: string;
  };
  president: string;
  nominee: string | null;
  chancellor: string | null;
  termLimited: string[];
  eligibleChancellors?: string[];
  yourPolicies?: string;
  peekedPolicies?: string;
  pendingPower?: ExecutivePower;
  policyHistory: string[];
  discussion: string[];
  privateNotes: string[];
}

export const SECRET_HITLER_RULES_TEXT = `
Secret Hitler. Liberals against Fascists and Hitler; Fascists know each other, Hitler knows them only in games of 5-6.
Each round: DISCUSSION -> the President nominates an eligible Chancellor -> everyone votes ja/nein at once (strict majority of ja passes).
A passed government: the President draws 3 policies and discards 1, the Chancellor enacts 1 of the remaining 2.
A failed vote advances the election tracker; on the third failure the top policy is enacted automatically and term limits reset.
The last elected Chancellor cannot be nominated; nor can the last elected President while more than 5 players are alive.
Some Fascist policies grant the President a power: investigate loyalty, call a special election, peek at the top 3 policies, or execute a player.
Liberals win with 5 Liberal policies or by executing Hitler. Fascists win with 6 Fascist policies or by electing Hitler Chancellor after 3 Fascist policies.
`.trim();

function policyName(policy: Policy): string {
  return policy === 'liberal' ? 'Liberal' : 'Fascist';
}

export class SecretHitlerRules
  implements GameRules<SecretHitlerState, SecretHitlerAction, SecretHitlerView, SecretHitlerResolution>
{
  readonly gameType = 'secret-hitler' as const;
  readonly rulesText = SECRET_HITLER_RULES_TEXT;
  readonly actionSchema = SecretHitlerActionSchema;

  setup(setup: GameSetup): SecretHitlerState {
    const rng = new SeededRandom(setup.seed);
    const roles = assignRoles(setup.players.length, rng);
    const participants = seatParticipants<SecretHitlerRole, Record<string, never>>(setup.players, roles, () => ({}));
    if (participants.filter(p => p.role === 'hitler').length !== 1) {
      throw new InvariantViolationError('Exactly one Hitler must be dealt');
    }
    const first = participants[0];
    if (!first) throw new Error('Secret Hitler needs players');

    return {
      gameId: setup.gameId,
      gameType: 'secret-hitler',
      seed: setup.seed,
      rng,
      phase: 'DISCUSSION',
      round: 1,
      participants,
      actedThisPhase: [],
      publicLog: [],
      privateNotes: [],
      reveals: [],
      maxRounds: setup.maxRounds,
      playerCount: participants.length,
      deck: createPolicyDeck(rng),
      liberalPolicies: 0,
      fascistPolicies: 0,
      enacted: [],
      electionTracker: 0,
      presidentSeat: 0,
      president: first.id,
      nominee: null,
      chancellor: null,
      previousPresident: null,
      previousChancellor: null,
      specialElectionPick: null,
      votes: {},
      presidentHand: [],
      chancellorHand: [],
      pendingPower: null,
      peeked: [],
      investigated: [],
      executed: [],
      hitlerElected: false,
      hitlerExecuted: false,
    };
  }

  enterPhase(state: SecretHitlerState): void {
    switch (state.phase) {
      case 'DISCUSSION':
        announce(
          state,
          `Round ${state.round}. Presidential candidate: ${nameOf(state, state.president)}. ` +
            `Board: ${state.liberalPolicies} Liberal, ${state.fascistPolicies} Fascist. Election tracker: ${state.electionTracker}.`
        );
        return;
      case 'ELECTION':
        state.votes = {};
        return;
      case 'NOMINATION':
      case 'LEGISLATIVE_PRESIDENT':
      case 'LEGISLATIVE_CHANCELLOR':
      case 'EXECUTIVE_ACTION':
        return;
    }
  }

  describePhase(state: SecretHitlerState): { discipline: TurnDiscipline; description: string } {
    const president = nameOf(state, state.president);
    switch (state.phase) {
      case 'DISCUSSION':
        return { discipline: 'sequential', description: `Round ${state.round} discussion` };
      case 'NOMINATION':
        return { discipline: 'sequential', description: `${president} nominates a Chancellor` };
      case 'ELECTION':
        return { discipline: 'simultaneous', description: 'Everyone votes on the proposed government' };
      case 'LEGISLATIVE_PRESIDENT':
        return { discipline: 'sequential', description: `${president} discards one of three policies` };
      case 'LEGISLATIVE_CHANCELLOR':
        return { discipline: 'sequential', description: 'The Chancellor enacts one of two policies' };
      case 'EXECUTIVE_ACTION':
        return { discipline: 'sequential', description: `${president} uses a presidential power: ${state.pendingPower ?? 'none'}` };
    }
  }

  eligibleActors(state: SecretHitlerState): ParticipantId[] {
    const acted = new Set(state.actedThisPhase);
    const pending = (ids: ParticipantId[]) => ids.filter(id => !acted.has(id));
    switch (state.phase) {
      case 'DISCUSSION':
      case 'ELECTION':
        return pending(aliveIds(state));
      case 'NOMINATION':
      case 'LEGISLATIVE_PRESIDENT':
        return pending([state.president]);
      case 'LEGISLATIVE_CHANCELLOR':
        return state.chancellor ? pending([state.chancellor]) : [];
      case 'EXECUTIVE_ACTION':
        return state.pendingPower ? pending([state.president]) : [];
    }
  }

  isPhaseComplete(state: SecretHitlerState): boolean {
    return this.eligibleActors(state).length === 0;
  }

  legalActions(state: SecretHitlerState, actor: ParticipantId): ActionSchema[] {
    if (!this.eligibleActors(state).includes(actor)) return [];
    const pick = (description: string, options: ParticipantId[]) => ({
      target: { type: 'string' as const, description, options },
    });

    switch (state.phase) {
      case 'DISCUSSION':
        return [
          {
            tool: 'make_statement',
            description: 'Say something to the table.',
            params: { statement: { type: 'string', description: 'What you say aloud' } },
          },
          { tool: 'pass', description: 'Stay silent.', params: {} },
        ];
      case 'NOMINATION':
        return [
          {
            tool: 'nominate',
            description: 'Nominate a Chancellor.',
            params: pick('Chancellor nominee', this.eligibleChancellors(state)),
          },
        ];
      case 'ELECTION':
        return [
          {
            tool: 'vote',
            description: 'Vote on the proposed government.',
            params: { vote: { type: 'string', description: 'ja to approve, nein to reject', options: ['ja', 'nein'] } },
          },
        ];
      case 'LEGISLATIVE_PRESIDENT':
        return [
          {
            tool: 'discard',
            description: 'Discard one policy; the other two go to the Chancellor.',
            params: { index: { type: 'integer', description: 'Index of the policy to discard', options: [0, 1, 2], min: 0, max: 2 } },
          },
        ];
      case 'LEGISLATIVE_CHANCELLOR':
        return [
          {
            tool: 'enact',
            description: 'Enact one of the two policies.',
            params: { index: { type: 'integer', description: 'Index of the policy to enact', options: [0, 1], min: 0, max: 1 } },
          },
        ];
      case 'EXECUTIVE_ACTION':
        return this.powerActions(state, actor);
    }
  }

  validate(state: SecretHitlerState, actor: ParticipantId, action: SecretHitlerAction): void {
    switch (action.tool) {
      case 'make_statement':
      case 'pass':
      case 'vote':
      case 'acknowledge':
        return;
      case 'nominate': {
        const t = resolveTarget(state.participants, action.args.target);
        const eligible = this.eligibleChancellors(state);
        if (!eligible.includes(t.id)) {
          const names = eligible.map(id => nameOf(state, id)).join(', ');
          throw new IllegalActionError(`${t.name} is not eligible for Chancellor. Eligible: ${names}`);
        }
        return;
      }
      case 'discard':
        if (action.args.index >= state.presidentHand.length) {
          throw new IllegalActionError(`Choose an index from 0 to ${state.presidentHand.length - 1}`);
        }
        return;
      case 'enact':
        if (action.args.index >= state.chancellorHand.length) {
          throw new IllegalActionError(`Choose an index from 0 to ${state.chancellorHand.length - 1}`);
        }
        return;
      case 'investigate': {
        const t = resolveTarget(state.participants, action.args.target);
        if (t.id === actor) throw new IllegalActionError('You cannot investigate yourself');
        if (state.investigated.includes(t.id)) throw new IllegalActionError(`${t.name} has already been investigated`);
        return;
      }
      case 'special_election':
      case 'execute': {
        const t = resolveTarget(state.participants, action.args.target);
        if (t.id === actor) throw new IllegalActionError('You cannot choose yourself');
        return;
      }
    }
  }

  apply(state: SecretHitlerState, actor: ParticipantId, action: SecretHitlerAction): ActionOutcome {
    const actorName = nameOf(state, actor);

    switch (action.tool) {
      case 'make_statement':
        announce(state, action.args.statement, actor);
        return { success: true, description: `${actorName}: ${action.args.statement}`, visibleTo: 'all' };
      case 'pass':
        announce(state, '(passes)', actor);
        return { success: true, description: `${actorName} passes.`, visibleTo: 'all' };
      case 'nominate': {
        const t = resolveTarget(state.participants, action.args.target);
        state.nominee = t.id;
        const line = `${actorName} nominates ${t.name} for Chancellor.`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all', delta: { nominee: t.id } };
      }
      case 'vote':
        state.votes[actor] = action.args.vote;
        return { success: true, description: `${actorName} votes ${action.args.vote}.`, visibleTo: [actor], delta: { vote: action.args.vote } };
      case 'discard': {
        const [discarded] = state.presidentHand.splice(action.args.index, 1);
        if (discarded) discardPolicies(state.deck, [discarded]);
        state.chancellorHand = state.presidentHand;
        state.presidentHand = [];
        if (state.chancellor) {
          tellPrivately(state, [state.chancellor], `The President hands you: ${formatPolicies(state.chancellorHand)}.`);
        }
        return {
          success: true,
          description: `${actorName} discards a ${discarded ? policyName(discarded) : ''} policy.`,
          visibleTo: [actor],
        };
      }
      case 'enact': {
        const enacted = state.chancellorHand[action.args.index];
        if (!enacted) throw new InvariantViolationError('Chancellor has no policy at that index');
        discardPolicies(state.deck, state.chancellorHand.filter((_, i) => i !== action.args.index));
        state.chancellorHand = [];
        this.enact(state, enacted, state.president, actor);
        const line = `A ${policyName(enacted)} policy is enacted (President ${nameOf(state, state.president)}, Chancellor ${actorName}).`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all', delta: { policy: enacted } };
      }
      case 'investigate': {
        const t = resolveTarget(state.participants, action.args.target);
        const team = teamOf(t.role);
        state.investigated.push(t.id);
        tellPrivately(state, [actor], `${t.name}'s party membership is ${team === 'liberal' ? 'Liberal' : 'Fascist'}.`);
        reveal(state, { subject: t.id, fact: 'team', value: team, to: [actor] });
        const line = `${actorName} investigates ${t.name}'s loyalty.`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all' };
      }
      case 'special_election': {
        const t = resolveTarget(state.participants, action.args.target);
        state.specialElectionPick = t.id;
        const line = `${actorName} calls a special election: ${t.name} is the next presidential candidate.`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all' };
      }
      case 'acknowledge': {
        const line = `${actorName} has looked at the top three policies.`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all' };
      }
      case 'execute': {
        const t = resolveTarget(state.participants, action.args.target);
        t.alive = false;
        state.executed.push({ round: state.round, id: t.id });
        let line = `${actorName} executes ${t.name}.`;
        if (t.role === 'hitler') {
          state.hitlerExecuted = true;
          reveal(state, { subject: t.id, fact: 'role', value: 'hitler', to: 'all' });
          line += ` ${t.name} was Hitler!`;
        } else {
          line += ` ${t.name} was not Hitler.`;
        }
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all', delta: { executed: t.id } };
      }
    }
  }

  defaultAction(state: SecretHitlerState, actor: ParticipantId): SecretHitlerAction {
    switch (state.phase) {
      case 'DISCUSSION':
        return { tool: 'pass', args: {} };
      case 'NOMINATION':
        return { tool: 'nominate', args: { target: this.eligibleChancellors(state)[0] ?? '' } };
      case 'ELECTION':
        return { tool: 'vote', args: { vote: 'nein' } };
      case 'LEGISLATIVE_PRESIDENT':
        return { tool: 'discard', args: { index: 0 } };
      case 'LEGISLATIVE_CHANCELLOR':
        return { tool: 'enact', args: { index: 0 } };
      case 'EXECUTIVE_ACTION': {
        const others = aliveIds(state).filter(id => id !== actor);
        switch (state.pendingPower) {
          case 'investigate':
            return { tool: 'investigate', args: { target: others.find(id => !state.investigated.includes(id)) ?? '' } };
          case 'special_election':
            return { tool: 'special_election', args: { target: others[0] ?? '' } };
          case 'execute':
            return { tool: 'execute', args: { target: others[0] ?? '' } };
          case 'peek':
          case null:
            return { tool: 'acknowledge', args: {} };
        }
      }
    }
  }

  resolve(state: SecretHitlerState): SecretHitlerResolution {
    switch (state.phase) {
      case 'DISCUSSION':
        return { kind: 'discussion_closed', summary: [] };
      case 'NOMINATION': {
        const nominee = state.nominee ? nameOf(state, state.nominee) : 'nobody';
        return { kind: 'nominated', summary: [`${nameOf(state, state.president)} nominated ${nominee}.`] };
      }
      case 'ELECTION':
        return this.resolveElection(state);
      case 'LEGISLATIVE_PRESIDENT':
        return { kind: 'policies_passed', summary: ['The President passes two policies to the Chancellor.'] };
      case 'LEGISLATIVE_CHANCELLOR':
        return this.resolveEnactment(state);
      case 'EXECUTIVE_ACTION': {
        const power = state.pendingPower;
        this.finishRound(state);
        return { kind: 'power_used', summary: [`Presidential power used: ${power ?? 'none'}.`] };
      }
    }
  }

  nextPhase(state: SecretHitlerState, resolution: SecretHitlerResolution): NextPhase<SecretHitlerPhase> {
    switch (resolution.kind) {
      case 'discussion_closed':
        return { phase: 'NOMINATION', round: state.round };
      case 'nominated':
        return { phase: 'ELECTION', round: state.round };
      case 'government_formed':
        return { phase: 'LEGISLATIVE_PRESIDENT', round: state.round };
      case 'policies_passed':
        return { phase: 'LEGISLATIVE_CHANCELLOR', round: state.round };
      case 'power_granted':
        return { phase: 'EXECUTIVE_ACTION', round: state.round };
      case 'hitler_elected':
      case 'government_rejected':
      case 'chaos':
      case 'policy_enacted':
      case 'power_used':
        return { phase: 'DISCUSSION', round: state.round + 1 };
    }
  }

  view(state: SecretHitlerState, viewer: ParticipantId): SecretHitlerView {
    const me = requireParticipant(state.participants, viewer);
    const fascists = state.participants.filter(p => teamOf(p.role) === 'fascist');
    const seesTeam = me.role === 'fascist' || (me.role === 'hitler' && hitlerKnowsFascists(state.playerCount));
    const teammates = new Set(seesTeam ? fascists.map(p => p.id) : []);
    const name = (id: ParticipantId | null) => (id ? nameOf(state, id) : null);
    const limited = termLimited({
      alive: aliveIds(state),
      previousPresident: state.previousPresident,
      previousChancellor: state.previousChancellor,
    });

    const view: SecretHitlerView = {
      you: { id: me.id, name: me.name, role: me.role, team: teamOf(me.role), alive: me.alive, goal: ROLE_BRIEFS[me.role] },
      phase: state.phase,
      round: state.round,
      players: knownPlayers(state, state.participants, viewer, teammates, teamOf),
      board: {
        liberalPolicies: state.liberalPolicies,
        fascistPolicies: state.fascistPolicies,
        electionTracker: state.electionTracker,
        drawPile: state.deck.drawPile.length,
        discardPile: state.deck.discardPile.length,
        powerTrack: describePowerTrack(state.playerCount),
      },
      president: nameOf(state, state.president),
      nominee: name(state.nominee),
      chancellor: name(state.chancellor),
      termLimited: limited.map(id => nameOf(state, id)),
      policyHistory: state.enacted.map(
        e => `Round ${e.round}: ${policyName(e.policy)} (${e.president ? `${nameOf(state, e.president)} / ${name(e.chancellor) ?? '?'}` : 'chaos'})`
      ),
      discussion: publicLogLines(state),
      privateNotes: notesFor(state, viewer),
    };
    if (seesTeam) view.fascistTeam = fascists.map(p => ({ name: p.name, role: p.role }));

    const isPresident = viewer === state.president;
    if (state.phase === 'NOMINATION' && isPresident) {
      view.eligibleChancellors = this.eligibleChancellors(state).map(id => nameOf(state, id));
    }
    if (state.phase === 'LEGISLATIVE_PRESIDENT' && isPresident) view.yourPolicies = formatPolicies(state.presidentHand);
    if (state.phase === 'LEGISLATIVE_CHANCELLOR' && viewer === state.chancellor) {
      view.yourPolicies = formatPolicies(state.chancellorHand);
    }
    if (state.phase === 'EXECUTIVE_ACTION' && isPresident && state.pendingPower) {
      view.pendingPower = state.pendingPower;
      if (state.pendingPower === 'peek') view.peekedPolicies = formatPolicies(state.peeked);
    }
    return view;
  }

  publicView(state: SecretHitlerState): Record<string, unknown> {
    return {
      phase: state.phase,
      round: state.round,
      liberalPolicies: state.liberalPolicies,
      fascistPolicies: state.fascistPolicies,
      electionTracker: state.electionTracker,
      president: nameOf(state, state.president),
      chancellor: state.chancellor ? nameOf(state, state.chancellor) : null,
      alive: state.participants.filter(p => p.alive).map(p => p.name),
    };
  }

  evaluate(state: SecretHitlerState): TerminalResult | null {
    const teamIds = (team: 'liberal' | 'fascist') =>
      state.participants.filter(p => teamOf(p.role) === team).map(p => p.id);
    const metadata = {
      liberal_policies: state.liberalPolicies,
      fascist_policies: state.fascistPolicies,
      roles: Object.fromEntries(state.participants.map(p => [p.id, p.role])),
    };
    const win = (team: 'liberal' | 'fascist', termination: string, reason: string): TerminalResult => ({
      kind: 'win',
      termination,
      reason,
      winners: teamIds(team),
      metadata,
    });

    if (state.liberalPolicies >= LIBERAL_POLICIES_TO_WIN) {
      return win('liberal', 'liberal_policies', `${LIBERAL_POLICIES_TO_WIN} Liberal policies enacted.`);
    }
    if (state.hitlerExecuted) return win('liberal', 'hitler_executed', 'Hitler was executed.');
    if (state.fascistPolicies >= FASCIST_POLICIES_TO_WIN) {
      return win('fascist', 'fascist_policies', `${FASCIST_POLICIES_TO_WIN} Fascist policies enacted.`);
    }
    if (state.hitlerElected) {
      return win('fascist', 'hitler_elected', `Hitler was elected Chancellor after ${HITLER_ZONE} Fascist policies.`);
    }
    return null;
  }

  roundLimit(state: SecretHitlerState): number {
    return state.maxRounds;
  }

  summarize(state: SecretHitlerState): ParticipantSummary[] {
    return state.participants.map(p => {
      const executed = state.executed.find(e => e.id === p.id);
      return {
        id: p.id,
        name: p.name,
        role: p.role,
        team: teamOf(p.role),
        alive: p.alive,
        stats: {
          presidencies: state.enacted.filter(e => e.president === p.id).length,
          chancellorships: state.enacted.filter(e => e.chancellor === p.id).length,
          ...(executed ? { executedRound: executed.round } : {}),
        },
      };
    });
  }

  /** Every policy card is in the draw pile, the discards, a hand, or on the board. */
  checkInvariants(state: SecretHitlerState): void {
    const counted =
      state.deck.drawPile.length +
      state.deck.discardPile.length +
      state.presidentHand.length +
      state.chancellorHand.length +
      state.liberalPolicies +
      state.fascistPolicies;
    if (counted !== TOTAL_POLICIES) {
      throw new InvariantViolationError(`Policy count is ${counted}, expected ${TOTAL_POLICIES}`);
    }
  }

  eligibleChancellors(state: SecretHitlerState): ParticipantId[] {
    return eligibleChancellors({
      alive: aliveIds(state),
      president: state.president,
      previousPresident: state.previousPresident,
      previousChancellor: state.previousChancellor,
    });
  }

  private powerActions(state: SecretHitlerState, actor: ParticipantId): ActionSchema[] {
    const others = aliveIds(state).filter(id => id !== actor);
    const pick = (description: string, options: ParticipantId[]) => ({
      target: { type: 'string' as const, description, options },
    });
    switch (state.pendingPower) {
      case 'investigate':
        return [
          {
            tool: 'investigate',
            description: "Learn a player's party membership.",
            params: pick('Player to investigate', others.filter(id => !state.investigated.includes(id))),
          },
        ];
      case 'special_election':
        return [
          { tool: 'special_election', description: 'Choose the next presidential candidate.', params: pick('Next president', others) },
        ];
      case 'peek':
        return [{ tool: 'acknowledge', description: 'Confirm you have seen the top three policies.', params: {} }];
      case 'execute':
        return [{ tool: 'execute', description: 'Execute a player.', params: pick('Player to execute', others) }];
      case null:
        return [];
    }
  }

  private enact(state: SecretHitlerState, policy: Policy, president: ParticipantId | null, chancellor: ParticipantId | null): void {
    if (policy === 'liberal') state.liberalPolicies++;
    else state.fascistPolicies++;
    state.enacted.push({ round: state.round, policy, president, chancellor });
  }

  private resolveElection(state: SecretHitlerState): SecretHitlerResolution {
    const result = countElection(state.votes);
    const record = state.participants
      .filter(p => p.id in state.votes)
      .map(p => `${p.name}: ${state.votes[p.id] ?? '?'}`)
      .join(', ');
    const summary = [`Votes: ${record}.`, `Ja ${result.ja}, Nein ${result.nein}.`];

    if (result.passed && state.nominee) {
      state.chancellor = state.nominee;
      state.electionTracker = 0;
      const chancellor = requireParticipant(state.participants, state.nominee);
      summary.push(`The government of ${nameOf(state, state.president)} and ${chancellor.name} is elected.`);

      if (state.fascistPolicies >= HITLER_ZONE && chancellor.role === 'hitler') {
        state.hitlerElected = true;
        reveal(state, { subject: chancellor.id, fact: 'role', value: 'hitler', to: 'all' });
        summary.push(`${chancellor.name} is Hitler!`);
        for (const line of summary) announce(state, line);
        return { kind: 'hitler_elected', summary };
      }

      state.presidentHand = drawPolicies(state.deck, 3, state.rng);
      tellPrivately(state, [state.president], `You draw: ${formatPolicies(state.presidentHand)}.`);
      for (const line of summary) announce(state, line);
      return { kind: 'government_formed', summary };
    }

    state.electionTracker++;
    summary.push(`The government is rejected. Election tracker: ${state.electionTracker}.`);
    if (state.electionTracker < CHAOS_THRESHOLD) {
      for (const line of summary) announce(state, line);
      this.finishRound(state);
      return { kind: 'government_rejected', summary };
    }

    const [top] = drawPolicies(state.deck, 1, state.rng);
    if (!top) throw new InvariantViolationError('Policy deck is empty');
    this.enact(state, top, null, null);
    state.electionTracker = 0;
    state.previousPresident = null;
    state.previousChancellor = null;
    summary.push(`Three failed elections: a ${policyName(top)} policy is enacted from the top of the deck. Term limits are reset.`);
    for (const line of summary) announce(state, line);
    this.finishRound(state);
    return { kind: 'chaos', summary };
  }

  private resolveEnactment(state: SecretHitlerState): SecretHitlerResolution {
    const last = state.enacted[state.enacted.length - 1];
    const power = last?.policy === 'fascist' ? powerFor(state.playerCount, state.fascistPolicies) : null;
    const summary = last ? [`${policyName(last.policy)} policy enacted.`] : [];

    if (power && !this.evaluate(state)) {
      state.pendingPower = power;
      if (power === 'peek') {
        state.peeked = peekPolicies(state.deck, 3, state.rng);
        tellPrivately(state, [state.president], `The top three policies are: ${formatPolicies(state.peeked)}.`);
      }
      summary.push(`${nameOf(state, state.president)} gains a presidential power: ${power}.`);
      announce(state, summary[summary.length - 1] ?? '');
      return { kind: 'power_granted', summary };
    }

    this.finishRound(state);
    return { kind: 'policy_enacted', summary };
  }

  /** Records the elected government for term limits and hands the presidency on. */
  private finishRound(state: SecretHitlerState): void {
    if (state.chancellor) {
      state.previousPresident = state.president;
      state.previousChancellor = state.chancellor;
    }
    state.nominee = null;
    state.chancellor = null;
    state.votes = {};
    state.presidentHand = [];
    state.chancellorHand = [];
    state.pendingPower = null;
    state.peeked = [];

    const alive = aliveIds(state);
    const pick = state.specialElectionPick;
    state.specialElectionPick = null;
    if (pick && alive.includes(pick)) {
      // The rotation resumes from the seat that called the special election.
      state.president = pick;
      return;
    }
    const seats = state.participants.map(p => p.id);
    state.presidentSeat = nextPresidentSeat(seats, alive, state.presidentSeat);
    const next = seats[state.presidentSeat];
    if (!next) throw new InvariantViolationError('Presidential rotation found no seat');
    state.president = next;
  }
}

export const secretHitlerRules = new SecretHitlerRules();
