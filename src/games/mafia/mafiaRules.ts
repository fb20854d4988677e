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
import { formatTally, tallyVotes, type Ballot } from '../shared/voting.js';
import {
  aliveIds,
  announce,
  knownPlayers,
  nameOf,
  notesFor,
  publicLogLines,
  resolveTarget,
  reveal,
  seatParticipants,
  tellPrivately,
  type KnownPlayer,
} from '../shared/participants.js';
import { resolveNightActions, type NightActionIntent } from './nightResolver.js';
import { ROLE_DEFINITIONS, assignRoles, formatRoleSetup, roleListFor, teamOf, type MafiaRole } from './roles.js';

export type MafiaPhase = 'DISCUSSION' | 'VOTING' | 'NIGHT';

export interface MafiaState extends BaseGameState<MafiaPhase, MafiaRole, Record<string, never>> {
  maxRounds: number;
  votes: Record<ParticipantId, Ballot>;
  nightActions: NightActionIntent[];
  // The doctor may not protect the same player on consecutive nights.
  lastProtected: ParticipantId | null;
  eliminations: Array<{ round: number; id: ParticipantId; cause: 'vote' | 'night' }>;
}

const target = z.string().min(1);

export const MafiaActionSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('make_statement'), args: z.object({ statement: z.string().min(1) }) }),
  z.object({ tool: z.literal('accuse_player'), args: z.object({ target, reason: z.string() }) }),
  z.object({ tool: z.literal('pass'), args: z.object({}) }),
  z.object({ tool: z.literal('cast_vote'), args: z.object({ target }) }),
  z.object({ tool: z.literal('abstain'), args: z.object({}) }),
  z.object({ tool: z.literal('kill'), args: z.object({ target }) }),
  z.object({ tool: z.literal('protect'), args: z.object({ target }) }),
  z.object({ tool: z.literal('investigate'), args: z.object({ target }) }),
  z.object({ tool: z.literal('skip'), args: z.object({}) }),
]);
export type MafiaAction = z.infer<typeof MafiaActionSchema>;

export type MafiaResolution = Resolution<'discussion_closed' | 'eliminated' | 'no_elimination' | 'night_resolved'>;

export interface MafiaView {
  you: { id: ParticipantId; name: string; role: MafiaRole; team: string; alive: boolean; abilities: string[] };
  phase: MafiaPhase;
  round: number;
  roleSetup: string;
  players: KnownPlayer[];
  mafiaTeam?: string[];
  lastProtected?: string | null;
  yourVote?: string | null;
  discussion: string[];
  privateNotes: string[];
}

export const MAFIA_RULES_TEXT = `
Mafia. Town (Villagers, Doctor, Detective) against a hidden Mafia.
Each round: DISCUSSION (everyone alive speaks once, in seat order) -> VOTING (secret, simultaneous; abstentions are not counted, the plurality target is eliminated, a tie at the top eliminates nobody; the eliminated player's role is revealed) -> NIGHT (Mafia kill, Doctor protects, Detective investigates).
A protected target survives the kill. The Doctor cannot protect the same player two nights in a row.
Town wins when no Mafia remain. Mafia wins once they are at least as many as the Town.
`.trim();

function roleTitle(role: MafiaRole): string {
  return role.charAt(0).toUpperCase() + role.slice(1);
}

export class MafiaRules implements GameRules<MafiaState, MafiaAction, MafiaView, MafiaResolution> {
  readonly gameType = 'mafia' as const;
  readonly rulesText = MAFIA_RULES_TEXT;
  readonly actionSchema = MafiaActionSchema;

  setup(setup: GameSetup): MafiaState {
    const rng = new SeededRandom(setup.seed);
    const roles = assignRoles(setup.players.length, rng);
    const participants = seatParticipants<MafiaRole, Record<string, never>>(setup.players, roles, () => ({}));

    const expected = roleListFor(setup.players.length).sort().join(',');
    if (participants.map(p => p.role).sort().join(',') !== expected) {
      throw new InvariantViolationError(`Role assignment does not match the ${setup.players.length}-player setup`);
    }

    return {
      gameId: setup.gameId,
      gameType: 'mafia',
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
      votes: {},
      nightActions: [],
      lastProtected: null,
      eliminations: [],
    };
  }

  enterPhase(state: MafiaState): void {
    switch (state.phase) {
      case 'DISCUSSION': {
        const alive = state.participants.filter(p => p.alive).map(p => p.name);
        announce(state, `Day ${state.round} begins. Alive players: ${alive.join(', ')}.`);
        return;
      }
      case 'VOTING':
        state.votes = {};
        return;
      case 'NIGHT':
        state.nightActions = [];
        return;
    }
  }

  describePhase(state: MafiaState): { discipline: TurnDiscipline; description: string } {
    switch (state.phase) {
      case 'DISCUSSION':
        return { discipline: 'sequential', description: `Day ${state.round} discussion` };
      case 'VOTING':
        return { discipline: 'simultaneous', description: `Day ${state.round} elimination vote` };
      case 'NIGHT':
        return { discipline: 'simultaneous', description: `Night ${state.round}` };
    }
  }

  eligibleActors(state: MafiaState): ParticipantId[] {
    const acted = new Set(state.actedThisPhase);
    const pending = state.participants.filter(p => p.alive && !acted.has(p.id));
    if (state.phase !== 'NIGHT') return pending.map(p => p.id);

    const killer = this.designatedKiller(state);
    return pending.filter(p => p.id === killer || p.role === 'doctor' || p.role === 'detective').map(p => p.id);
  }

  isPhaseComplete(state: MafiaState): boolean {
    return this.eligibleActors(state).length === 0;
  }

  legalActions(state: MafiaState, actor: ParticipantId): ActionSchema[] {
    const me = state.participants.find(p => p.id === actor);
    if (!me?.alive) return [];
    const others = state.participants.filter(p => p.alive && p.id !== actor).map(p => p.id);
    const pick = (description: string, options: string[]) => ({
      target: { type: 'string' as const, description, options },
    });

    switch (state.phase) {
      case 'DISCUSSION':
        return [
          {
            tool: 'make_statement',
            description: 'Say something to the whole table.',
            params: { statement: { type: 'string', description: 'What you say aloud' } },
          },
          {
            tool: 'accuse_player',
            description: 'Publicly accuse another player.',
            params: {
              ...pick('Player you accuse', others),
              reason: { type: 'string', description: 'Why you suspect them' },
            },
          },
          { tool: 'pass', description: 'Stay silent this turn.', params: {} },
        ];
      case 'VOTING':
        return [
          { tool: 'cast_vote', description: 'Vote to eliminate a player.', params: pick('Player to eliminate', others) },
          { tool: 'abstain', description: 'Withhold your vote. Abstentions are not counted; the plurality still decides.', params: {} },
        ];
      case 'NIGHT': {
        const skip: ActionSchema = { tool: 'skip', description: 'Do nothing tonight.', params: {} };
        const alive = aliveIds(state);
        if (actor === this.designatedKiller(state)) {
          const victims = state.participants.filter(p => p.alive && p.role !== 'mafia').map(p => p.id);
          return [{ tool: 'kill', description: 'Choose the Mafia kill target.', params: pick('Target', victims) }, skip];
        }
        if (me.role === 'doctor') {
          const protectable = alive.filter(id => id !== state.lastProtected);
          return [{ tool: 'protect', description: 'Protect a player from the kill.', params: pick('Player to protect', protectable) }, skip];
        }
        if (me.role === 'detective') {
          return [{ tool: 'investigate', description: 'Learn whether a player is Mafia.', params: pick('Player to investigate', others) }, skip];
        }
        return [];
      }
    }
  }

  validate(state: MafiaState, actor: ParticipantId, action: MafiaAction): void {
    switch (action.tool) {
      case 'make_statement':
      case 'pass':
      case 'abstain':
      case 'skip':
        return;
      case 'accuse_player':
      case 'cast_vote':
      case 'investigate': {
        const t = resolveTarget(state.participants, action.args.target);
        if (t.id === actor) throw new IllegalActionError('You cannot target yourself');
        return;
      }
      case 'kill': {
        const t = resolveTarget(state.participants, action.args.target);
        if (t.role === 'mafia') throw new IllegalActionError('The Mafia cannot kill one of their own');
        return;
      }
      case 'protect': {
        const t = resolveTarget(state.participants, action.args.target);
        if (t.id === state.lastProtected) {
          throw new IllegalActionError(`You protected ${t.name} last night; choose someone else`);
        }
        return;
      }
    }
  }

  apply(state: MafiaState, actor: ParticipantId, action: MafiaAction): ActionOutcome {
    const actorName = nameOf(state, actor);
    const mafiaIds = state.participants.filter(p => p.role === 'mafia').map(p => p.id);

    switch (action.tool) {
      case 'make_statement':
        announce(state, action.args.statement, actor);
        return { success: true, description: `${actorName}: ${action.args.statement}`, visibleTo: 'all' };
      case 'accuse_player': {
        const t = resolveTarget(state.participants, action.args.target);
        const text = `I accuse ${t.name}. ${action.args.reason}`.trim();
        announce(state, text, actor);
        return {
          success: true,
          description: `${actorName} accuses ${t.name}: ${action.args.reason}`,
          visibleTo: 'all',
          delta: { accused: t.id },
        };
      }
      case 'pass':
        announce(state, '(passes)', actor);
        return { success: true, description: `${actorName} passes.`, visibleTo: 'all' };
      case 'cast_vote': {
        const t = resolveTarget(state.participants, action.args.target);
        state.votes[actor] = t.id;
        return { success: true, description: `${actorName} votes for ${t.name}.`, visibleTo: [actor], delta: { vote: t.id } };
      }
      case 'abstain':
        state.votes[actor] = null;
        return { success: true, description: `${actorName} abstains.`, visibleTo: [actor], delta: { vote: null } };
      case 'kill': {
        const t = resolveTarget(state.participants, action.args.target);
        state.nightActions.push({ kind: 'kill', actor, target: t.id });
        return { success: true, description: `The Mafia target ${t.name}.`, visibleTo: mafiaIds };
      }
      case 'protect': {
        const t = resolveTarget(state.participants, action.args.target);
        state.nightActions.push({ kind: 'protect', actor, target: t.id });
        return { success: true, description: `${actorName} protects ${t.name}.`, visibleTo: [actor] };
      }
      case 'investigate': {
        const t = resolveTarget(state.participants, action.args.target);
        state.nightActions.push({ kind: 'investigate', actor, target: t.id });
        return { success: true, description: `${actorName} investigates ${t.name}.`, visibleTo: [actor] };
      }
      case 'skip':
        return { success: true, description: `${actorName} does nothing tonight.`, visibleTo: [actor] };
    }
  }

  defaultAction(state: MafiaState, _actor: ParticipantId): MafiaAction {
    switch (state.phase) {
      case 'DISCUSSION':
        return { tool: 'pass', args: {} };
      case 'VOTING':
        return { tool: 'abstain', args: {} };
      case 'NIGHT':
        return { tool: 'skip', args: {} };
    }
  }

  resolve(state: MafiaState): MafiaResolution {
    switch (state.phase) {
      case 'DISCUSSION':
        return { kind: 'discussion_closed', summary: [] };
      case 'VOTING':
        return this.resolveVote(state);
      case 'NIGHT':
        return this.resolveNight(state);
    }
  }

  nextPhase(state: MafiaState, _resolution: MafiaResolution): NextPhase<MafiaPhase> {
    switch (state.phase) {
      case 'DISCUSSION':
        return { phase: 'VOTING', round: state.round };
      case 'VOTING':
        return { phase: 'NIGHT', round: state.round };
      case 'NIGHT':
        return { phase: 'DISCUSSION', round: state.round + 1 };
    }
  }

  view(state: MafiaState, viewer: ParticipantId): MafiaView {
    const me = state.participants.find(p => p.id === viewer);
    if (!me) throw new Error(`Unknown participant: ${viewer}`);
    const mafia = state.participants.filter(p => p.role === 'mafia');
    const teammates = new Set(me.role === 'mafia' ? mafia.map(p => p.id) : []);

    const view: MafiaView = {
      you: {
        id: me.id,
        name: me.name,
        role: me.role,
        team: teamOf(me.role),
        alive: me.alive,
        abilities: ROLE_DEFINITIONS[me.role].abilities,
      },
      phase: state.phase,
      round: state.round,
      roleSetup: formatRoleSetup(state.participants.length),
      players: knownPlayers(state, state.participants, viewer, teammates, teamOf),
      discussion: publicLogLines(state),
      privateNotes: notesFor(state, viewer),
    };
    if (me.role === 'mafia') view.mafiaTeam = mafia.map(p => p.name);
    if (me.role === 'doctor') view.lastProtected = state.lastProtected ? nameOf(state, state.lastProtected) : null;
    if (state.phase === 'VOTING' && viewer in state.votes) {
      const vote = state.votes[viewer];
      view.yourVote = vote ? nameOf(state, vote) : null;
    }
    return view;
  }

  publicView(state: MafiaState): Record<string, unknown> {
    return {
      phase: state.phase,
      round: state.round,
      alive: state.participants.filter(p => p.alive).map(p => p.name),
      eliminated: state.eliminations.map(e => ({ name: nameOf(state, e.id), round: e.round, cause: e.cause })),
    };
  }

  evaluate(state: MafiaState): TerminalResult | null {
    const alive = state.participants.filter(p => p.alive);
    const mafiaAlive = alive.filter(p => p.role === 'mafia').length;
    const townAlive = alive.length - mafiaAlive;
    const teamIds = (team: 'mafia' | 'town') =>
      state.participants.filter(p => teamOf(p.role) === team).map(p => p.id);

    if (mafiaAlive === 0) {
      return { kind: 'win', termination: 'mafia_eliminated', reason: 'All Mafia members have been eliminated.', winners: teamIds('town') };
    }
    if (mafiaAlive >= townAlive) {
      return {
        kind: 'win',
        termination: 'mafia_parity',
        reason: `The Mafia (${mafiaAlive}) equal or outnumber the Town (${townAlive}).`,
        winners: teamIds('mafia'),
      };
    }
    return null;
  }

  roundLimit(state: MafiaState): number {
    return state.maxRounds;
  }

  summarize(state: MafiaState): ParticipantSummary[] {
    return state.participants.map((p): ParticipantSummary => {
      const elimination = state.eliminations.find(e => e.id === p.id);
      return {
        id: p.id,
        name: p.name,
        role: p.role,
        team: teamOf(p.role),
        alive: p.alive,
        stats: elimination ? { eliminatedRound: elimination.round, cause: elimination.cause } : {},
      };
    });
  }

  /** Only the first living Mafia member by seat acts at night. */
  private designatedKiller(state: MafiaState): ParticipantId | undefined {
    return state.participants.find(p => p.alive && p.role === 'mafia')?.id;
  }

  private eliminate(state: MafiaState, id: ParticipantId, cause: 'vote' | 'night'): string {
    const p = state.participants.find(x => x.id === id);
    if (!p) throw new Error(`Unknown participant: ${id}`);
    p.alive = false;
    state.eliminations.push({ round: state.round, id, cause });
    reveal(state, { subject: id, fact: 'role', value: p.role, to: 'all' });
    return `They were a ${roleTitle(p.role)}.`;
  }

  private resolveVote(state: MafiaState): MafiaResolution {
    const voters = state.participants.filter(p => p.alive);
    const ballots = voters.map(p => [p.id, state.votes[p.id] ?? null] as const);
    const tally = tallyVotes(ballots, { skipsCompete: false });
    const name = (id: ParticipantId) => nameOf(state, id);

    const record = ballots.map(([voter, ballot]) => `${name(voter)} -> ${ballot ? name(ballot) : 'abstain'}`).join(', ');
    const summary = [`Votes: ${record}.`, `Tally: ${formatTally(tally, name, 'abstain')}.`];
    announce(state, summary.join(' '));

    if (!tally.eliminated) {
      const line = tally.tied ? 'The vote is tied; nobody is eliminated.' : 'Nobody is eliminated.';
      announce(state, line);
      return { kind: 'no_elimination', summary: [...summary, line] };
    }

    const line = `${name(tally.eliminated)} has been eliminated by vote. ${this.eliminate(state, tally.eliminated, 'vote')}`;
    announce(state, line);
    return { kind: 'eliminated', summary: [...summary, line] };
  }

  private resolveNight(state: MafiaState): MafiaResolution {
    const rolesById: Record<ParticipantId, MafiaRole> = {};
    for (const p of state.participants) rolesById[p.id] = p.role;
    const resolved = resolveNightActions({ actions: state.nightActions, rolesById, alive: aliveIds(state) });

    const protect = state.nightActions.find(a => a.kind === 'protect');
    state.lastProtected = protect ? protect.target : null;

    for (const inv of resolved.investigations) {
      const verdict = inv.result === 'MAFIA' ? 'mafia' : 'town';
      tellPrivately(state, [inv.actor], `Investigation result: ${nameOf(state, inv.target)} is ${inv.result === 'MAFIA' ? 'MAFIA' : 'NOT Mafia'}.`);
      reveal(state, { subject: inv.target, fact: 'team', value: verdict, to: [inv.actor] });
    }

    const summary: string[] = [];
    for (const kill of resolved.kills) {
      if (kill.prevented) summary.push(`${nameOf(state, kill.target)} was attacked during the night but survived.`);
    }
    for (const id of resolved.deaths) {
      summary.push(`${nameOf(state, id)} was killed during the night. ${this.eliminate(state, id, 'night')}`);
    }
    if (summary.length === 0) summary.push('The night passes quietly. Nobody died.');
    for (const line of summary) announce(state, line);
    return { kind: 'night_resolved', summary };
  }
}

export const mafiaRules = new MafiaRules();
