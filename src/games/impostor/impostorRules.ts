import { z } from 'zod';
import { IllegalActionError } from '../../engine/errors.js';
import { SeededRandom } from '../../engine/rng.js';
import type {
  ActionOutcome,
  ActionSchema,
  BaseGameState,
  GameRules,
  GameSetup,
  NextPhase,
  Participant,
  ParticipantId,
  ParticipantSummary,
  Resolution,
  TerminalResult,
  TurnDiscipline,
} from '../../engine/types.js';
import { formatTally, tallyVotes, type Ballot } from '../shared/voting.js';
import {
  announce,
  knownPlayers,
  lookupTarget,
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
import { LOCATIONS, START_LOCATION, parseLocation, type Location, type TaskAssignment } from './map.js';
import { assignRoles, generateTasks, teamOf, type ImpostorRole } from './roles.js';

export type ImpostorPhase = 'ACTION' | 'DISCUSSION' | 'VOTING';

export const KILL_COOLDOWN = 2;
export const EMERGENCY_MEETINGS = 1;

export interface ImpostorAttrs {
  location: Location;
  tasks: TaskAssignment[];
  meetingsLeft: number;
  killCooldown: number;
}

export interface Meeting {
  trigger: 'body_report' | 'emergency_meeting';
  caller: ParticipantId;
  bodies: ParticipantId[];
  location: Location;
}

export interface KillRecord {
  round: number;
  killer: ParticipantId;
  victim: ParticipantId;
  location: Location;
  witnesses: ParticipantId[];
}

export const ImpostorOptionsSchema = z.object({
  max_action_rounds: z.number().int().positive().default(30),
});

type ImpostorParticipant = Participant<ImpostorRole, ImpostorAttrs>;

export interface ImpostorState extends BaseGameState<ImpostorPhase, ImpostorRole, ImpostorAttrs> {
  maxActionRounds: number;
  totalTasks: number;
  completedTasks: number;
  // Unreported bodies and where they lie.
  bodies: Array<{ id: ParticipantId; location: Location }>;
  meeting: Meeting | null;
  votes: Record<ParticipantId, Ballot>;
  kills: KillRecord[];
  ejected: Array<{ round: number; id: ParticipantId }>;
  // Deaths everyone knows about: reported bodies and ejections.
  publicDeaths: ParticipantId[];
}

const target = z.string().min(1);

export const ImpostorActionSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('move'), args: z.object({ location: z.string().min(1) }) }),
  z.object({ tool: z.literal('do_task'), args: z.object({}) }),
  z.object({ tool: z.literal('kill'), args: z.object({ target }) }),
  z.object({ tool: z.literal('report_body'), args: z.object({}) }),
  z.object({ tool: z.literal('call_meeting'), args: z.object({}) }),
  z.object({ tool: z.literal('wait'), args: z.object({}) }),
  z.object({ tool: z.literal('make_statement'), args: z.object({ statement: z.string().min(1) }) }),
  z.object({ tool: z.literal('pass'), args: z.object({}) }),
  z.object({ tool: z.literal('cast_vote'), args: z.object({ target }) }),
  z.object({ tool: z.literal('skip_vote'), args: z.object({}) }),
]);
export type ImpostorAction = z.infer<typeof ImpostorActionSchema>;

export type ImpostorResolution = Resolution<'round_over' | 'meeting_called' | 'discussion_closed' | 'ejected' | 'no_ejection'>;

export interface ImpostorView {
  you: {
    id: ParticipantId;
    name: string;
    role: ImpostorRole;
    team: string;
    alive: boolean;
    location: Location;
    tasks?: TaskAssignment[];
    killCooldown?: number;
    meetingsLeft: number;
  };
  phase: ImpostorPhase;
  round: number;
  locations: readonly Location[];
  playersHere: string[];
  bodiesHere: string[];
  fellowImpostors?: string[];
  taskProgress: { completed: number; total: number };
  meeting?: { trigger: Meeting['trigger']; caller: string; bodies: string[]; location: Location };
  players: KnownPlayer[];
  discussion: string[];
  privateNotes: string[];
}

export const IMPOSTOR_RULES_TEXT = `
Impostor. Crewmates and hidden Impostors on a space station with eight rooms: ${LOCATIONS.join(', ')}.
ACTION rounds: each living player, in seat order, takes one action: move to a room, do a task in the current room, wait, report a body in the room, or call an emergency meeting (once per game). Impostors may kill a crewmate in the same room (2-round cooldown) and can only pretend to do tasks.
You only see who is in your own room. A report or an emergency meeting ends the round at once and starts DISCUSSION, then VOTING (simultaneous; strict plurality ejects, ties and skip majorities eject nobody; the ejected player's role is revealed).
Crewmates win when every Impostor is gone or every task is done. Impostors win once they are at least as many as the living crewmates.
`.trim();

function isImpostor(p: ImpostorParticipant): boolean {
  return p.role === 'impostor';
}

export class ImpostorRules implements GameRules<ImpostorState, ImpostorAction, ImpostorView, ImpostorResolution> {
  readonly gameType = 'impostor' as const;
  readonly rulesText = IMPOSTOR_RULES_TEXT;
  readonly actionSchema = ImpostorActionSchema;

  setup(setup: GameSetup): ImpostorState {
    const options = ImpostorOptionsSchema.parse(setup.options);
    const rng = new SeededRandom(setup.seed);
    const roles = assignRoles(setup.players.length, rng);
    const participants = seatParticipants<ImpostorRole, ImpostorAttrs>(setup.players, roles, role => ({
      location: START_LOCATION,
      tasks: generateTasks(role, rng),
      meetingsLeft: EMERGENCY_MEETINGS,
      killCooldown: 0,
    }));

    return {
      gameId: setup.gameId,
      gameType: 'impostor',
      seed: setup.seed,
      rng,
      phase: 'ACTION',
      round: 1,
      participants,
      actedThisPhase: [],
      publicLog: [],
      privateNotes: [],
      reveals: [],
      maxActionRounds: Math.min(options.max_action_rounds, setup.maxRounds),
      totalTasks: participants.reduce((sum, p) => sum + p.attrs.tasks.length, 0),
      completedTasks: 0,
      bodies: [],
      meeting: null,
      votes: {},
      kills: [],
      ejected: [],
      publicDeaths: [],
    };
  }

  enterPhase(state: ImpostorState): void {
    switch (state.phase) {
      case 'ACTION':
        state.meeting = null;
        for (const p of state.participants) {
          if (isImpostor(p) && p.attrs.killCooldown > 0) p.attrs.killCooldown--;
        }
        return;
      case 'DISCUSSION':
        return;
      case 'VOTING':
        state.votes = {};
        return;
    }
  }

  describePhase(state: ImpostorState): { discipline: TurnDiscipline; description: string } {
    switch (state.phase) {
      case 'ACTION':
        return { discipline: 'sequential', description: `Action round ${state.round}` };
      case 'DISCUSSION':
        return { discipline: 'sequential', description: `Meeting discussion (round ${state.round})` };
      case 'VOTING':
        return { discipline: 'simultaneous', description: `Ejection vote (round ${state.round})` };
    }
  }

  eligibleActors(state: ImpostorState): ParticipantId[] {
    if (state.phase === 'ACTION' && state.meeting) return [];
    const acted = new Set(state.actedThisPhase);
    return state.participants.filter(p => p.alive && !acted.has(p.id)).map(p => p.id);
  }

  /** Unreported victims still look pending to anyone who has not seen them die. */
  visibleActors(state: ImpostorState, viewer: ParticipantId): ParticipantId[] {
    if (state.phase === 'ACTION' && state.meeting) return [];
    const acted = new Set(state.actedThisPhase);
    const dead = this.knownDead(state, viewer);
    return state.participants.filter(p => !dead.has(p.id) && !acted.has(p.id)).map(p => p.id);
  }

  isPhaseComplete(state: ImpostorState): boolean {
    return this.eligibleActors(state).length === 0;
  }

  legalActions(state: ImpostorState, actor: ParticipantId): ActionSchema[] {
    if (!this.eligibleActors(state).includes(actor)) return [];
    const me = requireParticipant(state.participants, actor);

    switch (state.phase) {
      case 'ACTION': {
        const actions: ActionSchema[] = [
          {
            tool: 'move',
            description: 'Move to another room.',
            params: {
              location: { type: 'string', description: 'Room to move to', options: LOCATIONS.filter(l => l !== me.attrs.location) },
            },
          },
        ];
        if (isImpostor(me) || this.openTaskHere(me)) {
          actions.push({ tool: 'do_task', description: 'Work on a task in this room.', params: {} });
        }
        const victims = this.killTargets(state, me);
        if (victims.length > 0) {
          actions.push({
            tool: 'kill',
            description: 'Kill a crewmate in this room.',
            params: { target: { type: 'string', description: 'Crewmate to kill', options: victims.map(p => p.id) } },
          });
        }
        if (state.bodies.some(b => b.location === me.attrs.location)) {
          actions.push({ tool: 'report_body', description: 'Report the body in this room.', params: {} });
        }
        if (me.attrs.meetingsLeft > 0) {
          actions.push({ tool: 'call_meeting', description: 'Call your emergency meeting.', params: {} });
        }
        actions.push({ tool: 'wait', description: 'Stay put and watch.', params: {} });
        return actions;
      }
      case 'DISCUSSION':
        return [
          {
            tool: 'make_statement',
            description: 'Speak to the meeting.',
            params: { statement: { type: 'string', description: 'What you say' } },
          },
          { tool: 'pass', description: 'Say nothing.', params: {} },
        ];
      case 'VOTING': {
        const dead = this.knownDead(state, actor);
        const others = state.participants.filter(p => !dead.has(p.id) && p.id !== actor).map(p => p.id);
        return [
          {
            tool: 'cast_vote',
            description: 'Vote to eject a player.',
            params: { target: { type: 'string', description: 'Player to eject', options: others } },
          },
          { tool: 'skip_vote', description: 'Vote to skip.', params: {} },
        ];
      }
    }
  }

  validate(state: ImpostorState, actor: ParticipantId, action: ImpostorAction): void {
    const me = requireParticipant(state.participants, actor);
    switch (action.tool) {
      case 'move': {
        const location = parseLocation(action.args.location);
        if (!location) throw new IllegalActionError(`Unknown room "${action.args.location}". Rooms: ${LOCATIONS.join(', ')}`);
        if (location === me.attrs.location) throw new IllegalActionError(`You are already in ${location}`);
        return;
      }
      case 'do_task':
        if (!isImpostor(me) && !this.openTaskHere(me)) {
          throw new IllegalActionError(`You have no task in ${me.attrs.location}`);
        }
        return;
      case 'kill': {
        if (!isImpostor(me)) throw new IllegalActionError('Only impostors can kill');
        if (me.attrs.killCooldown > 0) throw new IllegalActionError(`Kill is on cooldown for ${me.attrs.killCooldown} more round(s)`);
        const t = resolveTarget(state.participants, action.args.target);
        if (isImpostor(t)) throw new IllegalActionError('You cannot kill a fellow impostor');
        if (t.attrs.location !== me.attrs.location) throw new IllegalActionError(`${t.name} is not in ${me.attrs.location}`);
        return;
      }
      case 'report_body':
        if (!state.bodies.some(b => b.location === me.attrs.location)) {
          throw new IllegalActionError(`There is no body in ${me.attrs.location}`);
        }
        return;
      case 'call_meeting':
        if (me.attrs.meetingsLeft <= 0) throw new IllegalActionError('You have no emergency meetings left');
        return;
      case 'cast_vote': {
        // Dead targets are refused only when the voter knows of the death.
        const t = lookupTarget(state.participants, action.args.target);
        if (t.id === actor) throw new IllegalActionError('You cannot vote for yourself');
        if (this.knownDead(state, actor).has(t.id)) throw new IllegalActionError(`${t.name} is dead`);
        return;
      }
      case 'wait':
      case 'make_statement':
      case 'pass':
      case 'skip_vote':
        return;
    }
  }

  apply(state: ImpostorState, actor: ParticipantId, action: ImpostorAction): ActionOutcome {
    const me = requireParticipant(state.participants, actor);

    switch (action.tool) {
      case 'move': {
        const from = me.attrs.location;
        const to = parseLocation(action.args.location) ?? from;
        me.attrs.location = to;
        const here = this.occupants(state, to).filter(p => p.id !== actor);
        const bodies = state.bodies.filter(b => b.location === to).map(b => nameOf(state, b.id));
        let note = `You move from ${from} to ${to}. ${here.length ? `Here: ${here.map(p => p.name).join(', ')}.` : 'Nobody else is here.'}`;
        if (bodies.length) note += ` You see the body of ${bodies.join(', ')}!`;
        tellPrivately(state, [actor], note);
        return {
          success: true,
          description: `${me.name} moves from ${from} to ${to}.`,
          visibleTo: [actor, ...here.map(p => p.id)],
          delta: { location: to },
        };
      }
      case 'do_task': {
        const room = me.attrs.location;
        if (isImpostor(me)) {
          return { success: true, description: `${me.name} works on a task in ${room}.`, visibleTo: this.roomAudience(state, room) };
        }
        const task = me.attrs.tasks.find(t => t.location === room && !t.completed);
        if (task) {
          task.completed = true;
          state.completedTasks++;
        }
        const left = me.attrs.tasks.filter(t => !t.completed).length;
        tellPrivately(state, [actor], `Task done: ${task?.task ?? '?'} in ${room}. ${left} of your tasks left.`);
        return {
          success: true,
          description: `${me.name} works on a task in ${room}.`,
          visibleTo: this.roomAudience(state, room),
          delta: { completedTasks: state.completedTasks },
        };
      }
      case 'kill': {
        const victim = resolveTarget(state.participants, action.args.target);
        const room = me.attrs.location;
        const witnesses = this.occupants(state, room)
          .filter(p => p.id !== actor && p.id !== victim.id)
          .map(p => p.id);
        victim.alive = false;
        me.attrs.killCooldown = KILL_COOLDOWN;
        state.bodies.push({ id: victim.id, location: room });
        state.kills.push({ round: state.round, killer: actor, victim: victim.id, location: room, witnesses });
        tellPrivately(state, [victim.id], `You were killed by ${me.name} in ${room}.`);
        if (witnesses.length) tellPrivately(state, witnesses, `You saw ${me.name} kill ${victim.name} in ${room}!`);
        return {
          success: true,
          description: `${me.name} kills ${victim.name} in ${room}.`,
          visibleTo: [actor, victim.id, ...witnesses],
          delta: { victim: victim.id, location: room },
        };
      }
      case 'report_body': {
        const room = me.attrs.location;
        const found = state.bodies.filter(b => b.location === room).map(b => b.id);
        state.bodies = state.bodies.filter(b => b.location !== room);
        state.publicDeaths.push(...found);
        state.meeting = { trigger: 'body_report', caller: actor, bodies: found, location: room };
        const line = `${me.name} reports the body of ${found.map(id => nameOf(state, id)).join(', ')} in ${room}! Emergency meeting.`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all', delta: { meeting: 'body_report' } };
      }
      case 'call_meeting': {
        me.attrs.meetingsLeft--;
        state.meeting = { trigger: 'emergency_meeting', caller: actor, bodies: [], location: me.attrs.location };
        const line = `${me.name} calls an emergency meeting!`;
        announce(state, line);
        return { success: true, description: line, visibleTo: 'all', delta: { meeting: 'emergency_meeting' } };
      }
      case 'wait':
        return { success: true, description: `${me.name} waits in ${me.attrs.location}.`, visibleTo: [actor] };
      case 'make_statement':
        announce(state, action.args.statement, actor);
        return { success: true, description: `${me.name}: ${action.args.statement}`, visibleTo: 'all' };
      case 'pass':
        announce(state, '(passes)', actor);
        return { success: true, description: `${me.name} passes.`, visibleTo: 'all' };
      case 'cast_vote': {
        const t = lookupTarget(state.participants, action.args.target);
        state.votes[actor] = t.id;
        return { success: true, description: `${me.name} votes to eject ${t.name}.`, visibleTo: [actor], delta: { vote: t.id } };
      }
      case 'skip_vote':
        state.votes[actor] = null;
        return { success: true, description: `${me.name} votes to skip.`, visibleTo: [actor], delta: { vote: null } };
    }
  }

  defaultAction(state: ImpostorState, _actor: ParticipantId): ImpostorAction {
    switch (state.phase) {
      case 'ACTION':
        return { tool: 'wait', args: {} };
      case 'DISCUSSION':
        return { tool: 'pass', args: {} };
      case 'VOTING':
        return { tool: 'skip_vote', args: {} };
    }
  }

  resolve(state: ImpostorState): ImpostorResolution {
    switch (state.phase) {
      case 'ACTION':
        if (state.meeting) {
          const caller = nameOf(state, state.meeting.caller);
          const why = state.meeting.trigger === 'body_report' ? 'reported a body' : 'called an emergency meeting';
          return { kind: 'meeting_called', summary: [`${caller} ${why}. Everyone gathers in the Cafeteria.`] };
        }
        return { kind: 'round_over', summary: [] };
      case 'DISCUSSION':
        return { kind: 'discussion_closed', summary: [] };
      case 'VOTING':
        return this.resolveVote(state);
    }
  }

  nextPhase(state: ImpostorState, resolution: ImpostorResolution): NextPhase<ImpostorPhase> {
    switch (resolution.kind) {
      case 'meeting_called':
        return { phase: 'DISCUSSION', round: state.round };
      case 'discussion_closed':
        return { phase: 'VOTING', round: state.round };
      case 'round_over':
      case 'ejected':
      case 'no_ejection':
        return { phase: 'ACTION', round: state.round + 1 };
    }
  }

  view(state: ImpostorState, viewer: ParticipantId): ImpostorView {
    const me = requireParticipant(state.participants, viewer);
    const impostors = state.participants.filter(isImpostor);
    const teammates = new Set(isImpostor(me) ? impostors.map(p => p.id) : []);
    const room = me.attrs.location;

    const knownDead = this.knownDead(state, viewer);
    const players = knownPlayers(state, state.participants, viewer, teammates, teamOf).map(p => ({
      ...p,
      alive: !knownDead.has(p.id),
    }));

    const view: ImpostorView = {
      you: {
        id: me.id,
        name: me.name,
        role: me.role,
        team: teamOf(me.role),
        alive: me.alive,
        location: room,
        meetingsLeft: me.attrs.meetingsLeft,
      },
      phase: state.phase,
      round: state.round,
      locations: LOCATIONS,
      playersHere: me.alive ? this.occupants(state, room).filter(p => p.id !== viewer).map(p => p.name) : [],
      bodiesHere: state.bodies.filter(b => b.location === room).map(b => nameOf(state, b.id)),
      taskProgress: { completed: state.completedTasks, total: state.totalTasks },
      players,
      discussion: publicLogLines(state),
      privateNotes: notesFor(state, viewer),
    };
    if (isImpostor(me)) {
      view.you.killCooldown = me.attrs.killCooldown;
      view.fellowImpostors = impostors.filter(p => p.id !== viewer).map(p => p.name);
    } else {
      view.you.tasks = me.attrs.tasks.map(t => ({ ...t }));
    }
    if (state.meeting && state.phase !== 'ACTION') {
      view.meeting = {
        trigger: state.meeting.trigger,
        caller: nameOf(state, state.meeting.caller),
        bodies: state.meeting.bodies.map(id => nameOf(state, id)),
        location: state.meeting.location,
      };
    }
    return view;
  }

  publicView(state: ImpostorState): Record<string, unknown> {
    return {
      phase: state.phase,
      round: state.round,
      taskProgress: `${state.completedTasks}/${state.totalTasks}`,
      meeting: state.meeting ? state.meeting.trigger : null,
      publicDeaths: state.publicDeaths.map(id => nameOf(state, id)),
    };
  }

  evaluate(state: ImpostorState): TerminalResult | null {
    const alive = state.participants.filter(p => p.alive);
    const impostorsAlive = alive.filter(isImpostor).length;
    const crewAlive = alive.length - impostorsAlive;
    const teamIds = (team: 'impostor' | 'crew') => state.participants.filter(p => teamOf(p.role) === team).map(p => p.id);
    const metadata = {
      tasks_completed: state.completedTasks,
      total_tasks: state.totalTasks,
      alive_impostors: impostorsAlive,
      alive_crewmates: crewAlive,
    };

    if (impostorsAlive === 0) {
      return { kind: 'win', termination: 'impostors_eliminated', reason: 'Every impostor is gone.', winners: teamIds('crew'), metadata };
    }
    if (state.totalTasks > 0 && state.completedTasks >= state.totalTasks) {
      return { kind: 'win', termination: 'tasks_completed', reason: 'The crew finished every task.', winners: teamIds('crew'), metadata };
    }
    if (impostorsAlive >= crewAlive) {
      return {
        kind: 'win',
        termination: 'impostor_majority',
        reason: `Impostors (${impostorsAlive}) equal or outnumber the crew (${crewAlive}).`,
        winners: teamIds('impostor'),
        metadata,
      };
    }
    return null;
  }

  roundLimit(state: ImpostorState): number {
    return state.maxActionRounds;
  }

  summarize(state: ImpostorState): ParticipantSummary[] {
    return state.participants.map(p => {
      const stats: Record<string, string | number> = isImpostor(p)
        ? { kills: state.kills.filter(k => k.killer === p.id).length }
        : { tasksDone: p.attrs.tasks.filter(t => t.completed).length, tasks: p.attrs.tasks.length };
      const ejected = state.ejected.find(e => e.id === p.id);
      if (ejected) stats.ejectedRound = ejected.round;
      const killed = state.kills.find(k => k.victim === p.id);
      if (killed) stats.killedRound = killed.round;
      return { id: p.id, name: p.name, role: p.role, team: teamOf(p.role), alive: p.alive, stats };
    });
  }

  private openTaskHere(p: ImpostorParticipant): boolean {
    return p.attrs.tasks.some(t => t.location === p.attrs.location && !t.completed);
  }

  private occupants(state: ImpostorState, room: Location): ImpostorParticipant[] {
    return state.participants.filter(p => p.alive && p.attrs.location === room);
  }

  private roomAudience(state: ImpostorState, room: Location): ParticipantId[] {
    return this.occupants(state, room).map(p => p.id);
  }

  /** Deaths the viewer knows of: public ones plus kills they did, suffered or saw. */
  private knownDead(state: ImpostorState, viewer: ParticipantId): Set<ParticipantId> {
    const dead = new Set(state.publicDeaths);
    for (const k of state.kills) {
      if (k.killer === viewer || k.victim === viewer || k.witnesses.includes(viewer)) dead.add(k.victim);
    }
    return dead;
  }

  private killTargets(state: ImpostorState, me: ImpostorParticipant): ImpostorParticipant[] {
    if (!isImpostor(me) || me.attrs.killCooldown > 0) return [];
    return this.occupants(state, me.attrs.location).filter(p => !isImpostor(p));
  }

  private resolveVote(state: ImpostorState): ImpostorResolution {
    const alive = new Set(state.participants.filter(p => p.alive).map(p => p.id));
    // A vote for someone who has secretly died is wasted: it counts as a skip.
    const ballots = [...alive].map(id => {
      const vote = state.votes[id] ?? null;
      return [id, vote !== null && alive.has(vote) ? vote : null] as const;
    });
    const tally = tallyVotes(ballots);
    const name = (id: ParticipantId) => nameOf(state, id);
    const summary = [`Tally: ${formatTally(tally, name)}.`];

    // Everyone walks back to the Cafeteria after a meeting.
    for (const p of state.participants) p.attrs.location = START_LOCATION;

    if (!tally.eliminated) {
      const line = 'Nobody was ejected.';
      summary.push(line);
      for (const l of summary) announce(state, l);
      return { kind: 'no_ejection', summary };
    }

    const ejected = requireParticipant(state.participants, tally.eliminated);
    ejected.alive = false;
    state.ejected.push({ round: state.round, id: ejected.id });
    state.publicDeaths.push(ejected.id);
    state.bodies = state.bodies.filter(b => b.id !== ejected.id);
    reveal(state, { subject: ejected.id, fact: 'role', value: ejected.role, to: 'all' });
    const line = `${ejected.name} was ejected. They were ${ejected.role === 'impostor' ? 'an Impostor' : 'a Crewmate'}.`;
    summary.push(line);
    for (const l of summary) announce(state, l);
    return { kind: 'ejected', summary };
  }
}

export const impostorRules = new ImpostorRules();
