import { IllegalActionError } from '../../engine/errors.js';
import type { AnyGameState, Participant, ParticipantId, Reveal } from '../../engine/types.js';

function findParticipant<TRole extends string, TAttrs>(
  participants: ReadonlyArray<Participant<TRole, TAttrs>>,
  id: ParticipantId
): Participant<TRole, TAttrs> | undefined {
  return participants.find(p => p.id === id);
}

export function requireParticipant<TRole extends string, TAttrs>(
  participants: ReadonlyArray<Participant<TRole, TAttrs>>,
  id: ParticipantId
): Participant<TRole, TAttrs> {
  const found = findParticipant(participants, id);
  if (!found) throw new Error(`Unknown participant: ${id}`);
  return found;
}

export function aliveIds(state: AnyGameState): ParticipantId[] {
  return state.participants.filter(p => p.alive).map(p => p.id);
}

export function nameOf(state: AnyGameState, id: ParticipantId): string {
  return state.participants.find(p => p.id === id)?.name ?? id;
}

/** Accepts an id or a display name (case-insensitive), dead or alive. */
export function lookupTarget<TRole extends string, TAttrs>(
  participants: ReadonlyArray<Participant<TRole, TAttrs>>,
  ref: string
): Participant<TRole, TAttrs> {
  const needle = ref.trim().toLowerCase();
  const found =
    participants.find(p => p.id === ref) ??
    participants.find(p => p.id.toLowerCase() === needle || p.name.toLowerCase() === needle);
  if (!found) throw new IllegalActionError(`No player named "${ref}"`);
  return found;
}

/** As lookupTarget, but only for living participants. */
export function resolveTarget<TRole extends string, TAttrs>(
  participants: ReadonlyArray<Participant<TRole, TAttrs>>,
  ref: string
): Participant<TRole, TAttrs> {
  const found = lookupTarget(participants, ref);
  if (!found.alive) throw new IllegalActionError(`${found.name} is not alive`);
  return found;
}

/** Build a participant list in seat order from setup players and assigned roles. */
export function seatParticipants<TRole extends string, TAttrs>(
  players: ReadonlyArray<{ id: ParticipantId; name: string }>,
  roles: readonly TRole[],
  attrs: (role: TRole, seat: number) => TAttrs
): Participant<TRole, TAttrs>[] {
  if (roles.length !== players.length) {
    throw new Error(`Role count ${roles.length} does not match player count ${players.length}`);
  }
  return players.map((player, seat) => {
    const role = roles[seat];
    if (role === undefined) throw new Error(`Missing role for seat ${seat}`);
    return { id: player.id, name: player.name, seat, role, alive: true, attrs: attrs(role, seat) };
  });
}

export function isVisibleTo(audience: Reveal['to'], viewer: ParticipantId): boolean {
  return audience === 'all' || audience.includes(viewer);
}

export function revealsFor(state: AnyGameState, viewer: ParticipantId): Reveal[] {
  return state.reveals.filter(r => isVisibleTo(r.to, viewer));
}

export function notesFor(state: AnyGameState, viewer: ParticipantId): string[] {
  return state.privateNotes.filter(n => n.to.includes(viewer)).map(n => `[round ${n.round}] ${n.text}`);
}

/** Public log lines, newest last, optionally capped. */
export function publicLogLines(state: AnyGameState, limit = 60): string[] {
  return state.publicLog.slice(-limit).map(line => {
    const who = line.speaker ? `${nameOf(state, line.speaker)}: ` : '';
    return `[round ${line.round} ${line.phase}] ${who}${line.text}`;
  });
}

export function announce(state: AnyGameState, text: string, speaker?: ParticipantId): void {
  state.publicLog.push({ round: state.round, phase: state.phase, text, ...(speaker ? { speaker } : {}) });
}

export function tellPrivately(state: AnyGameState, to: ParticipantId[], text: string): void {
  state.privateNotes.push({ round: state.round, to, text });
}

export function reveal(state: AnyGameState, entry: Omit<Reveal, 'round'>): void {
  state.reveals.push({ round: state.round, ...entry });
}

/** Seat-ordered participants as the viewer knows them. */
export interface KnownPlayer {
  id: ParticipantId;
  name: string;
  alive: boolean;
  role?: string;
  team?: string;
}

/**
 * Roles/teams are filled in only for the viewer, for `teammates`, and from
 * reveals the viewer has been shown.
 */
export function knownPlayers<TRole extends string, TAttrs>(
  state: AnyGameState,
  participants: ReadonlyArray<Participant<TRole, TAttrs>>,
  viewer: ParticipantId,
  teammates: ReadonlySet<ParticipantId>,
  teamOf: (role: TRole) => string
): KnownPlayer[] {
  const visible = revealsFor(state, viewer);
  return participants.map(p => {
    const entry: KnownPlayer = { id: p.id, name: p.name, alive: p.alive };
    if (p.id === viewer) {
      entry.role = p.role;
      entry.team = teamOf(p.role);
      return entry;
    }
    if (teammates.has(p.id)) entry.team = teamOf(p.role);
    for (const r of visible) {
      if (r.subject !== p.id) continue;
      if (r.fact === 'role') entry.role = r.value;
      else entry.team = r.value;
    }
    return entry;
  });
}
