import { Chess, type Move } from 'chess.js';
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
  ParticipantId,
  ParticipantSummary,
  Resolution,
  TerminalResult,
  TurnDiscipline,
} from '../../engine/types.js';
import { seatParticipants } from '../shared/participants.js';

export type ChessColor = 'white' | 'black';
export type ChessPhase = 'MOVE';

export const ChessOptionsSchema = z.object({
  max_half_moves: z.number().int().positive().default(200),
});

export interface ChessState extends BaseGameState<ChessPhase, ChessColor, Record<string, never>> {
  board: Chess;
  sanHistory: string[];
  uciHistory: string[];
  lastResult: string | null;
  resigned: ParticipantId | null;
  maxHalfMoves: number;
}

export const ChessActionSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('make_move'), args: z.object({ move: z.string().min(1) }) }),
  z.object({ tool: z.literal('resign'), args: z.object({}) }),
]);
export type ChessAction = z.infer<typeof ChessActionSchema>;

export type ChessResolution = Resolution<'move_played' | 'resigned'>;

export interface ChessView {
  you: { id: ParticipantId; name: string; color: ChessColor };
  opponent: { id: ParticipantId; name: string; color: ChessColor };
  sideToMove: ChessColor;
  moveNumber: number;
  fen: string;
  board: string;
  inCheck: boolean;
  moveHistory: string[];
  legalMoves: string[];
}

export const CHESS_RULES_TEXT = `
Chess under standard FIDE rules. Moves are given in UCI notation: source square then target square, plus a promotion piece when promoting (e2e4, g1f3, e7e8q).
The game ends by checkmate, stalemate, insufficient material, threefold repetition, the fifty-move rule, or resignation.
`.trim();

const UCI_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

export function toUci(move: Pick<Move, 'from' | 'to' | 'promotion'>): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

function colorOf(board: Chess): ChessColor {
  return board.turn() === 'w' ? 'white' : 'black';
}

function describeResult(board: Chess, san: string): string {
  if (board.isCheckmate()) return `${san} CHECKMATE!`;
  if (board.isStalemate()) return `${san} Stalemate.`;
  if (board.isInsufficientMaterial()) return `${san} Draw by insufficient material.`;
  if (board.isThreefoldRepetition()) return `${san} Draw by threefold repetition.`;
  if (board.isDraw()) return `${san} Draw by the fifty-move rule.`;
  if (board.inCheck()) return `${san} Check!`;
  return san;
}

export class ChessRules implements GameRules<ChessState, ChessAction, ChessView, ChessResolution> {
  readonly gameType = 'chess' as const;
  readonly rulesText = CHESS_RULES_TEXT;
  readonly actionSchema = ChessActionSchema;

  setup(setup: GameSetup): ChessState {
    if (setup.players.length !== 2) throw new Error(`Chess needs exactly 2 players, got ${setup.players.length}`);
    const options = ChessOptionsSchema.parse(setup.options);
    const participants = seatParticipants<ChessColor, Record<string, never>>(
      setup.players,
      ['white', 'black'],
      () => ({})
    );
    return {
      gameId: setup.gameId,
      gameType: 'chess',
      seed: setup.seed,
      rng: new SeededRandom(setup.seed),
      phase: 'MOVE',
      round: 1,
      participants,
      actedThisPhase: [],
      publicLog: [],
      privateNotes: [],
      reveals: [],
      board: new Chess(),
      sanHistory: [],
      uciHistory: [],
      lastResult: null,
      resigned: null,
      maxHalfMoves: options.max_half_moves,
    };
  }

  enterPhase(_state: ChessState): void {
    // Each MOVE phase is one ply; nothing to reset beyond the engine's bookkeeping.
  }

  describePhase(state: ChessState): { discipline: TurnDiscipline; description: string } {
    const color = colorOf(state.board);
    return { discipline: 'sequential', description: `Move ${state.board.moveNumber()}, ${color} to move` };
  }

  eligibleActors(state: ChessState): ParticipantId[] {
    if (state.actedThisPhase.length > 0) return [];
    const mover = this.playerOf(state, colorOf(state.board));
    return mover ? [mover] : [];
  }

  isPhaseComplete(state: ChessState): boolean {
    return state.actedThisPhase.length > 0;
  }

  legalActions(state: ChessState, actor: ParticipantId): ActionSchema[] {
    if (!this.eligibleActors(state).includes(actor)) return [];
    const moves = state.board.moves({ verbose: true }).map(toUci);
    return [
      {
        tool: 'make_move',
        description: 'Play a move in UCI notation.',
        params: { move: { type: 'string', description: 'UCI move, e.g. e2e4 or e7e8q', options: moves } },
      },
      { tool: 'resign', description: 'Resign the game.', params: {} },
    ];
  }

  validate(state: ChessState, _actor: ParticipantId, action: ChessAction): void {
    if (action.tool === 'resign') return;
    this.findMove(state, action.args.move);
  }

  apply(state: ChessState, actor: ParticipantId, action: ChessAction): ActionOutcome {
    const color = this.colorOfPlayer(state, actor);
    if (action.tool === 'resign') {
      state.resigned = actor;
      state.lastResult = `${color} resigns.`;
      return { success: true, description: `${this.nameOf(state, actor)} (${color}) resigns.`, visibleTo: 'all' };
    }

    const legal = this.findMove(state, action.args.move);
    const played = state.board.move({ from: legal.from, to: legal.to, promotion: legal.promotion });
    state.sanHistory.push(played.san);
    state.uciHistory.push(toUci(played));
    state.lastResult = describeResult(state.board, played.san);
    return {
      success: true,
      description: `${this.nameOf(state, actor)} (${color}) plays ${state.lastResult}`,
      visibleTo: 'all',
      delta: { uci: toUci(played), san: played.san, fen: state.board.fen() },
    };
  }

  defaultAction(_state: ChessState, _actor: ParticipantId): ChessAction {
    return { tool: 'resign', args: {} };
  }

  resolve(state: ChessState): ChessResolution {
    const line = state.lastResult ?? '';
    if (state.resigned) return { kind: 'resigned', summary: [line] };
    return { kind: 'move_played', summary: [line] };
  }

  nextPhase(state: ChessState, _resolution: ChessResolution): NextPhase<ChessPhase> {
    return { phase: 'MOVE', round: state.board.moveNumber() };
  }

  view(state: ChessState, viewer: ParticipantId): ChessView {
    const color = this.colorOfPlayer(state, viewer);
    const opponent = state.participants.find(p => p.id !== viewer);
    if (!opponent) throw new Error('Chess game has no opponent');
    const myTurn = colorOf(state.board) === color;
    return {
      you: { id: viewer, name: this.nameOf(state, viewer), color },
      opponent: { id: opponent.id, name: opponent.name, color: opponent.role },
      sideToMove: colorOf(state.board),
      moveNumber: state.board.moveNumber(),
      fen: state.board.fen(),
      board: state.board.ascii(),
      inCheck: state.board.inCheck(),
      moveHistory: [...state.sanHistory],
      legalMoves: myTurn ? state.board.moves({ verbose: true }).map(toUci) : [],
    };
  }

  publicView(state: ChessState): Record<string, unknown> {
    return { fen: state.board.fen(), moveNumber: state.board.moveNumber(), lastMove: state.sanHistory.at(-1) ?? null };
  }

  evaluate(state: ChessState): TerminalResult | null {
    const board = state.board;
    const metadata = {
      total_moves: state.sanHistory.length,
      final_fen: board.fen(),
      move_history: [...state.sanHistory],
    };
    const draw = (termination: string, reason: string): TerminalResult => ({
      kind: 'draw',
      termination,
      reason,
      winners: [],
      metadata,
    });

    if (state.resigned) {
      const winner = state.participants.find(p => p.id !== state.resigned);
      return {
        kind: 'win',
        termination: 'resignation',
        reason: `${this.nameOf(state, state.resigned)} resigned.`,
        winners: winner ? [winner.id] : [],
        metadata,
      };
    }
    if (board.isCheckmate()) {
      // The side to move is the side that got mated.
      const winnerColor: ChessColor = colorOf(board) === 'white' ? 'black' : 'white';
      const winner = this.playerOf(state, winnerColor);
      return {
        kind: 'win',
        termination: 'checkmate',
        reason: `Checkmate; ${winnerColor} wins.`,
        winners: winner ? [winner] : [],
        metadata,
      };
    }
    if (board.isStalemate()) return draw('stalemate', 'Stalemate.');
    if (board.isInsufficientMaterial()) return draw('insufficient_material', 'Insufficient material to mate.');
    if (board.isThreefoldRepetition()) return draw('threefold_repetition', 'Threefold repetition.');
    if (board.isDraw()) return draw('fifty_move_rule', 'Fifty moves without a capture or pawn move.');
    return null;
  }

  roundLimit(state: ChessState): number {
    return Math.ceil(state.maxHalfMoves / 2);
  }

  summarize(state: ChessState): ParticipantSummary[] {
    return state.participants.map(p => ({
      id: p.id,
      name: p.name,
      role: p.role,
      team: p.role,
      alive: true,
      stats: { moves: state.sanHistory.filter((_, i) => (i % 2 === 0) === (p.role === 'white')).length },
    }));
  }

  private findMove(state: ChessState, uci: string): Move {
    const normalized = uci.trim().toLowerCase();
    if (!UCI_PATTERN.test(normalized)) {
      throw new IllegalActionError(`"${uci}" is not a UCI move (expected e.g. e2e4 or e7e8q)`);
    }
    const legal = state.board.moves({ verbose: true });
    const found = legal.find(m => toUci(m) === normalized);
    if (!found) {
      throw new IllegalActionError(`Illegal move "${uci}". Legal moves: ${legal.map(toUci).join(', ')}`);
    }
    return found;
  }

  private playerOf(state: ChessState, color: ChessColor): ParticipantId | undefined {
    return state.participants.find(p => p.role === color)?.id;
  }

  private colorOfPlayer(state: ChessState, id: ParticipantId): ChessColor {
    const p = state.participants.find(x => x.id === id);
    if (!p) throw new Error(`Unknown participant: ${id}`);
    return p.role;
  }

  private nameOf(state: ChessState, id: ParticipantId): string {
    return state.participants.find(p => p.id === id)?.name ?? id;
  }
}

export const chessRules = new ChessRules();
