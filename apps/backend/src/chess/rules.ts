import { Chess, SQUARES } from 'chess.js';
import type { Color as ChessColor, Move, PieceSymbol, Square } from 'chess.js';
import { FILES, describeGameStatus, oppositeColor } from '@chessboard/shared';
import type {
  BoardSquare,
  Color,
  GameStatus,
  MoveRecord,
  MoveRequest,
  MoveValidationError,
  PieceKind,
  PromotionKind
} from '@chessboard/shared';

/**
 * Movement rules, check and game-end detection on top of chess.js.
 *
 * Games are always rebuilt from the start position by replaying the stored
 * history, so repetition counting sees every earlier position.
 */

export type MoveAttempt =
  | { ok: true; record: MoveRecord }
  | { ok: false; error: MoveValidationError };

const PIECE_KINDS: Record<PieceSymbol, PieceKind> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king'
};

const PROMOTION_SYMBOLS: Record<PromotionKind, PieceSymbol> = {
  queen: 'q',
  rook: 'r',
  bishop: 'b',
  knight: 'n'
};

const PROMOTION_KINDS: Partial<Record<PieceSymbol, PromotionKind>> = {
  q: 'queen',
  r: 'rook',
  b: 'bishop',
  n: 'knight'
};

const SQUARE_SET: ReadonlySet<string> = new Set<string>(SQUARES);

export function isSquare(value: string): value is Square {
  return SQUARE_SET.has(value);
}

function toColor(color: ChessColor): Color {
  return color === 'w' ? 'white' : 'black';
}

export function createStartingGame(): Chess {
  return new Chess();
}

export function replayGame(history: readonly MoveRecord[]): Chess {
  const game = new Chess();
  for (const record of history) {
    try {
      game.move({
        from: record.from,
        to: record.to,
        ...(record.promotion ? { promotion: PROMOTION_SYMBOLS[record.promotion] } : {})
      });
    } catch (error) {
      throw new Error(
        `Stored move ${record.ply} (${record.from}-${record.to}) cannot be replayed: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }
  return game;
}

export function describeSquares(game: Chess): BoardSquare[] {
  const squares: BoardSquare[] = [];
  game.board().forEach((row, rowIndex) => {
    row.forEach((cell, fileIndex) => {
      squares.push({
        square: `${FILES[fileIndex]}${8 - rowIndex}`,
        piece: cell ? { kind: PIECE_KINDS[cell.type], color: toColor(cell.color) } : null
      });
    });
  });
  return squares;
}

export function describeTurn(game: Chess): Color {
  return toColor(game.turn());
}

export function describeStatus(game: Chess): GameStatus {
  if (game.isCheckmate()) {
    return { kind: 'checkmate', winner: oppositeColor(describeTurn(game)) };
  }
  if (game.isStalemate()) return { kind: 'stalemate' };
  if (game.isInsufficientMaterial()) return { kind: 'draw', reason: 'insufficientMaterial' };
  if (game.isThreefoldRepetition()) return { kind: 'draw', reason: 'threefoldRepetition' };
  if (game.isDraw()) return { kind: 'draw', reason: 'fiftyMoveRule' };
  return { kind: 'inProgress' };
}

// ============================================
// ILLEGAL MOVE EXPLANATIONS
// ============================================

type Geometry = { reachable: true } | { reachable: false; message: string };

function fileOf(square: Square): number {
  return square.charCodeAt(0) - 'a'.charCodeAt(0);
}

function rankOf(square: Square): number {
  return Number(square[1]);
}

function squareAt(file: number, rank: number): Square | null {
  if (file < 0 || file > 7 || rank < 1 || rank > 8) return null;
  const name = `${FILES[file]}${rank}`;
  return isSquare(name) ? name : null;
}

function isPathClear(game: Chess, from: Square, to: Square): boolean {
  const df = Math.sign(fileOf(to) - fileOf(from));
  const dr = Math.sign(rankOf(to) - rankOf(from));
  let file = fileOf(from) + df;
  let rank = rankOf(from) + dr;
  while (file !== fileOf(to) || rank !== rankOf(to)) {
    const square = squareAt(file, rank);
    if (!square || game.get(square)) return false;
    file += df;
    rank += dr;
  }
  return true;
}

function enPassantSquare(game: Chess): string {
  return game.fen().split(' ')[3] ?? '-';
}

/**
 * Decides whether `to` is reachable by the piece's movement pattern alone,
 * ignoring king safety. Used only to explain a rejected move.
 */
function checkGeometry(game: Chess, from: Square, to: Square, piece: PieceSymbol, color: ChessColor): Geometry {
  const df = fileOf(to) - fileOf(from);
  const dr = rankOf(to) - rankOf(from);
  const target = game.get(to);

  switch (piece) {
    case 'p': {
      const dir = color === 'w' ? 1 : -1;
      const startRank = color === 'w' ? 2 : 7;
      if (df === 0 && dr === dir) {
        return target
          ? { reachable: false, message: 'Pawn cannot move forward into an occupied square.' }
          : { reachable: true };
      }
      if (df === 0 && dr === 2 * dir && rankOf(from) === startRank) {
        const middle = squareAt(fileOf(from), rankOf(from) + dir);
        return middle && !game.get(middle) && !target
          ? { reachable: true }
          : { reachable: false, message: "Path is not clear for pawn's double move." };
      }
      if (Math.abs(df) === 1 && dr === dir) {
        return target || enPassantSquare(game) === to
          ? { reachable: true }
          : { reachable: false, message: 'Pawn diagonal move must capture an enemy piece.' };
      }
      return { reachable: false, message: 'Illegal pawn move.' };
    }
    case 'n': {
      const lShape = Math.abs(df) * Math.abs(dr) === 2;
      return lShape ? { reachable: true } : { reachable: false, message: 'Illegal knight move.' };
    }
    case 'b':
      return Math.abs(df) === Math.abs(dr) && df !== 0 && isPathClear(game, from, to)
        ? { reachable: true }
        : { reachable: false, message: 'Illegal bishop move or path is blocked.' };
    case 'r':
      return (df === 0) !== (dr === 0) && isPathClear(game, from, to)
        ? { reachable: true }
        : { reachable: false, message: 'Illegal rook move or path is blocked.' };
    case 'q': {
      const line = (df === 0) !== (dr === 0) || (Math.abs(df) === Math.abs(dr) && df !== 0);
      return line && isPathClear(game, from, to)
        ? { reachable: true }
        : { reachable: false, message: 'Illegal queen move or path is blocked.' };
    }
    case 'k':
      return Math.max(Math.abs(df), Math.abs(dr)) === 1
        ? { reachable: true }
        : { reachable: false, message: 'Illegal king move.' };
  }
}

// ============================================
// MOVE VALIDATION
// ============================================

/**
 * Validates `request` against the position and, when legal, plays it on `game`.
 * On failure `game` is left untouched.
 */
export function attemptMove(game: Chess, request: MoveRequest): MoveAttempt {
  const status = describeStatus(game);
  if (status.kind !== 'inProgress') {
    return {
      ok: false,
      error: {
        kind: 'GameOver',
        status,
        message: `The game is over (${describeGameStatus(status)}). Start a new game to keep playing.`
      }
    };
  }

  const { source, destination } = request;
  if (!isSquare(source) || !isSquare(destination)) {
    return {
      ok: false,
      error: { kind: 'MalformedRequest', message: 'Enter squares in the format e2.', fieldErrors: {} }
    };
  }

  const piece = game.get(source);
  if (!piece) {
    return { ok: false, error: { kind: 'EmptySource', message: 'No piece at the source square.' } };
  }

  const turn = describeTurn(game);
  if (piece.color !== game.turn()) {
    return { ok: false, error: { kind: 'OutOfTurn', turn, message: `It is ${turn}'s turn.` } };
  }

  const candidates: Move[] = game.moves({ square: source, verbose: true }).filter((m) => m.to === destination);

  if (candidates.length === 0) {
    const target = game.get(destination);
    let message: string;
    if (source === destination) {
      message = 'The piece must move to a different square.';
    } else if (target && target.color === piece.color) {
      message = 'Cannot capture your own piece.';
    } else {
      const geometry = checkGeometry(game, source, destination, piece.type, piece.color);
      message = geometry.reachable ? 'That move would leave your king in check.' : geometry.message;
    }
    return { ok: false, error: { kind: 'IllegalDestination', message } };
  }

  const promotes = candidates.some((m) => m.promotion !== undefined);
  if (!promotes && request.promotion) {
    return {
      ok: false,
      error: {
        kind: 'MalformedRequest',
        message: 'Only a pawn reaching the last rank can be promoted.',
        fieldErrors: { promotion: ['Only a pawn reaching the last rank can be promoted.'] }
      }
    };
  }

  const played = game.move({
    from: source,
    to: destination,
    ...(promotes ? { promotion: PROMOTION_SYMBOLS[request.promotion ?? 'queen'] } : {})
  });

  return {
    ok: true,
    record: {
      ply: game.history().length,
      color: toColor(played.color),
      from: played.from,
      to: played.to,
      piece: PIECE_KINDS[played.piece],
      captured: played.captured ? PIECE_KINDS[played.captured] : null,
      promotion: played.promotion ? PROMOTION_KINDS[played.promotion] ?? null : null,
      san: played.san
    }
  };
}
