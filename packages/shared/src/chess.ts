export type Color = 'white' | 'black';

export type PieceKind = 'pawn' | 'knight' | 'bishop' | 'rook' | 'queen' | 'king';

export type PromotionKind = Exclude<PieceKind, 'pawn' | 'king'>;

export interface Piece {
  kind: PieceKind;
  color: Color;
}

/** Algebraic coordinate, `a1` through `h8`. */
export type SquareName = string;

export interface BoardSquare {
  square: SquareName;
  piece: Piece | null;
}

export interface MoveRecord {
  /** 1-based half-move number within the game. */
  ply: number;
  color: Color;
  from: SquareName;
  to: SquareName;
  piece: PieceKind;
  captured: PieceKind | null;
  promotion: PromotionKind | null;
  san: string;
}

export type DrawReason = 'insufficientMaterial' | 'threefoldRepetition' | 'fiftyMoveRule';

export type GameStatus =
  | { kind: 'inProgress' }
  | { kind: 'checkmate'; winner: Color }
  | { kind: 'stalemate' }
  | { kind: 'draw'; reason: DrawReason };

export interface BoardState {
  id: string;
  owner: string;
  gameNumber: number;
  /** Rank 8 to rank 1, file a to h. */
  squares: BoardSquare[];
  turn: Color;
  history: MoveRecord[];
  status: GameStatus;
  inCheck: boolean;
  fen: string;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export function oppositeColor(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

export function isGameOver(status: GameStatus): boolean {
  return status.kind !== 'inProgress';
}

const DRAW_REASON_TEXT: Record<DrawReason, string> = {
  insufficientMaterial: 'insufficient material',
  threefoldRepetition: 'threefold repetition',
  fiftyMoveRule: 'the fifty-move rule'
};

export function describeGameStatus(status: GameStatus): string {
  switch (status.kind) {
    case 'inProgress':
      return 'In progress';
    case 'checkmate':
      return `Checkmate, ${status.winner} wins`;
    case 'stalemate':
      return 'Stalemate';
    case 'draw':
      return `Draw by ${DRAW_REASON_TEXT[status.reason]}`;
  }
}
