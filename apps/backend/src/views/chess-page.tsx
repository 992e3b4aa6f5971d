/**
 * Chess Page
 *
 * The board, the move form and the state of the current game.
 */

import * as React from 'react';
import { describeGameStatus, isGameOver } from '@chessboard/shared';
import type {
  BoardSquare,
  BoardState,
  Color,
  MoveFieldErrors,
  MoveValidationError,
  PieceKind,
} from '@chessboard/shared';
import type { RequestUser } from '../middleware/types.js';
import { Layout } from './layout.js';
import { ErrorMessage, TextField } from './form-fields.js';

export interface MoveFormValues {
  source?: string;
  destination?: string;
  promotion?: string;
}

interface ChessPageProps {
  user: RequestUser;
  board: BoardState;
  error?: MoveValidationError | null;
  values?: MoveFormValues;
  notice?: string | null;
}

export const PIECE_GLYPHS: Record<Color, Record<PieceKind, string>> = {
  white: { king: '♔', queen: '♕', rook: '♖', bishop: '♗', knight: '♘', pawn: '♙' },
  black: { king: '♚', queen: '♛', rook: '♜', bishop: '♝', knight: '♞', pawn: '♟' },
};

const PROMOTION_OPTIONS = [
  { value: '', label: 'Queen (default)' },
  { value: 'queen', label: 'Queen' },
  { value: 'rook', label: 'Rook' },
  { value: 'bishop', label: 'Bishop' },
  { value: 'knight', label: 'Knight' },
];

function capitalize(color: Color): string {
  return color === 'white' ? 'White' : 'Black';
}

function rows(squares: BoardSquare[]): BoardSquare[][] {
  const result: BoardSquare[][] = [];
  for (let i = 0; i < squares.length; i += 8) {
    result.push(squares.slice(i, i + 8));
  }
  return result;
}

function isDark(square: string): boolean {
  const file = square.charCodeAt(0) - 'a'.charCodeAt(0);
  const rank = Number(square[1]);
  return (file + rank) % 2 === 1;
}

const Board: React.FC<{ squares: BoardSquare[] }> = ({ squares }) => {
  return (
    <table className="board" style={boardTable}>
      <tbody>
        {rows(squares).map((row, index) => (
          <tr key={8 - index}>
            <th style={coordinate}>{8 - index}</th>
            {row.map(({ square, piece }) => (
              <td
                key={square}
                className={isDark(square) ? 'square dark' : 'square light'}
                data-square={square}
                style={isDark(square) ? darkSquare : lightSquare}
              >
                {piece ? PIECE_GLYPHS[piece.color][piece.kind] : ''}
              </td>
            ))}
          </tr>
        ))}
        <tr>
          <th />
          {['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'].map((file) => (
            <th key={file} style={coordinate}>
              {file}
            </th>
          ))}
        </tr>
      </tbody>
    </table>
  );
};

export const ChessPage: React.FC<ChessPageProps> = ({ user, board, error, values = {}, notice }) => {
  const over = isGameOver(board.status);
  const fieldErrors: MoveFieldErrors = error?.kind === 'MalformedRequest' ? error.fieldErrors : {};

  return (
    <Layout title="Play" user={user}>
      <h1>{`Game ${board.gameNumber}`}</h1>
      {notice ? <p className="notice">{notice}</p> : null}
      <ErrorMessage message={error?.message} />
      <div style={columns}>
        <Board squares={board.squares} />
        <section style={panel}>
          <p className="status">{describeGameStatus(board.status)}</p>
          {over ? null : <p className="turn">{`${capitalize(board.turn)} to move`}</p>}
          {board.inCheck && !over ? <p className="check">{`${capitalize(board.turn)} is in check.`}</p> : null}

          {over ? null : (
            <form method="post" action="/" className="move-form">
              <TextField
                name="source"
                label="From"
                value={values.source}
                errors={fieldErrors.source}
                placeholder="e2"
                autoComplete="off"
              />
              <TextField
                name="destination"
                label="To"
                value={values.destination}
                errors={fieldErrors.destination}
                placeholder="e4"
                autoComplete="off"
              />
              <p style={selectField}>
                <label htmlFor="id_promotion">Promote to</label>
                <select id="id_promotion" name="promotion" defaultValue={values.promotion ?? ''}>
                  {PROMOTION_OPTIONS.map((option) => (
                    <option key={option.value} value={option.value}>
                      {option.label}
                    </option>
                  ))}
                </select>
              </p>
              <button type="submit" style={primaryButton}>
                Move
              </button>
            </form>
          )}

          <form method="post" action="/" style={newGameForm}>
            <input type="hidden" name="new_game" value="1" />
            <button type="submit">New game</button>
          </form>

          <p>
            <a href="/history/">{`Moves played: ${board.history.length}`}</a>
          </p>
        </section>
      </div>
    </Layout>
  );
};

// Styles
const columns: React.CSSProperties = {
  display: 'flex',
  flexWrap: 'wrap',
  gap: '24px',
  alignItems: 'flex-start',
};

const boardTable: React.CSSProperties = {
  borderCollapse: 'collapse',
};

const squareBase: React.CSSProperties = {
  width: '56px',
  height: '56px',
  textAlign: 'center',
  fontSize: '40px',
  lineHeight: '56px',
};

const lightSquare: React.CSSProperties = { ...squareBase, backgroundColor: '#f0d9b5' };

const darkSquare: React.CSSProperties = { ...squareBase, backgroundColor: '#b58863' };

const coordinate: React.CSSProperties = {
  fontWeight: 400,
  color: '#666',
  padding: '0 6px',
};

const panel: React.CSSProperties = {
  minWidth: '240px',
};

const selectField: React.CSSProperties = {
  display: 'flex',
  flexDirection: 'column',
  gap: '4px',
  margin: '0 0 12px',
  maxWidth: '200px',
};

const primaryButton: React.CSSProperties = {
  padding: '8px 20px',
  fontSize: '16px',
};

const newGameForm: React.CSSProperties = {
  marginTop: '16px',
};
