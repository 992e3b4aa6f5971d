import { describe, expect, it } from 'vitest';
import type { Chess } from 'chess.js';
import type { MoveRecord, MoveRequest } from '@chessboard/shared';

import {
  attemptMove,
  createStartingGame,
  describeSquares,
  describeStatus,
  describeTurn,
  replayGame
} from './rules.js';

function request(uci: string, promotion?: MoveRequest['promotion']): MoveRequest {
  return { source: uci.slice(0, 2), destination: uci.slice(2, 4), promotion };
}

function play(game: Chess, ...moves: string[]): MoveRecord[] {
  return moves.map((uci) => {
    const result = attemptMove(game, request(uci));
    if (!result.ok) throw new Error(`${uci}: ${result.error.message}`);
    return result.record;
  });
}

function rejection(game: Chess, uci: string) {
  const before = game.fen();
  const result = attemptMove(game, request(uci));
  expect(game.fen()).toBe(before);
  if (result.ok) throw new Error(`${uci} was accepted`);
  return result.error;
}

describe('describeSquares', () => {
  it('lists the starting position from a8 to h1', () => {
    const squares = describeSquares(createStartingGame());
    expect(squares).toHaveLength(64);
    expect(squares[0]).toEqual({ square: 'a8', piece: { kind: 'rook', color: 'black' } });
    expect(squares[4]).toEqual({ square: 'e8', piece: { kind: 'king', color: 'black' } });
    expect(squares[12]).toEqual({ square: 'e7', piece: { kind: 'pawn', color: 'black' } });
    expect(squares[28]).toEqual({ square: 'e5', piece: null });
    expect(squares[52]).toEqual({ square: 'e2', piece: { kind: 'pawn', color: 'white' } });
    expect(squares[59]).toEqual({ square: 'd1', piece: { kind: 'queen', color: 'white' } });
    expect(squares[63]).toEqual({ square: 'h1', piece: { kind: 'rook', color: 'white' } });
  });
});

describe('attemptMove', () => {
  it('plays a pawn double step and records it', () => {
    const game = createStartingGame();
    const [record] = play(game, 'e2e4');

    expect(record).toEqual({
      ply: 1,
      color: 'white',
      from: 'e2',
      to: 'e4',
      piece: 'pawn',
      captured: null,
      promotion: null,
      san: 'e4'
    });
    expect(describeTurn(game)).toBe('black');
  });

  it('rejects an empty source square', () => {
    const error = rejection(createStartingGame(), 'e3e4');
    expect(error).toEqual({ kind: 'EmptySource', message: 'No piece at the source square.' });
  });

  it('rejects moving the side that is not on turn', () => {
    const error = rejection(createStartingGame(), 'e7e5');
    expect(error).toEqual({ kind: 'OutOfTurn', turn: 'white', message: "It is white's turn." });
  });

  const illegal: Array<[string, string[], string]> = [
    ['a1a2', [], 'Cannot capture your own piece.'],
    ['e2d3', [], 'Pawn diagonal move must capture an enemy piece.'],
    ['e2e5', [], 'Illegal pawn move.'],
    ['b1b3', [], 'Illegal knight move.'],
    ['f1c4', [], 'Illegal bishop move or path is blocked.'],
    ['a1a5', [], 'Illegal rook move or path is blocked.'],
    ['d1d5', [], 'Illegal queen move or path is blocked.'],
    ['e1e3', [], 'Illegal king move.'],
    ['e2e2', [], 'The piece must move to a different square.'],
    ['e4e5', ['e2e4', 'e7e5'], 'Pawn cannot move forward into an occupied square.'],
    ['c2c4', ['b1c3', 'e7e5'], "Path is not clear for pawn's double move."],
    ['a2a3', ['e2e4', 'e7e6', 'd2d4', 'f8b4'], 'That move would leave your king in check.']
  ];

  it.each(illegal)('rejects %s with an explanation', (uci, setup, message) => {
    const game = createStartingGame();
    play(game, ...setup);
    expect(rejection(game, uci)).toEqual({ kind: 'IllegalDestination', message });
  });

  it('captures en passant', () => {
    const game = createStartingGame();
    const records = play(game, 'e2e4', 'a7a6', 'e4e5', 'd7d5', 'e5d6');
    const last = records[records.length - 1];

    expect(last).toMatchObject({ from: 'e5', to: 'd6', captured: 'pawn', san: 'exd6' });
    expect(game.get('d5')).toBeFalsy();
  });

  it('castles king-side', () => {
    const game = createStartingGame();
    const records = play(game, 'e2e4', 'e7e5', 'g1f3', 'b8c6', 'f1c4', 'f8c5', 'e1g1');

    expect(records[6].san).toBe('O-O');
    expect(game.get('g1')).toEqual({ type: 'k', color: 'w' });
    expect(game.get('f1')).toEqual({ type: 'r', color: 'w' });
  });

  describe('promotion', () => {
    const setup = ['a2a4', 'b7b5', 'a4b5', 'a7a6', 'b5a6', 'c8b7', 'a6b7', 'b8c6'];

    it('promotes to a queen when no piece is chosen', () => {
      const game = createStartingGame();
      play(game, ...setup);
      const result = attemptMove(game, request('b7a8'));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.record).toMatchObject({ captured: 'rook', promotion: 'queen', san: 'bxa8=Q' });
      }
    });

    it('promotes to the chosen piece', () => {
      const game = createStartingGame();
      play(game, ...setup);
      const result = attemptMove(game, request('b7a8', 'knight'));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.record).toMatchObject({ promotion: 'knight', san: 'bxa8=N' });
      }
      expect(game.get('a8')).toEqual({ type: 'n', color: 'w' });
    });

    it('refuses a promotion choice on an ordinary move', () => {
      const game = createStartingGame();
      const result = attemptMove(game, request('e2e4', 'queen'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('MalformedRequest');
      }
    });
  });

  it('ends the game on checkmate and refuses further moves', () => {
    const game = createStartingGame();
    const records = play(game, 'f2f3', 'e7e5', 'g2g4', 'd8h4');

    expect(records[3].san).toBe('Qh4#');
    expect(describeStatus(game)).toEqual({ kind: 'checkmate', winner: 'black' });
    expect(rejection(game, 'a2a3')).toEqual({
      kind: 'GameOver',
      status: { kind: 'checkmate', winner: 'black' },
      message: 'The game is over (Checkmate, black wins). Start a new game to keep playing.'
    });
  });
});

describe('replayGame', () => {
  it('rebuilds the position from recorded moves', () => {
    const game = createStartingGame();
    const records = play(game, 'e2e4', 'c7c5', 'g1f3', 'd7d6');

    expect(replayGame(records).fen()).toBe(game.fen());
  });

  it('detects threefold repetition across the replayed history', () => {
    const shuffle = ['g1f3', 'g8f6', 'f3g1', 'f6g8'];
    const uci = [...shuffle, ...shuffle, ...shuffle];
    const records: MoveRecord[] = uci.map((m, i) => ({
      ply: i + 1,
      color: i % 2 === 0 ? 'white' : 'black',
      from: m.slice(0, 2),
      to: m.slice(2, 4),
      piece: 'knight',
      captured: null,
      promotion: null,
      san: ''
    }));

    expect(describeStatus(replayGame(records))).toEqual({ kind: 'draw', reason: 'threefoldRepetition' });
  });

  it('refuses a history that is not legal', () => {
    const bad: MoveRecord[] = [
      { ply: 1, color: 'white', from: 'e2', to: 'e5', piece: 'pawn', captured: null, promotion: null, san: '' }
    ];
    expect(() => replayGame(bad)).toThrow('Stored move 1 (e2-e5) cannot be replayed');
  });
});
