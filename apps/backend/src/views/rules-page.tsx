import * as React from 'react';
import type { RequestUser } from '../middleware/types.js';
import { Layout } from './layout.js';

const PIECE_RULES: Array<{ piece: string; rule: string }> = [
  {
    piece: 'Pawn',
    rule: 'Moves one square forward, or two from its starting rank when both squares are empty. Captures one square diagonally forward, including en passant right after an enemy pawn has made a double step. A pawn reaching the last rank is promoted; the board promotes to a queen unless you choose another piece.',
  },
  { piece: 'Knight', rule: 'Jumps in an L: two squares in one direction and one square sideways. It may jump over other pieces.' },
  { piece: 'Bishop', rule: 'Slides any number of squares diagonally. It cannot pass through other pieces.' },
  { piece: 'Rook', rule: 'Slides any number of squares along a rank or file. It cannot pass through other pieces.' },
  { piece: 'Queen', rule: 'Combines the rook and the bishop.' },
  {
    piece: 'King',
    rule: 'Moves one square in any direction. Castles with a rook that has not moved when the squares between them are empty and the king neither starts in, passes through nor lands on an attacked square.',
  },
];

export const RulesPage: React.FC<{ user?: RequestUser | null }> = ({ user }) => {
  return (
    <Layout title="Rules" user={user}>
      <h1>Rules</h1>
      <p>
        White moves first and the sides alternate. Enter the square of the piece you want to move and the square it
        should go to, for example <code>e2</code> and <code>e4</code>.
      </p>
      <dl>
        {PIECE_RULES.map(({ piece, rule }) => (
          <React.Fragment key={piece}>
            <dt style={term}>{piece}</dt>
            <dd style={definition}>{rule}</dd>
          </React.Fragment>
        ))}
      </dl>
      <h2>Check and the end of the game</h2>
      <p>
        No move may leave your own king in check. The game ends in checkmate when the side to move is in check and has
        no legal move, and in a draw by stalemate, insufficient material, threefold repetition or the fifty-move rule.
        Use <em>New game</em> to start over at any time.
      </p>
    </Layout>
  );
};

const term: React.CSSProperties = {
  fontWeight: 700,
  marginTop: '12px',
};

const definition: React.CSSProperties = {
  marginLeft: '16px',
};
