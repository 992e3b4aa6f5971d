import * as React from 'react';
import type { MoveRecord } from '@chessboard/shared';
import type { RequestUser } from '../middleware/types.js';
import { Layout } from './layout.js';

interface HistoryPageProps {
  user: RequestUser;
  gameNumber: number;
  history: MoveRecord[];
}

interface MovePair {
  number: number;
  white: MoveRecord;
  black?: MoveRecord;
}

function pairMoves(history: MoveRecord[]): MovePair[] {
  const pairs: MovePair[] = [];
  for (let i = 0; i < history.length; i += 2) {
    pairs.push({ number: i / 2 + 1, white: history[i], black: history[i + 1] });
  }
  return pairs;
}

export const HistoryPage: React.FC<HistoryPageProps> = ({ user, gameNumber, history }) => {
  return (
    <Layout title="History" user={user}>
      <h1>{`Moves of game ${gameNumber}`}</h1>
      {history.length === 0 ? (
        <p className="empty">No moves have been played yet.</p>
      ) : (
        <table className="history" style={table}>
          <thead>
            <tr>
              <th style={cell}>#</th>
              <th style={cell}>White</th>
              <th style={cell}>Black</th>
            </tr>
          </thead>
          <tbody>
            {pairMoves(history).map((pair) => (
              <tr key={pair.number}>
                <td style={cell}>{pair.number}</td>
                <td style={cell} title={`${pair.white.from}-${pair.white.to}`}>
                  {pair.white.san}
                </td>
                <td style={cell} title={pair.black ? `${pair.black.from}-${pair.black.to}` : undefined}>
                  {pair.black?.san ?? ''}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
      <p>
        <a href="/">Back to the board</a>
      </p>
    </Layout>
  );
};

const table: React.CSSProperties = {
  borderCollapse: 'collapse',
  minWidth: '280px',
};

const cell: React.CSSProperties = {
  borderBottom: '1px solid #ddd',
  padding: '4px 12px',
  textAlign: 'left',
};
