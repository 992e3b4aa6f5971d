import * as React from 'react';
import type { RequestUser } from '../middleware/types.js';
import { Layout } from './layout.js';

export const AboutPage: React.FC<{ user?: RequestUser | null }> = ({ user }) => {
  return (
    <Layout title="About" user={user}>
      <h1>About</h1>
      <p>
        Chessboard is a board for playing both sides of a game of chess in the browser. Every account keeps its own
        game, so you can log out and pick up where you left off.
      </p>
      <p>The server checks every move against the rules of chess before it is saved.</p>
    </Layout>
  );
};
