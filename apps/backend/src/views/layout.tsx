/**
 * Page Layout
 *
 * Shared document shell with the site navigation.
 */

import * as React from 'react';
import type { RequestUser } from '../middleware/types.js';

interface LayoutProps {
  title: string;
  user?: RequestUser | null;
  children: React.ReactNode;
}

export const Layout: React.FC<LayoutProps> = ({ title, user, children }) => {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} | Chessboard`}</title>
      </head>
      <body style={body}>
        <header style={header}>
          <a href="/" style={brand}>
            Chessboard
          </a>
          <nav style={nav}>
            <a href="/" style={navLink}>
              Play
            </a>
            <a href="/history/" style={navLink}>
              History
            </a>
            <a href="/rules/" style={navLink}>
              Rules
            </a>
            <a href="/about/" style={navLink}>
              About
            </a>
            {user ? (
              <form method="post" action="/logout/" style={inlineForm}>
                <span style={navUser}>{user.username}</span>
                <button type="submit" style={linkButton}>
                  Log out
                </button>
              </form>
            ) : (
              <>
                <a href="/login/" style={navLink}>
                  Log in
                </a>
                <a href="/join/" style={navLink}>
                  Join
                </a>
              </>
            )}
          </nav>
        </header>
        <main style={main}>{children}</main>
      </body>
    </html>
  );
};

// Styles
const body: React.CSSProperties = {
  margin: 0,
  fontFamily: 'system-ui, -apple-system, "Segoe UI", sans-serif',
  backgroundColor: '#f6f3ee',
  color: '#222',
};

const header: React.CSSProperties = {
  display: 'flex',
  alignItems: 'center',
  justifyContent: 'space-between',
  padding: '12px 24px',
  backgroundColor: '#302e2b',
};

const brand: React.CSSProperties = {
  color: '#fff',
  fontWeight: 700,
  fontSize: '20px',
  textDecoration: 'none',
};

const nav: React.CSSProperties = {
  display: 'flex',
  alignItems: 'center',
  gap: '16px',
};

const navLink: React.CSSProperties = {
  color: '#ddd',
  textDecoration: 'none',
};

const navUser: React.CSSProperties = {
  color: '#aaa',
  marginRight: '8px',
};

const inlineForm: React.CSSProperties = {
  display: 'inline',
  margin: 0,
};

const linkButton: React.CSSProperties = {
  background: 'none',
  border: 'none',
  color: '#ddd',
  cursor: 'pointer',
  font: 'inherit',
  padding: 0,
};

const main: React.CSSProperties = {
  maxWidth: '880px',
  margin: '0 auto',
  padding: '24px',
};
