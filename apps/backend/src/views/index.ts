/**
 * Views Index
 *
 * Server-rendered pages, one component per file.
 */

export { renderPage, renderErrorPage } from './render.js';
export { ChessPage } from './chess-page.js';
export type { MoveFormValues } from './chess-page.js';
export { HistoryPage } from './history-page.js';
export { RulesPage } from './rules-page.js';
export { AboutPage } from './about-page.js';
export { LoginPage } from './login-page.js';
export { JoinPage } from './join-page.js';
export type { JoinFormValues } from './join-page.js';
