export * from './chess.js';
export * from './move.js';
export * from './user.js';
