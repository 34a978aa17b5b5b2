export * from './contracts/common.js';
export * from './contracts/events.js';
export * from './contracts/matches.js';
export * from './contracts/games.js';
export * from './contracts/store.js';
export * from './errors.js';
