export * from './deck.js';
export * from './events.js';
export * from './replies.js';
