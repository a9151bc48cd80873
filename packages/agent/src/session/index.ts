export * from './events.js';
export * from './usage.js';
export * from './loop.js';
export * from './session.js';
