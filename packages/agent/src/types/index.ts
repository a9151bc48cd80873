export * from './tool.js';
export * from './turn.js';
export * from './event.js';
export * from './session.js';
export * from './logger.js';
