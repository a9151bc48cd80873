// @parley/agent: tool registry, executor and conversation loop

export * from './types/index.js';
export * from './tools/index.js';
export * from './session/index.js';
