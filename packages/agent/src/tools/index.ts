export * from './errors.js';
export * from './define.js';
export * from './registry.js';
export * from './schema.js';
export * from './executor.js';
export * from './dispatch.js';
export * from './builtin/index.js';
