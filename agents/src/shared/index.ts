export * from './base-agent.js';
export * from './coerce.js';
export * from './types.js';
