export * from './match-cache.js';
export * from './match-scorer-agent.js';
export * from './recommendation.js';
