export * from './profile-extractor-agent.js';
