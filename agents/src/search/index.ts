export * from './job-search.js';
