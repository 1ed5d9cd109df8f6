export * from './job-match-pipeline.js';
