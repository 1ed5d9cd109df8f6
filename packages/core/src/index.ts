/**
 * @roleradar/core: config, logging, errors and the evasion/pacing layer
 */

export * from './config';
export * from './errors';
export * from './evasion-policy';
export * from './logger';
export * from './random';
export * from './rate-controller';
export * from './search-url';
export * from './session';
export * from './sleep';
export * from './text';
export type * from './types';
