/**
 * @roleradar/agents - Agent implementations
 *
 * - browser/   : Page transports, paced fetching and listing extraction
 * - search/    : One scraping session per search
 * - profile/   : Resume → candidate profile
 * - match/     : Profile × job scoring and its cache
 * - pipeline/  : Search, score and rank in one call
 * - shared/    : Common utilities
 */

export * from './shared/index.js';
export * from './browser/index.js';
export * from './search/index.js';
export * from './profile/index.js';
export * from './match/index.js';
export * from './pipeline/index.js';
