/**
 * Browser layer - fetching and reading job pages
 *
 * - PlaywrightTransport / HttpTransport: how a URL becomes HTML
 * - FetchExecutor: paced, retried fetches through a transport
 * - Listing extractor: job cards, pagination and detail descriptions from HTML
 */

export * from './transport.js';
export * from './fetch-executor.js';
export * from './listing-extractor.js';
