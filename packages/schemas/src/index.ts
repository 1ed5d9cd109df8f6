/**
 * @roleradar/schemas - shared record shapes for search, profiles and matches
 */

export * from './enums';
export * from './job';
export * from './profile';
export * from './match';
