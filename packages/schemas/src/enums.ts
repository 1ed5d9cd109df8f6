import { z } from 'zod';

export const workTypeEnum = z.enum(['full-time', 'part-time', 'contract-temp', 'casual-vacation']);
export type WorkType = z.infer<typeof workTypeEnum>;

export const remoteOptionEnum = z.enum(['on-site', 'hybrid', 'remote']);
export type RemoteOption = z.infer<typeof remoteOptionEnum>;

/** Listing age filter: "today" or a number of days. */
export const datePostedEnum = z.enum(['today', '3', '7', '14', '30']);
export type DatePosted = z.infer<typeof datePostedEnum>;

export const recommendationTierEnum = z.enum(['Strong', 'Good', 'Moderate', 'Weak']);
export type RecommendationTier = z.infer<typeof recommendationTierEnum>;
