import type { TierThresholds } from '@roleradar/core';
import type { RecommendationTier } from '@roleradar/schemas';

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = { strong: 85, good: 70, moderate: 50 };

/** Tier for a 0-100 score; each threshold is inclusive. */
export function tierForScore(
  score: number,
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS,
): RecommendationTier {
  if (score >= thresholds.strong) return 'Strong';
  if (score >= thresholds.good) return 'Good';
  if (score >= thresholds.moderate) return 'Moderate';
  return 'Weak';
}
