import type { MatchResult } from '@roleradar/schemas';

/**
 * Match results keyed by (jobId, profileVersion). A new resume hashes to a
 * new version, so earlier results for the same job are never returned for it.
 */
export class MatchCache {
  private readonly entries = new Map<string, MatchResult>();

  private static key(jobId: string, profileVersion: string): string {
    return `${profileVersion}\u0000${jobId}`;
  }

  get(jobId: string, profileVersion: string): MatchResult | undefined {
    return this.entries.get(MatchCache.key(jobId, profileVersion));
  }

  set(result: MatchResult): void {
    this.entries.set(MatchCache.key(result.jobId, result.profileVersion), result);
  }

  get size(): number {
    return this.entries.size;
  }
}
