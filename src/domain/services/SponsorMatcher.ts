/**
 * Sponsor Matcher
 *
 * Fuzzy-matches company names against the sponsor register. Job tables
 * repeat the same employer many times, so callers go through `resolve`
 * with a per-run cache: each distinct normalized name is matched once
 * and the result is shared by every row carrying it.
 */

import { LevenshteinDistance } from 'natural';
import type { JobRecord } from '../entities/JobRecord.js';
import type {
  MatchCache,
  MatchResult,
  RegistryEntry,
  SponsorCheckedJob,
  SponsorRegistry,
} from '../entities/SponsorRegistry.js';
import { normalizeCompanyName } from './RegistryIndex.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const SPONSOR_MATCH_THRESHOLD = 85;

/** Similarity on a 0-100 scale, unrounded */
export type SimilarityScorer = (query: string, candidate: string) => number;

export interface SponsorMatcherConfig {
  threshold: number;
  scorer: SimilarityScorer;
}

const DEFAULT_CONFIG: SponsorMatcherConfig = {
  threshold: SPONSOR_MATCH_THRESHOLD,
  scorer: (query, candidate) => tokenSortRatio(query, candidate),
};

const UNMATCHED_BLANK: MatchResult = Object.freeze({ inputName: '', matched: false, confidence: 0 });

/**
 * Token-sort ratio: whitespace tokens are sorted and rejoined, then scored
 * as 100 * (1 - indel distance / combined length). No characters are
 * stripped, so punctuation counts as a difference.
 */
export function tokenSortRatio(a: string, b: string): number {
  const left = sortTokens(a);
  const right = sortTokens(b);
  const lengthSum = left.length + right.length;
  if (lengthSum === 0) return 100;

  // A substitution costs one deletion plus one insertion
  const distance = LevenshteinDistance(left, right, {
    insertion_cost: 1,
    deletion_cost: 1,
    substitution_cost: 2,
  });
  return (100 * (lengthSum - distance)) / lengthSum;
}

function sortTokens(value: string): string {
  return value.split(/\s+/).filter(Boolean).sort().join(' ');
}

export function createMatchCache(): MatchCache {
  return new Map<string, MatchResult>();
}

// =============================================================================
// SPONSOR MATCHER
// =============================================================================

export class SponsorMatcher {
  private config: SponsorMatcherConfig;

  constructor(
    private registry: SponsorRegistry,
    config: Partial<SponsorMatcherConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Match one name against every registry entry.
   * Names that are not non-blank strings never reach the scorer.
   */
  match(name: unknown): MatchResult {
    const key = normalizeCompanyName(name);
    if (key === null) return UNMATCHED_BLANK;

    let best: RegistryEntry | undefined;
    let bestScore = 0;
    for (const entry of this.registry.entries) {
      const score = this.config.scorer(key, entry.canonicalName);
      // Strictly greater: the first entry wins a tie
      if (best === undefined || score > bestScore) {
        best = entry;
        bestScore = score;
      }
    }

    // The threshold applies to the raw score; confidence is truncated
    const confidence = Math.max(0, Math.min(100, Math.trunc(bestScore)));
    if (best !== undefined && bestScore >= this.config.threshold) {
      return {
        inputName: key,
        matched: true,
        canonicalName: best.canonicalName,
        sponsorName: best.name,
        confidence,
      };
    }
    return { inputName: key, matched: false, confidence };
  }

  /**
   * Cached lookup. Raw spellings that normalize to the same key
   * ("ACME Ltd" and " acme ltd") share one result.
   */
  resolve(name: unknown, cache: MatchCache): MatchResult {
    const key = normalizeCompanyName(name);
    if (key === null) return UNMATCHED_BLANK;

    const cached = cache.get(key);
    if (cached) return cached;

    const result = this.match(key);
    cache.set(key, result);
    return result;
  }

  /**
   * Annotate every job with its company's match, in input order
   */
  verify(jobs: readonly JobRecord[], cache: MatchCache): SponsorCheckedJob[] {
    return jobs.map((job) => ({ job, match: this.resolve(job.companyName, cache) }));
  }
}
