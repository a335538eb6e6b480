/**
 * Sponsor Registry - Licensed visa sponsors
 *
 * The register is loaded once, normalized, and read-only thereafter.
 */

import type { JobRecord } from './JobRecord.js';

export interface RegistryEntry {
  readonly name: string; // as published, trimmed
  readonly canonicalName: string; // trimmed + lower-cased
  readonly attributes: Readonly<Record<string, string>>; // other columns, opaque
}

export interface SponsorRegistry {
  readonly entries: readonly RegistryEntry[];
  readonly nameColumn: string;
  readonly loadedAt: Date;
}

export type RegistrySource =
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string }
  | { kind: 'publication'; pageUrl: string };

// =============================================================================
// MATCHING
// =============================================================================

export interface MatchResult {
  inputName: string; // normalized key, not the raw spelling
  matched: boolean;
  canonicalName?: string;
  sponsorName?: string; // as published in the register
  confidence: number; // 0-100
}

/**
 * Per-run cache keyed by normalized company name. Created by the caller
 * and passed down explicitly; never module-global.
 */
export type MatchCache = Map<string, MatchResult>;

export interface SponsorCheckedJob {
  job: JobRecord;
  match: MatchResult;
}
