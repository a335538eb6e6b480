/**
 * Job Search Pipeline - Sponsor verification and CV scoring
 *
 * Thin coordinator over the domain services:
 * 1. Validate scraper output
 * 2. Drop duplicate listings (same URL)
 * 3. Fuzzy-match companies against the sponsor register (one match per
 *    distinct company, cache scoped to this run)
 * 4. Score the sponsor jobs against the CV
 * 5. Rank and report, failures included
 */

import { v4 as uuid } from 'uuid';
import type { JobRecord } from '../../domain/entities/JobRecord.js';
import type { SponsorRegistry } from '../../domain/entities/SponsorRegistry.js';
import type { ScoredJob, ScoringSummary } from '../../domain/entities/Scoring.js';
import type { PipelineErrorCode } from '../../domain/errors/PipelineErrors.js';
import { parseJobRecords, dedupeJobsByUrl } from '../../domain/services/JobRecordParser.js';
import { SponsorMatcher, createMatchCache } from '../../domain/services/SponsorMatcher.js';
import { AIJobScorer, summarizeScores } from '../../domain/services/AIJobScorer.js';
import { MIN_MATCH_SCORE, rankScoredJobs, zipScores } from '../../domain/services/JobRanking.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PipelineConfig {
  minMatchScore: number;
}

const DEFAULT_CONFIG: PipelineConfig = {
  minMatchScore: MIN_MATCH_SCORE,
};

export interface PipelineInput {
  jobs: unknown;
  cvText: string;
  minMatchScore?: number;
  onProgress?: (current: number, total: number) => void;
}

export interface SponsorJob extends ScoredJob {
  sponsorName: string;
  sponsorConfidence: number;
}

export interface PipelineReport {
  runId: string;
  counts: {
    scraped: number;
    unique: number;
    sponsorVerified: number;
    scored: number;
    failed: number;
    skipped: number;
    matched: number;
  };
  scoring: ScoringSummary;
  matches: SponsorJob[];
  sponsorJobs: SponsorJob[];
  failures: Array<{ rowIndex: number; title: string; code: PipelineErrorCode; message: string }>;
  completedAt: Date;
}

// =============================================================================
// JOB SEARCH PIPELINE
// =============================================================================

export class JobSearchPipeline {
  private matcher: SponsorMatcher;
  private config: PipelineConfig;

  constructor(
    registry: SponsorRegistry,
    private scorer: AIJobScorer,
    config: Partial<PipelineConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.matcher = new SponsorMatcher(registry);
  }

  async run(input: PipelineInput): Promise<PipelineReport> {
    const runId = uuid();
    const minMatchScore = input.minMatchScore ?? this.config.minMatchScore;

    const scraped = parseJobRecords(input.jobs);
    const unique = dedupeJobsByUrl(scraped);
    console.log(`[JobSearchPipeline] ${runId}: ${scraped.length} jobs scraped, ${unique.length} unique`);

    const cache = createMatchCache();
    const checked = this.matcher.verify(unique, cache);
    const verified = checked.filter(({ match }) => match.matched);
    console.log(
      `[JobSearchPipeline] ${runId}: ${verified.length} jobs from verified sponsors ` +
        `(${cache.size} distinct companies checked)`
    );

    const sponsorJobs: JobRecord[] = verified.map(({ job }) => job);
    const scores = sponsorJobs.length > 0
      ? await this.scorer.scoreAll(sponsorJobs, input.cvText, { onProgress: input.onProgress })
      : [];

    const scored: SponsorJob[] = zipScores(sponsorJobs, scores).map((row, i) => ({
      ...row,
      sponsorName: verified[i].match.sponsorName ?? '',
      sponsorConfidence: verified[i].match.confidence,
    }));
    const matches = rankScoredJobs(scored, minMatchScore);
    const summary = summarizeScores(scores);

    const failures = scored.flatMap(({ job, score }) =>
      score.status === 'failed' && score.error
        ? [{ rowIndex: score.rowIndex, title: job.title, code: score.error.code, message: score.error.message }]
        : []
    );

    console.log(
      `[JobSearchPipeline] ${runId}: ${matches.length} jobs match the CV (score >= ${minMatchScore}), ` +
        `${summary.failed} of ${summary.total} failed to score`
    );

    return {
      runId,
      counts: {
        scraped: scraped.length,
        unique: unique.length,
        sponsorVerified: verified.length,
        scored: summary.scored,
        failed: summary.failed,
        skipped: summary.skipped,
        matched: matches.length,
      },
      scoring: summary,
      matches,
      sponsorJobs: scored,
      failures,
      completedAt: new Date(),
    };
  }
}
