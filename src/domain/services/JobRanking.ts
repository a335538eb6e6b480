/**
 * Job Ranking & Export
 *
 * Turns index-aligned scores into the ranked result list and renders
 * results as a flat CSV table.
 */

import { stringify } from 'csv-stringify/sync';
import type { JobField, JobRecord } from '../entities/JobRecord.js';
import type { ScoredJob, ScoreResult } from '../entities/Scoring.js';

export const MIN_MATCH_SCORE = 70;

export const CSV_COLUMNS = [
  'match_score',
  'reasoning',
  'title',
  'company_name',
  'location',
  'job_url',
  'date_posted',
  'site',
] as const;

const RESERVED_COLUMNS: ReadonlySet<string> = new Set<string>([...CSV_COLUMNS, 'sponsor_name']);

/**
 * Pair each job with its score. `scores` must be index-aligned with `jobs`.
 */
export function zipScores(jobs: readonly JobRecord[], scores: readonly ScoreResult[]): ScoredJob[] {
  if (jobs.length !== scores.length) {
    throw new Error(`Expected ${jobs.length} scores, got ${scores.length}`);
  }
  return jobs.map((job, i) => ({ job, score: scores[i] }));
}

/**
 * Successful rows scoring at least `minScore`, best first.
 * Array.prototype.sort is stable, so ties keep input order.
 */
export function rankScoredJobs<T extends ScoredJob>(scored: readonly T[], minScore: number = MIN_MATCH_SCORE): T[] {
  return scored
    .filter(({ score }) => score.status === 'ok' && (score.matchScore ?? 0) >= minScore)
    .sort((a, b) => (b.score.matchScore ?? 0) - (a.score.matchScore ?? 0));
}

export interface ExportRow extends ScoredJob {
  sponsorName?: string;
}

/**
 * Fixed columns, then `sponsor_name` when rows carry the register's
 * published name, then extra scraper columns in first-seen order.
 */
export function toCsv(rows: readonly ExportRow[]): string {
  const sponsorColumns = rows.some((row) => row.sponsorName !== undefined) ? ['sponsor_name'] : [];
  const extraColumns: string[] = [];
  for (const { job } of rows) {
    for (const key of Object.keys(job.extra)) {
      if (!extraColumns.includes(key) && !RESERVED_COLUMNS.has(key)) {
        extraColumns.push(key);
      }
    }
  }

  const records = rows.map(({ job, score, sponsorName }) => {
    const base: Record<string, JobField> = {
      match_score: score.matchScore ?? null,
      reasoning: score.reasoning ?? null,
      title: job.title,
      company_name: job.companyName,
      location: job.location,
      job_url: job.jobUrl ?? null,
      date_posted: job.datePosted ?? null,
      site: job.site ?? null,
    };
    if (sponsorColumns.length > 0) {
      base.sponsor_name = sponsorName ?? null;
    }
    for (const key of extraColumns) {
      base[key] = job.extra[key] ?? null;
    }
    return base;
  });

  return stringify(records, {
    header: true,
    columns: [...CSV_COLUMNS, ...sponsorColumns, ...extraColumns],
    cast: { boolean: (value) => String(value) },
  });
}
