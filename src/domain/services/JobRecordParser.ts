/**
 * Job Record Parser
 *
 * Validates scraper output into typed JobRecords. Structural problems
 * (not an array, a row that is not an object, a missing column) fail the
 * whole run with JobDataError. Missing optional columns are tolerated, and
 * a company name that is not text is read as null.
 */

import { z } from 'zod';
import type { JobField, JobRecord } from '../entities/JobRecord.js';
import { JobDataError } from '../errors/PipelineErrors.js';

// Scrapers built on dataframes emit NaN for empty cells
const nanToNull = (value: unknown): unknown =>
  typeof value === 'number' && Number.isNaN(value) ? null : value;

const nullableText = z.preprocess(nanToNull, z.string().nullable());

// The column must exist; a value that is not text is an unknown company
const companyName = z.preprocess(
  (value) => (value === undefined || typeof value === 'string' ? value : null),
  z.string().nullable()
);
const optionalText = z.preprocess(
  nanToNull,
  z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined || value === '' ? undefined : String(value)))
);

const jobRowSchema = z.object({
  company_name: companyName,
  title: z.string(),
  description: nullableText,
  location: nullableText,
  job_url: optionalText,
  date_posted: optionalText,
  site: optionalText,
});

const KNOWN_COLUMNS = new Set<string>(Object.keys(jobRowSchema.shape));

function toJobField(value: unknown): JobField {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJobRecords(rows: unknown): JobRecord[] {
  if (!Array.isArray(rows)) {
    throw new JobDataError('Scraper output must be an array of job records');
  }

  return rows.map((row: unknown, rowIndex) => {
    if (!isPlainObject(row)) {
      throw new JobDataError(`Job row ${rowIndex} is not an object`, { rowIndex });
    }

    const parsed = jobRowSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') ?? '';
      throw new JobDataError(`Job row ${rowIndex} is invalid: ${field}: ${issue?.message ?? 'unknown issue'}`, {
        rowIndex,
        field,
      });
    }

    const extra: Record<string, JobField> = {};
    for (const [key, value] of Object.entries(row)) {
      if (!KNOWN_COLUMNS.has(key)) extra[key] = toJobField(value);
    }

    const data = parsed.data;
    const job: JobRecord = {
      companyName: data.company_name,
      title: data.title,
      location: data.location,
      description: data.description,
      extra,
    };
    if (data.job_url !== undefined) job.jobUrl = data.job_url;
    if (data.date_posted !== undefined) job.datePosted = data.date_posted;
    if (data.site !== undefined) job.site = data.site;
    return job;
  });
}

/**
 * Drop repeat listings of the same URL (boards syndicate each other),
 * keeping the first. Jobs without a URL are always kept.
 */
export function dedupeJobsByUrl(jobs: readonly JobRecord[]): JobRecord[] {
  const seen = new Set<string>();
  return jobs.filter((job) => {
    if (job.jobUrl === undefined) return true;
    if (seen.has(job.jobUrl)) return false;
    seen.add(job.jobUrl);
    return true;
  });
}
