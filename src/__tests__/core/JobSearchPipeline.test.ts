/**
 * Job Search Pipeline Tests
 *
 * Runs the whole pipeline over a small scraped table with a faked Claude
 * client and a real fuzzy matcher.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { JobSearchPipeline } from '../../core/orchestrator/JobSearchPipeline.js';
import { AIJobScorer, type ScoringModelClient } from '../../domain/services/AIJobScorer.js';
import { RequestPacer } from '../../domain/services/RequestPacer.js';
import { SponsorMatcher } from '../../domain/services/SponsorMatcher.js';
import { JobDataError } from '../../domain/errors/PipelineErrors.js';
import { makeRegistry, scoreOutput } from '../helpers/factories.js';

const job = (company: string | null, title: string, url: string) => ({
  company_name: company,
  title,
  description: `${title} working on data products.`,
  location: 'London',
  job_url: `https://jobs.example.com/${url}`,
});

const SCRAPED = [
  job('Acme Consulting Ltd', 'Data Engineer', '1'),
  job('ACME CONSULTING LTD', 'Platform Engineer', '2'),
  job('Unknown Startup Co', 'Founding Engineer', '3'),
  job('Globex Corporation', 'Analytics Engineer', '4'),
  job(null, 'Mystery Role', '5'),
  job('acme consulting ltd', 'ML Engineer', '6'),
  job('Globex Corporation', 'BI Developer', '7'),
  job('Acme Consulting Ltd', 'Data Engineer (repost)', '1'),
];

describe('JobSearchPipeline', () => {
  const registry = makeRegistry(['Acme Consulting Ltd', 'Globex Corporation', 'Initech Limited']);
  let structured: ReturnType<typeof jest.fn<ScoringModelClient['structured']>>;
  let pipeline: JobSearchPipeline;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    structured = jest.fn<ScoringModelClient['structured']>();
    const scorer = new AIJobScorer({ structured }, new RequestPacer({ minIntervalMs: 0 }));
    pipeline = new JobSearchPipeline(registry, scorer);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should verify sponsors, score, and rank the survivors', async () => {
    structured
      .mockResolvedValueOnce(scoreOutput(72))
      .mockResolvedValueOnce(scoreOutput(95))
      .mockResolvedValueOnce(scoreOutput(40))
      .mockResolvedValueOnce(scoreOutput(88))
      .mockRejectedValueOnce(new Error('overloaded'));

    const report = await pipeline.run({ jobs: SCRAPED, cvText: 'Python, Spark, Airflow' });

    expect(report.counts).toEqual({
      scraped: 8,
      unique: 7,
      sponsorVerified: 5,
      scored: 4,
      failed: 1,
      skipped: 0,
      matched: 3,
    });
    expect(report.matches.map(({ job: j, score }) => [j.title, score.matchScore])).toEqual([
      ['Platform Engineer', 95],
      ['ML Engineer', 88],
      ['Data Engineer', 72],
    ]);
    expect(report.failures).toEqual([
      { rowIndex: 4, title: 'BI Developer', code: 'AI_REQUEST_ERROR', message: 'overloaded' },
    ]);
    expect(report.sponsorJobs.map(({ job: j }) => j.title)).toEqual([
      'Data Engineer',
      'Platform Engineer',
      'Analytics Engineer',
      'ML Engineer',
      'BI Developer',
    ]);
    expect(report.sponsorJobs[1]).toMatchObject({ sponsorName: 'Acme Consulting Ltd', sponsorConfidence: 100 });
    expect(report.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should fuzzy-match each distinct company once per run', async () => {
    structured.mockResolvedValue(scoreOutput(80));
    const match = jest.spyOn(SponsorMatcher.prototype, 'match');

    await pipeline.run({ jobs: SCRAPED, cvText: 'cv' });

    // acme consulting ltd, unknown startup co, globex corporation
    expect(match).toHaveBeenCalledTimes(3);
  });

  it('should start each run with an empty cache', async () => {
    structured.mockResolvedValue(scoreOutput(80));
    const match = jest.spyOn(SponsorMatcher.prototype, 'match');

    await pipeline.run({ jobs: SCRAPED, cvText: 'cv' });
    await pipeline.run({ jobs: SCRAPED, cvText: 'cv' });

    expect(match).toHaveBeenCalledTimes(6);
  });

  it('should apply a per-run minimum score', async () => {
    structured
      .mockResolvedValueOnce(scoreOutput(72))
      .mockResolvedValueOnce(scoreOutput(95))
      .mockResolvedValueOnce(scoreOutput(40))
      .mockResolvedValueOnce(scoreOutput(88))
      .mockResolvedValueOnce(scoreOutput(91));

    const report = await pipeline.run({ jobs: SCRAPED, cvText: 'cv', minMatchScore: 90 });

    expect(report.matches.map(({ score }) => score.matchScore)).toEqual([95, 91]);
  });

  it('should skip scoring when no company is a sponsor', async () => {
    const report = await pipeline.run({
      jobs: [job('Unknown Startup Co', 'Founding Engineer', '3')],
      cvText: 'cv',
    });

    expect(structured).not.toHaveBeenCalled();
    expect(report.counts.sponsorVerified).toBe(0);
    expect(report.matches).toEqual([]);
  });

  it('should accept an empty CV', async () => {
    structured.mockResolvedValue(scoreOutput(10));

    const report = await pipeline.run({ jobs: SCRAPED, cvText: '' });

    expect(report.counts.scored).toBe(5);
    expect(report.matches).toEqual([]);
  });

  it('should report progress while scoring', async () => {
    structured.mockResolvedValue(scoreOutput(80));
    const onProgress = jest.fn<(current: number, total: number) => void>();

    await pipeline.run({ jobs: SCRAPED, cvText: 'cv', onProgress });

    expect(onProgress).toHaveBeenCalledTimes(5);
    expect(onProgress).toHaveBeenLastCalledWith(5, 5);
  });

  it('should fail fast on malformed scraper output', async () => {
    await expect(pipeline.run({ jobs: [{ title: 'No company column' }], cvText: 'cv' })).rejects.toThrow(
      JobDataError
    );
    expect(structured).not.toHaveBeenCalled();
  });
});
