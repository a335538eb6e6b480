/**
 * Job Record Parser Tests
 */

import { describe, it, expect } from '@jest/globals';
import { parseJobRecords, dedupeJobsByUrl } from '../../domain/services/JobRecordParser.js';
import { JobDataError } from '../../domain/errors/PipelineErrors.js';
import { makeJob } from '../helpers/factories.js';

const row = (overrides: Record<string, unknown> = {}) => ({
  company_name: 'Globex Corporation',
  title: 'Analytics Engineer',
  description: 'Own the dbt models.',
  location: 'London',
  ...overrides,
});

describe('parseJobRecords', () => {
  it('should map scraper columns onto job records', () => {
    const [job] = parseJobRecords([
      row({ job_url: 'https://jobs.example.com/42', date_posted: '2026-10-01', site: 'indeed' }),
    ]);

    expect(job).toEqual({
      companyName: 'Globex Corporation',
      title: 'Analytics Engineer',
      description: 'Own the dbt models.',
      location: 'London',
      jobUrl: 'https://jobs.example.com/42',
      datePosted: '2026-10-01',
      site: 'indeed',
      extra: {},
    });
  });

  it('should tolerate missing optional fields', () => {
    const [job] = parseJobRecords([row()]);

    expect(job.jobUrl).toBeUndefined();
    expect(job.datePosted).toBeUndefined();
    expect(job.site).toBeUndefined();
  });

  it('should turn null and NaN values into null', () => {
    const [job] = parseJobRecords([
      row({ company_name: Number.NaN, description: null, location: null, job_url: Number.NaN }),
    ]);

    expect(job.companyName).toBeNull();
    expect(job.description).toBeNull();
    expect(job.location).toBeNull();
    expect(job.jobUrl).toBeUndefined();
  });

  it('should read a company name that is not text as unknown', () => {
    const jobs = parseJobRecords([row({ company_name: 404 }), row({ company_name: true }), row()]);

    expect(jobs.map((job) => job.companyName)).toEqual([null, null, 'Globex Corporation']);
  });

  it('should still require the company column', () => {
    const { company_name: _companyName, ...withoutCompany } = row();

    expect(() => parseJobRecords([withoutCompany])).toThrow('Job row 0 is invalid: company_name: Required');
  });

  it('should carry unknown columns in extra', () => {
    const [job] = parseJobRecords([
      row({ min_amount: 55000, is_remote: false, emails: ['jobs@example.com'], company_url: null }),
    ]);

    expect(job.extra).toEqual({
      min_amount: 55000,
      is_remote: false,
      emails: '["jobs@example.com"]',
      company_url: null,
    });
  });

  it('should stringify numeric dates', () => {
    const [job] = parseJobRecords([row({ date_posted: 20261001 })]);
    expect(job.datePosted).toBe('20261001');
  });

  it('should reject input that is not an array', () => {
    expect(() => parseJobRecords({ jobs: [] })).toThrow(JobDataError);
  });

  it('should reject a row that is not an object', () => {
    expect(() => parseJobRecords([row(), 'not a job'])).toThrow('Job row 1 is not an object');
  });

  it('should reject a row missing a required column', () => {
    const { location: _location, ...withoutLocation } = row();

    expect(() => parseJobRecords([row(), row(), withoutLocation])).toThrow(
      'Job row 2 is invalid: location: Required'
    );
  });

  it('should reject a row without a title', () => {
    let caught: unknown;
    try {
      parseJobRecords([row({ title: null })]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(JobDataError);
    expect(caught).toMatchObject({ code: 'JOB_DATA_ERROR', details: { rowIndex: 0, field: 'title' } });
  });

  it('should accept an empty table', () => {
    expect(parseJobRecords([])).toEqual([]);
  });
});

describe('dedupeJobsByUrl', () => {
  it('should keep the first listing for each URL', () => {
    const jobs = [
      makeJob({ title: 'First', jobUrl: 'https://jobs.example.com/1' }),
      makeJob({ title: 'Second', jobUrl: 'https://jobs.example.com/2' }),
      makeJob({ title: 'Repeat', jobUrl: 'https://jobs.example.com/1' }),
    ];

    expect(dedupeJobsByUrl(jobs).map((j) => j.title)).toEqual(['First', 'Second']);
  });

  it('should keep every listing without a URL', () => {
    const jobs = [makeJob({ title: 'A' }), makeJob({ title: 'B' })];
    expect(dedupeJobsByUrl(jobs)).toHaveLength(2);
  });
});
