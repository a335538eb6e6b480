/**
 * Error Handler Middleware Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BadRequestError, errorHandler, notFoundHandler } from '../../api/middleware/errorHandler.js';
import { AIRequestError, JobDataError, RegistryLoadError } from '../../domain/errors/PipelineErrors.js';

interface FakeResponse {
  statusCode: number;
  body: unknown;
  status(code: number): FakeResponse;
  json(body: unknown): FakeResponse;
}

function fakeResponse(): FakeResponse {
  const res: FakeResponse = {
    statusCode: 200,
    body: undefined,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(body: unknown) {
      res.body = body;
      return res;
    },
  };
  return res;
}

const req = {
  headers: { 'x-request-id': 'req-1' },
  path: '/api/job-matches',
  method: 'POST',
} as unknown as Request;

const next: NextFunction = () => undefined;

function handle(err: Error) {
  const res = fakeResponse();
  errorHandler(err, req, res as unknown as Response, next);
  return res;
}

describe('errorHandler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should answer 503 while the register is unavailable', () => {
    const res = handle(new RegistryLoadError('Sponsor register has not been loaded'));

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      error: {
        message: 'Sponsor register has not been loaded',
        code: 'REGISTRY_LOAD_ERROR',
        details: undefined,
        requestId: 'req-1',
      },
    });
  });

  it('should answer 422 for malformed scraper output', () => {
    const res = handle(new JobDataError('Job row 2 is not an object', { rowIndex: 2 }));

    expect(res.statusCode).toBe(422);
    expect(res.body).toMatchObject({ error: { code: 'JOB_DATA_ERROR', details: { rowIndex: 2 } } });
  });

  it('should answer 502 for an AI error that escaped a run', () => {
    expect(handle(new AIRequestError('overloaded')).statusCode).toBe(502);
  });

  it('should answer 400 for a bad request', () => {
    const res = handle(new BadRequestError('An Anthropic API key is required (X-Anthropic-Api-Key header)'));

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'BAD_REQUEST' } });
  });

  it('should answer 422 for request validation failures', () => {
    const result = z.object({ cvText: z.string() }).safeParse({});
    if (result.success) throw new Error('expected validation to fail');

    const res = handle(result.error);

    expect(res.statusCode).toBe(422);
    expect(res.body).toMatchObject({ error: { message: 'Validation error', code: 'VALIDATION_ERROR' } });
  });

  it('should answer 500 for anything else', () => {
    const res = handle(new Error('boom'));

    expect(res.statusCode).toBe(500);
    expect(res.body).toMatchObject({ error: { code: 'INTERNAL_ERROR', requestId: 'req-1' } });
  });
});

describe('notFoundHandler', () => {
  it('should name the missing route', () => {
    const res = fakeResponse();
    notFoundHandler(req, res as unknown as Response);

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({
      error: {
        message: 'Route not found: POST /api/job-matches',
        code: 'ROUTE_NOT_FOUND',
        requestId: 'req-1',
      },
    });
  });
});
