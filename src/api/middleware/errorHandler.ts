/**
 * Error Handler Middleware
 *
 * Centralized error handling for the API.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { PipelineError } from '../../domain/errors/PipelineErrors.js';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
  }
}

// =============================================================================
// ERROR RESPONSE TYPE
// =============================================================================

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

function getRequestId(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

function pipelineStatusCode(err: PipelineError): number {
  switch (err.code) {
    case 'REGISTRY_LOAD_ERROR':
      return 503;
    case 'JOB_DATA_ERROR':
      return 422;
    default:
      return 502;
  }
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Log the error
  console.error('API Error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  const requestId = getRequestId(req);

  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  if (err instanceof PipelineError) {
    res.status(pipelineStatusCode(err)).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  if (err instanceof ZodError) {
    res.status(422).json({
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: { errors: err.issues },
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Default to internal server error
  res.status(500).json({
    error: {
      message:
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : err.message,
      code: 'INTERNAL_ERROR',
      requestId,
    },
  } satisfies ErrorResponse);
}

// =============================================================================
// NOT FOUND HANDLER
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: 'ROUTE_NOT_FOUND',
      requestId: getRequestId(req),
    },
  } satisfies ErrorResponse);
}
