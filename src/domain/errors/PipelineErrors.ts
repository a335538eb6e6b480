/**
 * Pipeline Errors
 *
 * Registry and scraper-level errors abort a run. The AI errors are
 * row-scoped: the scoring engine catches them and records the row as
 * failed, so they never escape `scoreAll`.
 */

export type PipelineErrorCode =
  | 'REGISTRY_LOAD_ERROR'
  | 'JOB_DATA_ERROR'
  | 'AI_REQUEST_ERROR'
  | 'AI_RESPONSE_SCHEMA_ERROR'
  | 'AI_SCORE_RANGE_ERROR';

export class PipelineError extends Error {
  constructor(
    message: string,
    public code: PipelineErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

// =============================================================================
// FATAL
// =============================================================================

export class RegistryLoadError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REGISTRY_LOAD_ERROR', details);
    this.name = 'RegistryLoadError';
  }
}

export class JobDataError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JOB_DATA_ERROR', details);
    this.name = 'JobDataError';
  }
}

// =============================================================================
// ROW-SCOPED (scoring)
// =============================================================================

export class AIRequestError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AI_REQUEST_ERROR', details);
    this.name = 'AIRequestError';
  }
}

export class AIResponseSchemaError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AI_RESPONSE_SCHEMA_ERROR', details);
    this.name = 'AIResponseSchemaError';
  }
}

export class AIScoreRangeError extends PipelineError {
  constructor(score: number) {
    super(`match_score ${score} is outside 0-100`, 'AI_SCORE_RANGE_ERROR', { score });
    this.name = 'AIScoreRangeError';
  }
}

export type ScoringError = AIRequestError | AIResponseSchemaError | AIScoreRangeError;

export function isScoringError(error: unknown): error is ScoringError {
  return (
    error instanceof AIRequestError ||
    error instanceof AIResponseSchemaError ||
    error instanceof AIScoreRangeError
  );
}
