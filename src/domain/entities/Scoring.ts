/**
 * Scoring - AI match scores for sponsor-verified jobs
 */

import type { PipelineErrorCode } from '../errors/PipelineErrors.js';
import type { JobRecord } from './JobRecord.js';

export type ScoreStatus = 'ok' | 'failed' | 'skipped';

export interface ScoreResult {
  rowIndex: number;
  status: ScoreStatus;
  matchScore?: number; // 0-100, present when status is 'ok'
  reasoning?: string;
  error?: {
    code: PipelineErrorCode;
    message: string;
  };
}

export interface ScoringSummary {
  total: number;
  scored: number;
  failed: number;
  skipped: number;
  failuresByCode: Partial<Record<PipelineErrorCode, number>>;
}

export interface ScoredJob {
  job: JobRecord;
  score: ScoreResult;
}

/**
 * Structured response the model must return for each job
 */
export interface MatchScoreResponse {
  match_score: number;
  reasoning: string;
}
