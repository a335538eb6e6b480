/**
 * AI Job Scorer
 *
 * Uses Claude to score how well a CV fits each sponsor-verified job.
 *
 * Scoring dimensions given to the model:
 * - Skill Match: explicit and implied competencies against the JD
 * - Experience Level: scope and seniority against what the JD demands
 * - Domain Fit: industry and problem-space overlap
 *
 * `scoreAll` returns exactly one result per input job, in input order.
 * A row that cannot be scored is marked failed and the batch continues.
 */

import { z } from 'zod';
import {
  getUsageStats,
  parseJsonContent,
  type ClaudeModel,
  type ResponseSchema,
  type StructuredClient,
  type StructuredResponse,
} from '../../integrations/llm/ClaudeClient.js';
import type { JobRecord } from '../entities/JobRecord.js';
import type { MatchScoreResponse, ScoreResult, ScoringSummary } from '../entities/Scoring.js';
import {
  AIRequestError,
  AIResponseSchemaError,
  AIScoreRangeError,
  isScoringError,
} from '../errors/PipelineErrors.js';
import { RequestPacer } from './RequestPacer.js';

// =============================================================================
// TYPES
// =============================================================================

export type ScoringModelClient = StructuredClient;

export interface AIJobScorerConfig {
  model?: ClaudeModel;
  maxTokens: number;
  temperature: number;
}

export interface ScoreAllOptions {
  onProgress?: (current: number, total: number) => void;
}

const DEFAULT_CONFIG: AIJobScorerConfig = {
  maxTokens: 1024,
  temperature: 0.2, // Low temperature for consistent scoring
};

// =============================================================================
// PROMPTS
// =============================================================================

const JOB_SCORING_SYSTEM_PROMPT = `You are a perceptive, strategic executive headhunter. You critically evaluate a candidate's CV against a job description (JD) to find realistic, high-quality matches.

Be fact-based but use professional judgement. Candidates and hiring managers describe the same work in different words: if the CV shows a competency that satisfies a JD requirement under another name, count it. Never invent core skills or frameworks the CV does not show.

Judge three things:
- Skill match: required and preferred skills, explicit or clearly demonstrated
- Experience level: whether the scope of work and years of experience fit the seniority the JD asks for
- Domain fit: whether the candidate's industry and problem space carry over

Match score rubric (0-100):
- 90-100: Exceptional fit. Every mandatory and preferred skill evidenced, plus direct domain experience.
- 70-89: Solid fit. Core requirements met; may lack a few nice-to-haves.
- 50-69: Borderline. Missing one or two core competencies, or short on seniority.
- 0-49: Reject. Fundamental mismatch in domain, seniority or primary technologies.

The reasoning must be one honest, specific sentence. Below 80, name the biggest gap; at 80 or above, name the strongest matching competency.

Record your evaluation with the record_match_score tool.`;

export const MATCH_SCORE_SCHEMA: ResponseSchema = {
  name: 'record_match_score',
  description: 'Record how well the CV matches the job description',
  inputSchema: {
    type: 'object',
    properties: {
      match_score: {
        type: 'integer',
        minimum: 0,
        maximum: 100,
        description: 'Overall fit from 0 to 100',
      },
      reasoning: {
        type: 'string',
        description: 'One sentence explaining the score',
      },
    },
    required: ['match_score', 'reasoning'],
  },
};

const matchScoreResponseSchema = z.object({
  match_score: z.number().int(),
  reasoning: z.string(),
});

/**
 * Job postings are untrusted text (and often contain braces from code
 * snippets), so the prompt is built by concatenation, never templating.
 */
export function buildScoringPrompt(cvText: string, job: JobRecord): string {
  return (
    'CV:\n' +
    cvText +
    '\n\nJob Title:\n' +
    job.title +
    '\n\nJob Description:\n' +
    (job.description ?? '')
  );
}

/**
 * Validate a structured answer. Shape problems are schema errors; a
 * well-formed score outside 0-100 is a range error.
 */
export function validateMatchScore(raw: unknown): MatchScoreResponse {
  const parsed = matchScoreResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AIResponseSchemaError('Response does not match the score schema', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }

  const { match_score, reasoning } = parsed.data;
  if (match_score < 0 || match_score > 100) {
    throw new AIScoreRangeError(match_score);
  }

  return { match_score, reasoning };
}

// =============================================================================
// AI JOB SCORER CLASS
// =============================================================================

export class AIJobScorer {
  private claudeClient: ScoringModelClient;
  private pacer: RequestPacer;
  private config: AIJobScorerConfig;
  private responses: StructuredResponse[] = [];

  constructor(
    claudeClient: ScoringModelClient,
    pacer?: RequestPacer,
    config: Partial<AIJobScorerConfig> = {}
  ) {
    this.claudeClient = claudeClient;
    this.pacer = pacer || new RequestPacer();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Score a single job. Throws AIRequestError, AIResponseSchemaError or
   * AIScoreRangeError.
   */
  async scoreJob(job: JobRecord, cvText: string): Promise<MatchScoreResponse> {
    let response: StructuredResponse;
    try {
      response = await this.pacer.run(() =>
        this.claudeClient.structured({
          systemPrompt: JOB_SCORING_SYSTEM_PROMPT,
          prompt: buildScoringPrompt(cvText, job),
          schema: MATCH_SCORE_SCHEMA,
          model: this.config.model,
          maxTokens: this.config.maxTokens,
          temperature: this.config.temperature,
        })
      );
    } catch (error) {
      throw new AIRequestError(error instanceof Error ? error.message : 'Unknown error', {
        errorName: error instanceof Error ? error.name : typeof error,
      });
    }

    this.responses.push(response);
    return validateMatchScore(response.output ?? this.parseTextAnswer(response));
  }

  /**
   * Score every job in order. Never throws for a bad row: the result has
   * the same length and order as `jobs`.
   */
  async scoreAll(
    jobs: readonly JobRecord[],
    cvText: string,
    options: ScoreAllOptions = {}
  ): Promise<ScoreResult[]> {
    const startTime = Date.now();
    this.responses = [];
    const results: ScoreResult[] = [];

    for (const [rowIndex, job] of jobs.entries()) {
      options.onProgress?.(rowIndex + 1, jobs.length);
      results.push(await this.scoreRow(rowIndex, job, cvText));
    }

    const summary = summarizeScores(results);
    const usage = getUsageStats(this.responses);
    console.log(
      `[AIJobScorer] ${summary.scored} of ${summary.total} jobs scored, ${summary.failed} failed, ` +
        `${summary.skipped} skipped (${usage.totalTokens} tokens, ${Date.now() - startTime}ms)`
    );

    return results;
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private async scoreRow(rowIndex: number, job: JobRecord, cvText: string): Promise<ScoreResult> {
    if (!job.description?.trim()) {
      return { rowIndex, status: 'skipped', reasoning: 'No job description available.' };
    }

    try {
      const { match_score, reasoning } = await this.scoreJob(job, cvText);
      return { rowIndex, status: 'ok', matchScore: match_score, reasoning };
    } catch (error) {
      if (!isScoringError(error)) throw error;
      console.error(`[AIJobScorer] Row ${rowIndex} (${job.title}) failed: ${error.code} ${error.message}`);
      return {
        rowIndex,
        status: 'failed',
        error: { code: error.code, message: error.message },
      };
    }
  }

  private parseTextAnswer(response: StructuredResponse): unknown {
    try {
      return parseJsonContent(response.content);
    } catch {
      throw new AIResponseSchemaError('Response contained neither a tool call nor JSON', {
        stopReason: response.stopReason,
      });
    }
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarizeScores(results: readonly ScoreResult[]): ScoringSummary {
  const summary: ScoringSummary = {
    total: results.length,
    scored: 0,
    failed: 0,
    skipped: 0,
    failuresByCode: {},
  };

  for (const result of results) {
    if (result.status === 'ok') summary.scored++;
    else if (result.status === 'skipped') summary.skipped++;
    else {
      summary.failed++;
      if (result.error) {
        const code = result.error.code;
        summary.failuresByCode[code] = (summary.failuresByCode[code] ?? 0) + 1;
      }
    }
  }

  return summary;
}
