/**
 * Job Match Routes
 *
 * Runs the sponsor-verification and CV-scoring pipeline over a batch of
 * scraped jobs. Scoring is paced, so a request takes roughly
 * (sponsor jobs x scoring delay) to complete. Scoring clients never retry:
 * a failed row stays failed.
 */

import { Router } from 'express';
import { z } from 'zod';
import { getConfig } from '../../config/env.js';
import { JobSearchPipeline } from '../../core/orchestrator/JobSearchPipeline.js';
import { AIJobScorer } from '../../domain/services/AIJobScorer.js';
import { RequestPacer } from '../../domain/services/RequestPacer.js';
import { toCsv } from '../../domain/services/JobRanking.js';
import { getRegistry } from '../../infrastructure/registry/RegistryStore.js';
import { createRequestClaudeClient } from '../middleware/claudeClient.js';

const router = Router();

// =============================================================================
// SCHEMAS
// =============================================================================

const jobMatchSchema = z.object({
  cvText: z.string(),
  jobs: z.array(z.unknown()),
  minMatchScore: z.number().int().min(0).max(100).optional(),
});

const querySchema = z.object({
  format: z.enum(['json', 'csv']).default('json'),
  include: z.enum(['matches', 'all']).default('matches'),
});

// =============================================================================
// ROUTES
// =============================================================================

/**
 * POST /api/job-matches - Verify sponsors and score jobs against a CV
 */
router.post('/', async (req, res, next) => {
  try {
    const config = getConfig();
    const { cvText, jobs, minMatchScore } = jobMatchSchema.parse(req.body);
    const { format, include } = querySchema.parse(req.query);

    const scorer = new AIJobScorer(
      createRequestClaudeClient(req, config),
      new RequestPacer({ minIntervalMs: config.scoringDelayMs })
    );
    const pipeline = new JobSearchPipeline(getRegistry(), scorer, {
      minMatchScore: config.minMatchScore,
    });

    const report = await pipeline.run({ jobs, cvText, minMatchScore });

    if (format === 'csv') {
      const rows = include === 'all' ? report.sponsorJobs : report.matches;
      const fileName = include === 'all' ? 'all_sponsor_jobs.csv' : 'matched_jobs.csv';
      res
        .type('text/csv')
        .attachment(fileName)
        .send(toCsv(rows));
      return;
    }

    res.json(report);
  } catch (error) {
    next(error);
  }
});

export default router;
