/**
 * CV Profile Routes
 */

import { Router } from 'express';
import { z } from 'zod';
import { getConfig } from '../../config/env.js';
import { CvProfileExtractor } from '../../domain/services/CvProfileExtractor.js';
import { createRequestClaudeClient } from '../middleware/claudeClient.js';

const router = Router();

const cvProfileSchema = z.object({
  cvText: z.string().min(1),
});

/**
 * POST /api/cv-profile - Extract a structured profile from CV text
 */
router.post('/', async (req, res, next) => {
  try {
    const config = getConfig();
    const { cvText } = cvProfileSchema.parse(req.body);

    const extractor = new CvProfileExtractor(createRequestClaudeClient(req, config));
    const profile = await extractor.extract(cvText);

    res.json({ profile });
  } catch (error) {
    next(error);
  }
});

export default router;
