/**
 * Express Application - Sponsor Job Matcher API
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { v4 as uuid } from 'uuid';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { cvProfileRoutes, healthRoutes, jobMatchRoutes } from './routes/index.js';

export interface AppOptions {
  corsOrigin?: string;
}

// =============================================================================
// CREATE APP
// =============================================================================

export function createApp(options: AppOptions = {}) {
  const app = express();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  // Security headers
  app.use(helmet());

  // CORS
  app.use(
    cors({
      origin: options.corsOrigin ?? '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-Id', 'X-Anthropic-Api-Key'],
    })
  );

  // Body parsing (CVs and scraped descriptions are large)
  app.use(express.json({ limit: '10mb' }));

  // Request ID
  app.use((req, _res, next) => {
    if (!req.headers['x-request-id']) {
      req.headers['x-request-id'] = uuid();
    }
    next();
  });

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  // Health checks
  app.use('/health', healthRoutes);

  // Sponsor verification + CV scoring
  app.use('/api/job-matches', jobMatchRoutes);

  // Structured CV profile
  app.use('/api/cv-profile', cvProfileRoutes);

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
