/**
 * Sponsor Job Matcher - Main Entry Point
 *
 * Loads the visa sponsor register, then serves the job-matching API.
 */

import 'dotenv/config';
import { createApp } from './api/app.js';
import { getConfig } from './config/env.js';
import { parseRegistrySource } from './integrations/registry/SponsorRegisterClient.js';
import { initializeRegistry, resetRegistry } from './infrastructure/registry/RegistryStore.js';

// =============================================================================
// STARTUP
// =============================================================================

async function start() {
  const config = getConfig();

  console.log(`Environment: ${config.nodeEnv}`);
  console.log('Starting Sponsor Job Matcher...\n');

  // The register is required: without it no job can be verified
  console.log(`Loading sponsor register from ${config.registrySource}...`);
  await initializeRegistry(parseRegistrySource(config.registrySource), {
    nameColumn: config.registryNameColumn,
  });

  const app = createApp({ corsOrigin: config.corsOrigin });

  const server = app.listen(config.port, () => {
    console.log(`\nSponsor Job Matcher API running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`Job matches: POST http://localhost:${config.port}/api/job-matches`);
    console.log(`CV profile: POST http://localhost:${config.port}/api/cv-profile\n`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      console.log('HTTP server closed');
      resetRegistry();
      console.log('Shutdown complete');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

start().catch((error) => {
  console.error('Failed to start Sponsor Job Matcher:', error);
  process.exit(1);
});
