/**
 * Health Check Routes
 */

import { Router } from 'express';
import { getRegistry, isRegistryLoaded } from '../../infrastructure/registry/RegistryStore.js';

const router = Router();

/**
 * Basic health check
 */
router.get('/', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'sponsor-job-matcher',
  });
});

/**
 * Ready once the sponsor register is loaded
 */
router.get('/ready', (_req, res) => {
  if (!isRegistryLoaded()) {
    res.status(503).json({
      status: 'loading',
      timestamp: new Date().toISOString(),
    });
    return;
  }

  const registry = getRegistry();
  res.json({
    status: 'ready',
    timestamp: new Date().toISOString(),
    registry: {
      entries: registry.entries.length,
      loadedAt: registry.loadedAt.toISOString(),
    },
  });
});

export default router;
