/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (is the data store usable?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { db } from '../database/db';
import { logger } from '../services/logger.service';

const router = Router();

// Track server start time
const startTime = Date.now();

/**
 * Basic health check - for load balancers
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'healthy',
    timestamp: new Date().toISOString()
  });
});

/**
 * Liveness probe - is the process alive?
 */
router.get('/health/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    pid: process.pid,
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});

/**
 * Readiness probe - can the service accept traffic?
 */
router.get('/health/ready', (_req: Request, res: Response) => {
  try {
    const stats = db.getStats();
    res.status(200).json({
      status: 'ready',
      checks: {
        database: true,
        persistent: stats.dbPath !== null
      },
      timestamp: new Date().toISOString()
    });
  } catch (error) {
    logger.error('Health check failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    res.status(503).json({
      status: 'not_ready',
      checks: { database: false },
      timestamp: new Date().toISOString()
    });
  }
});

export { router as healthRoutes };
