/**
 * =============================================================================
 * LOAD BOARD BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Binds the Express app, seeds the admin account and flushes the data
 * store on shutdown.
 * =============================================================================
 */

import { createServer } from 'http';
import { app } from './app';
import { config } from './config/environment';
import { db } from './shared/database/db';
import { logger } from './shared/services/logger.service';
import { authService } from './modules/auth/auth.service';

const server = createServer(app);

async function start(): Promise<void> {
  await authService.ensureAdmin();

  server.timeout = 30000;           // 30s max request time
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;    // > keepAliveTimeout

  server.listen(config.port, config.host, () => {
    const stats = db.getStats();
    logger.info(`Server started on http://${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      database: stats.dbPath ?? 'in-memory',
      users: stats.users,
      loads: stats.loads,
      openLoads: stats.openLoads
    });
  });
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  db.flush();
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  db.flush();
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    db.flush();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    db.flush();
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

start().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
