/**
 * =============================================================================
 * LOAD BOARD BACKEND - EXPRESS APPLICATION
 * =============================================================================
 *
 * Freight marketplace API: shippers post loads, truckers bid, the shipper
 * accepts one bid and the load moves through pickup and delivery.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ AUTH        │ Email/password login, JWT tokens, role-based access       │
 * │ LOAD        │ Load board search and lifecycle                           │
 * │ BID         │ Bid ledger, accept/reject/withdraw                        │
 * │ MESSAGE     │ Load-scoped conversations between parties                 │
 * │ SAVED LOAD  │ Bookmarks                                                 │
 * │ DASHBOARD   │ Per-role landing data                                     │
 * │ ADMIN       │ Platform counters and recent signups                      │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * The app is built without listening so tests can drive it through
 * supertest; server.ts binds the port.
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import {
  preventParamPollution,
  requestIdMiddleware,
  securityHeaders
} from './shared/middleware/security.middleware';

// Routes
import { healthRoutes } from './shared/routes/health.routes';
import { authRouter } from './modules/auth/auth.routes';
import { userRouter } from './modules/user/user.routes';
import { loadRouter } from './modules/load/load.routes';
import { bidRouter, loadBidsRouter } from './modules/bid/bid.routes';
import { loadMessagesRouter, messageRouter } from './modules/message/message.routes';
import { savedLoadRouter } from './modules/saved-load/saved-load.routes';
import { dashboardRouter } from './modules/dashboard/dashboard.routes';
import { adminRouter, statsRouter } from './modules/admin/admin.routes';

export const API_PREFIX = '/api/v1';

export function createApp(): Express {
  const app = express();

  // Required for correct client IPs (rate limiting) behind a reverse proxy
  app.set('trust proxy', 1);

  // ===========================================================================
  // MIDDLEWARE - Security & Performance
  // ===========================================================================

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    threshold: 1024, // Only compress responses > 1KB
    filter: (req, res) => {
      if (req.headers['x-no-compression']) return false;
      return compression.filter(req, res);
    }
  }));

  // Security headers (Helmet)
  app.use(securityHeaders);

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  // Parse JSON bodies with size limit
  app.use(express.json({ limit: '100kb' }));

  // Prevent parameter pollution
  app.use(preventParamPollution);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // ===========================================================================
  // HEALTH & MONITORING ROUTES (No auth required)
  // ===========================================================================
  app.use('/', healthRoutes);

  // ===========================================================================
  // API ROUTES
  // ===========================================================================
  app.use(API_PREFIX, rateLimiter);

  app.use(`${API_PREFIX}/auth`, authRouter);
  app.use(`${API_PREFIX}/users`, userRouter);
  app.use(`${API_PREFIX}/loads/:id/bids`, loadBidsRouter);
  app.use(`${API_PREFIX}/loads/:id/messages`, loadMessagesRouter);
  app.use(`${API_PREFIX}/loads`, loadRouter);
  app.use(`${API_PREFIX}/bids`, bidRouter);
  app.use(`${API_PREFIX}/messages`, messageRouter);
  app.use(`${API_PREFIX}/saved-loads`, savedLoadRouter);
  app.use(`${API_PREFIX}/dashboard`, dashboardRouter);
  app.use(`${API_PREFIX}/stats`, statsRouter);
  app.use(`${API_PREFIX}/admin`, adminRouter);

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export const app = createApp();
