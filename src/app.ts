/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * MODULES:
 * ┌──────────┬──────────────────────────────────────────────────────────────┐
 * │ PACKAGE  │ Create, assign, status lifecycle                             │
 * │ DELIVERY │ Courier location reports, last known location                │
 * │ COURIER  │ Availability for new packages                                │
 * │ REALTIME │ Stats and announcements (sessions live on the WS upgrade)    │
 * └──────────┴──────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { config } from './config/environment';
import { API_PREFIX } from './core/constants';
import { courierRouter } from './modules/courier/courier.routes';
import { deliveryRouter } from './modules/delivery/delivery.routes';
import { packageRouter } from './modules/package/package.routes';
import { realtimeRouter } from './modules/realtime/realtime.routes';
import { realtimeService } from './modules/realtime/realtime.service';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';

const startTime = Date.now();

export function createApp(): Express {
  const app = express();

  app.set('trust proxy', 1);

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024 // Only compress responses > 1KB
  }));

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PUT', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);
  app.use(rateLimiter);

  // ===========================================================================
  // HEALTH
  // ===========================================================================

  app.get('/health', (_req, res) => {
    const stats = realtimeService.stats();
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      realtime: {
        connections: stats.total_connections,
        users: stats.unique_users
      }
    });
  });

  // ===========================================================================
  // API ROUTES
  // ===========================================================================

  app.use(`${API_PREFIX}/packages`, packageRouter);
  app.use(`${API_PREFIX}/deliveries`, deliveryRouter);
  app.use(`${API_PREFIX}/couriers`, courierRouter);
  app.use(`${API_PREFIX}/realtime`, realtimeRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
