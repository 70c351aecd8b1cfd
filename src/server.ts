/**
 * =============================================================================
 * COURIER DELIVERY BACKEND - MAIN SERVER
 * =============================================================================
 *
 * One HTTP server carrying:
 *   - the REST API (see app.ts)
 *   - the realtime channel: WebSocket upgrade at REALTIME_PATH?token=<jwt>
 *
 * SHUTDOWN:
 *   SIGTERM/SIGINT -> close realtime sessions (1001) -> stop accepting HTTP
 *   -> exit. Forced exit after 10 seconds.
 * =============================================================================
 */

import { createServer } from 'http';
import { createApp } from './app';
import { config } from './config/environment';
import { validateAndLogEnvironment } from './core';
import { RealtimeGateway } from './modules/realtime/realtime.gateway';
import { realtimeService } from './modules/realtime/realtime.service';
import { errorMeta, logger } from './shared/services/logger.service';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

const app = createApp();
const server = createServer(app);
const gateway = new RealtimeGateway(realtimeService);
gateway.attach(server);

server.listen(config.port, config.host, () => {
  server.keepAliveTimeout = 65000;  // 65s > typical LB idle timeout (60s)
  server.headersTimeout = 66000;    // 66s > keepAliveTimeout

  logger.info(`Server started on ${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    realtimePath: config.realtime.path
  });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', errorMeta(error));
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', errorMeta(reason));
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const gracefulShutdown = (signal: string): void => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received. Starting graceful shutdown...`);

  gateway.close();

  server.close((error) => {
    if (error) {
      logger.error('Error closing HTTP server', errorMeta(error));
      process.exit(1);
    }
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
