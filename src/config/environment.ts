/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret (validated at startup)
 * - Development uses an auto-generated secret if not provided
 *
 * REALTIME:
 * - Heartbeat, drain grace period and outbound buffer size for WebSocket sessions
 * - Per-user connection cap (multi-tab / multi-device)
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`[CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    const generated = randomBytes(32).toString('hex');
    console.warn(`[CONFIG] ${key} not set, auto-generated for development`);
    return generated;
  }

  throw new Error(
    `FATAL: ${key} is required in production!\n` +
    `   Set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 8000),
  host: getOptional('HOST', '0.0.0.0'),

  // JWT - this service verifies; signing is only used by local tooling and tests
  jwt: {
    secret: getRequired('JWT_SECRET'),
    expiresInSeconds: getNumber('JWT_EXPIRES_IN_SECONDS', 24 * 60 * 60),
  },

  // Realtime delivery-update channel
  realtime: {
    path: getOptional('REALTIME_PATH', '/api/ws/connect'),
    heartbeatIntervalMs: getNumber('REALTIME_HEARTBEAT_INTERVAL_MS', 30_000),
    closeGraceMs: getNumber('REALTIME_CLOSE_GRACE_MS', 2_000),
    outboundBufferSize: getNumber('REALTIME_OUTBOUND_BUFFER_SIZE', 256),
    maxConnectionsPerUser: getNumber('REALTIME_MAX_CONNECTIONS_PER_USER', 5),
    maxPayloadBytes: getNumber('REALTIME_MAX_PAYLOAD_BYTES', 64 * 1024),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'test' ? 'error' : 'debug'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
  },
} as const;

export type AppConfig = typeof config;
export type RealtimeConfig = AppConfig['realtime'];
