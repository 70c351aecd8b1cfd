/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;

/**
 * All environment variables with their requirements
 */
export const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '8000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'HOST',
    required: false,
    default: '0.0.0.0',
    description: 'Server host address'
  },

  // ==========================================================================
  // JWT AUTHENTICATION
  // ==========================================================================
  {
    name: 'JWT_SECRET',
    required: true,
    validator: (v) => v.length >= 32,
    description: 'JWT verification secret (min 32 characters)'
  },

  // ==========================================================================
  // REALTIME CHANNEL
  // ==========================================================================
  {
    name: 'REALTIME_PATH',
    required: false,
    default: '/api/ws/connect',
    validator: (v) => v.startsWith('/'),
    description: 'WebSocket upgrade path'
  },
  {
    name: 'REALTIME_HEARTBEAT_INTERVAL_MS',
    required: false,
    default: '30000',
    validator: isPositiveInt,
    description: 'Ping interval; a missed pong closes the session'
  },
  {
    name: 'REALTIME_CLOSE_GRACE_MS',
    required: false,
    default: '2000',
    validator: isPositiveInt,
    description: 'Time allowed to flush queued frames on close'
  },
  {
    name: 'REALTIME_OUTBOUND_BUFFER_SIZE',
    required: false,
    default: '256',
    validator: isPositiveInt,
    description: 'Frames queued per session before it is dropped'
  },
  {
    name: 'REALTIME_MAX_CONNECTIONS_PER_USER',
    required: false,
    default: '5',
    validator: isPositiveInt,
    description: 'Concurrent sessions per user; the oldest is closed beyond this'
  },
  {
    name: 'REALTIME_MAX_PAYLOAD_BYTES',
    required: false,
    default: '65536',
    validator: isPositiveInt,
    description: 'Largest inbound WebSocket message accepted'
  },

  // ==========================================================================
  // RATE LIMITING
  // ==========================================================================
  {
    name: 'RATE_LIMIT_WINDOW_MS',
    required: false,
    default: '900000',
    validator: isPositiveInt,
    description: 'Rate limit window in milliseconds'
  },
  {
    name: 'RATE_LIMIT_MAX_REQUESTS',
    required: false,
    default: '300',
    validator: isPositiveInt,
    description: 'Max requests per window'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Winston log level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      if (isProduction) {
        result.valid = false;
        result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      } else {
        result.warnings.push(`${envVar.name} not set - using a generated development value`);
      }
      continue;
    }

    const finalValue = value || envVar.default;
    if (!finalValue) continue;

    if (envVar.validator && !envVar.validator(finalValue)) {
      // Only report the value itself for non-secret settings
      const shown = envVar.name.includes('SECRET') ? '[REDACTED]' : `"${finalValue}"`;
      result.valid = false;
      result.errors.push(`Invalid value for ${envVar.name}: ${shown} - ${envVar.description}`);
      continue;
    }

    result.loaded[envVar.name] = envVar.name.includes('SECRET') ? '[set]' : finalValue;
  }

  if (isProduction && env.CORS_ORIGIN === undefined) {
    result.warnings.push('CORS_ORIGIN is not set in production - all origins are allowed');
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('Environment validation passed', {
      mode: result.loaded.NODE_ENV,
      port: result.loaded.PORT,
      realtimePath: result.loaded.REALTIME_PATH
    });
    return;
  }

  if (isProduction) {
    logger.error('Environment validation failed - exiting');
    process.exit(1);
  }
  logger.warn('Environment validation failed - continuing in non-production mode');
}
