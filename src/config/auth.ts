/**
 * Authentication Configuration Module
 *
 * JWT verification settings for the bearer tokens that identify the actor of
 * every leave operation, plus rate limiting for mutating routes. Tokens are
 * issued by the HR platform; this service only verifies them.
 *
 * @module config/auth
 */

import {
  parseEnvironment,
  parseInteger,
  parseOptionalString,
  type Environment,
} from './env.js';

const TAG = 'AUTH_CONFIG';

/**
 * JWT token configuration interface
 */
export interface JWTConfig {
  /**
   * Secret key shared with the token issuer
   */
  readonly secret: string;

  /**
   * Access token expiration time, used when minting tokens for tooling and tests
   * Format: Zeit/ms format (e.g., '15m', '1h', '24h')
   */
  readonly expiresIn: string;

  readonly algorithm: 'HS256';

  /**
   * Token issuer identifier
   */
  readonly issuer: string;

  /**
   * Token audience identifier
   */
  readonly audience: string;
}

/**
 * Rate limiting configuration interface
 */
export interface RateLimitConfig {
  /**
   * Maximum number of requests per window
   */
  readonly maxRequests: number;

  /**
   * Time window in milliseconds
   */
  readonly windowMs: number;

  /**
   * Message returned when the limit is exceeded
   */
  readonly message: string;
}

/**
 * Complete authentication configuration interface
 */
export interface AuthConfig {
  readonly jwt: JWTConfig;
  readonly rateLimit: RateLimitConfig;
  readonly environment: Environment;
}

/**
 * Configuration validation error interface
 */
export interface ConfigValidationError {
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
}

let authConfigInstance: AuthConfig | null = null;

const DURATION_PATTERN = /^(\d+)(ms|s|m|h|d|w|y)$/;

const SECONDS_PER_UNIT: Readonly<Record<string, number>> = {
  ms: 0.001,
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
  y: 31536000,
};

/**
 * Convert a duration such as '15m' or '24h' to whole seconds (at least 1)
 *
 * @returns null if the value is not a duration
 */
export function durationToSeconds(value: string): number | null {
  const match = DURATION_PATTERN.exec(value);
  const unit = match?.[2] === undefined ? undefined : SECONDS_PER_UNIT[match[2]];
  if (!match?.[1] || unit === undefined) {
    return null;
  }
  return Math.max(1, Math.floor(Number(match[1]) * unit));
}

/**
 * Validate complete auth configuration
 */
export function validateAuthConfig(config: AuthConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (config.jwt.secret.length === 0) {
    errors.push({ field: 'jwt.secret', message: 'JWT_SECRET is required' });
  } else if (config.jwt.secret.length < 32) {
    if (config.environment === 'production') {
      errors.push({
        field: 'jwt.secret',
        message: 'jwt.secret must be at least 32 characters in production',
        value: `${config.jwt.secret.substring(0, 4)}...`,
      });
    } else {
      console.warn(`[${TAG}] JWT secret is shorter than 32 characters`);
    }
  }

  if (!DURATION_PATTERN.test(config.jwt.expiresIn)) {
    errors.push({
      field: 'jwt.expiresIn',
      message: "jwt.expiresIn must be in Zeit/ms format (e.g., '15m', '1h', '24h')",
      value: config.jwt.expiresIn,
    });
  }

  if (config.rateLimit.maxRequests < 1) {
    errors.push({
      field: 'rateLimit.maxRequests',
      message: 'Maximum requests must be at least 1',
      value: config.rateLimit.maxRequests,
    });
  }

  return errors;
}

/**
 * Load authentication configuration from environment variables
 */
export function loadAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  const environment = parseEnvironment(env.NODE_ENV, TAG);

  const config: AuthConfig = {
    jwt: {
      secret: parseOptionalString(env.JWT_SECRET) ?? '',
      expiresIn: parseOptionalString(env.JWT_ACCESS_TOKEN_EXPIRY) ?? '1h',
      algorithm: 'HS256',
      issuer: parseOptionalString(env.JWT_ISSUER) ?? 'leave-orchestrator',
      audience: parseOptionalString(env.JWT_AUDIENCE) ?? 'leave-orchestrator-api',
    },
    rateLimit: {
      maxRequests: parseInteger(env.RATE_LIMIT_MAX, 100, 1, 100000, 'RATE_LIMIT_MAX', TAG),
      windowMs: parseInteger(
        env.RATE_LIMIT_WINDOW_MS,
        900000,
        1000,
        86400000,
        'RATE_LIMIT_WINDOW_MS',
        TAG
      ),
      message:
        parseOptionalString(env.RATE_LIMIT_MESSAGE) ?? 'Too many requests, please try again later',
    },
    environment,
  };

  console.log(`[${TAG}] Configuration loaded:`, {
    environment: config.environment,
    jwtAlgorithm: config.jwt.algorithm,
    jwtIssuer: config.jwt.issuer,
    jwtAudience: config.jwt.audience,
    rateLimitMax: config.rateLimit.maxRequests,
    timestamp: new Date().toISOString(),
  });

  return config;
}

/**
 * Get authentication configuration singleton
 *
 * @throws {Error} If configuration validation fails
 */
export function getAuthConfig(): AuthConfig {
  if (!authConfigInstance) {
    const config = loadAuthConfig();

    const errors = validateAuthConfig(config);
    if (errors.length > 0) {
      const errorMessages = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
      console.error(`[${TAG}] Configuration validation failed:`, {
        errors,
        timestamp: new Date().toISOString(),
      });
      throw new Error(`[${TAG}] Invalid authentication configuration:\n${errorMessages}`);
    }

    authConfigInstance = config;
  }

  return authConfigInstance;
}
