/**
 * Email Configuration Module
 *
 * SMTP settings for the email notification channel. When EMAIL_ENABLED is
 * false the channel is left out of the dispatcher entirely.
 *
 * @module config/email
 */

import {
  parseBoolean,
  parseEnvironment,
  parseInteger,
  parseOptionalString,
  type Environment,
} from './env.js';

const TAG = 'EMAIL_CONFIG';

/**
 * SMTP authentication credentials
 */
export interface SMTPAuth {
  readonly user: string;
  readonly pass: string;
}

/**
 * Email configuration interface
 */
export interface EmailConfig {
  /**
   * SMTP server hostname
   */
  readonly host: string;

  /**
   * SMTP server port
   * Common ports:
   * - 587: SMTP with STARTTLS
   * - 465: SMTP over implicit TLS
   */
  readonly port: number;

  /**
   * Implicit TLS. Defaults to true on port 465.
   */
  readonly secure: boolean;

  /**
   * SMTP authentication credentials
   * undefined for unauthenticated SMTP
   */
  readonly auth?: SMTPAuth;

  /**
   * Sender address, "Display Name <email@example.com>" or "email@example.com"
   */
  readonly from: string;

  readonly connectionTimeout: number;
  readonly socketTimeout: number;

  /**
   * Whether the email channel is enabled
   */
  readonly enabled: boolean;

  readonly environment: Environment;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

let emailConfigInstance: EmailConfig | null = null;

/**
 * Extract the bare address from "Name <address>" or return the input
 */
export function extractAddress(from: string): string | undefined {
  return from.includes('<') ? from.match(/<([^>]+)>/)?.[1] : from;
}

/**
 * Load email configuration from environment variables
 *
 * @throws {Error} If the channel is enabled and required variables are missing or invalid
 */
export function loadEmailConfig(env: NodeJS.ProcessEnv = process.env): EmailConfig {
  const environment = parseEnvironment(env.NODE_ENV, TAG);
  const enabled = parseBoolean(env.EMAIL_ENABLED, true, TAG);

  if (!enabled) {
    console.log(`[${TAG}] Email channel is disabled (EMAIL_ENABLED=false)`);
    return {
      host: 'localhost',
      port: 587,
      secure: false,
      from: 'noreply@example.com',
      connectionTimeout: 10000,
      socketTimeout: 10000,
      enabled: false,
      environment,
    };
  }

  const host = parseOptionalString(env.SMTP_HOST);
  if (!host) {
    throw new Error(`[${TAG}] SMTP_HOST environment variable is required`);
  }

  const port = parseInteger(env.SMTP_PORT, 587, 1, 65535, 'SMTP_PORT', TAG);
  const secure = parseBoolean(env.SMTP_SECURE, port === 465, TAG);

  const user = parseOptionalString(env.SMTP_USER);
  const pass = parseOptionalString(env.SMTP_PASSWORD);

  let auth: SMTPAuth | undefined;
  if (user && pass) {
    auth = { user, pass };
  } else if (user || pass) {
    throw new Error(`[${TAG}] Both SMTP_USER and SMTP_PASSWORD must be provided together`);
  }

  const from = parseOptionalString(env.EMAIL_FROM);
  if (!from) {
    throw new Error(`[${TAG}] EMAIL_FROM environment variable is required`);
  }

  const fromAddress = extractAddress(from);
  if (!fromAddress || !EMAIL_PATTERN.test(fromAddress)) {
    throw new Error(`[${TAG}] Invalid EMAIL_FROM format: ${from}`);
  }

  const config: EmailConfig = {
    host,
    port,
    secure,
    auth,
    from,
    connectionTimeout: parseInteger(
      env.EMAIL_CONNECTION_TIMEOUT,
      10000,
      1000,
      120000,
      'EMAIL_CONNECTION_TIMEOUT',
      TAG
    ),
    socketTimeout: parseInteger(
      env.EMAIL_SOCKET_TIMEOUT,
      10000,
      1000,
      120000,
      'EMAIL_SOCKET_TIMEOUT',
      TAG
    ),
    enabled: true,
    environment,
  };

  if (config.port === 587 && config.secure) {
    console.warn(`[${TAG}] Port 587 typically uses STARTTLS (secure=false)`);
  }

  console.log(`[${TAG}] Email configuration loaded:`, {
    host: config.host,
    port: config.port,
    secure: config.secure,
    hasAuth: config.auth !== undefined,
    from: config.from,
    environment: config.environment,
  });

  return config;
}

/**
 * Get email configuration singleton instance
 */
export function getEmailConfig(): EmailConfig {
  if (!emailConfigInstance) {
    emailConfigInstance = loadEmailConfig();
  }
  return emailConfigInstance;
}
