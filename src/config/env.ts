/**
 * Environment Variable Parsing Helpers
 *
 * Shared by every configuration module. Invalid values never throw: they are
 * reported with a tagged warning and replaced by the default.
 *
 * @module config/env
 */

/**
 * Application environment types
 */
export type Environment = 'development' | 'staging' | 'production' | 'test';

const VALID_ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];

function isEnvironment(value: string): value is Environment {
  return (VALID_ENVIRONMENTS as readonly string[]).includes(value);
}

/**
 * Parse and validate environment from NODE_ENV
 *
 * @param env - Environment string from NODE_ENV
 * @param tag - Log tag of the calling module
 * @returns Validated environment
 */
export function parseEnvironment(env: string | undefined, tag = 'CONFIG'): Environment {
  const environment = env?.toLowerCase() ?? 'development';

  if (!isEnvironment(environment)) {
    console.warn(
      `[${tag}] Invalid environment "${env}", defaulting to "development". Valid environments: ${VALID_ENVIRONMENTS.join(', ')}`
    );
    return 'development';
  }

  return environment;
}

/**
 * Parse integer from environment variable with range validation
 *
 * @param value - String value from environment
 * @param defaultValue - Default value if missing or invalid
 * @param min - Minimum allowed value
 * @param max - Maximum allowed value
 * @param name - Variable name for logging
 * @param tag - Log tag of the calling module
 * @returns Parsed and validated integer
 */
export function parseInteger(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  name: string,
  tag = 'CONFIG'
): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    console.warn(`[${tag}] Invalid ${name} "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }

  if (parsed < min || parsed > max) {
    console.warn(
      `[${tag}] ${name} ${parsed} out of range [${min}, ${max}], using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

/**
 * Parse a decimal number from environment variable with range validation
 */
export function parseDecimal(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  name: string,
  tag = 'CONFIG'
): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed)) {
    console.warn(`[${tag}] Invalid ${name} "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }

  if (parsed < min || parsed > max) {
    console.warn(
      `[${tag}] ${name} ${parsed} out of range [${min}, ${max}], using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

/**
 * Parse boolean from environment variable
 *
 * Accepts true/false, 1/0 and yes/no (case-insensitive).
 */
export function parseBoolean(
  value: string | undefined,
  defaultValue: boolean,
  tag = 'CONFIG'
): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  console.warn(`[${tag}] Invalid boolean value "${value}", using default: ${defaultValue}`);
  return defaultValue;
}

/**
 * Parse a comma-separated list, dropping empty entries
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Read a string variable, treating blank values as unset
 */
export function parseOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
