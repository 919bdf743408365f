/**
 * Shared Configuration Package
 *
 * Environment variable validation for the GA4 query service. The result is a
 * plain object handed to constructors; nothing here reads process state after
 * loadConfig() returns.
 *
 * @example
 * ```typescript
 * import { loadConfig } from '@config';
 *
 * const config = loadConfig();
 * const ttl = config.cacheTtlSeconds;
 * ```
 *
 * @module @config
 */

import { existsSync } from 'fs';

import { ConfigurationError } from '@errors';

import { envSchema, type EnvConfig } from './schema';

export { envSchema, type EnvConfig } from './schema';

/** Property reference (numeric id or display name) mapped to its aliases */
export type PropertyAliases = Readonly<Record<string, readonly string[]>>;

export interface AppConfig {
  /** Path to the service account JSON key file */
  credentialsPath: string;
  cacheTtlSeconds: number;
  propertyCacheTtlSeconds: number;
  fuzzyThreshold: number;
  defaultRowLimit: number;
  propertyAliases: PropertyAliases;
  maskErrorDetails: boolean;
  queryConcurrency: number;
  apiTimeoutMs: number;
  cacheMaxEntries: number;
}

export interface LoadConfigOptions {
  /** File existence check, replaceable in tests */
  fileExists?: (path: string) => boolean;
}

/** Credential variables in lookup order */
export const CREDENTIAL_ENV_VARS = [
  'GOOGLE_APPLICATION_CREDENTIALS',
  'GA_CREDENTIALS_PATH',
  'GA_SERVICE_ACCOUNT_PATH',
] as const;

function pickCredentialsPath(env: EnvConfig): string | undefined {
  for (const name of CREDENTIAL_ENV_VARS) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

/**
 * Validate the environment and build the service configuration.
 * @throws ConfigurationError listing every problem found
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  options: LoadConfigOptions = {}
): AppConfig {
  const fileExists = options.fileExists ?? existsSync;

  // Empty strings count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map(
      issue => `${issue.path.join('.') || 'environment'}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${problems.join('; ')}`,
      { problems }
    );
  }

  const parsed = result.data;
  const credentialsPath = pickCredentialsPath(parsed);
  if (!credentialsPath) {
    throw new ConfigurationError(
      `No credentials configured: set one of ${CREDENTIAL_ENV_VARS.join(', ')}`,
      { problems: ['credentials: missing'] }
    );
  }
  if (!fileExists(credentialsPath)) {
    throw new ConfigurationError(
      `Credentials file not found: ${credentialsPath}`,
      { problems: ['credentials: file does not exist'] }
    );
  }

  return {
    credentialsPath,
    cacheTtlSeconds: parsed.GA_CACHE_TTL,
    propertyCacheTtlSeconds: parsed.GA_PROPERTY_CACHE_TTL,
    fuzzyThreshold: parsed.GA_FUZZY_THRESHOLD,
    defaultRowLimit: parsed.GA_DEFAULT_LIMIT,
    propertyAliases: parsed.GA_PROPERTY_ALIASES ?? {},
    maskErrorDetails: parsed.GA_MASK_ERRORS,
    queryConcurrency: parsed.GA_QUERY_CONCURRENCY,
    apiTimeoutMs: parsed.GA_API_TIMEOUT_MS,
    cacheMaxEntries: parsed.GA_CACHE_MAX_ENTRIES,
  };
}
