/**
 * Environment Validation Schema
 *
 * Zod-based schema providing type-safe validation for the service's
 * environment variables. Used by loadConfig() for fail-fast boot validation.
 *
 * @module @config/schema
 */

import { z } from 'zod';

// ============================================================================
// Reusable validators
// ============================================================================

const optionalPath = z.string().trim().min(1).optional();

const boolFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((val) => val === 'true' || val === '1' || val === 'yes');

const aliasMap = z.record(z.string().min(1), z.array(z.string().min(1)));

/**
 * GA_PROPERTY_ALIASES is a JSON object mapping a canonical property reference
 * (numeric id or display name) to its aliases.
 */
const aliasJson = z.string().transform((raw, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
    return z.NEVER;
  }
  const result = aliasMap.safeParse(parsed);
  if (!result.success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'must be a JSON object mapping a property to a list of alias strings',
    });
    return z.NEVER;
  }
  return result.data;
});

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // -- Credentials --
  GOOGLE_APPLICATION_CREDENTIALS: optionalPath,
  GA_CREDENTIALS_PATH: optionalPath,
  GA_SERVICE_ACCOUNT_PATH: optionalPath,

  // -- Cache --
  GA_CACHE_TTL: z.coerce.number().int().min(0).default(300),
  GA_PROPERTY_CACHE_TTL: z.coerce.number().int().min(0).default(3600),
  GA_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).max(1_000_000).default(1000),

  // -- Resolution --
  GA_FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  GA_PROPERTY_ALIASES: aliasJson.optional(),

  // -- Queries --
  GA_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(100_000).default(1000),
  GA_QUERY_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  GA_API_TIMEOUT_MS: z.coerce.number().int().min(100).max(300_000).default(30_000),

  // -- Error reporting --
  GA_MASK_ERRORS: boolFlag.default('false'),
});

export type EnvConfig = z.infer<typeof envSchema>;
