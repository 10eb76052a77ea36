/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Fails fast on startup if variables are present but invalid.
 *
 * Usage:
 *   import { getEnv } from '../config/env';
 *   const { URC_SEASON_ID } = getEnv(); // number, guaranteed to be valid
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Upstream stats API
  URC_GRAPHQL_ENDPOINT: z.url().default('https://www.unitedrugby.com/graphql'),
  URC_SEASON_ID: z.coerce.number().int().positive().default(202501),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Batch processing
  BATCH_BACKOFF_SECONDS: z.coerce.number().min(0).default(10),

  // Weights used when a player's position can't be resolved to a role.
  // BACK_ROW keeps the historical behavior, DEFAULT uses the global weights.
  UNKNOWN_ROLE_FALLBACK: z.enum(['BACK_ROW', 'DEFAULT']).default('BACK_ROW'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 * Throws if validation fails.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`❌ Environment validation failed:\n${errors}`);
  }

  _env = result.data;
  return _env;
}

/**
 * Validate environment on import for fail-fast behavior.
 * Tests set variables per case, so they skip this.
 */
function validateOnStartup(): void {
  try {
    getEnv();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Only validate on startup in non-test environments
if (process.env.NODE_ENV !== 'test') {
  validateOnStartup();
}
