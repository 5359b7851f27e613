/**
 * Environment configuration for the drawermap CLI
 *
 * Validates every variable with Zod on first use. Invalid values stop the
 * CLI with the Zod messages before any command runs.
 *
 * USAGE:
 * - `getEnv().LOCATION_MAP_PATH` in command handlers
 * - `parseEnv(source)` in tests, with a plain object instead of process.env
 */

// Load dotenv FIRST - must happen before we access process.env
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
  /** Environment mode */
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** pino level; defaults depend on NODE_ENV */
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ----------------------------------------
  // INVENTORY SYSTEM
  // ----------------------------------------

  /** InvenTree base URL, e.g. http://inventree.local:8000 */
  INVENTREE_URL: z.string().url('INVENTREE_URL must be a URL').optional(),

  /** InvenTree API token */
  INVENTREE_TOKEN: z.string().min(1).optional(),

  /** Retries after the first attempt for transient failures */
  REMOTE_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  /** First backoff delay; doubles on each retry */
  REMOTE_RETRY_BASE_MS: z.coerce.number().int().min(0).default(500),

  // ----------------------------------------
  // FILES
  // ----------------------------------------

  /** Persisted location map */
  LOCATION_MAP_PATH: z.string().min(1).default('data/component-locations.json'),

  /** Drawer ranges per category */
  TOPOLOGY_PATH: z.string().min(1).default('config/topology.json'),

  /** Reference dataset of common component types */
  REFERENCE_PATH: z.string().min(1).default('config/reference-components.json'),

  /** How long a writer waits for the location map lock */
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // ----------------------------------------
  // MATCHING
  // ----------------------------------------

  /** Minimum fuzzy score accepted (0..1) */
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),

  /** Tie-break between equally scored candidates */
  MATCH_TIE_BREAK: z.enum(['usage', 'lexical']).default('usage'),
});

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * @throws ZodError when a variable fails validation
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  // Empty strings from .env files mean "not set"
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== ''));
  return envSchema.parse(cleaned);
}

let cached: Env | null = null;

export function getEnv(): Env {
  if (cached) return cached;
  try {
    cached = parseEnv();
    return cached;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');
      console.error('Environment validation failed:\n' + issues);
      process.exit(1);
    }
    throw error;
  }
}
