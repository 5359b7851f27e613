/**
 * Shared wiring for command handlers: environment, location map store,
 * inventory gateway, topology and reference data, and exit codes.
 */

import fs from 'node:fs/promises';
import chalk from 'chalk';
import {
  STORAGE_ERROR_CODES,
  StorageError,
  isStorageError,
  loadReferenceRecords,
  LocationMapStore,
  parseTopology,
  type AllocationTopology,
  type FuzzyMatcherOptions,
  type InventoryGateway,
  type RetryPolicy,
} from '@drawermap/shared';
import { InvenTreeGateway } from './api.js';
import { getEnv, type Env } from './config/env.js';
import { error } from './format.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NEEDS_REVIEW = 2;

/** Misuse of the CLI itself: missing settings, unreadable arguments */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
    Object.setPrototypeOf(this, CliError.prototype);
  }
}

export interface CliContext {
  env: Env;
  store: LocationMapStore;
  retry: Partial<RetryPolicy>;
  matching: FuzzyMatcherOptions;
  gateway(): InventoryGateway;
  topology(): Promise<AllocationTopology>;
  reference(): Promise<unknown[]>;
}

export function createContext(env: Env = getEnv()): CliContext {
  let gateway: InventoryGateway | null = null;

  return {
    env,
    store: new LocationMapStore(env.LOCATION_MAP_PATH, { lockTimeoutMs: env.LOCK_TIMEOUT_MS }),
    retry: { maxRetries: env.REMOTE_MAX_RETRIES, baseDelayMs: env.REMOTE_RETRY_BASE_MS },
    matching: { threshold: env.MATCH_THRESHOLD, tieBreak: env.MATCH_TIE_BREAK },
    gateway() {
      if (!gateway) {
        if (!env.INVENTREE_URL || !env.INVENTREE_TOKEN) {
          throw new CliError('INVENTREE_URL and INVENTREE_TOKEN must be set for this command');
        }
        gateway = new InvenTreeGateway({ baseUrl: env.INVENTREE_URL, token: env.INVENTREE_TOKEN });
      }
      return gateway;
    },
    async topology() {
      return parseTopology(await readJsonFile(env.TOPOLOGY_PATH));
    },
    async reference() {
      return loadReferenceRecords(env.REFERENCE_PATH);
    },
  };
}

/**
 * @throws StorageError MALFORMED_RECORD when the file is not valid JSON
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf8');
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
      technicalMessage: `${filePath} is not valid JSON`,
      context: { path: filePath },
      cause: err,
    });
  }
}

/**
 * Run a command handler and turn its outcome into the process exit code.
 * Fatal errors print in red and exit 1; handlers return 2 for "needs review".
 */
export async function runCommand(handler: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await handler();
  } catch (err: unknown) {
    if (isStorageError(err)) {
      error(err.userMessage);
      if (err.message !== err.userMessage) console.error(chalk.dim(`  ${err.message}`));
    } else if (err instanceof CliError) {
      error(err.message);
    } else {
      error(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = EXIT_FAILURE;
  }
}
