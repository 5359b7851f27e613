/**
 * Bounded retry with exponential backoff for inventory calls.
 *
 * Transient: HTTP 429/5xx and network failures. Anything else is rethrown
 * at once. After the last retry the failure becomes RemoteUnavailable.
 */

import { STORAGE_ERROR_CODES, StorageError } from '../../errors/index.js';
import { inventoryLogger } from '../../utils/logger.js';

export interface RetryPolicy {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxRetries: 3,
    baseDelayMs: 500,
    maxDelayMs: 8_000,
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

const NETWORK_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

function readProperty(value: unknown, name: string): unknown {
    return typeof value === 'object' && value !== null && name in value
        ? Reflect.get(value, name)
        : undefined;
}

export function isTransientError(error: unknown): boolean {
    const status = readProperty(error, 'status');
    if (typeof status === 'number') {
        return status === 429 || status >= 500;
    }

    const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
    if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) return true;

    // fetch rejects with a bare TypeError when the connection fails
    return error instanceof TypeError && error.message === 'fetch failed';
}

export async function withRetry<T>(
    operation: () => Promise<T>,
    label: string,
    policy: Partial<RetryPolicy> = {}
): Promise<T> {
    const { maxRetries, baseDelayMs, maxDelayMs, sleep } = { ...DEFAULT_RETRY_POLICY, ...policy };

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error: unknown) {
            if (!isTransientError(error)) throw error;

            if (attempt >= maxRetries) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new StorageError(STORAGE_ERROR_CODES.REMOTE_UNAVAILABLE, {
                    technicalMessage: `${label}: ${reason} (gave up after ${attempt + 1} attempts)`,
                    context: { label, attempts: attempt + 1 },
                    cause: error,
                });
            }

            const delay = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
            inventoryLogger.warn(
                { attempt: attempt + 1, delay, label, err: error },
                'Retrying after transient error'
            );
            await sleep(delay);
        }
    }
}
