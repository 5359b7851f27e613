/**
 * Location Map Store: the persisted, versioned location map.
 *
 * - Readers never take the lock and always see a whole snapshot.
 * - Writers are serialized by an exclusive lock file (`<map>.lock`, created with `wx`).
 *   Locks older than `staleLockMs` are broken; waiting longer than `lockTimeoutMs`
 *   fails with LocationMapLocked.
 * - Writes go to a temp file in the same directory, are fsynced, then renamed over
 *   the map. The live file is never modified in place.
 * - A write whose base version no longer matches the file fails with VersionConflict.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { LocationMap } from '../../types/index.js';
import { STORAGE_ERROR_CODES, StorageError } from '../../errors/index.js';
import { locationMapFileSchema } from '../../schemas/storage.js';
import { storeLogger as log } from '../../utils/logger.js';

export interface LocationMapStoreOptions {
    lockTimeoutMs?: number;
    staleLockMs?: number;
    pollIntervalMs?: number;
}

export interface MapUpdate {
    map: LocationMap;
    changed: boolean;
}

function errorCode(err: unknown): string | undefined {
    return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function emptyMap(): LocationMap {
    return { version: 0, updatedAt: null, assignments: {}, consumedDrawers: [] };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class LocationMapStore {
    readonly filePath: string;
    readonly lockPath: string;
    private readonly lockTimeoutMs: number;
    private readonly staleLockMs: number;
    private readonly pollIntervalMs: number;

    constructor(filePath: string, options: LocationMapStoreOptions = {}) {
        this.filePath = path.resolve(filePath);
        this.lockPath = `${this.filePath}.lock`;
        this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
        this.staleLockMs = options.staleLockMs ?? 60_000;
        this.pollIntervalMs = options.pollIntervalMs ?? 100;
    }

    // ============================================
    // READ
    // ============================================

    /**
     * Current snapshot. A missing file is an empty map at version 0;
     * a bare legacy assignment object also reads as version 0.
     */
    async read(): Promise<LocationMap> {
        let text: string;
        try {
            text = await fs.readFile(this.filePath, 'utf8');
        } catch (err: unknown) {
            if (errorCode(err) === 'ENOENT') return emptyMap();
            throw err;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (err: unknown) {
            throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
                technicalMessage: `Location map ${this.filePath} is not valid JSON`,
                context: { path: this.filePath },
                cause: err,
            });
        }

        const parsed = locationMapFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
                technicalMessage: `Location map ${this.filePath} failed validation: ${parsed.error.issues
                    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                    .join('; ')}`,
                context: { path: this.filePath },
            });
        }
        return parsed.data;
    }

    // ============================================
    // UPDATE
    // ============================================

    /**
     * Read-extend-write under the lock. `compute` gets the snapshot read while
     * holding the lock; its map is written only when `changed` is set.
     */
    async update<T extends MapUpdate>(compute: (current: LocationMap) => T | Promise<T>): Promise<T> {
        await this.acquireLock();
        try {
            const current = await this.read();
            const result = await compute(current);
            if (result.changed) {
                await this.write(result.map, current.version);
            }
            return result;
        } finally {
            await this.releaseLock();
        }
    }

    /**
     * Atomic replace. Callers normally go through update(); a direct call must
     * already hold the lock.
     *
     * @throws StorageError VERSION_CONFLICT when the file is no longer at baseVersion
     */
    async write(map: LocationMap, baseVersion: number): Promise<void> {
        const onDisk = await this.read();
        if (onDisk.version !== baseVersion) {
            throw new StorageError(STORAGE_ERROR_CODES.VERSION_CONFLICT, {
                technicalMessage: `Location map is at version ${onDisk.version}, expected ${baseVersion}`,
                context: { path: this.filePath, expected: baseVersion, actual: onDisk.version },
            });
        }

        const dir = path.dirname(this.filePath);
        await fs.mkdir(dir, { recursive: true });
        const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`);

        try {
            const handle = await fs.open(tempPath, 'w');
            try {
                await handle.writeFile(`${JSON.stringify(map, null, 2)}\n`, 'utf8');
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.rename(tempPath, this.filePath);
        } catch (err: unknown) {
            await fs.rm(tempPath, { force: true });
            throw err;
        }

        log.info({ path: this.filePath, version: map.version }, 'Location map written');
    }

    // ============================================
    // LOCKING
    // ============================================

    private async acquireLock(): Promise<void> {
        await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
        const started = Date.now();

        for (;;) {
            try {
                const handle = await fs.open(this.lockPath, 'wx');
                try {
                    await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`, 'utf8');
                } finally {
                    await handle.close();
                }
                return;
            } catch (err: unknown) {
                if (errorCode(err) !== 'EEXIST') throw err;
            }

            if (await this.breakStaleLock()) continue;

            if (Date.now() - started >= this.lockTimeoutMs) {
                throw new StorageError(STORAGE_ERROR_CODES.LOCATION_MAP_LOCKED, {
                    technicalMessage: `Timed out after ${this.lockTimeoutMs}ms waiting for ${this.lockPath}`,
                    context: { lockPath: this.lockPath, timeoutMs: this.lockTimeoutMs },
                });
            }
            await sleep(this.pollIntervalMs);
        }
    }

    /** @returns true when a stale lock was removed */
    private async breakStaleLock(): Promise<boolean> {
        let ageMs: number;
        try {
            const stats = await fs.stat(this.lockPath);
            ageMs = Date.now() - stats.mtimeMs;
        } catch (err: unknown) {
            // Released between our open and stat
            if (errorCode(err) === 'ENOENT') return true;
            throw err;
        }

        if (ageMs < this.staleLockMs) return false;

        log.warn({ lockPath: this.lockPath, ageMs }, 'Breaking stale location map lock');
        await fs.rm(this.lockPath, { force: true });
        return true;
    }

    private async releaseLock(): Promise<void> {
        await fs.rm(this.lockPath, { force: true });
    }
}
