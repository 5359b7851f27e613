/**
 * Catalog Service
 *
 * Loads the reference dataset from disk, fetches inventory through the
 * gateway (with retry) and merges both into the ComponentSpec set.
 */

import fs from 'node:fs/promises';
import type { ComponentSpec, StockSnapshot } from '../../types/index.js';
import { STORAGE_ERROR_CODES, StorageError } from '../../errors/index.js';
import { referenceDatasetSchema } from '../../schemas/storage.js';
import { mergeCatalog, referenceRecordsFromDataset, type CatalogMergeResult } from '../../domain/catalog/merge.js';
import type { FuzzyMatcherOptions } from '../../domain/matching/fuzzyMatcher.js';
import { catalogLogger as log } from '../../utils/logger.js';
import type { InventoryGateway } from '../inventory/gateway.js';
import { withRetry, type RetryPolicy } from '../inventory/retry.js';

/**
 * Read the reference dataset file into flat records.
 *
 * @throws StorageError MALFORMED_RECORD when the file is not a category -> entries object
 */
export async function loadReferenceRecords(filePath: string): Promise<unknown[]> {
    const text = await fs.readFile(filePath, 'utf8');

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err: unknown) {
        throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
            technicalMessage: `Reference dataset ${filePath} is not valid JSON`,
            context: { path: filePath },
            cause: err,
        });
    }

    const parsed = referenceDatasetSchema.safeParse(raw);
    if (!parsed.success) {
        throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
            technicalMessage: `Reference dataset ${filePath} must map categories to lists`,
            context: { path: filePath, issues: parsed.error.issues },
        });
    }
    return referenceRecordsFromDataset(parsed.data);
}

export interface LoadCatalogOptions {
    gateway: InventoryGateway;
    reference: readonly unknown[];
    retry?: Partial<RetryPolicy>;
    /** Reconciliation of reference-only entries */
    matching?: FuzzyMatcherOptions;
}

export async function loadCatalog(options: LoadCatalogOptions): Promise<CatalogMergeResult> {
    const inventory = await withRetry(() => options.gateway.fetchComponents(), 'fetchComponents', options.retry);
    const result = mergeCatalog(inventory, options.reference, { matching: options.matching });

    log.info(
        { inventoryRecords: inventory.length, specs: result.specs.length, issues: result.issues.length },
        'Catalog merged'
    );
    return result;
}

/** On-hand quantity per identity key */
export function stockSnapshotFromSpecs(specs: readonly ComponentSpec[]): StockSnapshot {
    const stock: StockSnapshot = {};
    for (const spec of specs) stock[spec.key] = spec.quantityOnHand;
    return stock;
}
