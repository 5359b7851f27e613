/**
 * Allocation Runner
 *
 * One allocation run end to end:
 *   fetch inventory (retry) -> merge with reference -> allocate under the
 *   store lock -> write the extended map -> optionally push new default locations.
 *
 * A RemoteUnavailable during the fetch aborts before the map is touched.
 */

import type { AllocationTopology, LocationMap } from '../../types/index.js';
import { needsReview, type ReviewItem } from '../../errors/index.js';
import { allocate, type AllocationResult } from '../../domain/allocation/allocate.js';
import { allocationLogger as log } from '../../utils/logger.js';
import { loadCatalog } from '../catalog/catalogService.js';
import type { InventoryGateway } from '../inventory/gateway.js';
import type { RetryPolicy } from '../inventory/retry.js';
import type { FuzzyMatcherOptions } from '../../domain/matching/fuzzyMatcher.js';
import type { LocationMapStore } from '../locationMap/locationMapStore.js';
import { pushDefaultLocations, type PushReport } from '../locations/locationPush.js';

export interface AllocationRunOptions {
    gateway: InventoryGateway;
    store: LocationMapStore;
    topology: AllocationTopology;
    /** Flat reference records (see loadReferenceRecords) */
    reference: readonly unknown[];
    dryRun?: boolean;
    /** Push default locations of newly added identities */
    push?: boolean;
    retry?: Partial<RetryPolicy>;
    /** Reconciliation of reference-only entries */
    matching?: FuzzyMatcherOptions;
    now?: () => Date;
}

export interface AllocationRunReport extends Omit<AllocationResult, 'issues'> {
    catalogSize: number;
    /** True when the extended map was written to disk */
    written: boolean;
    push: PushReport | null;
    /** Catalog, allocation and push issues, in that order */
    issues: ReviewItem[];
    needsReview: boolean;
}

export async function runAllocation(options: AllocationRunOptions): Promise<AllocationRunReport> {
    const { gateway, store, topology, now } = options;
    const catalog = await loadCatalog({
        gateway,
        reference: options.reference,
        retry: options.retry,
        matching: options.matching,
    });

    const compute = (priorMap: LocationMap): AllocationResult =>
        allocate({ specs: catalog.specs, topology, priorMap, now });

    const result = options.dryRun ? compute(await store.read()) : await store.update(compute);
    const written = !options.dryRun && result.changed;

    log.info(
        {
            version: result.map.version,
            added: result.additions.length,
            capacityFailures: result.capacityFailures.length,
            retained: result.retained.length,
            dryRun: options.dryRun ?? false,
        },
        'Allocation finished'
    );

    let push: PushReport | null = null;
    if (options.push && written) {
        push = await pushDefaultLocations({
            gateway,
            map: result.map,
            keys: result.additions.map((addition) => addition.key),
            retry: options.retry,
        });
    }

    const issues = [...catalog.issues, ...result.issues, ...(push?.issues ?? [])];
    return {
        map: result.map,
        changed: result.changed,
        additions: result.additions,
        capacityFailures: result.capacityFailures,
        retained: result.retained,
        catalogSize: catalog.specs.length,
        written,
        push,
        issues,
        needsReview: needsReview(issues),
    };
}
