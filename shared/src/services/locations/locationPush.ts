/**
 * Default location push
 *
 * Sets each mapped identity's default location in the inventory system to
 * its primary slot. Calls are sequential; RemoteUnavailable aborts the push.
 */

import type { LocationMap } from '../../types/index.js';
import { STORAGE_ERROR_CODES, reviewItem, type ReviewItem } from '../../errors/index.js';
import { compareText, parseIdentityKey, slotLabel } from '../../domain/components/identity.js';
import { inventoryLogger as log } from '../../utils/logger.js';
import type { InventoryGateway } from '../inventory/gateway.js';
import { withRetry, type RetryPolicy } from '../inventory/retry.js';

export interface PushLocationsOptions {
    gateway: InventoryGateway;
    map: LocationMap;
    /** Limit the push to these keys; defaults to every mapped identity */
    keys?: readonly string[];
    retry?: Partial<RetryPolicy>;
}

export interface PushReport {
    updated: Array<{ key: string; location: string }>;
    notFound: string[];
    issues: ReviewItem[];
}

export async function pushDefaultLocations(options: PushLocationsOptions): Promise<PushReport> {
    const { gateway, map } = options;
    const keys = [...(options.keys ?? Object.keys(map.assignments))].sort(compareText);
    const report: PushReport = { updated: [], notFound: [], issues: [] };

    for (const key of keys) {
        const slot = map.assignments[key]?.[0];
        const identity = parseIdentityKey(key);
        if (!slot || !identity) {
            report.issues.push(
                reviewItem(STORAGE_ERROR_CODES.UNRESOLVED_LOCATION, `${key} has no usable location entry`, { key })
            );
            continue;
        }

        const location = slotLabel(slot);
        const found = await withRetry(
            () => gateway.setDefaultLocation(identity, slot),
            `setDefaultLocation(${key})`,
            options.retry
        );

        if (found) {
            report.updated.push({ key, location });
            log.debug({ key, location }, 'Default location set');
        } else {
            report.notFound.push(key);
            report.issues.push(
                reviewItem(STORAGE_ERROR_CODES.UNMATCHED_COMPONENT, `No inventory part for ${key}`, { key, location })
            );
        }
    }

    log.info({ updated: report.updated.length, notFound: report.notFound.length }, 'Default locations pushed');
    return report;
}
