/**
 * Stock Mover
 *
 * Moves the stock of every mapped identity into its primary slot.
 * Identities without stock are skipped. A dry run only lists the moves.
 */

import type { LocationMap, StockSnapshot } from '../../types/index.js';
import { compareText, parseIdentityKey, slotLabel } from '../../domain/components/identity.js';
import { inventoryLogger as log } from '../../utils/logger.js';
import type { InventoryGateway } from '../inventory/gateway.js';
import { withRetry, type RetryPolicy } from '../inventory/retry.js';

export interface MoveStockOptions {
    gateway: InventoryGateway;
    map: LocationMap;
    stock: StockSnapshot;
    dryRun?: boolean;
    retry?: Partial<RetryPolicy>;
}

export interface PlannedMove {
    key: string;
    location: string;
    quantity: number;
}

export interface StockMoveReport {
    planned: PlannedMove[];
    moved: number;
    alreadyInPlace: number;
    /** Mapped identities with nothing on hand */
    skipped: string[];
}

export async function moveStockToLocations(options: MoveStockOptions): Promise<StockMoveReport> {
    const { gateway, map, stock } = options;
    const report: StockMoveReport = { planned: [], moved: 0, alreadyInPlace: 0, skipped: [] };

    for (const key of Object.keys(map.assignments).sort(compareText)) {
        const quantity = stock[key] ?? 0;
        const slot = map.assignments[key][0];
        const identity = parseIdentityKey(key);
        if (quantity <= 0 || !slot || !identity) {
            report.skipped.push(key);
            continue;
        }

        const location = slotLabel(slot);
        report.planned.push({ key, location, quantity });
        if (options.dryRun) continue;

        const result = await withRetry(
            () => gateway.moveStock(identity, slot, quantity),
            `moveStock(${key})`,
            options.retry
        );
        report.moved += result.moved;
        report.alreadyInPlace += result.alreadyInPlace;
        log.debug({ key, location, ...result }, 'Stock moved');
    }

    log.info(
        { planned: report.planned.length, moved: report.moved, dryRun: options.dryRun ?? false },
        'Stock move finished'
    );
    return report;
}
