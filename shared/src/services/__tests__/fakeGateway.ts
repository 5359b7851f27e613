/**
 * In-memory InventoryGateway for service tests
 */

import type { ComponentIdentity, StorageSlot } from '../../types/index.js';
import { identityKey, slotLabel } from '../../domain/components/identity.js';
import {
    InventoryHttpError,
    type InventoryGateway,
    type InventoryPart,
    type MoveStockResult,
} from '../inventory/gateway.js';

export class FakeGateway implements InventoryGateway {
    /** Answer fetchComponents with HTTP 503 this many times first */
    transientFailures = 0;
    fetchCalls = 0;
    readonly defaults = new Map<string, string>();
    readonly moves: Array<{ key: string; location: string; quantity: number }> = [];
    /** Parts listed by listPartsWithoutLocation */
    parts: InventoryPart[] = [];
    readonly partLocations = new Map<number, string>();

    constructor(
        private readonly records: unknown[],
        /** Identity keys the inventory system has no part for */
        private readonly missing: ReadonlySet<string> = new Set()
    ) {}

    async fetchComponents(): Promise<unknown[]> {
        this.fetchCalls++;
        if (this.transientFailures > 0) {
            this.transientFailures--;
            throw new InventoryHttpError(503, 'http://inventory.test/api/part/');
        }
        return this.records;
    }

    async setDefaultLocation(identity: ComponentIdentity, slot: StorageSlot): Promise<boolean> {
        const key = identityKey(identity);
        if (this.missing.has(key)) return false;
        this.defaults.set(key, slotLabel(slot));
        return true;
    }

    async listPartsWithoutLocation(): Promise<InventoryPart[]> {
        return this.parts.filter((part) => !this.partLocations.has(part.id));
    }

    async setPartLocation(partId: number, slot: StorageSlot): Promise<void> {
        this.partLocations.set(partId, slotLabel(slot));
    }

    async moveStock(identity: ComponentIdentity, slot: StorageSlot, quantity: number): Promise<MoveStockResult> {
        this.moves.push({ key: identityKey(identity), location: slotLabel(slot), quantity });
        return { moved: quantity, alreadyInPlace: 0 };
    }
}

export const noSleep = async (_ms: number): Promise<void> => {};
