/**
 * Inventory system boundary
 *
 * The core only sees this interface. Implementations own the protocol,
 * auth and location tree of their inventory system.
 */

import type { ComponentIdentity, StorageSlot } from '../../types/index.js';

export interface MoveStockResult {
    /** Quantity transferred into the slot */
    moved: number;
    /** Quantity that was already there */
    alreadyInPlace: number;
}

/** A part as the inventory system names it */
export interface InventoryPart {
    id: number;
    name: string;
    /** e.g. "Passives/Resistors"; empty when uncategorised */
    categoryPath: string;
}

export interface InventoryGateway {
    /**
     * Raw component records, shaped like inventoryRecordSchema.
     * Validation happens in the catalog merger.
     */
    fetchComponents(): Promise<unknown[]>;

    /** @returns false when the inventory system has no part for the identity */
    setDefaultLocation(identity: ComponentIdentity, slot: StorageSlot): Promise<boolean>;

    /** Active parts with no default location */
    listPartsWithoutLocation(): Promise<InventoryPart[]>;

    setPartLocation(partId: number, slot: StorageSlot): Promise<void>;

    /** Move up to `quantity` of the identity's stock into the slot */
    moveStock(identity: ComponentIdentity, slot: StorageSlot, quantity: number): Promise<MoveStockResult>;
}

/**
 * Non-2xx response from the inventory system.
 * `status` is what the retry wrapper uses to tell transient failures apart.
 */
export class InventoryHttpError extends Error {
    readonly status: number;
    readonly url: string;

    constructor(status: number, url: string, body?: string) {
        super(`Inventory request failed with HTTP ${status}: ${url}${body ? ` - ${body.slice(0, 200)}` : ''}`);
        this.name = 'InventoryHttpError';
        this.status = status;
        this.url = url;
        Object.setPrototypeOf(this, InventoryHttpError.prototype);
    }
}
