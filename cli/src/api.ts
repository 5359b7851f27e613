/**
 * InvenTree REST client
 *
 * Implements the core's InventoryGateway against an InvenTree server:
 * - parts are read page by page and classified into identity records
 * - locations form a Workshop > Unit > Drawer > Compartment tree, created on demand
 * - default locations are set with PATCH /api/part/{pk}/; parts without one are
 *   listed from the same part query
 * - stock is moved with POST /api/stock/transfer/
 *
 * Non-2xx responses throw InventoryHttpError so the retry wrapper can tell
 * transient failures apart. Retrying is left to the caller.
 */

import { z } from 'zod';
import {
  COMPARTMENT_POSITIONS,
  InventoryHttpError,
  classifyPart,
  identityKey,
  inventoryLogger,
  type ComponentIdentity,
  type InventoryGateway,
  type InventoryPart,
  type MoveStockResult,
  type StorageSlot,
} from '@drawermap/shared';

const log = inventoryLogger.child({ client: 'inventree' });

// ============================================
// RESPONSE SCHEMAS
// ============================================

const categorySchema = z.object({
  pk: z.number(),
  name: z.string(),
  pathstring: z.string().optional(),
});

const partSchema = z.object({
  pk: z.number(),
  name: z.string(),
  category: z.number().nullable().optional(),
  total_in_stock: z.coerce.number().nullable().optional(),
  in_stock: z.coerce.number().nullable().optional(),
  minimum_stock: z.coerce.number().nullable().optional(),
  default_location: z.number().nullable().optional(),
});

const locationSchema = z.object({
  pk: z.number(),
  name: z.string(),
});

const stockItemSchema = z.object({
  pk: z.number(),
  quantity: z.coerce.number(),
  location: z.number().nullable().optional(),
});

/** InvenTree answers with a bare list, or a page when `limit` is given */
const listResponseSchema = z.union([
  z.array(z.unknown()),
  z.object({
    results: z.array(z.unknown()),
    next: z.string().nullable().optional(),
  }),
]);

type Part = z.infer<typeof partSchema>;

// ============================================
// CLIENT
// ============================================

export interface InvenTreeOptions {
  baseUrl: string;
  token: string;
  /** Injected in tests */
  fetch?: typeof fetch;
  pageSize?: number;
}

type Query = Record<string, string | number | boolean | undefined>;

const DRAWER_KINDS: Record<string, string> = {
  S: 'Small drawer',
  M: 'Medium drawer',
  L: 'Large drawer',
  T: 'Tall drawer',
};

export class InvenTreeGateway implements InventoryGateway {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;
  private readonly pageSize: number;

  private readonly locationCache = new Map<string, number>();
  /** Identity key -> part pks, filled by fetchComponents */
  private partsByKey: Map<string, number[]> | null = null;

  constructor(options: InvenTreeOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.fetchImpl = options.fetch ?? fetch;
    this.pageSize = options.pageSize ?? 500;
  }

  // ----------------------------------------
  // HTTP
  // ----------------------------------------

  private async request(method: string, path: string, options: { query?: Query; body?: unknown } = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(name, String(value));
    }

    const res = await this.fetchImpl(url.toString(), {
      method,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        Authorization: `Token ${this.token}`,
      },
      ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
    });

    if (!res.ok) {
      throw new InventoryHttpError(res.status, url.toString(), await res.text());
    }
    return res.json();
  }

  private async list<T>(path: string, parseItem: (raw: unknown) => T, query: Query = {}): Promise<T[]> {
    const items: T[] = [];

    for (let offset = 0; ; ) {
      const page = listResponseSchema.parse(
        await this.request('GET', path, { query: { ...query, limit: this.pageSize, offset } })
      );
      if (Array.isArray(page)) {
        items.push(...page.map(parseItem));
        return items;
      }
      items.push(...page.results.map(parseItem));
      if (!page.next || page.results.length === 0) return items;
      offset += page.results.length;
    }
  }

  // ----------------------------------------
  // PARTS
  // ----------------------------------------

  /** Active parts with their category path */
  private async fetchParts(): Promise<Array<{ part: Part; categoryPath: string }>> {
    const categories = await this.list('/api/part/category/', (raw) => categorySchema.parse(raw));
    const paths = new Map(categories.map((category) => [category.pk, category.pathstring ?? category.name]));
    const parts = await this.list('/api/part/', (raw) => partSchema.parse(raw), { active: true });

    return parts.map((part) => ({
      part,
      categoryPath: part.category != null ? paths.get(part.category) ?? '' : '',
    }));
  }

  async fetchComponents(): Promise<unknown[]> {
    const parts = await this.fetchParts();
    const records: unknown[] = [];
    const partsByKey = new Map<string, number[]>();

    for (const { part, categoryPath } of parts) {
      const classified = classifyPart(part.name, categoryPath);
      if (!classified.ok) {
        log.debug({ part: part.name, categoryPath, reason: classified.reason }, 'Skipping unclassified part');
        continue;
      }

      const { identity } = classified;
      const key = identityKey(identity);
      partsByKey.set(key, [...(partsByKey.get(key) ?? []), part.pk]);

      records.push({
        category: identity.category,
        subtype: identity.subtype,
        value: identity.value,
        quantity: stockOf(part),
        minQuantity: part.minimum_stock ?? 0,
      });
    }

    this.partsByKey = partsByKey;
    log.info({ parts: parts.length, components: records.length }, 'Fetched components');
    return records;
  }

  private async partsFor(identity: ComponentIdentity): Promise<number[]> {
    if (!this.partsByKey) await this.fetchComponents();
    return this.partsByKey?.get(identityKey(identity)) ?? [];
  }

  async setDefaultLocation(identity: ComponentIdentity, slot: StorageSlot): Promise<boolean> {
    const parts = await this.partsFor(identity);
    if (parts.length === 0) return false;

    for (const pk of parts) await this.setPartLocation(pk, slot);
    return true;
  }

  async listPartsWithoutLocation(): Promise<InventoryPart[]> {
    const parts = await this.fetchParts();
    return parts
      .filter(({ part }) => part.default_location == null)
      .map(({ part, categoryPath }) => ({ id: part.pk, name: part.name, categoryPath }));
  }

  async setPartLocation(partId: number, slot: StorageSlot): Promise<void> {
    const locationId = await this.ensureSlotLocation(slot);
    await this.request('PATCH', `/api/part/${partId}/`, { body: { default_location: locationId } });
  }

  // ----------------------------------------
  // STOCK
  // ----------------------------------------

  async moveStock(identity: ComponentIdentity, slot: StorageSlot, quantity: number): Promise<MoveStockResult> {
    const result: MoveStockResult = { moved: 0, alreadyInPlace: 0 };
    const parts = await this.partsFor(identity);
    if (parts.length === 0) return result;

    const locationId = await this.ensureSlotLocation(slot);
    let remaining = quantity;

    for (const pk of parts) {
      const items = await this.list('/api/stock/', (raw) => stockItemSchema.parse(raw), { part: pk, in_stock: true });
      for (const item of items) {
        if (item.location === locationId) {
          result.alreadyInPlace += item.quantity;
          continue;
        }
        if (remaining <= 0 || item.quantity <= 0) continue;

        const amount = Math.min(item.quantity, remaining);
        await this.request('POST', '/api/stock/transfer/', {
          body: {
            items: [{ pk: item.pk, quantity: amount }],
            location: locationId,
            notes: 'Moved to allocated drawer location',
          },
        });
        result.moved += amount;
        remaining -= amount;
      }
    }
    return result;
  }

  // ----------------------------------------
  // LOCATIONS
  // ----------------------------------------

  /** Workshop > "Unit 1 (U1)" > "S5" > "Compartment 1" */
  async ensureSlotLocation(slot: StorageSlot): Promise<number> {
    const workshop = await this.getOrCreateLocation('Workshop', null, 'Main workshop storage');
    const unitNumber = /(\d+)$/.exec(slot.unit)?.[1] ?? slot.unit;
    const unit = await this.getOrCreateLocation(`Unit ${unitNumber} (${slot.unit})`, workshop, `Drawer unit ${slot.unit}`);

    const kind = DRAWER_KINDS[slot.drawer.charAt(0).toUpperCase()] ?? 'Drawer';
    const drawer = await this.getOrCreateLocation(slot.drawer, unit, `${kind} ${slot.drawer}`);
    if (slot.compartment === null) return drawer;

    const position = COMPARTMENT_POSITIONS[slot.compartment] ?? `Position ${slot.compartment}`;
    return this.getOrCreateLocation(`Compartment ${slot.compartment}`, drawer, position);
  }

  private async getOrCreateLocation(name: string, parent: number | null, description: string): Promise<number> {
    const cacheKey = `${parent ?? ''}:${name}`;
    const cached = this.locationCache.get(cacheKey);
    if (cached !== undefined) return cached;

    const existing = await this.list('/api/stock/location/', (raw) => locationSchema.parse(raw), {
      name,
      parent: parent ?? undefined,
    });
    const match = existing.find((location) => location.name === name);

    let pk: number;
    if (match) {
      pk = match.pk;
    } else {
      const created = locationSchema.parse(
        await this.request('POST', '/api/stock/location/', {
          body: { name, description, structural: false, ...(parent !== null ? { parent } : {}) },
        })
      );
      pk = created.pk;
      log.info({ name, parent, pk }, 'Created stock location');
    }

    this.locationCache.set(cacheKey, pk);
    return pk;
  }
}

function stockOf(part: Part): number {
  return Math.max(0, part.total_in_stock ?? part.in_stock ?? 0);
}
