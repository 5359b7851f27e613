/**
 * Storage topology
 *
 * Turns the topology configuration (explicit drawers and drawer ranges per
 * category) into ordered DrawerDefinition lists, and rejects layouts where one
 * drawer is reserved twice.
 */

import type { AllocationTopology, ComponentCategory, DrawerDefinition } from '../../types/index.js';
import { STORAGE_ERROR_CODES, StorageError } from '../../errors/index.js';
import { topologyConfigSchema, type TopologyEntry } from '../../schemas/storage.js';
import { COMPONENT_CATEGORIES, drawerKey } from '../components/identity.js';

function expandEntry(entry: TopologyEntry): DrawerDefinition[] {
    const unit = entry.unit.toUpperCase();
    if ('drawer' in entry) {
        return [{ unit, drawer: entry.drawer.toUpperCase(), sizeClass: entry.sizeClass }];
    }

    const prefix = entry.prefix.toUpperCase();
    const drawers: DrawerDefinition[] = [];
    for (let n = entry.from; n <= entry.to; n++) {
        drawers.push({ unit, drawer: `${prefix}${n}`, sizeClass: entry.sizeClass });
    }
    return drawers;
}

/**
 * Check that no drawer appears twice, within a category or across categories.
 *
 * @throws StorageError INVALID_TOPOLOGY
 */
export function validateTopology(topology: AllocationTopology): void {
    const owners = new Map<string, ComponentCategory>();

    for (const category of COMPONENT_CATEGORIES) {
        for (const drawer of topology[category] ?? []) {
            const key = drawerKey(drawer);
            const owner = owners.get(key);
            if (owner) {
                const where = owner === category ? `twice in the ${category} range` : `in both ${owner} and ${category}`;
                throw new StorageError(STORAGE_ERROR_CODES.INVALID_TOPOLOGY, {
                    technicalMessage: `Drawer ${key} is reserved ${where}`,
                    context: { drawer: key, categories: [owner, category] },
                });
            }
            owners.set(key, category);
        }
    }
}

/**
 * Parse, expand and validate a raw topology configuration.
 *
 * @throws StorageError INVALID_TOPOLOGY
 */
export function parseTopology(raw: unknown): AllocationTopology {
    const parsed = topologyConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new StorageError(STORAGE_ERROR_CODES.INVALID_TOPOLOGY, {
            technicalMessage: parsed.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; '),
            context: { issues: parsed.error.issues },
        });
    }

    const topology: AllocationTopology = {};
    for (const category of COMPONENT_CATEGORIES) {
        const entries = parsed.data[category];
        if (entries) topology[category] = entries.flatMap(expandEntry);
    }

    validateTopology(topology);
    return topology;
}
