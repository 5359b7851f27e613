/**
 * Grouping & Allocation Engine
 *
 * Pure: (specs, topology, prior map) -> extended map. Nothing here reads or
 * writes files; the location map store wraps this in a lock.
 *
 * Guarantees:
 * - identical inputs give an identical map
 * - identities already mapped keep their slots; the map is only extended
 * - new identities only go into drawers that are neither referenced by the
 *   prior map nor listed as consumed
 * - a slot holds one identity; a drawer holds at most 4 (1 if large/tall)
 * - a category without enough free drawers is skipped as a whole and reported
 *   as CapacityExceeded; other categories still allocate
 * - empty compartments in consumed drawers are never filled later; a capacity
 *   failure reports how many are stranded that way
 */

import type {
    AllocationTopology,
    ComponentCategory,
    ComponentSpec,
    DrawerDefinition,
    LocationAssignments,
    LocationMap,
    StorageSlot,
} from '../../types/index.js';
import { STORAGE_ERROR_CODES, capacityExceeded, reviewItem, type ReviewItem } from '../../errors/index.js';
import {
    COMPONENT_CATEGORIES,
    compareText,
    drawerCapacity,
    drawerKey,
    isCompartmentalized,
    slotLabel,
} from '../components/identity.js';
import { CATEGORY_RULES, groupSpecs } from './grouping.js';
import { validateTopology } from './topology.js';

// ============================================
// TYPES
// ============================================

export interface AllocationInput {
    specs: readonly ComponentSpec[];
    topology: AllocationTopology;
    priorMap: LocationMap;
    /** Clock for updatedAt; injectable for deterministic output */
    now?: () => Date;
}

export interface AllocationAddition {
    key: string;
    category: ComponentCategory;
    slot: StorageSlot;
}

export interface CapacityFailure {
    category: ComponentCategory;
    needed: number;
    available: number;
    /** Empty compartments left in the range's consumed drawers */
    stranded: number;
}

export interface AllocationResult {
    /** Extended snapshot; the prior snapshot itself when nothing was added */
    map: LocationMap;
    changed: boolean;
    additions: AllocationAddition[];
    capacityFailures: CapacityFailure[];
    /** Mapped identities no longer in the catalog; their slots stay reserved */
    retained: string[];
    issues: ReviewItem[];
}

export const EMPTY_LOCATION_MAP: LocationMap = {
    version: 0,
    updatedAt: null,
    assignments: {},
    consumedDrawers: [],
};

interface DrawerPlan {
    drawer: DrawerDefinition;
    members: ComponentSpec[];
}

// ============================================
// PRIOR MAP AUDIT
// ============================================

/** Report slots claimed by more than one identity */
function auditSlots(assignments: LocationAssignments): ReviewItem[] {
    const owners = new Map<string, string>();
    const issues: ReviewItem[] = [];

    for (const key of Object.keys(assignments).sort(compareText)) {
        for (const slot of assignments[key]) {
            const label = slotLabel(slot);
            const owner = owners.get(label);
            if (owner === undefined) {
                owners.set(label, key);
            } else if (owner !== key) {
                issues.push(
                    reviewItem(STORAGE_ERROR_CODES.SLOT_CONFLICT, `${owner} and ${key} are both mapped to ${label}`, {
                        slot: label,
                        keys: [owner, key],
                    })
                );
            }
        }
    }
    return issues;
}

function usedDrawers(map: LocationMap): Set<string> {
    const used = new Set(map.consumedDrawers);
    for (const slots of Object.values(map.assignments)) {
        for (const slot of slots) used.add(drawerKey(slot));
    }
    return used;
}

/** Free compartments in drawers of the range that are already in use */
function strandedCompartments(
    range: readonly DrawerDefinition[],
    used: ReadonlySet<string>,
    assignments: LocationAssignments
): number {
    const occupied = new Map<string, number>();
    for (const slots of Object.values(assignments)) {
        for (const slot of slots) occupied.set(drawerKey(slot), (occupied.get(drawerKey(slot)) ?? 0) + 1);
    }

    let stranded = 0;
    for (const drawer of range) {
        const key = drawerKey(drawer);
        if (!used.has(key)) continue;
        stranded += Math.max(0, drawerCapacity(drawer.sizeClass) - (occupied.get(key) ?? 0));
    }
    return stranded;
}

// ============================================
// PLANNING
// ============================================

/**
 * Lay a category's new specs out over its free drawers.
 * Drawers beyond the free list are counted at full chunk size, so `needed`
 * is the smallest number of drawers that would have been enough.
 */
function planCategory(
    category: ComponentCategory,
    specs: readonly ComponentSpec[],
    freeDrawers: readonly DrawerDefinition[]
): { plans: DrawerPlan[]; needed: number } {
    const { chunkSize } = CATEGORY_RULES[category];
    const plans: DrawerPlan[] = [];
    let needed = 0;

    for (const group of groupSpecs(category, specs)) {
        let offset = 0;
        while (offset < group.members.length) {
            const drawer = freeDrawers[needed];
            const size = drawer ? Math.min(chunkSize, drawerCapacity(drawer.sizeClass)) : chunkSize;
            const members = group.members.slice(offset, offset + size);
            if (drawer) plans.push({ drawer, members });
            offset += size;
            needed++;
        }
    }

    return { plans, needed };
}

function slotsFor(plan: DrawerPlan): Array<{ spec: ComponentSpec; slot: StorageSlot }> {
    const { unit, drawer, sizeClass } = plan.drawer;
    return plan.members.map((spec, index) => ({
        spec,
        slot: { unit, drawer, compartment: isCompartmentalized(sizeClass) ? index + 1 : null },
    }));
}

// ============================================
// ALLOCATE
// ============================================

/**
 * @throws StorageError INVALID_TOPOLOGY when a drawer is reserved twice
 */
export function allocate(input: AllocationInput): AllocationResult {
    const { specs, topology, priorMap } = input;
    validateTopology(topology);

    const issues = auditSlots(priorMap.assignments);
    const catalogKeys = new Set(specs.map((spec) => spec.key));
    const retained = Object.keys(priorMap.assignments)
        .filter((key) => !catalogKeys.has(key))
        .sort(compareText);

    const used = usedDrawers(priorMap);
    const additions: AllocationAddition[] = [];
    const capacityFailures: CapacityFailure[] = [];
    const newlyConsumed: string[] = [];

    for (const category of COMPONENT_CATEGORIES) {
        const pending = specs.filter(
            (spec) => spec.category === category && priorMap.assignments[spec.key] === undefined
        );
        if (pending.length === 0) continue;

        const range = topology[category] ?? [];
        const freeDrawers = range.filter((drawer) => !used.has(drawerKey(drawer)));
        const { plans, needed } = planCategory(category, pending, freeDrawers);

        if (needed > freeDrawers.length) {
            const failure: CapacityFailure = {
                category,
                needed,
                available: freeDrawers.length,
                stranded: strandedCompartments(range, used, priorMap.assignments),
            };
            capacityFailures.push(failure);
            issues.push(capacityExceeded(category, needed, failure.available, failure.stranded).toReviewItem());
            continue;
        }

        for (const plan of plans) {
            const key = drawerKey(plan.drawer);
            used.add(key);
            newlyConsumed.push(key);
            for (const { spec, slot } of slotsFor(plan)) {
                additions.push({ key: spec.key, category, slot });
            }
        }
    }

    if (additions.length === 0) {
        return { map: priorMap, changed: false, additions, capacityFailures, retained, issues };
    }

    const merged: LocationAssignments = { ...priorMap.assignments };
    for (const addition of additions) {
        merged[addition.key] = [addition.slot];
    }

    const assignments: LocationAssignments = {};
    for (const key of Object.keys(merged).sort(compareText)) {
        assignments[key] = merged[key];
    }

    const now = input.now ?? (() => new Date());
    const map: LocationMap = {
        version: priorMap.version + 1,
        updatedAt: now().toISOString(),
        assignments,
        consumedDrawers: [...priorMap.consumedDrawers, ...newlyConsumed],
    };

    return { map, changed: true, additions, capacityFailures, retained, issues };
}
