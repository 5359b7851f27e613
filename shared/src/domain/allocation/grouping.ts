/**
 * Grouping rules
 *
 * One declarative rule per category: how specs are partitioned, how they are
 * ordered inside a partition, and how many share a drawer. A new partition
 * always starts a new drawer.
 *
 * | Category      | Partition             | Order                                  |
 * |---------------|-----------------------|----------------------------------------|
 * | resistor      | decade                | value, priority desc, usage desc       |
 * | capacitor     | ceramic/film/electro  | value                                  |
 * | diode         | -                     | part number                            |
 * | transistor    | npn/pnp/jfet/mosfet   | part number                            |
 * | ic            | -                     | part number                            |
 * | potentiometer | -                     | value, then taper                      |
 * | led           | size (mm)             | colour                                 |
 */

import type { ComponentCategory, ComponentSpec } from '../../types/index.js';
import {
    CAPACITOR_SUBTYPES,
    COMPARTMENTS_PER_DRAWER,
    TRANSISTOR_SUBTYPES,
    compareText,
    numericValue,
} from '../components/identity.js';

// ============================================
// TYPES
// ============================================

export interface Partition {
    /** Stable name: "1K-10K", "ceramic", "5mm" */
    name: string;
    rank: number;
}

export interface GroupingRule {
    partition: (spec: ComponentSpec) => Partition;
    compare: (a: ComponentSpec, b: ComponentSpec) => number;
    chunkSize: number;
}

export interface SpecGroup {
    partition: string;
    members: ComponentSpec[];
}

// ============================================
// PARTITIONS
// ============================================

const SINGLE: Partition = { name: 'all', rank: 0 };

const RESISTOR_DECADES: ReadonlyArray<{ name: string; below: number }> = [
    { name: '0.1-10', below: 10 },
    { name: '10-100', below: 100 },
    { name: '100-1K', below: 1_000 },
    { name: '1K-10K', below: 10_000 },
    { name: '10K-100K', below: 100_000 },
    { name: '100K-1M', below: 1_000_000 },
    { name: '1M+', below: Infinity },
];

function resistorDecade(spec: ComponentSpec): Partition {
    const ohms = numericValue(spec) ?? 0;
    const rank = RESISTOR_DECADES.findIndex((decade) => ohms < decade.below);
    return { name: RESISTOR_DECADES[rank].name, rank };
}

function subtypePartition(order: readonly string[]) {
    return (spec: ComponentSpec): Partition => {
        const index = order.indexOf(spec.subtype ?? '');
        // Unknown subtypes sort after the known ones
        return { name: spec.subtype ?? '', rank: index === -1 ? order.length : index };
    };
}

function ledSize(spec: ComponentSpec): Partition {
    const millimetres = Number.parseFloat(spec.subtype ?? '');
    return { name: spec.subtype ?? '', rank: Number.isFinite(millimetres) ? millimetres : Infinity };
}

// ============================================
// ORDERINGS
// ============================================

const PRIORITY_RANK: Record<ComponentSpec['priority'], number> = { essential: 0, optional: 1 };

function byMagnitude(a: ComponentSpec, b: ComponentSpec): number {
    return (numericValue(a) ?? 0) - (numericValue(b) ?? 0);
}

function byValue(a: ComponentSpec, b: ComponentSpec): number {
    return compareText(a.value, b.value);
}

function byKey(a: ComponentSpec, b: ComponentSpec): number {
    return compareText(a.key, b.key);
}

// ============================================
// RULE TABLE
// ============================================

export const CATEGORY_RULES: Record<ComponentCategory, GroupingRule> = {
    resistor: {
        partition: resistorDecade,
        compare: (a, b) =>
            byMagnitude(a, b) ||
            PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
            b.usageCount - a.usageCount ||
            byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
    capacitor: {
        partition: subtypePartition(CAPACITOR_SUBTYPES),
        compare: (a, b) => byMagnitude(a, b) || byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
    diode: {
        partition: () => SINGLE,
        compare: (a, b) => byValue(a, b) || byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
    transistor: {
        partition: subtypePartition(TRANSISTOR_SUBTYPES),
        compare: (a, b) => byValue(a, b) || byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
    ic: {
        partition: () => SINGLE,
        compare: (a, b) => byValue(a, b) || byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
    potentiometer: {
        partition: () => SINGLE,
        compare: (a, b) => byMagnitude(a, b) || compareText(a.subtype ?? '', b.subtype ?? '') || byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
    led: {
        partition: ledSize,
        compare: (a, b) => byValue(a, b) || byKey(a, b),
        chunkSize: COMPARTMENTS_PER_DRAWER,
    },
};

/**
 * Partition and order specs of one category.
 * Partitions come back in rank order, members in the rule's order.
 */
export function groupSpecs(category: ComponentCategory, specs: readonly ComponentSpec[]): SpecGroup[] {
    const rule = CATEGORY_RULES[category];
    const partitions = new Map<string, { rank: number; members: ComponentSpec[] }>();

    for (const spec of specs) {
        const { name, rank } = rule.partition(spec);
        const entry = partitions.get(name) ?? { rank, members: [] };
        entry.members.push(spec);
        partitions.set(name, entry);
    }

    return [...partitions.entries()]
        .sort(([nameA, a], [nameB, b]) => a.rank - b.rank || compareText(nameA, nameB))
        .map(([partition, entry]) => ({
            partition,
            members: [...entry.members].sort(rule.compare),
        }));
}
