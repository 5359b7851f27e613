/**
 * Component identity and storage slot helpers
 *
 * Identity keys, canonical values per category, slot labels and the
 * physical walking order of slots. Pure functions only.
 */

import type {
    ComponentCategory,
    ComponentIdentity,
    SizeClass,
    StorageSlot,
} from '../../types/index.js';
import {
    formatCapacitance,
    formatResistance,
    normalizeColour,
    normalizeLedSize,
    normalizePartNumber,
    parseCapacitance,
    parseResistance,
} from './values.js';

// ============================================
// CATEGORIES
// ============================================

export const COMPONENT_CATEGORIES = [
    'resistor',
    'capacitor',
    'diode',
    'transistor',
    'ic',
    'potentiometer',
    'led',
] as const satisfies readonly ComponentCategory[];

export const CAPACITOR_SUBTYPES = ['ceramic', 'film', 'electrolytic'] as const;
export const TRANSISTOR_SUBTYPES = ['npn', 'pnp', 'jfet', 'mosfet'] as const;
export const POTENTIOMETER_TAPERS = ['A', 'B', 'C', 'W', 'trim'] as const;

/** Categories whose value is a manufacturer part number */
export const PART_NUMBER_CATEGORIES: ReadonlySet<ComponentCategory> = new Set(['diode', 'transistor', 'ic']);

function isOneOf(list: readonly string[], value: string): boolean {
    return list.includes(value);
}

export function isComponentCategory(value: unknown): value is ComponentCategory {
    return typeof value === 'string' && isOneOf(COMPONENT_CATEGORIES, value);
}

// ============================================
// CANONICAL IDENTITY
// ============================================

function canonicalSubtype(category: ComponentCategory, subtype: string | null | undefined): string | null | undefined {
    const raw = subtype?.trim() ?? '';

    switch (category) {
        case 'capacitor': {
            const lower = raw.toLowerCase();
            return isOneOf(CAPACITOR_SUBTYPES, lower) ? lower : undefined;
        }
        case 'transistor': {
            const lower = raw.toLowerCase();
            return isOneOf(TRANSISTOR_SUBTYPES, lower) ? lower : undefined;
        }
        case 'led':
            return normalizeLedSize(raw) ?? undefined;
        case 'potentiometer': {
            if (raw === '') return null;
            if (raw.toLowerCase() === 'trim') return 'trim';
            const upper = raw.toUpperCase();
            return isOneOf(POTENTIOMETER_TAPERS, upper) ? upper : undefined;
        }
        default:
            return null;
    }
}

/**
 * Canonical value text for a category, or null when the text is not a value
 * of that category ("abc" as a resistor).
 */
export function canonicalValue(category: ComponentCategory, value: string): string | null {
    const trimmed = value.trim();
    if (trimmed === '') return null;

    switch (category) {
        case 'resistor':
        case 'potentiometer': {
            const ohms = parseResistance(trimmed);
            return ohms === null ? null : formatResistance(ohms);
        }
        case 'capacitor': {
            const picofarads = parseCapacitance(trimmed);
            return picofarads === null ? null : formatCapacitance(picofarads);
        }
        case 'led':
            return normalizeColour(trimmed);
        default:
            return normalizePartNumber(trimmed);
    }
}

/**
 * Build a canonical identity, or explain why the fields are unusable.
 *
 * @example
 * canonicalIdentity('capacitor', 'Ceramic', '0.1uF')
 * // { ok: true, identity: { category: 'capacitor', subtype: 'ceramic', value: '100nF' } }
 */
export function canonicalIdentity(
    category: ComponentCategory,
    subtype: string | null | undefined,
    value: string
): { ok: true; identity: ComponentIdentity } | { ok: false; reason: string } {
    const sub = canonicalSubtype(category, subtype);
    if (sub === undefined) {
        return { ok: false, reason: `invalid or missing subtype "${subtype ?? ''}" for ${category}` };
    }

    const canonical = canonicalValue(category, value);
    if (canonical === null) {
        return { ok: false, reason: `cannot read "${value}" as a ${category} value` };
    }

    return { ok: true, identity: { category, subtype: sub, value: canonical } };
}

/**
 * Numeric magnitude used for ordering: ohms for resistors and pots,
 * pF for capacitors, null for everything else.
 */
export function numericValue(identity: ComponentIdentity): number | null {
    switch (identity.category) {
        case 'resistor':
        case 'potentiometer':
            return parseResistance(identity.value);
        case 'capacitor':
            return parseCapacitance(identity.value);
        default:
            return null;
    }
}

// ============================================
// IDENTITY KEYS
// ============================================

/** "resistor::4.7K", "capacitor:ceramic:100nF" */
export function identityKey(identity: ComponentIdentity): string {
    return `${identity.category}:${identity.subtype ?? ''}:${identity.value}`;
}

export function parseIdentityKey(key: string): ComponentIdentity | null {
    const first = key.indexOf(':');
    const second = first === -1 ? -1 : key.indexOf(':', first + 1);
    if (second === -1) return null;

    const category = key.slice(0, first);
    if (!isComponentCategory(category)) return null;

    const subtype = key.slice(first + 1, second);
    const value = key.slice(second + 1);
    if (value === '') return null;

    return { category, subtype: subtype === '' ? null : subtype, value };
}

/** Human-readable name: "4.7K Resistor", "100nF Ceramic Capacitor", "2N5088 NPN" */
export function displayName(identity: ComponentIdentity): string {
    switch (identity.category) {
        case 'resistor':
            return `${identity.value} Resistor`;
        case 'capacitor':
            return `${identity.value} ${titleCase(identity.subtype ?? '')} Capacitor`.replace(/\s+/g, ' ');
        case 'transistor':
            return identity.subtype ? `${identity.value} ${identity.subtype.toUpperCase()}` : identity.value;
        case 'potentiometer':
            if (identity.subtype === 'trim') return `${identity.value} Trimpot`;
            return `${identity.subtype ?? ''}${identity.value} Pot`;
        case 'led':
            return `${identity.subtype ?? ''} ${identity.value} LED`.trim();
        default:
            return identity.value;
    }
}

function titleCase(text: string): string {
    return text ? text[0].toUpperCase() + text.slice(1) : text;
}

// ============================================
// STORAGE SLOTS
// ============================================

export const COMPARTMENTS_PER_DRAWER = 4;

/** Compartment names by physical position */
export const COMPARTMENT_POSITIONS: Record<number, string> = {
    1: 'Front-Left',
    2: 'Front-Right',
    3: 'Back-Left',
    4: 'Back-Right',
};

export function isCompartmentalized(sizeClass: SizeClass): boolean {
    return sizeClass === 'small' || sizeClass === 'medium';
}

export function drawerCapacity(sizeClass: SizeClass): number {
    return isCompartmentalized(sizeClass) ? COMPARTMENTS_PER_DRAWER : 1;
}

/** "U1-S5" */
export function drawerKey(slot: { unit: string; drawer: string }): string {
    return `${slot.unit}-${slot.drawer}`;
}

/** "U1-S5-1", or "U2-L1" when the drawer has no compartments */
export function slotLabel(slot: StorageSlot): string {
    const base = drawerKey(slot);
    return slot.compartment === null ? base : `${base}-${slot.compartment}`;
}

export function parseSlotLabel(label: string): StorageSlot | null {
    const match = /^([A-Za-z]+\d+)-([A-Za-z]+\d+)(?:-(\d+))?$/.exec(label.trim());
    if (!match) return null;
    return {
        unit: match[1].toUpperCase(),
        drawer: match[2].toUpperCase(),
        compartment: match[3] === undefined ? null : Number(match[3]),
    };
}

export function sameSlot(a: StorageSlot, b: StorageSlot): boolean {
    return a.unit === b.unit && a.drawer === b.drawer && a.compartment === b.compartment;
}

/** "S12" -> { prefix: "S", number: 12 } */
function splitId(id: string): { prefix: string; number: number } {
    const match = /^(\D*)(\d+)?/.exec(id);
    const prefix = match?.[1] ?? id;
    const digits = match?.[2];
    return { prefix, number: digits === undefined ? 0 : Number(digits) };
}

/** Code-point order, independent of locale */
export function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/** Drawer numbers are compared numerically: S5 < S7 < S31 */
export function compareDrawerIds(a: string, b: string): number {
    const left = splitId(a);
    const right = splitId(b);
    return left.number - right.number || compareText(left.prefix, right.prefix);
}

/**
 * Physical walking order: unit number, then drawer number, then compartment.
 * A drawer without compartments sorts before compartment 1 of the same drawer.
 */
export function compareSlots(a: StorageSlot, b: StorageSlot): number {
    const unitA = splitId(a.unit);
    const unitB = splitId(b.unit);
    return (
        unitA.number - unitB.number ||
        compareText(unitA.prefix, unitB.prefix) ||
        compareDrawerIds(a.drawer, b.drawer) ||
        (a.compartment ?? 0) - (b.compartment ?? 0)
    );
}
