/**
 * Label Builder
 *
 * One cell per occupied slot, ordered by slot, each carrying its drawer's
 * title ("R: 100R | 220R | 470R | 1K"). Print layout is not handled here.
 */

import type { ComponentIdentity, LocationMap, StorageSlot } from '../../types/index.js';
import { STORAGE_ERROR_CODES, reviewItem, type ReviewItem } from '../../errors/index.js';
import { compareSlots, compareText, drawerKey, parseIdentityKey } from '../components/identity.js';
import { stripQualifiers } from '../matching/rules.js';

export interface LabelCell {
    unit: string;
    drawer: string;
    compartment: number | null;
    key: string;
    text: string;
    /** Drawer title shared by every cell of the drawer */
    title: string;
}

export interface LabelSheet {
    cells: LabelCell[];
    issues: ReviewItem[];
}

const CAPACITOR_ABBREVIATIONS: Record<string, string> = {
    ceramic: 'Cer',
    film: 'Film',
    electrolytic: 'Elect',
};

/** "R", "Caps Cer", "Q NPN", "IC", "Pots", "LEDs 5mm", "Diodes" */
export function drawerTitlePrefix(identity: ComponentIdentity): string {
    switch (identity.category) {
        case 'resistor':
            return 'R';
        case 'capacitor':
            return `Caps ${CAPACITOR_ABBREVIATIONS[identity.subtype ?? ''] ?? identity.subtype ?? ''}`.trim();
        case 'diode':
            return 'Diodes';
        case 'transistor':
            return `Q ${(identity.subtype ?? '').toUpperCase()}`.trim();
        case 'ic':
            return 'IC';
        case 'potentiometer':
            return 'Pots';
        case 'led':
            return `LEDs ${identity.subtype ?? ''}`.trim();
    }
}

function cellText(identity: ComponentIdentity): string {
    return stripQualifiers(identity.category, identity.value) || identity.value;
}

export function buildLabelSheet(map: LocationMap): LabelSheet {
    const issues: ReviewItem[] = [];
    const placed: Array<{ slot: StorageSlot; key: string; identity: ComponentIdentity }> = [];

    for (const key of Object.keys(map.assignments).sort(compareText)) {
        const identity = parseIdentityKey(key);
        if (!identity) {
            issues.push(reviewItem(STORAGE_ERROR_CODES.MALFORMED_RECORD, `Unreadable identity key "${key}"`, { key }));
            continue;
        }
        for (const slot of map.assignments[key]) {
            placed.push({ slot, key, identity });
        }
    }

    placed.sort((a, b) => compareSlots(a.slot, b.slot) || compareText(a.key, b.key));

    const byDrawer = new Map<string, typeof placed>();
    for (const item of placed) {
        const drawer = drawerKey(item.slot);
        const list = byDrawer.get(drawer) ?? [];
        list.push(item);
        byDrawer.set(drawer, list);
    }

    const cells: LabelCell[] = [];
    for (const items of byDrawer.values()) {
        const title = `${drawerTitlePrefix(items[0].identity)}: ${items.map((item) => cellText(item.identity)).join(' | ')}`;
        for (const { slot, key, identity } of items) {
            cells.push({
                unit: slot.unit,
                drawer: slot.drawer,
                compartment: slot.compartment,
                key,
                text: cellText(identity),
                title,
            });
        }
    }

    return { cells, issues };
}
