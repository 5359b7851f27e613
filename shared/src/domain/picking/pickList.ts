/**
 * Picking Sheet Generator
 *
 * BOM + location assignments + stock -> location-ordered pick groups with
 * sufficiency accounting. Read-only and deterministic: identical inputs give
 * identical groups, totals and attention list.
 *
 * Resolution per line:
 * 1. identity key given verbatim ("resistor::4.7K"), or the name classified
 *    into an identity that is known (mapped, stocked or a matcher candidate)
 * 2. otherwise the fuzzy matcher
 * 3. otherwise unmatched; a name that classified keeps its identity for
 *    display but has no key, so it shows as "needs ordering"
 *
 * Unmatched and unlocated lines go to one trailing group; nothing is dropped.
 */

import type {
    BomLine,
    ComponentIdentity,
    LocationAssignments,
    MatchMethod,
    PickGroup,
    PickListEntry,
    PickSummary,
    StockSnapshot,
    StorageSlot,
} from '../../types/index.js';
import { STORAGE_ERROR_CODES, reviewItem, type ReviewItem } from '../../errors/index.js';
import { compareSlots, identityKey, parseIdentityKey, slotLabel } from '../components/identity.js';
import { classifyPart } from '../catalog/classify.js';
import type { FuzzyMatcher } from '../matching/fuzzyMatcher.js';

// ============================================
// TYPES
// ============================================

export const UNLOCATED = 'unlocated';

export interface PickSheetInput {
    bom: readonly BomLine[];
    assignments: LocationAssignments;
    stock: StockSnapshot;
    /** Fallback for names that do not resolve exactly */
    matcher?: FuzzyMatcher;
    /** Identity keys treated as known besides mapped and stocked ones */
    knownKeys?: Iterable<string>;
}

export interface PickSheet {
    groups: PickGroup[];
    /** Every entry in BOM order */
    entries: PickListEntry[];
    summary: PickSummary;
    /** Unmatched names and unlocated identities */
    attention: ReviewItem[];
}

interface Resolution {
    identity: ComponentIdentity | null;
    key: string | null;
    method: MatchMethod;
    confidence: number;
}

const UNMATCHED: Resolution = { identity: null, key: null, method: 'unmatched', confidence: 0 };

// ============================================
// RESOLUTION
// ============================================

function resolveLine(name: string, known: ReadonlySet<string>, matcher?: FuzzyMatcher): Resolution {
    const verbatim = parseIdentityKey(name.trim());
    if (verbatim) {
        return { identity: verbatim, key: identityKey(verbatim), method: 'exact', confidence: 1 };
    }

    const classified = classifyPart(name);
    if (classified.ok && known.has(identityKey(classified.identity))) {
        return { identity: classified.identity, key: identityKey(classified.identity), method: 'exact', confidence: 1 };
    }

    const match = matcher?.match(name);
    if (match?.status === 'matched') {
        return { identity: match.identity, key: match.key, method: 'fuzzy', confidence: match.confidence };
    }

    return classified.ok ? { ...UNMATCHED, identity: classified.identity } : UNMATCHED;
}

// ============================================
// GENERATION
// ============================================

export function generatePickSheet(input: PickSheetInput): PickSheet {
    const { bom, assignments, stock, matcher } = input;
    const known = new Set([...Object.keys(assignments), ...Object.keys(stock), ...(input.knownKeys ?? [])]);

    const entries: PickListEntry[] = bom.map((line, lineIndex) => {
        const resolution = resolveLine(line.name, known, matcher);
        const slot: StorageSlot | null =
            resolution.key !== null ? assignments[resolution.key]?.[0] ?? null : null;
        const onHand = resolution.key !== null ? stock[resolution.key] ?? 0 : 0;

        return {
            lineIndex,
            reference: line.reference,
            name: line.name,
            identity: resolution.identity,
            key: resolution.key,
            matchMethod: resolution.method,
            confidence: resolution.confidence,
            required: line.quantity,
            onHand,
            slot,
            location: slot ? slotLabel(slot) : UNLOCATED,
            sufficient: onHand >= line.quantity,
            shortfall: Math.max(0, line.quantity - onHand),
        };
    });

    const located = new Map<string, PickGroup>();
    const trailing: PickListEntry[] = [];
    const attention: ReviewItem[] = [];

    for (const entry of entries) {
        if (entry.slot === null) {
            trailing.push(entry);
            attention.push(
                entry.key === null
                    ? reviewItem(STORAGE_ERROR_CODES.UNMATCHED_COMPONENT, `${entry.name}: needs ordering`, {
                          line: entry.lineIndex,
                          name: entry.name,
                      })
                    : reviewItem(STORAGE_ERROR_CODES.UNRESOLVED_LOCATION, `${entry.name}: location not set`, {
                          line: entry.lineIndex,
                          name: entry.name,
                          key: entry.key,
                      })
            );
            continue;
        }

        const group = located.get(entry.location) ?? { location: entry.location, slot: entry.slot, entries: [] };
        group.entries.push(entry);
        located.set(entry.location, group);
    }

    const groups = [...located.values()].sort((a, b) =>
        a.slot && b.slot ? compareSlots(a.slot, b.slot) : 0
    );
    if (trailing.length > 0) {
        groups.push({ location: null, slot: null, entries: trailing });
    }

    const summary: PickSummary = {
        totalLineItems: entries.length,
        uniqueLocations: located.size,
        fullyInStock: entries.filter((entry) => entry.sufficient).length,
        shortages: entries
            .filter((entry) => !entry.sufficient)
            .map((entry) => ({ key: entry.key, name: entry.name, shortfall: entry.shortfall, onHand: entry.onHand })),
    };

    return { groups, entries, summary, attention };
}
