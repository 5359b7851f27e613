/**
 * Picking Service
 *
 * Builds the fuzzy matcher from what is known about the catalog and runs the
 * pick sheet generator. Read-only: the location map is never locked or written.
 */

import type { BomLine, ComponentSpec, LocationMap, StockSnapshot } from '../../types/index.js';
import { needsReview } from '../../errors/index.js';
import { parseIdentityKey } from '../../domain/components/identity.js';
import { FuzzyMatcher, type FuzzyMatcherOptions, type MatchCandidate } from '../../domain/matching/fuzzyMatcher.js';
import { generatePickSheet, type PickSheet } from '../../domain/picking/pickList.js';
import { renderPickSheet } from '../../domain/picking/report.js';
import { pickingLogger as log } from '../../utils/logger.js';

export interface PickingRunOptions extends FuzzyMatcherOptions {
    bom: readonly BomLine[];
    map: LocationMap;
    stock: StockSnapshot;
    /** Catalog specs, when available; their usage counts drive tie-breaks */
    specs?: readonly ComponentSpec[];
    title?: string;
}

export interface PickingRunReport {
    sheet: PickSheet;
    report: string;
    needsReview: boolean;
}

/**
 * Matcher candidates: catalog specs first, then any mapped or stocked
 * identity the catalog does not know (usage 0).
 */
export function matchCandidates(
    specs: readonly ComponentSpec[],
    extraKeys: Iterable<string>
): MatchCandidate[] {
    const candidates: MatchCandidate[] = specs.map((spec) => ({
        identity: { category: spec.category, subtype: spec.subtype, value: spec.value },
        usageCount: spec.usageCount,
    }));
    const seen = new Set(specs.map((spec) => spec.key));

    for (const key of extraKeys) {
        if (seen.has(key)) continue;
        const identity = parseIdentityKey(key);
        if (!identity) continue;
        seen.add(key);
        candidates.push({ identity, usageCount: 0 });
    }
    return candidates;
}

export function runPicking(options: PickingRunOptions): PickingRunReport {
    const { bom, map, stock, specs = [] } = options;

    const matcher = new FuzzyMatcher(
        matchCandidates(specs, [...Object.keys(map.assignments), ...Object.keys(stock)]),
        { threshold: options.threshold, scorer: options.scorer, tieBreak: options.tieBreak }
    );

    const sheet = generatePickSheet({
        bom,
        assignments: map.assignments,
        stock,
        matcher,
        knownKeys: specs.map((spec) => spec.key),
    });

    log.info(
        {
            lines: sheet.summary.totalLineItems,
            locations: sheet.summary.uniqueLocations,
            shortages: sheet.summary.shortages.length,
            attention: sheet.attention.length,
        },
        'Pick sheet generated'
    );

    return {
        sheet,
        report: renderPickSheet(sheet, options.title),
        needsReview: needsReview(sheet.attention),
    };
}
