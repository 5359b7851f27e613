/**
 * Reference reconciliation
 *
 * A reference entry with no inventory record may still be in stock under a
 * slightly different name ("1N4148" vs "1N4148W"). Each reference-only spec
 * is run through the fuzzy matcher against the inventory-backed specs of the
 * same category and subtype; a match is reported as POSSIBLE_DUPLICATE.
 * Specs are never merged on a fuzzy match.
 */

import type { ComponentSpec } from '../../types/index.js';
import { STORAGE_ERROR_CODES, reviewItem, type ReviewItem } from '../../errors/index.js';
import { FuzzyMatcher, type FuzzyMatcherOptions } from '../matching/fuzzyMatcher.js';

export function reconcileReferenceSpecs(
    specs: readonly ComponentSpec[],
    options: FuzzyMatcherOptions = {}
): ReviewItem[] {
    const stocked = specs.filter((spec) => spec.sources.includes('inventory'));
    if (stocked.length === 0) return [];

    const matcher = new FuzzyMatcher(
        stocked.map((spec) => ({ identity: spec, usageCount: spec.usageCount })),
        options
    );

    const issues: ReviewItem[] = [];
    for (const spec of specs) {
        if (spec.sources.includes('inventory')) continue;

        const result = matcher.matchIdentity(spec);
        if (result.status !== 'matched') continue;

        issues.push(
            reviewItem(
                STORAGE_ERROR_CODES.POSSIBLE_DUPLICATE,
                `${spec.key} (reference only) looks like ${result.key} in the inventory`,
                { key: spec.key, candidate: result.key, confidence: result.confidence }
            )
        );
    }
    return issues;
}
