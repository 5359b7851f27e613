/**
 * Missing location push
 *
 * Inventory parts named differently from their mapped identity never get a
 * default location from pushDefaultLocations. This pass lists the parts that
 * still have none and resolves each one against the location map:
 * - a name that classifies to a mapped identity is an exact match
 * - otherwise the fuzzy matcher, over the mapped identities, decides
 * - accessories (knobs, nuts, washers) are skipped
 *
 * Unresolved parts are reported, never guessed.
 */

import type { ComponentIdentity, LocationMap, StorageSlot } from '../../types/index.js';
import { STORAGE_ERROR_CODES, reviewItem, type ReviewItem } from '../../errors/index.js';
import { compareText, identityKey, parseIdentityKey, slotLabel } from '../../domain/components/identity.js';
import { classifyPart, isAccessoryName } from '../../domain/catalog/classify.js';
import { FuzzyMatcher, type FuzzyMatcherOptions, type MatchResult } from '../../domain/matching/fuzzyMatcher.js';
import { inferCategory } from '../../domain/matching/normalize.js';
import { inventoryLogger as log } from '../../utils/logger.js';
import type { InventoryGateway, InventoryPart } from '../inventory/gateway.js';
import { withRetry, type RetryPolicy } from '../inventory/retry.js';

export interface PushMissingOptions {
    gateway: InventoryGateway;
    map: LocationMap;
    matching?: FuzzyMatcherOptions;
    /** Resolve and report without writing */
    dryRun?: boolean;
    retry?: Partial<RetryPolicy>;
}

export interface MissingLocationMatch {
    partId: number;
    part: string;
    key: string;
    location: string;
    method: 'exact' | 'fuzzy';
    confidence: number;
}

export interface MissingLocationsReport {
    matched: MissingLocationMatch[];
    /** Part names with no mapped identity */
    unmatched: string[];
    /** Accessories */
    skipped: string[];
    /** Parts whose default location was written */
    updated: number;
    issues: ReviewItem[];
}

function resolvePart(part: InventoryPart, mapped: ReadonlyMap<string, StorageSlot>, matcher: FuzzyMatcher): MatchResult {
    const classified = classifyPart(part.name, part.categoryPath);
    if (classified.ok) {
        const key = identityKey(classified.identity);
        if (mapped.has(key)) {
            return { status: 'matched', identity: classified.identity, key, confidence: 1, method: 'exact' };
        }
    }

    const category = inferCategory(part.name, part.categoryPath);
    return category ? matcher.matchInCategory(category, part.name) : matcher.match(part.name);
}

export async function pushMissingLocations(options: PushMissingOptions): Promise<MissingLocationsReport> {
    const { gateway, map } = options;
    const report: MissingLocationsReport = { matched: [], unmatched: [], skipped: [], updated: 0, issues: [] };

    // Canonical key -> primary slot
    const mapped = new Map<string, StorageSlot>();
    const identities: ComponentIdentity[] = [];
    for (const [key, slots] of Object.entries(map.assignments)) {
        const identity = parseIdentityKey(key);
        if (!identity || slots.length === 0) continue;
        identities.push(identity);
        mapped.set(identityKey(identity), slots[0]);
    }
    const matcher = new FuzzyMatcher(
        identities.map((identity) => ({ identity, usageCount: 0 })),
        options.matching
    );

    const parts = await withRetry(() => gateway.listPartsWithoutLocation(), 'listPartsWithoutLocation', options.retry);
    const ordered = [...parts].sort((a, b) => compareText(a.name, b.name) || a.id - b.id);

    for (const part of ordered) {
        if (isAccessoryName(part.name)) {
            report.skipped.push(part.name);
            continue;
        }

        const result = resolvePart(part, mapped, matcher);
        if (result.status === 'unmatched') {
            report.unmatched.push(part.name);
            report.issues.push(
                reviewItem(
                    STORAGE_ERROR_CODES.UNMATCHED_COMPONENT,
                    `No mapped component matches inventory part "${part.name}"`,
                    { partId: part.id, reason: result.reason, bestKey: result.bestKey, bestScore: result.bestScore }
                )
            );
            continue;
        }

        const slot = mapped.get(result.key);
        if (!slot) continue;
        const location = slotLabel(slot);
        report.matched.push({
            partId: part.id,
            part: part.name,
            key: result.key,
            location,
            method: result.method,
            confidence: result.confidence,
        });

        if (options.dryRun) continue;
        await withRetry(() => gateway.setPartLocation(part.id, slot), `setPartLocation(${part.id})`, options.retry);
        report.updated++;
        log.debug({ part: part.name, key: result.key, location, method: result.method }, 'Default location set');
    }

    log.info(
        { parts: parts.length, matched: report.matched.length, unmatched: report.unmatched.length, dryRun: !!options.dryRun },
        'Missing locations resolved'
    );
    return report;
}
