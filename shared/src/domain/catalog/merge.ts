/**
 * Catalog Loader & Merger
 *
 * Merges live inventory records with the reference dataset into one
 * deduplicated, key-sorted ComponentSpec list.
 *
 * Rules:
 * - quantity and minQuantity come from inventory; usageCount and priority from reference
 * - reference-only entries get quantity 0
 * - inventory duplicates are summed (minQuantity = max) and reported, never silently folded
 * - a part number claimed by two categories (or a transistor by two subtypes) is
 *   AmbiguousIdentity: the first record seen is kept, inventory before reference
 * - records failing validation are MalformedRecord and skipped
 * - reference-only specs that fuzzy-match a stocked spec are reported, not merged
 */

import type { ZodError } from 'zod';
import type { ComponentIdentity, ComponentSpec } from '../../types/index.js';
import { STORAGE_ERROR_CODES, reviewItem, type ReviewItem } from '../../errors/index.js';
import {
    inventoryRecordSchema,
    referenceRecordSchema,
    type ReferenceDataset,
} from '../../schemas/storage.js';
import { COMPONENT_CATEGORIES, PART_NUMBER_CATEGORIES, canonicalIdentity, compareText, identityKey } from '../components/identity.js';
import type { FuzzyMatcherOptions } from '../matching/fuzzyMatcher.js';
import { reconcileReferenceSpecs } from './reconcile.js';

// ============================================
// TYPES
// ============================================

export type RecordSource = 'inventory' | 'reference';

export interface MergeCatalogOptions {
    /** Matcher settings for reconciling reference-only entries */
    matching?: FuzzyMatcherOptions;
}

export interface CatalogMergeResult {
    specs: ComponentSpec[];
    issues: ReviewItem[];
}

interface PartNumberOwner {
    identity: ComponentIdentity;
    key: string;
}

// ============================================
// HELPERS
// ============================================

function describeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Flatten the reference dataset file (category -> entries) into records,
 * in the fixed category order.
 */
export function referenceRecordsFromDataset(dataset: ReferenceDataset): unknown[] {
    const records: unknown[] = [];
    for (const category of COMPONENT_CATEGORIES) {
        for (const entry of dataset[category] ?? []) {
            records.push(typeof entry === 'object' && entry !== null ? { ...entry, category } : entry);
        }
    }
    return records;
}

// ============================================
// MERGE
// ============================================

export function mergeCatalog(
    inventory: readonly unknown[],
    reference: readonly unknown[],
    options: MergeCatalogOptions = {}
): CatalogMergeResult {
    const specs = new Map<string, ComponentSpec>();
    const partNumbers = new Map<string, PartNumberOwner>();
    const issues: ReviewItem[] = [];

    /** Registers a part-number identity; returns the conflicting owner, if any */
    const claimPartNumber = (identity: ComponentIdentity, key: string): PartNumberOwner | null => {
        if (!PART_NUMBER_CATEGORIES.has(identity.category)) return null;

        const owner = partNumbers.get(identity.value);
        if (!owner) {
            partNumbers.set(identity.value, { identity, key });
            return null;
        }
        if (owner.identity.category !== identity.category) return owner;
        if (identity.category === 'transistor' && owner.identity.subtype !== identity.subtype) return owner;
        return null;
    };

    const accept = (
        source: RecordSource,
        index: number,
        category: ComponentIdentity['category'],
        subtype: string | null,
        value: string
    ): { identity: ComponentIdentity; key: string } | null => {
        const canonical = canonicalIdentity(category, subtype, value);
        if (!canonical.ok) {
            issues.push(reviewItem(STORAGE_ERROR_CODES.MALFORMED_RECORD, canonical.reason, { source, index }));
            return null;
        }

        const key = identityKey(canonical.identity);
        const owner = claimPartNumber(canonical.identity, key);
        if (owner) {
            issues.push(
                reviewItem(
                    STORAGE_ERROR_CODES.AMBIGUOUS_IDENTITY,
                    `${canonical.identity.value} is claimed as ${key} and as ${owner.key}`,
                    { source, index, key, conflictsWith: owner.key }
                )
            );
            return null;
        }
        return { identity: canonical.identity, key };
    };

    inventory.forEach((raw, index) => {
        const parsed = inventoryRecordSchema.safeParse(raw);
        if (!parsed.success) {
            issues.push(
                reviewItem(STORAGE_ERROR_CODES.MALFORMED_RECORD, describeIssues(parsed.error), {
                    source: 'inventory',
                    index,
                })
            );
            return;
        }

        const record = parsed.data;
        const accepted = accept('inventory', index, record.category, record.subtype, record.value);
        if (!accepted) return;

        const existing = specs.get(accepted.key);
        if (existing) {
            existing.quantityOnHand += record.quantity;
            existing.minQuantity = Math.max(existing.minQuantity, record.minQuantity);
            issues.push(
                reviewItem(STORAGE_ERROR_CODES.MERGED_DUPLICATE, `Combined duplicate inventory records for ${accepted.key}`, {
                    source: 'inventory',
                    index,
                    key: accepted.key,
                })
            );
            return;
        }

        specs.set(accepted.key, {
            ...accepted.identity,
            key: accepted.key,
            usageCount: 0,
            priority: 'optional',
            quantityOnHand: record.quantity,
            minQuantity: record.minQuantity,
            sources: ['inventory'],
        });
    });

    reference.forEach((raw, index) => {
        const parsed = referenceRecordSchema.safeParse(raw);
        if (!parsed.success) {
            issues.push(
                reviewItem(STORAGE_ERROR_CODES.MALFORMED_RECORD, describeIssues(parsed.error), {
                    source: 'reference',
                    index,
                })
            );
            return;
        }

        const record = parsed.data;
        const accepted = accept('reference', index, record.category, record.subtype, record.value);
        if (!accepted) return;

        const existing = specs.get(accepted.key);
        if (!existing) {
            specs.set(accepted.key, {
                ...accepted.identity,
                key: accepted.key,
                usageCount: record.usageCount,
                priority: record.priority,
                quantityOnHand: 0,
                minQuantity: 0,
                sources: ['reference'],
            });
            return;
        }

        if (existing.sources.includes('reference')) {
            // Two reference entries for one identity: keep the stronger figures
            existing.usageCount = Math.max(existing.usageCount, record.usageCount);
            if (record.priority === 'essential') existing.priority = 'essential';
            issues.push(
                reviewItem(STORAGE_ERROR_CODES.MERGED_DUPLICATE, `Combined duplicate reference entries for ${accepted.key}`, {
                    source: 'reference',
                    index,
                    key: accepted.key,
                })
            );
            return;
        }

        existing.usageCount = record.usageCount;
        existing.priority = record.priority;
        existing.sources.push('reference');
    });

    const sorted = [...specs.values()].sort((a, b) => compareText(a.key, b.key));
    issues.push(...reconcileReferenceSpecs(sorted, options.matching));
    return { specs: sorted, issues };
}
