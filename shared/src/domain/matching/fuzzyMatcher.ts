/**
 * Fuzzy Matcher
 *
 * Resolves a free-text component label to a canonical identity.
 * Candidates are only compared within the label's category; a label
 * scoring below the threshold is reported as unmatched, never guessed.
 *
 * Values with a magnitude (resistors, pots, capacitors) compare by magnitude:
 * equal scores 1, anything else 0, so 4.7uF never passes for 47uF. The
 * scorer only sees part numbers, colours and values that do not parse.
 *
 * Tie-break between equally scored candidates is a policy:
 * - 'usage'   (default) higher usageCount wins
 * - 'lexical' the candidate whose display name is closer to the raw label wins
 * The identity key decides any remaining tie.
 */

import type { ComponentCategory, ComponentIdentity } from '../../types/index.js';
import {
    COMPONENT_CATEGORIES,
    compareText,
    displayName,
    identityKey,
    numericValue,
} from '../components/identity.js';
import { inferCategory, normalizeForCategory } from './normalize.js';
import { editDistanceRatio, type SimilarityScorer } from './similarity.js';

// ============================================
// TYPES
// ============================================

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export type TieBreakPolicy = 'usage' | 'lexical';

export interface MatchCandidate {
    identity: ComponentIdentity;
    usageCount: number;
}

export interface FuzzyMatcherOptions {
    /** Minimum score accepted (0..1) */
    threshold?: number;
    scorer?: SimilarityScorer;
    tieBreak?: TieBreakPolicy;
}

export type UnmatchedReason =
    | 'no-category'
    | 'no-candidates'
    | 'below-threshold'
    | 'ambiguous-category';

export interface MatchedResult {
    status: 'matched';
    identity: ComponentIdentity;
    key: string;
    confidence: number;
    /** 'exact' when the winning score is 1 */
    method: 'exact' | 'fuzzy';
}

export interface UnmatchedResult {
    status: 'unmatched';
    reason: UnmatchedReason;
    category: ComponentCategory | null;
    /** Best score seen, for manual resolution */
    bestScore: number;
    bestKey: string | null;
}

export type MatchResult = MatchedResult | UnmatchedResult;

interface IndexedCandidate {
    identity: ComponentIdentity;
    key: string;
    usageCount: number;
    /** Lower-case canonical value */
    normalized: string;
    /** Ohms or pF; null for part numbers and colours */
    magnitude: number | null;
    /** Lower-case display name, for lexical tie-breaks */
    display: string;
}

interface ScoredCandidate {
    candidate: IndexedCandidate;
    score: number;
    lexical: number;
}

// ============================================
// MATCHER
// ============================================

export class FuzzyMatcher {
    private readonly byCategory = new Map<ComponentCategory, IndexedCandidate[]>();
    private readonly threshold: number;
    private readonly scorer: SimilarityScorer;
    private readonly tieBreak: TieBreakPolicy;

    constructor(candidates: readonly MatchCandidate[], options: FuzzyMatcherOptions = {}) {
        this.threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
        this.scorer = options.scorer ?? editDistanceRatio;
        this.tieBreak = options.tieBreak ?? 'usage';

        const seen = new Set<string>();
        for (const { identity, usageCount } of candidates) {
            const key = identityKey(identity);
            if (seen.has(key)) continue;
            seen.add(key);

            const list = this.byCategory.get(identity.category) ?? [];
            list.push({
                identity,
                key,
                usageCount,
                normalized: identity.value.toLowerCase(),
                magnitude: numericValue(identity),
                display: displayName(identity).toLowerCase(),
            });
            this.byCategory.set(identity.category, list);
        }

        for (const list of this.byCategory.values()) {
            list.sort((a, b) => compareText(a.key, b.key));
        }
    }

    /**
     * Match a label. When no category cue is present every category is tried
     * on its own, and the result is accepted only if exactly one category
     * produces an acceptable candidate.
     */
    match(label: string): MatchResult {
        const category = inferCategory(label);
        if (category) return this.matchInCategory(category, label);

        const accepted: MatchedResult[] = [];
        let best: UnmatchedResult = {
            status: 'unmatched',
            reason: 'no-category',
            category: null,
            bestScore: 0,
            bestKey: null,
        };

        for (const candidateCategory of COMPONENT_CATEGORIES) {
            if (!this.byCategory.has(candidateCategory)) continue;
            const result = this.matchInCategory(candidateCategory, label);
            if (result.status === 'matched') {
                accepted.push(result);
            } else if (result.bestScore > best.bestScore) {
                best = { ...best, bestScore: result.bestScore, bestKey: result.bestKey };
            }
        }

        if (accepted.length === 1) return accepted[0];
        if (accepted.length > 1) {
            const top = accepted.reduce((a, b) => (b.confidence > a.confidence ? b : a));
            return {
                status: 'unmatched',
                reason: 'ambiguous-category',
                category: null,
                bestScore: top.confidence,
                bestKey: top.key,
            };
        }
        return best;
    }

    /**
     * Match a label against one category's candidates only.
     */
    matchInCategory(category: ComponentCategory, label: string): MatchResult {
        const query = normalizeForCategory(category, label);
        let pool = this.byCategory.get(category) ?? [];

        if (pool.length === 0) {
            return { status: 'unmatched', reason: 'no-candidates', category, bestScore: 0, bestKey: null };
        }

        // A subtype named in the label narrows the pool when it can
        if (query.subtype) {
            const sameSubtype = pool.filter((candidate) => candidate.identity.subtype === query.subtype);
            if (sameSubtype.length > 0) pool = sameSubtype;
        }

        const rawLabel = label.toLowerCase().replace(/\s+/g, ' ').trim();
        const magnitude =
            query.value !== null ? numericValue({ category, subtype: query.subtype, value: query.value }) : null;
        return this.pick(category, pool, query.normalized, magnitude, rawLabel);
    }

    /**
     * Closest other identity of the same category and subtype, for
     * reconciling catalog entries that were recorded under different names.
     */
    matchIdentity(identity: ComponentIdentity): MatchResult {
        const key = identityKey(identity);
        const pool = (this.byCategory.get(identity.category) ?? []).filter(
            (candidate) => candidate.key !== key && candidate.identity.subtype === identity.subtype
        );
        if (pool.length === 0) {
            return { status: 'unmatched', reason: 'no-candidates', category: identity.category, bestScore: 0, bestKey: null };
        }
        return this.pick(
            identity.category,
            pool,
            identity.value.toLowerCase(),
            numericValue(identity),
            displayName(identity).toLowerCase()
        );
    }

    private pick(
        category: ComponentCategory,
        pool: readonly IndexedCandidate[],
        query: string,
        magnitude: number | null,
        rawLabel: string
    ): MatchResult {
        const scored: ScoredCandidate[] = pool.map((candidate) => ({
            candidate,
            score: this.score(query, magnitude, candidate),
            lexical: this.tieBreak === 'lexical' ? this.scorer(rawLabel, candidate.display) : 0,
        }));

        scored.sort((a, b) => this.compareScored(a, b));
        const [top] = scored;

        if (top.score < this.threshold) {
            return {
                status: 'unmatched',
                reason: 'below-threshold',
                category,
                bestScore: top.score,
                bestKey: top.candidate.key,
            };
        }

        return {
            status: 'matched',
            identity: top.candidate.identity,
            key: top.candidate.key,
            confidence: top.score,
            method: top.score === 1 ? 'exact' : 'fuzzy',
        };
    }

    private score(query: string, magnitude: number | null, candidate: IndexedCandidate): number {
        if (magnitude !== null && candidate.magnitude !== null) {
            return sameMagnitude(magnitude, candidate.magnitude) ? 1 : 0;
        }
        return this.scorer(query, candidate.normalized);
    }

    private compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
        if (b.score !== a.score) return b.score - a.score;

        if (this.tieBreak === 'usage') {
            if (b.candidate.usageCount !== a.candidate.usageCount) {
                return b.candidate.usageCount - a.candidate.usageCount;
            }
        } else if (b.lexical !== a.lexical) {
            return b.lexical - a.lexical;
        }

        return compareText(a.candidate.key, b.candidate.key);
    }
}

function sameMagnitude(a: number, b: number): boolean {
    return Math.abs(a - b) <= 1e-9 * Math.max(Math.abs(a), Math.abs(b));
}
