/**
 * String similarity scorers (0..1)
 *
 * Both scorers are pure and symmetric. The fuzzy matcher takes either one,
 * or any function with the same signature.
 */

export type SimilarityScorer = (a: string, b: string) => number;

/**
 * Levenshtein distance with a single rolling row.
 */
export function levenshteinDistance(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost,
            );
        }
        previous = current;
    }

    return previous[b.length];
}

/**
 * 1 - distance / longer length. "1n4148" vs "1n4149" = 0.833.
 */
export const editDistanceRatio: SimilarityScorer = (a, b) => {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 1;
    return 1 - levenshteinDistance(a, b) / longest;
};

function tokenize(text: string): string[] {
    return text.split(/\s+/).filter(Boolean);
}

/**
 * Token-set ratio: compares the shared tokens against each side's extra tokens,
 * so word order and repeated words do not matter.
 * "tl072 dual" vs "dual tl072" = 1.
 */
export const tokenSetRatio: SimilarityScorer = (a, b) => {
    const left = new Set(tokenize(a));
    const right = new Set(tokenize(b));
    if (left.size === 0 && right.size === 0) return 1;
    if (left.size === 0 || right.size === 0) return 0;

    const shared = [...left].filter((token) => right.has(token)).sort();
    const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
    const onlyRight = [...right].filter((token) => !left.has(token)).sort();

    const base = shared.join(' ');
    const withLeft = [base, ...onlyLeft].filter(Boolean).join(' ');
    const withRight = [base, ...onlyRight].filter(Boolean).join(' ');

    return Math.max(
        base === '' ? 0 : editDistanceRatio(base, withLeft),
        base === '' ? 0 : editDistanceRatio(base, withRight),
        editDistanceRatio(withLeft, withRight),
    );
};
