/**
 * Label Normalization
 *
 * Turns a free-text component label into comparison text:
 * case-fold, strip category qualifiers, canonical unit notation,
 * collapsed whitespace. Category is inferred from keyword cues first.
 */

import type { ComponentCategory } from '../../types/index.js';
import { canonicalValue } from '../components/identity.js';
import {
    STRONG_CATEGORY_CUES,
    WEAK_CATEGORY_CUES,
    stripQualifiers,
    subtypeHint,
} from './rules.js';

// ============================================
// TYPES
// ============================================

export interface NormalizedLabel {
    category: ComponentCategory;
    /** Subtype named in the label ("ceramic", "npn", "5mm"), if any */
    subtype: string | null;
    /** Canonical value when the remaining text reads as one ("100nF") */
    value: string | null;
    /** Lower-case comparison text */
    normalized: string;
}

export interface LabelAnalysis {
    raw: string;
    /** null when no cue identified a category */
    category: ComponentCategory | null;
    normalized: NormalizedLabel | null;
}

// ============================================
// CATEGORY INFERENCE
// ============================================

function foldCase(label: string): string {
    return label
        .toLowerCase()
        .replace(/[µμ]/g, 'u')
        .replace(/Ω/g, ' ohm ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Infer a category from keyword cues. Explicit nouns ("capacitor", "LED")
 * win over weak cues (dielectric words, unit suffixes, part-number prefixes).
 *
 * @param context - extra text searched after the label, e.g. an inventory category path
 */
export function inferCategory(label: string, context = ''): ComponentCategory | null {
    const texts = [label, context].filter((text) => text.trim() !== '');
    for (const cues of [STRONG_CATEGORY_CUES, WEAK_CATEGORY_CUES]) {
        for (const text of texts) {
            const cue = cues.find((candidate) => candidate.pattern.test(text));
            if (cue) return cue.category;
        }
    }
    return null;
}

// ============================================
// NORMALIZATION
// ============================================

/**
 * Normalize a label as a member of the given category.
 *
 * @example
 * normalizeForCategory('capacitor', '0.1uF Ceramic Cap')
 * // { category: 'capacitor', subtype: 'ceramic', value: '100nF', normalized: '100nf' }
 */
export function normalizeForCategory(category: ComponentCategory, label: string): NormalizedLabel {
    const folded = foldCase(label);
    const subtype = subtypeHint(category, folded);

    let stripped = stripQualifiers(category, folded);
    if (category === 'potentiometer') {
        // Taper letter prefix: "a100k" -> "100k"
        stripped = stripped.replace(/^[abcw]\s?(?=\d)/, '');
    }

    const value = stripped === '' ? null : canonicalValue(category, stripped);
    return {
        category,
        subtype,
        value,
        normalized: value !== null ? value.toLowerCase() : stripped,
    };
}

/**
 * Infer the category and normalize in one step.
 */
export function analyzeLabel(label: string, context = ''): LabelAnalysis {
    const category = inferCategory(label, context);
    return {
        raw: label,
        category,
        normalized: category ? normalizeForCategory(category, label) : null,
    };
}
