/**
 * Naming Rule Tables
 *
 * Declarative per-category tables used to read free-text component names:
 * - QUALIFIER_RULES: words stripped before comparing values (also used for label text)
 * - CATEGORY_CUES: keywords and patterns that identify a category
 * - SUBTYPE_HINTS: words that pin down a subtype within a category
 *
 * Order inside each table matters: longer phrases come first so
 * "dual op-amp" is removed before "op-amp".
 */

import type { ComponentCategory } from '../../types/index.js';

// ============================================
// QUALIFIER STRIPPING
// ============================================

export interface QualifierRule {
    /** Whole words or phrases, matched case-insensitively */
    words: readonly string[];
    /** Extra patterns (ratings, tolerances); no capturing groups */
    patterns?: readonly RegExp[];
}

export const QUALIFIER_RULES: Record<ComponentCategory, QualifierRule> = {
    resistor: {
        words: ['metal film', 'carbon film', 'resistors', 'resistor', 'res', 'ohms', 'ohm'],
        patterns: [/\b\d+\/\d+\s*w\b/gi, /\b\d+(?:\.\d+)?\s*%/gi, /\b0?\.\d+\s*w\b/gi],
    },
    capacitor: {
        words: [
            'multilayer ceramic', 'ceramic', 'electrolytic', 'polyester', 'capacitors', 'capacitor',
            'film', 'elec', 'mlcc', 'box', 'radial', 'axial', 'cap', 'caps',
        ],
        patterns: [/\b\d+(?:\.\d+)?\s*v\b/gi],
    },
    diode: {
        words: [
            'switching diode', 'signal diode', 'zener diode', 'diodes', 'diode', 'silicon', 'germanium',
            'schottky', 'zener', 'rectifier', 'switching', 'signal',
        ],
    },
    transistor: {
        words: ['n-channel', 'p-channel', 'transistors', 'transistor', 'npn', 'pnp', 'jfet', 'mosfet', 'bjt'],
    },
    ic: {
        words: [
            'single op-amp', 'dual op-amp', 'quad op-amp', 'charge pump', 'audio amp', 'hex inverter',
            'op-amp', 'opamp', 'regulator', 'eeprom', 'delay', 'dsp', 'chip', 'ic',
        ],
    },
    potentiometer: {
        words: [
            'potentiometers', 'potentiometer', 'trimpot', 'trimmer', 'audio', 'linear', 'log',
            'pots', 'pot', 'trim',
        ],
        patterns: [/\b\d+\s*mm\b/gi],
    },
    led: {
        words: ['leds', 'led', 'diffused', 'clear', 'water clear'],
        patterns: [/\b\d+(?:\.\d+)?\s*mm\b/gi],
    },
};

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Word-boundary pattern that treats "-" inside a phrase as part of the word */
function wordPattern(word: string): RegExp {
    return new RegExp(`(^|[^a-z0-9-])${escapeRegExp(word)}(?=$|[^a-z0-9-])`, 'gi');
}

const compiledQualifiers = new Map<ComponentCategory, RegExp[]>();

function qualifierPatterns(category: ComponentCategory): RegExp[] {
    let patterns = compiledQualifiers.get(category);
    if (!patterns) {
        const rule = QUALIFIER_RULES[category];
        patterns = [...rule.words.map(wordPattern), ...(rule.patterns ?? [])];
        compiledQualifiers.set(category, patterns);
    }
    return patterns;
}

/**
 * Remove the category's qualifier words from a label.
 *
 * @example
 * stripQualifiers('transistor', 'BC549C NPN') // 'BC549C'
 * stripQualifiers('ic', 'TL072 Dual Op-Amp')  // 'TL072'
 */
export function stripQualifiers(category: ComponentCategory, text: string): string {
    let result = text;
    for (const pattern of qualifierPatterns(category)) {
        result = result.replace(pattern, (_match: string, lead?: string) =>
            typeof lead === 'string' ? `${lead} ` : ' '
        );
    }
    return result.replace(/\s+/g, ' ').trim();
}

// ============================================
// CATEGORY CUES
// ============================================

export interface CategoryCue {
    category: ComponentCategory;
    pattern: RegExp;
}

/** Explicit nouns - checked first */
export const STRONG_CATEGORY_CUES: readonly CategoryCue[] = [
    { category: 'led', pattern: /\bleds?\b/i },
    { category: 'potentiometer', pattern: /\b(pots?|potentiometers?|trimpots?|trimmers?)\b/i },
    { category: 'resistor', pattern: /\b(resistors?|ohms?)\b|Ω/i },
    { category: 'capacitor', pattern: /\b(capacitors?|caps?)\b/i },
    { category: 'diode', pattern: /\b(diodes?|zener|schottky|rectifier)\b/i },
    { category: 'transistor', pattern: /\b(transistors?|npn|pnp|jfet|mosfet|bjt)\b/i },
    { category: 'ic', pattern: /\b(ic|op-?amps?|regulator|eeprom|dsp)\b/i },
];

/** Dielectric words, unit suffixes and part-number prefixes */
export const WEAK_CATEGORY_CUES: readonly CategoryCue[] = [
    { category: 'capacitor', pattern: /\b(ceramic|electrolytic|polyester|mlcc|elec|film)\b/i },
    { category: 'capacitor', pattern: /\d\s*[pnuµμ]\d*\s*f\b/i },
    { category: 'potentiometer', pattern: /^\s*[abcw]\s?\d+(\.\d+)?\s*[km]?\d*\s*$/i },
    { category: 'diode', pattern: /\b(1n\d{3,4}|bat\d{2}|ba\d{3}|1s\d{3,4}|d9e|oa\d{2,3})\w*\b/i },
    {
        category: 'transistor',
        pattern: /\b(2n\d{3,4}|bc\d{3}|bs\d{3}|j\d{3}|mpf\d{3}|2sk\d+|2sc\d+|2sa\d+|irf\w+|ac\d{3})\w*\b/i,
    },
    {
        category: 'ic',
        pattern: /\b(tl0\d{2}|ne\d{4}|lm\d{3,4}|jrc\d+|njm\d+|rc\d{4}|opa\d+|cd4\d{3}|pt2399|ca3080|78l?\d+|tc1044|max\d+|fv-1|lt\d{4})\w*\b/i,
    },
    { category: 'resistor', pattern: /^\s*\d+(\.\d+)?\s*[rkm]\d*\b/i },
];

// ============================================
// SUBTYPE HINTS
// ============================================

export interface SubtypeHint {
    pattern: RegExp;
    subtype: string;
}

export const SUBTYPE_HINTS: Partial<Record<ComponentCategory, readonly SubtypeHint[]>> = {
    capacitor: [
        { pattern: /\b(ceramic|mlcc)\b/i, subtype: 'ceramic' },
        { pattern: /\b(film|polyester|box)\b/i, subtype: 'film' },
        { pattern: /\b(electrolytic|elec)\b/i, subtype: 'electrolytic' },
    ],
    transistor: [
        { pattern: /\bnpn\b/i, subtype: 'npn' },
        { pattern: /\bpnp\b/i, subtype: 'pnp' },
        { pattern: /\bjfet\b/i, subtype: 'jfet' },
        { pattern: /\bmosfet\b/i, subtype: 'mosfet' },
    ],
    potentiometer: [
        { pattern: /\b(trim|trimpot|trimmer)\b/i, subtype: 'trim' },
        { pattern: /^\s*a\s?\d/i, subtype: 'A' },
        { pattern: /^\s*b\s?\d/i, subtype: 'B' },
        { pattern: /^\s*c\s?\d/i, subtype: 'C' },
        { pattern: /^\s*w\s?\d/i, subtype: 'W' },
    ],
};

const LED_SIZE_PATTERN = /\b(\d+(?:\.\d+)?)\s*mm\b/i;

/**
 * Subtype named in a label, if any.
 * LED sizes are read from the text ("5mm"); other categories use SUBTYPE_HINTS.
 */
export function subtypeHint(category: ComponentCategory, text: string): string | null {
    if (category === 'led') {
        const match = LED_SIZE_PATTERN.exec(text);
        return match ? `${Number(match[1])}mm` : null;
    }
    for (const hint of SUBTYPE_HINTS[category] ?? []) {
        if (hint.pattern.test(text)) return hint.subtype;
    }
    return null;
}
