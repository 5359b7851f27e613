/**
 * Component Value Codec
 *
 * Parses and formats resistance and capacitance notation so that
 * "4.7k", "4K7" and "4700 ohm" all become "4.7K", and "0.1uF" becomes "100nF".
 * Pure functions, no I/O.
 */

// ============================================
// NUMBER FORMATTING
// ============================================

/** Rounds away binary noise (4.7 * 1000 = 4700.000000000001) */
export function roundValue(value: number): number {
    return Number(value.toPrecision(12));
}

/** Shortest decimal form: 4.70 -> "4.7", 100 -> "100" */
function formatNumber(value: number): string {
    return String(Number(value.toPrecision(6)));
}

// ============================================
// RESISTANCE
// ============================================

const RESISTANCE_MULTIPLIERS: Record<string, number> = {
    r: 1,
    k: 1_000,
    m: 1_000_000,
};

/**
 * Matches "4.7k", "4k7", "100r", "1M", "470", "2.2 k", "0R47".
 * Group 1: integer/decimal part, 2: multiplier letter, 3: RKM fraction digits.
 */
const RESISTANCE_PATTERN = /^(\d+(?:\.\d+)?)\s*([rkm])?(\d+)?$/i;

/**
 * Parse a resistance into ohms.
 * Accepts ohm words and the Ω sign: "100 ohm", "10kΩ".
 *
 * @returns ohms, or null when the text is not a resistance
 */
export function parseResistance(text: string): number | null {
    const cleaned = text
        .trim()
        .replace(/\s*(ohms?|Ω)$/i, '')
        .replace(/\s+/g, '');

    const match = RESISTANCE_PATTERN.exec(cleaned);
    if (!match) return null;

    const [, whole, letter, fraction] = match;
    // RKM notation ("4K7") needs a letter and no decimal point in the whole part
    if (fraction !== undefined && (letter === undefined || whole.includes('.'))) return null;

    const multiplier = RESISTANCE_MULTIPLIERS[(letter ?? 'r').toLowerCase()];
    const base = fraction !== undefined ? Number(`${whole}.${fraction}`) : Number(whole);
    const ohms = roundValue(base * multiplier);
    return ohms > 0 ? ohms : null;
}

/**
 * Format ohms in label notation: 100 -> "100R", 4700 -> "4.7K", 1e6 -> "1M".
 */
export function formatResistance(ohms: number): string {
    if (ohms < 1_000) return `${formatNumber(ohms)}R`;
    if (ohms < 1_000_000) return `${formatNumber(ohms / 1_000)}K`;
    return `${formatNumber(ohms / 1_000_000)}M`;
}

// ============================================
// CAPACITANCE
// ============================================

const CAPACITANCE_MULTIPLIERS: Record<string, number> = {
    p: 1,
    n: 1_000,
    u: 1_000_000,
};

/** "100nF", "0.1uF", "22p", "4.7 µF", "1n5" */
const CAPACITANCE_PATTERN = /^(\d+(?:\.\d+)?)\s*([pnu])(\d+)?f?$/i;

/**
 * Parse a capacitance into picofarads.
 *
 * @returns pF, or null when the text is not a capacitance
 */
export function parseCapacitance(text: string): number | null {
    const cleaned = text
        .trim()
        .replace(/[µμ]/g, 'u')
        .replace(/\s+/g, '');

    const match = CAPACITANCE_PATTERN.exec(cleaned);
    if (!match) return null;

    const [, whole, letter, fraction] = match;
    if (fraction !== undefined && whole.includes('.')) return null;

    const base = fraction !== undefined ? Number(`${whole}.${fraction}`) : Number(whole);
    const picofarads = roundValue(base * CAPACITANCE_MULTIPLIERS[letter.toLowerCase()]);
    return picofarads > 0 ? picofarads : null;
}

/**
 * Format pF in label notation: 22 -> "22pF", 100000 -> "100nF", 4.7e6 -> "4.7uF".
 */
export function formatCapacitance(picofarads: number): string {
    if (picofarads < 1_000) return `${formatNumber(picofarads)}pF`;
    if (picofarads < 1_000_000) return `${formatNumber(picofarads / 1_000)}nF`;
    return `${formatNumber(picofarads / 1_000_000)}uF`;
}

// ============================================
// PART NUMBERS & COLOURS
// ============================================

/** "  tl072 " -> "TL072"; inner whitespace collapses to one space */
export function normalizePartNumber(text: string): string {
    return text.trim().replace(/\s+/g, ' ').toUpperCase();
}

/** "warm  WHITE" -> "Warm White" */
export function normalizeColour(text: string): string {
    return text
        .trim()
        .toLowerCase()
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => word[0].toUpperCase() + word.slice(1))
        .join(' ');
}

/** "5 mm" / "5MM" -> "5mm"; returns null when not a size */
export function normalizeLedSize(text: string): string | null {
    const match = /^(\d+(?:\.\d+)?)\s*mm$/i.exec(text.trim());
    return match ? `${formatNumber(Number(match[1]))}mm` : null;
}
