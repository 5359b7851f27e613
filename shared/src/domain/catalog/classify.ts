/**
 * Part Classifier
 *
 * Derives identity fields from an inventory part name and its category path,
 * using the same cue and qualifier tables as the fuzzy matcher.
 *
 * @example
 * classifyPart('100nF Ceramic Capacitor')
 * // { ok: true, identity: { category: 'capacitor', subtype: 'ceramic', value: '100nF' } }
 * classifyPart('BC549C', 'Active/Transistors/NPN')
 * // { ok: true, identity: { category: 'transistor', subtype: 'npn', value: 'BC549C' } }
 */

import type { ComponentCategory, ComponentIdentity } from '../../types/index.js';
import { canonicalIdentity } from '../components/identity.js';
import { inferCategory, normalizeForCategory } from '../matching/normalize.js';
import { subtypeHint } from '../matching/rules.js';

export type ClassifyResult =
    | { ok: true; identity: ComponentIdentity }
    | { ok: false; reason: string };

/** Hardware sold alongside components; never stored as a component type */
const ACCESSORY_WORDS = /\b(nuts?|washers?|dust|seals?|knobs?|shafts?|sockets?|bezels?|spacers?)\b/i;

/** Subtype assumed when neither name nor path names one */
const DEFAULT_SUBTYPES: Partial<Record<ComponentCategory, string>> = {
    capacitor: 'ceramic',
};

export function isAccessoryName(name: string): boolean {
    return ACCESSORY_WORDS.test(name);
}

export function classifyPart(name: string, categoryPath = ''): ClassifyResult {
    if (isAccessoryName(name)) {
        return { ok: false, reason: `"${name}" is an accessory, not a component` };
    }

    const category = inferCategory(name, categoryPath);
    if (!category) {
        return { ok: false, reason: `no component category recognised in "${name}"` };
    }

    const label = normalizeForCategory(category, name);
    const subtype =
        label.subtype ?? subtypeHint(category, categoryPath.toLowerCase()) ?? DEFAULT_SUBTYPES[category] ?? null;

    const value = label.value ?? label.normalized;
    if (value === '') {
        return { ok: false, reason: `no ${category} value found in "${name}"` };
    }

    return canonicalIdentity(category, subtype, value);
}
