/**
 * Unit tests for qualifier stripping, category inference and label normalization
 */

import { stripQualifiers, subtypeHint } from '../rules.js';
import { analyzeLabel, inferCategory, normalizeForCategory } from '../normalize.js';
import { editDistanceRatio, levenshteinDistance, tokenSetRatio } from '../similarity.js';

describe('stripQualifiers', () => {
    it('removes category words but keeps the value', () => {
        expect(stripQualifiers('transistor', 'BC549C NPN')).toBe('BC549C');
        expect(stripQualifiers('ic', 'TL072 Dual Op-Amp')).toBe('TL072');
        expect(stripQualifiers('resistor', '4.7k metal film 1/4w')).toBe('4.7k');
    });

    it('leaves a bare value untouched', () => {
        expect(stripQualifiers('capacitor', '100nF')).toBe('100nF');
    });
});

describe('subtypeHint', () => {
    it('reads dielectric, polarity, taper and LED size', () => {
        expect(subtypeHint('capacitor', '100nf film')).toBe('film');
        expect(subtypeHint('transistor', '2n3904 npn')).toBe('npn');
        expect(subtypeHint('potentiometer', 'b100k')).toBe('B');
        expect(subtypeHint('potentiometer', '10k trimmer')).toBe('trim');
        expect(subtypeHint('led', '5 mm red')).toBe('5mm');
    });

    it('returns null when the label names no subtype', () => {
        expect(subtypeHint('capacitor', '100nf')).toBeNull();
        expect(subtypeHint('resistor', '10k')).toBeNull();
    });
});

describe('inferCategory', () => {
    it('uses explicit nouns', () => {
        expect(inferCategory('B100K Pot')).toBe('potentiometer');
        expect(inferCategory('3mm Red LED')).toBe('led');
        expect(inferCategory('4.7K Resistor')).toBe('resistor');
    });

    it('falls back to dielectric words, units and part-number prefixes', () => {
        expect(inferCategory('100nF Ceramic')).toBe('capacitor');
        expect(inferCategory('10uF')).toBe('capacitor');
        expect(inferCategory('10k')).toBe('resistor');
        expect(inferCategory('2N5088')).toBe('transistor');
        expect(inferCategory('1N4148')).toBe('diode');
        expect(inferCategory('TL072')).toBe('ic');
    });

    it('searches the context after the label', () => {
        expect(inferCategory('1K', 'Electronics/Passives/Resistors')).toBe('resistor');
    });

    it('returns null without any cue', () => {
        expect(inferCategory('random widget')).toBeNull();
    });
});

describe('normalizeForCategory', () => {
    it('canonicalizes capacitor notation', () => {
        expect(normalizeForCategory('capacitor', '0.1uF Ceramic Cap')).toEqual({
            category: 'capacitor',
            subtype: 'ceramic',
            value: '100nF',
            normalized: '100nf',
        });
    });

    it('strips the taper prefix from pots', () => {
        expect(normalizeForCategory('potentiometer', 'B100K Pot')).toEqual({
            category: 'potentiometer',
            subtype: 'B',
            value: '100K',
            normalized: '100k',
        });
    });

    it('drops ratings from resistors', () => {
        expect(normalizeForCategory('resistor', '4.7K Resistor 1/4W').value).toBe('4.7K');
    });

    it('keeps the stripped text when no value can be read', () => {
        expect(normalizeForCategory('capacitor', 'mystery')).toEqual({
            category: 'capacitor',
            subtype: null,
            value: null,
            normalized: 'mystery',
        });
    });
});

describe('analyzeLabel', () => {
    it('returns no normalization without a category', () => {
        expect(analyzeLabel('random widget')).toEqual({ raw: 'random widget', category: null, normalized: null });
    });

    it('normalizes part numbers', () => {
        expect(analyzeLabel('TL072 Dual Op-Amp').normalized?.value).toBe('TL072');
    });
});

describe('similarity scorers', () => {
    it('computes edit distances', () => {
        expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
        expect(levenshteinDistance('', 'abc')).toBe(3);
        expect(editDistanceRatio('1n4148', '1n4149')).toBeCloseTo(0.8333, 4);
        expect(editDistanceRatio('', '')).toBe(1);
    });

    it('ignores token order in the token-set ratio', () => {
        expect(tokenSetRatio('tl072 dual', 'dual tl072')).toBe(1);
        expect(tokenSetRatio('a b', 'a c')).toBeCloseTo(2 / 3, 4);
        expect(tokenSetRatio('', 'x')).toBe(0);
    });
});
