/**
 * Unit tests for the fuzzy matcher
 */

import { FuzzyMatcher, type MatchCandidate } from '../fuzzyMatcher.js';

const CANDIDATES: MatchCandidate[] = [
    { identity: { category: 'capacitor', subtype: 'ceramic', value: '100nF' }, usageCount: 52 },
    { identity: { category: 'capacitor', subtype: 'film', value: '100nF' }, usageCount: 27 },
    { identity: { category: 'resistor', subtype: null, value: '10K' }, usageCount: 58 },
    { identity: { category: 'resistor', subtype: null, value: '1K' }, usageCount: 41 },
    { identity: { category: 'diode', subtype: null, value: '1N4148' }, usageCount: 40 },
    { identity: { category: 'diode', subtype: null, value: '1N4001' }, usageCount: 12 },
    { identity: { category: 'transistor', subtype: 'npn', value: '2N5088' }, usageCount: 13 },
];

describe('FuzzyMatcher', () => {
    const matcher = new FuzzyMatcher(CANDIDATES);

    it('uses the dielectric named in the label', () => {
        expect(matcher.match('100nF Ceramic')).toEqual({
            status: 'matched',
            identity: { category: 'capacitor', subtype: 'ceramic', value: '100nF' },
            key: 'capacitor:ceramic:100nF',
            confidence: 1,
            method: 'exact',
        });

        const film = matcher.match('100nF Film');
        expect(film.status === 'matched' && film.key).toBe('capacitor:film:100nF');
    });

    it('breaks ties by usage count by default', () => {
        const result = matcher.match('100nF');
        expect(result.status === 'matched' && result.key).toBe('capacitor:ceramic:100nF');
    });

    it('breaks ties by closeness to the display name under the lexical policy', () => {
        const lexical = new FuzzyMatcher(CANDIDATES, { tieBreak: 'lexical' });
        const result = lexical.match('100nF');
        expect(result.status === 'matched' && result.key).toBe('capacitor:film:100nF');
    });

    it('accepts near misses above the threshold', () => {
        const result = matcher.match('1N4149');
        expect(result.status).toBe('matched');
        if (result.status === 'matched') {
            expect(result.key).toBe('diode::1N4148');
            expect(result.confidence).toBeCloseTo(5 / 6, 4);
            expect(result.method).toBe('fuzzy');
        }
    });

    it('compares values by magnitude, not by spelling', () => {
        const equal = matcher.match('0.1uF Ceramic');
        expect(equal.status === 'matched' && [equal.key, equal.method]).toEqual(['capacitor:ceramic:100nF', 'exact']);

        expect(matcher.match('10nF Ceramic')).toEqual({
            status: 'unmatched',
            reason: 'below-threshold',
            category: 'capacitor',
            bestScore: 0,
            bestKey: 'capacitor:ceramic:100nF',
        });
    });

    it('does not take a value one decade off for the labelled one', () => {
        const lone = new FuzzyMatcher([
            { identity: { category: 'capacitor', subtype: 'electrolytic', value: '47uF' }, usageCount: 9 },
        ]);
        const result = lone.match('4.7uF Electrolytic');
        expect(result.status).toBe('unmatched');
        if (result.status === 'unmatched') {
            expect(result.reason).toBe('below-threshold');
            expect(result.bestScore).toBe(0);
        }
    });

    it('reports the closest candidate when below the threshold', () => {
        const strict = new FuzzyMatcher(CANDIDATES, { threshold: 0.9 });
        const result = strict.match('1N4149');
        expect(result.status).toBe('unmatched');
        if (result.status === 'unmatched') {
            expect(result.reason).toBe('below-threshold');
            expect(result.category).toBe('diode');
            expect(result.bestKey).toBe('diode::1N4148');
            expect(result.bestScore).toBeCloseTo(5 / 6, 4);
        }
    });

    it('keeps the whole category pool when the named subtype has no candidates', () => {
        const result = matcher.match('2N5088 PNP');
        expect(result.status === 'matched' && result.key).toBe('transistor:npn:2N5088');
    });

    it('reports categories without candidates', () => {
        expect(matcher.match('TL072')).toEqual({
            status: 'unmatched',
            reason: 'no-candidates',
            category: 'ic',
            bestScore: 0,
            bestKey: null,
        });
    });

    it('tries every category when the label has no cue', () => {
        const result = matcher.match('random widget');
        expect(result.status).toBe('unmatched');
        if (result.status === 'unmatched') {
            expect(result.reason).toBe('no-category');
            expect(result.category).toBeNull();
        }
    });

    it('refuses a label that matches in more than one category', () => {
        const twoWay = new FuzzyMatcher([
            { identity: { category: 'transistor', subtype: 'npn', value: 'XQ100' }, usageCount: 1 },
            { identity: { category: 'ic', subtype: null, value: 'XQ100' }, usageCount: 1 },
        ]);
        const result = twoWay.match('XQ100');
        expect(result.status).toBe('unmatched');
        if (result.status === 'unmatched') {
            expect(result.reason).toBe('ambiguous-category');
            expect(result.bestScore).toBe(1);
            expect(result.bestKey).toBe('transistor:npn:XQ100');
        }
    });

    it('uses an injected scorer', () => {
        const exactOnly = new FuzzyMatcher(CANDIDATES, { scorer: (a, b) => (a === b ? 1 : 0) });
        const near = exactOnly.match('1N4149');
        expect(near.status).toBe('unmatched');
        const exact = exactOnly.match('1n4148');
        expect(exact.status === 'matched' && exact.key).toBe('diode::1N4148');
    });
});

describe('FuzzyMatcher.matchIdentity', () => {
    const matcher = new FuzzyMatcher(CANDIDATES);

    it('finds a differently spelled identity of the same category', () => {
        const result = matcher.matchIdentity({ category: 'diode', subtype: null, value: '1N4148W' });
        expect(result.status === 'matched' && result.key).toBe('diode::1N4148');
        if (result.status === 'matched') expect(result.confidence).toBeCloseTo(6 / 7, 4);
    });

    it('never matches an identity with itself', () => {
        const single = new FuzzyMatcher([CANDIDATES[4]]);
        expect(single.matchIdentity({ category: 'diode', subtype: null, value: '1N4148' })).toEqual({
            status: 'unmatched',
            reason: 'no-candidates',
            category: 'diode',
            bestScore: 0,
            bestKey: null,
        });
    });

    it('only compares within the same subtype', () => {
        const result = matcher.matchIdentity({ category: 'capacitor', subtype: 'electrolytic', value: '100nF' });
        expect(result.status === 'unmatched' && result.reason).toBe('no-candidates');
    });
});
