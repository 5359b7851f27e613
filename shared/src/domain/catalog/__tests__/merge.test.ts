/**
 * Unit tests for the catalog merger
 */

import { mergeCatalog, referenceRecordsFromDataset } from '../merge.js';
import { STORAGE_ERROR_CODES, needsReview } from '../../../errors/index.js';

const INVENTORY: unknown[] = [
    { category: 'resistor', value: '10k', quantity: 50 },
    { category: 'resistor', value: '10K', quantity: 25, minQuantity: 10 },
    { category: 'capacitor', subtype: 'Ceramic', value: '0.1uF', quantity: 100 },
    { category: 'capacitor', value: '10uF', quantity: 5 },
    { category: 'resistor', quantity: 3 },
    { category: 'diode', value: '1N4148', quantity: 20 },
    { category: 'ic', value: '1n4148', quantity: 1 },
];

const REFERENCE: unknown[] = [
    { category: 'resistor', value: '10K', usageCount: 58, priority: 'essential' },
    { category: 'capacitor', subtype: 'film', value: '100nF', usageCount: 27 },
    { category: 'capacitor', subtype: 'film', value: '0.1uF', usageCount: 30, priority: 'essential' },
    { category: 'transistor', subtype: 'npn', value: '2N3904', usageCount: 18 },
    { category: 'transistor', subtype: 'pnp', value: '2N3904' },
];

describe('mergeCatalog', () => {
    const result = mergeCatalog(INVENTORY, REFERENCE);

    it('produces one spec per identity, sorted by key', () => {
        expect(result.specs.map((spec) => spec.key)).toEqual([
            'capacitor:ceramic:100nF',
            'capacitor:film:100nF',
            'diode::1N4148',
            'resistor::10K',
            'transistor:npn:2N3904',
        ]);
    });

    it('sums duplicate inventory quantities and takes usage from the reference', () => {
        const resistor = result.specs.find((spec) => spec.key === 'resistor::10K');
        expect(resistor).toEqual({
            category: 'resistor',
            subtype: null,
            value: '10K',
            key: 'resistor::10K',
            usageCount: 58,
            priority: 'essential',
            quantityOnHand: 75,
            minQuantity: 10,
            sources: ['inventory', 'reference'],
        });
    });

    it('gives reference-only identities zero stock and keeps the stronger duplicate figures', () => {
        const film = result.specs.find((spec) => spec.key === 'capacitor:film:100nF');
        expect(film).toMatchObject({ usageCount: 30, priority: 'essential', quantityOnHand: 0, sources: ['reference'] });
    });

    it('gives inventory-only identities default usage and priority', () => {
        const ceramic = result.specs.find((spec) => spec.key === 'capacitor:ceramic:100nF');
        expect(ceramic).toMatchObject({ usageCount: 0, priority: 'optional', quantityOnHand: 100 });
    });

    it('reports every problem record in input order', () => {
        expect(result.issues.map((issue) => [issue.code, issue.context.source, issue.context.index])).toEqual([
            [STORAGE_ERROR_CODES.MERGED_DUPLICATE, 'inventory', 1],
            [STORAGE_ERROR_CODES.MALFORMED_RECORD, 'inventory', 3],
            [STORAGE_ERROR_CODES.MALFORMED_RECORD, 'inventory', 4],
            [STORAGE_ERROR_CODES.AMBIGUOUS_IDENTITY, 'inventory', 6],
            [STORAGE_ERROR_CODES.MERGED_DUPLICATE, 'reference', 2],
            [STORAGE_ERROR_CODES.AMBIGUOUS_IDENTITY, 'reference', 4],
        ]);
    });

    it('names both claimants of a part number', () => {
        const ambiguous = result.issues[3];
        expect(ambiguous.message).toBe('1N4148 is claimed as ic::1N4148 and as diode::1N4148');
        expect(ambiguous.context).toEqual({
            source: 'inventory',
            index: 6,
            key: 'ic::1N4148',
            conflictsWith: 'diode::1N4148',
        });
    });

    it('is empty for empty input', () => {
        expect(mergeCatalog([], [])).toEqual({ specs: [], issues: [] });
    });
});

describe('mergeCatalog - reconciliation', () => {
    const inventory = [
        { category: 'diode', value: '1N4148W', quantity: 12 },
        { category: 'resistor', value: '10K', quantity: 5 },
    ];
    const reference = [
        { category: 'diode', value: '1N4148', usageCount: 40 },
        { category: 'resistor', value: '1K', usageCount: 12 },
    ];

    it('flags a reference-only entry that looks like a stocked part', () => {
        const result = mergeCatalog(inventory, reference);

        expect(result.specs.map((spec) => spec.key)).toEqual([
            'diode::1N4148',
            'diode::1N4148W',
            'resistor::10K',
            'resistor::1K',
        ]);
        expect(result.issues.map((issue) => [issue.code, issue.message])).toEqual([
            [
                STORAGE_ERROR_CODES.POSSIBLE_DUPLICATE,
                'diode::1N4148 (reference only) looks like diode::1N4148W in the inventory',
            ],
        ]);
        expect(result.issues[0].context.candidate).toBe('diode::1N4148W');
        expect(result.issues[0].context.confidence).toBeCloseTo(6 / 7, 4);
        expect(needsReview(result.issues)).toBe(false);
    });

    it('uses the matcher threshold it is given', () => {
        expect(mergeCatalog(inventory, reference, { matching: { threshold: 0.9 } }).issues).toEqual([]);
    });
});

describe('referenceRecordsFromDataset', () => {
    it('attaches the category and keeps the fixed category order', () => {
        const records = referenceRecordsFromDataset({
            led: ['bad'],
            capacitor: [{ value: '1nF', subtype: 'ceramic' }],
            resistor: [{ value: '1K' }],
        });
        expect(records).toEqual([
            { value: '1K', category: 'resistor' },
            { value: '1nF', subtype: 'ceramic', category: 'capacitor' },
            'bad',
        ]);

        const merged = mergeCatalog([], records);
        expect(merged.specs.map((spec) => spec.key)).toEqual(['capacitor:ceramic:1nF', 'resistor::1K']);
        expect(merged.issues).toHaveLength(1);
        expect(merged.issues[0].context).toEqual({ source: 'reference', index: 2 });
    });
});
