import type { ComponentSpec, LocationMap } from '../../types/index.js';
import { STORAGE_ERROR_CODES } from '../../errors/index.js';
import { matchCandidates, runPicking } from '../picking/pickingService.js';

function spec(category: ComponentSpec['category'], value: string, usageCount: number): ComponentSpec {
    return {
        category,
        subtype: null,
        value,
        key: `${category}::${value}`,
        usageCount,
        priority: 'optional',
        quantityOnHand: 0,
        minQuantity: 0,
        sources: ['reference'],
    };
}

const MAP: LocationMap = {
    version: 1,
    updatedAt: null,
    assignments: { 'resistor::10K': [{ unit: 'U1', drawer: 'S2', compartment: 1 }] },
    consumedDrawers: ['U1-S2'],
};

describe('matchCandidates', () => {
    it('adds unknown mapped keys after the catalog specs', () => {
        expect(
            matchCandidates([spec('resistor', '10K', 58)], ['resistor::10K', 'not-a-key', 'ic::NE555'])
        ).toEqual([
            { identity: { category: 'resistor', subtype: null, value: '10K' }, usageCount: 58 },
            { identity: { category: 'ic', subtype: null, value: 'NE555' }, usageCount: 0 },
        ]);
    });
});

describe('runPicking', () => {
    it('renders the sheet and flags lines needing attention', () => {
        const result = runPicking({
            bom: [
                { reference: 'R1', name: '10K', quantity: 2 },
                { reference: null, name: 'Mystery Gizmo', quantity: 1 },
            ],
            map: MAP,
            stock: { 'resistor::10K': 5 },
            title: 'fuzz',
        });

        expect(result.sheet.summary.uniqueLocations).toBe(1);
        expect(result.sheet.summary.fullyInStock).toBe(1);
        expect(result.sheet.entries[0].location).toBe('U1-S2-1');
        expect(result.sheet.attention.map((item) => item.code)).toEqual([STORAGE_ERROR_CODES.UNMATCHED_COMPONENT]);
        expect(result.needsReview).toBe(true);
        expect(result.report.split('\n')[0]).toBe('PICKING SHEET: fuzz');
    });

    it('needs no review when every line is located', () => {
        const result = runPicking({
            bom: [{ reference: 'R1', name: 'resistor::10K', quantity: 1 }],
            map: MAP,
            stock: { 'resistor::10K': 5 },
        });

        expect(result.needsReview).toBe(false);
        expect(result.report.split('\n')[0]).toBe('PICKING SHEET: BOM');
    });
});
