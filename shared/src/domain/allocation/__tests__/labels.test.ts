import type { LocationMap } from '../../../types/index.js';
import { STORAGE_ERROR_CODES } from '../../../errors/index.js';
import { buildLabelSheet, drawerTitlePrefix } from '../labels.js';

const MAP: LocationMap = {
    version: 2,
    updatedAt: null,
    assignments: {
        'capacitor:ceramic:100nF': [{ unit: 'U1', drawer: 'S10', compartment: 1 }],
        'ic::TL072': [{ unit: 'U2', drawer: 'L1', compartment: null }],
        'resistor::100R': [{ unit: 'U1', drawer: 'S1', compartment: 1 }],
        'resistor::1K': [{ unit: 'U1', drawer: 'S2', compartment: 1 }],
        'resistor::470R': [{ unit: 'U1', drawer: 'S1', compartment: 2 }],
        'widget::x': [{ unit: 'U1', drawer: 'S3', compartment: 1 }],
    },
    consumedDrawers: ['U1-S1', 'U1-S2', 'U1-S10', 'U2-L1'],
};

describe('drawerTitlePrefix', () => {
    it('abbreviates by category and subtype', () => {
        expect(drawerTitlePrefix({ category: 'resistor', subtype: null, value: '1K' })).toBe('R');
        expect(drawerTitlePrefix({ category: 'capacitor', subtype: 'electrolytic', value: '10uF' })).toBe('Caps Elect');
        expect(drawerTitlePrefix({ category: 'transistor', subtype: 'npn', value: '2N3904' })).toBe('Q NPN');
        expect(drawerTitlePrefix({ category: 'led', subtype: '5mm', value: 'Red' })).toBe('LEDs 5mm');
        expect(drawerTitlePrefix({ category: 'potentiometer', subtype: 'B', value: '100K' })).toBe('Pots');
    });
});

describe('buildLabelSheet', () => {
    const sheet = buildLabelSheet(MAP);

    it('emits one cell per slot in physical order', () => {
        expect(sheet.cells.map((cell) => [cell.unit, cell.drawer, cell.compartment, cell.text])).toEqual([
            ['U1', 'S1', 1, '100R'],
            ['U1', 'S1', 2, '470R'],
            ['U1', 'S2', 1, '1K'],
            ['U1', 'S10', 1, '100nF'],
            ['U2', 'L1', null, 'TL072'],
        ]);
    });

    it('gives every cell of a drawer the same title', () => {
        expect(sheet.cells.map((cell) => cell.title)).toEqual([
            'R: 100R | 470R',
            'R: 100R | 470R',
            'R: 1K',
            'Caps Cer: 100nF',
            'IC: TL072',
        ]);
    });

    it('reports unreadable keys instead of labelling them', () => {
        expect(sheet.issues).toHaveLength(1);
        expect(sheet.issues[0].code).toBe(STORAGE_ERROR_CODES.MALFORMED_RECORD);
        expect(sheet.issues[0].context).toEqual({ key: 'widget::x' });
    });

    it('is empty for an empty map', () => {
        expect(buildLabelSheet({ ...MAP, assignments: {} })).toEqual({ cells: [], issues: [] });
    });
});
