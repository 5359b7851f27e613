/**
 * Default location push and stock moves against the in-memory gateway
 */

import type { LocationMap } from '../../types/index.js';
import { STORAGE_ERROR_CODES } from '../../errors/index.js';
import { pushDefaultLocations } from '../locations/locationPush.js';
import { moveStockToLocations } from '../stock/stockMover.js';
import { FakeGateway } from './fakeGateway.js';

const MAP: LocationMap = {
    version: 4,
    updatedAt: '2026-03-01T12:00:00.000Z',
    assignments: {
        'diode::1N4148': [{ unit: 'U1', drawer: 'S31', compartment: 1 }],
        'ic::TL072': [{ unit: 'U2', drawer: 'M1', compartment: 2 }],
        'resistor::10K': [
            { unit: 'U1', drawer: 'S3', compartment: 1 },
            { unit: 'U1', drawer: 'S9', compartment: 4 },
        ],
    },
    consumedDrawers: ['U1-S3', 'U1-S9', 'U1-S31', 'U2-M1'],
};

describe('pushDefaultLocations', () => {
    it('sets every mapped identity to its primary slot', async () => {
        const gateway = new FakeGateway([], new Set(['ic::TL072']));
        const report = await pushDefaultLocations({ gateway, map: MAP });

        expect(report.updated).toEqual([
            { key: 'diode::1N4148', location: 'U1-S31-1' },
            { key: 'resistor::10K', location: 'U1-S3-1' },
        ]);
        expect(report.notFound).toEqual(['ic::TL072']);
        expect(report.issues.map((issue) => issue.code)).toEqual([STORAGE_ERROR_CODES.UNMATCHED_COMPONENT]);
        expect(Object.fromEntries(gateway.defaults)).toEqual({
            'diode::1N4148': 'U1-S31-1',
            'resistor::10K': 'U1-S3-1',
        });
    });

    it('limits the push to the given keys and reports unknown ones', async () => {
        const gateway = new FakeGateway([]);
        const report = await pushDefaultLocations({ gateway, map: MAP, keys: ['resistor::10K', 'resistor::1M'] });

        expect(report.updated).toEqual([{ key: 'resistor::10K', location: 'U1-S3-1' }]);
        expect(report.issues).toEqual([
            {
                code: STORAGE_ERROR_CODES.UNRESOLVED_LOCATION,
                message: 'resistor::1M has no usable location entry',
                context: { key: 'resistor::1M' },
            },
        ]);
    });
});

describe('moveStockToLocations', () => {
    const stock = { 'resistor::10K': 25, 'diode::1N4148': 0 };

    it('plans a move for every mapped identity with stock', async () => {
        const gateway = new FakeGateway([]);
        const report = await moveStockToLocations({ gateway, map: MAP, stock, dryRun: true });

        expect(report.planned).toEqual([{ key: 'resistor::10K', location: 'U1-S3-1', quantity: 25 }]);
        expect(report.skipped).toEqual(['diode::1N4148', 'ic::TL072']);
        expect(report.moved).toBe(0);
        expect(gateway.moves).toEqual([]);
    });

    it('moves the stock when not a dry run', async () => {
        const gateway = new FakeGateway([]);
        const report = await moveStockToLocations({ gateway, map: MAP, stock });

        expect(gateway.moves).toEqual([{ key: 'resistor::10K', location: 'U1-S3-1', quantity: 25 }]);
        expect(report.moved).toBe(25);
        expect(report.alreadyInPlace).toBe(0);
    });
});
