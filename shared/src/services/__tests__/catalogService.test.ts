import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { STORAGE_ERROR_CODES, StorageError } from '../../errors/index.js';
import { loadCatalog, loadReferenceRecords, stockSnapshotFromSpecs } from '../catalog/catalogService.js';
import { FakeGateway, noSleep } from './fakeGateway.js';

describe('loadReferenceRecords', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'drawermap-ref-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('flattens the dataset file', async () => {
        const file = path.join(dir, 'reference.json');
        await fs.writeFile(
            file,
            JSON.stringify({
                diode: [{ value: '1N4148', usageCount: 40 }],
                resistor: [{ value: '10K', priority: 'essential' }],
            })
        );

        await expect(loadReferenceRecords(file)).resolves.toEqual([
            { value: '10K', priority: 'essential', category: 'resistor' },
            { value: '1N4148', usageCount: 40, category: 'diode' },
        ]);
    });

    it('rejects a file that is not a category map', async () => {
        const file = path.join(dir, 'reference.json');
        await fs.writeFile(file, JSON.stringify([{ value: '10K' }]));

        const error = await loadReferenceRecords(file).catch((err: unknown) => err);
        expect(error instanceof StorageError && error.code).toBe(STORAGE_ERROR_CODES.MALFORMED_RECORD);
    });
});

describe('loadCatalog', () => {
    it('merges gateway records with the reference', async () => {
        const gateway = new FakeGateway([
            { category: 'resistor', value: '10k', quantity: 7, minQuantity: 2 },
            { category: 'capacitor', subtype: 'film', value: '100n', quantity: 3 },
        ]);
        gateway.transientFailures = 1;

        const result = await loadCatalog({
            gateway,
            reference: [{ category: 'resistor', value: '10K', usageCount: 58, priority: 'essential' }],
            retry: { sleep: noSleep },
        });

        expect(result.issues).toEqual([]);
        expect(result.specs.map((spec) => [spec.key, spec.quantityOnHand, spec.usageCount])).toEqual([
            ['capacitor:film:100nF', 3, 0],
            ['resistor::10K', 7, 58],
        ]);
        expect(stockSnapshotFromSpecs(result.specs)).toEqual({
            'capacitor:film:100nF': 3,
            'resistor::10K': 7,
        });
    });
});
