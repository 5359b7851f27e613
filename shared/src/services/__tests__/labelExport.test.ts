import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { LocationMap } from '../../types/index.js';
import { buildLabelSheet } from '../../domain/allocation/labels.js';
import { exportLabels, labelsToCsv } from '../labels/labelExport.js';

const MAP: LocationMap = {
    version: 1,
    updatedAt: null,
    assignments: {
        'ic::TL072': [{ unit: 'U2', drawer: 'L1', compartment: null }],
        'resistor::100R': [{ unit: 'U1', drawer: 'S1', compartment: 1 }],
    },
    consumedDrawers: ['U1-S1', 'U2-L1'],
};

const EXPECTED_CSV = ['Unit,Drawer,Compartment,Text,Title', 'U1,S1,1,100R,R: 100R', 'U2,L1,,TL072,IC: TL072'].join('\n');

describe('labelsToCsv', () => {
    it('writes one row per cell with an empty compartment for whole drawers', async () => {
        await expect(labelsToCsv(buildLabelSheet(MAP).cells)).resolves.toBe(EXPECTED_CSV);
    });
});

describe('exportLabels', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'drawermap-labels-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('creates the output directory and writes the CSV', async () => {
        const output = path.join(dir, 'out', 'labels.csv');
        const sheet = await exportLabels(MAP, output);

        expect(sheet.cells).toHaveLength(2);
        expect(await fs.readFile(output, 'utf8')).toBe(`${EXPECTED_CSV}\n`);
    });
});
