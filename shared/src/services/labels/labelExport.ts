/**
 * Label CSV export
 *
 * Columns: Unit, Drawer, Compartment, Text, Title. One row per occupied slot.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { writeToString } from 'fast-csv';
import type { LocationMap } from '../../types/index.js';
import { buildLabelSheet, type LabelCell, type LabelSheet } from '../../domain/allocation/labels.js';

export const LABEL_CSV_HEADERS = ['Unit', 'Drawer', 'Compartment', 'Text', 'Title'] as const;

type LabelRow = Record<(typeof LABEL_CSV_HEADERS)[number], string>;

function toRow(cell: LabelCell): LabelRow {
    return {
        Unit: cell.unit,
        Drawer: cell.drawer,
        Compartment: cell.compartment === null ? '' : String(cell.compartment),
        Text: cell.text,
        Title: cell.title,
    };
}

export async function labelsToCsv(cells: readonly LabelCell[]): Promise<string> {
    return writeToString(cells.map(toRow), { headers: [...LABEL_CSV_HEADERS] });
}

/** Build the label sheet for a map and write it as CSV */
export async function exportLabels(map: LocationMap, outputPath: string): Promise<LabelSheet> {
    const sheet = buildLabelSheet(map);
    await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
    await fs.writeFile(outputPath, `${await labelsToCsv(sheet.cells)}\n`, 'utf8');
    return sheet;
}
