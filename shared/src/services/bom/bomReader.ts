/**
 * BOM Reader
 *
 * Reads a bill of materials from CSV (`reference,name,quantity`; reference
 * optional, header names case-insensitive) or from a JSON array of lines.
 * Line order is preserved. Any invalid line fails the whole read with every
 * problem listed, so a BOM is never half-picked.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import type { BomLine } from '../../types/index.js';
import { STORAGE_ERROR_CODES, StorageError } from '../../errors/index.js';
import { bomLineSchema } from '../../schemas/storage.js';

export type BomFormat = 'csv' | 'json';

/** Header aliases seen in exported BOMs */
const COLUMN_ALIASES: Record<string, keyof BomLine> = {
    reference: 'reference',
    ref: 'reference',
    designator: 'reference',
    name: 'name',
    part: 'name',
    value: 'name',
    quantity: 'quantity',
    qty: 'quantity',
};

function normalizeRow(row: Record<string, string>): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [column, value] of Object.entries(row)) {
        const field = COLUMN_ALIASES[column.trim().toLowerCase()];
        if (field && normalized[field] === undefined) normalized[field] = value;
    }
    return normalized;
}

function readRows(text: string, format: BomFormat): unknown[] {
    if (format === 'json') {
        const raw: unknown = JSON.parse(text);
        if (!Array.isArray(raw)) {
            throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
                technicalMessage: 'A JSON BOM must be an array of lines',
            });
        }
        return raw;
    }

    const records: Record<string, string>[] = parse(text, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
    });
    return records.map(normalizeRow);
}

export function parseBom(text: string, format: BomFormat): BomLine[] {
    let rows: unknown[];
    try {
        rows = readRows(text, format);
    } catch (err: unknown) {
        if (err instanceof StorageError) throw err;
        throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
            technicalMessage: `BOM could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
            cause: err,
        });
    }

    const lines: BomLine[] = [];
    const problems: string[] = [];

    rows.forEach((row, index) => {
        const parsed = bomLineSchema.safeParse(row);
        if (parsed.success) {
            lines.push(parsed.data);
        } else {
            problems.push(`line ${index + 1}: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
        }
    });

    if (problems.length > 0) {
        throw new StorageError(STORAGE_ERROR_CODES.MALFORMED_RECORD, {
            technicalMessage: `BOM has invalid lines: ${problems.join('; ')}`,
            context: { problems },
        });
    }
    return lines;
}

export async function readBomFile(filePath: string): Promise<BomLine[]> {
    const text = await fs.readFile(filePath, 'utf8');
    const format: BomFormat = path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'csv';
    return parseBom(text, format);
}
