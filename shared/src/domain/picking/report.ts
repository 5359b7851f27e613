/**
 * Plain-text picking sheet
 *
 * PICKING SHEET: Fuzz Face
 * ======================================================================
 * Total BOM items: 2
 *
 *
 * LOCATION: U1-S5-1
 * ----------------------------------------------------------------------
 *   [ ] R1       4.7K  ...  ✓
 *
 * Unmatched and unlocated lines are listed last under "Location Not Set".
 */

import type { PickListEntry } from '../../types/index.js';
import type { PickSheet } from './pickList.js';

export const LOCATION_NOT_SET = 'Location Not Set';

const RULE = '='.repeat(70);
const DIVIDER = '-'.repeat(70);

function entryLine(entry: PickListEntry): string {
    const quantity = entry.required > 1 ? `(x${entry.required})` : '';
    const marker = entry.sufficient ? '✓' : '⚠';
    let note = '';
    if (entry.key === null) note = ' needs ordering';
    else if (entry.slot === null) note = ' location not set';

    return `  [ ] ${(entry.reference ?? '').padEnd(8)} ${entry.name.padEnd(30)} ${quantity.padEnd(6)} ${marker}${note}`;
}

export function renderPickSheet(sheet: PickSheet, title = 'BOM'): string {
    const { summary } = sheet;
    const lines: string[] = [`PICKING SHEET: ${title}`, RULE, `Total BOM items: ${summary.totalLineItems}`, ''];

    for (const group of sheet.groups) {
        lines.push('', `LOCATION: ${group.location ?? LOCATION_NOT_SET}`, DIVIDER);
        lines.push(...group.entries.map(entryLine));
    }

    lines.push(
        '',
        RULE,
        'SUMMARY:',
        `  Total items to pick: ${summary.totalLineItems}`,
        `  Unique locations: ${summary.uniqueLocations}`,
        `  Items in stock: ${summary.fullyInStock}/${summary.totalLineItems}`
    );

    if (summary.shortages.length > 0) {
        lines.push('', `  ⚠ WARNING: ${summary.shortages.length} items need to be ordered!`, '', '  Missing items:');
        for (const shortage of summary.shortages) {
            lines.push(`    - ${shortage.name}: need ${shortage.shortfall} more (have ${shortage.onHand})`);
        }
    }

    lines.push('', '✓ = In stock | ⚠ = Needs ordering');
    return `${lines.join('\n')}\n`;
}
