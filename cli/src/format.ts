/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import { STORAGE_ERROR_CODES, type ReviewItem } from '@drawermap/shared';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('-') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function table(rows: Record<string, unknown>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns || Object.keys(rows[0]);
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => String(r[c] ?? '').length))
  );

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => String(row[c] ?? '').padEnd(widths[i])).join('  ');
    console.log(`  ${line}`);
  }
}

/** Short code without the STORAGE_ prefix: "CAPACITY_EXCEEDED" */
export function shortCode(code: string): string {
  return code.replace(/^STORAGE_/, '');
}

/**
 * Print collected review items. Merged duplicates are informational and
 * shown dimmed; everything else is a warning.
 */
export function reviewItems(items: readonly ReviewItem[]): void {
  if (items.length === 0) return;

  heading(`Needs attention (${items.length})`);
  for (const item of items) {
    const line = `${shortCode(item.code).padEnd(22)} ${item.message}`;
    if (item.code === STORAGE_ERROR_CODES.MERGED_DUPLICATE) {
      console.log(chalk.dim(`  ${line}`));
    } else {
      console.log(chalk.yellow(`  ${line}`));
    }
  }
}
