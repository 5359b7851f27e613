import { Command } from 'commander';
import chalk from 'chalk';
import { loadCatalog, moveStockToLocations, stockSnapshotFromSpecs } from '@drawermap/shared';
import { EXIT_OK, createContext, runCommand } from '../context.js';
import { field, heading, json, table } from '../format.js';

export function registerStockCommands(program: Command): void {
  const stock = program
    .command('stock')
    .description('Stock operations');

  stock
    .command('move')
    .description('Move the stock of every mapped component into its primary slot')
    .option('--dry-run', 'List the moves without transferring anything')
    .option('--json', 'Print the report as JSON')
    .action((opts: { dryRun?: boolean; json?: boolean }) =>
      runCommand(async () => {
        const ctx = createContext();
        const gateway = ctx.gateway();
        const catalog = await loadCatalog({
          gateway,
          reference: await ctx.reference(),
          retry: ctx.retry,
          matching: ctx.matching,
        });

        const report = await moveStockToLocations({
          gateway,
          map: await ctx.store.read(),
          stock: stockSnapshotFromSpecs(catalog.specs),
          dryRun: opts.dryRun,
          retry: ctx.retry,
        });

        if (opts.json) {
          json(report);
          return EXIT_OK;
        }

        heading(opts.dryRun ? 'Stock moves (dry run)' : 'Stock moves');
        table(
          report.planned.map((move) => ({
            Location: move.location,
            Component: move.key,
            Qty: move.quantity,
          }))
        );
        if (!opts.dryRun) {
          field('Moved', report.moved);
          field('Already in place', report.alreadyInPlace);
        }
        if (report.skipped.length > 0) {
          console.log(chalk.dim(`  ${report.skipped.length} mapped component(s) with no stock skipped`));
        }
        console.log();
        return EXIT_OK;
      })
    );
}
