import { Command } from 'commander';
import { needsReview, pushDefaultLocations, pushMissingLocations } from '@drawermap/shared';
import { EXIT_NEEDS_REVIEW, EXIT_OK, createContext, runCommand } from '../context.js';
import { field, heading, json, reviewItems, table } from '../format.js';

export function registerLocationCommands(program: Command): void {
  const locations = program
    .command('locations')
    .description('Inventory location management');

  locations
    .command('push')
    .description('Set each mapped part\'s default location to its primary slot')
    .option('-k, --key <keys...>', 'Only push these identity keys')
    .option('--json', 'Print the report as JSON')
    .action((opts: { key?: string[]; json?: boolean }) =>
      runCommand(async () => {
        const ctx = createContext();
        const report = await pushDefaultLocations({
          gateway: ctx.gateway(),
          map: await ctx.store.read(),
          keys: opts.key,
          retry: ctx.retry,
        });

        if (opts.json) {
          json(report);
        } else {
          heading('Default locations');
          field('Updated', report.updated.length);
          field('Not found', report.notFound.length);
          reviewItems(report.issues);
          console.log();
        }
        return needsReview(report.issues) ? EXIT_NEEDS_REVIEW : EXIT_OK;
      })
    );

  locations
    .command('missing')
    .description('Match inventory parts that have no default location to mapped slots')
    .option('--dry-run', 'Show the matches without updating the inventory')
    .option('--json', 'Print the report as JSON')
    .action((opts: { dryRun?: boolean; json?: boolean }) =>
      runCommand(async () => {
        const ctx = createContext();
        const report = await pushMissingLocations({
          gateway: ctx.gateway(),
          map: await ctx.store.read(),
          matching: ctx.matching,
          dryRun: opts.dryRun,
          retry: ctx.retry,
        });

        if (opts.json) {
          json(report);
        } else {
          heading(opts.dryRun ? 'Missing locations (dry run)' : 'Missing locations');
          table(
            report.matched.map((match) => ({
              Part: match.part,
              Component: match.key,
              Location: match.location,
              Match: match.method === 'exact' ? 'exact' : `${Math.round(match.confidence * 100)}%`,
            }))
          );
          field('Updated', report.updated);
          field('Accessories skipped', report.skipped.length);
          reviewItems(report.issues);
          console.log();
        }
        return needsReview(report.issues) ? EXIT_NEEDS_REVIEW : EXIT_OK;
      })
    );
}
