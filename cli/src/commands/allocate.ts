import { Command } from 'commander';
import chalk from 'chalk';
import { runAllocation, slotLabel } from '@drawermap/shared';
import { EXIT_NEEDS_REVIEW, EXIT_OK, createContext, runCommand } from '../context.js';
import { field, heading, json, reviewItems, success, table, warn } from '../format.js';

interface AllocateOptions {
  dryRun?: boolean;
  push?: boolean;
  json?: boolean;
}

export function registerAllocateCommands(program: Command): void {
  program
    .command('allocate')
    .description('Assign drawer locations to every catalog component that has none yet')
    .option('--dry-run', 'Compute the allocation without writing the map')
    .option('--push', 'Set default locations in the inventory system for new assignments')
    .option('--json', 'Print the full report as JSON')
    .action((opts: AllocateOptions) =>
      runCommand(async () => {
        const ctx = createContext();
        const report = await runAllocation({
          gateway: ctx.gateway(),
          store: ctx.store,
          topology: await ctx.topology(),
          reference: await ctx.reference(),
          dryRun: opts.dryRun,
          push: opts.push,
          retry: ctx.retry,
          matching: ctx.matching,
        });

        if (opts.json) {
          json(report);
          return report.needsReview ? EXIT_NEEDS_REVIEW : EXIT_OK;
        }

        heading(opts.dryRun ? 'Allocation (dry run)' : 'Allocation');
        field('Catalog', report.catalogSize);
        field('Map version', report.map.version);
        field('Added', report.additions.length);
        field('Retained', report.retained.length);

        if (report.additions.length > 0) {
          heading('New assignments');
          table(
            report.additions.map((addition) => ({
              Location: slotLabel(addition.slot),
              Component: addition.key,
            }))
          );
        }

        for (const failure of report.capacityFailures) {
          const stranded = failure.stranded > 0 ? `, ${failure.stranded} compartment(s) stranded` : '';
          warn(`${failure.category}: needs ${failure.needed} drawer(s), ${failure.available} free${stranded}`);
        }

        if (report.retained.length > 0) {
          heading('No longer in catalog (slots kept)');
          for (const key of report.retained) console.log(chalk.dim(`  ${key}`));
        }

        if (report.push) {
          field('Locations pushed', report.push.updated.length);
          field('Parts not found', report.push.notFound.length);
        }

        reviewItems(report.issues);
        console.log();

        if (report.written) {
          success(`Location map written (version ${report.map.version})`);
        } else if (!opts.dryRun) {
          console.log(chalk.dim('  Location map unchanged'));
        }
        return report.needsReview ? EXIT_NEEDS_REVIEW : EXIT_OK;
      })
    );
}
