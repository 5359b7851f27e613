import { Command } from 'commander';
import { exportLabels, needsReview } from '@drawermap/shared';
import { EXIT_NEEDS_REVIEW, EXIT_OK, createContext, runCommand } from '../context.js';
import { reviewItems, success, warn } from '../format.js';

export function registerLabelCommands(program: Command): void {
  program
    .command('labels')
    .description('Export drawer labels for every assigned slot as CSV')
    .option('-o, --output <file>', 'CSV file to write', 'labels.csv')
    .action((opts: { output: string }) =>
      runCommand(async () => {
        const ctx = createContext();
        const map = await ctx.store.read();
        if (Object.keys(map.assignments).length === 0) {
          warn('The location map is empty; run "drawermap allocate" first');
        }

        const sheet = await exportLabels(map, opts.output);
        success(`${sheet.cells.length} labels written to ${opts.output}`);
        reviewItems(sheet.issues);
        return needsReview(sheet.issues) ? EXIT_NEEDS_REVIEW : EXIT_OK;
      })
    );
}
