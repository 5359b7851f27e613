import path from 'node:path';
import fs from 'node:fs/promises';
import { Command } from 'commander';
import {
  loadCatalog,
  mergeCatalog,
  readBomFile,
  runPicking,
  stockSnapshotFromSpecs,
  stockSnapshotSchema,
  type ComponentSpec,
  type StockSnapshot,
} from '@drawermap/shared';
import { EXIT_NEEDS_REVIEW, EXIT_OK, createContext, readJsonFile, runCommand } from '../context.js';
import { json, success, warn } from '../format.js';

interface PickOptions {
  stock?: string;
  remote?: boolean;
  title?: string;
  json?: boolean;
  output?: string;
}

export function registerPickCommands(program: Command): void {
  program
    .command('pick <bom>')
    .description('Build a picking sheet for a BOM file (.csv or .json), ordered by drawer')
    .option('-s, --stock <file>', 'Stock snapshot JSON (identity key -> quantity)')
    .option('-r, --remote', 'Read the catalog and stock from the inventory system')
    .option('-t, --title <title>', 'Sheet title (defaults to the BOM file name)')
    .option('-o, --output <file>', 'Write the sheet to a file instead of stdout')
    .option('--json', 'Print the structured pick sheet as JSON')
    .action((bomPath: string, opts: PickOptions) =>
      runCommand(async () => {
        const ctx = createContext();
        const bom = await readBomFile(bomPath);
        const map = await ctx.store.read();
        const reference = await ctx.reference();

        let specs: ComponentSpec[];
        let stock: StockSnapshot = {};
        if (opts.remote) {
          specs = (await loadCatalog({ gateway: ctx.gateway(), reference, retry: ctx.retry, matching: ctx.matching })).specs;
          stock = stockSnapshotFromSpecs(specs);
        } else {
          specs = mergeCatalog([], reference).specs;
        }

        if (opts.stock) {
          stock = stockSnapshotSchema.parse(await readJsonFile(opts.stock));
        } else if (!opts.remote) {
          warn('No stock snapshot given (--stock or --remote); every line will show as short');
        }

        const result = runPicking({
          bom,
          map,
          stock,
          specs,
          title: opts.title ?? path.basename(bomPath, path.extname(bomPath)),
          ...ctx.matching,
        });

        if (opts.json) {
          json(result.sheet);
        } else if (opts.output) {
          await fs.writeFile(opts.output, result.report, 'utf8');
          success(`Picking sheet written to ${opts.output}`);
        } else {
          process.stdout.write(result.report);
        }
        return result.needsReview ? EXIT_NEEDS_REVIEW : EXIT_OK;
      })
    );
}
