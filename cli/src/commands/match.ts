import { Command } from 'commander';
import chalk from 'chalk';
import {
  FuzzyMatcher,
  loadCatalog,
  matchCandidates,
  mergeCatalog,
  slotLabel,
  type ComponentSpec,
  type MatchResult,
} from '@drawermap/shared';
import { EXIT_NEEDS_REVIEW, EXIT_OK, createContext, runCommand } from '../context.js';
import { json, success, warn } from '../format.js';

export function registerMatchCommands(program: Command): void {
  program
    .command('match <labels...>')
    .description('Show how free-text component names resolve against the catalog')
    .option('-r, --remote', 'Match against the inventory system catalog')
    .option('--json', 'Print results as JSON')
    .action((labels: string[], opts: { remote?: boolean; json?: boolean }) =>
      runCommand(async () => {
        const ctx = createContext();
        const reference = await ctx.reference();
        const map = await ctx.store.read();

        let specs: ComponentSpec[];
        if (opts.remote) {
          specs = (await loadCatalog({ gateway: ctx.gateway(), reference, retry: ctx.retry, matching: ctx.matching })).specs;
        } else {
          specs = mergeCatalog([], reference).specs;
        }

        const matcher = new FuzzyMatcher(matchCandidates(specs, Object.keys(map.assignments)), ctx.matching);
        const results: Array<{ label: string; result: MatchResult }> = labels.map((label) => ({
          label,
          result: matcher.match(label),
        }));

        if (opts.json) {
          json(results);
        } else {
          for (const { label, result } of results) {
            if (result.status === 'matched') {
              const slot = map.assignments[result.key]?.[0];
              const where = slot ? chalk.cyan(` @ ${slotLabel(slot)}`) : chalk.dim(' (no location)');
              success(`${label} -> ${result.key} (${result.confidence.toFixed(2)})${where}`);
            } else {
              const best = result.bestKey ? `, closest ${result.bestKey} (${result.bestScore.toFixed(2)})` : '';
              warn(`${label}: ${result.reason}${best}`);
            }
          }
        }

        return results.every(({ result }) => result.status === 'matched') ? EXIT_OK : EXIT_NEEDS_REVIEW;
      })
    );
}
