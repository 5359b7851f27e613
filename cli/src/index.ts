#!/usr/bin/env tsx

// Load .env FIRST - the shared logger reads LOG_LEVEL when it is imported
import 'dotenv/config';
import { Command } from 'commander';
import { registerAllocateCommands } from './commands/allocate.js';
import { registerPickCommands } from './commands/pick.js';
import { registerLabelCommands } from './commands/labels.js';
import { registerLocationCommands } from './commands/locations.js';
import { registerStockCommands } from './commands/stock.js';
import { registerMatchCommands } from './commands/match.js';

const program = new Command();

program
  .name('drawermap')
  .description('Drawer allocation, labels and BOM picking sheets for a component cabinet')
  .version('0.1.0');

// Storage
registerAllocateCommands(program);
registerLabelCommands(program);

// Inventory system
registerLocationCommands(program);
registerStockCommands(program);

// Picking
registerPickCommands(program);
registerMatchCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
await program.parseAsync(args);
