#!/usr/bin/env node

import { Command } from 'commander';
import { registerOverrideCommand } from './commands/override/override';
import { registerInspectCommand } from './commands/inspect/inspect';
import { registerConfigCommand } from './commands/config/config';

const program = new Command();

program
  .name('pushgate')
  .description('Record validation overrides in git history')
  .version('0.1.0');

registerOverrideCommand(program);
registerInspectCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
