#!/usr/bin/env node

import { Command } from 'commander';
import { registerCommitCommands } from './commands/commit/commit';

const program = new Command();

program
  .name('app-commit')
  .description('Create commits on GitHub from staged changes, authenticated as a GitHub App')
  .version('0.1.0');

registerCommitCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
