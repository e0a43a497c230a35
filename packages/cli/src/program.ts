/**
 * Command-line program definition, kept separate from the entry point so tests
 * can parse arguments in-process.
 */

import { Command } from 'commander';
import { CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE, VERSION } from '@ratchet/core';
import { createInitCommand } from './commands/init.ts';
import { createInspectCommand } from './commands/inspect.ts';
import { createLatestCommand } from './commands/latest.ts';
import { createUpgradeCommand } from './commands/upgrade.ts';
import { createMakeMigrationCommand } from './commands/makemigration.ts';
import { createConfigCommand } from './commands/config.ts';

export function createProgram(): Command {
   const program = new Command();

   program
      .name('ratchet')
      .description('Forward-only schema migrations for SQLite')
      .version(VERSION, '-V, --version', 'Output the CLI version')
      .option('-c, --config <file>', `Config file (default: $${CONFIG_ENV_VAR} or ./${DEFAULT_CONFIG_FILE})`)
      .option('-v, --verbose', 'Show every discovered migration and version change');

   // Register commands
   program.addCommand(createInitCommand());
   program.addCommand(createInspectCommand());
   program.addCommand(createLatestCommand());
   program.addCommand(createUpgradeCommand());
   program.addCommand(createMakeMigrationCommand());
   program.addCommand(createConfigCommand());

   return program;
}
