/**
 * Makemigration command - Scaffold the next migration file
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext, getGlobalOptions } from '../context.ts';
import { reportError } from '../output.ts';

interface MakeMigrationCommandOptions {
   template?: string;
   message?: string;
}

export function createMakeMigrationCommand(): Command {
   return new Command('makemigration')
      .description('Create the next version_<N> migration file from a template')
      .option('-t, --template <file>', 'Template file (default: migrations.template or the bundled template)')
      .option('-m, --message <text>', 'Description written as a comment at the top of the file')
      .action(async (options: MakeMigrationCommandOptions, command: Command) => {
         const verbose = getGlobalOptions(command).verbose ?? false;

         try {
            const { ratchet } = await createContext(command),
                  result = await ratchet.makeMigration({ template: options.template, message: options.message });

            console.log(chalk.green(`Created ${result.file}`));
            console.log(`  ${chalk.dim('Version:')} ${result.version}`);
         } catch(error) {
            reportError(error, verbose);
            process.exit(1);
         }
      });
}
