/**
 * Init command - Create the version table at version 0
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createContext, getGlobalOptions } from '../context.ts';
import { reportError } from '../output.ts';

export function createInitCommand(): Command {
   return new Command('init')
      .description('Create the version table and record version 0')
      .action(async (_options: Record<string, never>, command: Command) => {
         const spinner = ora(),
               verbose = getGlobalOptions(command).verbose ?? false;

         try {
            const { config, ratchet } = await createContext(command);

            spinner.start('Initializing database...');

            const result = await ratchet.init();

            if (result.created) {
               spinner.succeed(`Created ${config.schema}.${config.table} at version 0`);
            } else {
               spinner.info(`Database already initialized (version ${result.version})`);
            }

            console.log(`  ${chalk.dim('Database:')} ${config.databasePath}`);
         } catch(error) {
            spinner.fail('Initialization failed');
            reportError(error, verbose);
            process.exit(1);
         }
      });
}
