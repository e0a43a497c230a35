/**
 * Upgrade command - Apply pending migrations
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { pluralize } from '@ratchet/core';
import { createContext, getGlobalOptions } from '../context.ts';
import { createProgressRenderer, reportError } from '../output.ts';

export function createUpgradeCommand(): Command {
   return new Command('upgrade')
      .description('Apply pending migrations in one transaction')
      .argument('[target]', 'Version to upgrade to, or "latest"', 'latest')
      .action(async (target: string, _options: Record<string, never>, command: Command) => {
         const spinner = ora(),
               verbose = getGlobalOptions(command).verbose ?? false;

         try {
            const { config, ratchet } = await createContext(command, createProgressRenderer(spinner, verbose));

            spinner.start('Discovering migrations...');

            const result = await ratchet.upgrade(target);

            if (result.status === 'up-to-date') {
               spinner.stop();
               console.log(chalk.green(`Database is up to date (version ${result.version})`));
               return;
            }

            console.log(chalk.green(
               `\nUpgraded ${config.databasePath} from version ${result.fromVersion} to ${result.toVersion} ` +
               `(${pluralize(result.applied.length, 'migration')})`
            ));
         } catch(error) {
            spinner.fail('Upgrade failed');
            reportError(error, verbose);
            process.exit(1);
         }
      });
}
