/**
 * Config command - Display the resolved ratchet configuration
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_ENV_VAR, VERSION, loadConfig, resolveConfigFile } from '@ratchet/core';
import { getGlobalOptions } from '../context.ts';
import { reportError } from '../output.ts';

interface ConfigOptions {
   json?: boolean;
}

export function createConfigCommand(): Command {
   return new Command('config')
      .description('Display the resolved configuration and where it was read from')
      .option('--json', 'Output as JSON')
      .action(async (options: ConfigOptions, command: Command) => {
         const { config: configFile, verbose } = getGlobalOptions(command);

         try {
            const { source } = resolveConfigFile({ configFile }),
                  config = await loadConfig({ configFile });

            if (options.json) {
               console.log(JSON.stringify({ version: VERSION, source, ...config }, null, 2));
               return;
            }

            const sourceNote = {
               option: ' (from --config)',
               env: ` (from ${CONFIG_ENV_VAR})`,
               default: '',
            }[source];

            console.log(chalk.bold('\nRatchet Configuration\n'));
            console.log(`  ${chalk.dim('Version:')}     ${VERSION}`);
            console.log(`  ${chalk.dim('Config file:')} ${config.configFile}${chalk.yellow(sourceNote)}`);

            console.log(chalk.bold('\n  Database:'));
            console.log(`    ${chalk.dim('Path:')}   ${config.databasePath}`);
            console.log(`    ${chalk.dim('Schema:')} ${config.schema}`);

            if (config.attachPath !== null) {
               console.log(`    ${chalk.dim('Attach:')} ${config.attachPath}`);
            }

            console.log(`    ${chalk.dim('Table:')}  ${config.table}`);

            console.log(chalk.bold('\n  Migrations:'));
            console.log(`    ${chalk.dim('Location:')} ${config.migrationsDir}`);
            console.log(`    ${chalk.dim('Template:')} ${config.template ?? chalk.dim('(bundled)')}`);

            console.log('');
         } catch(error) {
            reportError(error, verbose);
            process.exit(1);
         }
      });
}
