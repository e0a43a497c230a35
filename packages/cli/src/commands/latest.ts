/**
 * Latest command - Print the highest migration version on disk
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import ora from 'ora';
import { createContext, getGlobalOptions } from '../context.ts';
import { createProgressRenderer, reportError } from '../output.ts';

export function createLatestCommand(): Command {
   return new Command('latest')
      .description('Print the highest migration version in the migrations directory')
      .action(async (_options: Record<string, never>, command: Command) => {
         const spinner = ora(),
               verbose = getGlobalOptions(command).verbose ?? false;

         try {
            const { ratchet } = await createContext(command, createProgressRenderer(spinner, verbose));

            // Bare number on stdout so scripts can capture it
            console.log(String(await ratchet.latest()));
         } catch(error) {
            reportError(error, verbose);
            process.exit(1);
         }
      });
}
