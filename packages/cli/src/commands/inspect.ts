/**
 * Inspect command - Show the version recorded in the database
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import { describeVersionState } from '@ratchet/core';
import type { VersionState } from '@ratchet/core';
import { createContext, getGlobalOptions } from '../context.ts';
import { reportError } from '../output.ts';

interface InspectOptions {
   json?: boolean;
}

function toJson(state: VersionState): Record<string, unknown> {
   switch (state.status) {
      case 'ok': {
         return { status: state.status, version: state.version };
      }
      case 'invalid': {
         return { status: state.status, raw: state.raw, error: state.error.message };
      }
      case 'uninitialized': {
         return { status: state.status };
      }
   }
}

export function createInspectCommand(): Command {
   return new Command('inspect')
      .description('Show the schema version recorded in the database')
      .option('--json', 'Output as JSON')
      .action(async (options: InspectOptions, command: Command) => {
         const verbose = getGlobalOptions(command).verbose ?? false;

         let state: VersionState;

         try {
            const { ratchet } = await createContext(command);

            state = await ratchet.inspect();
         } catch(error) {
            reportError(error, verbose);
            process.exit(1);
         }

         if (options.json) {
            console.log(JSON.stringify(toJson(state), null, 2));
         } else if (state.status === 'ok') {
            console.log(chalk.green(describeVersionState(state)));
         } else {
            console.error(chalk.yellow(describeVersionState(state)));
         }

         if (state.status !== 'ok') {
            process.exit(1);
         }
      });
}
