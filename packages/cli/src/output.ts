/**
 * Console rendering for engine progress events and errors.
 */

/* eslint-disable no-console */

import chalk from 'chalk';
import type { Ora } from 'ora';
import {
   MigrationApplicationError,
   NotInitializedError,
   getErrorMessage,
   pluralize,
} from '@ratchet/core';
import type { MigrationProgress, MigrationProgressCallback } from '@ratchet/core';

/**
 * Render engine events on a spinner. Warnings are always shown; discovered
 * files and the final version bump only with `verbose`.
 */
export function createProgressRenderer(spinner: Ora, verbose: boolean): MigrationProgressCallback {
   // Persist a line without losing the text of the step still in progress
   const note = (kind: 'info' | 'warn', text: string): void => {
      const resume = spinner.isSpinning ? spinner.text : null;

      spinner[kind](text);

      if (resume !== null) {
         spinner.start(resume);
      }
   };

   return (event: MigrationProgress): void => {
      switch (event.type) {
         case 'migration-found': {
            if (verbose) {
               note('info', chalk.dim(`Found ${event.identifier} (version ${event.version})`));
            }
            break;
         }
         case 'migration-skipped': {
            note('warn', chalk.yellow(`Skipping ${event.entry}: ${event.reason}`));
            break;
         }
         case 'duplicate-version': {
            note('warn', chalk.yellow(
               `Version ${event.version} is defined by ${event.identifiers.join(', ')}; they run in that order`
            ));
            break;
         }
         case 'applying': {
            spinner.start(`Applying ${event.identifier} (${event.index + 1}/${event.total})`);
            break;
         }
         case 'applied': {
            spinner.succeed(`Applied ${event.identifier} ${chalk.dim(`(${pluralize(event.operations, 'operation')})`)}`);
            break;
         }
         case 'version-set': {
            if (verbose) {
               note('info', chalk.dim(`Version marker set to ${event.version}`));
            }
            break;
         }
      }
   };
}

/**
 * Print an error in red on stderr, with a hint or cause where one helps.
 */
export function reportError(error: unknown, verbose = false): void {
   console.error(chalk.red(`\nError: ${getErrorMessage(error)}`));

   if (error instanceof NotInitializedError) {
      console.error(chalk.dim('  Hint: ratchet init creates the version table at version 0'));
   }

   if (error instanceof MigrationApplicationError) {
      console.error(chalk.dim('  No changes were committed; the database version is unchanged.'));

      if (verbose && error.cause instanceof Error && error.cause.stack) {
         console.error(chalk.dim(error.cause.stack));
      }
   }
}
