/**
 * Shared utility functions
 */

import type { VersionState } from './types.ts';

/**
 * @example
 * pluralize(1, 'migration') // → "1 migration"
 * pluralize(3, 'migration') // → "3 migrations"
 */
export function pluralize(count: number, noun: string): string {
   return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One-line description of a version state, as printed by `inspect`.
 */
export function describeVersionState(state: VersionState): string {
   switch (state.status) {
      case 'uninitialized': {
         return 'Database has not been initialized; run "ratchet init" to create the version table';
      }
      case 'invalid': {
         return `Database version "${state.raw}" is not valid`;
      }
      case 'ok': {
         return state.version === 0
            ? 'Database is initialized but has not been migrated yet (version 0)'
            : `Database is at version ${state.version}`;
      }
   }
}
