/**
 * Engine types: migration descriptors, progress events and operation results.
 */

import type { OperationProducer } from './schema/types.ts';
import type { VersionParseError } from './errors.ts';

/**
 * One discovered migration file.
 */
export interface MigrationDescriptor {

   /** File name without its extension, e.g. `version_7` */
   identifier: string;

   /** Parsed version number (always > 0) */
   version: number;

   /** Absolute path of the migration file */
   file: string;

   /** The migration's exported `upgrade` function; only the executor calls it */
   upgrade: OperationProducer;
}

/**
 * Upgrade target as accepted by the executor.
 */
export type UpgradeTarget = number | 'latest';

/**
 * Progress reported by the registry and executor.
 */
export type MigrationProgress =
   | { type: 'migration-found'; identifier: string; version: number; file: string }
   | { type: 'migration-skipped'; entry: string; reason: string }
   | { type: 'duplicate-version'; version: number; identifiers: string[] }
   | { type: 'applying'; identifier: string; version: number; index: number; total: number }
   | { type: 'applied'; identifier: string; version: number; operations: number }
   | { type: 'version-set'; version: number };

export type MigrationProgressCallback = (progress: MigrationProgress) => void;

/**
 * Outcome of reading the version marker.
 */
export type VersionState =
   | { status: 'uninitialized' }
   | { status: 'ok'; version: number }
   | { status: 'invalid'; raw: string; error: VersionParseError };

/**
 * Outcome of `init`.
 */
export interface InitResult {

   /** False when the version table already held a row */
   created: boolean;

   /** Version stored after the call */
   version: string;
}

/**
 * Summary of a migration applied during an upgrade.
 */
export interface AppliedMigration {
   identifier: string;
   version: number;
   operations: number;
}

/**
 * Outcome of `upgrade`.
 */
export type UpgradeResult =
   | {
      status: 'upgraded';
      fromVersion: number;
      toVersion: number;
      applied: AppliedMigration[];
   }
   | { status: 'up-to-date'; version: number };
