/**
 * MigrationExecutor - Applies pending migrations in one transaction.
 *
 * Every `upgrade` call either applies the whole pending batch and advances the
 * version marker once, or changes nothing at all.
 */

import type Database from 'better-sqlite3';
import {
   MigrationApplicationError,
   NotInitializedError,
   VersionAheadOfMigrationsError,
} from './errors.ts';
import { latestVersion } from './registry.ts';
import type { MigrationRegistry } from './registry.ts';
import type { SchemaCollaborator } from './schema/types.ts';
import type { VersionStore } from './version-store.ts';
import type {
   AppliedMigration,
   MigrationDescriptor,
   MigrationProgressCallback,
   UpgradeResult,
   UpgradeTarget,
} from './types.ts';

export interface MigrationExecutorConfig {

   /** Open connection the batch transaction runs on */
   db: Database.Database;

   versionStore: VersionStore;

   registry: MigrationRegistry;

   /** Supplies the migrator handle and applies produced operations */
   collaborator: SchemaCollaborator;

   /** Directory the registry discovers migrations in */
   migrationsDir: string;

   onProgress?: MigrationProgressCallback;
}

/**
 * Select the migrations above `current` and up to and including `target`.
 */
export function selectBatch(
   migrations: readonly MigrationDescriptor[],
   current: number,
   target: number
): MigrationDescriptor[] {
   return migrations.filter((m) => {
      return m.version > current && m.version <= target;
   });
}

export class MigrationExecutor {

   private readonly _db: Database.Database;
   private readonly _versionStore: VersionStore;
   private readonly _registry: MigrationRegistry;
   private readonly _collaborator: SchemaCollaborator;
   private readonly _migrationsDir: string;
   private readonly _onProgress: MigrationProgressCallback;

   public constructor(config: MigrationExecutorConfig) {
      this._db = config.db;
      this._versionStore = config.versionStore;
      this._registry = config.registry;
      this._collaborator = config.collaborator;
      this._migrationsDir = config.migrationsDir;
      this._onProgress = config.onProgress ?? ((): void => {});
   }

   /**
    * Upgrade the database to `target` (a version number or "latest").
    *
    * @throws NotInitializedError if the version table has no row
    * @throws VersionParseError if the stored version is not a number
    * @throws VersionAheadOfMigrationsError if the database is newer than every migration
    * @throws MigrationApplicationError if any migration in the batch fails
    */
   public async upgrade(target: UpgradeTarget): Promise<UpgradeResult> {
      const state = this._versionStore.readCurrentVersion();

      if (state.status === 'uninitialized') {
         throw new NotInitializedError();
      }

      if (state.status === 'invalid') {
         throw state.error;
      }

      const current = state.version,
            migrations = await this._registry.discover(this._migrationsDir),
            latest = latestVersion(migrations);

      if (current > latest) {
         throw new VersionAheadOfMigrationsError(current, latest);
      }

      const resolvedTarget = target === 'latest' ? latest : target;

      if (current === resolvedTarget) {
         return { status: 'up-to-date', version: current };
      }

      const batch = selectBatch(migrations, current, resolvedTarget);

      if (batch.length === 0) {
         return { status: 'up-to-date', version: current };
      }

      const applied = this._applyBatch(batch);

      return {
         status: 'upgraded',
         fromVersion: current,
         toVersion: batch[batch.length - 1].version,
         applied,
      };
   }

   private _applyBatch(batch: MigrationDescriptor[]): AppliedMigration[] {
      const finalVersion = batch[batch.length - 1].version;

      // better-sqlite3 rolls the whole transaction back if the callback throws
      const runBatch = this._db.transaction((): AppliedMigration[] => {
         const applied: AppliedMigration[] = [];

         for (const [ index, migration ] of batch.entries()) {
            this._onProgress({
               type: 'applying',
               identifier: migration.identifier,
               version: migration.version,
               index,
               total: batch.length,
            });

            const operationCount = this._applyMigration(migration);

            applied.push({
               identifier: migration.identifier,
               version: migration.version,
               operations: operationCount,
            });

            this._onProgress({
               type: 'applied',
               identifier: migration.identifier,
               version: migration.version,
               operations: operationCount,
            });
         }

         this._versionStore.writeVersion(finalVersion);
         this._onProgress({ type: 'version-set', version: finalVersion });

         return applied;
      });

      return runBatch();
   }

   private _applyMigration(migration: MigrationDescriptor): number {
      try {
         const operations = migration.upgrade(this._collaborator.createMigrator());

         this._collaborator.apply(operations);

         return operations.length;
      } catch(error) {
         throw new MigrationApplicationError(migration.identifier, migration.version, error);
      }
   }

}
