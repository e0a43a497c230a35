/**
 * MigrationRegistry - Discovers migration files and orders them by version.
 *
 * A migration is a file named `version_<N>` with a script extension that exports an
 * `upgrade(migrator)` function. Discovery imports each module but never calls
 * `upgrade`, so listing migrations has no effect on any database.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { InvalidMigrationError, MigrationDirectoryNotFoundError } from './errors.ts';
import { isSchemaOperation } from './schema/types.ts';
import type { SchemaMigrator } from './schema/migrator.ts';
import type { OperationProducer, SchemaOperation } from './schema/types.ts';
import type { MigrationDescriptor, MigrationProgressCallback } from './types.ts';

export const MIGRATION_PREFIX = 'version_';

export const MIGRATION_EXTENSIONS = [ '.ts', '.mts', '.js', '.mjs', '.cjs' ];

const MIGRATION_NAME_PATTERN = /^version_(\d+)$/;

/**
 * Turns a migration file into its `upgrade` function.
 */
export interface MigrationLoader {
   load(file: string, identifier: string): Promise<OperationProducer>;
}

/**
 * Lists the entry names of a directory, in the order the filesystem returns them.
 */
export type DirectoryLister = (directory: string) => Promise<string[]>;

export interface MigrationRegistryConfig {

   /** How migration files are loaded (default: dynamic `import()`) */
   loader?: MigrationLoader;

   /** How the migrations directory is listed (default: `fs.readdir`) */
   listDirectory?: DirectoryLister;

   /** Receives found, skipped and duplicate-version events */
   onProgress?: MigrationProgressCallback;
}

/**
 * Wrap a module's exported `upgrade` so its return value is checked when the
 * executor calls it.
 */
function checkedProducer(file: string, upgrade: (migrator: SchemaMigrator) => unknown): OperationProducer {
   return (migrator) => {
      const operations = upgrade(migrator);

      if (!Array.isArray(operations)) {
         throw new InvalidMigrationError(file, 'upgrade() must return an array of schema operations');
      }

      const checked: SchemaOperation[] = [];

      for (const operation of operations) {
         if (!isSchemaOperation(operation)) {
            throw new InvalidMigrationError(file, 'upgrade() returned a value that is not a schema operation');
         }
         checked.push(operation);
      }

      return checked;
   };
}

/**
 * Default loader: imports the file as an ES module and reads its `upgrade` export.
 */
export const importMigrationLoader: MigrationLoader = {
   async load(file: string): Promise<OperationProducer> {
      const loaded: unknown = await import(pathToFileURL(file).href);

      if (typeof loaded !== 'object' || loaded === null || !('upgrade' in loaded)) {
         throw new InvalidMigrationError(file, 'missing an exported upgrade() function');
      }

      const { upgrade } = loaded;

      if (typeof upgrade !== 'function') {
         throw new InvalidMigrationError(file, 'the upgrade export is not a function');
      }

      return checkedProducer(file, upgrade as (migrator: SchemaMigrator) => unknown);
   },
};

async function readDirectory(directory: string): Promise<string[]> {
   return fs.readdir(directory);
}

/**
 * Split an entry name into its identifier, or return null for entries that are not
 * migration scripts at all.
 */
function toIdentifier(entry: string): string | null {
   if (!entry.startsWith(MIGRATION_PREFIX) || entry.endsWith('.d.ts') || entry.endsWith('.d.mts')) {
      return null;
   }

   const extension = path.extname(entry);

   if (!MIGRATION_EXTENSIONS.includes(extension)) {
      return null;
   }

   return entry.slice(0, -extension.length);
}

export class MigrationRegistry {

   private readonly _loader: MigrationLoader;
   private readonly _listDirectory: DirectoryLister;
   private readonly _onProgress: MigrationProgressCallback;

   public constructor(config: MigrationRegistryConfig = {}) {
      this._loader = config.loader ?? importMigrationLoader;
      this._listDirectory = config.listDirectory ?? readDirectory;
      this._onProgress = config.onProgress ?? ((): void => {});
   }

   /**
    * Find, load and order every migration in a directory.
    *
    * @returns Descriptors sorted ascending by version; equal versions keep listing
    *    order
    * @throws MigrationDirectoryNotFoundError if the directory cannot be listed
    * @throws InvalidMigrationError if a migration module has no upgrade function
    */
   public async discover(directory: string): Promise<MigrationDescriptor[]> {
      const fullPath = path.resolve(directory),
            entries = await this._list(fullPath);

      const migrations: MigrationDescriptor[] = [];

      for (const entry of entries) {
         const identifier = toIdentifier(entry);

         if (identifier === null) {
            continue;
         }

         const version = this._parseVersion(entry, identifier);

         if (version === null) {
            continue;
         }

         const file = path.join(fullPath, entry),
               upgrade = await this._loader.load(file, identifier);

         this._onProgress({ type: 'migration-found', identifier, version, file });
         migrations.push({ identifier, version, file, upgrade });
      }

      // Array.prototype.sort is stable, so ties stay in listing order
      migrations.sort((a, b) => {
         return a.version - b.version;
      });

      this._reportDuplicates(migrations);

      return migrations;
   }

   /**
    * Highest version in the directory, or 0 when it has no migrations.
    */
   public async latest(directory: string): Promise<number> {
      return latestVersion(await this.discover(directory));
   }

   private async _list(directory: string): Promise<string[]> {
      try {
         return await this._listDirectory(directory);
      } catch(error) {
         const code = (error as NodeJS.ErrnoException).code;

         if (code === 'ENOENT' || code === 'ENOTDIR') {
            throw new MigrationDirectoryNotFoundError(directory);
         }

         throw error;
      }
   }

   private _parseVersion(entry: string, identifier: string): number | null {
      const match = MIGRATION_NAME_PATTERN.exec(identifier);

      if (!match) {
         this._onProgress({
            type: 'migration-skipped',
            entry,
            reason: `cannot parse version number from "${identifier}"`,
         });
         return null;
      }

      const version = Number.parseInt(match[1], 10);

      if (!Number.isSafeInteger(version)) {
         this._onProgress({ type: 'migration-skipped', entry, reason: `version ${match[1]} is too large` });
         return null;
      }

      if (version === 0) {
         this._onProgress({ type: 'migration-skipped', entry, reason: 'version 0 is reserved for a freshly initialized database' });
         return null;
      }

      return version;
   }

   private _reportDuplicates(migrations: MigrationDescriptor[]): void {
      const byVersion = new Map<number, string[]>();

      for (const migration of migrations) {
         const identifiers = byVersion.get(migration.version) ?? [];

         identifiers.push(migration.identifier);
         byVersion.set(migration.version, identifiers);
      }

      for (const [ version, identifiers ] of byVersion) {
         if (identifiers.length > 1) {
            this._onProgress({ type: 'duplicate-version', version, identifiers });
         }
      }
   }

}

/**
 * Highest version of an ordered descriptor list, or 0 for an empty list.
 */
export function latestVersion(migrations: readonly MigrationDescriptor[]): number {
   return migrations.length > 0 ? migrations[migrations.length - 1].version : 0;
}
