/**
 * Ratchet - Public surface of the migration engine.
 *
 * Maps the `init`, `inspect`, `latest`, `upgrade` and `makeMigration` operations
 * onto the version store, registry and executor. Each operation opens its own
 * connection and closes it before returning, whether it succeeds or throws.
 */

import Database from 'better-sqlite3';
import { InvalidVersionArgumentError } from './errors.ts';
import { MigrationExecutor } from './executor.ts';
import { MigrationRegistry } from './registry.ts';
import type { MigrationLoader } from './registry.ts';
import { makeMigration } from './scaffold.ts';
import type { MakeMigrationResult } from './scaffold.ts';
import { SqliteSchemaCollaborator } from './schema/collaborator.ts';
import { quoteIdentifier } from './schema/migrator.ts';
import type { SchemaCollaborator } from './schema/types.ts';
import { VersionStore } from './version-store.ts';
import type { RatchetConfig } from './config.ts';
import type {
   InitResult,
   MigrationProgressCallback,
   UpgradeResult,
   UpgradeTarget,
   VersionState,
} from './types.ts';

export interface RatchetOptions {

   /** Opens a new connection; called once per operation */
   connect: () => Database.Database;

   /** Directory holding the `version_<N>` migration files */
   migrationsDir: string;

   /** Schema holding the version table (default: "main") */
   schema?: string;

   /** Version table name (default: "ratchet_version") */
   table?: string;

   /** Template used by `makeMigration` (default: the bundled template) */
   template?: string | null;

   /** Custom migration loader (default: dynamic `import()`) */
   loader?: MigrationLoader;

   /** Builds the schema collaborator for an open connection (default: SQLite) */
   createCollaborator?: (db: Database.Database, schema: string) => SchemaCollaborator;

   onProgress?: MigrationProgressCallback;
}

/**
 * Normalize a caller-supplied upgrade target.
 *
 * Absent means "latest"; a non-negative integer or an all-digit string is a
 * version number.
 *
 * @throws InvalidVersionArgumentError for anything else
 */
export function parseTarget(value: unknown): UpgradeTarget {
   if (value === undefined || value === null || value === 'latest') {
      return 'latest';
   }

   if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
      return value;
   }

   if (typeof value === 'string' && /^\d+$/.test(value)) {
      const version = Number.parseInt(value, 10);

      if (Number.isSafeInteger(version)) {
         return version;
      }
   }

   throw new InvalidVersionArgumentError(value);
}

export class Ratchet {

   private readonly _connect: () => Database.Database;
   private readonly _migrationsDir: string;
   private readonly _schema: string;
   private readonly _table: string | undefined;
   private readonly _template: string | null;
   private readonly _registry: MigrationRegistry;
   private readonly _createCollaborator: (db: Database.Database, schema: string) => SchemaCollaborator;
   private readonly _onProgress: MigrationProgressCallback | undefined;

   public constructor(options: RatchetOptions) {
      this._connect = options.connect;
      this._migrationsDir = options.migrationsDir;
      this._schema = options.schema ?? 'main';
      this._table = options.table;
      this._template = options.template ?? null;
      this._onProgress = options.onProgress;
      this._registry = new MigrationRegistry({ loader: options.loader, onProgress: options.onProgress });
      this._createCollaborator = options.createCollaborator ?? ((db, schema): SchemaCollaborator => {
         return new SqliteSchemaCollaborator(db, schema);
      });
   }

   /**
    * Build an engine for a resolved config file, connecting to its SQLite database
    * and attaching the schema's database file when one is configured.
    */
   public static fromConfig(
      config: RatchetConfig,
      options: Pick<RatchetOptions, 'onProgress' | 'loader'> = {}
   ): Ratchet {
      return new Ratchet({
         connect: () => {
            const db = new Database(config.databasePath);

            try {
               db.pragma('foreign_keys = ON');

               if (config.attachPath !== null) {
                  db.prepare(`ATTACH DATABASE ? AS ${quoteIdentifier(config.schema)}`).run(config.attachPath);
               }
            } catch(error) {
               db.close();
               throw error;
            }

            return db;
         },
         migrationsDir: config.migrationsDir,
         schema: config.schema,
         table: config.table,
         template: config.template,
         ...options,
      });
   }

   public get migrationsDir(): string {
      return this._migrationsDir;
   }

   /**
    * Create and seed the version table. Reports whether anything was created.
    */
   public async init(): Promise<InitResult> {
      return this._withConnection((db) => {
         return this._versionStore(db).ensureInitialized();
      });
   }

   /**
    * Read the stored version without changing anything.
    */
   public async inspect(): Promise<VersionState> {
      return this._withConnection((db) => {
         return this._versionStore(db).readCurrentVersion();
      });
   }

   /**
    * Highest migration version on disk, or 0 when there are none. Does not touch
    * the database.
    */
   public async latest(): Promise<number> {
      return this._registry.latest(this._migrationsDir);
   }

   /**
    * Apply pending migrations up to `target` ("latest" when omitted).
    *
    * @throws InvalidVersionArgumentError before connecting if the target is malformed
    */
   public async upgrade(target?: unknown): Promise<UpgradeResult> {
      const resolved = parseTarget(target);

      return this._withConnection((db) => {
         const executor = new MigrationExecutor({
            db,
            versionStore: this._versionStore(db),
            registry: this._registry,
            collaborator: this._createCollaborator(db, this._schema),
            migrationsDir: this._migrationsDir,
            onProgress: this._onProgress,
         });

         return executor.upgrade(resolved);
      });
   }

   /**
    * Write the next `version_<N>` file from the configured template.
    */
   public async makeMigration(options: { message?: string; template?: string } = {}): Promise<MakeMigrationResult> {
      return makeMigration({
         directory: this._migrationsDir,
         template: options.template ?? this._template ?? undefined,
         message: options.message,
         registry: this._registry,
      });
   }

   private _versionStore(db: Database.Database): VersionStore {
      return new VersionStore(db, { schema: this._schema, table: this._table });
   }

   private async _withConnection<T>(operation: (db: Database.Database) => T | Promise<T>): Promise<T> {
      const db = this._connect();

      try {
         return await operation(db);
      } finally {
         db.close();
      }
   }

}
