/**
 * VersionStore - Persists the single version marker row.
 *
 * The marker lives in `"<schema>"."<table>"` with one `ref TEXT PRIMARY KEY`
 * column. The table holds no row before `init` and exactly one afterwards; the row
 * is replaced by delete-then-insert, never updated in place.
 */

import Database from 'better-sqlite3';
import { VersionParseError } from './errors.ts';
import { quoteIdentifier } from './schema/migrator.ts';
import type { InitResult, VersionState } from './types.ts';

export const DEFAULT_VERSION_TABLE = 'ratchet_version';

const VERSION_PATTERN = /^\d+$/;

/**
 * Parse a stored marker value. Only plain base-10 digits are accepted.
 *
 * @throws VersionParseError if the value is not a non-negative safe integer
 */
export function parseVersion(raw: string): number {
   if (!VERSION_PATTERN.test(raw)) {
      throw new VersionParseError(raw);
   }

   const version = Number.parseInt(raw, 10);

   if (!Number.isSafeInteger(version)) {
      throw new VersionParseError(raw);
   }

   return version;
}

export interface VersionStoreConfig {

   /** Schema (SQLite database name) holding the table (default: "main") */
   schema?: string;

   /** Table name (default: "ratchet_version") */
   table?: string;
}

export class VersionStore {

   private readonly _db: Database.Database;
   private readonly _tableName: string;

   public constructor(db: Database.Database, config: VersionStoreConfig = {}) {
      this._db = db;
      this._tableName = `${quoteIdentifier(config.schema ?? 'main')}.${quoteIdentifier(config.table ?? DEFAULT_VERSION_TABLE)}`;
   }

   /**
    * Create the version table if it is missing and seed it with version 0 when it
    * has no row. Safe to call repeatedly.
    */
   public ensureInitialized(): InitResult {
      const initialize = this._db.transaction((): InitResult => {
         this._db.exec(`CREATE TABLE IF NOT EXISTS ${this._tableName} (ref TEXT PRIMARY KEY)`);

         const existing = this._readRef();

         if (existing !== undefined) {
            return { created: false, version: existing };
         }

         this._db.prepare(`INSERT INTO ${this._tableName} (ref) VALUES (?)`).run('0');

         return { created: true, version: '0' };
      });

      return initialize();
   }

   /**
    * Read the persisted version. Never throws for a missing table or an
    * unparsable value; those come back as distinct states.
    */
   public readCurrentVersion(): VersionState {
      let raw: string | undefined;

      try {
         raw = this._readRef();
      } catch(error) {
         // Missing table or unknown schema
         if (error instanceof Database.SqliteError) {
            return { status: 'uninitialized' };
         }

         throw error;
      }

      if (raw === undefined) {
         return { status: 'uninitialized' };
      }

      try {
         return { status: 'ok', version: parseVersion(raw) };
      } catch(error) {
         if (error instanceof VersionParseError) {
            return { status: 'invalid', raw, error };
         }

         throw error;
      }
   }

   /**
    * Replace the marker row. Must run inside the caller's transaction so that the
    * version bump commits or rolls back together with the migrations.
    */
   public writeVersion(version: number): void {
      if (!Number.isSafeInteger(version) || version < 0) {
         throw new VersionParseError(String(version));
      }

      this._db.prepare(`DELETE FROM ${this._tableName}`).run();
      this._db.prepare(`INSERT INTO ${this._tableName} (ref) VALUES (?)`).run(String(version));
   }

   private _readRef(): string | undefined {
      const row = this._db
         .prepare(`SELECT ref FROM ${this._tableName} LIMIT 1`)
         .get() as { ref: unknown } | undefined;

      if (row === undefined) {
         return undefined;
      }

      return String(row.ref);
   }

}
