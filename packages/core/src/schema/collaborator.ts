/**
 * SQLite implementation of the schema collaborator.
 */

import type Database from 'better-sqlite3';
import { SchemaMigrator } from './migrator.ts';
import type { SchemaCollaborator, SchemaOperation } from './types.ts';

export class SqliteSchemaCollaborator implements SchemaCollaborator {

   private readonly _db: Database.Database;
   private readonly _schema: string;

   public constructor(db: Database.Database, schema: string = 'main') {
      this._db = db;
      this._schema = schema;
   }

   public createMigrator(): SchemaMigrator {
      return new SchemaMigrator(this._schema);
   }

   public apply(operations: readonly SchemaOperation[]): void {
      for (const operation of operations) {
         for (const statement of operation.statements) {
            this._db.exec(statement);
         }
      }
   }

}
