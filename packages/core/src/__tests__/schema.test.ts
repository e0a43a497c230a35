/**
 * Tests for the SQLite schema migrator and collaborator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SchemaMigrator, quoteIdentifier, renderColumn } from '../schema/migrator.ts';
import { SqliteSchemaCollaborator } from '../schema/collaborator.ts';
import { isSchemaOperation } from '../schema/types.ts';

describe('quoteIdentifier', () => {
   it('wraps names in double quotes and escapes embedded quotes', () => {
      expect(quoteIdentifier('users')).toBe('"users"');
      expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
   });
});

describe('renderColumn', () => {
   it('renders constraints in a fixed order', () => {
      expect(renderColumn({ name: 'id', type: 'INTEGER', primaryKey: true, notNull: true }))
         .toBe('"id" INTEGER PRIMARY KEY NOT NULL');
   });

   it('renders literal defaults', () => {
      expect(renderColumn({ name: 'note', type: 'TEXT', default: 'it\'s' })).toBe('"note" TEXT DEFAULT \'it\'\'s\'');
      expect(renderColumn({ name: 'count', type: 'INTEGER', default: 0 })).toBe('"count" INTEGER DEFAULT 0');
      expect(renderColumn({ name: 'deleted_at', type: 'TEXT', default: null })).toBe('"deleted_at" TEXT DEFAULT NULL');
   });

   it('renders unique columns and references', () => {
      expect(renderColumn({
         name: 'user_id',
         type: 'INTEGER',
         unique: true,
         references: { table: 'users', column: 'id' },
      })).toBe('"user_id" INTEGER UNIQUE REFERENCES "users"("id")');
   });
});

describe('SchemaMigrator', () => {
   const migrator = new SchemaMigrator();

   it('builds create and drop table operations', () => {
      expect(migrator.createTable('users', [
         { name: 'id', type: 'INTEGER', primaryKey: true },
         { name: 'name', type: 'TEXT', notNull: true },
      ])).toEqual({
         description: 'create table users',
         statements: [ 'CREATE TABLE "main"."users" ("id" INTEGER PRIMARY KEY, "name" TEXT NOT NULL)' ],
      });

      expect(migrator.dropTable('users', { ifExists: true }).statements)
         .toEqual([ 'DROP TABLE IF EXISTS "main"."users"' ]);
   });

   it('builds rename operations', () => {
      expect(migrator.renameTable('users', 'people').statements)
         .toEqual([ 'ALTER TABLE "main"."users" RENAME TO "people"' ]);
      expect(migrator.renameColumn('users', 'name', 'full_name').statements)
         .toEqual([ 'ALTER TABLE "main"."users" RENAME COLUMN "name" TO "full_name"' ]);
   });

   it('builds column operations', () => {
      expect(migrator.addColumn('users', { name: 'email', type: 'TEXT' })).toEqual({
         description: 'add column users.email',
         statements: [ 'ALTER TABLE "main"."users" ADD COLUMN "email" TEXT' ],
      });
      expect(migrator.dropColumn('users', 'email').statements)
         .toEqual([ 'ALTER TABLE "main"."users" DROP COLUMN "email"' ]);
   });

   it('builds index operations with a derived name', () => {
      expect(migrator.addIndex('users', [ 'name', 'email' ])).toEqual({
         description: 'add index users_name_email',
         statements: [ 'CREATE INDEX "main"."users_name_email" ON "users" ("name", "email")' ],
      });
      expect(migrator.addIndex('users', [ 'email' ], { unique: true, name: 'uniq_email' }).statements)
         .toEqual([ 'CREATE UNIQUE INDEX "main"."uniq_email" ON "users" ("email")' ]);
      expect(migrator.dropIndex('uniq_email').statements).toEqual([ 'DROP INDEX "main"."uniq_email"' ]);
   });

   it('passes raw sql through', () => {
      expect(migrator.sql('UPDATE users SET name = trim(name)', 'trim names')).toEqual({
         description: 'trim names',
         statements: [ 'UPDATE users SET name = trim(name)' ],
      });
   });

   it('qualifies names with a custom schema', () => {
      const audit = new SchemaMigrator('audit');

      expect(audit.schema).toBe('audit');
      expect(audit.dropTable('events').statements).toEqual([ 'DROP TABLE "audit"."events"' ]);
   });
});

describe('isSchemaOperation', () => {
   it('accepts operations built by the migrator', () => {
      expect(isSchemaOperation(new SchemaMigrator().dropIndex('x'))).toBe(true);
   });

   it('rejects values of the wrong shape', () => {
      expect(isSchemaOperation(null)).toBe(false);
      expect(isSchemaOperation('DROP TABLE users')).toBe(false);
      expect(isSchemaOperation({ description: 'x' })).toBe(false);
      expect(isSchemaOperation({ description: 1, statements: [] })).toBe(false);
      expect(isSchemaOperation({ description: 'x', statements: [ 1 ] })).toBe(false);
   });
});

describe('SqliteSchemaCollaborator', () => {
   let db: Database.Database;

   function columnNames(table: string): string[] {
      const rows = db.prepare(`PRAGMA table_info(${quoteIdentifier(table)})`).all() as Array<{ name: string }>;

      return rows.map((row) => row.name);
   }

   beforeEach(() => {
      db = new Database(':memory:');
   });

   afterEach(() => {
      db.close();
   });

   it('applies operations in order', () => {
      const collaborator = new SqliteSchemaCollaborator(db),
            migrator = collaborator.createMigrator();

      collaborator.apply([
         migrator.createTable('users', [ { name: 'id', type: 'INTEGER', primaryKey: true } ]),
         migrator.addColumn('users', { name: 'name', type: 'TEXT' }),
         migrator.renameColumn('users', 'name', 'full_name'),
         migrator.addIndex('users', [ 'full_name' ]),
      ]);

      expect(columnNames('users')).toEqual([ 'id', 'full_name' ]);

      const index = db.prepare('SELECT name FROM sqlite_master WHERE type = \'index\' AND tbl_name = ?').get('users') as { name: string };

      expect(index.name).toBe('users_full_name');
   });

   it('stops at the first failing statement', () => {
      const collaborator = new SqliteSchemaCollaborator(db),
            migrator = collaborator.createMigrator();

      expect(() => collaborator.apply([
         migrator.createTable('first', [ { name: 'id', type: 'INTEGER' } ]),
         migrator.dropColumn('missing', 'id'),
         migrator.createTable('second', [ { name: 'id', type: 'INTEGER' } ]),
      ])).toThrow(Database.SqliteError);

      expect(columnNames('first')).toEqual([ 'id' ]);
      expect(columnNames('second')).toEqual([]);
   });
});
