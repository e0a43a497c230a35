/**
 * SchemaMigrator - the handle migrations use to describe schema changes.
 *
 * Every method only builds a SchemaOperation; nothing touches the database until
 * the collaborator applies the returned list. Table and index names are qualified
 * with the configured schema where SQLite allows it.
 */

import type { ColumnDefinition, IndexOptions, SchemaOperation } from './types.ts';

export function quoteIdentifier(name: string): string {
   return `"${name.replace(/"/g, '""')}"`;
}

function renderLiteral(value: string | number | null): string {
   if (value === null) {
      return 'NULL';
   }

   if (typeof value === 'number') {
      return String(value);
   }

   return `'${value.replace(/'/g, '\'\'')}'`;
}

export function renderColumn(column: ColumnDefinition): string {
   const parts = [ quoteIdentifier(column.name), column.type ];

   if (column.primaryKey) {
      parts.push('PRIMARY KEY');
   }

   if (column.notNull) {
      parts.push('NOT NULL');
   }

   if (column.unique) {
      parts.push('UNIQUE');
   }

   if (column.default !== undefined) {
      parts.push(`DEFAULT ${renderLiteral(column.default)}`);
   }

   if (column.references) {
      parts.push(`REFERENCES ${quoteIdentifier(column.references.table)}(${quoteIdentifier(column.references.column)})`);
   }

   return parts.join(' ');
}

export class SchemaMigrator {

   private readonly _schema: string;

   public constructor(schema: string = 'main') {
      this._schema = schema;
   }

   public get schema(): string {
      return this._schema;
   }

   public createTable(table: string, columns: ColumnDefinition[]): SchemaOperation {
      const body = columns.map(renderColumn).join(', ');

      return {
         description: `create table ${table}`,
         statements: [ `CREATE TABLE ${this._qualify(table)} (${body})` ],
      };
   }

   public dropTable(table: string, options: { ifExists?: boolean } = {}): SchemaOperation {
      const ifExists = options.ifExists ? 'IF EXISTS ' : '';

      return {
         description: `drop table ${table}`,
         statements: [ `DROP TABLE ${ifExists}${this._qualify(table)}` ],
      };
   }

   public renameTable(from: string, to: string): SchemaOperation {
      return {
         description: `rename table ${from} to ${to}`,
         statements: [ `ALTER TABLE ${this._qualify(from)} RENAME TO ${quoteIdentifier(to)}` ],
      };
   }

   public addColumn(table: string, column: ColumnDefinition): SchemaOperation {
      return {
         description: `add column ${table}.${column.name}`,
         statements: [ `ALTER TABLE ${this._qualify(table)} ADD COLUMN ${renderColumn(column)}` ],
      };
   }

   public dropColumn(table: string, column: string): SchemaOperation {
      return {
         description: `drop column ${table}.${column}`,
         statements: [ `ALTER TABLE ${this._qualify(table)} DROP COLUMN ${quoteIdentifier(column)}` ],
      };
   }

   public renameColumn(table: string, from: string, to: string): SchemaOperation {
      return {
         description: `rename column ${table}.${from} to ${to}`,
         statements: [
            `ALTER TABLE ${this._qualify(table)} RENAME COLUMN ${quoteIdentifier(from)} TO ${quoteIdentifier(to)}`,
         ],
      };
   }

   public addIndex(table: string, columns: string[], options: IndexOptions = {}): SchemaOperation {
      const name = options.name ?? [ table, ...columns ].join('_'),
            unique = options.unique ? 'UNIQUE ' : '',
            columnList = columns.map(quoteIdentifier).join(', ');

      // SQLite qualifies the index name, never the indexed table
      return {
         description: `add ${unique.toLowerCase()}index ${name}`,
         statements: [ `CREATE ${unique}INDEX ${this._qualify(name)} ON ${quoteIdentifier(table)} (${columnList})` ],
      };
   }

   public dropIndex(name: string): SchemaOperation {
      return {
         description: `drop index ${name}`,
         statements: [ `DROP INDEX ${this._qualify(name)}` ],
      };
   }

   /**
    * Escape hatch for anything the builder methods do not cover.
    */
   public sql(statement: string, description: string = 'raw sql'): SchemaOperation {
      return { description, statements: [ statement ] };
   }

   private _qualify(name: string): string {
      return `${quoteIdentifier(this._schema)}.${quoteIdentifier(name)}`;
   }

}
