/**
 * Schema-mutation types shared by migrations, the SQLite collaborator and the
 * executor. The executor never looks inside an operation; it only hands lists of
 * them back to the collaborator that produced the migrator.
 */

import type { SchemaMigrator } from './migrator.ts';

/**
 * A single schema change, already rendered to the SQL statements that perform it.
 */
export interface SchemaOperation {

   /** Short human-readable summary, e.g. `add column users.email` */
   readonly description: string;

   /** Statements executed in order when the operation is applied */
   readonly statements: readonly string[];
}

/**
 * Column definition accepted by `createTable` and `addColumn`.
 */
export interface ColumnDefinition {
   name: string;

   /** SQLite type name, e.g. `TEXT`, `INTEGER` */
   type: string;
   primaryKey?: boolean;
   notNull?: boolean;
   unique?: boolean;

   /** Literal default; strings are quoted, `null` renders as `NULL` */
   default?: string | number | null;
   references?: {
      table: string;
      column: string;
   };
}

export interface IndexOptions {

   /** Index name (default: `<table>_<col1>_<col2>...`) */
   name?: string;
   unique?: boolean;
}

/**
 * The function a migration file exports as `upgrade`.
 */
export type OperationProducer = (migrator: SchemaMigrator) => SchemaOperation[];

/**
 * External DDL collaborator the executor applies migrations through.
 */
export interface SchemaCollaborator {

   /** Create the handle passed to each migration's `upgrade` function */
   createMigrator(): SchemaMigrator;

   /** Apply operations in order; throws on the first failing statement */
   apply(operations: readonly SchemaOperation[]): void;
}

/**
 * Check that an untyped value has the shape of a SchemaOperation.
 */
export function isSchemaOperation(value: unknown): value is SchemaOperation {
   if (typeof value !== 'object' || value === null) {
      return false;
   }

   if (!('description' in value) || typeof value.description !== 'string') {
      return false;
   }

   return 'statements' in value
      && Array.isArray(value.statements)
      && value.statements.every((statement: unknown) => {
         return typeof statement === 'string';
      });
}
