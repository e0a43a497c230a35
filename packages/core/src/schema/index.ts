export { SchemaMigrator, quoteIdentifier, renderColumn } from './migrator.ts';
export { SqliteSchemaCollaborator } from './collaborator.ts';
export { isSchemaOperation } from './types.ts';
export type {
   SchemaOperation,
   SchemaCollaborator,
   ColumnDefinition,
   IndexOptions,
   OperationProducer,
} from './types.ts';
