/**
 * @ratchet/core - Forward-only schema migrations for SQLite
 *
 * Tracks a single version marker in the database and applies `version_<N>`
 * migration files in ascending order, one transaction per upgrade.
 */

export const VERSION = '0.1.0';

// ============================================================================
// Engine
// ============================================================================

export { Ratchet, parseTarget } from './ratchet.ts';
export type { RatchetOptions } from './ratchet.ts';

export { VersionStore, DEFAULT_VERSION_TABLE, parseVersion } from './version-store.ts';
export type { VersionStoreConfig } from './version-store.ts';

export {
   MigrationRegistry,
   importMigrationLoader,
   latestVersion,
   MIGRATION_PREFIX,
   MIGRATION_EXTENSIONS,
} from './registry.ts';
export type { MigrationLoader, DirectoryLister, MigrationRegistryConfig } from './registry.ts';

export { MigrationExecutor, selectBatch } from './executor.ts';
export type { MigrationExecutorConfig } from './executor.ts';

export type {
   MigrationDescriptor,
   MigrationProgress,
   MigrationProgressCallback,
   UpgradeTarget,
   UpgradeResult,
   AppliedMigration,
   InitResult,
   VersionState,
} from './types.ts';

// ============================================================================
// Schema operations
// ============================================================================

export { SchemaMigrator, SqliteSchemaCollaborator, isSchemaOperation, quoteIdentifier } from './schema/index.ts';
export type {
   SchemaOperation,
   SchemaCollaborator,
   ColumnDefinition,
   IndexOptions,
   OperationProducer,
} from './schema/index.ts';

// ============================================================================
// Errors
// ============================================================================

export {
   RatchetError,
   NotInitializedError,
   MigrationDirectoryNotFoundError,
   VersionParseError,
   VersionAheadOfMigrationsError,
   InvalidVersionArgumentError,
   MigrationApplicationError,
   InvalidMigrationError,
   ConfigurationError,
   MigrationFileExistsError,
   getErrorMessage,
} from './errors.ts';

// ============================================================================
// Configuration
// ============================================================================

export {
   loadConfig,
   parseConfig,
   resolveConfigFile,
   configSchema,
   CONFIG_ENV_VAR,
   DEFAULT_CONFIG_FILE,
} from './config.ts';
export type { RatchetConfig, RatchetConfigFile, LoadConfigOptions } from './config.ts';

// ============================================================================
// Scaffolding
// ============================================================================

export { makeMigration, templateExtension, DEFAULT_TEMPLATE } from './scaffold.ts';
export type { MakeMigrationOptions, MakeMigrationResult } from './scaffold.ts';

// ============================================================================
// Utilities
// ============================================================================

export { pluralize, describeVersionState } from './utils.ts';
