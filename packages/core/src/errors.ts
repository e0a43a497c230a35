/**
 * Error taxonomy for the migration engine.
 *
 * Every failure the engine surfaces extends RatchetError so hosts can tell engine
 * conditions apart from programming errors.
 */

/**
 * Base class for all engine errors.
 */
export class RatchetError extends Error {

   public readonly name: string = 'RatchetError';

}

/**
 * Raised when an operation needs the version table but `init` has not been run.
 */
export class NotInitializedError extends RatchetError {

   public readonly name = 'NotInitializedError';

   public constructor() {
      super('Database is not initialized; run "ratchet init" to create the version table');
   }

}

/**
 * Raised when the configured migrations directory cannot be listed.
 */
export class MigrationDirectoryNotFoundError extends RatchetError {

   public readonly name = 'MigrationDirectoryNotFoundError';

   public constructor(public readonly directory: string) {
      super(`Unable to find migrations directory "${directory}"`);
   }

}

/**
 * Raised when a stored or computed version is not a non-negative integer.
 */
export class VersionParseError extends RatchetError {

   public readonly name = 'VersionParseError';

   public constructor(public readonly raw: string) {
      super(`Current database version "${raw}" is not a valid version number`);
   }

}

/**
 * Raised when the database is at a version newer than any migration on disk.
 */
export class VersionAheadOfMigrationsError extends RatchetError {

   public readonly name = 'VersionAheadOfMigrationsError';

   public constructor(
      public readonly currentVersion: number,
      public readonly latestVersion: number
   ) {
      super(
         `Database version is higher than the latest migration ` +
         `(current: ${currentVersion}, latest: ${latestVersion})`
      );
   }

}

/**
 * Raised when an upgrade target is neither an integer nor "latest".
 */
export class InvalidVersionArgumentError extends RatchetError {

   public readonly name = 'InvalidVersionArgumentError';

   public constructor(public readonly value: unknown) {
      super(`Unable to parse version "${String(value)}"; expected a number or "latest"`);
   }

}

/**
 * Raised when a migration fails while its batch is being applied. The batch
 * transaction has been rolled back by the time this reaches the caller.
 */
export class MigrationApplicationError extends RatchetError {

   public readonly name = 'MigrationApplicationError';

   public constructor(
      public readonly identifier: string,
      public readonly version: number,
      cause: unknown
   ) {
      super(
         `Migration ${identifier} (version ${version}) failed: ` +
         `${cause instanceof Error ? cause.message : String(cause)}`,
         { cause }
      );
   }

}

/**
 * Raised when a migration file does not have the expected shape.
 */
export class InvalidMigrationError extends RatchetError {

   public readonly name = 'InvalidMigrationError';

   public constructor(public readonly file: string, reason: string) {
      super(`Invalid migration ${file}: ${reason}`);
   }

}

/**
 * Raised when the configuration file is missing or malformed.
 */
export class ConfigurationError extends RatchetError {

   public readonly name = 'ConfigurationError';

}

/**
 * Raised by scaffolding when the next migration file is already present.
 */
export class MigrationFileExistsError extends RatchetError {

   public readonly name = 'MigrationFileExistsError';

   public constructor(public readonly file: string) {
      super(`Migration file already exists: ${file}`);
   }

}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
   return error instanceof Error ? error.message : String(error);
}
