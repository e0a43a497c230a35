/**
 * Configuration - Locates, validates and resolves the ratchet config file.
 *
 * Lookup order:
 *   1. An explicit path (the CLI's `--config` option)
 *   2. The RATCHET_CONFIG environment variable
 *   3. `ratchet.config.json` in the working directory
 *
 * File format:
 *   {
 *     "database": { "path": "data/app.sqlite", "schema": "main", "attach": null },
 *     "migrations": { "location": "migrations", "table": "ratchet_version" }
 *   }
 *
 * A schema other than "main" names a second database file, given by `attach`,
 * that is attached under that name on every connection.
 *
 * Relative paths resolve against the working directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.ts';
import { DEFAULT_VERSION_TABLE } from './version-store.ts';

export const CONFIG_ENV_VAR = 'RATCHET_CONFIG';

export const DEFAULT_CONFIG_FILE = 'ratchet.config.json';

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

export const configSchema = z.object({
   database: z.object({
      path: z.string().min(1),
      schema: identifier.default('main'),
      attach: z.string().min(1).nullable().default(null),
   }).superRefine((database, ctx) => {
      if (database.schema.toLowerCase() === 'temp') {
         ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [ 'schema' ],
            message: 'the temp schema is discarded when the connection closes',
         });
      } else if (database.schema === 'main' && database.attach !== null) {
         ctx.addIssue({ code: z.ZodIssueCode.custom, path: [ 'attach' ], message: 'only used with a schema other than main' });
      } else if (database.schema !== 'main' && database.attach === null) {
         ctx.addIssue({ code: z.ZodIssueCode.custom, path: [ 'attach' ], message: `required for schema "${database.schema}"` });
      }
   }),
   migrations: z.object({
      location: z.string().min(1).default('migrations'),
      table: identifier.default(DEFAULT_VERSION_TABLE),
      template: z.string().min(1).nullable().default(null),
   }).default({}),
});

export type RatchetConfigFile = z.input<typeof configSchema>;

/**
 * Fully resolved configuration with absolute paths.
 */
export interface RatchetConfig {

   /** Config file the values came from */
   configFile: string;

   /** Absolute path of the SQLite database file */
   databasePath: string;

   /** Schema (SQLite database name) holding the version table */
   schema: string;

   /** Absolute path of the database file attached as `schema`, when it is not "main" */
   attachPath: string | null;

   /** Version table name */
   table: string;

   /** Absolute path of the migrations directory */
   migrationsDir: string;

   /** Absolute path of a custom migration template, if configured */
   template: string | null;
}

export interface LoadConfigOptions {

   /** Explicit config file path; takes precedence over the environment */
   configFile?: string;

   /** Base for relative paths (default: process.cwd()) */
   cwd?: string;

   /** Environment to read RATCHET_CONFIG from (default: process.env) */
   env?: NodeJS.ProcessEnv;
}

/**
 * Work out which config file to read and where that choice came from.
 */
export function resolveConfigFile(options: LoadConfigOptions = {}): { file: string; source: 'option' | 'env' | 'default' } {
   const cwd = options.cwd ?? process.cwd(),
         // eslint-disable-next-line no-process-env
         env = options.env ?? process.env;

   if (options.configFile) {
      return { file: path.resolve(cwd, options.configFile), source: 'option' };
   }

   const fromEnv = env[CONFIG_ENV_VAR];

   if (fromEnv) {
      return { file: path.resolve(cwd, fromEnv), source: 'env' };
   }

   return { file: path.resolve(cwd, DEFAULT_CONFIG_FILE), source: 'default' };
}

function formatIssues(error: z.ZodError): string {
   return error.issues
      .map((issue) => {
         const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';

         return `${key}: ${issue.message}`;
      })
      .join('; ');
}

/**
 * Validate a parsed config object and resolve its paths.
 *
 * @throws ConfigurationError listing every invalid key
 */
export function parseConfig(raw: unknown, configFile: string, cwd: string = process.cwd()): RatchetConfig {
   const parsed = configSchema.safeParse(raw);

   if (!parsed.success) {
      throw new ConfigurationError(`Invalid config file ${configFile}: ${formatIssues(parsed.error)}`);
   }

   const { database, migrations } = parsed.data;

   return {
      configFile,
      databasePath: path.resolve(cwd, database.path),
      schema: database.schema,
      attachPath: database.attach === null ? null : path.resolve(cwd, database.attach),
      table: migrations.table,
      migrationsDir: path.resolve(cwd, migrations.location),
      template: migrations.template === null ? null : path.resolve(cwd, migrations.template),
   };
}

/**
 * Locate, read and validate the config file.
 *
 * @throws ConfigurationError if the file is missing, not JSON, or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RatchetConfig> {
   const cwd = options.cwd ?? process.cwd(),
         { file, source } = resolveConfigFile(options);

   let content: string;

   try {
      content = await fs.readFile(file, 'utf-8');
   } catch(e) {
      if ((e as NodeJS.ErrnoException).code !== 'ENOENT') {
         throw e;
      }

      const hint = source === 'env' ? ` (from ${CONFIG_ENV_VAR})` : '';

      throw new ConfigurationError(`Unable to load config file ${file}${hint}`);
   }

   let raw: unknown;

   try {
      raw = JSON.parse(content);
   } catch(error) {
      throw new ConfigurationError(
         `Config file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
   }

   return parseConfig(raw, file, cwd);
}
