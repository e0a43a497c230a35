/**
 * Scaffolding for new migration files.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError, MigrationDirectoryNotFoundError, MigrationFileExistsError } from './errors.ts';
import { MIGRATION_EXTENSIONS, MIGRATION_PREFIX, MigrationRegistry } from './registry.ts';

export const DEFAULT_TEMPLATE = fileURLToPath(new URL('../templates/migration.ts.tmpl', import.meta.url));

export interface MakeMigrationOptions {

   /** Migrations directory the new file is written to */
   directory: string;

   /** Template file (default: the bundled TypeScript template) */
   template?: string;

   /** Written as a leading comment in the new file */
   message?: string;

   /** Registry used to find the current latest version */
   registry?: MigrationRegistry;
}

export interface MakeMigrationResult {
   file: string;
   version: number;
}

/**
 * Pick the new file's extension from the template name: `foo.ts.tmpl` and
 * `foo.ts` both give `.ts`. Unknown extensions fall back to `.ts`.
 */
export function templateExtension(template: string): string {
   const base = path.basename(template).replace(/\.tmpl$/, ''),
         extension = path.extname(base);

   return MIGRATION_EXTENSIONS.includes(extension) ? extension : '.ts';
}

/**
 * Create `version_<latest + 1>` from a template in the migrations directory.
 *
 * @throws MigrationDirectoryNotFoundError if the directory does not exist
 * @throws MigrationFileExistsError if the target file is already present
 */
export async function makeMigration(options: MakeMigrationOptions): Promise<MakeMigrationResult> {
   const registry = options.registry ?? new MigrationRegistry(),
         template = options.template ?? DEFAULT_TEMPLATE;

   const version = (await registry.latest(options.directory)) + 1,
         file = path.join(path.resolve(options.directory), `${MIGRATION_PREFIX}${version}${templateExtension(template)}`);

   let content: string;

   try {
      content = await fs.readFile(template, 'utf-8');
   } catch(e) {
      if ((e as NodeJS.ErrnoException).code !== 'ENOENT') {
         throw e;
      }

      throw new ConfigurationError(`Unable to read migration template ${template}`);
   }

   if (options.message) {
      const comment = options.message
         .split(/\r?\n/)
         .map((line) => {
            return `// ${line}`.trimEnd();
         })
         .join('\n');

      content = `${comment}\n\n${content}`;
   }

   try {
      // 'wx' refuses to replace an existing file
      await fs.writeFile(file, content, { encoding: 'utf-8', flag: 'wx' });
   } catch(e) {
      const code = (e as NodeJS.ErrnoException).code;

      if (code === 'EEXIST') {
         throw new MigrationFileExistsError(file);
      }

      if (code === 'ENOENT') {
         throw new MigrationDirectoryNotFoundError(options.directory);
      }

      throw e;
   }

   return { file, version };
}
