/**
 * Tests for the Ratchet facade
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { Ratchet, parseTarget } from '../ratchet.ts';
import {
   InvalidVersionArgumentError,
   MigrationDirectoryNotFoundError,
   NotInitializedError,
} from '../errors.ts';
import type { MigrationProgress } from '../types.ts';
import { FIXTURE_TABLES } from './fixtures/migrations/helpers.ts';

const currentDir = path.dirname(fileURLToPath(import.meta.url));

const FIXTURE_MIGRATIONS = path.join(currentDir, 'fixtures', 'migrations');

describe('parseTarget', () => {
   it('defaults to latest', () => {
      expect(parseTarget(undefined)).toBe('latest');
      expect(parseTarget(null)).toBe('latest');
      expect(parseTarget('latest')).toBe('latest');
   });

   it('accepts integers and numeric strings', () => {
      expect(parseTarget(4)).toBe(4);
      expect(parseTarget(0)).toBe(0);
      expect(parseTarget('12')).toBe(12);
   });

   it.each([ 'newest', '1.5', '-2', '', ' 3', -1, 2.5, true ])('rejects %j', (value) => {
      expect(() => parseTarget(value)).toThrow(InvalidVersionArgumentError);
   });
});

describe('Ratchet', () => {
   let tempDir: string,
       dbPath: string,
       connections: Database.Database[],
       connect: () => Database.Database;

   function createRatchet(migrationsDir: string = FIXTURE_MIGRATIONS, events: MigrationProgress[] = []): Ratchet {
      return new Ratchet({
         connect,
         migrationsDir,
         onProgress: (event) => {
            events.push(event);
         },
      });
   }

   function userTables(): string[] {
      const db = new Database(dbPath);

      try {
         const rows = db.prepare(`
            SELECT name FROM sqlite_master
            WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name != 'ratchet_version'
            ORDER BY name
         `).all() as Array<{ name: string }>;

         return rows.map((row) => row.name);
      } finally {
         db.close();
      }
   }

   beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ratchet-facade-test-'));
      dbPath = path.join(tempDir, 'test.sqlite');
      connections = [];
      connect = vi.fn(() => {
         const db = new Database(dbPath);

         connections.push(db);

         return db;
      });
   });

   afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
   });

   it('reports an uninitialized database from inspect', async () => {
      expect(await createRatchet().inspect()).toEqual({ status: 'uninitialized' });
   });

   it('initializes once and reports existing state afterwards', async () => {
      const ratchet = createRatchet();

      expect(await ratchet.init()).toEqual({ created: true, version: '0' });
      expect(await ratchet.init()).toEqual({ created: false, version: '0' });
      expect(await ratchet.inspect()).toEqual({ status: 'ok', version: 0 });
   });

   it('reports the latest migration on disk without connecting', async () => {
      expect(await createRatchet().latest()).toBe(10);
      expect(connect).not.toHaveBeenCalled();
   });

   it('upgrades to the latest migration', async () => {
      const ratchet = createRatchet();

      await ratchet.init();

      const result = await ratchet.upgrade();

      expect(result).toEqual({
         status: 'upgraded',
         fromVersion: 0,
         toVersion: 10,
         applied: [
            { identifier: 'version_1', version: 1, operations: 1 },
            { identifier: 'version_2', version: 2, operations: 2 },
            { identifier: 'version_10', version: 10, operations: 1 },
         ],
      });
      expect(userTables()).toEqual(FIXTURE_TABLES);
      expect(await ratchet.inspect()).toEqual({ status: 'ok', version: 10 });
      expect(await ratchet.upgrade('latest')).toEqual({ status: 'up-to-date', version: 10 });
   });

   it('upgrades to a numeric target given as a string', async () => {
      const ratchet = createRatchet();

      await ratchet.init();

      expect(await ratchet.upgrade('2')).toMatchObject({ status: 'upgraded', toVersion: 2 });
      expect(userTables()).toEqual([ 'users' ]);
   });

   it('rejects an invalid target before connecting', async () => {
      await expect(createRatchet().upgrade('newest')).rejects.toBeInstanceOf(InvalidVersionArgumentError);
      expect(connect).not.toHaveBeenCalled();
   });

   it('closes the connection when an operation fails', async () => {
      await expect(createRatchet().upgrade()).rejects.toBeInstanceOf(NotInitializedError);

      expect(connections).toHaveLength(1);
      expect(connections[0].open).toBe(false);
   });

   it('closes the connection after each successful operation', async () => {
      const ratchet = createRatchet();

      await ratchet.init();
      await ratchet.inspect();

      expect(connections).toHaveLength(2);
      expect(connections.every((db) => !db.open)).toBe(true);
   });

   it('reports a missing migrations directory', async () => {
      const ratchet = createRatchet(path.join(tempDir, 'missing'));

      await ratchet.init();

      await expect(ratchet.upgrade()).rejects.toBeInstanceOf(MigrationDirectoryNotFoundError);
      await expect(ratchet.latest()).rejects.toBeInstanceOf(MigrationDirectoryNotFoundError);
   });

   it('forwards discovery warnings to onProgress', async () => {
      const events: MigrationProgress[] = [];

      await createRatchet(FIXTURE_MIGRATIONS, events).latest();

      expect(events.filter((e) => e.type === 'migration-skipped')).toEqual([
         {
            type: 'migration-skipped',
            entry: 'version_next.ts',
            reason: 'cannot parse version number from "version_next"',
         },
      ]);
   });

   it('builds from a resolved config', async () => {
      const ratchet = Ratchet.fromConfig({
         configFile: path.join(tempDir, 'ratchet.config.json'),
         databasePath: dbPath,
         schema: 'main',
         attachPath: null,
         table: 'schema_version',
         migrationsDir: FIXTURE_MIGRATIONS,
         template: null,
      });

      await ratchet.init();

      const db = new Database(dbPath);

      try {
         const row = db.prepare('SELECT ref FROM schema_version').get() as { ref: string };

         expect(row.ref).toBe('0');
      } finally {
         db.close();
      }

      expect(ratchet.migrationsDir).toBe(FIXTURE_MIGRATIONS);
   });

   it('keeps a non-main schema in its attached database file', async () => {
      const auditPath = path.join(tempDir, 'audit.sqlite');

      const ratchet = Ratchet.fromConfig({
         configFile: path.join(tempDir, 'ratchet.config.json'),
         databasePath: dbPath,
         schema: 'audit',
         attachPath: auditPath,
         table: 'ratchet_version',
         migrationsDir: FIXTURE_MIGRATIONS,
         template: null,
      });

      expect(await ratchet.init()).toEqual({ created: true, version: '0' });
      expect(await ratchet.init()).toEqual({ created: false, version: '0' });
      expect(await ratchet.upgrade()).toMatchObject({ status: 'upgraded', toVersion: 10 });
      expect(await ratchet.inspect()).toEqual({ status: 'ok', version: 10 });

      const audit = new Database(auditPath);

      try {
         const rows = audit.prepare(`
            SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name
         `).all() as Array<{ name: string }>;

         expect(rows.map((row) => row.name)).toEqual([ 'posts', 'ratchet_version', 'users' ]);
      } finally {
         audit.close();
      }

      expect(userTables()).toEqual([]);
   });

   it('writes the next migration file', async () => {
      const migrationsDir = path.join(tempDir, 'migrations');

      await fs.mkdir(migrationsDir);

      const result = await createRatchet(migrationsDir).makeMigration({ message: 'create accounts' });

      expect(result).toEqual({ file: path.join(migrationsDir, 'version_1.ts'), version: 1 });

      const content = await fs.readFile(result.file, 'utf-8');

      expect(content.startsWith('// create accounts\n\nimport type { SchemaMigrator, SchemaOperation }')).toBe(true);
   });
});
