#!/usr/bin/env -S node --import tsx
/**
 * @ratchet/cli - Command-line interface for ratchet
 *
 * Initializes, inspects and upgrades SQLite databases from versioned migration files.
 */

import { createProgram } from './program.ts';

await createProgram().parseAsync();
