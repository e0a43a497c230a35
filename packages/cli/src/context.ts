/**
 * Shared setup for commands: global options, config loading and the engine.
 */

import type { Command } from 'commander';
import { Ratchet, loadConfig } from '@ratchet/core';
import type { MigrationProgressCallback, RatchetConfig } from '@ratchet/core';

export type GlobalOptions = {
   config?: string;
   verbose?: boolean;
};

export interface CommandContext {
   config: RatchetConfig;
   ratchet: Ratchet;
   verbose: boolean;
}

export function getGlobalOptions(command: Command): GlobalOptions {
   return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Load the config named by `--config` (or RATCHET_CONFIG, or the default file)
 * and build an engine on it.
 */
export async function createContext(command: Command, onProgress?: MigrationProgressCallback): Promise<CommandContext> {
   const { config: configFile, verbose } = getGlobalOptions(command),
         config = await loadConfig({ configFile });

   return {
      config,
      ratchet: Ratchet.fromConfig(config, { onProgress }),
      verbose: verbose ?? false,
   };
}
