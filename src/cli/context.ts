/**
 * shared CLI setup — resolve config once and build the real adapters.
 */

import { loadConfig, type Env, type ResolvedConfig } from "../config.js";
import { createSyncAdapters } from "../adapters/index.js";
import { createFileNotePersistenceAdapter } from "../persist/filesystem.js";
import { ensureDirectories, type CycleDependencies } from "../cycle.js";

export function loadConfigOrExit(env: Env = process.env): ResolvedConfig {
  const config = loadConfig({ env, cwd: process.cwd() });
  if (config.isErr()) {
    console.error(`invalid configuration: ${config.error.message}`);
    process.exit(1);
  }
  return config.value;
}

export function createCycleDependencies(config: ResolvedConfig): CycleDependencies {
  ensureDirectories(config);
  return {
    config,
    adapters: createSyncAdapters(config),
    persistence: createFileNotePersistenceAdapter({ outputDir: config.paths.outputDir }),
  };
}
