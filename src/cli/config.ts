import type { ReleaseSyncConfig } from "../core/config.js";
import { loadReleaseSyncConfig, resolveConfigPath } from "../core/config-loader.js";
import { buildRepositorySpecs, type RepositorySpec } from "../core/repository-spec.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type CliConfig = {
  config: ReleaseSyncConfig;
  configPath: string;
  specs: RepositorySpec[];
};

/** Configuration problems surface here, before any repository work starts. */
export function loadConfigForCli(args: LoadConfigForCliArgs = {}): CliConfig {
  const cwd = args.cwd ?? process.cwd();
  const configPath = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd });
  const config = loadReleaseSyncConfig(configPath);

  return { config, configPath, specs: buildRepositorySpecs(config, cwd) };
}
