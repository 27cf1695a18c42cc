import { loadConfig, type LoadedConfig } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Order: --config, then $MSBATCH_CONFIG, then ./msbatch.yaml, then built-in
// defaults. A missing explicit file is an error; a missing implicit one is not.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): LoadedConfig {
  return loadConfig({ explicitPath: args.explicitConfigPath, cwd: args.cwd ?? process.cwd() });
}
