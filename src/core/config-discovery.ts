import fs from "node:fs";
import path from "node:path";

import { defaultConfig, type EvalSweepConfig } from "./config.js";
import { loadConfig, resolveConfigPaths } from "./config-loader.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_CONFIG_FILE = "evalsweep.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "cwd" | "defaults";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

export type ResolvedConfig = ConfigResolution & {
  config: EvalSweepConfig;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** An explicit path always wins (and must exist); then ./evalsweep.yaml; then defaults. */
export function resolveConfigPath(args: { explicitPath?: string; cwd?: string }): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const cwdConfig = path.join(cwd, DEFAULT_CONFIG_FILE);
  if (fs.existsSync(cwdConfig)) {
    return { configPath: cwdConfig, source: "cwd" };
  }

  return { configPath: null, source: "defaults" };
}

export function loadResolvedConfig(args: { explicitPath?: string; cwd?: string }): ResolvedConfig {
  const resolution = resolveConfigPath(args);
  if (resolution.configPath === null) {
    const config = resolveConfigPaths(defaultConfig(), args.cwd ?? process.cwd());
    return { ...resolution, config };
  }

  return { ...resolution, config: loadConfig(resolution.configPath) };
}
