/**
 * loadAppContext resolves the config file and paths for app entrypoints.
 * Purpose: centralize config discovery without mutating process.env.
 * Usage: const appContext = loadAppContext({ explicitConfigPath }).
 */

import path from "node:path";

import { DEFAULT_CONFIG_FILE, loadConveyorConfig } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(args: LoadAppContextArgs): string {
  const cwd = args.cwd ?? process.cwd();
  if (args.explicitConfigPath) {
    return path.resolve(cwd, args.explicitConfigPath);
  }
  if (process.env.CONVEYOR_CONFIG) {
    return path.resolve(cwd, process.env.CONVEYOR_CONFIG);
  }
  return path.join(cwd, DEFAULT_CONFIG_FILE);
}

export function loadAppContext(args: LoadAppContextArgs = {}): AppContext {
  const configPath = resolveConfigPath(args);
  const config = loadConveyorConfig(configPath);
  return createAppContext({ configPath, config });
}
