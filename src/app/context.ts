/**
 * AppContext pairs a resolved config with the paths derived from it.
 * Purpose: make the project dir and CONVEYOR_HOME explicit for CLI and runtime consumers.
 * Assumptions: config has already been validated and its paths resolved by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ResolvedConveyorConfig } from "../core/config.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: ResolvedConveyorConfig;
  projectDir: string;
  conveyorHome: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ResolvedConveyorConfig;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const paths = createPathsContext({ conveyorHome: input.config.home_dir });

  return {
    configPath: path.resolve(input.configPath),
    config: input.config,
    projectDir: input.config.project_dir,
    conveyorHome: paths.conveyorHome,
    paths,
  };
}
