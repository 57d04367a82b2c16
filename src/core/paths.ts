import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  conveyorHome: string;
};

export type ResolveConveyorHomeOptions = {
  conveyorHome?: string;
  projectDir?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveConveyorHome(opts: ResolveConveyorHomeOptions = {}): string {
  if (opts.conveyorHome) {
    return path.resolve(opts.conveyorHome);
  }

  if (process.env.CONVEYOR_HOME) {
    return path.resolve(process.env.CONVEYOR_HOME);
  }

  if (opts.projectDir) {
    return path.join(path.resolve(opts.projectDir), ".conveyor");
  }

  return path.join(os.homedir(), ".conveyor");
}

export function createPathsContext(opts: ResolveConveyorHomeOptions): PathsContext {
  return { conveyorHome: resolveConveyorHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function checkpointPath(paths: PathsContext): string {
  return path.join(paths.conveyorHome, "checkpoint.json");
}

export function statusTrailPath(paths: PathsContext): string {
  return path.join(paths.conveyorHome, "status.md");
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.conveyorHome, "logs");
}

export function orchestratorLogPath(paths: PathsContext): string {
  return path.join(logsDir(paths), "orchestrator.jsonl");
}

export function defaultInstructionsDir(paths: PathsContext): string {
  return path.join(paths.conveyorHome, "instructions");
}

export function defaultResultsDir(paths: PathsContext): string {
  return path.join(paths.conveyorHome, "results");
}

export function instructionFileName(taskId: string, step: number): string {
  return `instruction_${taskId}_${step}.txt`;
}
