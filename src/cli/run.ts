import { LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";
import type { LoopExit } from "../app/orchestrator/run/orchestration-loop.js";
import { runConveyor, type RunConveyorOptions } from "../app/runtime.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  CheckpointError,
  ConfigError,
  DockerError,
  TaskError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import type { LogEvent } from "../core/logger.js";

import { renderRunExit } from "./error-format.js";
import { registerStopSignals } from "./signal-handlers.js";

// Conventional "temporary failure" code; a process supervisor restarts on it to pick up new code.
export const RELOAD_EXIT_CODE = 75;

export type RunCommandOptions = {
  config?: string;
  exitOnReload?: boolean;
  verbose?: boolean;
  lifecycle?: LifecycleSignals;
  runtime?: Pick<RunConveyorOptions, "createBackend" | "createWatcher" | "cwd">;
};

export async function runCommand(opts: RunCommandOptions = {}): Promise<number> {
  try {
    const lifecycle = opts.lifecycle ?? new LifecycleSignals();
    const stopHandler = registerStopSignals({
      lifecycle,
      onSignal: (signal) => {
        console.log(`Received ${signal}. Finishing the current step, then stopping. Press Ctrl+C again to exit now.`);
      },
    });

    let result: Awaited<ReturnType<typeof runConveyor>>;
    try {
      result = await runConveyor({
        ...opts.runtime,
        explicitConfigPath: opts.config,
        lifecycle,
        exitOnReload: opts.exitOnReload,
        onEvent: opts.verbose ? printEvent : undefined,
        onSessionStart: (session) => {
          console.log(`Session ${session.sessionId}: watching ${session.context.config.todo_file}`);
          if (session.control) {
            console.log(`Control API: ${session.control.url}`);
          }
        },
      });
    } finally {
      stopHandler.cleanup();
    }

    console.log(renderRunExit(result.exit, describeRunExit(result.exit, result.reloads)));
    return resolveRunExitCode(result.exit);
  } catch (error) {
    throw normalizeRunCommandError(error);
  }
}

export function describeRunExit(exit: LoopExit, reloads: number): string {
  const reloadNote = reloads > 0 ? ` after ${reloads} reload(s)` : "";
  switch (exit.kind) {
    case "stopped":
      return `Stopped${reloadNote}: ${exit.reason ?? "stop requested"}${exit.clean ? "" : " (unclean)"}`;
    case "reload":
      return `Exiting for reload${reloadNote}: ${exit.reason ?? "requested"}`;
    case "max_iterations":
      return `Finished ${exit.iterations} iteration(s)${reloadNote}.`;
  }
}

export function resolveRunExitCode(exit: LoopExit): number {
  if (exit.kind === "reload") return RELOAD_EXIT_CODE;
  if (exit.kind === "stopped" && !exit.clean) return 1;
  return 0;
}

function printEvent(event: LogEvent): void {
  const task = event.task_id ? ` [${event.task_id}]` : "";
  const payload = event.payload ? ` ${JSON.stringify(event.payload)}` : "";
  console.log(`${event.ts} ${event.type}${task}${payload}`);
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_DOCKER_HINT =
  "Start the Docker daemon and the agent container, or set agent.runner to local.";
const RUN_COMMAND_CHECKPOINT_HINT =
  "The checkpoint file could not be read or written. Check the home directory permissions.";
const RUN_COMMAND_PORT_HINT = "Another process holds the control port. Set control.port or disable control.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: RUN_COMMAND_FAILURE_TITLE,
      message: error.message,
      hint: error.hint ?? resolveRunCommandHint(error),
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: resolveRunCommandHint(error),
    cause: error,
  });
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof DockerError) {
    return RUN_COMMAND_DOCKER_HINT;
  }
  if (error instanceof CheckpointError) {
    return RUN_COMMAND_CHECKPOINT_HINT;
  }
  if (resolveErrorCode(error) === "EADDRINUSE") {
    return RUN_COMMAND_PORT_HINT;
  }
  return undefined;
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof CheckpointError) {
    return USER_FACING_ERROR_CODES.checkpoint;
  }
  if (error instanceof TaskError) {
    return USER_FACING_ERROR_CODES.task;
  }
  if (error instanceof DockerError) {
    return USER_FACING_ERROR_CODES.docker;
  }
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
