import { describe, expect, it } from "vitest";

import type { LoopExit } from "../app/orchestrator/run/orchestration-loop.js";
import {
  CheckpointError,
  DockerError,
  TaskError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { renderCliError, renderRunExit } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function containerStartError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.docker,
    title: "Docker container start failed.",
    message: "Unable to start the agent container.",
    hint: "Start the Docker daemon and retry, or set agent.runner to local to bypass Docker.",
    cause: new DockerError("Failed to start container: connect ENOENT /var/run/docker.sock"),
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("names the docker cause behind a user-facing error in short mode", () => {
    const output = renderCliError(containerStartError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Docker container start failed.",
        "Unable to start the agent container.",
        "Hint: Start the Docker daemon and retry, or set agent.runner to local to bypass Docker.",
        "Cause: docker: Failed to start container: connect ENOENT /var/run/docker.sock",
      ].join("\n"),
    );
  });

  it("does not repeat a cause that carries the same message", () => {
    const cause = new CheckpointError("Failed to write checkpoint: EACCES");
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.checkpoint,
      title: "Run command failed.",
      message: cause.message,
      cause,
    });

    expect(renderCliError(error, { stream: nonTtyStream })).toBe(
      ["Error: Run command failed.", "Failed to write checkpoint: EACCES"].join("\n"),
    );
  });

  it("adds an operator hint to a bare checkpoint error", () => {
    const output = renderCliError(new CheckpointError("Checkpoint ledger is not valid JSON"), {
      stream: nonTtyStream,
    });

    expect(output).toBe(
      [
        "Error: Checkpoint ledger is not valid JSON",
        "Hint: Run conveyor status to inspect the checkpoint ledger.",
      ].join("\n"),
    );
  });

  it("prints code, name, cause and stack in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: "Task failed.",
      message: "The task ledger rejected a transition.",
      cause: new TaskError("Invalid task transition: failed -> analyzing"),
    });
    error.stack = "UserFacingError: The task ledger rejected a transition.\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Task failed.",
        "The task ledger rejected a transition.",
        "Code: TASK_ERROR",
        "Name: UserFacingError",
        "Cause: Invalid task transition: failed -> analyzing",
        "Stack:",
        "  UserFacingError: The task ledger rejected a transition.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(containerStartError(), { stream: nonTtyStream, useColor: true });

    expect(output.split("\n")[0]).toBe("Error: Docker container start failed.");
  });
});

describe("renderRunExit", () => {
  it("points at the ledger after an unclean stop", () => {
    const exit: LoopExit = { kind: "stopped", reason: "quota exceeded", clean: false, iterations: 2 };

    expect(renderRunExit(exit, "Stopped: quota exceeded (unclean)", { stream: nonTtyStream })).toBe(
      "Stopped: quota exceeded (unclean)\nHint: Run conveyor status to inspect the checkpoint ledger.",
    );
  });

  it("prints other exits as a single line", () => {
    const exit: LoopExit = { kind: "max_iterations", iterations: 3 };

    expect(renderRunExit(exit, "Finished 3 iteration(s).", { stream: nonTtyStream })).toBe(
      "Finished 3 iteration(s).",
    );
  });

  it("colors an unclean stop on a terminal", () => {
    const exit: LoopExit = { kind: "stopped", reason: null, clean: false, iterations: 1 };

    const output = renderRunExit(exit, "Stopped", { stream: { isTTY: true }, useColor: true });

    expect(output.split("\n")[0]).toBe("\x1b[1m\x1b[31mStopped\x1b[39m\x1b[22m");
  });
});
