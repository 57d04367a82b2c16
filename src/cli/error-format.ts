/*
Purpose: render CLI failures and the run command's closing line, with optional color.
Assumptions: stderr is the default stream; non-TTY output disables color. Short mode still names a
checkpoint, docker, config or task cause.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled }));
*/

import type { LoopExit } from "../app/orchestrator/run/orchestration-loop.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import {
  CheckpointError,
  ConfigError,
  DockerError,
  TaskError,
  UserFacingError,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const STATUS_HINT = "Run conveyor status to inspect the checkpoint ledger.";

const DOMAIN_HINTS: Record<string, string | undefined> = {
  checkpoint: STATUS_HINT,
  config: "Check conveyor.yaml, or the file named by --config or CONVEYOR_CONFIG.",
  docker: "Start the Docker daemon and the agent container, or set agent.runner to local.",
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = withDomainDetails(formatErrorLines(error, { mode }), error, mode);
  const format = resolveFormatter(options);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function renderRunExit(
  exit: LoopExit,
  summary: string,
  options: Omit<CliErrorFormatOptions, "debug"> = {},
): string {
  const format = resolveFormatter({ stream: process.stdout, ...options });
  const unclean = exit.kind === "stopped" && !exit.clean;
  const line = format(summary, exitStyles(exit));

  return unclean ? `${line}\n${format("Hint:", ["yellow"])} ${STATUS_HINT}` : line;
}

// =============================================================================
// INTERNALS
// =============================================================================

function withDomainDetails(
  lines: ErrorFormatLine[],
  error: unknown,
  mode: ErrorFormatMode,
): ErrorFormatLine[] {
  if (!(error instanceof UserFacingError)) {
    const kind = domainKind(error);
    const hint = kind ? DOMAIN_HINTS[kind] : undefined;
    if (!hint) return lines;
    const [title, ...rest] = lines;
    return title ? [title, { kind: "hint", text: hint }, ...rest] : lines;
  }

  // Debug mode already prints every cause.
  if (mode === "debug") return lines;

  const cause = error.cause;
  const kind = domainKind(cause);
  if (!kind || !(cause instanceof Error) || cause.message === error.message) {
    return lines;
  }
  return [...lines, { kind: "cause", text: `${kind}: ${cause.message}` }];
}

function domainKind(error: unknown): string | null {
  if (error instanceof CheckpointError) return "checkpoint";
  if (error instanceof ConfigError) return "config";
  if (error instanceof DockerError) return "docker";
  if (error instanceof TaskError) return "task";
  return null;
}

function exitStyles(exit: LoopExit): AnsiStyle[] {
  switch (exit.kind) {
    case "stopped":
      return exit.clean ? ["yellow"] : ["red", "bold"];
    case "reload":
      return ["cyan"];
    case "max_iterations":
      return [];
  }
}

function resolveFormatter(options: Omit<CliErrorFormatOptions, "debug">): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "cause":
      return `${format("Cause:", ["dim"])} ${line.text}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text), ["dim"])}`;
    default:
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
