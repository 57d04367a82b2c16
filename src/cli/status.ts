import type { AppContext } from "../app/context.js";
import type { CheckpointLedger, TaskRecord, TaskRecordState } from "../core/checkpoint-schema.js";
import { loadLedger } from "../core/checkpoint-store.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  CheckpointError,
  ConfigError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { checkpointPath } from "../core/paths.js";
import { controlBaseUrl, fetchControlStatus } from "../control/client.js";

// =============================================================================
// TYPES
// =============================================================================

export type StatusCommandOptions = {
  live?: boolean;
};

export type TaskStatusRow = {
  id: string;
  state: TaskRecordState;
  attempts: number;
  step: number;
  text: string;
  note: string;
};

const TASK_STATES: TaskRecordState[] = ["pending", "in_progress", "completed", "failed", "skipped"];
const TEXT_COLUMN_WIDTH = 48;

// =============================================================================
// COMMAND
// =============================================================================

// Reads the ledger without opening a store, so a status check never triggers crash recovery.
export async function statusCommand(appContext: AppContext, opts: StatusCommandOptions = {}): Promise<void> {
  try {
    const ledger = await loadLedger(checkpointPath(appContext.paths));
    for (const line of formatLedgerSummary(ledger)) {
      console.log(line);
    }

    if (opts.live) {
      const url = controlBaseUrl(appContext.config.control.port);
      const live = await fetchControlStatus(url);
      console.log("");
      console.log(`Live status (${url}):`);
      console.log(JSON.stringify(live.status ?? null, null, 2));
    }
  } catch (error) {
    throw normalizeStatusCommandError(error);
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatLedgerSummary(ledger: CheckpointLedger): string[] {
  const lines = [
    `Session: ${ledger.session_id ?? "(never started)"}`,
    `Last start: ${ledger.last_start_time ?? "-"}`,
    `Last stop: ${ledger.last_stop_time ?? "-"}`,
    `Clean shutdown: ${ledger.clean_shutdown ? "yes" : "no"}`,
    `Stop reason: ${ledger.last_stop_reason ?? "-"}`,
    `Iterations: ${ledger.iteration_count}`,
    formatTaskCounts(ledger.tasks),
    "",
    "Tasks:",
  ];

  const rows = ledger.tasks.map(toTaskRow);
  if (rows.length === 0) {
    lines.push("  (no tasks recorded)");
    return lines;
  }

  const idWidth = Math.max("ID".length, ...rows.map((r) => r.id.length));
  const stateWidth = Math.max("State".length, ...rows.map((r) => r.state.length));
  const attemptsWidth = Math.max("Attempts".length, ...rows.map((r) => `${r.attempts}`.length));
  const stepWidth = Math.max("Step".length, ...rows.map((r) => `${r.step}`.length));

  lines.push(
    `  ${pad("ID", idWidth)}  ${pad("State", stateWidth)}  ${pad("Attempts", attemptsWidth)}  ${pad("Step", stepWidth)}  Task`,
  );
  for (const row of rows) {
    const note = row.note ? `  (${row.note})` : "";
    lines.push(
      `  ${pad(row.id, idWidth)}  ${pad(row.state, stateWidth)}  ${pad(`${row.attempts}`, attemptsWidth)}  ${pad(`${row.step}`, stepWidth)}  ${row.text}${note}`,
    );
  }

  return lines;
}

function formatTaskCounts(tasks: TaskRecord[]): string {
  const parts = [`total=${tasks.length}`];
  for (const state of TASK_STATES) {
    parts.push(`${state}=${tasks.filter((task) => task.state === state).length}`);
  }
  return `Tasks: ${parts.join("  ")}`;
}

function toTaskRow(task: TaskRecord): TaskStatusRow {
  return {
    id: task.task_id,
    state: task.state,
    attempts: task.attempts,
    step: task.instruction_progress,
    text: ellipsize(task.text, TEXT_COLUMN_WIDTH),
    note: task.skip_reason ?? task.error_message ?? "",
  };
}

function ellipsize(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 3)}...` : value;
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const STATUS_COMMAND_FAILURE_TITLE = "Status command failed.";
const STATUS_COMMAND_CHECKPOINT_HINT =
  "The checkpoint file is unreadable. Move it aside to start a fresh ledger.";

function normalizeStatusCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveStatusErrorCode(error),
    title: STATUS_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: error instanceof CheckpointError ? STATUS_COMMAND_CHECKPOINT_HINT : undefined,
    cause: error,
  });
}

function resolveStatusErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof CheckpointError) {
    return USER_FACING_ERROR_CODES.checkpoint;
  }
  return USER_FACING_ERROR_CODES.unknown;
}
