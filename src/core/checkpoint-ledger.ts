import type { CheckpointLedger, TaskRecord } from "./checkpoint-schema.js";
import { CheckpointError } from "./errors.js";
import { isoNow, taskIdForText } from "./utils.js";

// =============================================================================
// LOOKUPS
// =============================================================================

export function findTask(ledger: CheckpointLedger, taskId: string): TaskRecord | undefined {
  return ledger.tasks.find((task) => task.task_id === taskId);
}

export function findTaskByText(ledger: CheckpointLedger, text: string): TaskRecord | undefined {
  return findTask(ledger, taskIdForText(text));
}

export function requireTask(ledger: CheckpointLedger, taskId: string): TaskRecord {
  const task = findTask(ledger, taskId);
  if (!task) {
    throw new CheckpointError(`Unknown task in checkpoint ledger: ${taskId}`);
  }
  return task;
}

function ensureTask(ledger: CheckpointLedger, text: string): TaskRecord {
  const existing = findTaskByText(ledger, text);
  if (existing) return existing;

  const record: TaskRecord = {
    task_id: taskIdForText(text),
    text: text.trim(),
    state: "pending",
    attempts: 0,
    start_time: null,
    end_time: null,
    error_message: null,
    instruction_progress: 0,
  };
  ledger.tasks.push(record);
  return record;
}

// =============================================================================
// TASK TRANSITIONS
// =============================================================================

export function beginTaskRecord(
  ledger: CheckpointLedger,
  text: string,
  opts: { category?: string; now?: string } = {},
): TaskRecord {
  const task = ensureTask(ledger, text);

  if (task.state === "in_progress") {
    throw new CheckpointError(`Task ${task.task_id} is already in progress`);
  }
  if (task.state === "completed" || task.state === "skipped") {
    throw new CheckpointError(`Task ${task.task_id} is already ${task.state}`);
  }

  // A failed attempt starts over; an interrupted one keeps its instruction progress.
  if (task.state === "failed") {
    task.instruction_progress = 0;
  }

  task.state = "in_progress";
  task.attempts += 1;
  task.start_time = opts.now ?? isoNow();
  task.end_time = null;
  task.error_message = null;
  if (opts.category) {
    task.category = opts.category;
  }

  return task;
}

export function finishTaskRecord(
  ledger: CheckpointLedger,
  taskId: string,
  success: boolean,
  error?: string,
  now: string = isoNow(),
): TaskRecord {
  const task = requireTask(ledger, taskId);
  task.state = success ? "completed" : "failed";
  task.end_time = now;
  task.error_message = success ? null : error ?? "Task failed without an error message";
  return task;
}

export function skipTaskRecord(
  ledger: CheckpointLedger,
  text: string,
  reason: string,
  now: string = isoNow(),
): TaskRecord {
  const task = ensureTask(ledger, text);
  if (task.state === "completed") {
    throw new CheckpointError(`Task ${task.task_id} is already completed`);
  }
  task.state = "skipped";
  task.end_time = now;
  task.skip_reason = reason;
  return task;
}

export function suspendTaskRecord(ledger: CheckpointLedger, taskId: string): TaskRecord {
  const task = requireTask(ledger, taskId);
  if (task.state !== "in_progress") {
    throw new CheckpointError(`Cannot suspend task ${taskId} in state ${task.state}`);
  }
  task.state = "pending";
  task.end_time = null;
  return task;
}

export function setInstructionProgress(
  ledger: CheckpointLedger,
  taskId: string,
  step: number,
): TaskRecord {
  const task = requireTask(ledger, taskId);
  task.instruction_progress = Math.max(task.instruction_progress, step);
  return task;
}

// =============================================================================
// RECOVERY
// =============================================================================

export function resetInterruptedTasks(ledger: CheckpointLedger, reason: string): TaskRecord[] {
  const reset: TaskRecord[] = [];
  for (const task of ledger.tasks) {
    if (task.state !== "in_progress") continue;
    task.state = "pending";
    task.attempts += 1;
    task.end_time = null;
    task.error_message = reason;
    reset.push(task);
  }
  return reset;
}
