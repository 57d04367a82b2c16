/**
 * Pending-task selection and operator task commands.
 * Purpose: decide which TODO items the loop should run this pass, and apply queued add/clear commands.
 */

import type { TaskRecord } from "../../../core/checkpoint-schema.js";
import type { CheckpointStore } from "../../../core/checkpoint-store.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import { taskIdForText } from "../../../core/utils.js";
import type { TaskCommand } from "../lifecycle/lifecycle-signals.js";
import type { StatusReporter, TodoItem, TodoSource } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type PendingTask = {
  text: string;
  record: TaskRecord | null;
};

export type TaskCommandContext = {
  todo: TodoSource;
  store: CheckpointStore;
  logger: JsonlLogger;
  status?: StatusReporter;
};

export const CLEARED_REASON = "cleared";

// =============================================================================
// SELECTION
// =============================================================================

export function selectPendingTasks(
  items: TodoItem[],
  store: CheckpointStore,
  maxTaskAttempts: number,
): PendingTask[] {
  const seen = new Set<string>();
  const pending: PendingTask[] = [];

  for (const item of items) {
    if (item.done) continue;

    const text = item.text.trim();
    const taskId = taskIdForText(text);
    if (text.length === 0 || seen.has(taskId)) continue;
    seen.add(taskId);

    const record = store.findByText(text);
    if (record && isExcluded(record, maxTaskAttempts)) continue;

    pending.push({ text, record });
  }

  return pending;
}

// A pending task can settle mid-pass, e.g. when a clear command skips it between tasks.
export function isStillPending(text: string, store: CheckpointStore, maxTaskAttempts: number): boolean {
  const record = store.findByText(text);
  return record === null || !isExcluded(record, maxTaskAttempts);
}

export function isExhausted(record: TaskRecord, maxTaskAttempts: number): boolean {
  return record.state === "failed" && record.attempts >= maxTaskAttempts;
}

function isExcluded(record: TaskRecord, maxTaskAttempts: number): boolean {
  return (
    record.state === "completed" ||
    record.state === "skipped" ||
    isExhausted(record, maxTaskAttempts)
  );
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function applyTaskCommands(
  commands: TaskCommand[],
  ctx: TaskCommandContext,
): Promise<void> {
  for (const command of commands) {
    if (command.kind === "add") {
      if (command.position === "head") {
        await ctx.todo.insertAtHead(command.text);
      } else {
        await ctx.todo.insertAtTail(command.text);
      }
      logOrchestratorEvent(ctx.logger, "queue.add", {
        text: command.text,
        position: command.position,
      });
      await ctx.status?.append(`Queued task (${command.position}): ${command.text}`);
      continue;
    }

    const cleared = await clearUnstartedTasks(ctx);
    logOrchestratorEvent(ctx.logger, "queue.clear", { cleared });
    await ctx.status?.append(`Cleared ${cleared} queued task(s)`, "warning");
  }
}

// Skips every undone item that has never been started; partial work is left alone.
async function clearUnstartedTasks(ctx: TaskCommandContext): Promise<number> {
  let cleared = 0;
  for (const item of await ctx.todo.list()) {
    if (item.done) continue;
    const record = ctx.store.findByText(item.text);
    if (record && (record.attempts > 0 || record.state !== "pending")) continue;

    await ctx.store.skipTask(item.text, CLEARED_REASON);
    await ctx.todo.markSkipped(item.text, CLEARED_REASON);
    cleared += 1;
  }
  return cleared;
}
