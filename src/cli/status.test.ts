import { describe, expect, it } from "vitest";

import { createEmptyLedger, type CheckpointLedger } from "../core/checkpoint-schema.js";

import { formatLedgerSummary } from "./status.js";

function ledgerWithTasks(): CheckpointLedger {
  return {
    ...createEmptyLedger(),
    session_id: "20260101-000000-abcd",
    last_start_time: "2026-01-01T00:00:00.000Z",
    last_stop_time: "2026-01-01T01:00:00.000Z",
    clean_shutdown: false,
    last_stop_reason: "Critical agent error: quota exceeded",
    iteration_count: 4,
    tasks: [
      {
        task_id: "task-aaa",
        text: "write docs",
        state: "completed",
        attempts: 1,
        start_time: null,
        end_time: null,
        error_message: null,
        instruction_progress: 2,
      },
      {
        task_id: "task-bbb",
        text: "fix flaky test",
        state: "failed",
        attempts: 3,
        start_time: null,
        end_time: null,
        error_message: "Result rejected by verification",
        instruction_progress: 0,
      },
    ],
  };
}

describe("formatLedgerSummary", () => {
  it("prints session details, counts and a task table", () => {
    expect(formatLedgerSummary(ledgerWithTasks())).toEqual([
      "Session: 20260101-000000-abcd",
      "Last start: 2026-01-01T00:00:00.000Z",
      "Last stop: 2026-01-01T01:00:00.000Z",
      "Clean shutdown: no",
      "Stop reason: Critical agent error: quota exceeded",
      "Iterations: 4",
      "Tasks: total=2  pending=0  in_progress=0  completed=1  failed=1  skipped=0",
      "",
      "Tasks:",
      "  ID        State      Attempts  Step  Task",
      "  task-aaa  completed  1         2     write docs",
      "  task-bbb  failed     3         0     fix flaky test  (Result rejected by verification)",
    ]);
  });

  it("handles a ledger that was never started", () => {
    const lines = formatLedgerSummary(createEmptyLedger());

    expect(lines[0]).toBe("Session: (never started)");
    expect(lines[3]).toBe("Clean shutdown: yes");
    expect(lines[lines.length - 1]).toBe("  (no tasks recorded)");
  });
});
