/**
 * Task phases and the transitions allowed between them.
 * Purpose: keep the per-task state machine honest; every phase change goes through assertTransition.
 */

import { TaskError } from "../../../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskPhase =
  | { kind: "queued" }
  | { kind: "analyzing" }
  | { kind: "instructing"; step: number }
  | { kind: "executing"; step: number }
  | { kind: "awaiting_result"; step: number }
  | { kind: "verifying" }
  | { kind: "completed" }
  | { kind: "failed" }
  | { kind: "skipped" }
  | { kind: "interrupted" };

export type TaskPhaseKind = TaskPhase["kind"];

const TERMINAL_PHASES: ReadonlySet<TaskPhaseKind> = new Set([
  "completed",
  "failed",
  "skipped",
  "interrupted",
]);

const NEXT_PHASES: Record<TaskPhaseKind, readonly TaskPhaseKind[]> = {
  queued: ["analyzing", "skipped"],
  analyzing: ["instructing", "failed"],
  instructing: ["executing", "skipped", "interrupted", "failed"],
  executing: ["awaiting_result", "instructing", "failed"],
  awaiting_result: ["instructing", "verifying", "skipped", "failed"],
  verifying: ["completed", "failed"],
  completed: [],
  failed: [],
  skipped: [],
  interrupted: [],
};

// =============================================================================
// TRANSITIONS
// =============================================================================

export function isTerminalPhase(phase: TaskPhase): boolean {
  return TERMINAL_PHASES.has(phase.kind);
}

export function canTransition(from: TaskPhase, to: TaskPhase): boolean {
  if (!NEXT_PHASES[from.kind].includes(to.kind)) {
    return false;
  }

  if (to.kind === "instructing") {
    if (to.step < 1) return false;
    // Retrying the same step, advancing one step, or resuming anywhere from analysis.
    if (from.kind === "executing") return to.step === from.step;
    if (from.kind === "awaiting_result") return to.step === from.step + 1;
    return true;
  }

  if (to.kind === "executing" || to.kind === "awaiting_result") {
    return "step" in from && from.step === to.step;
  }

  return true;
}

export function assertTransition(from: TaskPhase, to: TaskPhase): void {
  if (!canTransition(from, to)) {
    throw new TaskError(`Invalid task transition: ${describePhase(from)} -> ${describePhase(to)}`);
  }
}

export function describePhase(phase: TaskPhase): string {
  return "step" in phase ? `${phase.kind}(${phase.step})` : phase.kind;
}
