/**
 * OrchestrationLoop runs passes over the TODO source until a stop, a reload or the iteration bound.
 * Purpose: one cooperative loop; lifecycle flags are checked before each pass and between tasks.
 * Assumptions: only this loop starts tasks, so at most one task is in progress at any time.
 * Usage: const exit = await new OrchestrationLoop(opts).run();
 */

import type { CheckpointStore } from "../../../core/checkpoint-store.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { LifecycleSignals } from "../lifecycle/lifecycle-signals.js";
import {
  continueAlways,
  type ContinuationAdvisor,
  type StatusLevel,
  type StatusReporter,
  type TodoSource,
} from "../ports.js";

import type { TaskOutcome } from "./task-machine.js";
import {
  applyTaskCommands,
  isStillPending,
  selectPendingTasks,
  type PendingTask,
} from "./task-queue.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoopExit =
  | { kind: "stopped"; reason: string | null; clean: boolean; iterations: number }
  | { kind: "reload"; reason: string | null; iterations: number }
  | { kind: "max_iterations"; iterations: number };

export interface TaskRunner {
  run(text: string): Promise<TaskOutcome>;
}

export type LoopSettings = {
  checkIntervalSeconds: number;
  taskDelaySeconds: number;
  maxIterations?: number;
  maxTaskAttempts: number;
};

export type OrchestrationLoopOptions = {
  store: CheckpointStore;
  lifecycle: LifecycleSignals;
  machine: TaskRunner;
  todo: TodoSource;
  logger: JsonlLogger;
  settings: LoopSettings;
  advisor?: ContinuationAdvisor;
  status?: StatusReporter;
};

// =============================================================================
// LOOP
// =============================================================================

export class OrchestrationLoop {
  private iterations = 0;

  constructor(private readonly options: OrchestrationLoopOptions) {}

  async run(): Promise<LoopExit> {
    const { store, logger } = this.options;
    logOrchestratorEvent(logger, "loop.start", {});

    let exit: LoopExit;
    try {
      exit = await this.loop();
    } catch (err) {
      const message = formatErrorMessage(err);
      logOrchestratorEvent(logger, "loop.crash", { message });
      await this.options.status?.append(`Orchestrator crashed: ${message}`, "error");
      await store.markServerStop(false, message);
      throw err;
    }

    const clean = exit.kind !== "stopped" || exit.clean;
    await store.markServerStop(clean, describeExit(exit));
    logOrchestratorEvent(logger, "loop.exit", {
      kind: exit.kind,
      iterations: exit.iterations,
      reason: describeExit(exit) ?? null,
    });
    const line = exitStatusLine(exit);
    await this.options.status?.append(line.message, line.level);
    return exit;
  }

  // ===========================================================================
  // PASSES
  // ===========================================================================

  private async loop(): Promise<LoopExit> {
    const { store, todo, lifecycle, logger, settings } = this.options;

    while (true) {
      const early = await this.checkpoint();
      if (early) return early;

      if (settings.maxIterations !== undefined && this.iterations >= settings.maxIterations) {
        return { kind: "max_iterations", iterations: this.iterations };
      }

      this.iterations += 1;
      const iteration = await store.incrementIteration();
      const pending = selectPendingTasks(await todo.list(), store, settings.maxTaskAttempts);

      if (pending.length === 0) {
        logOrchestratorEvent(logger, "loop.idle", {
          iteration,
          wait_seconds: settings.checkIntervalSeconds,
        });
        await lifecycle.waitForChange(settings.checkIntervalSeconds * 1000);
        continue;
      }

      logOrchestratorEvent(logger, "loop.pass", { iteration, pending: pending.length });
      await this.options.status?.append(`Iteration ${iteration}: ${pending.length} pending task(s)`);

      const exit = await this.runPass(pending);
      if (exit) return exit;
    }
  }

  private async runPass(pending: PendingTask[]): Promise<LoopExit | null> {
    const advisor = this.options.advisor ?? continueAlways;
    const now: PendingTask[] = [];
    const postponed: PendingTask[] = [];

    for (const task of pending) {
      const partial = task.record !== null && task.record.instruction_progress > 0;
      if (partial && task.record && (await advisor.decide(task.record)) === "postpone") {
        logOrchestratorEvent(this.options.logger, "task.postponed", {
          taskId: task.record.task_id,
        });
        postponed.push(task);
      } else {
        now.push(task);
      }
    }

    const { store, logger, settings } = this.options;
    let delayNext = false;
    for (const task of [...now, ...postponed]) {
      if (delayNext) {
        await this.taskDelay();
        const exit = await this.checkpoint();
        if (exit) return exit;
      }

      if (!isStillPending(task.text, store, settings.maxTaskAttempts)) {
        logOrchestratorEvent(logger, "task.dropped", {
          text: task.text,
          state: store.findByText(task.text)?.state ?? null,
        });
        continue;
      }

      const outcome = await this.options.machine.run(task.text);

      const exit = await this.checkpoint();
      if (exit) return exit;

      delayNext = outcome.kind === "completed";
    }

    return null;
  }

  // ===========================================================================
  // FLAGS
  // ===========================================================================

  // Applies queued operator commands, then reports whether the loop must exit.
  private async checkpoint(): Promise<LoopExit | null> {
    const { lifecycle, todo, store, logger, status } = this.options;

    const commands = lifecycle.drainCommands();
    if (commands.length > 0) {
      await applyTaskCommands(commands, { todo, store, logger, status });
    }

    const flags = lifecycle.snapshot();
    if (flags.should_stop) {
      return {
        kind: "stopped",
        reason: flags.stop_reason,
        clean: flags.clean_stop,
        iterations: this.iterations,
      };
    }

    if (flags.should_reload && !flags.task_in_progress) {
      lifecycle.acknowledgeReload();
      logOrchestratorEvent(logger, "loop.reload", {
        reason: flags.reload_reason,
        idle_reload_signals: flags.consecutive_idle_reload_signals,
      });
      return { kind: "reload", reason: flags.reload_reason, iterations: this.iterations };
    }

    return null;
  }

  private async taskDelay(): Promise<void> {
    const delayMs = this.options.settings.taskDelaySeconds * 1000;
    if (delayMs <= 0) return;

    const deadline = Date.now() + delayMs;
    while (!this.options.lifecycle.snapshot().should_stop) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return;
      await this.options.lifecycle.waitForChange(remaining);
    }
  }
}

function exitStatusLine(exit: LoopExit): { message: string; level: StatusLevel } {
  if (exit.kind === "stopped") {
    return {
      message: `Orchestrator stopped: ${exit.reason ?? "stop requested"}`,
      level: exit.clean ? "warning" : "error",
    };
  }
  if (exit.kind === "reload") {
    return { message: `Orchestrator reloading: ${exit.reason ?? "requested"}`, level: "info" };
  }
  return { message: `Orchestrator exiting: max iterations reached (${exit.iterations})`, level: "info" };
}

function describeExit(exit: LoopExit): string | undefined {
  if (exit.kind === "stopped") return exit.reason ?? undefined;
  if (exit.kind === "reload") return `reload: ${exit.reason ?? "requested"}`;
  return `max iterations reached (${exit.iterations})`;
}
