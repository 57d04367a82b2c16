/**
 * TaskStateMachine drives one TODO item from analysis to a terminal outcome.
 * Purpose: render each instruction step, invoke the agent through the gateway, wait for the result
 * artifact, then verify it; every ledger transition is persisted before the next phase begins.
 * Assumptions: the loop runs at most one machine at a time; a stop is honored between steps, a skip
 * between steps or once the current result wait ends.
 * Usage: const outcome = await machine.run("add feature A");
 */

import type { TaskRecord } from "../../../core/checkpoint-schema.js";
import type { CheckpointStore } from "../../../core/checkpoint-store.js";
import { CheckpointError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { AgentGateway } from "../gateway/agent-gateway.js";
import type { InstructionCatalog, RenderedInstruction } from "../instructions/instruction-set.js";
import type { LifecycleSignals } from "../lifecycle/lifecycle-signals.js";
import type { StatusReporter, TaskClassifier, TodoSource, Verifier } from "../ports.js";
import type { ResultChannel } from "../results/result-channel.js";

import { assertTransition, describePhase, type TaskPhase } from "./task-phase.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskOutcomeKind = "completed" | "failed" | "skipped" | "interrupted";

export type TaskOutcome = {
  kind: TaskOutcomeKind;
  record: TaskRecord;
  error?: string;
  phases: TaskPhase[];
};

export type TaskMachineDeps = {
  store: CheckpointStore;
  gateway: AgentGateway;
  channel: ResultChannel;
  catalog: InstructionCatalog;
  classifier: TaskClassifier;
  verifier: Verifier;
  lifecycle: LifecycleSignals;
  todo: TodoSource;
  logger: JsonlLogger;
  status?: StatusReporter;
  maxInstructionRetries: number;
  agentTimeoutMs: number;
};

export const OPERATOR_SKIP_REASON = "Skipped by operator request";

class TaskRun {
  readonly phases: TaskPhase[] = [{ kind: "queued" }];
  taskId: string | null = null;

  constructor(
    readonly text: string,
    private readonly logger: JsonlLogger,
  ) {}

  get phase(): TaskPhase {
    return this.phases[this.phases.length - 1] ?? { kind: "queued" };
  }

  enter(next: TaskPhase): void {
    assertTransition(this.phase, next);
    this.phases.push(next);
    const phase = describePhase(next);
    logOrchestratorEvent(
      this.logger,
      "task.phase",
      this.taskId ? { taskId: this.taskId, phase } : { phase },
    );
  }
}

// =============================================================================
// STATE MACHINE
// =============================================================================

export class TaskStateMachine {
  constructor(private readonly deps: TaskMachineDeps) {}

  async run(text: string): Promise<TaskOutcome> {
    const { store, catalog, classifier, lifecycle, logger } = this.deps;
    const run = new TaskRun(text, logger);

    run.enter({ kind: "analyzing" });
    const category = catalog.resolveCategory(classifier.classify(text));
    const started = await store.startTask(text, { category });
    run.taskId = started.task_id;
    lifecycle.beginTask(started.task_id);

    logOrchestratorEvent(logger, "task.start", {
      taskId: started.task_id,
      category,
      attempt: started.attempts,
      resume_from: started.instruction_progress,
    });
    await this.deps.status?.append(`Starting task: ${text} (attempt ${started.attempts})`);

    try {
      return await this.execute(run, started, category);
    } catch (err) {
      if (err instanceof CheckpointError) throw err;
      return this.fail(run, started.task_id, formatErrorMessage(err));
    } finally {
      lifecycle.endTask();
    }
  }

  // ===========================================================================
  // STEPS
  // ===========================================================================

  private async execute(run: TaskRun, started: TaskRecord, category: string): Promise<TaskOutcome> {
    const { store, gateway, channel, catalog, lifecycle } = this.deps;
    const taskId = started.task_id;
    const totalSteps = catalog.stepCount(category);

    // A crash after the last result but before verification re-runs the last step.
    let step = Math.min(started.instruction_progress + 1, totalSteps);
    let retries = 0;

    while (true) {
      run.enter({ kind: "instructing", step });

      if (lifecycle.consumeSkipRequest()) {
        return this.skip(run);
      }
      if (lifecycle.snapshot().should_stop) {
        return this.interrupt(run, taskId);
      }

      const instruction = catalog.render(category, step, { taskId, taskText: run.text });
      const instructionFile = await channel.writeInstruction(taskId, step, instruction.text);

      run.enter({ kind: "executing", step });
      const result = await gateway.invoke(instruction.text, taskId, this.deps.agentTimeoutMs, {
        instructionFile,
      });

      if (!result.success) {
        const message = result.errorMessage ?? "Agent invocation failed";
        const decision = await gateway.handleError(message);
        if (decision.action === "stop") {
          return this.fail(run, taskId, decision.reason ?? message);
        }

        retries += 1;
        if (retries > this.deps.maxInstructionRetries) {
          return this.fail(
            run,
            taskId,
            `Instruction step ${step} failed ${retries} times; last error: ${message}`,
          );
        }
        continue;
      }
      retries = 0;

      run.enter({ kind: "awaiting_result", step });
      const content = await this.awaitResult(taskId, instruction);
      if (lifecycle.consumeSkipRequest()) {
        return this.skip(run);
      }
      if (content === null) {
        return this.fail(
          run,
          taskId,
          `Result wait timed out after ${Math.round(instruction.timeoutMs / 1000)}s for instruction step ${step}`,
        );
      }
      await store.recordInstructionProgress(taskId, step);

      if (step < totalSteps) {
        step += 1;
        continue;
      }

      run.enter({ kind: "verifying" });
      return this.verify(run, taskId, content);
    }
  }

  private async awaitResult(taskId: string, instruction: RenderedInstruction): Promise<string | null> {
    const outcome = await this.deps.channel.waitForResult({
      taskId,
      candidatePaths: instruction.candidatePaths,
      controlPhrase: instruction.controlPhrase,
      timeoutMs: instruction.timeoutMs,
    });
    return outcome.success ? outcome.content ?? "" : null;
  }

  private async verify(run: TaskRun, taskId: string, content: string): Promise<TaskOutcome> {
    const { store, verifier, todo, logger } = this.deps;
    const task = store.getTask(taskId);
    if (!task) {
      throw new CheckpointError(`Task ${taskId} vanished from the checkpoint ledger`);
    }

    const verdict = await verifier.verify({ content, task });
    if (!verdict.accepted) {
      return this.fail(run, taskId, verdict.reason ?? "Result rejected by verification");
    }

    const record = await store.endTask(taskId, true);
    run.enter({ kind: "completed" });
    await this.updateTodo(taskId, () => todo.markDone(run.text));

    logOrchestratorEvent(logger, "task.complete", { taskId, attempts: record.attempts });
    await this.deps.status?.append(`Completed task: ${run.text}`);
    return { kind: "completed", record, phases: run.phases };
  }

  // ===========================================================================
  // TERMINAL OUTCOMES
  // ===========================================================================

  private async fail(run: TaskRun, taskId: string, error: string): Promise<TaskOutcome> {
    const record = await this.deps.store.endTask(taskId, false, error);
    if (run.phase.kind !== "failed") {
      run.enter({ kind: "failed" });
    }

    logOrchestratorEvent(this.deps.logger, "task.failed", {
      taskId,
      attempts: record.attempts,
      message: error,
    });
    await this.deps.status?.append(`Task failed: ${run.text}: ${error}`, "error");
    return { kind: "failed", record, error, phases: run.phases };
  }

  private async skip(run: TaskRun): Promise<TaskOutcome> {
    const record = await this.deps.store.skipTask(run.text, OPERATOR_SKIP_REASON);
    run.enter({ kind: "skipped" });
    await this.updateTodo(record.task_id, () =>
      this.deps.todo.markSkipped(run.text, OPERATOR_SKIP_REASON),
    );

    logOrchestratorEvent(this.deps.logger, "task.skipped", {
      taskId: record.task_id,
      reason: OPERATOR_SKIP_REASON,
    });
    await this.deps.status?.append(`Skipped task: ${run.text}`, "warning");
    return { kind: "skipped", record, phases: run.phases };
  }

  private async interrupt(run: TaskRun, taskId: string): Promise<TaskOutcome> {
    const record = await this.deps.store.suspendTask(taskId);
    run.enter({ kind: "interrupted" });

    logOrchestratorEvent(this.deps.logger, "task.interrupted", {
      taskId,
      instruction_progress: record.instruction_progress,
    });
    await this.deps.status?.append(
      `Interrupted task: ${run.text} (resumes after step ${record.instruction_progress})`,
      "warning",
    );
    return { kind: "interrupted", record, phases: run.phases };
  }

  // The ledger already holds the outcome; a TODO write failure only leaves the file stale.
  private async updateTodo(taskId: string, update: () => Promise<void>): Promise<void> {
    try {
      await update();
    } catch (err) {
      const message = formatErrorMessage(err);
      logOrchestratorEvent(this.deps.logger, "todo.update_failed", { taskId, message });
      await this.deps.status?.append(`Could not update the TODO file: ${message}`, "warning");
    }
  }
}
