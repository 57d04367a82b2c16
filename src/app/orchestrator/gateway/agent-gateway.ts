/**
 * Agent invocation gateway.
 * Purpose: run one agent call with a normalized outcome, and decide what happens after a failure:
 * back off, restart the agent environment, or stop the orchestrator.
 * Usage: the task state machine calls invoke(); on failure it calls handleError() and either
 * retries the same instruction (continue) or fails the task (stop).
 */

import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import { truncate } from "../../../core/utils.js";
import type { AgentRunner } from "../agents/agent-runner.js";
import type { LifecycleSignals } from "../lifecycle/lifecycle-signals.js";
import { sleep as defaultSleep, type Sleep, type StatusReporter } from "../ports.js";

import type { AgentEnvironment } from "./environment.js";
import { ErrorStreak, type ErrorStreakSnapshot } from "./error-streak.js";
import {
  classifyFailure,
  DEFAULT_FAILURE_PATTERNS,
  type FailureCategory,
  type FailurePatterns,
} from "./failure-classifier.js";

// =============================================================================
// TYPES
// =============================================================================

export type InvocationResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  returnCode: number | null;
  errorMessage: string | null;
};

export type ErrorAction = "continue" | "stop";

export type ErrorDecision = {
  action: ErrorAction;
  category: FailureCategory;
  delaySeconds: number;
  restarted: boolean;
  streakCount: number;
  reason?: string;
};

export type AgentGatewayPolicy = {
  maxStreak: number;
  initialDelaySeconds: number;
  delayIncrementSeconds: number;
  signatureLength: number;
  maxRestartAttempts: number;
};

export type AgentGatewayOptions = {
  runner: AgentRunner;
  environment: AgentEnvironment;
  lifecycle: LifecycleSignals;
  logger: JsonlLogger;
  policy: AgentGatewayPolicy;
  patterns?: FailurePatterns;
  status?: StatusReporter;
  sleep?: Sleep;
};

// Recoverable errors get an early restart on the first and second occurrence of a streak.
const EARLY_RESTART_MAX_COUNT = 2;
const BACKOFF_TICK_MS = 1_000;
const STDERR_SUMMARY_LENGTH = 200;

// =============================================================================
// GATEWAY
// =============================================================================

export class AgentGateway {
  private readonly streak: ErrorStreak;
  private readonly patterns: FailurePatterns;
  private readonly sleep: Sleep;
  private restartAttempts = 0;

  constructor(private readonly options: AgentGatewayOptions) {
    this.streak = new ErrorStreak({
      initialDelaySeconds: options.policy.initialDelaySeconds,
      delayIncrementSeconds: options.policy.delayIncrementSeconds,
      signatureLength: options.policy.signatureLength,
    });
    this.patterns = options.patterns ?? DEFAULT_FAILURE_PATTERNS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get runnerKind(): AgentRunner["kind"] {
    return this.options.runner.kind;
  }

  streakSnapshot(): ErrorStreakSnapshot {
    return this.streak.snapshot();
  }

  // ===========================================================================
  // INVOCATION
  // ===========================================================================

  async invoke(
    instruction: string,
    taskId: string,
    timeoutMs: number,
    opts: { instructionFile?: string } = {},
  ): Promise<InvocationResult> {
    const { logger } = this.options;
    logOrchestratorEvent(logger, "agent.invoke.start", {
      taskId,
      runner: this.options.runner.kind,
      timeout_ms: timeoutMs,
    });

    let result: InvocationResult;
    try {
      const output = await this.options.runner.run({
        instruction,
        instructionFile: opts.instructionFile,
        taskId,
        timeoutMs,
      });
      result = normalizeRunOutput(output, timeoutMs);
    } catch (err) {
      result = {
        success: false,
        stdout: "",
        stderr: "",
        returnCode: null,
        errorMessage: `Agent launch failed: ${formatErrorMessage(err)}`,
      };
    }

    if (result.success) {
      this.noteSuccess();
      logOrchestratorEvent(logger, "agent.invoke.complete", { taskId });
    } else {
      logOrchestratorEvent(logger, "agent.invoke.failed", {
        taskId,
        return_code: result.returnCode,
        message: result.errorMessage ?? "",
      });
    }

    return result;
  }

  noteSuccess(): void {
    this.streak.reset();
    this.restartAttempts = 0;
  }

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  async handleError(errorMessage: string): Promise<ErrorDecision> {
    const { logger, policy } = this.options;
    const category = classifyFailure(errorMessage, this.patterns);

    if (category === "critical") {
      const reason = `Critical agent error: ${truncate(errorMessage, STDERR_SUMMARY_LENGTH)}`;
      await this.raiseStop(reason);
      return { action: "stop", category, delaySeconds: 0, restarted: false, streakCount: 0, reason };
    }

    const streak = this.streak.record(errorMessage);
    logOrchestratorEvent(logger, "gateway.error", {
      category,
      streak_count: streak.count,
      delay_seconds: streak.delaySeconds,
      message: truncate(errorMessage, STDERR_SUMMARY_LENGTH),
    });

    if (streak.count >= policy.maxStreak) {
      return this.restartOrStop(category, streak);
    }

    if (category === "recoverable" && streak.count <= EARLY_RESTART_MAX_COUNT) {
      if (this.restartBudgetExhausted()) {
        return this.stopForExhaustedRestarts(category, streak);
      }
      if (await this.restartEnvironment()) {
        this.streak.reset();
        return { action: "continue", category, delaySeconds: 0, restarted: true, streakCount: streak.count };
      }
    }

    await this.options.status?.append(
      `Agent error (${category}, streak ${streak.count}/${policy.maxStreak}), retrying in ${streak.delaySeconds}s: ${truncate(errorMessage, STDERR_SUMMARY_LENGTH)}`,
      "warning",
    );
    await this.backoff(streak.delaySeconds);
    return {
      action: "continue",
      category,
      delaySeconds: streak.delaySeconds,
      restarted: false,
      streakCount: streak.count,
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async restartOrStop(
    category: FailureCategory,
    streak: ErrorStreakSnapshot,
  ): Promise<ErrorDecision> {
    if (this.restartBudgetExhausted()) {
      return this.stopForExhaustedRestarts(category, streak);
    }

    if (await this.restartEnvironment()) {
      this.streak.reset();
      return { action: "continue", category, delaySeconds: 0, restarted: true, streakCount: streak.count };
    }

    const reason = `Agent environment restart failed after ${streak.count} consecutive errors: ${truncate(
      streak.lastErrorText ?? "",
      STDERR_SUMMARY_LENGTH,
    )}`;
    await this.raiseStop(reason);
    return { action: "stop", category, delaySeconds: 0, restarted: false, streakCount: streak.count, reason };
  }

  private async stopForExhaustedRestarts(
    category: FailureCategory,
    streak: ErrorStreakSnapshot,
  ): Promise<ErrorDecision> {
    const reason = `Agent environment restart budget exhausted (${this.options.policy.maxRestartAttempts} attempts without a successful invocation)`;
    await this.raiseStop(reason);
    return { action: "stop", category, delaySeconds: 0, restarted: false, streakCount: streak.count, reason };
  }

  private restartBudgetExhausted(): boolean {
    return this.restartAttempts >= this.options.policy.maxRestartAttempts;
  }

  private async restartEnvironment(): Promise<boolean> {
    this.restartAttempts += 1;
    logOrchestratorEvent(this.options.logger, "gateway.restart", {
      attempt: this.restartAttempts,
      max_attempts: this.options.policy.maxRestartAttempts,
    });
    await this.options.status?.append(
      `Restarting agent environment (attempt ${this.restartAttempts}/${this.options.policy.maxRestartAttempts})`,
      "warning",
    );

    try {
      return await this.options.environment.restart();
    } catch (err) {
      logOrchestratorEvent(this.options.logger, "gateway.restart.error", {
        message: formatErrorMessage(err),
      });
      return false;
    }
  }

  private async raiseStop(reason: string): Promise<void> {
    this.options.lifecycle.requestStop(reason, { clean: false });
    logOrchestratorEvent(this.options.logger, "gateway.stop", { reason });
    await this.options.status?.append(`Stopping orchestrator: ${reason}`, "error");
  }

  private async backoff(delaySeconds: number): Promise<void> {
    const deadline = delaySeconds * 1_000;
    let waited = 0;
    while (waited < deadline) {
      if (this.options.lifecycle.snapshot().should_stop) {
        logOrchestratorEvent(this.options.logger, "gateway.backoff.interrupted", {
          waited_ms: waited,
        });
        return;
      }
      const step = Math.min(BACKOFF_TICK_MS, deadline - waited);
      await this.sleep(step);
      waited += step;
    }
  }
}

// =============================================================================
// NORMALIZATION
// =============================================================================

function normalizeRunOutput(
  output: { exitCode: number | null; stdout: string; stderr: string; timedOut: boolean },
  timeoutMs: number,
): InvocationResult {
  const base = {
    stdout: output.stdout,
    stderr: output.stderr,
    returnCode: output.exitCode,
  };

  if (output.timedOut) {
    return {
      ...base,
      success: false,
      errorMessage: `Agent invocation timed out after ${Math.round(timeoutMs / 1000)}s`,
    };
  }

  if (output.exitCode === 0) {
    return { ...base, success: true, errorMessage: null };
  }

  if (output.exitCode === null) {
    return { ...base, success: false, errorMessage: "Agent exited without a status (launch failure)" };
  }

  const firstStderrLine = output.stderr
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  const detail = firstStderrLine ? `: ${truncate(firstStderrLine, STDERR_SUMMARY_LENGTH)}` : "";

  return {
    ...base,
    success: false,
    errorMessage: `Agent exited with code ${output.exitCode}${detail}`,
  };
}
