/**
 * Agent environment restart.
 * Purpose: bring the agent's execution backend back to a responsive state without touching task state.
 * Assumptions: only the gateway's serialized error path calls restart(), never alongside an invocation.
 */

import fse from "fs-extra";

import { formatErrorMessage } from "../../../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import type { AgentContainer } from "../../../docker/manager.js";
import type { AgentRunner } from "../agents/agent-runner.js";
import { sleep as defaultSleep, type Sleep } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export interface AgentEnvironment {
  restart(): Promise<boolean>;
}

type SessionCleanup = {
  sessionPaths: string[];
  logger: JsonlLogger;
};

export type LocalAgentEnvironmentOptions = SessionCleanup & {
  runner: AgentRunner;
};

export type DockerAgentEnvironmentOptions = SessionCleanup & {
  container: AgentContainer;
  agentPath: string;
  provisionCommand?: string;
  readyTimeoutMs: number;
  readyIntervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
};

const READY_COMMAND = ["sh", "-c", "echo ok"];
const EXEC_TIMEOUT_MS = 30_000;
const PROVISION_TIMEOUT_MS = 10 * 60_000;

// =============================================================================
// LOCAL
// =============================================================================

export class LocalAgentEnvironment implements AgentEnvironment {
  constructor(private readonly options: LocalAgentEnvironmentOptions) {}

  async restart(): Promise<boolean> {
    const { logger } = this.options;
    logOrchestratorEvent(logger, "environment.restart.start", { backend: "local" });

    await clearSessionState(this.options);

    let responsive = false;
    try {
      responsive = await this.options.runner.checkReady();
    } catch (err) {
      logOrchestratorEvent(logger, "environment.ready_check.error", { message: formatErrorMessage(err) });
    }

    logOrchestratorEvent(logger, "environment.restart.complete", {
      backend: "local",
      responsive,
    });
    return responsive;
  }
}

// =============================================================================
// DOCKER
// =============================================================================

export class DockerAgentEnvironment implements AgentEnvironment {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly options: DockerAgentEnvironmentOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async restart(): Promise<boolean> {
    const { container, logger } = this.options;
    logOrchestratorEvent(logger, "environment.restart.start", {
      backend: "docker",
      container: container.name,
    });

    await clearSessionState(this.options);

    try {
      await container.stop();
      logOrchestratorEvent(logger, "environment.container.stopped", { container: container.name });
    } catch (err) {
      // Best effort: a container that will not stop may still start cleanly.
      logOrchestratorEvent(logger, "environment.container.stop_failed", {
        container: container.name,
        message: formatErrorMessage(err),
      });
    }

    try {
      await container.start();
      logOrchestratorEvent(logger, "environment.container.started", { container: container.name });
    } catch (err) {
      return this.fail("start", err);
    }

    if (!(await this.waitForReady())) {
      return this.fail("ready_check", new Error("Container did not answer the readiness command in time"));
    }

    if (!(await this.ensureAgentInstalled())) {
      return this.fail("agent", new Error(`Agent executable ${this.options.agentPath} is unavailable`));
    }

    logOrchestratorEvent(logger, "environment.restart.complete", {
      backend: "docker",
      container: container.name,
      responsive: true,
    });
    return true;
  }

  private async waitForReady(): Promise<boolean> {
    const deadline = this.now() + this.options.readyTimeoutMs;
    const interval = this.options.readyIntervalMs ?? 2_000;

    while (true) {
      try {
        const res = await this.options.container.exec(READY_COMMAND, { timeoutMs: EXEC_TIMEOUT_MS });
        if (res.exitCode === 0 && res.stdout.includes("ok")) {
          return true;
        }
      } catch (err) {
        logOrchestratorEvent(this.options.logger, "environment.ready_check.error", {
          message: formatErrorMessage(err),
        });
      }

      if (this.now() >= deadline) {
        return false;
      }
      await this.sleep(interval);
    }
  }

  private async ensureAgentInstalled(): Promise<boolean> {
    if (await this.agentResponds()) {
      return true;
    }

    const { provisionCommand, logger, container } = this.options;
    if (!provisionCommand) {
      return false;
    }

    logOrchestratorEvent(logger, "environment.agent.provision", { command: provisionCommand });
    try {
      const res = await container.exec(["sh", "-c", provisionCommand], {
        timeoutMs: PROVISION_TIMEOUT_MS,
      });
      if (res.exitCode !== 0) {
        logOrchestratorEvent(logger, "environment.agent.provision_failed", {
          exit_code: res.exitCode,
          stderr: res.stderr.slice(0, 500),
        });
        return false;
      }
    } catch (err) {
      logOrchestratorEvent(logger, "environment.agent.provision_failed", {
        message: formatErrorMessage(err),
      });
      return false;
    }

    return this.agentResponds();
  }

  private async agentResponds(): Promise<boolean> {
    try {
      const res = await this.options.container.exec([this.options.agentPath, "--version"], {
        timeoutMs: EXEC_TIMEOUT_MS,
      });
      return !res.timedOut && res.exitCode === 0;
    } catch {
      return false;
    }
  }

  private fail(step: string, err: unknown): boolean {
    logOrchestratorEvent(this.options.logger, "environment.restart.failed", {
      backend: "docker",
      container: this.options.container.name,
      step,
      message: formatErrorMessage(err),
    });
    return false;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function clearSessionState({ sessionPaths, logger }: SessionCleanup): Promise<void> {
  for (const sessionPath of sessionPaths) {
    try {
      await fse.remove(sessionPath);
      logOrchestratorEvent(logger, "environment.session.cleared", { path: sessionPath });
    } catch (err) {
      logOrchestratorEvent(logger, "environment.session.clear_failed", {
        path: sessionPath,
        message: formatErrorMessage(err),
      });
    }
  }
}
