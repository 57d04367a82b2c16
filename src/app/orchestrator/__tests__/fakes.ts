/**
 * Orchestrator test fakes.
 * Purpose: deterministic in-memory adapters for gateway, task machine and loop tests.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { JsonlLogger } from "../../../core/logger.js";
import type { AgentContainer, ExecOptions, ExecResult } from "../../../docker/manager.js";
import type { AgentInvocation, AgentRunOutput, AgentRunner } from "../agents/agent-runner.js";
import type { AgentEnvironment } from "../gateway/environment.js";
import type {
  StatusLevel,
  StatusReporter,
  TodoItem,
  TodoSource,
  VerificationResult,
  Verifier,
} from "../ports.js";

// =============================================================================
// LOGGING
// =============================================================================

export type TestLogger = {
  logger: JsonlLogger;
  dir: string;
  logPath: string;
  events: () => Array<{ type: string; task_id?: string; payload?: Record<string, unknown> }>;
  cleanup: () => void;
};

export function createTestLogger(prefix = "conveyor-test-"): TestLogger {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const logPath = path.join(dir, "orchestrator.jsonl");
  const logger = new JsonlLogger(logPath, { sessionId: "test-session" });

  return {
    logger,
    dir,
    logPath,
    events: () => {
      if (!fs.existsSync(logPath)) return [];
      return fs
        .readFileSync(logPath, "utf8")
        .split("\n")
        .filter((line) => line.trim().length > 0)
        .map((line) => JSON.parse(line));
    },
    cleanup: () => {
      logger.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

// =============================================================================
// AGENT RUNNER
// =============================================================================

type QueuedRun = AgentRunOutput | ((invocation: AgentInvocation) => AgentRunOutput | Promise<AgentRunOutput>);

export function agentSuccess(stdout = "done"): AgentRunOutput {
  return { exitCode: 0, stdout, stderr: "", timedOut: false };
}

export function agentFailure(stderr: string, exitCode = 1): AgentRunOutput {
  return { exitCode, stdout: "", stderr, timedOut: false };
}

export class FakeAgentRunner implements AgentRunner {
  readonly kind = "local";
  readonly calls: AgentInvocation[] = [];
  checkResult = true;
  checkCalls = 0;
  private readonly queue: QueuedRun[] = [];

  enqueue(...runs: QueuedRun[]): this {
    this.queue.push(...runs);
    return this;
  }

  async run(invocation: AgentInvocation): Promise<AgentRunOutput> {
    this.calls.push(invocation);
    const next = this.queue.shift();
    if (next === undefined) return agentSuccess();
    return typeof next === "function" ? next(invocation) : next;
  }

  async checkReady(): Promise<boolean> {
    this.checkCalls += 1;
    return this.checkResult;
  }
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

export class FakeEnvironment implements AgentEnvironment {
  restarts = 0;
  private readonly outcomes: boolean[];

  constructor(outcomes: boolean[] = []) {
    this.outcomes = [...outcomes];
  }

  async restart(): Promise<boolean> {
    this.restarts += 1;
    return this.outcomes.shift() ?? true;
  }
}

// =============================================================================
// CONTAINER
// =============================================================================

type ExecHandler = (command: string[], opts?: ExecOptions) => ExecResult | Promise<ExecResult>;

export function execResult(exitCode: number, stdout = "", stderr = ""): ExecResult {
  return { exitCode, stdout, stderr, timedOut: false };
}

export class FakeContainer implements AgentContainer {
  readonly execCalls: string[][] = [];
  readonly lifecycle: string[] = [];
  stopError: Error | null = null;
  startError: Error | null = null;

  constructor(
    readonly name: string,
    private readonly handler: ExecHandler,
  ) {}

  async exec(command: string[], opts?: ExecOptions): Promise<ExecResult> {
    this.execCalls.push(command);
    return this.handler(command, opts);
  }

  async stop(): Promise<void> {
    this.lifecycle.push("stop");
    if (this.stopError) throw this.stopError;
  }

  async start(): Promise<void> {
    this.lifecycle.push("start");
    if (this.startError) throw this.startError;
  }
}

// =============================================================================
// COLLABORATORS
// =============================================================================

export class MemoryStatus implements StatusReporter {
  readonly entries: Array<{ message: string; level: StatusLevel }> = [];

  async append(message: string, level: StatusLevel = "info"): Promise<void> {
    this.entries.push({ message, level });
  }
}

export class MemoryTodoSource implements TodoSource {
  readonly items: TodoItem[];
  readonly skipped: Array<{ text: string; reason: string }> = [];

  constructor(texts: string[] = []) {
    this.items = texts.map((text) => ({ text, done: false }));
  }

  async list(): Promise<TodoItem[]> {
    return this.items.map((item) => ({ ...item }));
  }

  async markDone(text: string): Promise<void> {
    const item = this.items.find((entry) => entry.text === text);
    if (item) item.done = true;
  }

  async markSkipped(text: string, reason: string): Promise<void> {
    const item = this.items.find((entry) => entry.text === text);
    if (item) {
      item.done = true;
      item.comment = `skipped: ${reason}`;
    }
    this.skipped.push({ text, reason });
  }

  async insertAtHead(text: string): Promise<void> {
    this.items.unshift({ text, done: false });
  }

  async insertAtTail(text: string): Promise<void> {
    this.items.push({ text, done: false });
  }
}

export class StaticVerifier implements Verifier {
  readonly seen: string[] = [];

  constructor(private readonly result: VerificationResult = { accepted: true }) {}

  async verify(input: { content: string }): Promise<VerificationResult> {
    this.seen.push(input.content);
    return this.result;
  }
}

export const noSleep = async (): Promise<void> => undefined;
