import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  agentFailure,
  agentSuccess,
  createTestLogger,
  FakeAgentRunner,
  FakeEnvironment,
  MemoryStatus,
  type TestLogger,
} from "../__tests__/fakes.js";
import { LifecycleSignals } from "../lifecycle/lifecycle-signals.js";

import { AgentGateway, type AgentGatewayPolicy } from "./agent-gateway.js";

// =============================================================================
// HELPERS
// =============================================================================

const POLICY: AgentGatewayPolicy = {
  maxStreak: 3,
  initialDelaySeconds: 30,
  delayIncrementSeconds: 30,
  signatureLength: 100,
  maxRestartAttempts: 2,
};

let testLogger: TestLogger;

beforeEach(() => {
  testLogger = createTestLogger("agent-gateway-");
});

afterEach(() => {
  testLogger.cleanup();
});

function buildGateway(opts: { environment?: FakeEnvironment; runner?: FakeAgentRunner; sleep?: (ms: number) => Promise<void> } = {}) {
  const runner = opts.runner ?? new FakeAgentRunner();
  const environment = opts.environment ?? new FakeEnvironment();
  const lifecycle = new LifecycleSignals();
  const status = new MemoryStatus();
  const sleeps: number[] = [];
  const gateway = new AgentGateway({
    runner,
    environment,
    lifecycle,
    status,
    logger: testLogger.logger,
    policy: POLICY,
    sleep:
      opts.sleep ??
      (async (ms) => {
        sleeps.push(ms);
      }),
  });

  const sleptSeconds = (): number => sleeps.reduce((sum, ms) => sum + ms, 0) / 1000;
  return { gateway, runner, environment, lifecycle, status, sleeps, sleptSeconds };
}

// =============================================================================
// INVOKE
// =============================================================================

describe("AgentGateway.invoke", () => {
  it("returns a successful result with the agent output", async () => {
    const { gateway, runner } = buildGateway();
    runner.enqueue(agentSuccess("all good"));

    const result = await gateway.invoke("do the thing", "task-1", 60_000, {
      instructionFile: "/tmp/instruction.txt",
    });

    expect(result).toEqual({
      success: true,
      stdout: "all good",
      stderr: "",
      returnCode: 0,
      errorMessage: null,
    });
    expect(runner.calls).toEqual([
      {
        instruction: "do the thing",
        instructionFile: "/tmp/instruction.txt",
        taskId: "task-1",
        timeoutMs: 60_000,
      },
    ]);
  });

  it("summarizes a non-zero exit with the first stderr line", async () => {
    const { gateway, runner } = buildGateway();
    runner.enqueue(agentFailure("\n  model overloaded  \nstack trace", 2));

    const result = await gateway.invoke("x", "task-1", 1_000);

    expect(result.success).toBe(false);
    expect(result.returnCode).toBe(2);
    expect(result.errorMessage).toBe("Agent exited with code 2: model overloaded");
  });

  it("converts a timeout into a failed result", async () => {
    const { gateway, runner } = buildGateway();
    runner.enqueue({ exitCode: null, stdout: "partial", stderr: "", timedOut: true });

    const result = await gateway.invoke("x", "task-1", 30_000);

    expect(result).toEqual({
      success: false,
      stdout: "partial",
      stderr: "",
      returnCode: null,
      errorMessage: "Agent invocation timed out after 30s",
    });
  });

  it("never throws when the agent cannot be launched", async () => {
    const { gateway, runner } = buildGateway();
    runner.enqueue(() => {
      throw new Error("spawn agent ENOENT");
    });

    const result = await gateway.invoke("x", "task-1", 1_000);

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe("Agent launch failed: spawn agent ENOENT");
  });
});

// =============================================================================
// ERROR HANDLING
// =============================================================================

describe("AgentGateway.handleError", () => {
  it("backs off with an escalating delay for transient errors", async () => {
    const { gateway, environment, sleptSeconds } = buildGateway();

    const first = await gateway.handleError("connection reset");
    const second = await gateway.handleError("connection reset");

    expect(first).toEqual({
      action: "continue",
      category: "transient",
      delaySeconds: 30,
      restarted: false,
      streakCount: 1,
    });
    expect(second.delaySeconds).toBe(60);
    expect(sleptSeconds()).toBe(90);
    expect(environment.restarts).toBe(0);
  });

  it("restarts the environment once the streak reaches its limit", async () => {
    const { gateway, environment } = buildGateway();

    await gateway.handleError("connection reset");
    await gateway.handleError("connection reset");
    const third = await gateway.handleError("connection reset");

    expect(third).toMatchObject({ action: "continue", restarted: true, streakCount: 3 });
    expect(environment.restarts).toBe(1);
    expect(gateway.streakSnapshot().count).toBe(0);
  });

  it("stops when the streak restart fails", async () => {
    const { gateway, lifecycle, status } = buildGateway({ environment: new FakeEnvironment([false]) });

    await gateway.handleError("connection reset");
    await gateway.handleError("connection reset");
    const third = await gateway.handleError("connection reset");

    const reason = "Agent environment restart failed after 3 consecutive errors: connection reset";
    expect(third).toEqual({
      action: "stop",
      category: "transient",
      delaySeconds: 0,
      restarted: false,
      streakCount: 3,
      reason,
    });
    expect(lifecycle.snapshot()).toMatchObject({
      should_stop: true,
      clean_stop: false,
      stop_reason: reason,
    });
    expect(status.entries.at(-1)).toEqual({ message: `Stopping orchestrator: ${reason}`, level: "error" });
  });

  it("stops immediately on critical errors", async () => {
    const { gateway, lifecycle, environment, sleeps } = buildGateway();

    const decision = await gateway.handleError("401: Invalid API key");

    expect(decision).toEqual({
      action: "stop",
      category: "critical",
      delaySeconds: 0,
      restarted: false,
      streakCount: 0,
      reason: "Critical agent error: 401: Invalid API key",
    });
    expect(lifecycle.snapshot().stop_reason).toBe("Critical agent error: 401: Invalid API key");
    expect(environment.restarts).toBe(0);
    expect(sleeps).toEqual([]);
    expect(testLogger.events().map((event) => event.type)).toEqual(["gateway.stop"]);
  });

  it("restarts early for recoverable errors", async () => {
    const { gateway, environment, sleeps, status } = buildGateway();

    const decision = await gateway.handleError("Unknown error");

    expect(decision).toEqual({
      action: "continue",
      category: "recoverable",
      delaySeconds: 0,
      restarted: true,
      streakCount: 1,
    });
    expect(environment.restarts).toBe(1);
    expect(sleeps).toEqual([]);
    expect(status.entries).toEqual([
      { message: "Restarting agent environment (attempt 1/2)", level: "warning" },
    ]);
  });

  it("records each backoff in the status trail", async () => {
    const { gateway, status } = buildGateway();

    await gateway.handleError("connection reset");
    await gateway.handleError("connection reset");

    expect(status.entries).toEqual([
      {
        message: "Agent error (transient, streak 1/3), retrying in 30s: connection reset",
        level: "warning",
      },
      {
        message: "Agent error (transient, streak 2/3), retrying in 60s: connection reset",
        level: "warning",
      },
    ]);
  });

  it("falls back to the backoff delay when an early restart fails", async () => {
    const { gateway, sleptSeconds } = buildGateway({ environment: new FakeEnvironment([false]) });

    const decision = await gateway.handleError("Unknown error");

    expect(decision).toMatchObject({ action: "continue", restarted: false, delaySeconds: 30 });
    expect(sleptSeconds()).toBe(30);
  });

  it("stops once the restart budget is exhausted", async () => {
    const { gateway, environment, lifecycle } = buildGateway({
      environment: new FakeEnvironment([false, false, true]),
    });

    await gateway.handleError("Unknown error");
    await gateway.handleError("Unknown error");
    const third = await gateway.handleError("Unknown error");

    expect(environment.restarts).toBe(2);
    expect(third).toMatchObject({
      action: "stop",
      reason: "Agent environment restart budget exhausted (2 attempts without a successful invocation)",
    });
    expect(lifecycle.snapshot().should_stop).toBe(true);
  });

  it("refills the restart budget after a successful invocation", async () => {
    const { gateway, environment, runner } = buildGateway({
      environment: new FakeEnvironment([false, false, true]),
    });

    await gateway.handleError("Unknown error");
    await gateway.handleError("Unknown error");
    runner.enqueue(agentSuccess());
    await gateway.invoke("x", "task-1", 1_000);

    const decision = await gateway.handleError("Unknown error");

    expect(decision).toMatchObject({ action: "continue", restarted: true, streakCount: 1 });
    expect(environment.restarts).toBe(3);
  });

  it("cuts the backoff short when a stop is requested", async () => {
    const lifecycle = new LifecycleSignals();
    let sleeps = 0;
    const gateway = new AgentGateway({
      runner: new FakeAgentRunner(),
      environment: new FakeEnvironment(),
      lifecycle,
      logger: testLogger.logger,
      policy: POLICY,
      sleep: async () => {
        sleeps += 1;
        lifecycle.requestStop("operator stop");
      },
    });

    const decision = await gateway.handleError("connection reset");

    expect(decision).toMatchObject({ action: "continue", delaySeconds: 30 });
    expect(sleeps).toBe(1);
    expect(lifecycle.snapshot().clean_stop).toBe(true);
  });
});
