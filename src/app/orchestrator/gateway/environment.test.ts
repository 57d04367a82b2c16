import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  createTestLogger,
  execResult,
  FakeAgentRunner,
  FakeContainer,
  noSleep,
  type TestLogger,
} from "../__tests__/fakes.js";

import { DockerAgentEnvironment, LocalAgentEnvironment } from "./environment.js";

let testLogger: TestLogger;

beforeEach(() => {
  testLogger = createTestLogger("environment-");
});

afterEach(() => {
  testLogger.cleanup();
});

function sessionDir(): string {
  const dir = path.join(testLogger.dir, "session");
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, "dialog.json"), "{}");
  return dir;
}

function fakeClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    now += stepMs;
    return now;
  };
}

describe("LocalAgentEnvironment", () => {
  it("clears session state and reports the readiness check result", async () => {
    const runner = new FakeAgentRunner();
    const dir = sessionDir();
    const environment = new LocalAgentEnvironment({
      runner,
      sessionPaths: [dir],
      logger: testLogger.logger,
    });

    expect(await environment.restart()).toBe(true);
    expect(fs.existsSync(dir)).toBe(false);
    expect(runner.checkCalls).toBe(1);

    runner.checkResult = false;
    expect(await environment.restart()).toBe(false);
  });
});

describe("DockerAgentEnvironment", () => {
  it("restarts the container and confirms the agent responds", async () => {
    const container = new FakeContainer("agent-box", (command) => {
      if (command[0] === "sh") return execResult(0, "ok\n");
      return execResult(0, "agent 1.2.3\n");
    });
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      readyTimeoutMs: 10_000,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
    });

    expect(await environment.restart()).toBe(true);
    expect(container.lifecycle).toEqual(["stop", "start"]);
    expect(container.execCalls).toEqual([
      ["sh", "-c", "echo ok"],
      ["agent", "--version"],
    ]);
  });

  it("keeps going when the container refuses to stop", async () => {
    const container = new FakeContainer("agent-box", () => execResult(0, "ok"));
    container.stopError = new Error("container already stopped");
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      readyTimeoutMs: 10_000,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
    });

    expect(await environment.restart()).toBe(true);
    expect(testLogger.events().map((event) => event.type)).toContain(
      "environment.container.stop_failed",
    );
  });

  it("fails when the container cannot start", async () => {
    const container = new FakeContainer("agent-box", () => execResult(0, "ok"));
    container.startError = new Error("No such container: agent-box");
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      readyTimeoutMs: 10_000,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
    });

    expect(await environment.restart()).toBe(false);
    expect(container.execCalls).toEqual([]);
  });

  it("retries the readiness check until it answers", async () => {
    let attempts = 0;
    const container = new FakeContainer("agent-box", (command) => {
      if (command[0] === "sh") {
        attempts += 1;
        return attempts < 3 ? execResult(1, "", "not ready") : execResult(0, "ok");
      }
      return execResult(0);
    });
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      readyTimeoutMs: 10_000,
      readyIntervalMs: 500,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
      now: fakeClock(1_000),
    });

    expect(await environment.restart()).toBe(true);
    expect(attempts).toBe(3);
  });

  it("gives up when the container never answers before the deadline", async () => {
    const container = new FakeContainer("agent-box", () => execResult(1));
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      readyTimeoutMs: 3_000,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
      now: fakeClock(1_000),
    });

    expect(await environment.restart()).toBe(false);
    const failed = testLogger.events().find((event) => event.type === "environment.restart.failed");
    expect(failed?.payload).toMatchObject({
      step: "ready_check",
      message: "Container did not answer the readiness command in time",
    });
  });

  it("re-provisions a missing agent executable", async () => {
    let installed = false;
    const container = new FakeContainer("agent-box", (command) => {
      if (command[0] === "sh" && command[2] === "echo ok") return execResult(0, "ok");
      if (command[0] === "sh") {
        installed = true;
        return execResult(0, "installed");
      }
      return installed ? execResult(0, "agent 2.0") : execResult(127, "", "agent: not found");
    });
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      provisionCommand: "curl -fsSL https://example.invalid/install.sh | sh",
      readyTimeoutMs: 10_000,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
    });

    expect(await environment.restart()).toBe(true);
    expect(container.execCalls).toEqual([
      ["sh", "-c", "echo ok"],
      ["agent", "--version"],
      ["sh", "-c", "curl -fsSL https://example.invalid/install.sh | sh"],
      ["agent", "--version"],
    ]);
  });

  it("fails when the agent is missing and nothing can provision it", async () => {
    const container = new FakeContainer("agent-box", (command) =>
      command[0] === "sh" ? execResult(0, "ok") : execResult(127),
    );
    const environment = new DockerAgentEnvironment({
      container,
      agentPath: "agent",
      readyTimeoutMs: 10_000,
      sessionPaths: [],
      logger: testLogger.logger,
      sleep: noSleep,
    });

    expect(await environment.restart()).toBe(false);
  });
});
