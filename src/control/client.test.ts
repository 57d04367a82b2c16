import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";
import { buildControlStatus } from "../app/runtime.js";
import { CheckpointStore } from "../core/checkpoint-store.js";
import { UserFacingError } from "../core/errors.js";

import { fetchControlStatus, sendControlRequest } from "./client.js";
import { startControlServer, type ControlServerHandle } from "./server.js";

let tmpDir: string;
let lifecycle: LifecycleSignals;
let server: ControlServerHandle;
let serverClosed = false;

beforeEach(async () => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "control-client-"));
  const store = await CheckpointStore.open(path.join(tmpDir, "checkpoint.json"));
  lifecycle = new LifecycleSignals();
  serverClosed = false;
  server = await startControlServer({
    lifecycle,
    port: 0,
    status: () => buildControlStatus(store, lifecycle, "session-1"),
  });
});

afterEach(async () => {
  if (!serverClosed) await server.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

async function rejection(promise: Promise<unknown>): Promise<UserFacingError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("expected the request to fail");
}

describe("control client", () => {
  it("sends each action to its route", async () => {
    await sendControlRequest(server.url, { action: "add", text: "write docs", position: "head" });
    await sendControlRequest(server.url, { action: "clear" });
    const reload = await sendControlRequest(server.url, { action: "reload" });
    await sendControlRequest(server.url, { action: "stop", reason: "done for today" });

    expect(reload.reload).toBe("immediate");
    expect(lifecycle.drainCommands()).toEqual([
      { kind: "add", text: "write docs", position: "head" },
      { kind: "clear" },
    ]);
    expect(lifecycle.snapshot()).toMatchObject({ should_stop: true, stop_reason: "done for today" });
  });

  it("reads the live status", async () => {
    const response = await fetchControlStatus(server.url);

    expect(response).toMatchObject({ ok: true, status: { session_id: "session-1", pending_commands: 0 } });
  });

  it("turns API errors into user-facing errors", async () => {
    const err = await rejection(sendControlRequest(server.url, { action: "skip" }));

    expect(err.title).toBe("Control request rejected.");
    expect(err.message).toBe("No task is in progress. (conflict, HTTP 409)");
  });

  it("requires task text before calling the server", async () => {
    const err = await rejection(sendControlRequest(server.url, { action: "add", text: "  " }));

    expect(err.title).toBe("Missing task text.");
    expect(lifecycle.pendingCommandCount()).toBe(0);
  });

  it("reports an unreachable server", async () => {
    const url = server.url;
    await server.close();
    serverClosed = true;

    const err = await rejection(fetchControlStatus(url));

    expect(err.title).toBe("Control server unreachable.");
    expect(err.message).toBe(`Could not reach the orchestrator at ${url}.`);
  });
});
