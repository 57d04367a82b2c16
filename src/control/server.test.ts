import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";
import { CheckpointStore } from "../core/checkpoint-store.js";

import { startControlServer, type ControlServerHandle } from "./server.js";

let tmpDir: string;
let store: CheckpointStore;
let lifecycle: LifecycleSignals;
let server: ControlServerHandle;

beforeEach(async () => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "control-server-"));
  store = await CheckpointStore.open(path.join(tmpDir, "checkpoint.json"));
  lifecycle = new LifecycleSignals();
  server = await startControlServer({
    lifecycle,
    port: 0,
    maxBodyBytes: 256,
    status: () => ({
      session_id: "session-1",
      flags: lifecycle.snapshot(),
      pending_commands: lifecycle.pendingCommandCount(),
      current_task: null,
      statistics: store.getStatistics(),
    }),
  });
});

afterEach(async () => {
  await server.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

async function call(
  method: string,
  route: string,
  body?: string,
): Promise<{ status: number; json: unknown; allow: string | null }> {
  const response = await fetch(`${server.url}${route}`, {
    method,
    headers: body === undefined ? undefined : { "Content-Type": "application/json" },
    body,
  });
  return { status: response.status, json: await response.json(), allow: response.headers.get("allow") };
}

describe("control server", () => {
  it("listens on localhost with an assigned port", () => {
    expect(server.port).toBeGreaterThan(0);
    expect(server.url).toBe(`http://127.0.0.1:${server.port}`);
  });

  it("reports status with lifecycle flags and ledger statistics", async () => {
    lifecycle.enqueueTask("queued task");

    const res = await call("GET", "/api/status");

    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({
      ok: true,
      status: {
        session_id: "session-1",
        pending_commands: 1,
        current_task: null,
        flags: { should_stop: false, task_in_progress: false },
        statistics: { total: 0, completed: 0 },
      },
    });
  });

  it("requests a clean stop with the given reason", async () => {
    const res = await call("POST", "/api/stop", JSON.stringify({ reason: "maintenance" }));

    expect(res).toMatchObject({ status: 202, json: { ok: true, stopping: true } });
    expect(lifecycle.snapshot()).toMatchObject({
      should_stop: true,
      clean_stop: true,
      stop_reason: "maintenance",
    });
  });

  it("uses a default stop reason for an empty body", async () => {
    await call("POST", "/api/stop");

    expect(lifecycle.snapshot().stop_reason).toBe("Stop requested through the control API");
  });

  it("reports whether a reload is immediate or deferred", async () => {
    const idle = await call("POST", "/api/reload", "{}");
    expect(idle.json).toEqual({ ok: true, reload: "immediate" });

    lifecycle.acknowledgeReload();
    lifecycle.beginTask("abc123");
    const busy = await call("POST", "/api/reload", JSON.stringify({ reason: "new config" }));

    expect(busy.json).toEqual({ ok: true, reload: "deferred" });
    expect(lifecycle.snapshot()).toMatchObject({
      should_reload: false,
      reload_after_current_task: true,
      reload_reason: "new config",
    });
  });

  it("queues add and clear commands for the loop", async () => {
    const added = await call("POST", "/api/tasks", JSON.stringify({ text: "  write docs  ", position: "head" }));
    const tail = await call("POST", "/api/tasks", JSON.stringify({ text: "fix tests" }));
    const cleared = await call("DELETE", "/api/tasks");

    expect(added).toMatchObject({ status: 202, json: { ok: true, queued: { text: "write docs", position: "head" } } });
    expect(tail.json).toEqual({ ok: true, queued: { text: "fix tests", position: "tail" } });
    expect(cleared).toMatchObject({ status: 202, json: { ok: true, clearing: true } });
    expect(lifecycle.drainCommands()).toEqual([
      { kind: "add", text: "write docs", position: "head" },
      { kind: "add", text: "fix tests", position: "tail" },
      { kind: "clear" },
    ]);
  });

  it("skips the current task only while one is running", async () => {
    const idle = await call("POST", "/api/tasks/skip-current");
    expect(idle).toMatchObject({
      status: 409,
      json: { ok: false, error: { code: "conflict", message: "No task is in progress." } },
    });

    lifecycle.beginTask("abc123");
    const busy = await call("POST", "/api/tasks/skip-current");

    expect(busy).toMatchObject({ status: 202, json: { ok: true, skipping: "abc123" } });
    expect(lifecycle.snapshot().skip_current_task).toBe(true);
  });

  it("rejects bodies that fail validation", async () => {
    const empty = await call("POST", "/api/tasks", JSON.stringify({ text: "   " }));
    const extra = await call("POST", "/api/stop", JSON.stringify({ reason: "x", force: true }));
    const broken = await call("POST", "/api/stop", "{not json");

    expect(empty).toMatchObject({ status: 400, json: { ok: false, error: { code: "invalid_body" } } });
    expect(extra).toMatchObject({ status: 400, json: { ok: false, error: { code: "invalid_body" } } });
    expect(broken).toMatchObject({
      status: 400,
      json: { ok: false, error: { code: "bad_request", message: "Request body is not valid JSON." } },
    });
    expect(lifecycle.snapshot().should_stop).toBe(false);
    expect(lifecycle.pendingCommandCount()).toBe(0);
  });

  it("rejects oversized bodies", async () => {
    const res = await call("POST", "/api/tasks", JSON.stringify({ text: "x".repeat(400) }));

    expect(res).toMatchObject({
      status: 413,
      json: { ok: false, error: { code: "payload_too_large", message: "Request body exceeds 256 bytes." } },
    });
  });

  it("answers unknown paths and methods", async () => {
    const missing = await call("GET", "/api/nothing");
    const wrongMethod = await call("GET", "/api/stop");

    expect(missing).toMatchObject({ status: 404, json: { ok: false, error: { code: "not_found" } } });
    expect(wrongMethod).toMatchObject({
      status: 405,
      allow: "POST",
      json: { ok: false, error: { code: "method_not_allowed", message: "Method GET not allowed." } },
    });
  });
});
