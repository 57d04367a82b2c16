import { afterEach, describe, expect, it } from "vitest";

import { LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";

import { registerStopSignals, type StopSignalHandler } from "./signal-handlers.js";

let handler: StopSignalHandler | null = null;

afterEach(() => {
  handler?.cleanup();
  handler = null;
});

describe("registerStopSignals", () => {
  it("requests a clean stop on the first signal and forces on the second", () => {
    const lifecycle = new LifecycleSignals();
    const seen: string[] = [];
    handler = registerStopSignals({
      lifecycle,
      signals: ["SIGUSR2"],
      onSignal: (signal) => seen.push(`stop:${signal}`),
      onForce: (signal) => seen.push(`force:${signal}`),
    });

    process.emit("SIGUSR2", "SIGUSR2");
    expect(handler.isStopped()).toBe(true);
    expect(lifecycle.snapshot()).toMatchObject({
      should_stop: true,
      clean_stop: true,
      stop_reason: "Received SIGUSR2",
    });

    process.emit("SIGUSR2", "SIGUSR2");
    expect(seen).toEqual(["stop:SIGUSR2", "force:SIGUSR2"]);
  });

  it("removes its listeners on cleanup", () => {
    const before = process.listenerCount("SIGUSR2");
    handler = registerStopSignals({ lifecycle: new LifecycleSignals(), signals: ["SIGUSR2"] });

    expect(process.listenerCount("SIGUSR2")).toBe(before + 1);
    handler.cleanup();
    expect(process.listenerCount("SIGUSR2")).toBe(before);
  });
});
