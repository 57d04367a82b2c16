/*
Purpose: translate SIGINT/SIGTERM into a clean lifecycle stop for the orchestrator.
Assumptions: the first signal asks the loop to stop after the running step; a second one exits at once.
Usage: const handler = registerStopSignals({ lifecycle }); ... handler.cleanup();
*/

import type { LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";

// =============================================================================
// TYPES
// =============================================================================

export type StopSignalHandler = {
  cleanup: () => void;
  isStopped: () => boolean;
};

export type StopSignalOptions = {
  lifecycle: LifecycleSignals;
  signals?: NodeJS.Signals[];
  onSignal?: (signal: NodeJS.Signals) => void;
  onForce?: (signal: NodeJS.Signals) => void;
};

const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
const FORCED_EXIT_CODE = 130;

// =============================================================================
// PUBLIC API
// =============================================================================

export function registerStopSignals(options: StopSignalOptions): StopSignalHandler {
  const signals = options.signals ?? DEFAULT_SIGNALS;
  let received = 0;

  const handler = (signal: NodeJS.Signals): void => {
    received += 1;
    if (received === 1) {
      options.onSignal?.(signal);
      options.lifecycle.requestStop(`Received ${signal}`);
      return;
    }

    if (options.onForce) {
      options.onForce(signal);
      return;
    }
    process.exit(FORCED_EXIT_CODE);
  };

  for (const signal of signals) {
    process.on(signal, handler);
  }

  return {
    cleanup: () => {
      for (const signal of signals) {
        process.off(signal, handler);
      }
    },
    isStopped: () => received > 0,
  };
}
