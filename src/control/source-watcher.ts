/**
 * Source-change watcher.
 * Purpose: turn file changes under the watched paths into a single debounced reload request.
 * Assumptions: reload deferral while a task runs is owned by LifecycleSignals, not by this module.
 */

import path from "node:path";

import { watch } from "chokidar";

import type { LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ChangeEmitter {
  on(event: "all", listener: (eventName: string, filePath: string) => void): unknown;
  on(event: "error", listener: (error: unknown) => void): unknown;
  close(): Promise<void>;
}

export type WatchFactory = (
  paths: string[],
  options: { ignoreInitial: boolean; ignored: (filePath: string) => boolean },
) => ChangeEmitter;

export type SourceWatcherOptions = {
  paths: string[];
  debounceMs: number;
  lifecycle: LifecycleSignals;
  logger: JsonlLogger;
  baseDir?: string;
  // Directories the orchestrator writes to itself (home, results, instructions).
  ignoreDirs?: string[];
  createWatcher?: WatchFactory;
};

export type SourceWatcherHandle = {
  close: () => Promise<void>;
};

const IGNORED_SEGMENTS = new Set(["node_modules", ".git"]);

// =============================================================================
// PUBLIC API
// =============================================================================

export function startSourceWatcher(options: SourceWatcherOptions): SourceWatcherHandle {
  const createWatcher = options.createWatcher ?? defaultWatchFactory;
  const ignoreDirs = (options.ignoreDirs ?? []).map((dir) => path.resolve(dir));
  const changed = new Set<string>();
  let timer: NodeJS.Timeout | null = null;

  const flush = (): void => {
    timer = null;
    const files = [...changed];
    changed.clear();
    if (files.length === 0) return;

    const first = describePath(files[0] ?? "", options.baseDir);
    const reason =
      files.length === 1 ? `Source changed: ${first}` : `Source changed: ${first} (+${files.length - 1} more)`;
    const outcome = options.lifecycle.requestReload(reason);
    logOrchestratorEvent(options.logger, "watch.reload", { reason, outcome, files: files.length });
  };

  const watcher = createWatcher(options.paths, {
    ignoreInitial: true,
    ignored: (filePath) => isIgnored(filePath, ignoreDirs),
  });

  watcher.on("all", (eventName, filePath) => {
    if (eventName === "addDir") return;
    changed.add(filePath);
    if (timer) clearTimeout(timer);
    timer = setTimeout(flush, options.debounceMs);
  });

  watcher.on("error", (error) => {
    logOrchestratorEvent(options.logger, "watch.error", { message: formatErrorMessage(error) });
  });

  logOrchestratorEvent(options.logger, "watch.start", {
    paths: options.paths,
    debounce_ms: options.debounceMs,
  });

  return {
    close: async () => {
      if (timer) clearTimeout(timer);
      timer = null;
      changed.clear();
      await watcher.close();
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function defaultWatchFactory(
  paths: string[],
  options: { ignoreInitial: boolean; ignored: (filePath: string) => boolean },
): ChangeEmitter {
  return watch(paths, options);
}

export function isIgnored(filePath: string, ignoreDirs: string[]): boolean {
  const resolved = path.resolve(filePath);
  if (resolved.split(path.sep).some((segment) => IGNORED_SEGMENTS.has(segment))) {
    return true;
  }
  return ignoreDirs.some((dir) => resolved === dir || resolved.startsWith(`${dir}${path.sep}`));
}

function describePath(filePath: string, baseDir?: string): string {
  if (!baseDir) return filePath;
  const relative = path.relative(baseDir, filePath);
  return relative.length > 0 && !relative.startsWith("..") ? relative : filePath;
}
