/**
 * Lifecycle signal coordinator.
 * Purpose: own every flag shared between the orchestration loop and outside signal sources
 * (control surface, source watcher, process signals).
 * Assumptions: all reads and writes go through this object; mutations are synchronous, so the
 * event loop serializes them and no caller ever observes a half-applied change.
 */

import { EventEmitter } from "node:events";

// =============================================================================
// TYPES
// =============================================================================

export type LifecycleFlags = {
  should_stop: boolean;
  should_reload: boolean;
  reload_after_current_task: boolean;
  task_in_progress: boolean;
  consecutive_idle_reload_signals: number;
  skip_current_task: boolean;
  current_task_id: string | null;
  stop_reason: string | null;
  clean_stop: boolean;
  reload_reason: string | null;
};

export type TaskPosition = "head" | "tail";

export type TaskCommand =
  | { kind: "add"; text: string; position: TaskPosition }
  | { kind: "clear" };

export type ReloadOutcome = "immediate" | "deferred";

const CHANGE_EVENT = "change";

// =============================================================================
// COORDINATOR
// =============================================================================

export class LifecycleSignals {
  private readonly events = new EventEmitter();
  private readonly commands: TaskCommand[] = [];
  private flags: LifecycleFlags = {
    should_stop: false,
    should_reload: false,
    reload_after_current_task: false,
    task_in_progress: false,
    consecutive_idle_reload_signals: 0,
    skip_current_task: false,
    current_task_id: null,
    stop_reason: null,
    clean_stop: true,
    reload_reason: null,
  };

  constructor() {
    this.events.setMaxListeners(0);
  }

  snapshot(): LifecycleFlags {
    return { ...this.flags };
  }

  // ===========================================================================
  // STOP / RELOAD
  // ===========================================================================

  requestStop(reason: string, opts: { clean?: boolean } = {}): void {
    const clean = opts.clean ?? true;
    const keepExistingReason = this.flags.stop_reason !== null && (clean || !this.flags.clean_stop);

    this.flags.should_stop = true;
    this.flags.clean_stop = this.flags.clean_stop && clean;
    if (!keepExistingReason) {
      this.flags.stop_reason = reason;
    }
    this.notify();
  }

  requestReload(reason: string): ReloadOutcome {
    this.flags.reload_reason = reason;

    if (this.flags.task_in_progress) {
      this.flags.reload_after_current_task = true;
      this.notify();
      return "deferred";
    }

    this.flags.should_reload = true;
    this.flags.consecutive_idle_reload_signals += 1;
    this.notify();
    return "immediate";
  }

  acknowledgeReload(): void {
    this.flags.should_reload = false;
    this.flags.reload_after_current_task = false;
    this.flags.reload_reason = null;
  }

  // ===========================================================================
  // TASK TRACKING
  // ===========================================================================

  beginTask(taskId: string): void {
    this.flags.task_in_progress = true;
    this.flags.current_task_id = taskId;
    this.flags.skip_current_task = false;
    this.flags.consecutive_idle_reload_signals = 0;
    this.notify();
  }

  endTask(): void {
    this.flags.task_in_progress = false;
    this.flags.current_task_id = null;
    this.flags.skip_current_task = false;

    if (this.flags.reload_after_current_task) {
      this.flags.reload_after_current_task = false;
      this.flags.should_reload = true;
    }
    this.notify();
  }

  requestSkipCurrent(): boolean {
    if (!this.flags.task_in_progress) {
      return false;
    }
    this.flags.skip_current_task = true;
    this.notify();
    return true;
  }

  consumeSkipRequest(): boolean {
    const requested = this.flags.skip_current_task;
    this.flags.skip_current_task = false;
    return requested;
  }

  // ===========================================================================
  // TASK COMMANDS
  // ===========================================================================

  enqueueTask(text: string, position: TaskPosition = "tail"): void {
    this.commands.push({ kind: "add", text, position });
    this.notify();
  }

  requestClear(): void {
    this.commands.push({ kind: "clear" });
    this.notify();
  }

  drainCommands(): TaskCommand[] {
    return this.commands.splice(0, this.commands.length);
  }

  pendingCommandCount(): number {
    return this.commands.length;
  }

  // ===========================================================================
  // WAITING
  // ===========================================================================

  // Resolves true when any signal arrives before the timeout, false otherwise.
  waitForChange(timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const onChange = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.events.off(CHANGE_EVENT, onChange);
        resolve(false);
      }, timeoutMs);

      this.events.once(CHANGE_EVENT, onChange);
    });
  }

  private notify(): void {
    this.events.emit(CHANGE_EVENT);
  }
}
