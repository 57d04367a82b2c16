import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import {
  beginTaskRecord,
  findTask,
  findTaskByText,
  finishTaskRecord,
  resetInterruptedTasks,
  setInstructionProgress,
  skipTaskRecord,
  suspendTaskRecord,
} from "./checkpoint-ledger.js";
import {
  CheckpointLedgerSchema,
  createEmptyLedger,
  type CheckpointLedger,
  type TaskRecord,
  type TaskRecordState,
} from "./checkpoint-schema.js";
import { CheckpointError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LedgerWriter = (filePath: string, ledger: CheckpointLedger) => Promise<void>;

export type CheckpointStoreOptions = {
  writer?: LedgerWriter;
  now?: () => string;
};

export type RecoveryInfo = {
  wasCleanShutdown: boolean;
  lastStopReason: string | null;
  lastStartTime: string | null;
  lastStopTime: string | null;
  sessionId: string | null;
  iterationCount: number;
  currentTask: TaskRecord | null;
  recoveredTasks: TaskRecord[];
  incompleteTasks: TaskRecord[];
  failedTasks: TaskRecord[];
};

export type CheckpointStatistics = Record<TaskRecordState, number> & {
  total: number;
  totalAttempts: number;
  iterationCount: number;
};

type PreviousSession = {
  cleanShutdown: boolean;
  lastStopReason: string | null;
  lastStartTime: string | null;
  lastStopTime: string | null;
  sessionId: string | null;
};

const RECOVERY_REASON = "Interrupted by an unclean shutdown";

// =============================================================================
// STORE
// =============================================================================

export class CheckpointStore {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    public readonly filePath: string,
    private readonly ledger: CheckpointLedger,
    private readonly previous: PreviousSession,
    private readonly recovered: TaskRecord[],
    private readonly writer: LedgerWriter,
    private readonly now: () => string,
  ) {}

  static async open(filePath: string, opts: CheckpointStoreOptions = {}): Promise<CheckpointStore> {
    const ledger = await loadLedger(filePath);
    const previous: PreviousSession = {
      cleanShutdown: ledger.clean_shutdown,
      lastStopReason: ledger.last_stop_reason,
      lastStartTime: ledger.last_start_time,
      lastStopTime: ledger.last_stop_time,
      sessionId: ledger.session_id,
    };

    const recovered = ledger.clean_shutdown ? [] : resetInterruptedTasks(ledger, RECOVERY_REASON);
    const store = new CheckpointStore(
      filePath,
      ledger,
      previous,
      recovered.map(cloneRecord),
      opts.writer ?? writeLedgerFile,
      opts.now ?? isoNow,
    );

    if (recovered.length > 0) {
      await store.persist();
    }

    return store;
  }

  // ===========================================================================
  // SESSION MARKERS
  // ===========================================================================

  async markServerStart(sessionId: string): Promise<void> {
    this.ledger.session_id = sessionId;
    this.ledger.last_start_time = this.now();
    this.ledger.clean_shutdown = false;
    this.ledger.last_stop_reason = null;
    await this.persist();
  }

  async markServerStop(clean: boolean, reason?: string): Promise<void> {
    this.ledger.last_stop_time = this.now();
    this.ledger.clean_shutdown = clean;
    this.ledger.last_stop_reason = reason ?? null;
    await this.persist();
  }

  async incrementIteration(): Promise<number> {
    this.ledger.iteration_count += 1;
    await this.persist();
    return this.ledger.iteration_count;
  }

  getIterationCount(): number {
    return this.ledger.iteration_count;
  }

  // ===========================================================================
  // TASK TRANSITIONS
  // ===========================================================================

  async startTask(text: string, opts: { category?: string } = {}): Promise<TaskRecord> {
    const record = beginTaskRecord(this.ledger, text, { category: opts.category, now: this.now() });
    await this.persist();
    return cloneRecord(record);
  }

  async endTask(taskId: string, success: boolean, error?: string): Promise<TaskRecord> {
    const record = finishTaskRecord(this.ledger, taskId, success, error, this.now());
    await this.persist();
    return cloneRecord(record);
  }

  async skipTask(text: string, reason: string): Promise<TaskRecord> {
    const record = skipTaskRecord(this.ledger, text, reason, this.now());
    await this.persist();
    return cloneRecord(record);
  }

  async suspendTask(taskId: string): Promise<TaskRecord> {
    const record = suspendTaskRecord(this.ledger, taskId);
    await this.persist();
    return cloneRecord(record);
  }

  async recordInstructionProgress(taskId: string, step: number): Promise<TaskRecord> {
    const record = setInstructionProgress(this.ledger, taskId, step);
    await this.persist();
    return cloneRecord(record);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  isTaskCompleted(text: string): boolean {
    return findTaskByText(this.ledger, text)?.state === "completed";
  }

  isTaskSettled(text: string): boolean {
    const state = findTaskByText(this.ledger, text)?.state;
    return state === "completed" || state === "skipped";
  }

  getTask(taskId: string): TaskRecord | null {
    const record = findTask(this.ledger, taskId);
    return record ? cloneRecord(record) : null;
  }

  findByText(text: string): TaskRecord | null {
    const record = findTaskByText(this.ledger, text);
    return record ? cloneRecord(record) : null;
  }

  listTasks(): TaskRecord[] {
    return this.ledger.tasks.map(cloneRecord);
  }

  snapshot(): CheckpointLedger {
    return { ...this.ledger, tasks: this.listTasks() };
  }

  getRecoveryInfo(): RecoveryInfo {
    const tasks = this.listTasks();
    const inProgress = tasks.find((task) => task.state === "in_progress");

    return {
      wasCleanShutdown: this.previous.cleanShutdown,
      lastStopReason: this.previous.lastStopReason,
      lastStartTime: this.previous.lastStartTime,
      lastStopTime: this.previous.lastStopTime,
      sessionId: this.previous.sessionId,
      iterationCount: this.ledger.iteration_count,
      currentTask: inProgress ?? this.recovered[0] ?? null,
      recoveredTasks: this.recovered.map(cloneRecord),
      incompleteTasks: tasks.filter(
        (task) => task.state === "in_progress" || (task.state === "pending" && task.attempts > 0),
      ),
      failedTasks: tasks.filter((task) => task.state === "failed"),
    };
  }

  getStatistics(): CheckpointStatistics {
    const stats: CheckpointStatistics = {
      total: this.ledger.tasks.length,
      pending: 0,
      in_progress: 0,
      completed: 0,
      failed: 0,
      skipped: 0,
      totalAttempts: 0,
      iterationCount: this.ledger.iteration_count,
    };

    for (const task of this.ledger.tasks) {
      stats[task.state] += 1;
      stats.totalAttempts += task.attempts;
    }

    return stats;
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  private persist(): Promise<void> {
    const parsed = CheckpointLedgerSchema.safeParse(this.ledger);
    if (!parsed.success) {
      return Promise.reject(
        new CheckpointError(`Cannot save checkpoint ledger: ${parsed.error.toString()}`),
      );
    }

    const payload = parsed.data;
    const run = this.writeQueue.then(() => this.writeWithRetry(payload));
    // Keep later writes ordered even when this one fails; the caller still sees the failure.
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private async writeWithRetry(payload: CheckpointLedger): Promise<void> {
    try {
      await this.writer(this.filePath, payload);
    } catch (firstError) {
      try {
        await this.writer(this.filePath, payload);
      } catch (secondError) {
        throw new CheckpointError(
          `Failed to persist checkpoint ledger at ${this.filePath} after retry: ${formatErrorMessage(secondError)}`,
          { first: firstError, second: secondError },
        );
      }
    }
  }
}

// =============================================================================
// FILE IO
// =============================================================================

export async function loadLedger(filePath: string): Promise<CheckpointLedger> {
  if (!(await fse.pathExists(filePath))) {
    return createEmptyLedger();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fse.readFile(filePath, "utf8"));
  } catch (err) {
    throw new CheckpointError(`Failed to read checkpoint ledger at ${filePath}`, err);
  }

  const parsed = CheckpointLedgerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CheckpointError(
      `Invalid checkpoint ledger at ${filePath}: ${parsed.error.toString()}`,
      parsed.error,
    );
  }

  return parsed.data;
}

export async function writeLedgerFile(
  filePath: string,
  ledger: CheckpointLedger,
  tempPath?: string,
): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = tempPath ?? `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(ledger, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}

function cloneRecord(record: TaskRecord): TaskRecord {
  return { ...record };
}
