/**
 * File-based result handshake with the external agent.
 * Purpose: write instruction artifacts and wait for the agent's result artifact to carry its control phrase.
 * Assumptions: the agent writes results on the same filesystem; a missing phrase means the file is still partial.
 * Usage: the task state machine depends on the ResultChannel interface only.
 */

import path from "node:path";

import fse from "fs-extra";

import { logOrchestratorEvent, type JsonlLogger } from "../../../core/logger.js";
import { instructionFileName } from "../../../core/paths.js";
import { sleep as defaultSleep, type Sleep } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResultWaitRequest = {
  taskId: string;
  candidatePaths: string[];
  controlPhrase?: string;
  timeoutMs: number;
};

export type ResultWaitOutcome = {
  success: boolean;
  content: string | null;
  filePath: string | null;
  waitTimeMs: number;
};

export interface ResultChannel {
  writeInstruction(taskId: string, step: number, text: string): Promise<string>;
  waitForResult(request: ResultWaitRequest): Promise<ResultWaitOutcome>;
}

export type FileResultChannelOptions = {
  instructionsDir: string;
  pollIntervalMs: number;
  logger?: JsonlLogger;
  sleep?: Sleep;
  now?: () => number;
};

const DATE_STAMP_PATTERN = /[_-]\d{8}(?=[._-]|$)/;

// =============================================================================
// CHANNEL
// =============================================================================

export class FileResultChannel implements ResultChannel {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly options: FileResultChannelOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async writeInstruction(taskId: string, step: number, text: string): Promise<string> {
    const filePath = path.join(this.options.instructionsDir, instructionFileName(taskId, step));
    await fse.ensureDir(this.options.instructionsDir);
    await fse.writeFile(filePath, text, "utf8");
    return filePath;
  }

  async waitForResult(request: ResultWaitRequest): Promise<ResultWaitOutcome> {
    const candidates = dedupe(request.candidatePaths);
    for (const dir of dedupe(candidates.map((candidate) => path.dirname(candidate)))) {
      await fse.ensureDir(dir);
    }

    const startedAt = this.now();
    if (this.options.logger) {
      logOrchestratorEvent(this.options.logger, "result.wait.start", {
        taskId: request.taskId,
        candidates,
        control_phrase: request.controlPhrase ?? null,
        timeout_ms: request.timeoutMs,
      });
    }

    while (true) {
      const found = await findCompletedResult(candidates, request.controlPhrase);
      const elapsed = this.now() - startedAt;

      if (found) {
        this.logOutcome(request.taskId, "result.wait.complete", elapsed, found.filePath);
        return { success: true, content: found.content, filePath: found.filePath, waitTimeMs: elapsed };
      }

      if (elapsed >= request.timeoutMs) {
        this.logOutcome(request.taskId, "result.wait.timeout", elapsed, null);
        return { success: false, content: null, filePath: null, waitTimeMs: elapsed };
      }

      await this.sleep(Math.min(this.options.pollIntervalMs, request.timeoutMs - elapsed));
    }
  }

  private logOutcome(taskId: string, type: string, elapsed: number, filePath: string | null): void {
    if (!this.options.logger) return;
    logOrchestratorEvent(this.options.logger, type, {
      taskId,
      wait_ms: elapsed,
      file_path: filePath,
    });
  }
}

// =============================================================================
// CANDIDATES
// =============================================================================

// Primary path first, then the same name with .md/.txt swapped and without a YYYYMMDD stamp.
export function buildCandidatePaths(primary: string): string[] {
  const dir = path.dirname(primary);
  const ext = path.extname(primary);
  const stem = path.basename(primary, ext);

  const stems = [stem];
  const undated = stem.replace(DATE_STAMP_PATTERN, "");
  if (undated !== stem && undated.length > 0) {
    stems.push(undated);
  }

  const extensions = [ext];
  if (ext === ".md") extensions.push(".txt");
  if (ext === ".txt") extensions.push(".md");

  const candidates: string[] = [];
  for (const candidateStem of stems) {
    for (const candidateExt of extensions) {
      candidates.push(path.join(dir, `${candidateStem}${candidateExt}`));
    }
  }

  return dedupe(candidates);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function findCompletedResult(
  candidates: string[],
  controlPhrase?: string,
): Promise<{ filePath: string; content: string } | null> {
  for (const filePath of candidates) {
    let content: string;
    try {
      content = await fse.readFile(filePath, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) continue;
      throw err;
    }

    if (!controlPhrase || content.includes(controlPhrase)) {
      return { filePath, content };
    }
  }
  return null;
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EISDIR");
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
