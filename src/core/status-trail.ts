import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type StatusLevel = "info" | "warning" | "error";

export interface StatusReporter {
  append(message: string, level?: StatusLevel): Promise<void>;
}

export type StatusTrailOptions = {
  title?: string;
  now?: () => Date;
};

const LEVEL_PREFIX: Record<StatusLevel, string> = {
  info: "",
  warning: "WARNING: ",
  error: "ERROR: ",
};

const DEFAULT_TITLE = "Conveyor status trail";

// =============================================================================
// STATUS TRAIL
// =============================================================================

/**
 * Human-readable markdown trail of what the orchestrator did.
 * Appends are serialized; a failed write warns on the console and never reaches the caller.
 */
export class StatusTrail implements StatusReporter {
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  constructor(
    public readonly filePath: string,
    private readonly opts: StatusTrailOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  append(message: string, level: StatusLevel = "info"): Promise<void> {
    return this.write(`\n**[${formatTimestamp(this.now())}]** ${LEVEL_PREFIX[level]}${message}\n`);
  }

  taskStatus(taskText: string, status: string, details?: string): Promise<void> {
    const lines = [`**Task:** ${taskText}`, `**Status:** ${status}`];
    if (details) {
      lines.push(`**Details:** ${details}`);
    }
    return this.write(`\n### ${formatTimestamp(this.now())}\n${lines.join("\n")}\n`);
  }

  separator(): Promise<void> {
    return this.write("\n---\n");
  }

  private write(chunk: string): Promise<void> {
    this.queue = this.queue.then(() => this.appendChunk(chunk));
    return this.queue;
  }

  private async appendChunk(chunk: string): Promise<void> {
    try {
      if (!(await fse.pathExists(this.filePath))) {
        await fse.ensureDir(path.dirname(this.filePath));
        await fse.writeFile(this.filePath, this.header(), "utf8");
      }
      await fse.appendFile(this.filePath, chunk, "utf8");
    } catch (err) {
      console.warn(
        `Warning: failed to write status trail ${this.filePath}: ${formatErrorMessage(err)}`,
      );
    }
  }

  private header(): string {
    const title = this.opts.title ?? DEFAULT_TITLE;
    return `# ${title}\n\n> Created: ${formatTimestamp(this.now())}\n`;
  }
}

// YYYY-MM-DD HH:MM:SS in local time.
export function formatTimestamp(d: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${date} ${time}`;
}
