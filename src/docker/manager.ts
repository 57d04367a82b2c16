import { PassThrough } from "node:stream";

import Docker from "dockerode";

import { DockerError } from "../core/errors.js";

import {
  createMissingContainerError,
  describeDockerError,
  dockerClient,
  findContainerByName,
  startContainer,
  stopContainer,
} from "./docker.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExecOptions = {
  env?: Record<string, string | undefined>;
  workdir?: string;
  user?: string;
  timeoutMs?: number;
};

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

// The subset of container control the agent runner and environment restart rely on.
export interface AgentContainer {
  readonly name: string;
  exec(command: string[], opts?: ExecOptions): Promise<ExecResult>;
  stop(): Promise<void>;
  start(): Promise<void>;
}

// =============================================================================
// MANAGER
// =============================================================================

export class DockerManager {
  private readonly docker: Docker;

  constructor(opts: { docker?: Docker } = {}) {
    this.docker = opts.docker ?? dockerClient();
  }

  container(name: string): AgentContainer {
    return {
      name,
      exec: async (command, opts) => this.execInContainer(await this.requireContainer(name), command, opts),
      stop: async () => stopContainer(await this.requireContainer(name)),
      start: async () => startContainer(await this.requireContainer(name)),
    };
  }

  async requireContainer(name: string): Promise<Docker.Container> {
    const container = await findContainerByName(this.docker, name);
    if (!container) {
      throw createMissingContainerError(name);
    }
    return container;
  }

  async execInContainer(
    container: Docker.Container,
    command: string[],
    opts: ExecOptions = {},
  ): Promise<ExecResult> {
    try {
      const exec = await container.exec({
        Cmd: command,
        Env: normalizeEnv(opts.env),
        AttachStdout: true,
        AttachStderr: true,
        WorkingDir: opts.workdir,
        User: opts.user,
        Tty: false,
      });

      const stdout = new PassThrough();
      const stderr = new PassThrough();

      const stream = await exec.start({ hijack: true, stdin: false });
      this.docker.modem.demuxStream(stream, stdout, stderr);
      closeWithSource(stream, stdout, stderr);

      const collected = Promise.all([collectStream(stdout), collectStream(stderr)]);
      const outcome = await withTimeout(collected, opts.timeoutMs);
      if (outcome === null) {
        stream.destroy();
        return { exitCode: -1, stdout: "", stderr: "", timedOut: true };
      }

      const [stdoutText, stderrText] = outcome;
      const inspect = await exec.inspect();
      const exitCode = inspect.ExitCode ?? -1;

      return { exitCode, stdout: stdoutText, stderr: stderrText, timedOut: false };
    } catch (err) {
      throw new DockerError(`Failed to exec in container: ${describeDockerError(err)}`, err);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

export function normalizeEnv(env?: Record<string, string | undefined>): string[] | undefined {
  if (!env) return undefined;
  return Object.entries(env)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${value}`);
}

function closeWithSource(
  stream: NodeJS.ReadableStream,
  stdout: PassThrough,
  stderr: PassThrough,
): void {
  const close = (): void => {
    stdout.end();
    stderr.end();
  };

  stream.on("end", close);
  stream.on("close", close);
  stream.on("error", (err: Error) => {
    stdout.destroy(err);
    stderr.destroy(err);
  });
}

function collectStream(stream: PassThrough): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    });
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    stream.on("error", reject);
  });
}

async function withTimeout<T>(work: Promise<T>, timeoutMs?: number): Promise<T | null> {
  if (timeoutMs === undefined) return work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
