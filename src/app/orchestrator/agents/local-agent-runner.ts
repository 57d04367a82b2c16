import { execa } from "execa";

import type { AgentInvocation, AgentRunOutput, AgentRunner } from "./agent-runner.js";
import { renderAgentArgs } from "./agent-runner.js";

export type LocalAgentRunnerOptions = {
  command: string;
  args: string[];
  checkArgs: string[];
  cwd: string;
  env?: Record<string, string>;
  readyTimeoutMs?: number;
};

export class LocalAgentRunner implements AgentRunner {
  readonly kind = "local";

  constructor(private readonly options: LocalAgentRunnerOptions) {}

  async run(invocation: AgentInvocation): Promise<AgentRunOutput> {
    const res = await execa(this.options.command, renderAgentArgs(this.options.args, invocation), {
      cwd: this.options.cwd,
      env: this.options.env,
      reject: false,
      stdin: "ignore",
      timeout: invocation.timeoutMs,
    });

    return {
      exitCode: typeof res.exitCode === "number" ? res.exitCode : null,
      stdout: res.stdout,
      stderr: res.stderr,
      timedOut: res.timedOut,
    };
  }

  async checkReady(): Promise<boolean> {
    const res = await execa(this.options.command, this.options.checkArgs, {
      cwd: this.options.cwd,
      env: this.options.env,
      reject: false,
      stdin: "ignore",
      timeout: this.options.readyTimeoutMs ?? 30_000,
    });
    return res.exitCode === 0;
  }
}
