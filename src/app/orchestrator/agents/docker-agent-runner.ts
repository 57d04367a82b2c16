import type { AgentContainer } from "../../../docker/manager.js";

import type { AgentInvocation, AgentRunOutput, AgentRunner } from "./agent-runner.js";
import { renderAgentArgs } from "./agent-runner.js";

export type DockerAgentRunnerOptions = {
  container: AgentContainer;
  agentPath: string;
  args: string[];
  checkArgs: string[];
  workdir?: string;
  user?: string;
  env?: Record<string, string>;
  readyTimeoutMs?: number;
};

export class DockerAgentRunner implements AgentRunner {
  readonly kind = "docker";

  constructor(private readonly options: DockerAgentRunnerOptions) {}

  async run(invocation: AgentInvocation): Promise<AgentRunOutput> {
    const command = [this.options.agentPath, ...renderAgentArgs(this.options.args, invocation)];
    const res = await this.options.container.exec(command, {
      env: this.options.env,
      workdir: this.options.workdir,
      user: this.options.user,
      timeoutMs: invocation.timeoutMs,
    });

    return {
      exitCode: res.timedOut ? null : res.exitCode,
      stdout: res.stdout,
      stderr: res.stderr,
      timedOut: res.timedOut,
    };
  }

  async checkReady(): Promise<boolean> {
    const res = await this.options.container.exec(
      [this.options.agentPath, ...this.options.checkArgs],
      {
        workdir: this.options.workdir,
        user: this.options.user,
        timeoutMs: this.options.readyTimeoutMs ?? 30_000,
      },
    );
    return !res.timedOut && res.exitCode === 0;
  }
}
