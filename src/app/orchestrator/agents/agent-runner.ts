import Handlebars from "handlebars";

// =============================================================================
// TYPES
// =============================================================================

export type AgentInvocation = {
  instruction: string;
  instructionFile?: string;
  taskId: string;
  timeoutMs: number;
};

export type AgentRunOutput = {
  // null when the process never produced an exit status (launch failure).
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export interface AgentRunner {
  readonly kind: "local" | "docker";
  run(invocation: AgentInvocation): Promise<AgentRunOutput>;
  checkReady(): Promise<boolean>;
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export function renderAgentArgs(templates: string[], invocation: AgentInvocation): string[] {
  const values = {
    instruction: invocation.instruction,
    instruction_file: invocation.instructionFile ?? "",
    task_id: invocation.taskId,
  };

  return templates.map((template) =>
    Handlebars.compile(template, { noEscape: true, strict: true })(values),
  );
}
