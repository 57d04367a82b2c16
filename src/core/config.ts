import { z } from "zod";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_CONTROL_PHRASE = "TASK COMPLETE";

export const DEFAULT_CATEGORY_KEYWORDS: Record<string, string[]> = {
  test: ["test", "tests", "coverage", "spec"],
  documentation: ["doc", "docs", "readme", "documentation", "comment"],
  refactoring: ["refactor", "cleanup", "clean up", "restructure", "rename"],
  development: ["add", "implement", "create", "build", "feature", "support"],
};

const DEFAULT_INSTRUCTIONS = {
  default: [
    {
      instruction_id: 1,
      template: [
        "Task: {{task_name}}",
        "",
        "Complete this task in the project.",
        "When you are done, write a short report to {{result_file}}",
        "and finish the report with the line: {{control_phrase}}",
      ].join("\n"),
      wait_for_file: "{{results_dir}}/result_{{task_id}}_{{step}}.md",
      control_phrase: DEFAULT_CONTROL_PHRASE,
    },
  ],
};

// =============================================================================
// SCHEMA
// =============================================================================

const ServerSchema = z.object({
  check_interval_seconds: z.number().positive().default(60),
  task_delay_seconds: z.number().nonnegative().default(5),
  max_iterations: z.number().int().positive().optional(),
  max_task_attempts: z.number().int().positive().default(3),
});

const ControlSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(0).max(65535).default(4717),
});

const DockerAgentSchema = z.object({
  container: z.string().min(1),
  workdir: z.string().optional(),
  user: z.string().optional(),
  agent_path: z.string().min(1).default("agent"),
  // Shell command that reinstalls the agent inside the container when the executable is missing.
  provision_command: z.string().min(1).optional(),
  ready_timeout_seconds: z.number().positive().default(60),
});

const AgentSchema = z
  .object({
    runner: z.enum(["local", "docker"]).default("local"),
    command: z.string().min(1),
    // Handlebars templates; {{instruction}}, {{instruction_file}} and {{task_id}} are available.
    args: z.array(z.string()).default(["{{instruction}}"]),
    check_args: z.array(z.string()).default(["--version"]),
    timeout_seconds: z.number().positive().default(1800),
    session_paths: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    docker: DockerAgentSchema.optional(),
  })
  .superRefine((agent, ctx) => {
    if (agent.runner === "docker" && !agent.docker) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["docker"],
        message: "agent.docker is required when agent.runner is docker",
      });
    }
  });

export const FailurePatternsSchema = z.object({
  critical: z.array(z.string().min(1)).optional(),
  recoverable: z.array(z.string().min(1)).optional(),
  reserved_exit_codes: z.array(z.number().int()).optional(),
  exit_code_pattern: z.string().min(1).optional(),
});

export type FailurePatternsConfig = z.infer<typeof FailurePatternsSchema>;

const ErrorsSchema = z.object({
  max_streak: z.number().int().positive().default(3),
  initial_delay_seconds: z.number().nonnegative().default(30),
  delay_increment_seconds: z.number().nonnegative().default(30),
  max_restart_attempts: z.number().int().positive().default(3),
  max_instruction_retries: z.number().int().positive().default(10),
  signature_length: z.number().int().positive().default(100),
  patterns: FailurePatternsSchema.default({}),
});

const ResultsSchema = z.object({
  dir: z.string().min(1).optional(),
  instructions_dir: z.string().min(1).optional(),
  poll_interval_seconds: z.number().positive().default(5),
  timeout_seconds: z.number().positive().default(3600),
});

export const InstructionSchema = z.object({
  instruction_id: z.number().int().positive(),
  template: z.string().min(1),
  wait_for_file: z.string().min(1).optional(),
  control_phrase: z.string().min(1).optional(),
  timeout_seconds: z.number().positive().optional(),
});

export type InstructionConfig = z.infer<typeof InstructionSchema>;

const InstructionsSchema = z
  .record(z.array(InstructionSchema).min(1))
  .default(DEFAULT_INSTRUCTIONS)
  .refine((sets) => "default" in sets, {
    message: "instructions must define a default category",
  });

const VerificationSchema = z.object({
  min_content_length: z.number().int().nonnegative().default(1),
});

const WatchSchema = z.object({
  enabled: z.boolean().default(false),
  paths: z.array(z.string().min(1)).default([]),
  debounce_ms: z.number().int().nonnegative().default(1000),
});

export const ConveyorConfigSchema = z.object({
  project_dir: z.string().min(1).default("."),
  todo_file: z.string().min(1).default("TODO.md"),
  home_dir: z.string().min(1).optional(),

  server: ServerSchema.default({}),
  control: ControlSchema.default({}),
  agent: AgentSchema,
  errors: ErrorsSchema.default({}),
  results: ResultsSchema.default({}),

  categories: z.record(z.array(z.string().min(1))).default(DEFAULT_CATEGORY_KEYWORDS),
  instructions: InstructionsSchema,

  verification: VerificationSchema.default({}),
  watch: WatchSchema.default({}),
});

export type ConveyorConfigInput = z.input<typeof ConveyorConfigSchema>;
export type ConveyorConfig = z.infer<typeof ConveyorConfigSchema>;

export type AgentConfig = ConveyorConfig["agent"];
export type DockerAgentConfig = z.infer<typeof DockerAgentSchema>;
export type ErrorsConfig = ConveyorConfig["errors"];
export type ServerConfig = ConveyorConfig["server"];
export type WatchConfig = ConveyorConfig["watch"];

// Paths below are absolute once the loader has resolved them.
export type ResolvedResultsConfig = Omit<ConveyorConfig["results"], "dir" | "instructions_dir"> & {
  dir: string;
  instructions_dir: string;
};

export type ResolvedConveyorConfig = Omit<ConveyorConfig, "home_dir" | "results"> & {
  home_dir: string;
  results: ResolvedResultsConfig;
};
