import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import {
  ConveyorConfigSchema,
  type ConveyorConfig,
  type ResolvedConveyorConfig,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { defaultResultsDir, defaultInstructionsDir, resolveConveyorHome } from "./paths.js";

export const DEFAULT_CONFIG_FILE = "conveyor.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Create ${DEFAULT_CONFIG_FILE} in the project or pass --config <path>.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `${cause.message}`,
    next: `Edit ${configPath}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadConveyorConfig(configPath: string): ResolvedConveyorConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });
    return parseConveyorConfig(expanded, path.dirname(absolutePath), absolutePath);
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export function parseConveyorConfig(
  doc: unknown,
  baseDir: string,
  source = "<inline>",
): ResolvedConveyorConfig {
  const parsed = ConveyorConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${source}:\n${details}`, parsed.error);
  }

  return resolveConfigPaths(parsed.data, baseDir);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveConfigPaths(cfg: ConveyorConfig, baseDir: string): ResolvedConveyorConfig {
  // Project-relative settings resolve against project_dir, which itself resolves against the config dir.
  const projectDir = path.resolve(baseDir, cfg.project_dir);
  const homeDir = cfg.home_dir
    ? path.resolve(projectDir, cfg.home_dir)
    : resolveConveyorHome({ projectDir });
  const paths = { conveyorHome: homeDir };

  return {
    ...cfg,
    project_dir: projectDir,
    todo_file: path.resolve(projectDir, cfg.todo_file),
    home_dir: homeDir,
    agent: {
      ...cfg.agent,
      session_paths: cfg.agent.session_paths.map((p) => path.resolve(projectDir, p)),
    },
    results: {
      ...cfg.results,
      dir: cfg.results.dir ? path.resolve(projectDir, cfg.results.dir) : defaultResultsDir(paths),
      instructions_dir: cfg.results.instructions_dir
        ? path.resolve(projectDir, cfg.results.instructions_dir)
        : defaultInstructionsDir(paths),
    },
    watch: {
      ...cfg.watch,
      paths: cfg.watch.paths.map((p) => path.resolve(projectDir, p)),
    },
  };
}
