/**
 * Conveyor runtime assembles one orchestrator session from a resolved config and runs it.
 * Purpose: the single place where concrete adapters (agent backend, TODO file, control server,
 * source watcher) are wired to the orchestration loop.
 * Assumptions: one LifecycleSignals instance lives for the whole process, so stop requests and
 * queued commands survive a reload; everything else is rebuilt from the reloaded config.
 * Usage: const { exit } = await runConveyor({ explicitConfigPath });
 */

import fse from "fs-extra";

import { startControlServer, type ControlServerHandle } from "../control/server.js";
import type { ControlStatus } from "../control/router.js";
import {
  startSourceWatcher,
  type SourceWatcherHandle,
  type WatchFactory,
} from "../control/source-watcher.js";
import { CheckpointStore, type RecoveryInfo } from "../core/checkpoint-store.js";
import type { ResolvedConveyorConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { ConfigError } from "../core/errors.js";
import { JsonlLogger, logOrchestratorEvent, type LogEventListener } from "../core/logger.js";
import { checkpointPath, orchestratorLogPath, statusTrailPath } from "../core/paths.js";
import { StatusTrail } from "../core/status-trail.js";
import { defaultSessionId } from "../core/utils.js";
import { DockerManager } from "../docker/manager.js";
import { MarkdownTodoSource } from "../todo/markdown-todo-source.js";

import { loadAppContext, type LoadAppContextArgs } from "./config/load-app-context.js";
import type { AppContext } from "./context.js";
import type { AgentRunner } from "./orchestrator/agents/agent-runner.js";
import { DockerAgentRunner } from "./orchestrator/agents/docker-agent-runner.js";
import { LocalAgentRunner } from "./orchestrator/agents/local-agent-runner.js";
import { AgentGateway } from "./orchestrator/gateway/agent-gateway.js";
import {
  DockerAgentEnvironment,
  LocalAgentEnvironment,
  type AgentEnvironment,
} from "./orchestrator/gateway/environment.js";
import { resolveFailurePatterns } from "./orchestrator/gateway/failure-classifier.js";
import { InstructionCatalog, KeywordTaskClassifier } from "./orchestrator/instructions/instruction-set.js";
import { LifecycleSignals } from "./orchestrator/lifecycle/lifecycle-signals.js";
import { FileResultChannel } from "./orchestrator/results/result-channel.js";
import { OrchestrationLoop, type LoopExit } from "./orchestrator/run/orchestration-loop.js";
import { TaskStateMachine } from "./orchestrator/run/task-machine.js";
import { ContentVerifier } from "./orchestrator/validation/verifier.js";

// =============================================================================
// TYPES
// =============================================================================

export type AgentBackend = {
  runner: AgentRunner;
  environment: AgentEnvironment;
};

export type AgentBackendFactory = (config: ResolvedConveyorConfig, logger: JsonlLogger) => AgentBackend;

export type SessionOptions = {
  sessionId: string;
  lifecycle: LifecycleSignals;
  createBackend?: AgentBackendFactory;
  createWatcher?: WatchFactory;
  onEvent?: LogEventListener;
};

export type ConveyorSession = {
  context: AppContext;
  sessionId: string;
  store: CheckpointStore;
  logger: JsonlLogger;
  status: StatusTrail;
  loop: OrchestrationLoop;
  recovery: RecoveryInfo;
  control: ControlServerHandle | null;
  close: () => Promise<void>;
};

export type RunConveyorOptions = LoadAppContextArgs & {
  lifecycle?: LifecycleSignals;
  // Return on the first reload instead of rebuilding the session in-process.
  exitOnReload?: boolean;
  createBackend?: AgentBackendFactory;
  createWatcher?: WatchFactory;
  onEvent?: LogEventListener;
  onSessionStart?: (session: ConveyorSession) => void;
};

export type RunConveyorResult = {
  exit: LoopExit;
  sessionId: string;
  reloads: number;
};

// =============================================================================
// SUPERVISOR
// =============================================================================

export async function runConveyor(opts: RunConveyorOptions = {}): Promise<RunConveyorResult> {
  const lifecycle = opts.lifecycle ?? new LifecycleSignals();
  const sessionId = defaultSessionId();
  let context = loadAppContext(opts);
  let reloads = 0;

  while (true) {
    const session = await openSession(context, {
      sessionId,
      lifecycle,
      createBackend: opts.createBackend,
      createWatcher: opts.createWatcher,
      onEvent: opts.onEvent,
    });
    opts.onSessionStart?.(session);

    let exit: LoopExit;
    try {
      exit = await session.loop.run();
    } finally {
      await session.close();
    }

    if (exit.kind !== "reload" || opts.exitOnReload) {
      return { exit, sessionId, reloads };
    }

    reloads += 1;
    context = reloadAppContext(opts, context);
  }
}

// A config that no longer loads keeps the previous one, so an editing mistake never stops the loop.
function reloadAppContext(args: LoadAppContextArgs, previous: AppContext): AppContext {
  try {
    return loadAppContext(args);
  } catch (err) {
    console.warn(
      `Warning: reload kept the previous config from ${previous.configPath}: ${formatErrorMessage(err)}`,
    );
    return previous;
  }
}

// =============================================================================
// SESSION
// =============================================================================

export async function openSession(context: AppContext, opts: SessionOptions): Promise<ConveyorSession> {
  const { config, paths } = context;
  const { lifecycle, sessionId } = opts;

  await fse.ensureDir(context.conveyorHome);
  const logger = new JsonlLogger(orchestratorLogPath(paths), { sessionId });
  if (opts.onEvent) {
    logger.onEvent(opts.onEvent);
  }

  let control: ControlServerHandle | null = null;
  let watcher: SourceWatcherHandle | null = null;

  try {
    const status = new StatusTrail(statusTrailPath(paths));
    const store = await CheckpointStore.open(checkpointPath(paths));
    const recovery = store.getRecoveryInfo();
    const loop = buildLoop(config, { store, lifecycle, logger, status }, opts.createBackend);

    if (config.control.enabled) {
      control = await startControlServer({
        lifecycle,
        port: config.control.port,
        status: () => buildControlStatus(store, lifecycle, sessionId),
      });
      logOrchestratorEvent(logger, "control.start", { url: control.url });
    }

    if (config.watch.enabled && config.watch.paths.length > 0) {
      watcher = startSourceWatcher({
        paths: config.watch.paths,
        debounceMs: config.watch.debounce_ms,
        lifecycle,
        logger,
        baseDir: config.project_dir,
        ignoreDirs: [context.conveyorHome, config.results.dir, config.results.instructions_dir],
        createWatcher: opts.createWatcher,
      });
    }

    await store.markServerStart(sessionId);
    logOrchestratorEvent(logger, "session.start", {
      config: context.configPath,
      todo_file: config.todo_file,
      runner: config.agent.runner,
      control_url: control?.url ?? null,
    });
    await status.separator();
    await status.append(`Orchestrator started (session ${sessionId})`);
    await reportRecovery(recovery, logger, status);

    const openedControl = control;
    const openedWatcher = watcher;
    return {
      context,
      sessionId,
      store,
      logger,
      status,
      loop,
      recovery,
      control: openedControl,
      close: async () => {
        await openedWatcher?.close();
        await openedControl?.close();
        logOrchestratorEvent(logger, "session.close", {});
        logger.close();
      },
    };
  } catch (err) {
    await watcher?.close();
    await control?.close();
    logger.close();
    throw err;
  }
}

type LoopCollaborators = {
  store: CheckpointStore;
  lifecycle: LifecycleSignals;
  logger: JsonlLogger;
  status: StatusTrail;
};

function buildLoop(
  config: ResolvedConveyorConfig,
  collaborators: LoopCollaborators,
  createBackend: AgentBackendFactory = createAgentBackend,
): OrchestrationLoop {
  const { store, lifecycle, logger, status } = collaborators;
  const backend = createBackend(config, logger);
  const todo = new MarkdownTodoSource(config.todo_file);

  const gateway = new AgentGateway({
    runner: backend.runner,
    environment: backend.environment,
    lifecycle,
    logger,
    status,
    patterns: resolveFailurePatterns(config.errors.patterns),
    policy: {
      maxStreak: config.errors.max_streak,
      initialDelaySeconds: config.errors.initial_delay_seconds,
      delayIncrementSeconds: config.errors.delay_increment_seconds,
      signatureLength: config.errors.signature_length,
      maxRestartAttempts: config.errors.max_restart_attempts,
    },
  });

  const machine = new TaskStateMachine({
    store,
    gateway,
    channel: new FileResultChannel({
      instructionsDir: config.results.instructions_dir,
      pollIntervalMs: config.results.poll_interval_seconds * 1000,
      logger,
    }),
    catalog: new InstructionCatalog({
      sets: config.instructions,
      projectDir: config.project_dir,
      resultsDir: config.results.dir,
      defaultTimeoutMs: config.results.timeout_seconds * 1000,
    }),
    classifier: new KeywordTaskClassifier(config.categories),
    verifier: new ContentVerifier({ minContentLength: config.verification.min_content_length }),
    lifecycle,
    todo,
    logger,
    status,
    maxInstructionRetries: config.errors.max_instruction_retries,
    agentTimeoutMs: config.agent.timeout_seconds * 1000,
  });

  return new OrchestrationLoop({
    store,
    lifecycle,
    machine,
    todo,
    logger,
    status,
    settings: {
      checkIntervalSeconds: config.server.check_interval_seconds,
      taskDelaySeconds: config.server.task_delay_seconds,
      maxIterations: config.server.max_iterations,
      maxTaskAttempts: config.server.max_task_attempts,
    },
  });
}

// =============================================================================
// AGENT BACKEND
// =============================================================================

export function createAgentBackend(config: ResolvedConveyorConfig, logger: JsonlLogger): AgentBackend {
  const { agent } = config;

  if (agent.runner === "docker") {
    const docker = agent.docker;
    if (!docker) {
      throw new ConfigError("agent.docker is required when agent.runner is docker");
    }

    const container = new DockerManager().container(docker.container);
    const readyTimeoutMs = docker.ready_timeout_seconds * 1000;
    return {
      runner: new DockerAgentRunner({
        container,
        agentPath: docker.agent_path,
        args: agent.args,
        checkArgs: agent.check_args,
        workdir: docker.workdir,
        user: docker.user,
        env: agent.env,
        readyTimeoutMs,
      }),
      environment: new DockerAgentEnvironment({
        container,
        agentPath: docker.agent_path,
        provisionCommand: docker.provision_command,
        readyTimeoutMs,
        sessionPaths: agent.session_paths,
        logger,
      }),
    };
  }

  const runner = new LocalAgentRunner({
    command: agent.command,
    args: agent.args,
    checkArgs: agent.check_args,
    cwd: config.project_dir,
    env: agent.env,
  });
  return {
    runner,
    environment: new LocalAgentEnvironment({ runner, sessionPaths: agent.session_paths, logger }),
  };
}

// =============================================================================
// STATUS
// =============================================================================

export function buildControlStatus(
  store: CheckpointStore,
  lifecycle: LifecycleSignals,
  sessionId: string,
): ControlStatus {
  const flags = lifecycle.snapshot();
  return {
    session_id: sessionId,
    flags,
    pending_commands: lifecycle.pendingCommandCount(),
    current_task: flags.current_task_id ? store.getTask(flags.current_task_id) : null,
    statistics: store.getStatistics(),
  };
}

async function reportRecovery(
  recovery: RecoveryInfo,
  logger: JsonlLogger,
  status: StatusTrail,
): Promise<void> {
  // A ledger that never recorded a start has nothing to recover from.
  if (recovery.wasCleanShutdown || recovery.lastStartTime === null) {
    return;
  }

  const reset = recovery.recoveredTasks.map((task) => task.task_id);
  logOrchestratorEvent(logger, "session.recovered", {
    previous_session: recovery.sessionId,
    last_start: recovery.lastStartTime,
    last_stop_reason: recovery.lastStopReason,
    reset_tasks: reset,
    failed_tasks: recovery.failedTasks.length,
  });

  const reason = recovery.lastStopReason ? ` (last stop reason: ${recovery.lastStopReason})` : "";
  await status.append(
    `Recovered from an unclean shutdown${reason}; ${reset.length} interrupted task(s) returned to pending`,
    "warning",
  );
  for (const task of recovery.recoveredTasks) {
    await status.taskStatus(task.text, "Recovered", `attempt ${task.attempts}, step ${task.instruction_progress}`);
  }
}
