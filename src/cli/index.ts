import { Command, InvalidArgumentError, Option } from "commander";

import { loadAppContext } from "../app/config/load-app-context.js";

import { controlCommand, CONTROL_ACTIONS } from "./control.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .name("conveyor")
    .description("Crash-safe orchestrator that feeds TODO tasks to an external code agent")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to ./conveyor.yaml or $CONVEYOR_CONFIG)")
    .option("-v, --verbose", "Print orchestrator events as they happen", false)
    .option("--debug", "Show error causes and stack traces", false);

  program
    .command("run")
    .description("Run the orchestration loop until stopped")
    .option(
      "--exit-on-reload",
      "Exit with code 75 on a reload request instead of reloading in-process",
      false,
    )
    .action(async (opts: { exitOnReload: boolean }) => {
      const exitCode = await runCommand({
        config: globals().config,
        verbose: globals().verbose,
        exitOnReload: opts.exitOnReload,
      });
      process.exitCode = exitCode;
    });

  program
    .command("status")
    .description("Show the checkpoint ledger, and the live orchestrator state with --live")
    .option("--live", "Also query the running orchestrator's control API", false)
    .action(async (opts: { live: boolean }) => {
      const appContext = loadAppContext({ explicitConfigPath: globals().config });
      await statusCommand(appContext, { live: opts.live });
    });

  program
    .command("control")
    .description("Send a command to a running orchestrator")
    .argument("<action>", `One of: ${CONTROL_ACTIONS.join(", ")}`)
    .argument("[text]", "Task text for the add action")
    .option("--port <n>", "Control port (defaults to control.port from the config)", parsePort)
    .addOption(
      new Option("--position <position>", "Where the add action inserts the task")
        .choices(["head", "tail"])
        .default("tail"),
    )
    .option("--reason <text>", "Reason recorded for stop and reload")
    .action(
      async (
        action: string,
        text: string | undefined,
        opts: { port?: number; position: "head" | "tail"; reason?: string },
      ) => {
        await controlCommand(action, text, { ...opts, config: globals().config });
      },
    );

  return program;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535.");
  }
  return port;
}
