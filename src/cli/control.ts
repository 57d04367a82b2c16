import { loadAppContext } from "../app/config/load-app-context.js";
import {
  controlBaseUrl,
  sendControlRequest,
  type ControlAction,
  type ControlRequest,
  type ControlResponse,
} from "../control/client.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export const CONTROL_ACTIONS: ControlAction[] = ["stop", "reload", "add", "clear", "skip"];

export type ControlCommandOptions = {
  config?: string;
  port?: number;
  position?: "head" | "tail";
  reason?: string;
};

export async function controlCommand(
  action: string,
  text: string | undefined,
  opts: ControlCommandOptions,
): Promise<void> {
  const request = buildControlRequest(action, text, opts);
  const port = opts.port ?? loadAppContext({ explicitConfigPath: opts.config }).config.control.port;
  const response = await sendControlRequest(controlBaseUrl(port), request);
  console.log(describeControlResponse(request, response));
}

export function buildControlRequest(
  action: string,
  text: string | undefined,
  opts: Pick<ControlCommandOptions, "position" | "reason">,
): ControlRequest {
  const known = CONTROL_ACTIONS.find((candidate) => candidate === action);
  if (!known) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.control,
      title: "Unknown control action.",
      message: `"${action}" is not a control action.`,
      hint: `Use one of: ${CONTROL_ACTIONS.join(", ")}.`,
    });
  }

  const request: ControlRequest = { action: known };
  if (text !== undefined) request.text = text;
  if (opts.position) request.position = opts.position;
  if (opts.reason) request.reason = opts.reason;
  return request;
}

export function describeControlResponse(request: ControlRequest, response: ControlResponse): string {
  switch (request.action) {
    case "stop":
      return "Stop requested; the orchestrator finishes the current step first.";
    case "reload":
      return response.reload === "deferred"
        ? "Reload deferred until the running task finishes."
        : "Reload requested.";
    case "add":
      return `Task queued at the ${request.position ?? "tail"} of the TODO list.`;
    case "clear":
      return "Clear requested; tasks that never started will be skipped.";
    case "skip":
      return typeof response.skipping === "string"
        ? `Skipping task ${response.skipping} at its next step.`
        : "Skip requested.";
  }
}
