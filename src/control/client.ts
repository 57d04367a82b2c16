/**
 * Control API client used by `conveyor control` and `conveyor status --live`.
 */

import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";

export type ControlAction = "stop" | "reload" | "add" | "clear" | "skip";

export type ControlRequest = {
  action: ControlAction;
  text?: string;
  position?: "head" | "tail";
  reason?: string;
};

const ErrorResponseSchema = z.object({
  ok: z.literal(false),
  error: z.object({ code: z.string(), message: z.string() }),
});

const SuccessResponseSchema = z.object({ ok: z.literal(true) }).passthrough();

export type ControlResponse = z.infer<typeof SuccessResponseSchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function controlBaseUrl(port: number): string {
  return `http://127.0.0.1:${port}`;
}

export async function sendControlRequest(
  baseUrl: string,
  request: ControlRequest,
): Promise<ControlResponse> {
  const { method, path, body } = describeRequest(request);
  return callControlApi(baseUrl, method, path, body);
}

export async function fetchControlStatus(baseUrl: string): Promise<ControlResponse> {
  return callControlApi(baseUrl, "GET", "/api/status");
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeRequest(request: ControlRequest): {
  method: string;
  path: string;
  body?: Record<string, string>;
} {
  const withReason: Record<string, string> = request.reason ? { reason: request.reason } : {};

  switch (request.action) {
    case "stop":
      return { method: "POST", path: "/api/stop", body: withReason };
    case "reload":
      return { method: "POST", path: "/api/reload", body: withReason };
    case "clear":
      return { method: "DELETE", path: "/api/tasks" };
    case "skip":
      return { method: "POST", path: "/api/tasks/skip-current" };
    case "add": {
      const text = request.text?.trim();
      if (!text) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.control,
          title: "Missing task text.",
          message: "The add action needs the task text.",
          hint: 'Run `conveyor control add "describe the task"`.',
        });
      }
      return {
        method: "POST",
        path: "/api/tasks",
        body: { text, position: request.position ?? "tail" },
      };
    }
  }
}

async function callControlApi(
  baseUrl: string,
  method: string,
  path: string,
  body?: Record<string, string>,
): Promise<ControlResponse> {
  let response: Response;
  try {
    response = await fetch(new URL(path, baseUrl), {
      method,
      headers: body ? { "Content-Type": "application/json" } : undefined,
      body: body ? JSON.stringify(body) : undefined,
    });
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.control,
      title: "Control server unreachable.",
      message: `Could not reach the orchestrator at ${baseUrl}.`,
      hint: "Check that `conveyor run` is running with control.enabled and the same port.",
      cause: err,
    });
  }

  const payload: unknown = await response.json().catch((err: unknown) => {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.control,
      title: "Unexpected control response.",
      message: `The control server returned a non-JSON body (${formatErrorMessage(err)}).`,
      cause: err,
    });
  });

  const failure = ErrorResponseSchema.safeParse(payload);
  if (failure.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.control,
      title: "Control request rejected.",
      message: `${failure.data.error.message} (${failure.data.error.code}, HTTP ${response.status})`,
    });
  }

  const success = SuccessResponseSchema.safeParse(payload);
  if (!success.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.control,
      title: "Unexpected control response.",
      message: `The control server answered HTTP ${response.status} without an ok flag.`,
    });
  }

  return success.data;
}
