import type { IncomingMessage, ServerResponse } from "node:http";

import { z } from "zod";

import type { TaskRecord } from "../core/checkpoint-schema.js";
import type { CheckpointStatistics } from "../core/checkpoint-store.js";
import type { LifecycleFlags, LifecycleSignals } from "../app/orchestrator/lifecycle/lifecycle-signals.js";

import {
  buildApiErrorPayload,
  buildInternalErrorDetails,
  type ApiErrorCode,
  type ApiErrorDetails,
} from "./http/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ControlStatus = {
  session_id: string | null;
  flags: LifecycleFlags;
  pending_commands: number;
  current_task: TaskRecord | null;
  statistics: CheckpointStatistics;
};

export type ControlRouterOptions = {
  lifecycle: LifecycleSignals;
  status: () => ControlStatus;
  maxBodyBytes?: number;
};

type Route = "status" | "stop" | "reload" | "tasks" | "skip_current";

type RouteHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: ApiErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

const ROUTES: Record<string, Route> = {
  "/api/status": "status",
  "/api/stop": "stop",
  "/api/reload": "reload",
  "/api/tasks": "tasks",
  "/api/tasks/skip-current": "skip_current",
};

// =============================================================================
// BODY SCHEMAS
// =============================================================================

const ReasonBodySchema = z
  .object({
    reason: z.string().trim().min(1).max(500).optional(),
  })
  .strict();

export const AddTaskBodySchema = z
  .object({
    text: z.string().trim().min(1).max(2000),
    position: z.enum(["head", "tail"]).default("tail"),
  })
  .strict();

// =============================================================================
// PUBLIC API
// =============================================================================

export function createControlRouter(
  options: ControlRouterOptions,
): (req: IncomingMessage, res: ServerResponse) => void {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const { lifecycle } = options;

  const handlers: Record<Route, Partial<Record<string, RouteHandler>>> = {
    status: {
      GET: async (_req, res) => sendJson(res, 200, { ok: true, status: options.status() }),
    },
    stop: {
      POST: async (req, res) => {
        const body = ReasonBodySchema.parse(await readJsonBody(req, maxBodyBytes));
        lifecycle.requestStop(body.reason ?? "Stop requested through the control API");
        sendJson(res, 202, { ok: true, stopping: true });
      },
    },
    reload: {
      POST: async (req, res) => {
        const body = ReasonBodySchema.parse(await readJsonBody(req, maxBodyBytes));
        const reload = lifecycle.requestReload(body.reason ?? "Reload requested through the control API");
        sendJson(res, 202, { ok: true, reload });
      },
    },
    tasks: {
      POST: async (req, res) => {
        const body = AddTaskBodySchema.parse(await readJsonBody(req, maxBodyBytes));
        lifecycle.enqueueTask(body.text, body.position);
        sendJson(res, 202, { ok: true, queued: { text: body.text, position: body.position } });
      },
      DELETE: async (_req, res) => {
        lifecycle.requestClear();
        sendJson(res, 202, { ok: true, clearing: true });
      },
    },
    skip_current: {
      POST: async (_req, res) => {
        const taskId = lifecycle.snapshot().current_task_id;
        if (!lifecycle.requestSkipCurrent()) {
          throw new ApiRequestError(409, "conflict", "No task is in progress.");
        }
        sendJson(res, 202, { ok: true, skipping: taskId });
      },
    },
  };

  return (req, res) => {
    void routeRequest(req, res, handlers);
  };
}

// =============================================================================
// ROUTING
// =============================================================================

async function routeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  handlers: Record<Route, Partial<Record<string, RouteHandler>>>,
): Promise<void> {
  const method = (req.method ?? "GET").toUpperCase();

  let url: URL;
  try {
    url = new URL(req.url ?? "/", "http://127.0.0.1");
  } catch {
    sendApiError(res, 400, "bad_request", "Malformed request URL.");
    return;
  }

  const route = ROUTES[url.pathname.replace(/\/+$/, "")];
  if (!route) {
    sendApiError(res, 404, "not_found", "Endpoint not found.");
    return;
  }

  const handler = handlers[route][method];
  if (!handler) {
    res.setHeader("Allow", Object.keys(handlers[route]).join(", "));
    sendApiError(res, 405, "method_not_allowed", `Method ${method} not allowed.`);
    return;
  }

  try {
    await handler(req, res);
  } catch (err) {
    if (res.headersSent) {
      res.end();
      return;
    }

    if (err instanceof ApiRequestError) {
      sendApiError(res, err.status, err.code, err.message);
      return;
    }

    if (err instanceof z.ZodError) {
      sendApiError(res, 400, "invalid_body", formatBodyIssues(err));
      return;
    }

    sendApiError(res, 500, "internal_error", "Unexpected server error.", buildInternalErrorDetails(err));
  }
}

// =============================================================================
// REQUEST / RESPONSE
// =============================================================================

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const raw = (await readRawBody(req, maxBytes)).toString("utf8").trim();
  if (raw.length === 0) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ApiRequestError(400, "bad_request", "Request body is not valid JSON.");
  }
}

// Oversized bodies are drained, not destroyed, so the 413 still reaches the client.
function readRawBody(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on("data", (chunk: unknown) => {
      if (tooLarge) return;
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > maxBytes) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(buffer);
    });
    req.on("end", () => {
      if (tooLarge) {
        reject(new ApiRequestError(413, "payload_too_large", `Request body exceeds ${maxBytes} bytes.`));
        return;
      }
      resolve(Buffer.concat(chunks));
    });
    req.on("error", reject);
  });
}

function formatBodyIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "body";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

function sendApiError(
  res: ServerResponse,
  status: number,
  code: ApiErrorCode,
  message: string,
  details?: ApiErrorDetails,
): void {
  sendJson(res, status, buildApiErrorPayload({ code, message, details }));
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader("Content-Length", Buffer.byteLength(body));
  res.end(body);
}
