// Control API error helpers.
// Purpose: one canonical error payload shape for every control route.
// Assumes failures respond with { ok: false, error: { code, message, details? } }.
// Usage: buildApiErrorPayload({ code, message, details }) and buildInternalErrorDetails(err).

// =============================================================================
// TYPES
// =============================================================================

export const API_ERROR_CODES = [
  "bad_request",
  "invalid_body",
  "not_found",
  "method_not_allowed",
  "conflict",
  "payload_too_large",
  "internal_error",
] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];

export type ApiErrorDetails = Record<string, string | number | boolean>;

export type ApiErrorPayload = {
  ok: false;
  error: {
    code: ApiErrorCode;
    message: string;
    details?: ApiErrorDetails;
  };
};

// =============================================================================
// ERROR BUILDERS
// =============================================================================

export function buildApiErrorPayload(params: {
  code: ApiErrorCode;
  message: string;
  details?: ApiErrorDetails;
}): ApiErrorPayload {
  const error = {
    code: params.code,
    message: params.message,
    ...(params.details ? { details: params.details } : {}),
  };

  return { ok: false, error };
}

export function buildInternalErrorDetails(cause: unknown): ApiErrorDetails {
  const details: ApiErrorDetails = { reason: "unexpected_error" };

  if (!cause || typeof cause !== "object" || !("code" in cause)) {
    return details;
  }

  const errorCode = cause.code;
  if (typeof errorCode === "string" && errorCode.trim()) {
    details.error_code = errorCode;
  }

  return details;
}
