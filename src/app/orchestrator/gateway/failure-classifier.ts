/**
 * Failure classification for agent errors.
 * Purpose: map an error string to critical / recoverable / transient from an injectable pattern table.
 */

import type { FailurePatternsConfig } from "../../../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type FailureCategory = "critical" | "recoverable" | "transient";

export type FailurePatterns = {
  critical: string[];
  recoverable: string[];
  // Exit codes of deliberate termination (SIGKILL, SIGTERM) are not a broken backend.
  reservedExitCodes: number[];
  exitCodePattern: RegExp;
};

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_FAILURE_PATTERNS: FailurePatterns = {
  critical: [
    "unpaid",
    "billing",
    "payment required",
    "subscription",
    "account suspended",
    "access denied",
    "authentication failed",
    "invalid api key",
    "api key expired",
    "quota exceeded",
    "insufficient_quota",
    "insufficient quota",
    "unsupported region",
    "not available in your region",
  ],
  recoverable: [
    "unknown error",
    "agent unavailable",
    "cli unavailable",
    "backend unavailable",
    "cannot connect to the docker daemon",
    "no such container",
  ],
  reservedExitCodes: [137, 143],
  exitCodePattern: /(?:exited with code|returned code|exit code)\s*:?\s*(-?\d+)/i,
};

export function resolveFailurePatterns(config: FailurePatternsConfig = {}): FailurePatterns {
  return {
    critical: normalizeKeywords(config.critical ?? DEFAULT_FAILURE_PATTERNS.critical),
    recoverable: normalizeKeywords(config.recoverable ?? DEFAULT_FAILURE_PATTERNS.recoverable),
    reservedExitCodes: config.reserved_exit_codes ?? DEFAULT_FAILURE_PATTERNS.reservedExitCodes,
    exitCodePattern: config.exit_code_pattern
      ? new RegExp(config.exit_code_pattern, "i")
      : DEFAULT_FAILURE_PATTERNS.exitCodePattern,
  };
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function classifyFailure(
  errorText: string,
  patterns: FailurePatterns = DEFAULT_FAILURE_PATTERNS,
): FailureCategory {
  const text = errorText.toLowerCase();
  if (text.trim().length === 0) {
    return "transient";
  }

  if (patterns.critical.some((keyword) => text.includes(keyword))) {
    return "critical";
  }

  if (patterns.recoverable.some((keyword) => text.includes(keyword))) {
    return "recoverable";
  }

  const exitCode = extractExitCode(errorText, patterns.exitCodePattern);
  if (exitCode !== null && exitCode !== 0 && !patterns.reservedExitCodes.includes(exitCode)) {
    return "recoverable";
  }

  return "transient";
}

export function extractExitCode(errorText: string, pattern: RegExp): number | null {
  const match = pattern.exec(errorText);
  if (!match || match[1] === undefined) return null;

  const code = Number.parseInt(match[1], 10);
  return Number.isNaN(code) ? null : code;
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeKeywords(keywords: string[]): string[] {
  return keywords.map((keyword) => keyword.toLowerCase());
}
