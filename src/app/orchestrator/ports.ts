/**
 * Orchestrator ports define the boundary between the task engine and its collaborators.
 * Purpose: make external contracts explicit and replaceable for testing.
 * Usage: real adapters are wired in `app/runtime.ts`; tests inject fakes.
 */

import type { TaskRecord } from "../../core/checkpoint-schema.js";

// =============================================================================
// TODO SOURCE
// =============================================================================

export type TodoItem = {
  text: string;
  done: boolean;
  comment?: string;
};

export interface TodoSource {
  list(): Promise<TodoItem[]>;
  markDone(text: string): Promise<void>;
  markSkipped(text: string, reason: string): Promise<void>;
  insertAtHead(text: string): Promise<void>;
  insertAtTail(text: string): Promise<void>;
}

// =============================================================================
// COLLABORATORS
// =============================================================================

export type VerificationResult = {
  accepted: boolean;
  reason?: string;
};

export interface Verifier {
  verify(input: { content: string; task: TaskRecord }): Promise<VerificationResult>;
}

export type ContinuationDecision = "continue" | "postpone";

export interface ContinuationAdvisor {
  decide(task: TaskRecord): Promise<ContinuationDecision>;
}

export interface TaskClassifier {
  classify(text: string): string;
}

export type { StatusLevel, StatusReporter } from "../../core/status-trail.js";

// =============================================================================
// TIME
// =============================================================================

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const continueAlways: ContinuationAdvisor = {
  decide: async () => "continue",
};
