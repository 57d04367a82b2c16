import type { TaskRecord } from "../../../core/checkpoint-schema.js";
import type { VerificationResult, Verifier } from "../ports.js";

export type ContentVerifierOptions = {
  minContentLength: number;
  forbiddenMarkers?: string[];
};

const DEFAULT_FORBIDDEN_MARKERS = ["TASK FAILED"];

// Accepts a result when it carries enough text and no failure marker from the agent.
export class ContentVerifier implements Verifier {
  private readonly forbiddenMarkers: string[];

  constructor(private readonly options: ContentVerifierOptions) {
    this.forbiddenMarkers = options.forbiddenMarkers ?? DEFAULT_FORBIDDEN_MARKERS;
  }

  async verify(input: { content: string; task: TaskRecord }): Promise<VerificationResult> {
    const trimmed = input.content.trim();

    if (trimmed.length < this.options.minContentLength) {
      return {
        accepted: false,
        reason: `Result for ${input.task.task_id} is shorter than ${this.options.minContentLength} characters`,
      };
    }

    const marker = this.forbiddenMarkers.find((m) => trimmed.includes(m));
    if (marker) {
      return { accepted: false, reason: `Result reports failure (${marker})` };
    }

    return { accepted: true };
  }
}
