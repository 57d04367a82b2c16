import { truncate } from "../../../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorStreakOptions = {
  initialDelaySeconds: number;
  delayIncrementSeconds: number;
  signatureLength: number;
};

export type ErrorStreakSnapshot = {
  signature: string | null;
  count: number;
  delaySeconds: number;
  lastErrorText: string | null;
};

// =============================================================================
// STREAK
// =============================================================================

export class ErrorStreak {
  private signature: string | null = null;
  private count = 0;
  private delaySeconds: number;
  private lastErrorText: string | null = null;

  constructor(private readonly options: ErrorStreakOptions) {
    this.delaySeconds = options.initialDelaySeconds;
  }

  record(errorText: string): ErrorStreakSnapshot {
    const signature = truncate(errorText, this.options.signatureLength);

    if (signature === this.signature) {
      this.count += 1;
      this.delaySeconds += this.options.delayIncrementSeconds;
    } else {
      this.signature = signature;
      this.count = 1;
      this.delaySeconds = this.options.initialDelaySeconds;
    }
    this.lastErrorText = errorText;

    return this.snapshot();
  }

  reset(): void {
    this.signature = null;
    this.count = 0;
    this.delaySeconds = this.options.initialDelaySeconds;
    this.lastErrorText = null;
  }

  snapshot(): ErrorStreakSnapshot {
    return {
      signature: this.signature,
      count: this.count,
      delaySeconds: this.delaySeconds,
      lastErrorText: this.lastErrorText,
    };
  }
}
