// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Exponential backoff with optional jitter for reconnect scheduling.
 */

export interface BackoffConfig {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  maxAttempts: number;
  jitter: "full" | "none";
}

export class BackoffPolicy {
  constructor(
    private readonly config: BackoffConfig,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * Delay before the given attempt (1-based).
   *
   * delay = min(maxDelayMs, initialDelayMs × multiplier^(attempt-1)),
   * or random(0, delay) with full jitter.
   */
  delay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs *
      Math.pow(this.config.multiplier, Math.max(0, attempt - 1));
    const cappedDelay = Math.min(this.config.maxDelayMs, exponentialDelay);

    if (this.config.jitter === "none") {
      return cappedDelay;
    }

    return Math.floor(this.random() * (cappedDelay + 1));
  }

  /**
   * Whether another attempt is allowed after `attempts` failed ones.
   */
  canRetry(attempts: number): boolean {
    return attempts < this.config.maxAttempts;
  }
}
