// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Heartbeat loop: keep-alive pushes on the `phoenix` topic plus silence
 * detection.
 *
 * Behavior:
 * - Send a heartbeat every intervalMs
 * - Any inbound frame counts as liveness (touch)
 * - No inbound traffic for timeoutMs → onTimeout, loop stops
 *
 * The transport may not report a half-open connection, so this is the only
 * way a silently dead socket gets noticed.
 */

export interface HeartbeatConfig {
  intervalMs: number;
  timeoutMs: number;
}

export interface HeartbeatHooks {
  send(ref: string): void;
  onTimeout(silentForMs: number): void;
  onSendFailure(error: unknown): void;
}

export class HeartbeatDriver {
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastSeenAt = 0;
  private pendingRef: string | null = null;
  private pendingSentAt = 0;
  private roundTripMs: number | undefined;

  constructor(
    private readonly config: HeartbeatConfig,
    private readonly hooks: HeartbeatHooks,
    private readonly makeRef: () => string,
    private readonly now: () => number = Date.now,
  ) {}

  start(): void {
    this.stop();
    this.lastSeenAt = this.now();
    this.timer = setInterval(() => this.tick(), this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.pendingRef = null;
  }

  /** Record inbound traffic. */
  touch(): void {
    this.lastSeenAt = this.now();
  }

  /**
   * Returns true when `ref` answers the outstanding heartbeat.
   */
  handleReply(ref: string | null): boolean {
    if (ref === null || ref !== this.pendingRef) return false;
    this.roundTripMs = this.now() - this.pendingSentAt;
    this.pendingRef = null;
    return true;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get lastRoundTripMs(): number | undefined {
    return this.roundTripMs;
  }

  tick(): void {
    const silentForMs = this.now() - this.lastSeenAt;
    if (silentForMs >= this.config.timeoutMs) {
      this.stop();
      this.hooks.onTimeout(silentForMs);
      return;
    }

    const ref = this.makeRef();
    this.pendingRef = ref;
    this.pendingSentAt = this.now();
    try {
      this.hooks.send(ref);
    } catch (error) {
      this.hooks.onSendFailure(error);
    }
  }
}
