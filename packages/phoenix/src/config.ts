// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Socket option defaults and validation.
 */

import type { BackoffConfig } from "./backoff.js";
import { createLogger, type LoggerAdapter } from "./logger.js";
import type { OverflowPolicy } from "./queue.js";
import type {
  SocketOptions,
  TokenSource,
  TransportFactory,
} from "./types.js";
import { createWebSocketTransport } from "./transport.js";

export interface ResolvedConfig {
  url: string | URL;
  params: Record<string, string>;
  auth: { token?: TokenSource; queryParam: string };
  heartbeat: { intervalMs: number; timeoutMs: number };
  joinTimeoutMs: number;
  leaveTimeoutMs: number;
  reconnect: BackoffConfig & { enabled: boolean };
  queue: { capacity: number; overflow: OverflowPolicy };
  logger: LoggerAdapter;
  transportFactory: TransportFactory;
}

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
export const DEFAULT_REPLY_TIMEOUT_MS = 10_000;

/**
 * Applies defaults. Throws TypeError for values the socket cannot run with.
 */
export function resolveConfig(opts: SocketOptions): ResolvedConfig {
  const intervalMs =
    opts.heartbeat?.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;

  const config: ResolvedConfig = {
    url: opts.url,
    params: opts.params ?? {},
    auth: {
      token: opts.auth?.token,
      queryParam: opts.auth?.queryParam ?? "token",
    },
    heartbeat: {
      intervalMs,
      timeoutMs: opts.heartbeat?.timeoutMs ?? intervalMs * 3,
    },
    joinTimeoutMs: opts.joinTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS,
    leaveTimeoutMs: opts.leaveTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS,
    reconnect: {
      enabled: opts.reconnect?.enabled ?? true,
      initialDelayMs: opts.reconnect?.initialDelayMs ?? 1_000,
      multiplier: opts.reconnect?.multiplier ?? 2,
      maxDelayMs: opts.reconnect?.maxDelayMs ?? 30_000,
      maxAttempts: opts.reconnect?.maxAttempts ?? Infinity,
      jitter: opts.reconnect?.jitter ?? "none",
    },
    queue: {
      capacity: opts.queue?.capacity ?? 1024,
      overflow: opts.queue?.overflow ?? "drop-oldest",
    },
    logger: opts.logger ?? createLogger(),
    transportFactory: opts.transportFactory ?? createWebSocketTransport,
  };

  validateUrl(config.url);
  requirePositive("heartbeat.intervalMs", config.heartbeat.intervalMs);
  requirePositive("heartbeat.timeoutMs", config.heartbeat.timeoutMs);
  requirePositive("joinTimeoutMs", config.joinTimeoutMs);
  requirePositive("leaveTimeoutMs", config.leaveTimeoutMs);
  requireNonNegative("reconnect.initialDelayMs", config.reconnect.initialDelayMs);
  requireNonNegative("reconnect.maxDelayMs", config.reconnect.maxDelayMs);
  requireNonNegative("reconnect.maxAttempts", config.reconnect.maxAttempts);
  requirePositive("queue.capacity", config.queue.capacity);
  if (config.reconnect.multiplier < 1) {
    throw new TypeError(
      `Invalid reconnect.multiplier: ${config.reconnect.multiplier} (must be >= 1)`,
    );
  }
  if (!/^[^\s&=]+$/.test(config.auth.queryParam)) {
    throw new TypeError(`Invalid auth.queryParam: "${config.auth.queryParam}"`);
  }

  return config;
}

function validateUrl(url: string | URL): void {
  const parsed = typeof url === "string" ? URL.canParse(url) && new URL(url) : url;
  if (!parsed) {
    throw new TypeError(`Invalid url: "${String(url)}"`);
  }
  if (!["ws:", "wss:", "http:", "https:"].includes(parsed.protocol)) {
    throw new TypeError(
      `Invalid url protocol: "${parsed.protocol}" (expected ws: or wss:)`,
    );
  }
}

function requirePositive(name: string, value: number): void {
  if (!(value > 0)) {
    throw new TypeError(`Invalid ${name}: ${value} (must be > 0)`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!(value >= 0)) {
    throw new TypeError(`Invalid ${name}: ${value} (must be >= 0)`);
  }
}
