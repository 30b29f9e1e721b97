// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Public types for the Phoenix channel socket client.
 */

import type { LoggerAdapter } from "./logger.js";
import type { OverflowPolicy, Receiver } from "./queue.js";

export type SocketState =
  | "closed" // No connection; initial state or after disconnect()
  | "connecting" // Transport handshake in progress
  | "open" // Transport open, frames flow
  | "closing" // disconnect() in progress
  | "reconnecting"; // Waiting during backoff delay before retry

export type ChannelStatus = "joining" | "joined" | "leaving" | "closed" | "errored";

/**
 * Raw framed connection to the server. A transport is single use: a new one
 * is built for every (re)connect.
 */
export interface Transport {
  /** Resolves once the connection is open; rejects on handshake failure. */
  open(): Promise<void>;
  /** Throws TransportError when the connection is not open. */
  send(data: string): void;
  close(code?: number, reason?: string): void;
  /**
   * Inbound text frames. Ends when the connection closes, throws
   * TransportError when it fails. May be iterated once.
   */
  frames(): AsyncIterable<string>;
}

export type TransportFactory = (url: URL) => Transport;

export type TokenSource =
  | string
  | (() => string | null | undefined | Promise<string | null | undefined>);

export interface SocketOptions {
  url: string | URL;
  params?: Record<string, string>;

  auth?: {
    token?: TokenSource;
    queryParam?: string; // default: "token"
  };

  heartbeat?: {
    intervalMs?: number; // default: 30_000
    timeoutMs?: number; // default: 3 × intervalMs
  };

  joinTimeoutMs?: number; // default: 10_000
  leaveTimeoutMs?: number; // default: 10_000

  reconnect?: {
    enabled?: boolean; // default: true
    initialDelayMs?: number; // default: 1_000
    multiplier?: number; // default: 2
    maxDelayMs?: number; // default: 30_000
    maxAttempts?: number; // default: Infinity
    jitter?: "full" | "none"; // default: "none"
  };

  queue?: {
    capacity?: number; // default: 1024
    overflow?: OverflowPolicy; // default: "drop-oldest"
  };

  logger?: LoggerAdapter;
  transportFactory?: TransportFactory;
}

/**
 * Protocol frame (serializer 1.0.0).
 */
export interface Frame {
  topic: string;
  event: string;
  payload: unknown;
  ref: string | null;
  join_ref?: string | null;
}

export type ChannelMessageKind =
  | "event" // Server push / broadcast
  | "reply" // Reply not correlated to a pending push
  | "error"; // Server-side channel error (phx_error)

export interface ChannelMessage {
  kind: ChannelMessageKind;
  topic: string;
  event: string;
  payload: unknown;
  ref: string | null;
}

export interface ChannelHandle {
  readonly topic: string;
  readonly status: ChannelStatus;
  /**
   * Release this handle. The channel is left once every handle for the
   * topic is released. Resolves immediately when other handles remain.
   */
  close(): Promise<void>;
}

export interface Subscription {
  handle: ChannelHandle;
  receiver: Receiver<ChannelMessage>;
}

export interface JoinOptions {
  payload?: unknown;
  timeoutMs?: number;
}

export interface SocketStats {
  /** Frames for topics with no channel. */
  orphaned: number;
  /** Frames for channels without an attached receiver. */
  undelivered: number;
  /** Frames evicted or discarded by a full delivery queue. */
  overflowed: number;
  /** Frames that failed to parse. */
  malformed: number;
  reconnects: number;
  /** Latest heartbeat round trip, if one completed. */
  lastRoundTripMs: number | undefined;
}

export type SocketErrorContext =
  | { type: "parse"; details?: unknown }
  | { type: "leave"; topic: string }
  | { type: "rejoin"; topic: string }
  | { type: "overflow"; topic: string }
  | { type: "connection"; details?: unknown };

export type SocketErrorCallback = (
  error: Error,
  context: SocketErrorContext,
) => void;

export interface PhoenixSocket {
  readonly state: SocketState;
  readonly isConnected: boolean;

  connect(): Promise<void>;
  disconnect(opts?: { code?: number; reason?: string }): Promise<void>;

  join(topic: string, opts?: JoinOptions): Promise<Subscription>;
  leave(topic: string): Promise<void>;

  /** Status of the channel for a topic, if one is registered. */
  channel(topic: string): ChannelStatus | undefined;
  topics(): string[];
  stats(): SocketStats;

  onState(cb: (state: SocketState) => void): () => void;
  onError(cb: SocketErrorCallback): () => void;
}
