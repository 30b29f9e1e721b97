// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error classes for socket, channel and transport operations.
 *
 * Handshake failures are surfaced to the caller awaiting the operation,
 * rejoin failures to the receivers of the affected channel. Transport
 * failures stay inside the socket and only trigger a reconnect.
 */

export class ConnectionError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Reply timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Server answered a push with `status: "error"`.
 */
export class ReplyError extends Error {
  constructor(public readonly response: unknown) {
    super(`Server replied with error: ${describeResponse(response)}`);
    this.name = "ReplyError";
  }
}

export class ConnectionClosedError extends Error {
  constructor() {
    super("Connection closed before reply");
    this.name = "ConnectionClosedError";
  }
}

export class StateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateError";
  }
}

export type JoinFailureReason = "rejected" | "timeout" | "connection-lost";

export class JoinError extends Error {
  constructor(
    public readonly topic: string,
    public readonly reason: JoinFailureReason,
    options?: { cause?: unknown },
  ) {
    super(`Failed to join "${topic}" (${reason})`, options);
    this.name = "JoinError";
  }

  /** Server response of an error reply, when there was one. */
  get response(): unknown {
    return this.cause instanceof ReplyError ? this.cause.response : undefined;
  }
}

export type LeaveFailureReason = "rejected" | "timeout";

/**
 * Raised after the channel has already been closed locally.
 */
export class LeaveError extends Error {
  constructor(
    public readonly topic: string,
    public readonly reason: LeaveFailureReason,
    options?: { cause?: unknown },
  ) {
    super(`Leave of "${topic}" was not acknowledged (${reason})`, options);
    this.name = "LeaveError";
  }
}

/**
 * Channel could not be re-established after a reconnect or a server-side
 * channel crash. The channel is terminal once this is raised.
 */
export class RejoinError extends Error {
  constructor(
    public readonly topic: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to rejoin "${topic}"`, options);
    this.name = "RejoinError";
  }
}

function describeResponse(response: unknown): string {
  if (
    response &&
    typeof response === "object" &&
    "reason" in response &&
    typeof response.reason === "string"
  ) {
    return response.reason;
  }
  return JSON.stringify(response) ?? "undefined";
}
