// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Test helpers for socket tests
 */

import {
  DeliveryQueue,
  Receiver,
  TransportError,
  parseFrame,
  type Frame,
  type Transport,
  type TransportFactory,
} from "../src/index.js";

/**
 * Deterministically wait for a condition. Polls with small intervals
 * instead of fixed timeouts for reliability across fast and slow
 * environments.
 */
export async function waitFor(
  predicate: () => boolean,
  description = "condition",
  timeoutMs = 1000,
): Promise<void> {
  const start = Date.now();
  const pollIntervalMs = 5;

  while (!predicate()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error(`Timeout waiting for ${description}`);
    }
    await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
  }
}

/**
 * Wait for socket state to reach expected value.
 */
export function waitForState(
  socket: { state: string },
  expectedState: string,
  timeoutMs = 1000,
): Promise<void> {
  return waitFor(
    () => socket.state === expectedState,
    `state "${expectedState}" (got "${socket.state}")`,
    timeoutMs,
  );
}

export interface MockTransport extends Transport {
  readonly url: URL;
  /** Frames the client sent, parsed. */
  readonly sent: Frame[];
  readonly isOpen: boolean;
  readonly closeCalls: number;
  /** Push a frame from the server. */
  receive(frame: {
    topic: string;
    event: string;
    payload?: unknown;
    ref?: string | null;
    join_ref?: string | null;
  }): void;
  /** Push raw text from the server. */
  receiveRaw(raw: string): void;
  /** Reply to a frame the client sent. */
  reply(to: Frame, status: "ok" | "error", response?: unknown): void;
  /** Complete a handshake held by `MockServer.holdNext`. */
  completeOpen(): void;
  /** Server-side close: inbound frames end. */
  drop(): void;
  /** Connection failure: inbound frames throw. */
  fail(error?: Error): void;
  /** Frames sent on a topic with a given event. */
  sentOf(topic: string, event: string): Frame[];
}

export interface MockServer {
  readonly factory: TransportFactory;
  readonly transports: MockTransport[];
  /** Latest transport built by the factory. */
  readonly current: MockTransport;
  /** Reply ok to every phx_join. */
  autoJoin: boolean;
  /** Reply ok to every phx_leave. */
  autoLeave: boolean;
  /**
   * Reply ok to every heartbeat. Read when a transport is built, so a
   * change only affects later connections.
   */
  autoHeartbeat: boolean;
  /** Number of upcoming handshakes to refuse. */
  refuseNext: number;
  /** Number of upcoming handshakes left pending until completeOpen(). */
  holdNext: number;
}

/**
 * Creates an in-process stand-in for the server side of a socket. Every
 * (re)connect builds a new MockTransport through `factory`.
 */
export function createMockServer(
  opts: { autoJoin?: boolean; autoLeave?: boolean; autoHeartbeat?: boolean } = {},
): MockServer {
  const transports: MockTransport[] = [];

  const server: MockServer = {
    factory: (url) => {
      const transport = createMockTransport(url, server);
      transports.push(transport);
      return transport;
    },
    transports,
    get current() {
      const latest = transports[transports.length - 1];
      if (!latest) throw new Error("No transport built yet");
      return latest;
    },
    autoJoin: opts.autoJoin ?? true,
    autoLeave: opts.autoLeave ?? true,
    autoHeartbeat: opts.autoHeartbeat ?? true,
    refuseNext: 0,
    holdNext: 0,
  };

  return server;
}

function createMockTransport(url: URL, server: MockServer): MockTransport {
  const inbound = new DeliveryQueue<string>();
  const receiver = new Receiver(inbound);
  const sent: Frame[] = [];
  let state: "new" | "open" | "closed" = "new";
  let closeCalls = 0;
  let heldOpen: (() => void) | null = null;
  const respondToHeartbeats = server.autoHeartbeat;

  function autoRespond(frame: Frame): void {
    if (frame.event === "phx_join" && server.autoJoin) {
      transport.reply(frame, "ok", {});
    } else if (frame.event === "phx_leave" && server.autoLeave) {
      transport.reply(frame, "ok", {});
    } else if (frame.event === "heartbeat" && respondToHeartbeats) {
      transport.reply(frame, "ok", {});
    }
  }

  const transport: MockTransport = {
    url,
    sent,
    get isOpen() {
      return state === "open";
    },
    get closeCalls() {
      return closeCalls;
    },

    open() {
      if (server.refuseNext > 0) {
        server.refuseNext--;
        state = "closed";
        return Promise.reject(new TransportError("Connection refused"));
      }
      if (server.holdNext > 0) {
        server.holdNext--;
        return new Promise<void>((resolve) => {
          heldOpen = () => {
            state = "open";
            resolve();
          };
        });
      }
      state = "open";
      return Promise.resolve();
    },

    send(data) {
      if (state !== "open") {
        throw new TransportError("WebSocket is not open");
      }
      const result = parseFrame(data);
      if (!result.success) {
        throw new Error(`Client sent an invalid frame: ${data}`);
      }
      sent.push(result.frame);
      autoRespond(result.frame);
    },

    close() {
      closeCalls++;
      state = "closed";
      inbound.close();
    },

    frames() {
      return receiver;
    },

    receive(frame) {
      inbound.push(
        JSON.stringify({
          payload: {},
          ref: null,
          ...frame,
        }),
      );
    },

    receiveRaw(raw) {
      inbound.push(raw);
    },

    reply(to, status, response = {}) {
      transport.receive({
        topic: to.topic,
        event: "phx_reply",
        payload: { status, response },
        ref: to.ref,
        join_ref: to.join_ref ?? null,
      });
    },

    completeOpen() {
      if (!heldOpen) throw new Error("No handshake held");
      const complete = heldOpen;
      heldOpen = null;
      complete();
    },

    drop() {
      state = "closed";
      inbound.close();
    },

    fail(error = new TransportError("Connection reset")) {
      state = "closed";
      inbound.fail(error);
    },

    sentOf(topic, event) {
      return sent.filter((f) => f.topic === topic && f.event === event);
    },
  };

  return transport;
}
