// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Phoenix channel socket: one connection multiplexing many topic channels,
 * with heartbeat, reconnect and automatic rejoin.
 */

import { buildEndpointUrl, redactUrl } from "./auth.js";
import { BackoffPolicy } from "./backoff.js";
import { Channel, type CloseReason } from "./channel.js";
import { resolveConfig } from "./config.js";
import {
  ConnectionClosedError,
  ConnectionError,
  JoinError,
  LeaveError,
  RejoinError,
  ReplyError,
  StateError,
  TimeoutError,
  type JoinFailureReason,
} from "./errors.js";
import { HeartbeatDriver } from "./heartbeat.js";
import { LOG_CONTEXT } from "./logger.js";
import {
  CHANNEL_EVENTS,
  PHOENIX_TOPIC,
  createRefCounter,
  encodeFrame,
  parseFrame,
} from "./protocol.js";
import { ReplyTracker } from "./replies.js";
import type {
  ChannelHandle,
  ChannelMessageKind,
  ChannelStatus,
  Frame,
  JoinOptions,
  PhoenixSocket,
  SocketErrorCallback,
  SocketErrorContext,
  SocketOptions,
  SocketState,
  SocketStats,
  Subscription,
  Transport,
} from "./types.js";

export * from "./auth.js";
export * from "./backoff.js";
export * from "./channel.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./heartbeat.js";
export * from "./logger.js";
export * from "./protocol.js";
export * from "./queue.js";
export * from "./replies.js";
export * from "./transport.js";
export * from "./types.js";

/**
 * Creates a socket in the "closed" state. Call connect() before joining.
 * Throws TypeError for invalid options.
 */
export function createSocket(opts: SocketOptions): PhoenixSocket {
  const config = resolveConfig(opts);
  const logger = config.logger;
  const backoff = new BackoffPolicy(config.reconnect);

  // Internal state
  let transport: Transport | null = null;
  let state: SocketState = "closed";
  let endpoint = String(config.url);
  let reconnectAttempts = 0;
  let reconnectTimeoutId: ReturnType<typeof setTimeout> | null = null;
  let connectPromise: Promise<void> | null = null;
  let manualClose = false; // Set by disconnect(), prevents auto-reconnect
  let generation = 0; // Bumped by connect() and disconnect(); stale attempts bail out

  // Components
  const makeRef = createRefCounter();
  const channels = new Map<string, Channel>();
  const replies = new ReplyTracker();
  const stateCallbacks = new Set<(state: SocketState) => void>();
  const errorCallbacks = new Set<SocketErrorCallback>();
  const counters = {
    orphaned: 0,
    undelivered: 0,
    overflowed: 0,
    malformed: 0,
    reconnects: 0,
  };

  const heartbeat = new HeartbeatDriver(
    config.heartbeat,
    {
      send: (ref) =>
        push({
          topic: PHOENIX_TOPIC,
          event: CHANNEL_EVENTS.HEARTBEAT,
          payload: {},
          ref,
        }),
      onTimeout: (silentForMs) => {
        logger.warn(
          LOG_CONTEXT.HEARTBEAT,
          `No inbound traffic for ${silentForMs}ms, dropping connection`,
        );
        if (transport) {
          handleSessionLost(transport, "heartbeat timeout");
        }
      },
      onSendFailure: (error) => {
        logger.warn(LOG_CONTEXT.HEARTBEAT, "Failed to send heartbeat", error);
      },
    },
    makeRef,
  );

  // State transitions
  function setState(newState: SocketState): void {
    if (state === newState) return;
    state = newState;
    logger.debug(LOG_CONTEXT.CONNECTION, `State: ${state}`);
    for (const cb of Array.from(stateCallbacks)) {
      try {
        cb(state);
      } catch (error) {
        logger.error(LOG_CONTEXT.CONNECTION, "State callback error", error);
      }
    }
  }

  function reportError(error: Error, context: SocketErrorContext): void {
    for (const cb of Array.from(errorCallbacks)) {
      try {
        cb(error, context);
      } catch (cbError) {
        logger.error(LOG_CONTEXT.CONNECTION, "Error callback failed", cbError);
      }
    }
  }

  function push(frame: Frame): void {
    if (state !== "open" || !transport) {
      throw new StateError(`Cannot push "${frame.event}" while ${state}`);
    }
    transport.send(encodeFrame(frame));
  }

  // Session lifecycle

  async function openSession(attempt: number): Promise<void> {
    const url = await buildEndpointUrl(config.url, config.params, config.auth);
    endpoint = redactUrl(url, config.auth.queryParam);
    if (manualClose || attempt !== generation) {
      throw new ConnectionError("Disconnected while connecting", endpoint);
    }

    const session = config.transportFactory(url);
    transport = session;

    try {
      await session.open();
    } catch (error) {
      if (transport === session) transport = null;
      throw new ConnectionError(`Failed to connect to ${endpoint}`, endpoint, {
        cause: error,
      });
    }

    // disconnect() (and maybe a fresh connect()) ran during the handshake
    if (manualClose || attempt !== generation || transport !== session) {
      session.close();
      throw new ConnectionError("Disconnected while connecting", endpoint);
    }

    setState("open");
    reconnectAttempts = 0;
    heartbeat.start();
    logger.info(LOG_CONTEXT.CONNECTION, `Connected to ${endpoint}`);

    runDispatch(session).catch((error) => {
      logger.error(LOG_CONTEXT.MESSAGE, "Dispatch loop failed", error);
    });
  }

  async function runDispatch(session: Transport): Promise<void> {
    let reason = "transport closed";
    try {
      for await (const raw of session.frames()) {
        if (session !== transport) return;
        try {
          handleRaw(raw);
        } catch (error) {
          logger.error(LOG_CONTEXT.MESSAGE, "Frame handling failed", error);
        }
      }
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
      logger.warn(LOG_CONTEXT.CONNECTION, "Transport failed", error);
    }
    handleSessionLost(session, reason);
  }

  function handleSessionLost(session: Transport, reason: string): void {
    // Stale session (already replaced or disconnected)
    if (session !== transport) return;

    transport = null;
    heartbeat.stop();
    session.close();
    replies.rejectAll();

    for (const channel of Array.from(channels.values())) {
      if (channel.isTerminal) continue;
      const next = channel.apply({ type: "session-lost" });
      if (next.status === "closed") {
        channels.delete(channel.topic);
      }
    }

    if (manualClose) {
      setState("closed");
      return;
    }

    logger.warn(LOG_CONTEXT.CONNECTION, `Connection lost (${reason})`);
    reportError(new ConnectionError(`Connection lost: ${reason}`, endpoint), {
      type: "connection",
      details: reason,
    });

    if (config.reconnect.enabled) {
      scheduleReconnect();
    } else {
      giveUp(new ConnectionError("Connection lost", endpoint));
    }
  }

  function scheduleReconnect(): void {
    if (!backoff.canRetry(reconnectAttempts)) {
      giveUp(
        new ConnectionError(
          `Reconnect gave up after ${reconnectAttempts} attempts`,
          endpoint,
        ),
      );
      return;
    }

    reconnectAttempts++;
    const delay = backoff.delay(reconnectAttempts);
    setState("reconnecting");
    logger.info(
      LOG_CONTEXT.RECONNECT,
      `Reconnecting in ${delay}ms (attempt ${reconnectAttempts})`,
    );

    reconnectTimeoutId = setTimeout(() => {
      reconnectTimeoutId = null;
      reconnect().catch((error) => {
        logger.error(LOG_CONTEXT.RECONNECT, "Reconnect failed", error);
      });
    }, delay);
  }

  async function reconnect(): Promise<void> {
    if (manualClose) return;
    const attempt = generation;
    setState("connecting");
    try {
      await openSession(attempt);
    } catch (error) {
      if (manualClose || attempt !== generation) {
        logger.debug(LOG_CONTEXT.RECONNECT, "Reconnect attempt superseded", error);
        return;
      }
      logger.warn(LOG_CONTEXT.RECONNECT, "Reconnect attempt failed", error);
      scheduleReconnect();
      return;
    }
    counters.reconnects++;
    rejoinAll();
  }

  /**
   * Reconnect budget exhausted (or reconnect disabled): every channel still
   * waiting to rejoin fails and the socket closes.
   */
  function giveUp(cause: ConnectionError): void {
    logger.error(LOG_CONTEXT.RECONNECT, cause.message);
    for (const channel of Array.from(channels.values())) {
      const current = channel.current;
      // Initial joins are settled by their own rejected reply
      if (channel.isTerminal || (current.status === "joining" && !current.rejoin)) {
        continue;
      }
      const error = new RejoinError(channel.topic, { cause });
      if (current.status === "joining") {
        channel.apply({ type: "join-failed", error });
        reportError(error, { type: "rejoin", topic: channel.topic });
      } else {
        channel.apply({ type: "close", reason: "disconnect" });
      }
    }
    channels.clear();
    setState("closed");
  }

  // Inbound routing

  function handleRaw(raw: string): void {
    heartbeat.touch();

    const result = parseFrame(raw);
    if (!result.success) {
      counters.malformed++;
      logger.warn(LOG_CONTEXT.MESSAGE, "Failed to parse frame", result.error);
      reportError(new Error("Malformed frame"), { type: "parse", details: raw });
      return;
    }

    const frame = result.frame;
    if (frame.topic === PHOENIX_TOPIC) {
      if (frame.event === CHANNEL_EVENTS.REPLY) {
        heartbeat.handleReply(frame.ref);
      }
      return;
    }

    if (frame.event === CHANNEL_EVENTS.REPLY && replies.handleReply(frame)) {
      return;
    }

    const channel = channels.get(frame.topic);
    if (!channel || channel.isTerminal) {
      counters.orphaned++;
      logger.debug(
        LOG_CONTEXT.MESSAGE,
        `Dropped "${frame.event}" for unknown topic "${frame.topic}"`,
      );
      return;
    }

    // Tagged with an earlier membership of the topic
    if (frame.join_ref && channel.joinRef && frame.join_ref !== channel.joinRef) {
      counters.orphaned++;
      logger.debug(
        LOG_CONTEXT.MESSAGE,
        `Dropped "${frame.event}" for stale join_ref ${frame.join_ref} on "${frame.topic}"`,
      );
      return;
    }

    switch (frame.event) {
      case CHANNEL_EVENTS.CLOSE:
        handleServerClose(channel);
        return;
      case CHANNEL_EVENTS.ERROR:
        deliver(channel, frame, "error");
        handleChannelError(channel);
        return;
      case CHANNEL_EVENTS.REPLY:
        deliver(channel, frame, "reply");
        return;
      default:
        deliver(channel, frame, "event");
    }
  }

  function deliver(
    channel: Channel,
    frame: Frame,
    kind: ChannelMessageKind,
  ): void {
    const outcome = channel.deliver({
      kind,
      topic: frame.topic,
      event: frame.event,
      payload: frame.payload,
      ref: frame.ref,
    });

    switch (outcome) {
      case "delivered":
        return;
      case "no-consumer":
      case "closed":
        counters.undelivered++;
        return;
      case "dropped-oldest":
      case "dropped-newest":
        counters.overflowed++;
        logger.warn(
          LOG_CONTEXT.MESSAGE,
          `Queue full on "${channel.topic}" (${outcome})`,
        );
        reportError(new Error(`Delivery queue full (${outcome})`), {
          type: "overflow",
          topic: channel.topic,
        });
    }
  }

  function handleServerClose(channel: Channel): void {
    // Leave in progress: its own reply closes the channel
    if (channel.status === "leaving") return;
    logger.info(LOG_CONTEXT.CHANNEL, `Server closed "${channel.topic}"`);
    closeChannel(channel, "server");
  }

  function handleChannelError(channel: Channel): void {
    if (channel.status !== "joined" || state !== "open") return;
    logger.warn(
      LOG_CONTEXT.CHANNEL,
      `Server reported an error on "${channel.topic}", rejoining`,
    );
    rejoin(channel);
  }

  function closeChannel(channel: Channel, reason: "left" | "server"): void {
    if (!channel.isTerminal) {
      channel.apply({ type: "close", reason });
    }
    if (channels.get(channel.topic) === channel) {
      channels.delete(channel.topic);
    }
  }

  // Join / rejoin / leave handshakes

  function sendJoin(channel: Channel, joinRef: string): void {
    push({
      topic: channel.topic,
      event: CHANNEL_EVENTS.JOIN,
      payload: channel.joinPayload,
      ref: joinRef,
      join_ref: joinRef,
    });
  }

  function joinFailureReason(error: unknown): JoinFailureReason {
    if (error instanceof TimeoutError) return "timeout";
    if (error instanceof ReplyError) return "rejected";
    return "connection-lost";
  }

  function startJoin(topic: string, opts: JoinOptions): Channel {
    const joinRef = makeRef();
    const channel = new Channel(topic, opts.payload ?? {}, joinRef, config.queue);
    channels.set(topic, channel);
    logger.debug(LOG_CONTEXT.CHANNEL, `Joining "${topic}" (ref ${joinRef})`);

    const timeoutMs = opts.timeoutMs ?? config.joinTimeoutMs;
    channel.joinPromise = replies
      .register(joinRef, topic, timeoutMs, () => sendJoin(channel, joinRef))
      .then(
        () => {
          if (channel.joinRef === joinRef && channel.status === "joining") {
            channel.apply({ type: "joined" });
            logger.info(LOG_CONTEXT.CHANNEL, `Joined "${topic}"`);
          }
        },
        (error) => {
          const joinError = new JoinError(topic, joinFailureReason(error), {
            cause: error,
          });
          const current = channel.current;
          if (current.status === "joining" && !current.rejoin) {
            channel.apply({ type: "join-failed", error: joinError });
          }
          if (channels.get(topic) === channel && channel.isTerminal) {
            channels.delete(topic);
          }
          // The server may still complete the join later
          if (error instanceof TimeoutError) {
            pushQuietly({
              topic,
              event: CHANNEL_EVENTS.LEAVE,
              payload: {},
              ref: makeRef(),
              join_ref: joinRef,
            });
          }
          logger.warn(LOG_CONTEXT.CHANNEL, joinError.message, error);
          throw joinError;
        },
      )
      .finally(() => {
        channel.joinPromise = null;
      });

    return channel;
  }

  function pushQuietly(frame: Frame): void {
    try {
      push(frame);
    } catch (error) {
      logger.debug(
        LOG_CONTEXT.CHANNEL,
        `Could not send "${frame.event}" to "${frame.topic}"`,
        error,
      );
    }
  }

  function rejoin(channel: Channel): void {
    const topic = channel.topic;
    const joinRef = makeRef();
    channel.apply({ type: "rejoin", joinRef });
    logger.debug(LOG_CONTEXT.CHANNEL, `Rejoining "${topic}" (ref ${joinRef})`);

    replies
      .register(joinRef, topic, config.joinTimeoutMs, () =>
        sendJoin(channel, joinRef),
      )
      .then(
        () => {
          if (channel.joinRef === joinRef && channel.status === "joining") {
            channel.apply({ type: "joined" });
            logger.info(LOG_CONTEXT.CHANNEL, `Rejoined "${topic}"`);
          }
        },
        (error) => {
          // Superseded by a newer session or closed meanwhile
          if (channel.joinRef !== joinRef || channel.status !== "joining") {
            return;
          }
          if (error instanceof ConnectionClosedError) return;

          const rejoinError = new RejoinError(topic, { cause: error });
          channel.apply({ type: "join-failed", error: rejoinError });
          if (channels.get(topic) === channel) {
            channels.delete(topic);
          }
          logger.warn(LOG_CONTEXT.CHANNEL, rejoinError.message, error);
          reportError(rejoinError, { type: "rejoin", topic });
        },
      )
      .catch((error) => {
        logger.error(LOG_CONTEXT.CHANNEL, `Rejoin of "${topic}" failed`, error);
      });
  }

  function rejoinAll(): void {
    for (const channel of Array.from(channels.values())) {
      const current = channel.current;
      if (
        current.status === "joining" &&
        current.rejoin &&
        current.joinRef === null
      ) {
        rejoin(channel);
      }
    }
  }

  async function performLeave(channel: Channel): Promise<void> {
    const topic = channel.topic;

    if (channel.joinPromise) {
      try {
        await channel.joinPromise;
      } catch (error) {
        logger.debug(LOG_CONTEXT.CHANNEL, `Leave of "${topic}" skipped`, error);
        return;
      }
    }
    if (channel.isTerminal) return;

    const joinRef = channel.joinRef;
    if (state !== "open" || joinRef === null) {
      // Nothing to leave over the wire
      closeChannel(channel, "left");
      return;
    }

    const leaveRef = makeRef();
    channel.apply({ type: "leave", leaveRef });
    logger.debug(LOG_CONTEXT.CHANNEL, `Leaving "${topic}" (ref ${leaveRef})`);

    try {
      await replies.register(leaveRef, topic, config.leaveTimeoutMs, () =>
        push({
          topic,
          event: CHANNEL_EVENTS.LEAVE,
          payload: {},
          ref: leaveRef,
          join_ref: joinRef,
        }),
      );
    } catch (error) {
      if (!(error instanceof TimeoutError) && !(error instanceof ReplyError)) {
        // Session went away; the channel was closed with it
        finishLeave(channel, leaveRef, "left");
        logger.debug(LOG_CONTEXT.CHANNEL, `Left "${topic}" locally`, error);
        return;
      }

      const timedOut = error instanceof TimeoutError;
      finishLeave(channel, leaveRef, timedOut ? "leave-timeout" : "leave-rejected");
      const leaveError = new LeaveError(topic, timedOut ? "timeout" : "rejected", {
        cause: error,
      });
      logger.warn(LOG_CONTEXT.CHANNEL, leaveError.message, error);
      reportError(leaveError, { type: "leave", topic });
      throw leaveError;
    }

    finishLeave(channel, leaveRef, "left");
    logger.info(LOG_CONTEXT.CHANNEL, `Left "${topic}"`);
  }

  function finishLeave(
    channel: Channel,
    leaveRef: string,
    reason: Extract<CloseReason, "left" | "leave-timeout" | "leave-rejected">,
  ): void {
    const current = channel.current;
    if (current.status === "leaving" && current.leaveRef === leaveRef) {
      channel.apply({ type: "left", reason });
    }
    if (channels.get(channel.topic) === channel && channel.isTerminal) {
      channels.delete(channel.topic);
    }
  }

  function createHandle(channel: Channel): ChannelHandle {
    let released = false;
    return {
      topic: channel.topic,
      get status(): ChannelStatus {
        return channel.status;
      },
      async close(): Promise<void> {
        if (released) return;
        released = true;
        if (channel.release() > 0) return;
        if (channels.get(channel.topic) !== channel) return;
        await leave(channel.topic);
      },
    };
  }

  // Public API

  function connect(): Promise<void> {
    // Idempotent: return in-flight promise if connecting
    if (connectPromise) return connectPromise;

    // Already open
    if (state === "open") return Promise.resolve();

    // A reconnect cycle owns the connection; wait for it to settle
    if (state === "reconnecting" || state === "connecting") {
      return onceSettled();
    }

    connectPromise = (async () => {
      try {
        setState("connecting");
        manualClose = false;
        await openSession(++generation);
      } catch (error) {
        setState("closed");
        throw error;
      } finally {
        connectPromise = null;
      }
    })();

    return connectPromise;
  }

  function onceSettled(): Promise<void> {
    return new Promise((resolve, reject) => {
      const unsub = onState((s) => {
        if (s === "open") {
          unsub();
          resolve();
        } else if (s === "closed") {
          unsub();
          reject(new ConnectionError("Connection closed", endpoint));
        }
      });
    });
  }

  async function disconnect(opts?: {
    code?: number;
    reason?: string;
  }): Promise<void> {
    // Fully idempotent - safe to call in any state
    manualClose = true;
    generation++;

    if (reconnectTimeoutId) {
      clearTimeout(reconnectTimeoutId);
      reconnectTimeoutId = null;
    }

    heartbeat.stop();
    const session = transport;
    transport = null;

    replies.rejectAll();
    for (const channel of Array.from(channels.values())) {
      if (!channel.isTerminal) {
        channel.apply({ type: "close", reason: "disconnect" });
      }
    }
    channels.clear();

    if (session) {
      setState("closing");
      session.close(opts?.code ?? 1000, opts?.reason ?? "");
      logger.info(LOG_CONTEXT.CONNECTION, `Disconnected from ${endpoint}`);
    }
    setState("closed");
  }

  async function join(
    topic: string,
    opts: JoinOptions = {},
  ): Promise<Subscription> {
    if (state !== "open") {
      throw new StateError(`Cannot join "${topic}" while ${state}`);
    }

    let channel = channels.get(topic);

    // Queue behind a leave in progress, then start a fresh membership
    while (channel?.leavePromise) {
      await channel.leavePromise.catch((error) => {
        logger.debug(LOG_CONTEXT.CHANNEL, `Join of "${topic}" after failed leave`, error);
      });
      channel = channels.get(topic);
    }

    if (!channel || channel.isTerminal) {
      if (state !== "open") {
        throw new StateError(`Cannot join "${topic}" while ${state}`);
      }
      channel = startJoin(topic, opts);
    }

    // Shared by concurrent joiners; rejects with JoinError
    if (channel.joinPromise) {
      await channel.joinPromise;
    }

    if (channel.isTerminal || channel.status === "leaving") {
      throw new StateError(`Channel "${topic}" is ${channel.status}`);
    }

    channel.retain();
    return { handle: createHandle(channel), receiver: channel.openReceiver() };
  }

  function leave(topic: string): Promise<void> {
    const channel = channels.get(topic);
    if (!channel || channel.isTerminal) return Promise.resolve();
    if (channel.leavePromise) return channel.leavePromise;

    const leavePromise = performLeave(channel).finally(() => {
      channel.leavePromise = null;
    });
    channel.leavePromise = leavePromise;
    return leavePromise;
  }

  function onState(cb: (state: SocketState) => void): () => void {
    stateCallbacks.add(cb);
    return () => stateCallbacks.delete(cb);
  }

  function onError(cb: SocketErrorCallback): () => void {
    errorCallbacks.add(cb);
    return () => errorCallbacks.delete(cb);
  }

  function stats(): SocketStats {
    return { ...counters, lastRoundTripMs: heartbeat.lastRoundTripMs };
  }

  return {
    get state() {
      return state;
    },
    get isConnected() {
      return state === "open";
    },
    connect,
    disconnect,
    join,
    leave,
    channel: (topic) => channels.get(topic)?.status,
    topics: () => Array.from(channels.keys()),
    stats,
    onState,
    onError,
  };
}

/**
 * Creates a socket and opens it. Rejects with ConnectionError when the
 * handshake fails.
 */
export async function connect(opts: SocketOptions): Promise<PhoenixSocket> {
  const socket = createSocket(opts);
  await socket.connect();
  return socket;
}
