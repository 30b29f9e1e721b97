// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Per-topic channel: lifecycle state machine plus delivery queue.
 *
 * joining → joined → leaving → closed, with errored reachable from any
 * non-terminal state. closed and errored are terminal. A joined channel
 * whose session drops (or that receives phx_error) goes back to joining
 * with `rejoin: true` until the rejoin reply settles.
 */

import { StateError } from "./errors.js";
import {
  DeliveryQueue,
  Receiver,
  type OverflowPolicy,
  type PushResult,
} from "./queue.js";
import type { ChannelMessage, ChannelStatus } from "./types.js";

export type CloseReason =
  | "left" // Leave acknowledged
  | "leave-timeout" // No ack within leaveTimeoutMs
  | "leave-rejected" // Error reply to the leave
  | "session-lost" // Session dropped while leaving
  | "server" // phx_close from the server
  | "disconnect"; // Socket disconnected by the caller

export type ChannelState =
  | {
      status: "joining";
      /** null while waiting for a connection to rejoin over */
      joinRef: string | null;
      rejoin: boolean;
    }
  | { status: "joined"; joinRef: string }
  | { status: "leaving"; joinRef: string | null; leaveRef: string }
  | { status: "closed"; reason: CloseReason }
  | { status: "errored"; error: Error };

export type ChannelEvent =
  | { type: "joined" }
  | { type: "join-failed"; error: Error }
  | { type: "leave"; leaveRef: string }
  | { type: "left"; reason: "left" | "leave-timeout" | "leave-rejected" }
  | { type: "session-lost" }
  | { type: "rejoin"; joinRef: string }
  | { type: "close"; reason: "left" | "server" | "disconnect" };

/**
 * Pure transition function. Throws StateError for an illegal transition.
 */
export function transitionChannel(
  state: ChannelState,
  event: ChannelEvent,
): ChannelState {
  if (state.status === "closed" || state.status === "errored") {
    throw illegal(state, event);
  }

  switch (event.type) {
    case "joined":
      if (state.status === "joining" && state.joinRef !== null) {
        return { status: "joined", joinRef: state.joinRef };
      }
      throw illegal(state, event);

    case "join-failed":
      if (state.status === "joining") {
        return { status: "errored", error: event.error };
      }
      throw illegal(state, event);

    case "leave":
      if (state.status === "joined" || state.status === "joining") {
        return {
          status: "leaving",
          joinRef: state.joinRef,
          leaveRef: event.leaveRef,
        };
      }
      throw illegal(state, event);

    case "left":
      if (state.status === "leaving") {
        return { status: "closed", reason: event.reason };
      }
      throw illegal(state, event);

    case "session-lost":
      switch (state.status) {
        case "joined":
          return { status: "joining", joinRef: null, rejoin: true };
        case "joining":
          // An initial join is settled by its own pending reply
          return state.rejoin
            ? { status: "joining", joinRef: null, rejoin: true }
            : state;
        case "leaving":
          return { status: "closed", reason: "session-lost" };
      }
      throw illegal(state, event);

    case "rejoin":
      if (
        state.status === "joined" ||
        (state.status === "joining" && state.rejoin)
      ) {
        return { status: "joining", joinRef: event.joinRef, rejoin: true };
      }
      throw illegal(state, event);

    case "close":
      return { status: "closed", reason: event.reason };
  }
}

function illegal(state: ChannelState, event: ChannelEvent): StateError {
  return new StateError(
    `Illegal channel transition: ${event.type} while ${state.status}`,
  );
}

export class Channel {
  private state: ChannelState;
  private readonly queue: DeliveryQueue<ChannelMessage>;
  private handles = 0;
  private unclaimed: Receiver<ChannelMessage> | null;

  /** In-flight initial join, shared by concurrent joiners of the topic. */
  joinPromise: Promise<void> | null = null;

  /** In-flight leave, shared by concurrent leavers and queued joiners. */
  leavePromise: Promise<void> | null = null;

  constructor(
    readonly topic: string,
    readonly joinPayload: unknown,
    joinRef: string,
    queue: { capacity: number; overflow: OverflowPolicy },
  ) {
    this.state = { status: "joining", joinRef, rejoin: false };
    this.queue = new DeliveryQueue(queue.capacity, queue.overflow);
    // Attached up front so frames arriving right after the join reply are
    // buffered for the first joiner
    this.unclaimed = new Receiver(this.queue);
  }

  get status(): ChannelStatus {
    return this.state.status;
  }

  get current(): ChannelState {
    return this.state;
  }

  get isTerminal(): boolean {
    return this.state.status === "closed" || this.state.status === "errored";
  }

  /**
   * Join ref of the current membership, if any. Frames tagged with a
   * different join_ref belong to an earlier membership.
   */
  get joinRef(): string | null {
    switch (this.state.status) {
      case "joining":
      case "joined":
      case "leaving":
        return this.state.joinRef;
      default:
        return null;
    }
  }

  apply(event: ChannelEvent): ChannelState {
    this.state = transitionChannel(this.state, event);
    if (this.state.status === "closed") {
      this.queue.close();
    } else if (this.state.status === "errored") {
      this.queue.fail(this.state.error);
    }
    return this.state;
  }

  /**
   * Pushes an inbound message. "no-consumer" when every receiver has
   * been dropped; the message is discarded.
   */
  deliver(message: ChannelMessage): PushResult | "no-consumer" {
    if (this.queue.consumerCount === 0) {
      return "no-consumer";
    }
    return this.queue.push(message);
  }

  openReceiver(): Receiver<ChannelMessage> {
    const receiver = this.unclaimed ?? new Receiver(this.queue);
    this.unclaimed = null;
    return receiver;
  }

  retain(): void {
    this.handles++;
  }

  /**
   * Returns the number of handles still held.
   */
  release(): number {
    this.handles = Math.max(0, this.handles - 1);
    return this.handles;
  }

  get handleCount(): number {
    return this.handles;
  }
}
