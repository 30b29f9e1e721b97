// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Channel State Machine Tests
 *
 * - Happy path: joining → joined → leaving → closed
 * - Session loss sends joined channels back to joining
 * - Terminal states reject every event
 * - Queue termination follows the channel state
 */

import { describe, expect, it } from "vitest";
import {
  Channel,
  StateError,
  transitionChannel,
  type ChannelMessage,
  type ChannelState,
} from "../../src/index.js";

const message = (event: string): ChannelMessage => ({
  kind: "event",
  topic: "room:1",
  event,
  payload: {},
  ref: null,
});

describe("transitionChannel", () => {
  const joining: ChannelState = { status: "joining", joinRef: "1", rejoin: false };
  const joined: ChannelState = { status: "joined", joinRef: "1" };

  it("joins, leaves and closes", () => {
    const afterJoin = transitionChannel(joining, { type: "joined" });
    expect(afterJoin).toEqual({ status: "joined", joinRef: "1" });

    const leaving = transitionChannel(afterJoin, { type: "leave", leaveRef: "2" });
    expect(leaving).toEqual({ status: "leaving", joinRef: "1", leaveRef: "2" });

    expect(transitionChannel(leaving, { type: "left", reason: "left" })).toEqual({
      status: "closed",
      reason: "left",
    });
  });

  it("errors a failed join", () => {
    const error = new Error("denied");
    expect(transitionChannel(joining, { type: "join-failed", error })).toEqual({
      status: "errored",
      error,
    });
  });

  it("sends a joined channel back to joining on session loss", () => {
    expect(transitionChannel(joined, { type: "session-lost" })).toEqual({
      status: "joining",
      joinRef: null,
      rejoin: true,
    });
  });

  it("leaves an initial join alone on session loss", () => {
    expect(transitionChannel(joining, { type: "session-lost" })).toBe(joining);
  });

  it("closes a leaving channel on session loss", () => {
    const leaving: ChannelState = { status: "leaving", joinRef: "1", leaveRef: "2" };
    expect(transitionChannel(leaving, { type: "session-lost" })).toEqual({
      status: "closed",
      reason: "session-lost",
    });
  });

  it("rejoins from joined and from a pending rejoin", () => {
    expect(transitionChannel(joined, { type: "rejoin", joinRef: "5" })).toEqual({
      status: "joining",
      joinRef: "5",
      rejoin: true,
    });

    const waiting: ChannelState = { status: "joining", joinRef: null, rejoin: true };
    expect(transitionChannel(waiting, { type: "rejoin", joinRef: "6" })).toEqual({
      status: "joining",
      joinRef: "6",
      rejoin: true,
    });
  });

  it("rejects a rejoin of an initial join", () => {
    expect(() => transitionChannel(joining, { type: "rejoin", joinRef: "2" })).toThrow(
      StateError,
    );
  });

  it("cannot mark joined without a join ref", () => {
    const waiting: ChannelState = { status: "joining", joinRef: null, rejoin: true };
    expect(() => transitionChannel(waiting, { type: "joined" })).toThrow(
      "Illegal channel transition: joined while joining",
    );
  });

  it("rejects every event in a terminal state", () => {
    const closed: ChannelState = { status: "closed", reason: "left" };
    const errored: ChannelState = { status: "errored", error: new Error("x") };

    for (const state of [closed, errored]) {
      expect(() => transitionChannel(state, { type: "close", reason: "server" })).toThrow(
        StateError,
      );
      expect(() => transitionChannel(state, { type: "session-lost" })).toThrow(StateError);
    }
  });
});

describe("Channel", () => {
  const queue = { capacity: 2, overflow: "drop-oldest" as const };

  it("buffers frames for the first receiver before it is claimed", async () => {
    const channel = new Channel("room:1", {}, "1", queue);
    expect(channel.deliver(message("a"))).toBe("delivered");

    const receiver = channel.openReceiver();
    expect((await receiver.recv())?.event).toBe("a");
  });

  it("reports no-consumer once every receiver is dropped", () => {
    const channel = new Channel("room:1", {}, "1", queue);
    channel.openReceiver().drop();
    expect(channel.deliver(message("a"))).toBe("no-consumer");
  });

  it("applies the overflow policy", () => {
    const channel = new Channel("room:1", {}, "1", queue);
    channel.deliver(message("a"));
    channel.deliver(message("b"));
    expect(channel.deliver(message("c"))).toBe("dropped-oldest");

    const receiver = channel.openReceiver();
    expect(receiver.tryRecv()?.event).toBe("b");
    expect(receiver.tryRecv()?.event).toBe("c");
  });

  it("ends receivers cleanly when closed", async () => {
    const channel = new Channel("room:1", {}, "1", queue);
    const receiver = channel.openReceiver();
    channel.deliver(message("a"));
    channel.apply({ type: "close", reason: "server" });

    expect(channel.isTerminal).toBe(true);
    expect((await receiver.recv())?.event).toBe("a");
    expect(await receiver.recv()).toBeUndefined();
  });

  it("fails receivers with the channel error", async () => {
    const channel = new Channel("room:1", {}, "1", queue);
    const receiver = channel.openReceiver();
    const error = new Error("rejoin failed");
    channel.apply({ type: "join-failed", error });

    await expect(receiver.recv()).rejects.toBe(error);
  });

  it("counts handles", () => {
    const channel = new Channel("room:1", {}, "1", queue);
    channel.retain();
    channel.retain();
    expect(channel.release()).toBe(1);
    expect(channel.release()).toBe(0);
    expect(channel.release()).toBe(0);
    expect(channel.handleCount).toBe(0);
  });

  it("exposes the join ref of the current membership", () => {
    const channel = new Channel("room:1", {}, "7", queue);
    expect(channel.joinRef).toBe("7");
    channel.apply({ type: "joined" });
    channel.apply({ type: "session-lost" });
    expect(channel.joinRef).toBeNull();
  });
});
