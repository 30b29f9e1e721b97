// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  createRefCounter,
  encodeFrame,
  parseFrame,
  readReply,
} from "../../src/index.js";

describe("parseFrame", () => {
  it("parses a server push", () => {
    const result = parseFrame(
      '{"topic":"room:1","event":"new_msg","payload":{"body":"hi"},"ref":null}',
    );
    expect(result).toEqual({
      success: true,
      frame: { topic: "room:1", event: "new_msg", payload: { body: "hi" }, ref: null },
    });
  });

  it("keeps join_ref when present", () => {
    const result = parseFrame(
      '{"topic":"room:1","event":"phx_reply","payload":{},"ref":"2","join_ref":"1"}',
    );
    expect(result.success && result.frame.join_ref).toBe("1");
  });

  it("defaults a missing ref to null", () => {
    const result = parseFrame('{"topic":"room:1","event":"x","payload":{}}');
    expect(result.success && result.frame.ref).toBeNull();
  });

  it("rejects invalid JSON", () => {
    expect(parseFrame("{nope").success).toBe(false);
  });

  it("rejects frames without a topic", () => {
    expect(parseFrame('{"event":"x","payload":{}}').success).toBe(false);
  });

  it("rejects numeric refs", () => {
    expect(parseFrame('{"topic":"t","event":"x","payload":{},"ref":1}').success).toBe(
      false,
    );
  });

  it("rejects non-object frames", () => {
    expect(parseFrame("[1,2]").success).toBe(false);
    expect(parseFrame("null").success).toBe(false);
  });
});

describe("encodeFrame", () => {
  it("encodes a join with its join_ref", () => {
    expect(
      encodeFrame({
        topic: "room:1",
        event: "phx_join",
        payload: { a: 1 },
        ref: "1",
        join_ref: "1",
      }),
    ).toBe('{"topic":"room:1","event":"phx_join","payload":{"a":1},"ref":"1","join_ref":"1"}');
  });

  it("omits join_ref and defaults the payload", () => {
    expect(
      encodeFrame({ topic: "phoenix", event: "heartbeat", payload: undefined, ref: "3" }),
    ).toBe('{"topic":"phoenix","event":"heartbeat","payload":{},"ref":"3"}');
  });
});

describe("readReply", () => {
  it("reads status and response", () => {
    expect(
      readReply({
        topic: "t",
        event: "phx_reply",
        payload: { status: "ok", response: { x: 1 } },
        ref: "1",
      }),
    ).toEqual({ status: "ok", response: { x: 1 } });
  });

  it("returns undefined without a status", () => {
    expect(
      readReply({ topic: "t", event: "phx_reply", payload: { response: {} }, ref: "1" }),
    ).toBeUndefined();
  });
});

describe("createRefCounter", () => {
  it("counts up from 1 per counter", () => {
    const a = createRefCounter();
    const b = createRefCounter();
    expect([a(), a(), a()]).toEqual(["1", "2", "3"]);
    expect(b()).toBe("1");
  });
});
