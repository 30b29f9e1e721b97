// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Phoenix channel wire protocol (JSON serializer 1.0.0).
 */

import { z } from "zod";
import type { Frame } from "./types.js";

export const PHOENIX_TOPIC = "phoenix";

export const CHANNEL_EVENTS = {
  JOIN: "phx_join",
  LEAVE: "phx_leave",
  REPLY: "phx_reply",
  ERROR: "phx_error",
  CLOSE: "phx_close",
  HEARTBEAT: "heartbeat",
} as const;

export const FrameSchema = z.object({
  topic: z.string(),
  event: z.string(),
  payload: z.unknown(),
  ref: z.string().nullable().optional(),
  join_ref: z.string().nullable().optional(),
});

export const ReplyPayloadSchema = z.object({
  status: z.string(),
  response: z.unknown(),
});

export type ReplyPayload = z.infer<typeof ReplyPayloadSchema>;

export type ParseResult =
  | { success: true; frame: Frame }
  | { success: false; error: unknown };

/**
 * Parses one raw text frame. Never throws.
 */
export function parseFrame(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { success: false, error };
  }

  const result = FrameSchema.safeParse(parsed);
  if (!result.success) {
    return { success: false, error: result.error };
  }

  const { topic, event, payload, ref, join_ref } = result.data;
  return {
    success: true,
    frame: {
      topic,
      event,
      payload,
      ref: ref ?? null,
      ...(join_ref !== undefined && { join_ref }),
    },
  };
}

export function encodeFrame(frame: Frame): string {
  return JSON.stringify({
    topic: frame.topic,
    event: frame.event,
    payload: frame.payload ?? {},
    ref: frame.ref,
    ...(frame.join_ref !== undefined && { join_ref: frame.join_ref }),
  });
}

/**
 * Reply payload of a `phx_reply` frame, or undefined when malformed.
 */
export function readReply(frame: Frame): ReplyPayload | undefined {
  const result = ReplyPayloadSchema.safeParse(frame.payload);
  return result.success ? result.data : undefined;
}

/**
 * Monotonic ref generator, one per socket.
 */
export function createRefCounter(): () => string {
  let ref = 0;
  return () => {
    ref = ref + 1;
    return String(ref);
  };
}
