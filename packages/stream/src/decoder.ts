// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Event decoding. Total over its input: bad or unknown payloads come back
 * as `undefined` or an `unrecognized` event, never as a thrown error.
 */

import type { ChannelMessage, Receiver } from "@nftstream/phoenix";
import type { z } from "zod";
import { isEventType } from "./events.js";
import {
  ItemCancelledSchema,
  ItemListedSchema,
  ItemMetadataUpdatedSchema,
  ItemReceivedBidSchema,
  ItemReceivedOfferSchema,
  ItemSoldSchema,
  ItemTransferredSchema,
  TimestampSchema,
  type StreamEvent,
} from "./schema.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseWith<S extends z.ZodType>(
  schema: S,
  value: unknown,
): z.output<S> | undefined {
  const result = schema.safeParse(value);
  return result.success ? result.data : undefined;
}

/**
 * Event type of a payload: the `event_type` tag, then a bare `type` tag,
 * then the event name the frame was pushed under.
 */
export function resolveEventType(
  payload: Record<string, unknown>,
  declaredKind?: string,
): string | undefined {
  if (typeof payload.event_type === "string") return payload.event_type;
  if (typeof payload.type === "string") return payload.type;
  return declaredKind || undefined;
}

/**
 * Decodes a feed payload `{ event_type, sent_at, payload }`.
 *
 * Returns undefined when the payload is not an object, carries no event
 * type, or is a known event type whose fields fail validation.
 */
export function decodeEvent(
  payload: unknown,
  declaredKind?: string,
): StreamEvent | undefined {
  if (!isRecord(payload)) return undefined;

  const eventType = resolveEventType(payload, declaredKind);
  if (eventType === undefined) return undefined;

  if (!isEventType(eventType)) {
    return { kind: "unrecognized", eventType, raw: payload };
  }

  const sentAt = parseWith(TimestampSchema, payload.sent_at);
  if (!sentAt) return undefined;

  const body = payload.payload;
  switch (eventType) {
    case "item_listed": {
      const data = parseWith(ItemListedSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
    case "item_sold": {
      const data = parseWith(ItemSoldSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
    case "item_transferred": {
      const data = parseWith(ItemTransferredSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
    case "item_metadata_updated": {
      const data = parseWith(ItemMetadataUpdatedSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
    case "item_cancelled": {
      const data = parseWith(ItemCancelledSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
    case "item_received_offer": {
      const data = parseWith(ItemReceivedOfferSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
    case "item_received_bid": {
      const data = parseWith(ItemReceivedBidSchema, body);
      return data && { kind: eventType, sentAt, payload: data };
    }
  }
}

/**
 * Decodes a channel message. Replies and channel errors are not feed
 * events and decode to undefined.
 */
export function decodeMessage(message: ChannelMessage): StreamEvent | undefined {
  if (message.kind !== "event") return undefined;
  return decodeEvent(message.payload, message.event);
}

export interface StreamEventsOptions {
  /** Called with every event message that did not decode. */
  onUndecodable?: (message: ChannelMessage) => void;
}

/**
 * Decoded events from a subscription receiver. Ends when the channel
 * closes; throws the channel's error when it fails.
 */
export async function* streamEvents(
  receiver: Receiver<ChannelMessage>,
  opts: StreamEventsOptions = {},
): AsyncGenerator<StreamEvent, void, undefined> {
  for await (const message of receiver) {
    if (message.kind !== "event") continue;
    const event = decodeMessage(message);
    if (event) {
      yield event;
    } else {
      opts.onUndecodable?.(message);
    }
  }
}
