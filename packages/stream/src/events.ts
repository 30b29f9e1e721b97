// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export const EVENT_TYPES = [
  "item_listed",
  "item_sold",
  "item_transferred",
  "item_metadata_updated",
  "item_cancelled",
  "item_received_offer",
  "item_received_bid",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

const known: ReadonlySet<string> = new Set(EVENT_TYPES);

export function isEventType(value: string): value is EventType {
  return known.has(value);
}

/**
 * Wire names of the chains an item can live on. Polygon goes by `matic`.
 */
export const CHAINS = [
  "ethereum",
  "matic",
  "klaytn",
  "solana",
  "rinkeby",
  "mumbai",
  "baobab",
] as const;

export type Chain = (typeof CHAINS)[number];
