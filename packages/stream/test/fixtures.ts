// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Wire-shaped feed payloads for decoder tests.
 */

export const CONTRACT = `0x${"AB".repeat(20)}`;
export const MAKER = `0x${"1c".repeat(20)}`;
export const TAKER = `0x${"2D".repeat(20)}`;
export const ZERO_ADDRESS = `0x${"00".repeat(20)}`;
export const TX_HASH = `0x${"EF".repeat(32)}`;

export const SENT_AT = "2022-10-01T12:00:01.000Z";
export const EVENT_AT = "2022-10-01T12:00:00.000Z";

export function wireItem(tokenId = "42") {
  return {
    nft_id: `ethereum/${CONTRACT}/${tokenId}`,
    permalink: `https://example.com/assets/ethereum/${CONTRACT}/${tokenId}`,
    chain: { name: "ethereum" },
    metadata: {
      name: `Wanderer #${tokenId}`,
      description: null,
      image_url: `https://example.com/img/${tokenId}.png`,
      animation_url: null,
      metadata_url: null,
    },
  };
}

export const wirePaymentToken = {
  address: ZERO_ADDRESS,
  decimals: 18,
  eth_price: "1.000000000000000",
  name: "Ether",
  symbol: "ETH",
  usd_price: "1650.25",
};

export const wireTransaction = { hash: TX_HASH, timestamp: EVENT_AT };

export function wireContext() {
  return { collection: { slug: "wandernauts" }, item: wireItem() };
}

export function envelope(eventType: string, payload: unknown) {
  return { event_type: eventType, sent_at: SENT_AT, payload };
}

export function wireListing() {
  return {
    ...wireContext(),
    event_timestamp: EVENT_AT,
    base_price: "1000000000000000000",
    expiration_date: "2022-11-01T00:00:00+00:00",
    is_private: false,
    listing_date: EVENT_AT,
    listing_type: null,
    maker: { address: MAKER },
    payment_token: wirePaymentToken,
    quantity: 1,
    taker: null,
  };
}

export function wireOffer() {
  return {
    ...wireContext(),
    event_timestamp: EVENT_AT,
    base_price: "250000000000000000",
    created_date: EVENT_AT,
    expiration_date: "2022-10-08T12:00:00+00:00",
    maker: { address: MAKER },
    payment_token: wirePaymentToken,
    quantity: 2,
    taker: { address: TAKER },
  };
}
