// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Prints listings and sales of one collection until interrupted.
 *
 * Usage: STREAM_TOKEN=... tsx examples/listings.ts [slug]
 */

import { createLogger } from "@nftstream/phoenix";
import {
  collection,
  createStreamClient,
  streamEvents,
  subscribeTo,
} from "@nftstream/stream";

const token = process.env.STREAM_TOKEN;
if (!token) {
  throw new Error("STREAM_TOKEN is not set");
}

const socket = await createStreamClient("mainnet", token, {
  logger: createLogger({ minLevel: "info" }),
});

socket.onError((error, context) => {
  console.error(`[${context.type}]`, error.message);
});

const { handle, receiver } = await subscribeTo(
  socket,
  collection(process.argv[2] ?? "wandernauts"),
);

process.once("SIGINT", () => {
  handle
    .close()
    .then(() => socket.disconnect())
    .catch((error: unknown) => console.error("Shutdown failed", error));
});

for await (const event of streamEvents(receiver)) {
  switch (event.kind) {
    case "item_listed":
      console.log(
        `listed #${event.payload.item.nftId.tokenId} for ${event.payload.basePrice} (${event.payload.paymentToken.symbol})`,
      );
      break;
    case "item_sold":
      console.log(
        `sold #${event.payload.item.nftId.tokenId} for ${event.payload.salePrice} to ${event.payload.taker}`,
      );
      break;
    default:
      break;
  }
}
