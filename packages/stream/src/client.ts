// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Stream client: a Phoenix socket against the feed endpoint, authenticated
 * with an API token, plus collection subscriptions.
 */

import {
  connect,
  type JoinOptions,
  type PhoenixSocket,
  type SocketOptions,
  type Subscription,
} from "@nftstream/phoenix";
import { collectionTopic, type Collection } from "./collection.js";
import { isNetwork, networkUrl, type Network } from "./network.js";

export type StreamClientOptions = Omit<SocketOptions, "url" | "auth">;

/**
 * Connects to the feed. `target` is a network name or a full endpoint URL;
 * the token is sent as the `token` query parameter.
 */
export function createStreamClient(
  target: Network | string | URL,
  token: string,
  opts: StreamClientOptions = {},
): Promise<PhoenixSocket> {
  const url =
    typeof target === "string" && isNetwork(target) ? networkUrl(target) : target;

  return connect({
    ...opts,
    url,
    auth: { token, queryParam: "token" },
  });
}

/**
 * Subscribes to every event of a collection. Filtering by event type is
 * up to the caller.
 */
export function subscribeTo(
  socket: PhoenixSocket,
  target: Collection,
  opts?: JoinOptions,
): Promise<Subscription> {
  return socket.join(collectionTopic(target), opts);
}
