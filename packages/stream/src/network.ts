// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Stream endpoints. Mainnet carries ethereum, matic, klaytn and solana
 * events; testnet carries the test chains.
 */
export type Network = "mainnet" | "testnet";

export const NETWORK_URLS: Readonly<Record<Network, string>> = {
  mainnet: "wss://stream.openseabeta.com/socket/websocket",
  testnet: "wss://testnets-stream.openseabeta.com/socket/websocket",
};

export function isNetwork(value: string): value is Network {
  return value === "mainnet" || value === "testnet";
}

export function networkUrl(network: Network): URL {
  return new URL(NETWORK_URLS[network]);
}
