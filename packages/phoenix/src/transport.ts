// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Default transport over the `ws` package.
 */

import WebSocket from "ws";
import { TransportError } from "./errors.js";
import { DeliveryQueue, Receiver } from "./queue.js";
import type { Transport } from "./types.js";

export interface WebSocketTransportOptions {
  headers?: Record<string, string>;
  handshakeTimeoutMs?: number;
}

export function createWebSocketTransport(
  url: URL,
  opts: WebSocketTransportOptions = {},
): Transport {
  let ws: WebSocket | null = null;
  let opened = false;
  const inbound = new DeliveryQueue<string>();
  const receiver = new Receiver(inbound);
  let iterated = false;

  function toText(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) return data.toString("utf8");
    if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
    return Buffer.from(data).toString("utf8");
  }

  function open(): Promise<void> {
    if (ws) {
      return Promise.reject(new TransportError("Transport already opened"));
    }

    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(url, {
        headers: opts.headers,
        handshakeTimeout: opts.handshakeTimeoutMs,
      });
      ws = socket;

      socket.once("open", () => {
        opened = true;
        resolve();
      });

      socket.on("message", (data, isBinary) => {
        if (isBinary) return; // Serializer 1.0.0 is text only
        inbound.push(toText(data));
      });

      socket.on("error", (error) => {
        if (!opened) {
          reject(new TransportError("WebSocket handshake failed", { cause: error }));
          return;
        }
        inbound.fail(new TransportError("WebSocket error", { cause: error }));
      });

      socket.on("close", (code, reason) => {
        if (!opened) {
          reject(
            new TransportError(
              `WebSocket closed during handshake: ${code} ${reason.toString()}`,
            ),
          );
        }
        inbound.close();
      });
    });
  }

  function send(data: string): void {
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new TransportError("WebSocket is not open");
    }
    ws.send(data, (error) => {
      if (error) {
        inbound.fail(new TransportError("WebSocket send failed", { cause: error }));
      }
    });
  }

  function close(code = 1000, reason = ""): void {
    if (!ws) {
      inbound.close();
      return;
    }
    if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) {
      return;
    }
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
      return;
    }
    ws.close(code, reason);
  }

  function frames(): AsyncIterable<string> {
    if (iterated) {
      throw new TransportError("Transport frames can only be iterated once");
    }
    iterated = true;
    return receiver;
  }

  return { open, send, close, frames };
}
