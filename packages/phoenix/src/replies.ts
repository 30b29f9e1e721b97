// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Push/reply correlation tracking for join and leave handshakes.
 */

import {
  ConnectionClosedError,
  ReplyError,
  TimeoutError,
} from "./errors.js";
import { readReply } from "./protocol.js";
import type { Frame } from "./types.js";

interface PendingReply {
  topic: string;
  resolve: (response: unknown) => void;
  reject: (err: Error) => void;
  timeoutHandle: ReturnType<typeof setTimeout>;
}

export class ReplyTracker {
  private pending = new Map<string, PendingReply>();

  /**
   * Calls `send`, then tracks the reply for `ref`. Replies are dispatched
   * asynchronously, so one cannot arrive before the registration. The
   * timeout starts once the push has been handed to the transport. If
   * `send` throws, nothing is tracked and the promise rejects with that
   * error.
   */
  register(
    ref: string,
    topic: string,
    timeoutMs: number,
    send: () => void,
  ): Promise<unknown> {
    return new Promise((resolve, reject) => {
      try {
        send();
      } catch (error) {
        reject(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      const timeoutHandle = setTimeout(() => {
        if (this.pending.delete(ref)) {
          reject(new TimeoutError(timeoutMs));
        }
      }, timeoutMs);

      this.pending.set(ref, { topic, resolve, reject, timeoutHandle });
    });
  }

  /**
   * Settles the pending reply correlated with a `phx_reply` frame.
   * Returns false when the frame matches nothing pending, so the caller
   * can route it elsewhere.
   */
  handleReply(frame: Frame): boolean {
    if (frame.ref === null) return false;

    const pending = this.pending.get(frame.ref);
    if (!pending || pending.topic !== frame.topic) {
      return false;
    }

    // First reply settles, later ones are routed as plain replies
    this.pending.delete(frame.ref);
    clearTimeout(pending.timeoutHandle);

    const reply = readReply(frame);
    if (!reply) {
      pending.reject(new ReplyError(frame.payload));
      return true;
    }

    if (reply.status === "ok") {
      pending.resolve(reply.response);
    } else {
      pending.reject(new ReplyError(reply.response));
    }
    return true;
  }

  /**
   * Rejects all pending replies (on disconnect).
   */
  rejectAll(): void {
    for (const [, pending] of Array.from(this.pending)) {
      clearTimeout(pending.timeoutHandle);
      pending.reject(new ConnectionClosedError());
    }
    this.pending.clear();
  }

  has(ref: string): boolean {
    return this.pending.has(ref);
  }

  get size(): number {
    return this.pending.size;
  }
}
