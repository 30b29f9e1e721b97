// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Bounded async delivery queue and its receiver endpoint.
 *
 * Producers push synchronously; consumers await `next()`. Items go to the
 * longest-waiting consumer first, so several receivers over one queue split
 * the stream between them. Buffered items are drained before the terminal
 * signal (clean close or failure) is observed.
 */

export type OverflowPolicy = "drop-oldest" | "drop-newest";

export type PushResult =
  | "delivered" // Handed to a waiting consumer or buffered
  | "dropped-oldest" // Buffered, oldest buffered item evicted
  | "dropped-newest" // Buffer full, item discarded
  | "closed"; // Queue already terminated

interface Waiter<T> {
  owner: symbol;
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: Error) => void;
}

type Terminal = { kind: "closed" } | { kind: "failed"; error: Error };

export class DeliveryQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private terminal: Terminal | null = null;
  private consumers = new Set<symbol>();

  constructor(
    private readonly maxSize: number = Infinity,
    private readonly policy: OverflowPolicy = "drop-oldest",
  ) {}

  push(item: T): PushResult {
    if (this.terminal) return "closed";

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return "delivered";
    }

    if (this.items.length >= this.maxSize) {
      if (this.policy === "drop-newest") {
        return "dropped-newest";
      }
      this.items.shift();
      this.items.push(item);
      return "dropped-oldest";
    }

    this.items.push(item);
    return "delivered";
  }

  /**
   * Next item for the given consumer. Resolves `done` once the queue is
   * closed and drained; rejects with the failure once failed and drained.
   */
  next(owner: symbol): Promise<IteratorResult<T, undefined>> {
    if (!this.consumers.has(owner)) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.terminal?.kind === "closed") {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.terminal?.kind === "failed") {
      return Promise.reject(this.terminal.error);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ owner, resolve, reject });
    });
  }

  /**
   * Take a buffered item without waiting.
   */
  poll(): T | undefined {
    return this.items.shift();
  }

  attach(owner: symbol): void {
    this.consumers.add(owner);
  }

  /**
   * Detach a consumer; its pending `next()` calls resolve `done`.
   */
  detach(owner: symbol): void {
    this.consumers.delete(owner);
    const remaining: Waiter<T>[] = [];
    for (const waiter of this.waiters) {
      if (waiter.owner === owner) {
        waiter.resolve({ done: true, value: undefined });
      } else {
        remaining.push(waiter);
      }
    }
    this.waiters = remaining;
  }

  close(): void {
    if (this.terminal) return;
    this.terminal = { kind: "closed" };
    for (const waiter of this.drainWaiters()) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  fail(error: Error): void {
    if (this.terminal) return;
    this.terminal = { kind: "failed", error };
    for (const waiter of this.drainWaiters()) {
      waiter.reject(error);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get consumerCount(): number {
    return this.consumers.size;
  }

  get isTerminated(): boolean {
    return this.terminal !== null;
  }

  private drainWaiters(): Waiter<T>[] {
    const waiters = this.waiters;
    this.waiters = [];
    return waiters;
  }
}

/**
 * Consumer endpoint over a {@link DeliveryQueue}.
 *
 * `recv()` resolves `undefined` when the queue closed cleanly and rejects
 * with the failure when it errored. `drop()` detaches this receiver without
 * closing the queue.
 */
export class Receiver<T> implements AsyncIterable<T> {
  private readonly owner = Symbol("receiver");
  private dropped = false;

  constructor(private readonly queue: DeliveryQueue<T>) {
    queue.attach(this.owner);
  }

  async recv(): Promise<T | undefined> {
    const result = await this.queue.next(this.owner);
    return result.done ? undefined : result.value;
  }

  tryRecv(): T | undefined {
    if (this.dropped) return undefined;
    return this.queue.poll();
  }

  drop(): void {
    if (this.dropped) return;
    this.dropped = true;
    this.queue.detach(this.owner);
  }

  get isDropped(): boolean {
    return this.dropped;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.queue.next(this.owner);
      if (result.done) return;
      yield result.value;
    }
  }
}
