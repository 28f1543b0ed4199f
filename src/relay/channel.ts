/**
 * Bounded, single-consumer channel between a relay pump and its caller.
 *
 * Chunks are held in a buffer of `capacity` slots; a push beyond that waits until the
 * consumer pulls, which is how a slow caller slows the backend read. The close event
 * is stored outside the buffer so it can always be recorded, and is delivered after
 * every buffered chunk.
 */

import { RelayError } from "./errors.js";
import type { ChannelEvent, Chunk, CloseEvent } from "./types.js";

type PendingPush = {
  chunk: Chunk;
  resolve: (delivered: boolean) => void;
};

export type TaskChannelOptions = {
  capacity?: number;
  /** Called once when the consumer stops iterating before the channel was closed */
  onAbandon?: () => void;
};

export type CloseOptions = {
  /** Drop undelivered chunks; waiting pushes resolve as not delivered */
  discard?: boolean;
};

export class TaskChannel implements AsyncIterableIterator<ChannelEvent> {
  private readonly capacity: number;
  private readonly onAbandon: (() => void) | undefined;
  private readonly buffer: Chunk[] = [];
  private readonly pendingPushes: PendingPush[] = [];
  private closeEvent: CloseEvent | null = null;
  private done = false;
  private iterating = false;
  private waitingConsumer: ((result: IteratorResult<ChannelEvent>) => void) | null = null;

  constructor(options: TaskChannelOptions = {}) {
    this.capacity = options.capacity ?? 1;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RelayError("CONFIG_INVALID", "Channel capacity must be a positive integer", {
        capacity: this.capacity
      });
    }
    this.onAbandon = options.onAbandon;
  }

  get closed(): boolean {
    return this.closeEvent !== null || this.done;
  }

  /** Terminal event recorded by `close`, or null while open */
  get closedWith(): CloseEvent | null {
    return this.closeEvent;
  }

  /**
   * Offer a chunk. Resolves true once it is accepted into the buffer or handed to the
   * consumer, false if the channel closed (or was abandoned) first.
   */
  push(chunk: Chunk): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    if (this.waitingConsumer) {
      const consumer = this.waitingConsumer;
      this.waitingConsumer = null;
      consumer({ value: { type: "chunk", chunk }, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(chunk);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pendingPushes.push({ chunk, resolve });
    });
  }

  /**
   * Record the terminal event. Only the first close takes effect.
   * Returns false if the channel was already closed or abandoned.
   */
  close(event: CloseEvent, options: CloseOptions = {}): boolean {
    if (this.closed) {
      return false;
    }
    this.closeEvent = event;

    if (options.discard) {
      this.buffer.length = 0;
      this.rejectPendingPushes();
    }

    if (this.waitingConsumer && this.buffer.length === 0 && this.pendingPushes.length === 0) {
      const consumer = this.waitingConsumer;
      this.waitingConsumer = null;
      this.done = true;
      consumer({ value: event, done: false });
    }
    return true;
  }

  next(): Promise<IteratorResult<ChannelEvent>> {
    if (this.waitingConsumer) {
      return Promise.reject(new RelayError("INTERNAL", "TaskChannel supports a single pending read"));
    }

    const buffered = this.buffer.shift();
    if (buffered) {
      this.refillFromPending();
      return Promise.resolve({ value: { type: "chunk", chunk: buffered }, done: false });
    }

    if (this.done) {
      return Promise.resolve({ value: undefined, done: true });
    }

    if (this.closeEvent) {
      this.done = true;
      return Promise.resolve({ value: this.closeEvent, done: false });
    }

    return new Promise<IteratorResult<ChannelEvent>>((resolve) => {
      this.waitingConsumer = resolve;
    });
  }

  /**
   * Consumer stopped early (`break` in a for-await loop). Counts as abandoning the task
   * when no close was recorded yet.
   */
  return(): Promise<IteratorResult<ChannelEvent>> {
    const abandoned = !this.closed;
    this.done = true;
    this.buffer.length = 0;
    this.rejectPendingPushes();
    if (this.waitingConsumer) {
      const consumer = this.waitingConsumer;
      this.waitingConsumer = null;
      consumer({ value: undefined, done: true });
    }
    if (abandoned) {
      this.onAbandon?.();
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ChannelEvent> {
    if (this.iterating) {
      throw new RelayError("INTERNAL", "TaskChannel can only be consumed once");
    }
    this.iterating = true;
    return this;
  }

  private refillFromPending(): void {
    const pending = this.pendingPushes.shift();
    if (pending) {
      this.buffer.push(pending.chunk);
      pending.resolve(true);
    }
  }

  private rejectPendingPushes(): void {
    const pending = this.pendingPushes.splice(0, this.pendingPushes.length);
    for (const entry of pending) {
      entry.resolve(false);
    }
  }
}

/**
 * Drain a channel into an array; convenience for tests and the non-streaming HTTP path.
 */
export async function collect(channel: AsyncIterable<ChannelEvent>): Promise<ChannelEvent[]> {
  const events: ChannelEvent[] = [];
  for await (const event of channel) {
    events.push(event);
  }
  return events;
}
