/**
 * Event Broadcaster
 * Fan-out of pre-serialized events to any number of stream subscribers.
 * Each subscriber owns a queue; publishing never waits on a consumer.
 */

import { randomUUID } from "crypto";
import { createLogger } from "../logger";

export type ChannelMessage =
  | { kind: "event"; data: string }
  | { kind: "keepalive" }
  | { kind: "closed" };

const log = createLogger("Broadcaster");

const DEFAULT_MAX_QUEUE = 1024;

export class SubscriberClosedError extends Error {
  constructor(id: string) {
    super(`Subscriber ${id} is closed`);
    this.name = "SubscriberClosedError";
  }
}

/**
 * One live stream connection
 */
export class Subscriber {
  readonly id = randomUUID();
  private queue: string[] = [];
  private waiter: ((msg: ChannelMessage) => void) | null = null;
  private isClosed = false;
  public dropped = 0;

  constructor(private maxQueue = DEFAULT_MAX_QUEUE) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Hand a serialized event to this subscriber
   * @throws SubscriberClosedError after close()
   */
  enqueue(data: string): void {
    if (this.isClosed) {
      throw new SubscriberClosedError(this.id);
    }

    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver({ kind: "event", data });
      return;
    }

    this.queue.push(data);
    // Stalled consumer: keep the newest events
    if (this.queue.length > this.maxQueue) {
      this.queue.shift();
      this.dropped++;
    }
  }

  /**
   * Next queued event, or a keepalive if nothing arrives within timeoutMs
   */
  receive(timeoutMs: number): Promise<ChannelMessage> {
    const data = this.queue.shift();
    if (data !== undefined) {
      return Promise.resolve({ kind: "event", data });
    }
    if (this.isClosed) {
      return Promise.resolve({ kind: "closed" });
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Subscriber ${this.id} already has a pending receive`));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: "keepalive" });
      }, timeoutMs);

      this.waiter = (msg) => {
        clearTimeout(timer);
        resolve(msg);
      };
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.queue = [];

    const deliver = this.waiter;
    this.waiter = null;
    deliver?.({ kind: "closed" });
  }
}

export interface BroadcasterOptions {
  maxQueue?: number;
}

export class EventBroadcaster {
  private subscribers: Set<Subscriber> = new Set();
  private maxQueue: number;

  constructor(options: BroadcasterOptions = {}) {
    this.maxQueue = options.maxQueue ?? DEFAULT_MAX_QUEUE;
  }

  /**
   * Register a subscriber. `initial` is queued ahead of anything published
   * afterwards.
   */
  subscribe(initial: readonly string[] = []): Subscriber {
    const subscriber = new Subscriber(this.maxQueue);
    for (const data of initial) {
      subscriber.enqueue(data);
    }
    this.subscribers.add(subscriber);
    log.debug(`Subscriber ${subscriber.id} added (${this.subscribers.size} total)`);
    return subscriber;
  }

  /**
   * Remove and close a subscriber. Safe to call more than once.
   * @returns true if it was registered
   */
  unsubscribe(subscriber: Subscriber): boolean {
    const removed = this.subscribers.delete(subscriber);
    subscriber.close();
    if (removed) {
      log.debug(`Subscriber ${subscriber.id} removed (${this.subscribers.size} left)`);
    }
    return removed;
  }

  /**
   * Serialize once and enqueue to every subscriber
   * @returns number of subscribers the event reached
   */
  publish(eventType: string, payload: Record<string, unknown>): number {
    const data = JSON.stringify({ type: eventType, ...payload });
    let delivered = 0;

    for (const subscriber of [...this.subscribers]) {
      if (subscriber.closed) {
        this.subscribers.delete(subscriber);
        continue;
      }
      try {
        subscriber.enqueue(data);
        delivered++;
      } catch (err) {
        log.debug(`Dropping subscriber ${subscriber.id}:`, err);
        this.subscribers.delete(subscriber);
      }
    }

    return delivered;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  closeAll(): void {
    for (const subscriber of [...this.subscribers]) {
      this.unsubscribe(subscriber);
    }
  }
}

/**
 * text/event-stream framing
 */
export function sseFrame(data: string): string {
  return `data: ${data}\n\n`;
}

export const SSE_KEEPALIVE = ": keepalive\n\n";
