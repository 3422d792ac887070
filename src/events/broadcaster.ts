import type { KeepaliveEvent } from '../types';

export interface BroadcasterOptions {
  maxQueueSize: number;
  keepaliveMs: number;
  historySize?: number;
}

export interface SubscribeOptions {
  replay?: boolean;
}

type Delivery<E> = IteratorResult<E | KeepaliveEvent, undefined>;

/**
 * One subscriber's bounded queue. A full queue drops its oldest event, and a
 * consumer left waiting longer than the keepalive interval receives a
 * synthetic keepalive.
 */
export class Subscription<E> implements AsyncIterable<E | KeepaliveEvent> {
  private readonly queue: E[] = [];
  private waiter: ((delivery: Delivery<E>) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly maxQueueSize: number,
    private readonly keepaliveMs: number,
    readonly filter: (event: E) => boolean = () => true,
    private readonly onClose: (subscription: Subscription<E>) => void = () => undefined
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  deliver(event: E): void {
    if (this.closed) return;
    if (this.waiter) {
      this.waiter({ value: event, done: false });
      return;
    }
    this.queue.push(event);
    if (this.queue.length > this.maxQueueSize) {
      this.queue.shift();
      this.droppedCount++;
    }
  }

  next(): Promise<Delivery<E>> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve({ value: queued, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ value: { type: 'keepalive', at: new Date().toISOString() }, done: false });
      }, this.keepaliveMs);
      this.waiter = (delivery) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(delivery);
      };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    if (this.waiter) this.waiter({ value: undefined, done: true });
    this.onClose(this);
  }

  async return(): Promise<Delivery<E>> {
    this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterator<E | KeepaliveEvent, undefined> {
    return this;
  }
}

export class EventBroadcaster<E> {
  private readonly subscribers = new Set<Subscription<E>>();
  private readonly recent: E[] = [];

  constructor(private readonly options: BroadcasterOptions) {}

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /** With `replay`, the retained history that passes the filter is queued first. */
  subscribe(filter?: (event: E) => boolean, options: SubscribeOptions = {}): Subscription<E> {
    const subscription = new Subscription<E>(
      this.options.maxQueueSize,
      this.options.keepaliveMs,
      filter,
      (sub) => this.subscribers.delete(sub)
    );
    if (options.replay) {
      for (const event of this.recent) {
        if (subscription.filter(event)) subscription.deliver(event);
      }
    }
    this.subscribers.add(subscription);
    return subscription;
  }

  unsubscribe(subscription: Subscription<E>): boolean {
    const known = this.subscribers.has(subscription);
    subscription.close();
    return known;
  }

  /** Never blocks; slow subscribers lose their oldest queued events. */
  publish(event: E): void {
    const historySize = this.options.historySize ?? 0;
    if (historySize > 0) {
      this.recent.push(event);
      if (this.recent.length > historySize) this.recent.shift();
    }

    for (const subscription of [...this.subscribers]) {
      if (subscription.filter(event)) subscription.deliver(event);
    }
  }

  history(limit?: number): E[] {
    if (limit === undefined) return [...this.recent];
    return limit > 0 ? this.recent.slice(-limit) : [];
  }

  close(): void {
    for (const subscription of [...this.subscribers]) {
      subscription.close();
    }
  }
}
