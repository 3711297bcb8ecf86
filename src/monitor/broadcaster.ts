import type { Logger } from "../logging/logger.js";

/**
 * A long-lived subscription. Iterate it with `for await`; breaking out of the
 * loop detaches it, as does {@link Subscription.unsubscribe}.
 */
export interface Subscription<T> extends AsyncIterable<T> {
  readonly id: number;
  readonly closed: boolean;
  /** States dropped because this subscriber fell more than a full buffer behind. */
  readonly dropped: number;
  next(): Promise<IteratorResult<T, undefined>>;
  unsubscribe(): void;
}

export type StateListener<T> = (value: T) => void;

export interface BroadcasterOptions {
  readonly bufferSize?: number;
  readonly logger?: Logger;
}

const DEFAULT_BUFFER_SIZE = 64;

class ChannelSubscription<T> implements Subscription<T>, AsyncIterator<T, undefined> {
  private readonly buffer: Array<{ readonly value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private isClosed = false;
  private droppedCount = 0;

  constructor(
    readonly id: number,
    private readonly capacity: number,
    private readonly detach: (id: number) => void,
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  deliver(value: T): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
      return;
    }

    this.buffer.push({ value });
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      return Promise.resolve({ done: false, value: entry.value });
    }
    if (this.isClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.unsubscribe();
    return { done: true, value: undefined };
  }

  unsubscribe(): void {
    this.detach(this.id);
    this.close();
  }

  /** Ends the subscription; values already buffered are still handed out. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return this;
  }
}

/**
 * Holds the current value and fans every published value out to all
 * subscribers. A new subscriber receives the current value first, then every
 * later publication in order.
 *
 * Delivery never blocks the publisher: listeners are called synchronously and
 * iterator subscribers get a bounded buffer that drops its oldest entries.
 */
export class StateBroadcaster<T> {
  private value: T;
  private nextId = 1;
  private readonly channels = new Map<number, ChannelSubscription<T>>();
  private readonly listeners = new Set<StateListener<T>>();
  private readonly bufferSize: number;
  private readonly logger: Logger | undefined;
  private isClosed = false;

  constructor(initial: T, options: BroadcasterOptions = {}) {
    this.value = initial;
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    this.logger = options.logger;
  }

  get current(): T {
    return this.value;
  }

  get subscriberCount(): number {
    return this.channels.size + this.listeners.size;
  }

  publish(value: T): void {
    this.value = value;
    for (const channel of [...this.channels.values()]) {
      channel.deliver(value);
    }
    for (const listener of [...this.listeners]) {
      this.notify(listener, value);
    }
  }

  subscribe(): Subscription<T> {
    const channel = new ChannelSubscription<T>(this.nextId++, this.bufferSize, (id) => {
      this.channels.delete(id);
    });
    if (this.isClosed) {
      channel.close();
      return channel;
    }
    channel.deliver(this.value);
    this.channels.set(channel.id, channel);
    return channel;
  }

  unsubscribe(subscription: Subscription<T>): void {
    subscription.unsubscribe();
  }

  /**
   * Callback form of {@link subscribe}. Returns the function that detaches it.
   * Once closed, the listener only receives the current value.
   */
  listen(listener: StateListener<T>): () => void {
    if (this.isClosed) {
      this.notify(listener, this.value);
      return () => {};
    }
    // A function registered twice would otherwise share one entry in the set.
    const wrapped: StateListener<T> = (value) => listener(value);
    this.listeners.add(wrapped);
    this.notify(wrapped, this.value);
    return () => {
      this.listeners.delete(wrapped);
    };
  }

  /**
   * Ends every subscription. Later publications still update {@link current};
   * subscriptions made afterwards are already ended.
   */
  close(): void {
    this.isClosed = true;
    for (const channel of [...this.channels.values()]) {
      channel.close();
    }
    this.channels.clear();
    this.listeners.clear();
  }

  private notify(listener: StateListener<T>, value: T): void {
    try {
      listener(value);
    } catch (err) {
      this.logger?.error({ err }, "State listener threw");
    }
  }
}
