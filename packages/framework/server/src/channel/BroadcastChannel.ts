/**
 * @fileoverview One-to-many event fan-out.
 *
 * Every consumer owns a private unbounded queue. Publishing copies the event
 * into every queue registered at that moment; nothing is replayed to
 * consumers registered later.
 */

import { InvariantViolation } from '@matchhall/framework-protocol';

/**
 * A registered consumer. Iterate it with `for await`; leaving the loop
 * early (break, return or throw) deregisters it.
 */
export interface ChannelConsumer<T extends NonNullable<unknown>> extends AsyncIterableIterator<T> {
  readonly id: number;
  /** Events published but not yet taken */
  readonly backlog: number;
  /** True once deregistered */
  readonly closed: boolean;
}

export interface BroadcastChannelOptions {
  /** Label used in diagnostics */
  readonly name?: string;
  /** Called each time the last registered consumer deregisters */
  readonly onIdle?: () => void;
}

class ConsumerQueue<T extends NonNullable<unknown>> implements ChannelConsumer<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private isClosed = false;

  constructor(
    readonly id: number,
    private readonly onReturn: (consumer: ConsumerQueue<T>) => void
  ) {}

  get backlog(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(event: T): void {
    if (this.isClosed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: event, done: false });
      return;
    }
    this.buffer.push(event);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.buffer.length = 0;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const event = this.buffer.shift();
    if (event !== undefined) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      throw new InvariantViolation(`consumer ${this.id} already has a pending read`);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.onReturn(this);
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

/**
 * Fan-out channel shared by all sessions of one lobby or one match.
 *
 * @example
 * ```typescript
 * const channel = new BroadcastChannel<MatchEvent>({ name: 'match-1' });
 * await channel.consume(async (event) => {
 *   if (event.type === 'game_over') return false; // stop consuming
 *   await rerender();
 * });
 * ```
 */
export class BroadcastChannel<T extends NonNullable<unknown>> {
  private readonly consumers = new Set<ConsumerQueue<T>>();
  private nextConsumerId = 1;
  private published = 0;

  constructor(private readonly options: BroadcastChannelOptions = {}) {}

  get name(): string {
    return this.options.name ?? 'channel';
  }

  /** Number of registered consumers */
  get size(): number {
    return this.consumers.size;
  }

  /** Number of events published so far */
  get publishedCount(): number {
    return this.published;
  }

  /**
   * Register a consumer that receives every subsequent publish.
   */
  register(): ChannelConsumer<T> {
    const consumer = new ConsumerQueue<T>(this.nextConsumerId++, (c) => this.deregister(c));
    this.consumers.add(consumer);
    return consumer;
  }

  /**
   * Remove a consumer. Undelivered events are dropped and a pending read
   * completes. Idempotent, and safe from within the consumer's own loop.
   * @returns true if the consumer was registered
   */
  deregister(consumer: ChannelConsumer<T>): boolean {
    const queue = [...this.consumers].find((c) => c === consumer);
    if (!queue) return false;

    this.consumers.delete(queue);
    queue.close();

    if (this.consumers.size === 0) {
      this.options.onIdle?.();
    }
    return true;
  }

  /**
   * Copy an event into every registered queue without waiting.
   * @returns Number of consumers the event was delivered to
   */
  publish(event: T): number {
    this.published++;
    for (const consumer of this.consumers) {
      consumer.push(event);
    }
    return this.consumers.size;
  }

  /**
   * Scoped consumption: register, hand every event to the handler until it
   * returns false or the consumer is deregistered, and deregister on every
   * exit path including a throwing handler.
   */
  async consume(
    // biome-ignore lint/suspicious/noConfusingVoidType: handlers may return nothing to keep consuming
    handler: (event: T, consumer: ChannelConsumer<T>) => Promise<boolean | void> | boolean | void
  ): Promise<void> {
    const consumer = this.register();
    try {
      for (;;) {
        const result = await consumer.next();
        if (result.done) return;
        if ((await handler(result.value, consumer)) === false) return;
      }
    } finally {
      this.deregister(consumer);
    }
  }
}
