import type { BaseLogger } from 'pino';
import { matchesFilter } from '../domain/index.js';
import type { Event } from '../domain/index.js';
import type { BoundedQueue } from './bounded-queue.js';
import type { SubscriptionRegistry, Subscription } from './subscription-registry.js';

/** Cumulative delivery counters. */
export interface DispatchCounters {
  dispatched: number;
  delivered: number;
  failed: number;
  faults: number;
}

/** Result of routing one event. */
export interface DispatchOutcome {
  matched: number;
  delivered: number;
  removed: string[];
}

/**
 * The single consumer that drains the event queue.
 *
 * Per event:
 *   1. snapshot the registry
 *   2. evaluate every subscription's filter
 *   3. deliver to all matches (concurrently across subscribers; a given
 *      connection only ever has one send in flight from here)
 *   4. remove every subscription whose delivery failed
 *
 * Delivery failures are routine and never retried. Any other error while
 * handling an event is logged and the loop moves on to the next one.
 */
export class DispatchLoop {
  private running: Promise<void> | null = null;
  private readonly counters: DispatchCounters = {
    dispatched: 0,
    delivered: 0,
    failed: 0,
    faults: 0,
  };

  constructor(
    private readonly queue: BoundedQueue<Event>,
    private readonly registry: SubscriptionRegistry,
    private readonly log: BaseLogger,
  ) {}

  get isRunning(): boolean {
    return this.running !== null;
  }

  get stats(): Readonly<DispatchCounters> {
    return { ...this.counters };
  }

  start(): void {
    if (this.running) return;
    this.running = this.run();
  }

  /**
   * Closes the queue (dropping anything still buffered) and waits for the
   * in-flight event, if any, to finish. No-op when never started.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    const dropped = this.queue.close();
    if (dropped > 0) {
      this.log.info({ dropped }, 'Dropped queued events on shutdown');
    }

    await this.running;
    this.running = null;
  }

  /** Routes one event to every matching subscription. */
  async dispatch(event: Event): Promise<DispatchOutcome> {
    const targets = this.registry
      .snapshot()
      .filter((subscription) => matchesFilter(event, subscription.filter));

    const results = await Promise.all(
      targets.map((subscription) => this.deliver(subscription, event)),
    );

    const removed: string[] = [];
    targets.forEach((subscription, i) => {
      if (results[i]) return;
      if (this.registry.remove(subscription.id, subscription.connection)) {
        removed.push(subscription.id);
      }
    });

    const delivered = results.filter(Boolean).length;
    this.counters.dispatched++;
    this.counters.delivered += delivered;
    this.counters.failed += targets.length - delivered;

    if (removed.length > 0) {
      this.log.info(
        { event_id: event.id, removed, activeSubscribers: this.registry.count },
        'Removed subscribers after failed delivery',
      );
    }

    return { matched: targets.length, delivered, removed };
  }

  private async run(): Promise<void> {
    this.log.info('Dispatch loop started');

    for (;;) {
      const event = await this.queue.dequeue();
      if (event === undefined) break;

      try {
        await this.dispatch(event);
      } catch (err: unknown) {
        this.counters.faults++;
        this.log.error({ err, event_id: event.id }, 'Error dispatching event');
      }
    }

    this.log.info('Dispatch loop stopped');
  }

  private async deliver(subscription: Subscription, event: Event): Promise<boolean> {
    try {
      const result = await subscription.connection.send(event);
      if (result.ok) return true;

      this.log.warn(
        { subscriber_id: subscription.id, event_id: event.id, reason: result.reason },
        'Delivery failed',
      );
      return false;
    } catch (err: unknown) {
      this.log.warn(
        { err, subscriber_id: subscription.id, event_id: event.id },
        'Delivery failed',
      );
      return false;
    }
  }
}
