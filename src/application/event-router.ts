import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';
import type { Event, SubscriptionFilter } from '../domain/index.js';
import { BoundedQueue } from './bounded-queue.js';
import { DispatchLoop } from './dispatch-loop.js';
import { SubscriptionRegistry } from './subscription-registry.js';
import type { ConnectionHandle } from './connection.js';

export interface EventRouterOptions {
  maxQueueSize: number;
  maxSubscribers: number;
  log: BaseLogger;
}

export interface RouterStats {
  active_subscribers: number;
  queue_size: number;
  events_published: number;
  events_dropped: number;
  events_delivered: number;
  delivery_failures: number;
  dispatch_faults: number;
}

/**
 * In-memory pub/sub router.
 *
 * Publishers enqueue without waiting; a single dispatch loop drains the
 * queue and fans each event out to matching subscribers. Live routing is
 * best-effort: an event rejected here is still durable if the caller
 * stored it first.
 */
export class EventRouter {
  private readonly queue: BoundedQueue<Event>;
  private readonly registry: SubscriptionRegistry;
  private readonly loop: DispatchLoop;
  private readonly log: BaseLogger;
  private published = 0;
  private dropped = 0;

  constructor(options: EventRouterOptions) {
    this.log = options.log;
    this.queue = new BoundedQueue<Event>(options.maxQueueSize);
    this.registry = new SubscriptionRegistry(options.maxSubscribers);
    this.loop = new DispatchLoop(this.queue, this.registry, this.log);
  }

  get isRunning(): boolean {
    return this.loop.isRunning;
  }

  /** A stopped router stays stopped; starting it again is refused. */
  start(): void {
    if (this.loop.isRunning) return;
    if (this.queue.isClosed) {
      this.log.warn('Event router already stopped, not restarting');
      return;
    }

    this.loop.start();
    this.log.info(
      { maxQueueSize: this.queue.capacity, maxSubscribers: this.registry.maxSubscribers },
      'Event router started',
    );
  }

  /** Safe without a prior `start()`. Queued events are dropped. */
  async stop(): Promise<void> {
    if (!this.loop.isRunning) return;
    await this.loop.stop();
    this.log.info('Event router stopped');
  }

  /** Returns an id not held by any active subscriber. */
  allocateSubscriberId(): string {
    let id: string;
    do {
      id = `sub_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
    } while (this.registry.has(id));
    return id;
  }

  subscribe(subscriberId: string, connection: ConnectionHandle, filter: SubscriptionFilter): boolean {
    if (this.registry.count >= this.registry.maxSubscribers) {
      this.log.warn({ subscriber_id: subscriberId }, 'Subscriber rejected (at capacity)');
      return false;
    }

    if (!this.registry.subscribe(subscriberId, connection, filter)) {
      this.log.warn({ subscriber_id: subscriberId }, 'Subscriber rejected (id already active)');
      return false;
    }

    this.log.info({ subscriber_id: subscriberId, filter }, 'Subscriber added');
    return true;
  }

  unsubscribe(subscriberId: string): void {
    if (this.registry.unsubscribe(subscriberId)) {
      this.log.info({ subscriber_id: subscriberId }, 'Subscriber removed');
    }
  }

  /** False when the subscriber is unknown. */
  updateFilter(subscriberId: string, filter: SubscriptionFilter): boolean {
    const updated = this.registry.updateFilter(subscriberId, filter);
    if (updated) {
      this.log.debug({ subscriber_id: subscriberId, filter }, 'Subscriber filter replaced');
    }
    return updated;
  }

  /** Non-blocking. False when the queue is full or the router has stopped. */
  publish(event: Event): boolean {
    if (!this.queue.enqueue(event)) {
      this.dropped++;
      this.log.warn(
        { event_id: event.id, queueSize: this.queue.size },
        this.queue.isClosed ? 'Event router stopped, dropping event' : 'Event queue full, dropping event',
      );
      return false;
    }

    this.published++;
    return true;
  }

  getStats(): RouterStats {
    const dispatch = this.loop.stats;
    return {
      active_subscribers: this.registry.count,
      queue_size: this.queue.size,
      events_published: this.published,
      events_dropped: this.dropped,
      events_delivered: dispatch.delivered,
      delivery_failures: dispatch.failed,
      dispatch_faults: dispatch.faults,
    };
  }
}
