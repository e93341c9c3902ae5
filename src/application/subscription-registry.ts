import type { SubscriptionFilter } from '../domain/index.js';
import type { ConnectionHandle } from './connection.js';

export interface Subscription {
  readonly id: string;
  readonly connection: ConnectionHandle;
  readonly filter: SubscriptionFilter;
}

/**
 * Live subscriptions keyed by subscriber id, bounded by `maxSubscribers`.
 *
 * Entries are immutable; a filter update swaps in a new entry, so a
 * snapshot taken before the update keeps seeing the old filter.
 */
export class SubscriptionRegistry {
  private readonly subscriptions = new Map<string, Subscription>();

  constructor(readonly maxSubscribers: number) {
    if (!Number.isInteger(maxSubscribers) || maxSubscribers < 0) {
      throw new RangeError(`maxSubscribers must be a non-negative integer, got ${maxSubscribers}`);
    }
  }

  /** False when at capacity or when `id` is already active. Nothing changes in that case. */
  subscribe(id: string, connection: ConnectionHandle, filter: SubscriptionFilter): boolean {
    if (this.subscriptions.size >= this.maxSubscribers) return false;
    if (this.subscriptions.has(id)) return false;

    this.subscriptions.set(id, Object.freeze({ id, connection, filter }));
    return true;
  }

  /** Idempotent. Returns whether an entry was removed. */
  unsubscribe(id: string): boolean {
    return this.subscriptions.delete(id);
  }

  /**
   * Removes `id` only while it is still bound to `connection`, so a stale
   * failure cannot evict a newer subscriber that reused the id.
   */
  remove(id: string, connection: ConnectionHandle): boolean {
    const current = this.subscriptions.get(id);
    if (!current || current.connection !== connection) return false;
    return this.subscriptions.delete(id);
  }

  /** False when `id` is unknown. */
  updateFilter(id: string, filter: SubscriptionFilter): boolean {
    const current = this.subscriptions.get(id);
    if (!current) return false;

    this.subscriptions.set(id, Object.freeze({ ...current, filter }));
    return true;
  }

  has(id: string): boolean {
    return this.subscriptions.has(id);
  }

  get(id: string): Subscription | undefined {
    return this.subscriptions.get(id);
  }

  get count(): number {
    return this.subscriptions.size;
  }

  /** Copy of the current entries, safe to iterate across awaits. */
  snapshot(): Subscription[] {
    return Array.from(this.subscriptions.values());
  }
}
