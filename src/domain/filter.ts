import type { Event } from './event.js';

/**
 * A subscriber's match criteria.
 *
 * Each dimension is optional; an absent, null or empty dimension imposes
 * no constraint. Filters are replaced wholesale, never patched.
 */
export interface SubscriptionFilter {
  readonly event_types?: readonly string[] | null | undefined;
  readonly session_id?: string | null | undefined;
  readonly user_id?: string | null | undefined;
}

/** Matches every event. */
export const MATCH_ALL: SubscriptionFilter = Object.freeze({});

/**
 * Pure predicate: does `event` satisfy every dimension set in `filter`?
 *
 * Dimensions are ANDed. Comparison is exact and case-sensitive.
 */
export function matchesFilter(event: Event, filter: SubscriptionFilter | null | undefined): boolean {
  if (!filter) return true;

  const { event_types, session_id, user_id } = filter;

  if (event_types && event_types.length > 0 && !event_types.includes(event.event_type)) {
    return false;
  }
  if (session_id && event.session_id !== session_id) {
    return false;
  }
  if (user_id && event.user_id !== user_id) {
    return false;
  }

  return true;
}
