import { randomUUID } from 'node:crypto';

/**
 * Core domain types for the event model.
 *
 * These types define the canonical shape of an event as it flows
 * from ingestion through storage and live routing. They carry no
 * framework dependencies.
 */

/** Free-form key/value payload attached to every event. Never interpreted by the router. */
export type EventPayload = Record<string, unknown>;

/**
 * Canonical Event entity.
 *
 * Immutable once created: the router reads it for filter matching and
 * forwards it unchanged to subscribers.
 */
export interface Event {
  readonly id: string;
  readonly event_type: string;
  readonly source: string;
  readonly session_id: string | null;
  readonly user_id: string | null;
  readonly payload: EventPayload;
  readonly timestamp: string; // ISO-8601, UTC
}

/** Fields supplied by a publisher; id and timestamp are assigned at ingestion. */
export interface NewEvent {
  event_type: string;
  source: string;
  session_id?: string | null | undefined;
  user_id?: string | null | undefined;
  payload?: EventPayload | undefined;
}

/** `evt_` followed by 12 lowercase hex characters. */
export function generateEventId(): string {
  return `evt_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Builds a frozen Event from validated publisher input.
 * `now` is injectable for deterministic tests.
 */
export function createEvent(input: NewEvent, now: Date = new Date()): Event {
  return Object.freeze({
    id: generateEventId(),
    event_type: input.event_type,
    source: input.source,
    session_id: input.session_id ?? null,
    user_id: input.user_id ?? null,
    payload: input.payload ?? {},
    timestamp: now.toISOString(),
  });
}
