import type { Database, EventQueryFilters } from '../infrastructure/db/index.js';
import { queryEvents, findEventById, deleteEvents } from '../infrastructure/db/index.js';
import type { Event } from '../domain/index.js';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

export interface ListEventsParams {
  limit?: number | undefined;
  event_type?: string | undefined;
  session_id?: string | undefined;
  user_id?: string | undefined;
  since?: string | undefined;
}

/**
 * Use case: list persisted events, newest first.
 * Clamps limit to [1, 1000], defaults to 100. Empty filters are ignored.
 */
export async function listEvents(db: Database, params: ListEventsParams): Promise<Event[]> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);

  const filters: EventQueryFilters = {};
  if (params.event_type) filters.event_type = params.event_type;
  if (params.session_id) filters.session_id = params.session_id;
  if (params.user_id) filters.user_id = params.user_id;
  if (params.since) filters.since = params.since;

  return queryEvents(db, filters, limit);
}

/**
 * Use case: fetch a single event by ID.
 * Returns null if not found.
 */
export async function getEvent(db: Database, eventId: string): Promise<Event | null> {
  const event = await findEventById(db, eventId);
  return event ?? null;
}

/** Use case: admin purge. Everything when `before` is omitted. */
export async function clearEvents(db: Database, before?: string): Promise<{ deleted: number }> {
  const deleted = await deleteEvents(db, before);
  return { deleted };
}
