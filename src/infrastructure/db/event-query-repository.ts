import { eq, and, gt, desc, type SQL } from 'drizzle-orm';
import type { Event } from '../../domain/index.js';
import type { Database } from './client.js';
import { events } from './schema.js';

export interface EventQueryFilters {
  event_type?: string;
  session_id?: string;
  user_id?: string;
  since?: string;   // ISO-8601, exclusive
}

type EventRow = typeof events.$inferSelect;

function toEvent(row: EventRow): Event {
  return {
    id: row.id,
    event_type: row.event_type,
    source: row.source,
    session_id: row.session_id,
    user_id: row.user_id,
    payload: row.payload,
    timestamp: row.timestamp.toISOString(),
  };
}

/**
 * Fetches the newest `limit` events matching every provided filter.
 * Only non-undefined filters contribute to the WHERE clause.
 */
export async function queryEvents(
  db: Database,
  filters: EventQueryFilters,
  limit: number,
): Promise<Event[]> {
  const conditions: SQL[] = [];

  if (filters.event_type !== undefined) {
    conditions.push(eq(events.event_type, filters.event_type));
  }
  if (filters.session_id !== undefined) {
    conditions.push(eq(events.session_id, filters.session_id));
  }
  if (filters.user_id !== undefined) {
    conditions.push(eq(events.user_id, filters.user_id));
  }
  if (filters.since !== undefined) {
    conditions.push(gt(events.timestamp, new Date(filters.since)));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  const rows = await db
    .select()
    .from(events)
    .where(whereClause)
    .orderBy(desc(events.timestamp))
    .limit(limit);

  return rows.map(toEvent);
}

/** Returns undefined if not found. */
export async function findEventById(db: Database, eventId: string): Promise<Event | undefined> {
  const rows = await db
    .select()
    .from(events)
    .where(eq(events.id, eventId))
    .limit(1);

  const row = rows[0];
  return row ? toEvent(row) : undefined;
}
