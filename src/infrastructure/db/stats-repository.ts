import { count, desc, gt, sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { events, eventStats } from './schema.js';

export interface EventTypeCount {
  event_type: string;
  count: number;
  last_seen: string | null;
}

export interface EventStoreStats {
  total_events: number;
  events_last_hour: number;
  by_type: EventTypeCount[];
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Aggregate view over the store: totals plus the per-type counters,
 * busiest type first.
 */
export async function queryEventStats(db: Database, now: Date = new Date()): Promise<EventStoreStats> {
  const [total] = await db.select({ value: count() }).from(events);

  const [lastHour] = await db
    .select({ value: count() })
    .from(events)
    .where(gt(events.timestamp, new Date(now.getTime() - HOUR_MS)));

  const byType = await db
    .select()
    .from(eventStats)
    .orderBy(desc(eventStats.count), eventStats.event_type);

  return {
    total_events: Number(total?.value ?? 0),
    events_last_hour: Number(lastHour?.value ?? 0),
    by_type: byType.map((row) => ({
      event_type: row.event_type,
      count: row.count,
      last_seen: row.last_seen ? row.last_seen.toISOString() : null,
    })),
  };
}

/** Round-trips a trivial query; throws when the database is unreachable. */
export async function pingDatabase(db: Database): Promise<void> {
  await db.execute(sql`select 1`);
}
