import { lt, sql } from 'drizzle-orm';
import type { Event } from '../../domain/index.js';
import type { Database } from './client.js';
import { events, eventStats } from './schema.js';

/**
 * Persists an event and bumps its per-type counter in one transaction.
 */
export async function insertEvent(db: Database, event: Event): Promise<void> {
  const timestamp = new Date(event.timestamp);

  await db.transaction(async (tx) => {
    await tx.insert(events).values({
      id: event.id,
      event_type: event.event_type,
      source: event.source,
      session_id: event.session_id,
      user_id: event.user_id,
      payload: event.payload,
      timestamp,
    });

    await tx
      .insert(eventStats)
      .values({ event_type: event.event_type, count: 1, last_seen: timestamp })
      .onConflictDoUpdate({
        target: eventStats.event_type,
        set: {
          count: sql`${eventStats.count} + 1`,
          last_seen: sql`excluded.last_seen`,
        },
      });
  });
}

/**
 * Deletes events older than `before`, or everything (including the
 * per-type counters) when `before` is omitted.
 *
 * @returns number of deleted events
 */
export async function deleteEvents(db: Database, before?: string): Promise<number> {
  if (before !== undefined) {
    const rows = await db
      .delete(events)
      .where(lt(events.timestamp, new Date(before)))
      .returning({ id: events.id });
    return rows.length;
  }

  return db.transaction(async (tx) => {
    const rows = await tx.delete(events).returning({ id: events.id });
    await tx.delete(eventStats);
    return rows.length;
  });
}
