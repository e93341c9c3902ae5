import { pgTable, varchar, timestamp, jsonb, integer, index } from 'drizzle-orm/pg-core';
import type { EventPayload } from '../../domain/index.js';

/**
 * Drizzle schema for the `events` table.
 *
 * `id` is assigned at ingestion (`evt_` + 12 hex) and is the natural
 * primary key. Indexes cover every history-query filter.
 */
export const events = pgTable('events', {
  id: varchar('id', { length: 32 }).primaryKey(),
  event_type: varchar('event_type', { length: 64 }).notNull(),
  source: varchar('source', { length: 100 }).notNull(),
  session_id: varchar('session_id', { length: 200 }),
  user_id: varchar('user_id', { length: 200 }),
  payload: jsonb('payload').$type<EventPayload>().notNull().default({}),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_events_type').on(table.event_type),
  index('idx_events_session').on(table.session_id),
  index('idx_events_user').on(table.user_id),
  index('idx_events_timestamp').on(table.timestamp),
]);

/**
 * Running count per event type, maintained on insert.
 * Cleared only by a full purge.
 */
export const eventStats = pgTable('event_stats', {
  event_type: varchar('event_type', { length: 64 }).primaryKey(),
  count: integer('count').notNull().default(0),
  last_seen: timestamp('last_seen', { withTimezone: true }),
});
