export { events, eventStats } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, SqlConnection } from './client.js';
export { ensureSchema } from './migrate.js';
export { insertEvent, deleteEvents } from './event-repository.js';
export { queryEvents, findEventById } from './event-query-repository.js';
export type { EventQueryFilters } from './event-query-repository.js';
export { queryEventStats, pingDatabase } from './stats-repository.js';
export type { EventStoreStats, EventTypeCount } from './stats-repository.js';
export { default as dbPlugin } from './db-plugin.js';
