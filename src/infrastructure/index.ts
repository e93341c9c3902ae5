export { redisPlugin } from './redis/index.js';
export { routerPlugin } from './router/index.js';
export {
  createDbClient,
  ensureSchema,
  insertEvent,
  deleteEvents,
  queryEvents,
  findEventById,
  queryEventStats,
  pingDatabase,
  events,
  eventStats,
  dbPlugin,
} from './db/index.js';
export type { Database, DbClient, SqlConnection, EventQueryFilters, EventStoreStats, EventTypeCount } from './db/index.js';
