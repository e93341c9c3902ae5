import type { Database, EventStoreStats } from '../infrastructure/db/index.js';
import { queryEventStats } from '../infrastructure/db/index.js';
import type { EventRouter, RouterStats } from './event-router.js';

export interface PipelineStats extends EventStoreStats {
  router: RouterStats;
}

/** Use case: store aggregates plus a live snapshot of the router. */
export async function getPipelineStats(db: Database, router: EventRouter): Promise<PipelineStats> {
  const stored = await queryEventStats(db);
  return { ...stored, router: router.getStats() };
}
