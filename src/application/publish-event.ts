import type { BaseLogger } from 'pino';
import { createEvent } from '../domain/index.js';
import type { Event, NewEvent } from '../domain/index.js';
import type { Database } from '../infrastructure/db/index.js';
import { insertEvent } from '../infrastructure/db/index.js';
import type { EventRouter } from './event-router.js';

export interface PublishDeps {
  db: Database;
  router: EventRouter;
  log: BaseLogger;
}

export interface PublishResult {
  event: Event;
  /** Whether the event entered the live-routing path. */
  routed: boolean;
}

/**
 * Use case: ingest one validated event.
 *
 * Order: assign id + timestamp → persist → hand to the router.
 * The durable write is the source of truth; a full router queue only
 * means live subscribers miss this event, so it is logged, not thrown.
 * A storage failure propagates and nothing is routed.
 */
export async function publishEvent(deps: PublishDeps, input: NewEvent): Promise<PublishResult> {
  const event = createEvent(input);

  await insertEvent(deps.db, event);

  const routed = deps.router.publish(event);
  if (!routed) {
    deps.log.warn({ event_id: event.id }, 'Event persisted but not routed live');
  }

  return { event, routed };
}
