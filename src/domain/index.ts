export type { Event, EventPayload, NewEvent } from './event.js';
export { createEvent, generateEventId } from './event.js';
export { EVENT_TYPES, EVENT_TYPE_NAMES, isKnownEventType } from './event-types.js';
export type { EventType } from './event-types.js';
export { matchesFilter, MATCH_ALL } from './filter.js';
export type { SubscriptionFilter } from './filter.js';
