export { createEventSchema, subscriptionFilterSchema, eventQuerySchema, deleteEventsQuerySchema } from './event-schema.js';
export type { EventInput, PayloadLimits, SubscriptionFilterInput, EventQueryInput } from './event-schema.js';
export { BoundedQueue } from './bounded-queue.js';
export { SubscriptionRegistry } from './subscription-registry.js';
export type { Subscription } from './subscription-registry.js';
export { DispatchLoop } from './dispatch-loop.js';
export type { DispatchCounters, DispatchOutcome } from './dispatch-loop.js';
export { EventRouter } from './event-router.js';
export type { EventRouterOptions, RouterStats } from './event-router.js';
export { DELIVERED } from './connection.js';
export type { ConnectionHandle, DeliveryResult } from './connection.js';
export { publishEvent } from './publish-event.js';
export type { PublishDeps, PublishResult } from './publish-event.js';
export { listEvents, getEvent, clearEvents } from './query-events.js';
export type { ListEventsParams } from './query-events.js';
export { getPipelineStats } from './stats.js';
export type { PipelineStats } from './stats.js';
