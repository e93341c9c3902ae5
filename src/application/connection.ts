import type { Event } from '../domain/index.js';

/** Outcome of a single delivery attempt. */
export type DeliveryResult =
  | { ok: true }
  | { ok: false; reason: string };

export const DELIVERED: DeliveryResult = Object.freeze({ ok: true });

/**
 * Transport-side capability the router delivers through.
 *
 * The router never opens or closes connections. A `{ ok: false }` result
 * or a thrown error marks the subscription as dead.
 */
export interface ConnectionHandle {
  send(event: Event): DeliveryResult | Promise<DeliveryResult>;
}
