import { z } from 'zod';
import { EVENT_TYPE_NAMES, isKnownEventType } from '../domain/index.js';

export interface PayloadLimits {
  maxKeys: number;
  maxBytes: number;
}

/**
 * Zod schema for an inbound event body.
 *
 * - `id` and `timestamp` are never accepted from publishers; both are
 *   assigned at ingestion.
 * - `payload` stays open-ended but is bounded in key count and encoded size.
 */
export function createEventSchema(limits: PayloadLimits) {
  return z.object({
    event_type: z.string().refine(isKnownEventType, (value) => ({
      message: `Unknown event_type '${value}'. Must be one of: ${EVENT_TYPE_NAMES.join(', ')}`,
    })),
    source: z
      .string()
      .min(1)
      .max(100)
      .regex(/^[a-zA-Z0-9_\-.]+$/, 'source may only contain letters, digits, "_", "-" and "."'),
    session_id: z.string().max(200).nullish(),
    user_id: z.string().max(200).nullish(),
    payload: z
      .record(z.string(), z.unknown())
      .default({})
      .superRefine((payload, ctx) => {
        const keys = Object.keys(payload).length;
        if (keys > limits.maxKeys) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Payload has ${keys} keys (max ${limits.maxKeys})`,
          });
          return;
        }
        const bytes = Buffer.byteLength(JSON.stringify(payload), 'utf-8');
        if (bytes > limits.maxBytes) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Payload is ${bytes} bytes (max ${limits.maxBytes})`,
          });
        }
      }),
  });
}

export type EventInput = z.infer<ReturnType<typeof createEventSchema>>;

/**
 * Subscriber filter as sent over the wire. Unknown keys are dropped;
 * null and empty values mean "any".
 */
export const subscriptionFilterSchema = z.object({
  event_types: z.array(z.string().max(50)).max(100).nullish(),
  session_id: z.string().max(200).nullish(),
  user_id: z.string().max(200).nullish(),
});

export type SubscriptionFilterInput = z.infer<typeof subscriptionFilterSchema>;

const isoTimestamp = z
  .string()
  .max(40)
  .refine((value) => Number.isFinite(Date.parse(value)), {
    message: 'Must be a valid ISO-8601 timestamp',
  });

/** Querystring for the history endpoint. */
export const eventQuerySchema = z.object({
  event_type: z.string().max(50).optional(),
  session_id: z.string().max(200).optional(),
  user_id: z.string().max(200).optional(),
  since: isoTimestamp.optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type EventQueryInput = z.infer<typeof eventQuerySchema>;

/** Querystring for the admin purge endpoint. */
export const deleteEventsQuerySchema = z.object({
  before: isoTimestamp.optional(),
});
