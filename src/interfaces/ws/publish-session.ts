import type { WebSocket, RawData } from 'ws';
import type { BaseLogger } from 'pino';
import type { EventRouter } from '../../application/event-router.js';
import type { createEventSchema } from '../../application/event-schema.js';
import { publishEvent } from '../../application/publish-event.js';
import type { Database } from '../../infrastructure/db/index.js';
import { describeIssues, parseJson, sendMessage, toBuffer } from './messages.js';

/** Messages accepted while earlier ones are still being stored. */
export const MAX_PENDING_MESSAGES = 32;

export interface PublishSessionOptions {
  socket: WebSocket;
  router: EventRouter;
  db: Database;
  log: BaseLogger;
  eventSchema: ReturnType<typeof createEventSchema>;
  maxMessageBytes: number;
}

/**
 * One `/ws/publish` connection: every text message is an event body.
 *
 * Messages are handled strictly in arrival order so events from one
 * publisher reach the router in the order they were sent. Reading is
 * paused while a message is in flight; frames `ws` had already buffered
 * still arrive, and past `MAX_PENDING_MESSAGES` they are refused.
 */
export class PublishSession {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly options: PublishSessionOptions) {}

  start(): void {
    this.options.socket.on('message', (data: RawData) => {
      this.accept(data);
    });
  }

  private accept(data: RawData): void {
    const { socket, log } = this.options;

    if (this.pending >= MAX_PENDING_MESSAGES) {
      sendMessage(socket, { status: 'error', message: 'Too many pending messages' });
      return;
    }

    this.pending++;
    socket.pause();

    this.tail = this.tail
      .then(() => this.onMessage(data))
      .catch((err: unknown) => {
        log.error({ err }, 'WebSocket publish error');
      })
      .finally(() => {
        this.pending--;
        if (this.pending === 0) socket.resume();
      });
  }

  private async onMessage(data: RawData): Promise<void> {
    const { socket, log } = this.options;
    const raw = toBuffer(data);

    if (raw.length > this.options.maxMessageBytes) {
      sendMessage(socket, { status: 'error', message: 'Message too large' });
      return;
    }

    const json = parseJson(raw.toString('utf-8'));
    if (json === undefined) {
      sendMessage(socket, { status: 'error', message: 'Invalid JSON' });
      return;
    }

    const parsed = this.options.eventSchema.safeParse(json);
    if (!parsed.success) {
      sendMessage(socket, { status: 'error', message: describeIssues(parsed.error.issues) });
      return;
    }

    try {
      const { event, routed } = await publishEvent(
        { db: this.options.db, router: this.options.router, log },
        parsed.data,
      );
      sendMessage(socket, { status: 'ok', event_id: event.id, routed });
    } catch (err: unknown) {
      log.error({ err }, 'WebSocket publish error');
      sendMessage(socket, { status: 'error', message: 'Internal error' });
    }
  }
}
