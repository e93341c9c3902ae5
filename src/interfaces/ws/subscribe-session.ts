import type { WebSocket, RawData } from 'ws';
import type { BaseLogger } from 'pino';
import type { EventRouter } from '../../application/event-router.js';
import { subscriptionFilterSchema } from '../../application/event-schema.js';
import type { SubscriptionFilter } from '../../domain/index.js';
import { SocketConnection } from './socket-connection.js';
import { clientMessageSchema, describeIssues, parseJson, sendMessage, toBuffer } from './messages.js';

/** Policy violation: bad or missing initial config. */
const CLOSE_POLICY = 1008;
/** Router at subscriber capacity. */
const CLOSE_TRY_AGAIN = 1013;

export interface SubscribeSessionOptions {
  socket: WebSocket;
  router: EventRouter;
  log: BaseLogger;
  maxMessageBytes: number;
  subscribeTimeoutMs: number;
  keepaliveIntervalMs: number;
}

/**
 * One `/ws/subscribe` connection.
 *
 * Waits for the filter configuration, registers with the router, then
 * answers pings, applies filter replacements and sends a keep-alive
 * message whenever the client has been quiet for a full interval.
 * Event delivery itself goes through the router's dispatch loop.
 */
export class SubscribeSession {
  private subscriberId: string | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  constructor(private readonly options: SubscribeSessionOptions) {}

  start(): void {
    const { socket } = this.options;

    socket.on('message', (data: RawData) => {
      this.onMessage(data);
    });
    socket.on('close', () => {
      this.onClose();
    });

    this.schedule(this.options.subscribeTimeoutMs, () => this.onConfigTimeout());
  }

  private onMessage(data: RawData): void {
    if (this.closed) return;

    const raw = toBuffer(data);
    if (this.subscriberId === null) {
      this.onConfig(raw);
      return;
    }

    this.scheduleKeepalive();

    if (raw.length > this.options.maxMessageBytes) {
      sendMessage(this.options.socket, { status: 'error', message: 'Message too large' });
      return;
    }

    const envelope = clientMessageSchema.safeParse(parseJson(raw.toString('utf-8')));
    if (!envelope.success) return;

    switch (envelope.data.type) {
      case 'ping':
        sendMessage(this.options.socket, { type: 'pong' });
        return;
      case 'update_filters':
        this.onUpdateFilters(envelope.data.filters ?? {});
        return;
      default:
        return;
    }
  }

  private onConfig(raw: Buffer): void {
    const { socket, router, log } = this.options;
    this.clearTimer();

    if (raw.length > this.options.maxMessageBytes) {
      this.reject('Message too large', CLOSE_POLICY);
      return;
    }

    const json = parseJson(raw.toString('utf-8'));
    if (json === undefined) {
      this.reject('Invalid JSON', CLOSE_POLICY);
      return;
    }

    const parsed = subscriptionFilterSchema.safeParse(json);
    if (!parsed.success) {
      this.reject(`Invalid filters: ${describeIssues(parsed.error.issues)}`, CLOSE_POLICY);
      return;
    }

    const filters: SubscriptionFilter = parsed.data;
    const subscriberId = router.allocateSubscriberId();

    if (!router.subscribe(subscriberId, new SocketConnection(socket), filters)) {
      this.reject('Server at subscriber capacity', CLOSE_TRY_AGAIN);
      return;
    }

    this.subscriberId = subscriberId;
    sendMessage(socket, { status: 'subscribed', subscriber_id: subscriberId, filters });
    log.debug({ subscriber_id: subscriberId }, 'Subscription confirmed');

    this.scheduleKeepalive();
  }

  private onUpdateFilters(input: unknown): void {
    const { socket, router } = this.options;
    if (this.subscriberId === null) return;

    const parsed = subscriptionFilterSchema.safeParse(input);
    if (!parsed.success) {
      sendMessage(socket, {
        status: 'error',
        message: `Invalid filters: ${describeIssues(parsed.error.issues)}`,
      });
      return;
    }

    if (!router.updateFilter(this.subscriberId, parsed.data)) {
      // Removed by the dispatch loop after a failed send; the socket is on its way out.
      sendMessage(socket, { status: 'error', message: 'Subscription no longer active' });
      return;
    }

    sendMessage(socket, { status: 'filters_updated', filters: parsed.data });
  }

  private onConfigTimeout(): void {
    this.options.log.info('Subscriber timed out waiting for config');
    this.reject('Timed out waiting for subscription config', CLOSE_POLICY);
  }

  private onClose(): void {
    this.closed = true;
    this.clearTimer();
    if (this.subscriberId !== null) {
      this.options.router.unsubscribe(this.subscriberId);
    }
  }

  private reject(message: string, code: number): void {
    this.closed = true;
    this.clearTimer();
    sendMessage(this.options.socket, { status: 'error', message });
    this.options.socket.close(code, message.slice(0, 100));
  }

  private scheduleKeepalive(): void {
    this.schedule(this.options.keepaliveIntervalMs, () => {
      sendMessage(this.options.socket, { type: 'keepalive' });
      this.scheduleKeepalive();
    });
  }

  private schedule(ms: number, fn: () => void): void {
    this.clearTimer();
    this.timer = setTimeout(fn, ms);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
