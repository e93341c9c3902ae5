import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer } from 'ws';
import type { BaseLogger } from 'pino';
import type { AppConfig } from '../../config.js';
import type { EventRouter } from '../../application/event-router.js';
import { createEventSchema } from '../../application/event-schema.js';
import type { Database } from '../../infrastructure/db/index.js';
import { apiKeyMatches, singleHeader } from '../auth.js';
import { ConnectionLimiter } from './connection-limiter.js';
import { PublishSession } from './publish-session.js';
import { SubscribeSession } from './subscribe-session.js';

export const SUBSCRIBE_PATH = '/ws/subscribe';
export const PUBLISH_PATH = '/ws/publish';

const HEARTBEAT_INTERVAL_MS = 30_000;
const CLOSE_UNAUTHORIZED = 4001;
const CLOSE_TOO_MANY = 4002;
const CLOSE_GOING_AWAY = 1001;

export interface EventSocketServerOptions {
  config: AppConfig;
  router: EventRouter;
  db: Database;
  log: BaseLogger;
}

type Endpoint = 'subscribe' | 'publish';

/**
 * WebSocket endpoints sharing the HTTP server's port.
 *
 * - `/ws/subscribe` streams routed events to a filtered subscriber
 * - `/ws/publish` accepts one event per text message
 *
 * Upgrades for any other path are refused with a bare 404. A heartbeat
 * pings every socket and terminates the ones that missed the last ping.
 */
export class EventSocketServer {
  private readonly wss: WebSocketServer;
  private readonly limiter: ConnectionLimiter;
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private readonly eventSchema: ReturnType<typeof createEventSchema>;
  private readonly log: BaseLogger;
  private server: HttpServer | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    this.handleUpgrade(req, socket, head);
  };

  constructor(private readonly options: EventSocketServerOptions) {
    const { websocket } = options.config;
    this.log = options.log;
    this.limiter = new ConnectionLimiter(websocket.maxConnectionsPerIp);
    this.eventSchema = createEventSchema(options.config.payload);
    // Oversized messages are answered in-band; only far larger frames are cut at the protocol level.
    this.wss = new WebSocketServer({ noServer: true, maxPayload: websocket.maxMessageBytes * 4 });
  }

  attach(server: HttpServer): void {
    this.server = server;
    server.on('upgrade', this.onUpgrade);

    this.heartbeat = setInterval(() => this.sweep(), HEARTBEAT_INTERVAL_MS);
    this.heartbeat.unref();

    this.log.info({ paths: [SUBSCRIBE_PATH, PUBLISH_PATH] }, 'WebSocket server attached');
  }

  /** Closes every socket with 1001 and detaches from the HTTP server. */
  async close(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    if (this.server) {
      this.server.off('upgrade', this.onUpgrade);
      this.server = null;
    }

    for (const socket of this.wss.clients) {
      socket.close(CLOSE_GOING_AWAY, 'Server shutting down');
    }

    await new Promise<void>((resolve, reject) => {
      this.wss.close((err?: Error) => (err ? reject(err) : resolve()));
    });
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const endpoint = this.resolveEndpoint(url.pathname);

    if (endpoint === null) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
      this.accept(ws, req, url, endpoint);
    });
  }

  private accept(ws: WebSocket, req: IncomingMessage, url: URL, endpoint: Endpoint): void {
    const { config } = this.options;
    const address = req.socket.remoteAddress ?? 'unknown';

    if (config.auth.required) {
      const provided = url.searchParams.get('api_key') ?? singleHeader(req.headers['x-api-key']);
      if (!apiKeyMatches(provided, config.auth.apiKey)) {
        this.log.warn({ address, endpoint }, 'Rejected WebSocket with invalid API key');
        ws.close(CLOSE_UNAUTHORIZED, 'Unauthorized');
        return;
      }
    }

    if (!this.limiter.tryConnect(address)) {
      this.log.warn({ address, endpoint }, 'Rejected WebSocket over per-address limit');
      ws.close(CLOSE_TOO_MANY, 'Too many connections');
      return;
    }

    this.alive.set(ws, true);
    ws.on('pong', () => this.alive.set(ws, true));
    ws.on('error', (err: Error) => {
      this.log.debug({ address, endpoint, err }, 'WebSocket error');
    });
    ws.on('close', (code: number) => {
      this.limiter.disconnect(address);
      this.log.info({ address, endpoint, code, clientCount: this.wss.clients.size }, 'WebSocket client disconnected');
    });

    if (endpoint === 'subscribe') {
      new SubscribeSession({
        socket: ws,
        router: this.options.router,
        log: this.log,
        maxMessageBytes: config.websocket.maxMessageBytes,
        subscribeTimeoutMs: config.websocket.subscribeTimeoutMs,
        keepaliveIntervalMs: config.websocket.keepaliveIntervalMs,
      }).start();
    } else {
      new PublishSession({
        socket: ws,
        router: this.options.router,
        db: this.options.db,
        log: this.log,
        eventSchema: this.eventSchema,
        maxMessageBytes: config.websocket.maxMessageBytes,
      }).start();
    }

    this.log.info({ address, endpoint, clientCount: this.wss.clients.size }, 'WebSocket connection accepted');
  }

  private resolveEndpoint(pathname: string): Endpoint | null {
    if (pathname === SUBSCRIBE_PATH) return 'subscribe';
    if (pathname === PUBLISH_PATH) return 'publish';
    return null;
  }

  private sweep(): void {
    for (const ws of this.wss.clients) {
      if (this.alive.get(ws) === false) {
        this.log.debug('Heartbeat timeout, terminating client');
        ws.terminate();
        continue;
      }
      this.alive.set(ws, false);
      ws.ping();
    }
  }
}
