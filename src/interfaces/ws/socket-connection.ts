import { WebSocket } from 'ws';
import type { Event } from '../../domain/index.js';
import { DELIVERED } from '../../application/connection.js';
import type { ConnectionHandle, DeliveryResult } from '../../application/connection.js';

/**
 * Router-facing handle over a subscriber's socket.
 *
 * Resolves once `ws` has flushed the frame (or failed to), so the dispatch
 * loop learns about dead sockets from the write itself.
 */
export class SocketConnection implements ConnectionHandle {
  constructor(private readonly socket: WebSocket) {}

  send(event: Event): Promise<DeliveryResult> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.resolve({ ok: false, reason: 'socket_not_open' });
    }

    return new Promise<DeliveryResult>((resolve) => {
      this.socket.send(JSON.stringify(event), (err?: Error) => {
        resolve(err ? { ok: false, reason: err.message } : DELIVERED);
      });
    });
  }
}
