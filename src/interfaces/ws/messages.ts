import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { z } from 'zod';

/** Envelope of a message sent by a subscriber after its initial config. */
export const clientMessageSchema = z.object({
  type: z.string(),
  filters: z.unknown().optional(),
});

export type ServerMessage =
  | { status: 'subscribed'; subscriber_id: string; filters: unknown }
  | { status: 'filters_updated'; filters: unknown }
  | { status: 'ok'; event_id: string; routed: boolean }
  | { status: 'error'; message: string }
  | { type: 'pong' }
  | { type: 'keepalive' };

export function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** Parses JSON without throwing; `undefined` on malformed input. */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/** Sends a control message if the socket is still open. */
export function sendMessage(socket: WebSocket, message: ServerMessage): void {
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(JSON.stringify(message));
}

/** Flattens zod issues into one line for in-band error replies. */
export function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
