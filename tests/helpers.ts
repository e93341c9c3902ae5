import { vi } from 'vitest';
import type { Event } from '../src/domain/index.js';
import { DELIVERED } from '../src/application/connection.js';
import type { ConnectionHandle, DeliveryResult } from '../src/application/connection.js';
import { loadConfig } from '../src/config.js';
import type { AppConfig } from '../src/config.js';

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  counter++;
  return {
    id: overrides.id ?? `evt_test${String(counter).padStart(8, '0')}`,
    event_type: overrides.event_type ?? 'answer_submitted',
    source: overrides.source ?? 'quiz-app',
    session_id: overrides.session_id ?? null,
    user_id: overrides.user_id ?? null,
    payload: overrides.payload ?? { question: 1 },
    timestamp: overrides.timestamp ?? '2026-03-01T12:00:00.000Z',
  };
}

export function fakeLogger() {
  const log = {
    level: 'info',
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    silent: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/** Records every event it is handed; always succeeds. */
export class RecordingConnection implements ConnectionHandle {
  readonly received: Event[] = [];

  send(event: Event): DeliveryResult {
    this.received.push(event);
    return DELIVERED;
  }
}

/** Reports every send as failed. */
export class FailingConnection implements ConnectionHandle {
  attempts = 0;

  constructor(private readonly mode: 'result' | 'throw' = 'result') {}

  send(): DeliveryResult {
    this.attempts++;
    if (this.mode === 'throw') throw new Error('connection reset');
    return { ok: false, reason: 'closed' };
  }
}

/** Polls until `predicate` holds, failing after `timeoutMs`. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('waitFor: condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Defaults plus overrides, as `loadConfig` would produce from the environment. */
export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ LOG_LEVEL: 'silent', ...env });
}
