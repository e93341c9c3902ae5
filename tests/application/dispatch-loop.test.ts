import { describe, it, expect, beforeEach } from 'vitest';
import { BoundedQueue } from '../../src/application/bounded-queue.js';
import { SubscriptionRegistry } from '../../src/application/subscription-registry.js';
import { DispatchLoop } from '../../src/application/dispatch-loop.js';
import type { ConnectionHandle } from '../../src/application/connection.js';
import type { Event } from '../../src/domain/index.js';
import { fakeLogger, makeEvent, waitFor, RecordingConnection, FailingConnection } from '../helpers.js';

describe('DispatchLoop', () => {
  let queue: BoundedQueue<Event>;
  let registry: SubscriptionRegistry;
  let log: ReturnType<typeof fakeLogger>;
  let loop: DispatchLoop;

  beforeEach(() => {
    queue = new BoundedQueue<Event>(10);
    registry = new SubscriptionRegistry(10);
    log = fakeLogger();
    loop = new DispatchLoop(queue, registry, log);
  });

  // ─── dispatch ──────────────────────────────────────────────

  describe('dispatch', () => {
    it('delivers only to subscribers whose filter matches', async () => {
      const quiz = new RecordingConnection();
      const answers = new RecordingConnection();
      const all = new RecordingConnection();
      registry.subscribe('quiz', quiz, { event_types: ['quiz_started'] });
      registry.subscribe('answers', answers, { event_types: ['answer_submitted'] });
      registry.subscribe('all', all, {});

      const event = makeEvent({ event_type: 'quiz_started' });
      const outcome = await loop.dispatch(event);

      expect(outcome).toEqual({ matched: 2, delivered: 2, removed: [] });
      expect(quiz.received).toEqual([event]);
      expect(answers.received).toEqual([]);
      expect(all.received).toEqual([event]);
    });

    it('forwards the same event object unchanged', async () => {
      const conn = new RecordingConnection();
      registry.subscribe('a', conn, {});
      const event = makeEvent();

      await loop.dispatch(event);

      expect(conn.received[0]).toBe(event);
    });

    it('removes a subscriber whose delivery reports failure', async () => {
      const healthy = new RecordingConnection();
      const broken = new FailingConnection();
      registry.subscribe('healthy', healthy, {});
      registry.subscribe('broken', broken, {});

      const outcome = await loop.dispatch(makeEvent());

      expect(outcome).toEqual({ matched: 2, delivered: 1, removed: ['broken'] });
      expect(registry.has('broken')).toBe(false);
      expect(registry.has('healthy')).toBe(true);
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ subscriber_id: 'broken', reason: 'closed' }),
        'Delivery failed',
      );
    });

    it('removes a subscriber whose delivery throws', async () => {
      registry.subscribe('thrower', new FailingConnection('throw'), {});

      const outcome = await loop.dispatch(makeEvent());

      expect(outcome.removed).toEqual(['thrower']);
      expect(registry.count).toBe(0);
    });

    it('does not retry a failed delivery', async () => {
      const broken = new FailingConnection();
      registry.subscribe('broken', broken, {});

      await loop.dispatch(makeEvent());
      await loop.dispatch(makeEvent());

      expect(broken.attempts).toBe(1);
    });

    it('leaves a subscriber that re-registered the same id during delivery', async () => {
      const replacement = new RecordingConnection();
      const flaky: ConnectionHandle = {
        send: () => {
          registry.unsubscribe('a');
          registry.subscribe('a', replacement, {});
          return { ok: false, reason: 'closed' };
        },
      };
      registry.subscribe('a', flaky, {});

      const outcome = await loop.dispatch(makeEvent());

      expect(outcome.removed).toEqual([]);
      expect(registry.get('a')?.connection).toBe(replacement);
    });

    it('tracks cumulative counters', async () => {
      registry.subscribe('ok', new RecordingConnection(), {});
      registry.subscribe('bad', new FailingConnection(), {});

      await loop.dispatch(makeEvent());
      await loop.dispatch(makeEvent());

      expect(loop.stats).toEqual({ dispatched: 2, delivered: 2, failed: 1, faults: 0 });
    });
  });

  // ─── lifecycle ─────────────────────────────────────────────

  describe('run loop', () => {
    it('drains the queue in FIFO order once started', async () => {
      const conn = new RecordingConnection();
      registry.subscribe('a', conn, {});

      const first = makeEvent();
      const second = makeEvent();
      queue.enqueue(first);
      queue.enqueue(second);

      loop.start();
      await waitFor(() => conn.received.length === 2);

      expect(conn.received).toEqual([first, second]);
      await loop.stop();
    });

    it('keeps running after an unexpected fault', async () => {
      const conn = new RecordingConnection();
      registry.subscribe('a', conn, {});
      const poisoned = makeEvent();
      const healthy = makeEvent();

      const original = registry.snapshot.bind(registry);
      let calls = 0;
      registry.snapshot = () => {
        calls++;
        if (calls === 1) throw new Error('registry exploded');
        return original();
      };

      queue.enqueue(poisoned);
      queue.enqueue(healthy);
      loop.start();
      await waitFor(() => conn.received.length === 1);

      expect(conn.received).toEqual([healthy]);
      expect(loop.stats.faults).toBe(1);
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ event_id: poisoned.id }),
        'Error dispatching event',
      );
      await loop.stop();
    });

    it('stop is a no-op when never started', async () => {
      await loop.stop();

      expect(loop.isRunning).toBe(false);
      expect(queue.isClosed).toBe(false);
    });

    it('stop releases an idle loop and resolves', async () => {
      loop.start();
      expect(loop.isRunning).toBe(true);

      await loop.stop();

      expect(loop.isRunning).toBe(false);
      expect(log.info).toHaveBeenCalledWith('Dispatch loop stopped');
    });

    it('stop waits for the in-flight delivery to finish', async () => {
      let release: () => void = () => undefined;
      let sends = 0;
      let finished = false;
      const slow: ConnectionHandle = {
        send: () =>
          new Promise((resolve) => {
            sends++;
            release = () => {
              finished = true;
              resolve({ ok: true });
            };
          }),
      };
      registry.subscribe('slow', slow, {});
      queue.enqueue(makeEvent());
      loop.start();
      await waitFor(() => sends === 1);

      const stopping = loop.stop();
      release();
      await stopping;

      expect(finished).toBe(true);
      expect(loop.stats.delivered).toBe(1);
    });

    it('drops events still queued at stop', async () => {
      let release: () => void = () => undefined;
      let sends = 0;
      const slow: ConnectionHandle = {
        send: () =>
          new Promise((resolve) => {
            sends++;
            release = () => resolve({ ok: true });
          }),
      };
      registry.subscribe('slow', slow, {});
      queue.enqueue(makeEvent());
      queue.enqueue(makeEvent());
      queue.enqueue(makeEvent());
      loop.start();
      await waitFor(() => sends === 1);

      const stopping = loop.stop();
      release();
      await stopping;

      expect(sends).toBe(1);
      expect(log.info).toHaveBeenCalledWith({ dropped: 2 }, 'Dropped queued events on shutdown');
    });
  });
});
