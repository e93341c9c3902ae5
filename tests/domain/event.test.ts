import { describe, it, expect } from 'vitest';
import {
  createEvent,
  generateEventId,
  isKnownEventType,
  EVENT_TYPES,
  EVENT_TYPE_NAMES,
} from '../../src/domain/index.js';

describe('generateEventId', () => {
  it('produces evt_ followed by 12 hex characters', () => {
    expect(generateEventId()).toMatch(/^evt_[0-9a-f]{12}$/);
  });

  it('does not repeat across calls', () => {
    const ids = new Set(Array.from({ length: 200 }, () => generateEventId()));
    expect(ids.size).toBe(200);
  });
});

describe('createEvent', () => {
  const now = new Date('2026-03-01T09:30:00Z');

  it('fills id, timestamp and null defaults', () => {
    const event = createEvent({ event_type: 'quiz_started', source: 'quiz-app' }, now);

    expect(event).toEqual({
      id: expect.stringMatching(/^evt_[0-9a-f]{12}$/),
      event_type: 'quiz_started',
      source: 'quiz-app',
      session_id: null,
      user_id: null,
      payload: {},
      timestamp: '2026-03-01T09:30:00.000Z',
    });
  });

  it('keeps the supplied ids and payload', () => {
    const event = createEvent(
      { event_type: 'answer_submitted', source: 'quiz-app', session_id: 's1', user_id: 'u1', payload: { q: 3 } },
      now,
    );

    expect(event.session_id).toBe('s1');
    expect(event.user_id).toBe('u1');
    expect(event.payload).toEqual({ q: 3 });
  });

  it('returns a frozen object', () => {
    const event = createEvent({ event_type: 'quiz_started', source: 'quiz-app' }, now);
    expect(Object.isFrozen(event)).toBe(true);
  });
});

describe('event type registry', () => {
  it('knows every listed type and nothing else', () => {
    expect(isKnownEventType('quiz_started')).toBe(true);
    expect(isKnownEventType('error_occurred')).toBe(true);
    expect(isKnownEventType('page_view')).toBe(false);
  });

  it('lists 15 types, sorted', () => {
    expect(Object.keys(EVENT_TYPES)).toHaveLength(15);
    expect(EVENT_TYPE_NAMES).toEqual([...EVENT_TYPE_NAMES].sort());
  });
});
