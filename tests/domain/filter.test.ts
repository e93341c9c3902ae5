import { describe, it, expect } from 'vitest';
import { matchesFilter, MATCH_ALL } from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

const event = makeEvent({
  event_type: 'quiz_started',
  session_id: 'sess-1',
  user_id: 'user-1',
});

describe('matchesFilter', () => {
  it('matches everything when the filter is missing', () => {
    expect(matchesFilter(event, null)).toBe(true);
    expect(matchesFilter(event, undefined)).toBe(true);
    expect(matchesFilter(event, MATCH_ALL)).toBe(true);
  });

  it('treats empty and null dimensions as unconstrained', () => {
    expect(matchesFilter(event, { event_types: [], session_id: null, user_id: '' })).toBe(true);
  });

  it('matches event_types by membership', () => {
    expect(matchesFilter(event, { event_types: ['quiz_completed', 'quiz_started'] })).toBe(true);
    expect(matchesFilter(event, { event_types: ['quiz_completed'] })).toBe(false);
  });

  it('compares ids exactly and case-sensitively', () => {
    expect(matchesFilter(event, { session_id: 'sess-1' })).toBe(true);
    expect(matchesFilter(event, { session_id: 'SESS-1' })).toBe(false);
    expect(matchesFilter(event, { user_id: 'user-2' })).toBe(false);
  });

  it('ANDs all dimensions', () => {
    expect(
      matchesFilter(event, { event_types: ['quiz_started'], session_id: 'sess-1', user_id: 'user-1' }),
    ).toBe(true);
    expect(
      matchesFilter(event, { event_types: ['quiz_started'], session_id: 'sess-1', user_id: 'user-9' }),
    ).toBe(false);
  });

  it('never matches an id filter against an event without that id', () => {
    const anonymous = makeEvent({ session_id: null, user_id: null });
    expect(matchesFilter(anonymous, { session_id: 'sess-1' })).toBe(false);
    expect(matchesFilter(anonymous, { user_id: 'user-1' })).toBe(false);
  });
});
