/**
 * Registry of event kinds accepted at ingestion.
 *
 * The router treats `event_type` as an opaque string; this list only
 * gates what publishers may send.
 */
export const EVENT_TYPES = {
  // Quiz
  quiz_started: 'Student started a quiz session',
  quiz_completed: 'Student completed/submitted quiz',
  quiz_timeout: 'Quiz timer expired',
  // Answers
  answer_submitted: 'Student submitted an answer',
  answer_changed: 'Student changed their answer',
  // Navigation
  question_viewed: 'Student viewed a question',
  question_skipped: 'Student skipped a question',
  // Timer
  timer_started: 'Session timer started',
  timer_tick: 'Timer tick (usually every second)',
  timer_warning: 'Timer warning threshold reached',
  // Progress
  mastery_updated: 'Student mastery level changed',
  learning_gap_detected: 'Learning gap identified',
  // System
  session_created: 'New session created',
  session_ended: 'Session ended',
  error_occurred: 'Error in system',
} as const satisfies Record<string, string>;

export type EventType = keyof typeof EVENT_TYPES;

export function isKnownEventType(value: string): value is EventType {
  return Object.prototype.hasOwnProperty.call(EVENT_TYPES, value);
}

/** Sorted list, used in validation messages. */
export const EVENT_TYPE_NAMES: readonly string[] = Object.keys(EVENT_TYPES).sort();
