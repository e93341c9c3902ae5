import { timingSafeEqual } from 'node:crypto';

/**
 * Constant-time API key comparison. An empty expected key never matches.
 */
export function apiKeyMatches(provided: string | null | undefined, expected: string): boolean {
  if (!provided || expected === '') return false;

  const a = Buffer.from(provided, 'utf-8');
  const b = Buffer.from(expected, 'utf-8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Picks a single header value; repeated headers are treated as absent. */
export function singleHeader(value: string | string[] | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
