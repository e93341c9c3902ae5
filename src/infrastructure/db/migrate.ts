import type { SqlConnection } from './client.js';

/**
 * Ensures tables and indexes exist (lightweight migration via raw SQL).
 *
 * Mirrors `schema.ts`; drizzle-kit generates the real migrations for
 * managed environments.
 */
export async function ensureSchema(sql: SqlConnection): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      id          VARCHAR(32)  PRIMARY KEY,
      event_type  VARCHAR(64)  NOT NULL,
      source      VARCHAR(100) NOT NULL,
      session_id  VARCHAR(200),
      user_id     VARCHAR(200),
      payload     JSONB        NOT NULL DEFAULT '{}',
      timestamp   TIMESTAMPTZ  NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_stats (
      event_type  VARCHAR(64) PRIMARY KEY,
      count       INTEGER     NOT NULL DEFAULT 0,
      last_seen   TIMESTAMPTZ
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_type ON events (event_type)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_session ON events (session_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_user ON events (user_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events (timestamp)`);
}
