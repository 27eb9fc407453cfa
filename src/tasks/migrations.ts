import type Database from "better-sqlite3";
import { getTasksDb } from "./db.js";

export function migrateTasksDb(db: Database.Database = getTasksDb()): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS render_tasks (
      id TEXT PRIMARY KEY,
      fingerprint TEXT NOT NULL,
      url TEXT NOT NULL,
      width INTEGER NOT NULL,
      height INTEGER NOT NULL,
      ttl_seconds INTEGER NOT NULL,
      state TEXT NOT NULL CHECK (state IN ('PENDING', 'PROCESSING', 'COMPLETED', 'FAILED')),
      image_url TEXT,
      error TEXT,
      error_kind TEXT,
      owner TEXT,
      lease_until_ms INTEGER,
      created_at_ms INTEGER NOT NULL,
      updated_at_ms INTEGER NOT NULL
    );

    -- At most one active task per fingerprint
    CREATE UNIQUE INDEX IF NOT EXISTS idx_render_tasks_active
      ON render_tasks(fingerprint)
      WHERE state IN ('PENDING', 'PROCESSING');

    CREATE INDEX IF NOT EXISTS idx_render_tasks_pending
      ON render_tasks(state, created_at_ms);

    CREATE TABLE IF NOT EXISTS artifacts (
      fingerprint TEXT PRIMARY KEY,
      url TEXT NOT NULL,
      object_key TEXT NOT NULL,
      stored_at_ms INTEGER NOT NULL,
      ttl_seconds INTEGER NOT NULL
    );
  `);
}
