import Database from "better-sqlite3";
import { DedupFailedError } from "../errors.js";
import { getTasksDb, inImmediateTransaction } from "./db.js";
import { findActiveTask, insertPendingTask } from "./taskStore.js";
import type { AcquireResult, NewTaskParams } from "./types.js";

export const MAX_DEDUP_ATTEMPTS = 3;

function isUniqueViolation(e: unknown): boolean {
  return e instanceof Database.SqliteError && e.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/**
 * Return the active task for the fingerprint, or create one.
 *
 * Check and insert share one IMMEDIATE transaction. The partial unique index on
 * active fingerprints backs that up: if another writer still slipped in, the
 * insert fails, we re-read and join theirs. That retry is bounded.
 */
export function acquireOrJoin(
  params: NewTaskParams,
  nowMs: number,
  db: Database.Database = getTasksDb()
): AcquireResult {
  for (let attempt = 1; attempt <= MAX_DEDUP_ATTEMPTS; attempt++) {
    try {
      return inImmediateTransaction(db, () => {
        const active = findActiveTask(params.fingerprint, db);
        if (active) return { task: active, isNewOwner: false };
        return { task: insertPendingTask(params, nowMs, db), isNewOwner: true };
      });
    } catch (e) {
      if (!isUniqueViolation(e)) throw e;
      console.warn(`[dedup] lost insert race fingerprint=${params.fingerprint} attempt=${attempt}`);
    }
  }
  throw new DedupFailedError(params.fingerprint, MAX_DEDUP_ATTEMPTS);
}
