import { randomUUID } from "node:crypto";
import type Database from "better-sqlite3";
import { TaskOwnershipError, type TaskErrorKind } from "../errors.js";
import { getTasksDb, inImmediateTransaction } from "./db.js";
import type { ClaimedTask, NewTaskParams, RenderTaskRecord } from "./types.js";

export const MAX_ERROR_LENGTH = 500;

export function insertPendingTask(
  params: NewTaskParams,
  nowMs: number,
  db: Database.Database = getTasksDb()
): RenderTaskRecord {
  const task: RenderTaskRecord = {
    id: randomUUID(),
    fingerprint: params.fingerprint,
    url: params.url,
    width: params.width,
    height: params.height,
    ttl_seconds: params.ttlSeconds,
    state: "PENDING",
    image_url: null,
    error: null,
    error_kind: null,
    owner: null,
    lease_until_ms: null,
    created_at_ms: nowMs,
    updated_at_ms: nowMs,
  };

  db.prepare(
    `
    INSERT INTO render_tasks (
      id, fingerprint, url, width, height, ttl_seconds, state, image_url,
      error, error_kind, owner, lease_until_ms, created_at_ms, updated_at_ms
    ) VALUES (
      @id, @fingerprint, @url, @width, @height, @ttl_seconds, @state, @image_url,
      @error, @error_kind, @owner, @lease_until_ms, @created_at_ms, @updated_at_ms
    )
  `
  ).run(task);

  return task;
}

export function getTaskById(id: string, db: Database.Database = getTasksDb()): RenderTaskRecord | null {
  const row = db.prepare(`SELECT * FROM render_tasks WHERE id = ?`).get(id) as RenderTaskRecord | undefined;
  return row ?? null;
}

/** The PENDING or PROCESSING task for a fingerprint, if any. */
export function findActiveTask(fingerprint: string, db: Database.Database = getTasksDb()): RenderTaskRecord | null {
  const row = db
    .prepare(`SELECT * FROM render_tasks WHERE fingerprint = ? AND state IN ('PENDING', 'PROCESSING')`)
    .get(fingerprint) as RenderTaskRecord | undefined;
  return row ?? null;
}

/**
 * Fail PROCESSING tasks whose lease ran out. Their worker is gone; the task is
 * not handed to anyone else, a later request starts a new one.
 */
export function reapExpiredLeases(nowMs: number, db: Database.Database = getTasksDb()): string[] {
  const expired = db
    .prepare(`SELECT id FROM render_tasks WHERE state = 'PROCESSING' AND lease_until_ms <= ?`)
    .all(nowMs) as Array<{ id: string }>;
  if (expired.length === 0) return [];

  const stmt = db.prepare(`
    UPDATE render_tasks
    SET state = 'FAILED',
        error = 'abandoned: worker lease expired',
        error_kind = 'Abandoned',
        lease_until_ms = NULL,
        updated_at_ms = ?
    WHERE id = ? AND state = 'PROCESSING'
  `);
  for (const { id } of expired) stmt.run(nowMs, id);
  return expired.map((r) => r.id);
}

/**
 * Atomically claim the oldest PENDING task and move it to PROCESSING.
 *
 * - BEGIN IMMEDIATE so only one writer claims at a time across processes.
 * - Expired leases are reaped inside the same transaction, which frees their
 *   fingerprints before anything new is picked.
 */
export function claimNextTask(
  opts: { workerId: string; leaseMs: number; nowMs: number },
  db: Database.Database = getTasksDb()
): { claimed: ClaimedTask | null; reaped: string[] } {
  return inImmediateTransaction(db, () => {
    const reaped = reapExpiredLeases(opts.nowMs, db);

    const picked = db
      .prepare(
        `
        SELECT id FROM render_tasks
        WHERE state = 'PENDING'
        ORDER BY created_at_ms ASC, rowid ASC
        LIMIT 1
      `
      )
      .get() as { id: string } | undefined;

    if (!picked) return { claimed: null, reaped };

    const leaseUntil = opts.nowMs + opts.leaseMs;
    db.prepare(
      `
      UPDATE render_tasks
      SET state = 'PROCESSING',
          owner = ?,
          lease_until_ms = ?,
          updated_at_ms = ?
      WHERE id = ? AND state = 'PENDING'
    `
    ).run(opts.workerId, leaseUntil, opts.nowMs, picked.id);

    const updated = db.prepare(`SELECT * FROM render_tasks WHERE id = ?`).get(picked.id) as RenderTaskRecord;
    return { claimed: { task: updated, leaseUntilMs: leaseUntil }, reaped };
  });
}

function transitionFromProcessing(
  db: Database.Database,
  opts: { taskId: string; workerId: string },
  sql: string,
  params: unknown[]
): void {
  const res = db.prepare(sql).run(...params, opts.taskId, opts.workerId);
  if (res.changes === 0) throw new TaskOwnershipError(opts.taskId, opts.workerId);
}

export function completeTask(
  opts: { taskId: string; workerId: string; imageUrl: string; nowMs: number },
  db: Database.Database = getTasksDb()
): void {
  transitionFromProcessing(
    db,
    opts,
    `
    UPDATE render_tasks
    SET state = 'COMPLETED',
        image_url = ?,
        lease_until_ms = NULL,
        updated_at_ms = ?
    WHERE id = ? AND state = 'PROCESSING' AND owner = ?
  `,
    [opts.imageUrl, opts.nowMs]
  );
}

export function failTask(
  opts: { taskId: string; workerId: string; kind: TaskErrorKind; error: string; nowMs: number },
  db: Database.Database = getTasksDb()
): void {
  transitionFromProcessing(
    db,
    opts,
    `
    UPDATE render_tasks
    SET state = 'FAILED',
        error = ?,
        error_kind = ?,
        lease_until_ms = NULL,
        updated_at_ms = ?
    WHERE id = ? AND state = 'PROCESSING' AND owner = ?
  `,
    [opts.error.slice(0, MAX_ERROR_LENGTH), opts.kind, opts.nowMs]
  );
}
