import type Database from "better-sqlite3";
import { TaskOwnershipError, classifyTaskError, errorMessage, type TaskErrorKind } from "../errors.js";
import { renderWithTimeout, type Renderer } from "../render/renderer.js";
import type { ArtifactStore } from "../storage/artifactStore.js";
import type { TaskAuditSink } from "./audit.js";
import { claimNextTask, completeTask, failTask } from "./taskStore.js";

export interface RenderPoolDeps {
  db: Database.Database;
  renderer: Renderer;
  artifacts: ArtifactStore;
  audit: TaskAuditSink;
  renderTimeoutMs: number;
  /** Added to the render timeout to size a claim's lease. */
  leaseGraceMs: number;
  now?: () => number;
}

export interface RenderPoolOptions {
  workers: number;
  pollIntervalMs: number;
  workerIdPrefix?: string;
}

export interface RenderPool {
  /** Nudge idle workers to look for work now instead of at their next poll. */
  wake(): void;
  /** Stop claiming; resolves once in-flight renders have been committed. */
  stop(): Promise<void>;
}

type Outcome = { ok: true; imageUrl: string } | { ok: false; kind: TaskErrorKind; message: string };

/**
 * Claim one PENDING task, render it, store the image and commit the terminal
 * state. Resolves false when there was nothing to claim.
 */
export async function processNextTask(deps: RenderPoolDeps, workerId: string): Promise<boolean> {
  const now = deps.now ?? Date.now;
  const leaseMs = deps.renderTimeoutMs + deps.leaseGraceMs;

  const { claimed, reaped } = claimNextTask({ workerId, leaseMs, nowMs: now() }, deps.db);
  for (const taskId of reaped) {
    console.warn(`[render-pool] task ${taskId} abandoned by its worker; marked FAILED`);
    deps.audit({ type: "TASK_ABANDONED", taskId, workerId });
  }
  if (!claimed) return false;

  const { task } = claimed;
  deps.audit({
    type: "TASK_CLAIMED",
    taskId: task.id,
    fingerprint: task.fingerprint,
    workerId,
    leaseUntilMs: claimed.leaseUntilMs,
  });

  const started = Date.now();
  let outcome: Outcome;
  try {
    const bytes = await renderWithTimeout(
      deps.renderer,
      { url: task.url, width: task.width, height: task.height },
      deps.renderTimeoutMs
    );
    const host = new URL(task.url).hostname;
    const artifact = await deps.artifacts.put(task.fingerprint, bytes, task.ttl_seconds, host);
    outcome = { ok: true, imageUrl: artifact.url };
  } catch (e) {
    outcome = { ok: false, ...classifyTaskError(e) };
  }
  const ms = Date.now() - started;

  try {
    if (outcome.ok) {
      completeTask({ taskId: task.id, workerId, imageUrl: outcome.imageUrl, nowMs: now() }, deps.db);
      deps.audit({
        type: "TASK_COMPLETED",
        taskId: task.id,
        fingerprint: task.fingerprint,
        workerId,
        imageUrl: outcome.imageUrl,
        ms,
      });
      console.log(`[render-pool] ${workerId} completed task=${task.id} url=${task.url} ms=${ms}`);
    } else {
      failTask({ taskId: task.id, workerId, kind: outcome.kind, error: outcome.message, nowMs: now() }, deps.db);
      deps.audit({
        type: "TASK_FAILED",
        taskId: task.id,
        fingerprint: task.fingerprint,
        workerId,
        kind: outcome.kind,
        error: outcome.message,
        ms,
      });
      console.warn(`[render-pool] ${workerId} failed task=${task.id} kind=${outcome.kind} error=${outcome.message}`);
    }
  } catch (e) {
    // Lease ran out and the task was reaped while we rendered; its fate is sealed
    if (!(e instanceof TaskOwnershipError)) throw e;
    console.warn(`[render-pool] ${workerId} lost task=${task.id}: ${e.message}`);
  }
  return true;
}

class Wakeup {
  private readonly waiters = new Set<() => void>();

  wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.waiters.add(done);
    });
  }

  wakeAll(): void {
    for (const done of [...this.waiters]) done();
  }
}

/** Start N workers sharing the ledger. Saturation just leaves tasks PENDING. */
export function startRenderPool(deps: RenderPoolDeps, opts: RenderPoolOptions): RenderPool {
  const prefix = opts.workerIdPrefix ?? `render-${process.pid}`;
  const wakeup = new Wakeup();
  let stopped = false;

  const loop = async (workerId: string): Promise<void> => {
    while (!stopped) {
      let didWork = false;
      try {
        didWork = await processNextTask(deps, workerId);
      } catch (e) {
        console.error(`[render-pool] ${workerId} tick failed: ${errorMessage(e)}`);
      }
      if (!didWork && !stopped) await wakeup.wait(opts.pollIntervalMs);
    }
  };

  console.log(
    `[render-pool] starting workers=${opts.workers} poll=${opts.pollIntervalMs}ms timeout=${deps.renderTimeoutMs}ms`
  );
  const loops = Array.from({ length: opts.workers }, (_, i) => loop(`${prefix}-${i + 1}`));

  return {
    wake: () => wakeup.wakeAll(),
    stop: async () => {
      stopped = true;
      wakeup.wakeAll();
      await Promise.all(loops);
      console.log("[render-pool] stopped");
    },
  };
}
