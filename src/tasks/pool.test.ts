import { afterEach, describe, expect, it, vi } from "vitest";
import { createHarness, type TestHarness } from "../test/fakes.js";
import { closeTasksDb } from "./db.js";
import { processNextTask, startRenderPool, type RenderPool } from "./pool.js";
import { getTaskById } from "./taskStore.js";

describe("processNextTask", () => {
  afterEach(() => {
    closeTasksDb();
  });

  it("returns false when nothing is pending", async () => {
    const h = createHarness();
    await expect(processNextTask(h.poolDeps, "w1")).resolves.toBe(false);
    expect(h.renderer.calls).toHaveLength(0);
  });

  it("audits claim and completion", async () => {
    const h = createHarness();
    const result = h.pipeline.requestImage({ url: "https://example.com" });
    if (result.status !== "processing") throw new Error("expected a new task");
    await processNextTask(h.poolDeps, "w1");

    expect(h.events.map((e) => e.type)).toEqual(["TASK_CREATED", "TASK_CLAIMED", "TASK_COMPLETED"]);
    expect(getTaskById(result.taskId, h.db)).toMatchObject({ state: "COMPLETED", owner: "w1" });
  });

  it("does not retry a failed task", async () => {
    const h = createHarness();
    h.renderer.behavior = "throw";
    h.pipeline.requestImage({ url: "https://example.com" });

    await processNextTask(h.poolDeps, "w1");
    await expect(processNextTask(h.poolDeps, "w1")).resolves.toBe(false);
    expect(h.renderer.calls).toHaveLength(1);
    expect(h.events.at(-1)).toMatchObject({ type: "TASK_FAILED", kind: "RenderError" });
  });

  it("drops the result when the task was reaped mid-render", async () => {
    const h = createHarness();
    h.renderer.hold();
    const result = h.pipeline.requestImage({ url: "https://example.com" });
    if (result.status !== "processing") throw new Error("expected a new task");

    const running = processNextTask(h.poolDeps, "slow");
    await vi.waitFor(() => expect(h.renderer.active).toBe(1));

    // lease = 1000ms timeout + 500ms grace; another worker reaps it afterwards
    h.clock.now += 1_500;
    await processNextTask(h.poolDeps, "other");
    h.renderer.release();
    await expect(running).resolves.toBe(true);

    expect(getTaskById(result.taskId, h.db)).toMatchObject({ state: "FAILED", error_kind: "Abandoned" });
    expect(h.events.map((e) => e.type)).toContain("TASK_ABANDONED");
  });
});

describe("startRenderPool", () => {
  let h: TestHarness;
  let pool: RenderPool | null = null;

  afterEach(async () => {
    await pool?.stop();
    pool = null;
    closeTasksDb();
  });

  it("renders each fingerprint once however many callers ask", async () => {
    h = createHarness();
    h.renderer.hold();
    pool = startRenderPool(h.poolDeps, { workers: 4, pollIntervalMs: 10, workerIdPrefix: "t" });

    const ids = new Set<string>();
    for (let i = 0; i < 10; i++) {
      const r = h.pipeline.requestImage({ url: "https://example.com/same" });
      if (r.status === "processing") ids.add(r.taskId);
    }
    pool.wake();
    await vi.waitFor(() => expect(h.renderer.active).toBe(1));
    h.renderer.release();

    const [taskId] = [...ids];
    expect(ids.size).toBe(1);
    await vi.waitFor(() => expect(h.pipeline.getStatus(taskId).status).toBe("completed"));
    expect(h.renderer.calls).toHaveLength(1);
    expect(h.renderer.maxActiveByUrl.get("https://example.com/same")).toBe(1);
  });

  it("runs different fingerprints in parallel up to the pool size", async () => {
    h = createHarness();
    h.renderer.hold();
    pool = startRenderPool(h.poolDeps, { workers: 2, pollIntervalMs: 10, workerIdPrefix: "t" });

    for (const path of ["a", "b", "c"]) h.pipeline.requestImage({ url: `https://example.com/${path}` });
    pool.wake();

    await vi.waitFor(() => expect(h.renderer.active).toBe(2));
    // the third task waits in the ledger
    const pending = h.db.prepare(`SELECT COUNT(*) AS n FROM render_tasks WHERE state = 'PENDING'`).get() as {
      n: number;
    };
    expect(pending.n).toBe(1);

    h.renderer.release();
    await vi.waitFor(() => expect(h.renderer.calls).toHaveLength(3));
    await vi.waitFor(() => {
      const done = h.db.prepare(`SELECT COUNT(*) AS n FROM render_tasks WHERE state = 'COMPLETED'`).get() as {
        n: number;
      };
      expect(done.n).toBe(3);
    });
    expect(h.renderer.maxActive).toBe(2);
  });

  it("finishes in-flight work on stop", async () => {
    h = createHarness();
    h.renderer.hold();
    pool = startRenderPool(h.poolDeps, { workers: 1, pollIntervalMs: 10, workerIdPrefix: "t" });
    const r = h.pipeline.requestImage({ url: "https://example.com" });
    if (r.status !== "processing") throw new Error("expected a new task");
    pool.wake();
    await vi.waitFor(() => expect(h.renderer.active).toBe(1));

    const stopping = pool.stop();
    pool = null;
    h.renderer.release();
    await stopping;

    expect(h.pipeline.getStatus(r.taskId).status).toBe("completed");
  });
});
