import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DedupFailedError } from "../errors.js";
import { createHarness, type TestHarness } from "../test/fakes.js";
import { closeTasksDb } from "../tasks/db.js";
import { processNextTask } from "../tasks/pool.js";
import { createApp, type HttpOptions } from "./app.js";

describe("HTTP surface", () => {
  let h: TestHarness;
  let server: Server;
  let base: string;

  async function listen(opts: Partial<HttpOptions> = {}): Promise<void> {
    const app = createApp(h.pipeline, { corsOrigins: [], publicBaseUrl: "https://og.example.com/", ...opts });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    base = `http://127.0.0.1:${(server.address() as AddressInfo).port}`;
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    h = createHarness();
    await listen();
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
    closeTasksDb();
    vi.restoreAllMocks();
  });

  it("answers health checks", async () => {
    const res = await fetch(`${base}/healthz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("accepts a new render with 202 and a status link", async () => {
    const res = await fetch(`${base}/generate?url=${encodeURIComponent("https://example.com")}&width=800&height=400`);
    expect(res.status).toBe(202);
    const body = (await res.json()) as { status: string; task_id: string; check_status_url: string };
    expect(body.status).toBe("processing");
    expect(body.check_status_url).toBe(`https://og.example.com/status/${body.task_id}`);
    expect(h.pipeline.getStatus(body.task_id).status).toBe("pending");
  });

  it("walks a task from pending to a cached image", async () => {
    const url = `${base}/generate?url=${encodeURIComponent("https://example.com")}`;
    const accepted = (await (await fetch(url)).json()) as { task_id: string };

    const pending = await fetch(`${base}/status/${accepted.task_id}`);
    expect(await pending.json()).toEqual({ status: "pending", image_url: null, error_message: null });

    await processNextTask(h.poolDeps, "w1");

    const done = (await (await fetch(`${base}/status/${accepted.task_id}`)).json()) as {
      status: string;
      image_url: string;
      error_message: null;
    };
    expect(done.status).toBe("completed");
    expect(done.error_message).toBeNull();

    const cached = await fetch(url);
    expect(cached.status).toBe(200);
    expect(await cached.json()).toEqual({ status: "cached", image_url: done.image_url });

    const image = await fetch(`${base}/image/${accepted.task_id}`, { redirect: "manual" });
    expect(image.status).toBe(307);
    expect(image.headers.get("location")).toBe(done.image_url);
  });

  it("honours force_refresh", async () => {
    const url = `${base}/generate?url=${encodeURIComponent("https://example.com")}`;
    await fetch(url);
    await processNextTask(h.poolDeps, "w1");

    const forced = await fetch(`${url}&force_refresh=true`);
    expect(forced.status).toBe(202);
  });

  it("maps request errors to 400", async () => {
    const missing = await fetch(`${base}/generate`);
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: "url: url is required" });

    const badScheme = await fetch(`${base}/generate?url=${encodeURIComponent("ftp://example.com")}`);
    expect(badScheme.status).toBe(400);
    expect(await badScheme.json()).toEqual({ error: "Invalid or unsupported URL scheme: ftp://example.com" });

    const badWidth = await fetch(`${base}/generate?url=${encodeURIComponent("https://example.com")}&width=wide`);
    expect(badWidth.status).toBe(400);

    const hugeTtl = await fetch(`${base}/generate?url=${encodeURIComponent("https://example.com")}&ttl=1e308`);
    expect(hugeTtl.status).toBe(400);
  });

  it("maps unknown tasks to 404", async () => {
    const status = await fetch(`${base}/status/00000000-0000-4000-8000-000000000000`);
    expect(status.status).toBe(404);
    expect(await status.json()).toEqual({ error: "Task not found: 00000000-0000-4000-8000-000000000000" });

    const image = await fetch(`${base}/image/00000000-0000-4000-8000-000000000000`, { redirect: "manual" });
    expect(image.status).toBe(404);
  });

  it("asks callers to retry when dedup gives up", async () => {
    vi.spyOn(h.pipeline, "requestImage").mockImplementation(() => {
      throw new DedupFailedError("fp", 3);
    });
    const res = await fetch(`${base}/generate?url=${encodeURIComponent("https://example.com")}`);
    expect(res.status).toBe(503);
    expect(res.headers.get("retry-after")).toBe("1");
  });

  it("reports a down ledger as 503", async () => {
    closeTasksDb();
    const res = await fetch(`${base}/generate?url=${encodeURIComponent("https://example.com")}`);
    expect(res.status).toBe(503);
  });

  it("sends CORS headers only to listed origins", async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await listen({ corsOrigins: ["https://app.example.com"] });

    const allowed = await fetch(`${base}/healthz`, { headers: { Origin: "https://app.example.com" } });
    expect(allowed.headers.get("access-control-allow-origin")).toBe("https://app.example.com");

    const other = await fetch(`${base}/healthz`, { headers: { Origin: "https://evil.test" } });
    expect(other.headers.get("access-control-allow-origin")).toBeNull();
  });
});
