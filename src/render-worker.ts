import "dotenv/config";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createRenderPoolDeps } from "./services.js";
import { closeTasksDb, openTasksDb } from "./tasks/db.js";
import { migrateTasksDb } from "./tasks/migrations.js";
import { startRenderPool } from "./tasks/pool.js";

async function main() {
  const cfg = loadConfig();
  const db = openTasksDb(cfg.tasks.dbPath);
  migrateTasksDb(db);

  const deps = createRenderPoolDeps(cfg, db);
  const pool = startRenderPool(deps, {
    workers: cfg.render.workers,
    pollIntervalMs: cfg.tasks.pollIntervalMs,
    workerIdPrefix: cfg.tasks.workerId ?? `worker-${process.pid}`,
  });

  const shutdown = (signal: string) => {
    console.log(`[render-worker] ${signal} received; draining`);
    (async () => {
      await pool.stop();
      await deps.renderer.close?.();
      closeTasksDb();
    })().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[render-worker] shutdown failed:", errorMessage(e));
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("[render-worker] fatal:", e);
  process.exit(1);
});
