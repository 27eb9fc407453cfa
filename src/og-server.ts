import "dotenv/config";
import { loadConfig } from "./config.js";
import { createDomainAllowList } from "./domains.js";
import { errorMessage } from "./errors.js";
import { createApp } from "./http/app.js";
import { OgImagePipeline } from "./pipeline.js";
import { createRenderPoolDeps } from "./services.js";
import { closeTasksDb, openTasksDb } from "./tasks/db.js";
import { migrateTasksDb } from "./tasks/migrations.js";
import { startRenderPool, type RenderPool } from "./tasks/pool.js";

async function main() {
  const cfg = loadConfig();
  const db = openTasksDb(cfg.tasks.dbPath);
  migrateTasksDb(db);

  const deps = createRenderPoolDeps(cfg, db);

  // With RENDER_IN_PROCESS=false, render-worker processes drain the ledger instead
  let pool: RenderPool | null = null;
  if (cfg.render.inProcess) {
    pool = startRenderPool(deps, {
      workers: cfg.render.workers,
      pollIntervalMs: cfg.tasks.pollIntervalMs,
      workerIdPrefix: `server-${process.pid}`,
    });
  }

  const pipeline = new OgImagePipeline({
    db,
    artifacts: deps.artifacts,
    isAllowed: createDomainAllowList(cfg.pipeline.allowedDomains),
    config: cfg.pipeline,
    audit: deps.audit,
    onTaskCreated: () => pool?.wake(),
  });

  const app = createApp(pipeline, {
    publicBaseUrl: cfg.server.publicBaseUrl,
    corsOrigins: cfg.server.corsOrigins,
  });

  const server = app.listen(cfg.server.port, cfg.server.bindHost, () => {
    console.log(`[og-server] listening on http://${cfg.server.bindHost}:${cfg.server.port}`);
    console.log(`[og-server] environment=${cfg.environment} inProcessPool=${cfg.render.inProcess}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[og-server] ${signal} received; shutting down`);
    server.close();
    (async () => {
      await pool?.stop();
      await deps.renderer.close?.();
      closeTasksDb();
    })().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[og-server] shutdown failed:", errorMessage(e));
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("[og-server] fatal:", e);
  process.exit(1);
});
