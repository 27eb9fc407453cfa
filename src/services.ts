import type Database from "better-sqlite3";
import type { AppConfig } from "./config.js";
import { PuppeteerRenderer } from "./render/puppeteerRenderer.js";
import { SqliteArtifactStore } from "./storage/artifactStore.js";
import { S3BlobSink, s3Client } from "./storage/s3.js";
import { createTaskAuditLog } from "./tasks/audit.js";
import type { RenderPoolDeps } from "./tasks/pool.js";

/** Production collaborators shared by the server and the standalone worker. */
export function createRenderPoolDeps(cfg: AppConfig, db: Database.Database): RenderPoolDeps {
  const sink = new S3BlobSink(s3Client(cfg.storage), cfg.storage);
  return {
    db,
    renderer: new PuppeteerRenderer(cfg.render.chromeExecutablePath),
    artifacts: new SqliteArtifactStore(db, sink, { keyPrefix: cfg.storage.keyPrefix }),
    audit: createTaskAuditLog(cfg.tasks.auditLogPath),
    renderTimeoutMs: cfg.render.timeoutMs,
    leaseGraceMs: cfg.tasks.leaseGraceMs,
  };
}
