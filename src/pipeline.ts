import type Database from "better-sqlite3";
import { z } from "zod";
import type { PipelineConfig } from "./config.js";
import { assertAllowedDomain, parseTargetUrl, type DomainPredicate } from "./domains.js";
import {
  InvalidRequestError,
  PipelineError,
  StorageUnavailableError,
  TaskNotFoundError,
  errorMessage,
} from "./errors.js";
import { fingerprint, normalizeTarget } from "./fingerprint.js";
import { isFresh, type ArtifactStore } from "./storage/artifactStore.js";
import type { TaskAuditSink } from "./tasks/audit.js";
import { acquireOrJoin } from "./tasks/dedup.js";
import { getTaskById } from "./tasks/taskStore.js";
import type { RenderTaskRecord, TaskState } from "./tasks/types.js";

export interface ImageRequest {
  url: string;
  width?: number;
  height?: number;
  ttlHours?: number;
  forceRefresh?: boolean;
}

export type PipelineResult = { status: "cached"; imageUrl: string } | { status: "processing"; taskId: string };

export type TaskStatus = "pending" | "processing" | "completed" | "failed";

export interface StatusResult {
  status: TaskStatus;
  imageUrl: string | null;
  errorMessage: string | null;
}

export interface PipelineDeps {
  db: Database.Database;
  artifacts: ArtifactStore;
  isAllowed: DomainPredicate;
  config: PipelineConfig;
  audit?: TaskAuditSink;
  /** Called when a request created a new task, e.g. to wake the pool. */
  onTaskCreated?: (task: RenderTaskRecord) => void;
  now?: () => number;
}

const PipelineConfigSchema = z
  .object({
    defaultTtlSeconds: z.number().int().positive(),
    defaultWidth: z.number().int().positive(),
    defaultHeight: z.number().int().positive(),
    maxWidth: z.number().int().positive(),
    maxHeight: z.number().int().positive(),
    allowedDomains: z.array(z.string()),
    contactEmail: z.string().min(1),
  })
  .refine((c) => c.defaultWidth <= c.maxWidth && c.defaultHeight <= c.maxHeight, {
    message: "default dimensions exceed the configured maximum",
  });

/** One year. */
export const MAX_TTL_HOURS = 8760;

const STATUS_BY_STATE: Record<TaskState, TaskStatus> = {
  PENDING: "pending",
  PROCESSING: "processing",
  COMPLETED: "completed",
  FAILED: "failed",
};

function requestSchema(cfg: PipelineConfig) {
  return z.object({
    url: z.string().min(1, "url is required"),
    width: z.number().int().min(1).max(cfg.maxWidth).optional(),
    height: z.number().int().min(1).max(cfg.maxHeight).optional(),
    ttlHours: z.number().int().positive().max(MAX_TTL_HOURS).optional(),
    forceRefresh: z.boolean().optional(),
  });
}

/**
 * Entry point for callers. Neither operation waits on a render: a miss hands
 * back a task id to poll.
 */
export class OgImagePipeline {
  private readonly config: PipelineConfig;
  private readonly schema: ReturnType<typeof requestSchema>;
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDeps) {
    const parsed = PipelineConfigSchema.safeParse(deps.config);
    if (!parsed.success) {
      throw new Error(`Invalid pipeline config: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    this.config = parsed.data;
    this.schema = requestSchema(this.config);
    this.now = deps.now ?? Date.now;
  }

  requestImage(input: ImageRequest): PipelineResult {
    const parsed = this.schema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidRequestError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    const req = parsed.data;

    const target = parseTargetUrl(req.url);
    assertAllowedDomain(target, this.deps.isAllowed, this.config.contactEmail);

    const defaults = { width: this.config.defaultWidth, height: this.config.defaultHeight };
    const normalized = normalizeTarget(target.toString(), req.width, req.height, defaults);
    const fp = fingerprint(normalized.url, normalized.width, normalized.height, defaults);
    const nowMs = this.now();

    if (!req.forceRefresh) {
      const artifact = this.deps.artifacts.lookup(fp);
      if (artifact && isFresh(artifact, nowMs)) {
        return { status: "cached", imageUrl: artifact.url };
      }
    }

    const ttlSeconds = req.ttlHours !== undefined ? req.ttlHours * 3600 : this.config.defaultTtlSeconds;
    const { task, isNewOwner } = this.ledger("acquire", () =>
      acquireOrJoin({ fingerprint: fp, ...normalized, ttlSeconds }, nowMs, this.deps.db)
    );

    if (isNewOwner) {
      this.deps.audit?.({ type: "TASK_CREATED", taskId: task.id, fingerprint: fp, url: normalized.url });
      this.deps.onTaskCreated?.(task);
    }
    return { status: "processing", taskId: task.id };
  }

  getStatus(taskId: string): StatusResult {
    const task = this.findTask(taskId);
    return {
      status: STATUS_BY_STATE[task.state],
      imageUrl: task.state === "COMPLETED" ? task.image_url : null,
      errorMessage: task.state === "FAILED" ? task.error : null,
    };
  }

  /** Image URL of a completed task. */
  getImageUrl(taskId: string): string {
    const task = this.findTask(taskId);
    if (task.state !== "COMPLETED" || !task.image_url) throw new TaskNotFoundError(taskId);
    return task.image_url;
  }

  private findTask(taskId: string): RenderTaskRecord {
    if (!z.string().uuid().safeParse(taskId).success) {
      throw new InvalidRequestError(`Invalid task id: ${taskId}`);
    }
    const task = this.ledger("read", () => getTaskById(taskId, this.deps.db));
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  private ledger<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof PipelineError) throw e;
      throw new StorageUnavailableError(`Task ledger unavailable (${op}): ${errorMessage(e)}`, e);
    }
  }
}
