export type PipelineErrorCode =
  | "INVALID_REQUEST"
  | "STORAGE_UNAVAILABLE"
  | "DEDUP_FAILED"
  | "TASK_NOT_FOUND"
  | "TASK_OWNERSHIP";

/** Errors thrown synchronously from facade calls. */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;

  constructor(code: PipelineErrorCode, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

export class InvalidRequestError extends PipelineError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
  }
}

export class StorageUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("STORAGE_UNAVAILABLE", message, { retryable: true, cause });
  }
}

export class DedupFailedError extends PipelineError {
  constructor(fingerprint: string, attempts: number) {
    super("DEDUP_FAILED", `Could not acquire or join a task for ${fingerprint} after ${attempts} attempts`, {
      retryable: true,
    });
  }
}

export class TaskNotFoundError extends PipelineError {
  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `Task not found: ${taskId}`);
  }
}

export class TaskOwnershipError extends PipelineError {
  constructor(taskId: string, workerId: string) {
    super("TASK_OWNERSHIP", `Task ${taskId} is not PROCESSING under worker ${workerId}`);
  }
}

// ---------------------------------------------------------------------------
// Render-time failures. These are recorded on the task, never thrown to callers.
// ---------------------------------------------------------------------------

export type TaskErrorKind = "RenderTimeout" | "RenderError" | "StorageError" | "Abandoned";

export class RenderTimeoutError extends Error {
  readonly kind = "RenderTimeout" satisfies TaskErrorKind;

  constructor(readonly timeoutMs: number) {
    super("timeout");
    this.name = "RenderTimeoutError";
  }
}

export class RenderError extends Error {
  readonly kind = "RenderError" satisfies TaskErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "RenderError";
  }
}

export class StorageError extends Error {
  readonly kind = "StorageError" satisfies TaskErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Map anything a render attempt threw to the reason stored on the task. */
export function classifyTaskError(e: unknown): { kind: TaskErrorKind; message: string } {
  if (e instanceof RenderTimeoutError || e instanceof RenderError || e instanceof StorageError) {
    return { kind: e.kind, message: e.message };
  }
  return { kind: "RenderError", message: errorMessage(e) };
}
