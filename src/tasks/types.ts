import type { TaskErrorKind } from "../errors.js";

export type TaskState = "PENDING" | "PROCESSING" | "COMPLETED" | "FAILED";

export const ACTIVE_STATES: readonly TaskState[] = ["PENDING", "PROCESSING"];

export interface RenderTaskRecord {
  id: string;
  fingerprint: string;
  url: string;
  width: number;
  height: number;
  ttl_seconds: number;
  state: TaskState;
  image_url: string | null;
  error: string | null;
  error_kind: TaskErrorKind | null;
  owner: string | null;
  lease_until_ms: number | null;
  created_at_ms: number;
  updated_at_ms: number;
}

export interface NewTaskParams {
  fingerprint: string;
  url: string;
  width: number;
  height: number;
  ttlSeconds: number;
}

export interface ClaimedTask {
  task: RenderTaskRecord;
  leaseUntilMs: number;
}

export interface AcquireResult {
  task: RenderTaskRecord;
  isNewOwner: boolean;
}
