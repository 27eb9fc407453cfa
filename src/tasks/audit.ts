import fs from "node:fs";
import path from "node:path";
import type { TaskErrorKind } from "../errors.js";

export type TaskAuditEvent =
  | { type: "TASK_CREATED"; taskId: string; fingerprint: string; url: string }
  | { type: "TASK_CLAIMED"; taskId: string; fingerprint: string; workerId: string; leaseUntilMs: number }
  | { type: "TASK_COMPLETED"; taskId: string; fingerprint: string; workerId: string; imageUrl: string; ms: number }
  | {
      type: "TASK_FAILED";
      taskId: string;
      fingerprint: string;
      workerId: string;
      kind: TaskErrorKind;
      error: string;
      ms: number;
    }
  | { type: "TASK_ABANDONED"; taskId: string; workerId: string };

export type TaskAuditSink = (event: TaskAuditEvent) => void;

/** Append-only JSONL audit log. An empty path gives a sink that drops events. */
export function createTaskAuditLog(filePath: string): TaskAuditSink {
  if (!filePath) return () => undefined;

  const file = path.resolve(process.cwd(), filePath);
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  return (event) => {
    const row = { ts: Date.now(), ...event };
    fs.appendFileSync(file, JSON.stringify(row) + "\n", { encoding: "utf8" });
  };
}
