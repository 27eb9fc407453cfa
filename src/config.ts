import { z } from "zod";

// Env values arrive as strings; blank means "not set".
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const envInt = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const envBool = (fallback: boolean) =>
  z.preprocess((v) => {
    const s = blankToUndefined(v);
    if (typeof s !== "string") return s;
    const lowered = s.toLowerCase();
    return lowered === "1" || lowered === "true" || lowered === "yes";
  }, z.boolean().default(fallback));

const envList = z.preprocess(
  blankToUndefined,
  z
    .string()
    .default("")
    .transform((s) =>
      s
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    )
);

const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());

const EnvSchema = z.object({
  ENVIRONMENT: z.preprocess(blankToUndefined, z.string().default("development")),

  PORT: envInt(8000, 1),
  BIND_HOST: z.preprocess(blankToUndefined, z.string().default("127.0.0.1")),
  PUBLIC_BASE_URL: optionalUrl,
  CORS_ORIGINS: envList,

  TASKS_DB_PATH: z.preprocess(blankToUndefined, z.string().default(".data/og-tasks.db")),
  TASK_AUDIT_LOG: z.preprocess(blankToUndefined, z.string().default("")),
  TASK_POLL_INTERVAL_MS: envInt(1_000, 10),
  TASK_LEASE_GRACE_MS: envInt(30_000),
  TASK_WORKER_ID: z.preprocess(blankToUndefined, z.string().optional()),

  RENDER_IN_PROCESS: envBool(true),
  RENDER_WORKERS: envInt(4, 1),
  RENDER_TIMEOUT_MS: envInt(30_000, 100),
  CHROME_EXECUTABLE_PATH: z.preprocess(blankToUndefined, z.string().optional()),

  DEFAULT_TTL_HOURS: envInt(24, 1),
  DEFAULT_WIDTH: envInt(1200, 1),
  DEFAULT_HEIGHT: envInt(630, 1),
  MAX_WIDTH: envInt(3840, 1),
  MAX_HEIGHT: envInt(2160, 1),

  ALLOWED_SCREENSHOT_DOMAINS: envList,
  CONTACT_EMAIL: z.preprocess(blankToUndefined, z.string().default("ops@example.com")),

  AWS_REGION: z.preprocess(blankToUndefined, z.string().default("us-east-1")),
  AWS_ENDPOINT_URL: optionalUrl,
  AWS_ACCESS_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  AWS_SECRET_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  AWS_BUCKET_NAME: z.preprocess(blankToUndefined, z.string().default("og-images")),
  S3_KEY_PREFIX: z.preprocess(blankToUndefined, z.string().default("og_images")),
  CDN_URL: optionalUrl,
});

/** Everything the pipeline facade needs to validate and default a request. */
export interface PipelineConfig {
  defaultTtlSeconds: number;
  defaultWidth: number;
  defaultHeight: number;
  maxWidth: number;
  maxHeight: number;
  allowedDomains: string[];
  contactEmail: string;
}

export interface AppConfig {
  environment: string;
  server: {
    port: number;
    bindHost: string;
    publicBaseUrl?: string;
    corsOrigins: string[];
  };
  tasks: {
    dbPath: string;
    auditLogPath: string;
    pollIntervalMs: number;
    leaseGraceMs: number;
    /** Prefix for worker ids in the ledger; defaults to one derived from the pid. */
    workerId?: string;
  };
  render: {
    inProcess: boolean;
    workers: number;
    timeoutMs: number;
    chromeExecutablePath?: string;
  };
  pipeline: PipelineConfig;
  storage: {
    region: string;
    endpointUrl?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    bucket: string;
    keyPrefix: string;
    cdnUrl?: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    environment: e.ENVIRONMENT,
    server: {
      port: e.PORT,
      bindHost: e.BIND_HOST,
      publicBaseUrl: e.PUBLIC_BASE_URL,
      corsOrigins: e.CORS_ORIGINS,
    },
    tasks: {
      dbPath: e.TASKS_DB_PATH,
      auditLogPath: e.TASK_AUDIT_LOG,
      pollIntervalMs: e.TASK_POLL_INTERVAL_MS,
      leaseGraceMs: e.TASK_LEASE_GRACE_MS,
      workerId: e.TASK_WORKER_ID,
    },
    render: {
      inProcess: e.RENDER_IN_PROCESS,
      workers: e.RENDER_WORKERS,
      timeoutMs: e.RENDER_TIMEOUT_MS,
      chromeExecutablePath: e.CHROME_EXECUTABLE_PATH,
    },
    pipeline: {
      defaultTtlSeconds: e.DEFAULT_TTL_HOURS * 3600,
      defaultWidth: e.DEFAULT_WIDTH,
      defaultHeight: e.DEFAULT_HEIGHT,
      maxWidth: e.MAX_WIDTH,
      maxHeight: e.MAX_HEIGHT,
      allowedDomains: e.ALLOWED_SCREENSHOT_DOMAINS.map((d) => d.toLowerCase()),
      contactEmail: e.CONTACT_EMAIL,
    },
    storage: {
      region: e.AWS_REGION,
      endpointUrl: e.AWS_ENDPOINT_URL,
      accessKeyId: e.AWS_ACCESS_KEY,
      secretAccessKey: e.AWS_SECRET_KEY,
      bucket: e.AWS_BUCKET_NAME,
      keyPrefix: e.S3_KEY_PREFIX,
      cdnUrl: e.CDN_URL,
    },
  };
}
