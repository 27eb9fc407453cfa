import crypto from "node:crypto";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import { z } from "zod";
import { PipelineError, errorMessage, type PipelineErrorCode } from "../errors.js";
import type { OgImagePipeline } from "../pipeline.js";

export interface HttpOptions {
  /** Base for check_status_url; derived from the request when unset. */
  publicBaseUrl?: string;
  corsOrigins: string[];
  rateLimitPerMinute?: number;
}

const queryBool = z
  .union([z.string(), z.boolean()])
  .transform((v) => (typeof v === "boolean" ? v : ["1", "true", "yes"].includes(v.toLowerCase())));

const optionalInt = z.preprocess(
  (v) => (v === "" ? undefined : v),
  z.coerce.number({ invalid_type_error: "must be a number" }).int().optional()
);

const GenerateQuerySchema = z.object({
  url: z.string({ required_error: "url is required" }).min(1, "url is required"),
  ttl: optionalInt,
  width: optionalInt,
  height: optionalInt,
  force_refresh: queryBool.optional(),
});

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  INVALID_REQUEST: 400,
  TASK_NOT_FOUND: 404,
  STORAGE_UNAVAILABLE: 503,
  DEDUP_FAILED: 503,
  TASK_OWNERSHIP: 500,
};

function getClientIp(req: Request): string {
  const xf = (req.headers["x-forwarded-for"] || "").toString();
  return (xf ? xf.split(",")[0].trim() : req.socket.remoteAddress) || "unknown";
}

function baseUrl(req: Request, opts: HttpOptions): string {
  if (opts.publicBaseUrl) return opts.publicBaseUrl.replace(/\/$/, "");
  return `${req.protocol}://${req.get("host") ?? "localhost"}`;
}

export function createApp(pipeline: OgImagePipeline, opts: HttpOptions): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(helmet());

  // -------------------------------------------------------------------------
  // Logging (request id + IP + UA), one JSON line per response
  // -------------------------------------------------------------------------
  app.use((req: Request, res: Response, next: NextFunction) => {
    const rid = crypto.randomUUID();
    const ip = getClientIp(req);
    const ua = (req.headers["user-agent"] || "unknown").toString();
    const start = Date.now();
    res.on("finish", () => {
      console.log(
        JSON.stringify({ rid, ip, ua, method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start })
      );
    });
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: opts.rateLimitPerMinute ?? 120,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // -------------------------------------------------------------------------
  // CORS: "*" allows any origin, otherwise only the listed ones
  // -------------------------------------------------------------------------
  const allowAny = opts.corsOrigins.includes("*");
  const allowed = new Set(opts.corsOrigins);
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && (allowAny || allowed.has(origin))) {
      res.setHeader("Access-Control-Allow-Origin", allowAny ? "*" : origin);
      res.setHeader("Access-Control-Allow-Methods", "GET,OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type");
      res.setHeader("Access-Control-Max-Age", "86400");
      res.setHeader("Vary", "Origin");
    }
    if (req.method === "OPTIONS") return res.sendStatus(204);
    next();
  });

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------
  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get("/generate", (req: Request, res: Response) => {
    const parsed = GenerateQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      return res.status(400).json({ error: message });
    }
    const q = parsed.data;

    const result = pipeline.requestImage({
      url: q.url,
      width: q.width,
      height: q.height,
      ttlHours: q.ttl,
      forceRefresh: q.force_refresh,
    });

    if (result.status === "cached") {
      return res.status(200).json({ status: "cached", image_url: result.imageUrl });
    }
    return res.status(202).json({
      status: "processing",
      task_id: result.taskId,
      check_status_url: `${baseUrl(req, opts)}/status/${result.taskId}`,
    });
  });

  app.get("/status/:taskId", (req: Request, res: Response) => {
    const s = pipeline.getStatus(req.params.taskId);
    res.json({ status: s.status, image_url: s.imageUrl, error_message: s.errorMessage });
  });

  app.get("/image/:taskId", (req: Request, res: Response) => {
    res.redirect(307, pipeline.getImageUrl(req.params.taskId));
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Express spots error handlers by their four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof PipelineError) {
      if (err.code === "DEDUP_FAILED") res.setHeader("Retry-After", "1");
      return res.status(STATUS_BY_CODE[err.code]).json({ error: err.message });
    }
    console.error("[og-server] unhandled error:", errorMessage(err));
    return res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
