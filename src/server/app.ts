import express, { type NextFunction, type Request, type Response } from "express";

import type { RedactionPipeline } from "../core/pipeline";
import { COMPLIANCE_CLASSES } from "../types/categories";
import { RequestSchema } from "../types/schemas";
import { describeError } from "../core/errors";
import { silentLogger, type Logger } from "../util/logger";
import { toAnonymizeResponse, toDetectResponse, toHealthResponse } from "./wire";

export const SERVICE_NAME = "pii-redaction-service";
export const SERVICE_VERSION = "1.0.0";

export interface AppOptions {
  bodyLimit?: string;
  logger?: Logger;
}

/** body-parser tags its errors with a `type` string */
function bodyErrorType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return undefined;
}

export function createApp(pipeline: RedactionPipeline, opts: AppOptions = {}) {
  const logger = opts.logger ?? silentLogger;
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: opts.bodyLimit ?? "512kb" }));

  // ---- Routes ----
  app.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  // degraded mode is still healthy: the pattern layers keep redacting
  app.get("/health", (_req: Request, res: Response) => {
    res.json(toHealthResponse(pipeline.status()));
  });

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      mode: pipeline.mode,
      endpoints: {
        anonymize: "POST /anonymize",
        detect: "POST /detect",
        health: "GET /health",
        live: "GET /live",
      },
      compliance: COMPLIANCE_CLASSES.map((c) => c.toUpperCase()),
    });
  });

  app.post("/anonymize", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = RequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
      }
      const { text, pseudonym, language } = parsed.data;
      const result = await pipeline.anonymize(text, { pseudonym, language });
      res.json(toAnonymizeResponse(result));
    } catch (err) {
      next(err);
    }
  });

  app.post("/detect", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = RequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
      }
      const { text, pseudonym, language } = parsed.data;
      const result = await pipeline.detect(text, { pseudonym, language });
      res.json(toDetectResponse(result));
    } catch (err) {
      next(err);
    }
  });

  // ---- Error handler (no request content in logs or responses) ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const type = bodyErrorType(err);
    if (type === "entity.parse.failed") {
      return res.status(400).json({ error: "invalid_json" });
    }
    if (type === "entity.too.large") {
      return res.status(413).json({ error: "payload_too_large" });
    }
    logger.error("request_failed", { error: describeError(err) });
    res.status(500).json({ error: "internal_error" });
  });

  return app;
}
