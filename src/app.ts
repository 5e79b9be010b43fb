import express, { Express, NextFunction, Request, Response } from "express";
import { BiasAnalysisEngine, createEngineOptions } from "./analysis/bias-analysis.engine";
import type { EnvConfig } from "./config/env";
import { createLogger, type Logger } from "./config/logger";
import { buildAnalysisController } from "./http/analysis.controller";
import type { ReferenceData } from "./shared/types/reference.types";
import { createRateLimiter } from "./shared/utils/rate-limit";

export interface AppContext {
  app: Express;
  engine: BiasAnalysisEngine;
  logger: Logger;
}

const RATE_LIMIT_WINDOW_MS = 60_000;

function errorTypeOf(error: unknown): string | null {
  if (error && typeof error === "object" && "type" in error && typeof error.type === "string") {
    return error.type;
  }
  return null;
}

export function createApp(
  env: EnvConfig,
  referenceData: ReferenceData,
  logger: Logger = createLogger({ minLevel: env.logLevel }),
): AppContext {
  const app = express();
  const engine = new BiasAnalysisEngine(referenceData, createEngineOptions(env), logger);
  const rateLimiter = createRateLimiter({
    windowMs: RATE_LIMIT_WINDOW_MS,
    maxRequests: env.rateLimitPerMinute,
  });

  app.disable("x-powered-by");
  app.use(express.json({ limit: env.jsonBodyLimit }));

  app.use((request: Request, response: Response, next: NextFunction) => {
    const startedAt = Date.now();
    response.on("finish", () => {
      logger.debug("http.request", {
        method: request.method,
        route: request.path,
        status: response.statusCode,
        latency_ms: Date.now() - startedAt,
      });
    });
    next();
  });

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/api",
    buildAnalysisController({
      engine,
      logger,
      rateLimiter,
    }),
  );

  app.use((_request: Request, response: Response) => {
    response.status(404).json({ ok: false, error: "Not found" });
  });

  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    const type = errorTypeOf(error);
    if (type === "entity.too.large") {
      response.status(413).json({
        ok: false,
        error: "Request body too large",
        error_code: "text_too_long",
      });
      return;
    }
    if (type === "entity.parse.failed") {
      response.status(400).json({
        ok: false,
        error: "Malformed JSON body",
        error_code: "invalid_body",
      });
      return;
    }
    logger.error("http.unhandled_error", {
      route: request.path,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(500).json({ ok: false, error: "Internal server error" });
  });

  return { app, engine, logger };
}
