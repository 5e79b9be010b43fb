import { randomUUID } from "node:crypto";
import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import type { BiasAnalysisEngine } from "../analysis/bias-analysis.engine";
import { logContext, type Logger } from "../config/logger";
import type { RateLimiter } from "../shared/utils/rate-limit";

interface AnalysisControllerDeps {
  engine: BiasAnalysisEngine;
  logger: Logger;
  rateLimiter: RateLimiter;
}

const analyzeBodySchema = z.object({
  text: z.string({ required_error: "text is required" }),
  method: z.string().optional(),
  sector: z.string().optional(),
  includeRewrite: z.boolean().optional(),
  includeResearchContext: z.boolean().optional(),
});

const rewriteBodySchema = z.object({
  text: z.string({ required_error: "text is required" }),
});

function requestIdOf(response: Response): string {
  const value = response.getHeader("x-request-id");
  return typeof value === "string" ? value : "";
}

export function buildAnalysisController(deps: AnalysisControllerDeps): Router {
  const router = Router();

  router.use((request: Request, response: Response, next: NextFunction) => {
    const incoming = request.header("x-request-id")?.trim();
    response.setHeader("x-request-id", incoming || randomUUID());
    next();
  });

  const rateLimit = (request: Request, response: Response, next: NextFunction): void => {
    const decision = deps.rateLimiter.checkAndConsume(request.ip ?? "unknown");
    if (decision.allowed) {
      next();
      return;
    }
    logContext(deps.logger, "warn", "http.rate_limited", {
      request_id: requestIdOf(response),
      route: request.path,
      ok: false,
      error_code: "rate_limited",
    });
    response.setHeader("Retry-After", String(decision.retryAfterSeconds));
    response.status(429).json({
      ok: false,
      error: "Too many requests",
      error_code: "rate_limited",
    });
  };

  router.get("/methods", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, methods: deps.engine.listMethods() });
  });

  router.get("/sectors", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, sectors: deps.engine.listSectors() });
  });

  router.post("/analyze", rateLimit, (request: Request, response: Response) => {
    const requestId = requestIdOf(response);
    const parsed = analyzeBodySchema.safeParse(request.body);
    if (!parsed.success) {
      response.status(400).json({
        ok: false,
        error: "Invalid request body",
        error_code: "invalid_body",
        details: parsed.error.flatten(),
      });
      return;
    }

    try {
      const outcome = deps.engine.analyze(parsed.data);
      if (!outcome.ok) {
        logContext(deps.logger, "info", "http.analyze.rejected", {
          request_id: requestId,
          route: "/api/analyze",
          text_length: parsed.data.text.length,
          ok: false,
          error_code: outcome.error_code,
        });
        response.status(400).json({
          ok: false,
          error: outcome.message,
          error_code: outcome.error_code,
        });
        return;
      }
      logContext(deps.logger, "info", "http.analyze.completed", {
        request_id: requestId,
        route: "/api/analyze",
        method: outcome.result.method,
        sector: outcome.result.sectorComparison?.sector,
        text_length: parsed.data.text.length,
        bias_score: outcome.result.biasScore,
        flagged_terms: outcome.result.flaggedTerms.length,
        ok: true,
      });
      response.status(200).json({ ok: true, result: outcome.result });
    } catch (error) {
      deps.logger.error("http.analyze.failed", {
        request_id: requestId,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      response.status(500).json({ ok: false, error: "Internal server error" });
    }
  });

  router.post("/rewrite", rateLimit, (request: Request, response: Response) => {
    const requestId = requestIdOf(response);
    const parsed = rewriteBodySchema.safeParse(request.body);
    if (!parsed.success) {
      response.status(400).json({
        ok: false,
        error: "Invalid request body",
        error_code: "invalid_body",
        details: parsed.error.flatten(),
      });
      return;
    }

    try {
      const outcome = deps.engine.rewrite(parsed.data.text);
      if (!outcome.ok) {
        response.status(400).json({
          ok: false,
          error: outcome.message,
          error_code: outcome.error_code,
        });
        return;
      }
      logContext(deps.logger, "info", "http.rewrite.completed", {
        request_id: requestId,
        route: "/api/rewrite",
        text_length: parsed.data.text.length,
        ok: true,
      }, {
        changes: outcome.output.changes.length,
      });
      response.status(200).json({ ok: true, ...outcome.output });
    } catch (error) {
      deps.logger.error("http.rewrite.failed", {
        request_id: requestId,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      response.status(500).json({ ok: false, error: "Internal server error" });
    }
  });

  return router;
}
