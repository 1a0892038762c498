// src/app.ts: Express application factory with request correlation and structured logging

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import cors from "cors";
import { randomUUID } from "crypto";

import {
  createAuthorityRouter,
  createCitizenRouter,
} from "./modules/complaints/complaint.routes";
import { ComplaintService } from "./modules/complaints/complaint.service";
import { createHealthRouter } from "./modules/health/health.controller";
import { createObjectsRouter } from "./modules/storage/objects.routes";
import type { RecordStore } from "./modules/storage/recordStore";
import type { LocalObjectStore } from "./modules/storage/localObjectStore";

import { withRequestContext } from "@/lib/observability/request-context";
import { log } from "@/lib/observability/logger";
import { DomainError } from "@/lib/errors/domain-error";

export type AppDeps = {
  records: RecordStore;
  objects: LocalObjectStore;
  adminToken: string;
  corsOrigin: string;
  service?: ComplaintService;
};

export function createApp(deps: AppDeps): Express {
  const app: Express = express();

  const service =
    deps.service ??
    new ComplaintService({ records: deps.records, objects: deps.objects });

  app.set("etag", false);

  ////////////////////////////////////////////////////////////////
  // Core middleware
  ////////////////////////////////////////////////////////////////

  // base64 evidence images travel inside the JSON body
  app.use(express.json({ limit: "10mb" }));

  app.use(
    cors({
      origin: deps.corsOrigin,
      credentials: true,
      methods: ["GET", "POST", "PATCH", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Admin-Token", "X-Request-Id"],
    }),
  );

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") ?? randomUUID();

    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    withRequestContext(() => {
      log("INFO", "HTTP_REQUEST_STARTED", {
        method: req.method,
        path: req.originalUrl,
      });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    }, requestId);
  });

  ////////////////////////////////////////////////////////////////
  // Root route
  ////////////////////////////////////////////////////////////////

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      service: "citywatch-backend",
      health: "/api/health",
      routes: [
        "/api/complaints",
        "/api/complaints/track/:trackingId",
        "/api/authority/complaints",
        "/api/authority/insights",
        "/api/authority/bursts",
        "/api/objects/:name",
        "/api/health",
        "/api/health/ledger",
      ],
    });
  });

  ////////////////////////////////////////////////////////////////
  // Domain routes
  ////////////////////////////////////////////////////////////////

  app.use("/api", createHealthRouter(deps.records));
  app.use("/api/complaints", createCitizenRouter(service));
  app.use("/api/authority", createAuthorityRouter(service, deps.adminToken));
  app.use("/api/objects", createObjectsRouter(deps.objects));

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "Route not found" });
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use(
    (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof DomainError) {
        if (err.status >= 500) {
          log("ERROR", "HTTP_REQUEST_FAILED", {
            code: err.code,
            message: err.message,
          });
        }

        return res.status(err.status).json({
          ok: false,
          error: err.message,
          code: err.code,
          ...(err.details ? { details: err.details } : {}),
        });
      }

      const error = err instanceof Error ? err : new Error(String(err));

      log("ERROR", "HTTP_REQUEST_FAILED", {
        message: error.message,
        stack:
          process.env.NODE_ENV === "production" ? undefined : error.stack,
      });

      return res.status(500).json({
        ok: false,
        error: "Internal Server Error",
      });
    },
  );

  return app;
}
