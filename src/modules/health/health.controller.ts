// src/modules/health/health.controller.ts
// Service + ledger health endpoints.

import { Router, type Request, type Response } from "express";
import type { RecordStore } from "../storage/recordStore";

export function createHealthRouter(records: RecordStore): Router {
  const router: Router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "CityWatch Online",
      mode: process.env.NODE_ENV ?? "unknown",
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  router.get("/health/ledger", async (_req: Request, res: Response) => {
    try {
      const health = await records.getStatus();
      res.status(health.ok ? 200 : 503).json({
        ...health,
        checkedAt: new Date().toISOString(),
      });
    } catch (_error) {
      // never leak stack in health endpoints
      res.status(503).json({
        ok: false,
        error: "Ledger health check failed unexpectedly.",
        checkedAt: new Date().toISOString(),
      });
    }
  });

  return router;
}
