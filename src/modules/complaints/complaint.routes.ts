import { Router, type Router as ExpressRouter } from "express";
import { requireAuthorityToken } from "../../middleware/requireAuthorityToken";
import { setRequestActor } from "@/lib/observability/request-context";
import type { ComplaintService } from "./complaint.service";
import { createComplaintController } from "./complaint.controller";

/**
 * Citizen routes, mounted at /api/complaints
 */
export function createCitizenRouter(service: ComplaintService): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createComplaintController(service);

  router.use((_req, _res, next) => {
    setRequestActor("citizen");
    next();
  });

  router.post("/", controller.submit);
  router.get("/track/:trackingId", controller.track);

  return router;
}

/**
 * Authority routes, mounted at /api/authority
 */
export function createAuthorityRouter(
  service: ComplaintService,
  adminToken: string,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createComplaintController(service);

  router.use(requireAuthorityToken(adminToken));

  router.get("/complaints", controller.list);
  router.patch("/complaints/:trackingId", controller.update);
  router.get("/insights", controller.insights);
  router.get("/bursts", controller.bursts);

  return router;
}
