// src/modules/complaints/complaint.controller.ts
// Purpose: HTTP handlers for citizen + authority complaint operations.

import type { NextFunction, Request, Response } from "express";
import type { ComplaintService } from "./complaint.service";

type Handler = (req: Request, res: Response, next: NextFunction) => void;

/**
 * Express 4 does not forward rejected promises; route them to the global
 * error handler explicitly.
 */
function asyncHandler(
  fn: (req: Request, res: Response) => Promise<unknown>,
): Handler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function createComplaintController(service: ComplaintService) {
  /**
   * POST /api/complaints
   */
  const submit = asyncHandler(async (req, res) => {
    const complaint = await service.submitComplaint(req.body ?? {});

    return res.status(201).json({
      ok: true,
      trackingId: complaint.trackingId,
      complaint,
    });
  });

  /**
   * GET /api/complaints/track/:trackingId
   */
  const track = asyncHandler(async (req, res) => {
    const complaint = await service.trackComplaint(req.params.trackingId);

    if (!complaint) {
      return res.status(404).json({
        ok: false,
        error: "Tracking ID not found.",
      });
    }

    return res.status(200).json({ ok: true, complaint });
  });

  /**
   * GET /api/authority/complaints?city&category&status&sort
   */
  const list = asyncHandler(async (req, res) => {
    const listing = await service.listComplaints(req.query);
    return res.status(200).json({ ok: true, ...listing });
  });

  /**
   * PATCH /api/authority/complaints/:trackingId
   */
  const update = asyncHandler(async (req, res) => {
    const complaint = await service.updateComplaint(
      req.params.trackingId,
      req.body ?? {},
    );
    return res.status(200).json({ ok: true, complaint });
  });

  const insights = asyncHandler(async (_req, res) => {
    return res
      .status(200)
      .json({ ok: true, insights: await service.getInsights() });
  });

  const bursts = asyncHandler(async (_req, res) => {
    return res
      .status(200)
      .json({ ok: true, bursts: await service.getBurstEvents() });
  });

  return { submit, track, list, update, insights, bursts };
}
