import type { Request, Response, NextFunction } from "express";
import { setRequestActor } from "@/lib/observability/request-context";
import { UnauthorizedAuthorityError } from "../modules/complaints/complaint.errors";
import { constantTimeEqual } from "@/utils/signature";

/**
 * Gate for authority routes.
 *
 * Session/login mechanics live outside this service; callers present the
 * shared admin token via X-Admin-Token.
 */
export function requireAuthorityToken(adminToken: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const presented = req.header("X-Admin-Token")?.trim() ?? "";

    if (!presented || !constantTimeEqual(adminToken, presented)) {
      return next(new UnauthorizedAuthorityError());
    }

    setRequestActor("authority");
    return next();
  };
}
