import { Router, type Router as ExpressRouter } from "express";
import { z } from "zod";
import type { LocalObjectStore } from "./localObjectStore";

const SignedQuerySchema = z.object({
  expires: z.coerce.number().int().nonnegative(),
  signature: z.string().regex(/^[0-9a-f]{64}$/),
});

const FAILURE_STATUS = {
  NOT_FOUND: 404,
  EXPIRED: 403,
  INVALID_SIGNATURE: 403,
} as const;

/**
 * GET /api/objects/:name?expires=&signature=
 * Read-only; only URLs minted by LocalObjectStore.getTemporaryUrl resolve.
 */
export function createObjectsRouter(store: LocalObjectStore): ExpressRouter {
  const router: ExpressRouter = Router();

  router.get("/:name", (req, res, next) => {
    const query = SignedQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(403).json({ ok: false, error: "Missing or invalid signature" });
      return;
    }

    store
      .readSigned(req.params.name, query.data.expires, query.data.signature)
      .then((result) => {
        if (!result.ok) {
          res
            .status(FAILURE_STATUS[result.reason])
            .json({ ok: false, error: result.reason });
          return;
        }

        res.setHeader("Content-Type", result.object.contentType);
        res.setHeader("Cache-Control", "private, max-age=3600");
        res.status(200).send(result.object.bytes);
      })
      .catch(next);
  });

  return router;
}
