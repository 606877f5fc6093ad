/**
 * @swagger
 * /api/users:
 *   get:
 *     summary: List tracked users
 *     tags: [Users]
 *     parameters:
 *       - in: query
 *         name: season
 *         schema:
 *           type: string
 *         description: Only users holding an id for this season
 *     responses:
 *       200:
 *         description: Users sorted by Discord id
 * /api/users/export:
 *   get:
 *     summary: Download the user database as JSON
 *     tags: [Users]
 *     responses:
 *       200:
 *         description: user_database.json
 * /api/users/{discordId}:
 *   get:
 *     summary: One tracked user
 *     tags: [Users]
 *     parameters:
 *       - in: path
 *         name: discordId
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: The user
 *       404:
 *         description: Not tracked
 * /api/users/{discordId}/revoke:
 *   post:
 *     summary: Revoke a verification (id bindings are kept)
 *     tags: [Users]
 *     parameters:
 *       - in: path
 *         name: discordId
 *         required: true
 *         schema:
 *           type: string
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               reason:
 *                 type: string
 *     responses:
 *       200:
 *         description: The revoked user
 *       404:
 *         description: Not tracked
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { getAdminIdentity } from "../../../src/core/ApiManager.js";
import { validateBody, validateQuery } from "../../../src/utils/validate.js";
import type { VerificationApiDependencies } from "./index.js";

const ListQuerySchema = z.object({
  season: z.string().trim().min(1).optional(),
});

const RevokeBodySchema = z.object({
  reason: z.string().trim().max(500).optional(),
});

function notTracked(res: Response, discordId: string): void {
  res.status(404).json({ success: false, error: { code: "USER_NOT_FOUND", message: `No tracked user ${discordId}` } });
}

export function createUserRoutes(deps: VerificationApiDependencies): Router {
  const router = Router({ mergeParams: true });

  router.get("/", validateQuery(ListQuerySchema), (req: Request, res: Response, next: NextFunction) => {
    try {
      const { season } = ListQuerySchema.parse(req.query);
      const users = season ? deps.database.getUsersBySeason(season) : deps.engine.getAllUsers();
      res.json({ success: true, data: { users, count: users.length, lastUpdated: deps.database.getLastUpdated() } });
    } catch (error) {
      next(error);
    }
  });

  router.get("/export", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.setHeader("Content-Disposition", 'attachment; filename="user_database.json"');
      res.type("application/json").send(deps.engine.exportDatabase());
    } catch (error) {
      next(error);
    }
  });

  router.get("/:discordId", (req: Request, res: Response, next: NextFunction) => {
    try {
      const discordId = req.params.discordId ?? "";
      const user = deps.engine.getUser(discordId);
      if (!user) {
        notTracked(res, discordId);
        return;
      }
      res.json({ success: true, data: user });
    } catch (error) {
      next(error);
    }
  });

  router.post("/:discordId/revoke", validateBody(RevokeBodySchema), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const discordId = req.params.discordId ?? "";
      const { reason } = RevokeBodySchema.parse(req.body ?? {});
      const actor = getAdminIdentity(req)?.username ?? "unknown";

      const user = await deps.engine.revoke(discordId, reason ?? `Revoked by ${actor}`);
      if (!user) {
        notTracked(res, discordId);
        return;
      }
      const saved = await deps.engine.saveDatabase();
      res.json({ success: true, data: { user, saved } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
