/**
 * @swagger
 * /api/structure/roles/sync:
 *   post:
 *     summary: Create or update every configured role
 *     description: Global roles, the default member role and one member role per season
 *     tags: [Structure]
 *     responses:
 *       200:
 *         description: Per-role outcome
 * /api/structure/seasons/{seasonId}/sync:
 *   post:
 *     summary: Create or update a season's category and channels
 *     tags: [Structure]
 *     parameters:
 *       - in: path
 *         name: seasonId
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Per-channel outcome
 *       404:
 *         description: Season is not loaded
 * /api/structure/assignments/sync:
 *   post:
 *     summary: Give verified members their special roles
 *     tags: [Structure]
 *     responses:
 *       200:
 *         description: Members updated and ids not yet bound
 *       503:
 *         description: Verification plugin is not loaded
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import type { GuildStructureService } from "../services/GuildStructureService.js";

export interface StructureApiDependencies {
  service: Pick<GuildStructureService, "syncRoles" | "syncSeason" | "syncAssignments" | "canSyncAssignments">;
}

export function createStructureRoutes(deps: StructureApiDependencies): Router {
  const router = Router({ mergeParams: true });

  router.post("/roles/sync", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await deps.service.syncRoles() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/seasons/:seasonId/sync", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const seasonId = req.params.seasonId ?? "";
      res.json({ success: true, data: await deps.service.syncSeason(seasonId) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/assignments/sync", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      if (!deps.service.canSyncAssignments) {
        res.status(503).json({ success: false, error: { code: "VERIFICATION_DISABLED", message: "Assignment sync needs the verification plugin" } });
        return;
      }
      res.json({ success: true, data: await deps.service.syncAssignments() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
