/**
 * @swagger
 * /api/config:
 *   get:
 *     summary: Loaded configuration overview
 *     description: Last load report plus a summary of every season
 *     tags: [Config]
 *     responses:
 *       200:
 *         description: Load report and seasons
 * /api/config/reload:
 *   post:
 *     summary: Reload the config tree from disk
 *     tags: [Config]
 *     responses:
 *       200:
 *         description: Load report of the reload
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import type { RosterApiDependencies } from "./index.js";

export function createConfigStatusRoutes(deps: RosterApiDependencies): Router {
  const router = Router({ mergeParams: true });

  router.get("/", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const store = deps.configStore;
      const seasons = store.getAllSeasons().map((season) => ({
        seasonId: season.seasonId,
        displayName: season.displayName,
        active: season.active,
        memberRoleName: season.memberRoleName,
        users: season.roster.length,
        channels: season.channels.length,
      }));

      res.json({
        success: true,
        data: {
          report: store.getLastReport(),
          seasons,
          roles: store.getGlobalConfig().roles.map((role) => role.name),
          defaultMemberRole: store.getDefaultMemberRoleName(),
          staged: deps.stagingArea.hasStaged(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/reload", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await deps.configStore.reload();
      res.json({ success: true, data: report });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
