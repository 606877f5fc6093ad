/**
 * @swagger
 * /api/staging:
 *   get:
 *     summary: Staged configuration summary and diff
 *     tags: [Staging]
 *     responses:
 *       200:
 *         description: Summary, staged seasons and the diff against loaded config
 *   delete:
 *     summary: Discard staged configuration
 *     tags: [Staging]
 *     responses:
 *       200:
 *         description: Whether anything was discarded
 * /api/staging/seasons/{seasonId}:
 *   post:
 *     summary: Stage a season roster
 *     description: Body is a users.json payload, either an array of {Name, DiscordId, Email?} or {users:[...]}
 *     tags: [Staging]
 *     parameters:
 *       - in: path
 *         name: seasonId
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Roster staged
 *       400:
 *         description: Invalid roster (details list every problem)
 * /api/staging/assignments:
 *   post:
 *     summary: Stage special-member assignments
 *     description: Body is an assignments.json payload {roles, maintainers}
 *     tags: [Staging]
 *     responses:
 *       200:
 *         description: Assignments staged
 * /api/staging/commit:
 *   post:
 *     summary: Commit staged configuration to disk
 *     tags: [Staging]
 *     responses:
 *       200:
 *         description: Applied changes and any entries that failed and remain staged
 *       409:
 *         description: Nothing is staged
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { getAdminIdentity } from "../../../src/core/ApiManager.js";
import type { RosterApiDependencies } from "./index.js";

/** express.json() has already parsed the body; staging takes the raw JSON text */
function bodyText(req: Request): string {
  return typeof req.body === "string" ? req.body : JSON.stringify(req.body ?? null);
}

export function createStagingRoutes(deps: RosterApiDependencies): Router {
  const router = Router({ mergeParams: true });

  const snapshot = () => ({
    hasStaged: deps.stagingArea.hasStaged(),
    summary: deps.stagingArea.getSummary(),
    seasons: deps.stagingArea.getStagedSeasons(),
    stagedAt: deps.stagingArea.getStagedAt()?.toISOString() ?? null,
    stagedBy: deps.stagingArea.getStagedBy(),
    diff: deps.stagingArea.getDiff(),
  });

  router.get("/", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: snapshot() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/seasons/:seasonId", (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getAdminIdentity(req)?.username;
      deps.stagingArea.stageSeasonUsers(req.params.seasonId ?? "", bodyText(req), actor);
      res.json({ success: true, data: snapshot() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/assignments", (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = getAdminIdentity(req)?.username;
      deps.stagingArea.stageSpecialMembers(bodyText(req), actor);
      res.json({ success: true, data: snapshot() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/commit", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await deps.stagingArea.commit();
      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/", (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: { discarded: deps.stagingArea.clear() } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
