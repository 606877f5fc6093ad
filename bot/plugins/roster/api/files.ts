/**
 * @swagger
 * /api/config/files:
 *   get:
 *     summary: List editable config files
 *     tags: [Config]
 *     responses:
 *       200:
 *         description: Whitelisted files that exist, with size and modification time
 * /api/config/files/{path}:
 *   get:
 *     summary: Read a config file
 *     tags: [Config]
 *     parameters:
 *       - in: path
 *         name: path
 *         required: true
 *         description: e.g. global/roles.json or seasons/2025E/users.json
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Parsed JSON content
 *       404:
 *         description: File does not exist
 *   put:
 *     summary: Replace a config file
 *     description: Validated against the file's schema, written atomically, then the config is reloaded
 *     tags: [Config]
 *     parameters:
 *       - in: path
 *         name: path
 *         required: true
 *         schema:
 *           type: string
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [content]
 *             properties:
 *               content: {}
 *     responses:
 *       200:
 *         description: Load report of the reload
 *       400:
 *         description: Not an editable file, or content failed validation
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { validateBody } from "../../../src/utils/validate.js";
import { getAdminIdentity } from "../../../src/core/ApiManager.js";
import type { RosterApiDependencies } from "./index.js";

const WriteFileSchema = z
  .object({ content: z.unknown() })
  .refine((body) => body.content !== undefined, { message: "content is required", path: ["content"] });

export function createConfigFileRoutes(deps: RosterApiDependencies): Router {
  const router = Router({ mergeParams: true });

  router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await deps.configFiles.listFiles() });
    } catch (error) {
      next(error);
    }
  });

  router.get("/*", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const file = await deps.configFiles.readFile(req.params[0] ?? "");
      res.json({ success: true, data: file });
    } catch (error) {
      next(error);
    }
  });

  router.put("/*", validateBody(WriteFileSchema), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { content } = WriteFileSchema.parse(req.body);
      const actor = getAdminIdentity(req)?.username ?? "unknown";
      const report = await deps.configFiles.writeFile(req.params[0] ?? "", content, actor);
      res.json({ success: true, data: report });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
