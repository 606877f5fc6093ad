/**
 * @swagger
 * /verify/{verificationId}:
 *   get:
 *     summary: Start web verification for a verification id
 *     description: Checks the id, then redirects to Discord so the account can be identified
 *     tags: [Verification]
 *     security: []
 *     parameters:
 *       - in: path
 *         name: verificationId
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       302:
 *         description: Redirect to Discord's authorize page
 *       404:
 *         description: The id is not in any active season roster
 *       409:
 *         description: The id is already bound to an account
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import type { CallbackHandler } from "../../auth/api/auth.js";
import type { VerificationFlow } from "../services/VerificationFlow.js";
import type { VerificationEngine } from "../services/VerificationEngine.js";
import { outcomeResponse } from "../utils/outcome.js";

export interface VerifyRouteDependencies {
  engine: Pick<VerificationEngine, "precheck">;
  /** Discord authorize URL bound to a verify state */
  createAuthorizeUrl: (verificationId: string) => string | null;
}

export function createVerifyRoutes(deps: VerifyRouteDependencies): Router {
  const router = Router({ mergeParams: true });

  router.get("/:verificationId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const verificationId = (req.params.verificationId ?? "").trim();
      const failure = await deps.engine.precheck(verificationId);
      if (failure) {
        res.status(failure.code === "NOT_FOUND" ? 404 : 409).json({ success: false, error: failure });
        return;
      }

      const url = deps.createAuthorizeUrl(verificationId);
      if (!url) {
        res.status(503).json({ success: false, error: { code: "OAUTH_DISABLED", message: "Discord OAuth is not configured" } });
        return;
      }
      res.redirect(url);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Finishes a "verify" OAuth round trip: the state carries the claimed id
 */
export function createVerifyCallbackHandler(flow: Pick<VerificationFlow, "verify">): CallbackHandler {
  return async (user, state) => {
    if (!state.verificationId) {
      return { status: 400, body: { success: false, error: { code: "INVALID_STATE", message: "Verification link is missing its id" } } };
    }
    return outcomeResponse(await flow.verify(user.id, state.verificationId));
  };
}
