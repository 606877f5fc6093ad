/**
 * @swagger
 * /auth/login:
 *   get:
 *     summary: Start an admin login through Discord OAuth
 *     tags: [Auth]
 *     security: []
 *     responses:
 *       302:
 *         description: Redirect to Discord's authorize page
 *       503:
 *         description: OAuth is not configured
 * /auth/callback:
 *   get:
 *     summary: Discord OAuth redirect target
 *     description: Finishes whatever the login was started for (admin session or verification)
 *     tags: [Auth]
 *     security: []
 *     parameters:
 *       - in: query
 *         name: code
 *         required: true
 *         schema:
 *           type: string
 *       - in: query
 *         name: state
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Session token, or the verification result
 *       400:
 *         description: Unknown or expired state
 *       403:
 *         description: Not an owner, maintainer or guild administrator
 * /auth/logout:
 *   post:
 *     summary: End the admin session given as Bearer token
 *     tags: [Auth]
 *     security: []
 *     responses:
 *       200:
 *         description: Whether a session was ended
 * /api/auth/me:
 *   get:
 *     summary: Who the current credentials belong to
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Admin identity
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { getAdminIdentity } from "../../../src/core/ApiManager.js";
import { createLogger } from "../../../src/core/Logger.js";
import { validateQuery } from "../../../src/utils/validate.js";
import type { DiscordOAuth, DiscordUser } from "../services/DiscordOAuth.js";
import type { OAuthPurpose, OAuthState, OAuthStateStore } from "../services/OAuthStateStore.js";
import type { SessionService } from "../services/SessionService.js";
import type { AdminAccess } from "../services/AdminAccess.js";

const log = createLogger("auth:api");

export interface CallbackResponse {
  status: number;
  body: unknown;
}

/** Finishes an OAuth round trip started for a given purpose */
export type CallbackHandler = (user: DiscordUser, state: OAuthState) => Promise<CallbackResponse>;

export interface AuthApiDependencies {
  /** null when DISCORD_CLIENT_ID, DISCORD_CLIENT_SECRET or WEB_BASE_URL is missing */
  oauth: DiscordOAuth | null;
  states: OAuthStateStore;
  sessions: SessionService;
  callbackHandlers: ReadonlyMap<OAuthPurpose, CallbackHandler>;
}

const CallbackQuerySchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

function oauthDisabled(res: Response): void {
  res.status(503).json({ success: false, error: { code: "OAUTH_DISABLED", message: "Discord OAuth is not configured" } });
}

function bearerToken(req: Request): string | undefined {
  const authorization = req.header("Authorization");
  return authorization?.startsWith("Bearer ") ? authorization.slice("Bearer ".length).trim() : undefined;
}

/**
 * Creates the admin-session login handler
 */
export function createAdminLoginHandler(adminAccess: AdminAccess, sessions: SessionService): CallbackHandler {
  return async (user) => {
    const access = await adminAccess.check(user.id, user.username);
    if (!access) {
      log.warn(`Admin login refused for ${user.username} (${user.id})`);
      return {
        status: 403,
        body: { success: false, error: { code: "FORBIDDEN", message: "You are not allowed into the admin panel" } },
      };
    }

    const session = sessions.create(user.id, user.username);
    return {
      status: 200,
      body: { success: true, data: { token: session.token, expiresAt: session.expiresAt, user, access } },
    };
  };
}

/**
 * Public routes: /auth/login, /auth/callback, /auth/logout
 */
export function createPublicAuthRoutes(deps: AuthApiDependencies): Router {
  const router = Router({ mergeParams: true });

  router.get("/login", (_req: Request, res: Response, next: NextFunction) => {
    try {
      if (!deps.oauth) {
        oauthDisabled(res);
        return;
      }
      res.redirect(deps.oauth.authorizeUrl(deps.states.create("admin")));
    } catch (error) {
      next(error);
    }
  });

  router.get("/callback", validateQuery(CallbackQuerySchema), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!deps.oauth) {
        oauthDisabled(res);
        return;
      }

      const { code, state } = CallbackQuerySchema.parse(req.query);
      const entry = deps.states.consume(state);
      if (!entry) {
        res.status(400).json({ success: false, error: { code: "INVALID_STATE", message: "Login link expired or already used, please start again" } });
        return;
      }

      const handler = deps.callbackHandlers.get(entry.purpose);
      if (!handler) {
        res.status(400).json({ success: false, error: { code: "INVALID_STATE", message: `No handler for ${entry.purpose} logins` } });
        return;
      }

      const user = await deps.oauth.identify(code);
      const result = await handler(user, entry);
      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  });

  router.post("/logout", (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req);
      const loggedOut = token ? deps.sessions.revoke(token) : false;
      res.json({ success: true, data: { loggedOut } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Admin routes under /api/auth
 */
export function createAdminAuthRoutes(deps: AuthApiDependencies): Router {
  const router = Router({ mergeParams: true });

  router.get("/me", (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req);
      const session = token ? deps.sessions.get(token) : undefined;
      res.json({
        success: true,
        data: {
          identity: getAdminIdentity(req),
          expiresAt: session?.expiresAt ?? null,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
