/**
 * Verification API - admin user database routes and the public web verification entry
 */

import { Router } from "express";
import type { VerificationPluginAPI } from "../index.js";
import { createUserRoutes } from "./users.js";

export { createVerifyRoutes, createVerifyCallbackHandler } from "./verify.js";

export type VerificationApiDependencies = Pick<VerificationPluginAPI, "engine" | "database">;

/**
 * Admin router mounted at /api/users
 */
export function createUsersRouter(deps: VerificationApiDependencies): Router {
  const router = Router();
  router.use("/", createUserRoutes(deps));
  return router;
}
