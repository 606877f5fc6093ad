/**
 * Roster API Router Factories
 *
 * Mounted at: /api/config and /api/staging
 */

import { Router } from "express";
import { createConfigStatusRoutes } from "./config.js";
import { createConfigFileRoutes } from "./files.js";
import { createStagingRoutes } from "./staging.js";
import type { RosterPluginAPI } from "../index.js";

export type RosterApiDependencies = Pick<RosterPluginAPI, "configStore" | "stagingArea" | "configFiles">;

function deps(api: RosterPluginAPI): RosterApiDependencies {
  return { configStore: api.configStore, stagingArea: api.stagingArea, configFiles: api.configFiles };
}

export function createConfigRouter(api: RosterPluginAPI): Router {
  const router = Router({ mergeParams: true });

  // GET  /api/config
  // POST /api/config/reload
  router.use("/", createConfigStatusRoutes(deps(api)));

  // GET  /api/config/files
  // GET  /api/config/files/*
  // PUT  /api/config/files/*
  router.use("/files", createConfigFileRoutes(deps(api)));

  return router;
}

export function createStagingRouter(api: RosterPluginAPI): Router {
  const router = Router({ mergeParams: true });

  // GET    /api/staging
  // POST   /api/staging/seasons/:seasonId
  // POST   /api/staging/assignments
  // POST   /api/staging/commit
  // DELETE /api/staging
  router.use("/", createStagingRoutes(deps(api)));

  return router;
}
