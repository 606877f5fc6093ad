/**
 * Roster Plugin - season rosters and the global config tree
 *
 * Provides:
 * - ConfigStore: loads data/global and data/seasons/<id>, answers verification-id lookups
 * - StagingArea: upload → diff → commit/cancel for rosters and special-member assignments
 * - ConfigFileService: whitelisted JSON editor for the admin API
 * - /config status|diff|commit|cancel|reload|upload
 * - Admin routes under /api/config and /api/staging
 */

import * as path from "path";
import type { PluginContext, PluginAPI, PluginLogger } from "../../src/types/Plugin.js";
import type { LibAPI } from "../lib/index.js";
import { ConfigStore } from "./services/ConfigStore.js";
import { StagingArea } from "./services/StagingArea.js";
import { ConfigFileService } from "./services/ConfigFileService.js";
import { createConfigRouter, createStagingRouter } from "./api/index.js";

export interface RosterPluginAPI extends PluginAPI {
  version: string;
  configStore: ConfigStore;
  stagingArea: StagingArea;
  configFiles: ConfigFileService;
  lib: LibAPI;
}

export async function onLoad(context: PluginContext): Promise<RosterPluginAPI> {
  const { logger, dependencies, env, apiManager, pluginPath } = context;

  const lib = dependencies.get("lib") as LibAPI | undefined;
  if (!lib) throw new Error("roster requires lib plugin");

  const configStore = new ConfigStore(path.resolve(env.DATA_DIR));
  const report = await configStore.loadAll();
  if (report.globalErrors.length > 0) {
    logger.warn(`${report.globalErrors.length} global config file(s) fell back to defaults`);
  }

  const stagingArea = new StagingArea({ store: configStore, timeoutSeconds: env.STAGING_TIMEOUT_SECONDS });
  const configFiles = new ConfigFileService(configStore);

  const api: RosterPluginAPI = {
    version: "1.0.0",
    configStore,
    stagingArea,
    configFiles,
    lib,
  };

  apiManager.registerRouter({
    pluginName: "roster",
    prefix: "/config",
    router: createConfigRouter(api),
    swaggerPaths: [path.join(pluginPath, "api", "*.ts")],
    bodyLimit: "5mb",
  });
  apiManager.registerRouter({
    pluginName: "roster",
    prefix: "/staging",
    router: createStagingRouter(api),
    bodyLimit: "5mb",
  });

  logger.info(`✅ Roster plugin loaded (${report.seasons.length} seasons from ${configStore.dataDir})`);
  return api;
}

export async function onDisable(logger: PluginLogger, api: RosterPluginAPI): Promise<void> {
  api.stagingArea.dispose();
  logger.info("🛑 Roster plugin unloaded");
}

export const commands = "./commands";
