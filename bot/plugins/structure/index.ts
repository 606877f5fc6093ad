/**
 * Structure Plugin - keeps guild roles and season channels in line with the config
 *
 * Provides:
 * - GuildStructureService: role sync, season category/channel sync, special-role push
 * - /roles sync|assignments, /season list|sync
 * - Admin routes under /api/structure
 */

import * as path from "path";
import type { PluginContext, PluginAPI, PluginLogger } from "../../src/types/Plugin.js";
import type { LibAPI } from "../lib/index.js";
import type { RosterPluginAPI } from "../roster/index.js";
import type { VerificationPluginAPI } from "../verification/index.js";
import { GuildStructureService, type VerificationLookup } from "./services/GuildStructureService.js";
import { createStructureRoutes } from "./api/sync.js";

export interface StructurePluginAPI extends PluginAPI {
  version: string;
  service: GuildStructureService;
  roster: RosterPluginAPI;
  lib: LibAPI;
}

export async function onLoad(context: PluginContext): Promise<StructurePluginAPI> {
  const { logger, dependencies, env, apiManager, pluginPath } = context;

  const lib = dependencies.get("lib") as LibAPI | undefined;
  if (!lib) throw new Error("structure requires lib plugin");
  const roster = dependencies.get("roster") as RosterPluginAPI | undefined;
  if (!roster) throw new Error("structure requires roster plugin");
  const verification = dependencies.get("verification") as VerificationPluginAPI | undefined;

  let lookupVerified: VerificationLookup | undefined;
  if (verification) {
    lookupVerified = (verificationId) => {
      const user = verification.engine.findByVerificationId(verificationId);
      return user?.status === "verified" ? user.discordId : undefined;
    };
  } else {
    logger.info("Verification plugin not loaded; special-role assignment sync is disabled");
  }

  const service = new GuildStructureService({
    configStore: roster.configStore,
    thingGetter: lib.thingGetter,
    guildId: env.GUILD_ID,
    lookupVerified,
  });

  apiManager.registerRouter({
    pluginName: "structure",
    prefix: "/structure",
    router: createStructureRoutes({ service }),
    swaggerPaths: [path.join(pluginPath, "api", "sync.ts")],
  });

  logger.info("✅ Structure plugin loaded");
  return { version: "1.0.0", service, roster, lib };
}

export async function onDisable(logger: PluginLogger): Promise<void> {
  logger.info("🛑 Structure plugin unloaded");
}

export const commands = "./commands";
