/**
 * Verification Plugin - binds roster verification ids to Discord accounts
 *
 * Provides:
 * - UserDatabase (state/user_database.json) and the VerificationEngine
 * - DM flow on member join, /verify, /verification lookup|revoke
 * - Web verification through the auth plugin's OAuth flow (/verify/:id)
 * - Admin routes under /api/users
 */

import * as path from "path";
import type { PluginContext, PluginAPI, PluginLogger } from "../../src/types/Plugin.js";
import type { LibAPI } from "../lib/index.js";
import type { RosterPluginAPI } from "../roster/index.js";
import type { AuthPluginAPI } from "../auth/index.js";
import { UserDatabase } from "./services/UserDatabase.js";
import { VerificationEngine } from "./services/VerificationEngine.js";
import { RoleApplier } from "./services/RoleApplier.js";
import { VerificationFlow } from "./services/VerificationFlow.js";
import { createUsersRouter, createVerifyCallbackHandler, createVerifyRoutes } from "./api/index.js";

export const USER_DATABASE_FILE = "user_database.json";

const PENDING_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

export interface VerificationPluginAPI extends PluginAPI {
  version: string;
  database: UserDatabase;
  engine: VerificationEngine;
  flow: VerificationFlow;
  roster: RosterPluginAPI;
  lib: LibAPI;
  /** The managed guild; other guilds are ignored */
  guildId: string;
  /** OAuth verification links are handed out by /verify */
  webVerification: boolean;
  /** Web verification link for an id, or null when OAuth is off */
  verificationLink: (verificationId: string) => string | null;
}

export async function onLoad(context: PluginContext): Promise<VerificationPluginAPI> {
  const { logger, dependencies, env, apiManager, pluginPath } = context;

  const lib = dependencies.get("lib") as LibAPI | undefined;
  if (!lib) throw new Error("verification requires lib plugin");
  const roster = dependencies.get("roster") as RosterPluginAPI | undefined;
  if (!roster) throw new Error("verification requires roster plugin");
  const auth = dependencies.get("auth") as AuthPluginAPI | undefined;

  const databasePath = path.resolve(env.STATE_DIR, USER_DATABASE_FILE);
  const database = await UserDatabase.load(databasePath);
  const engine = new VerificationEngine({ database, configStore: roster.configStore, databasePath });
  if (database.isDirty()) {
    await engine.saveDatabase();
  }

  const flow = new VerificationFlow({
    engine,
    roleApplier: new RoleApplier(lib.thingGetter),
    getGuild: () => lib.thingGetter.getGuild(env.GUILD_ID),
  });

  const oauthEnabled = Boolean(auth?.oauth && env.WEB_BASE_URL);
  const verificationLink = (verificationId: string): string | null =>
    oauthEnabled && env.WEB_BASE_URL ? `${env.WEB_BASE_URL}/verify/${encodeURIComponent(verificationId)}` : null;

  if (auth && oauthEnabled) {
    auth.registerCallbackHandler("verify", createVerifyCallbackHandler(flow));
    apiManager.registerRouter({
      pluginName: "verification",
      prefix: "/verify",
      router: createVerifyRoutes({ engine, createAuthorizeUrl: (id) => auth.createAuthorizeUrl("verify", id) }),
      swaggerPaths: [path.join(pluginPath, "api", "verify.ts")],
      public: true,
    });
  } else {
    logger.info("Web verification disabled; /verify falls back to direct and DM verification");
  }

  apiManager.registerRouter({
    pluginName: "verification",
    prefix: "/users",
    router: createUsersRouter({ engine, database }),
    swaggerPaths: [path.join(pluginPath, "api", "users.ts")],
  });

  engine.startPendingCleanup(PENDING_CLEANUP_INTERVAL_MS);

  logger.info(`✅ Verification plugin loaded (${database.userCount()} tracked users)`);

  return {
    version: "1.0.0",
    database,
    engine,
    flow,
    roster,
    lib,
    guildId: env.GUILD_ID,
    webVerification: oauthEnabled,
    verificationLink,
  };
}

export async function onDisable(logger: PluginLogger, api: VerificationPluginAPI): Promise<void> {
  api.engine.stopPendingCleanup();
  await api.engine.saveDatabase();
  logger.info("🛑 Verification plugin unloaded");
}

export const commands = "./commands";
export const events = "./events";
