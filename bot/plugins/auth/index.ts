/**
 * Auth Plugin - Discord OAuth and admin sessions
 *
 * Provides:
 * - /auth/login → Discord authorize → /auth/callback, dispatched by the state's purpose
 * - Bearer session tokens accepted on every /api route and by the log stream
 * - AdminAccess: owners, maintainers and guild administrators
 * - registerCallbackHandler() so other plugins can finish their own OAuth flows
 */

import * as path from "path";
import type { PluginContext, PluginAPI, PluginLogger } from "../../src/types/Plugin.js";
import type { LibAPI } from "../lib/index.js";
import type { RosterPluginAPI } from "../roster/index.js";
import { DiscordOAuth } from "./services/DiscordOAuth.js";
import { OAuthStateStore, type OAuthPurpose } from "./services/OAuthStateStore.js";
import { SessionService } from "./services/SessionService.js";
import { AdminAccess, guildAdministratorCheck } from "./services/AdminAccess.js";
import { createAdminAuthRoutes, createAdminLoginHandler, createPublicAuthRoutes, type CallbackHandler } from "./api/auth.js";

const PURGE_INTERVAL_MS = 5 * 60 * 1000;

export interface AuthPluginAPI extends PluginAPI {
  version: string;
  /** null unless DISCORD_CLIENT_ID, DISCORD_CLIENT_SECRET and WEB_BASE_URL are set */
  oauth: DiscordOAuth | null;
  states: OAuthStateStore;
  sessions: SessionService;
  adminAccess: AdminAccess;
  registerCallbackHandler: (purpose: OAuthPurpose, handler: CallbackHandler) => void;
  /** Discord authorize URL for a new state, or null when OAuth is off */
  createAuthorizeUrl: (purpose: OAuthPurpose, verificationId?: string) => string | null;
  /** Stops the periodic purge of expired states and sessions */
  stopPurging: () => void;
}


export async function onLoad(context: PluginContext): Promise<AuthPluginAPI> {
  const { logger, dependencies, env, apiManager, pluginPath, getEnv } = context;

  const lib = dependencies.get("lib") as LibAPI | undefined;
  if (!lib) throw new Error("auth requires lib plugin");
  const roster = dependencies.get("roster") as RosterPluginAPI | undefined;
  if (!roster) throw new Error("auth requires roster plugin");

  const clientId = getEnv("DISCORD_CLIENT_ID");
  const clientSecret = getEnv("DISCORD_CLIENT_SECRET");
  const oauth =
    clientId && clientSecret && env.WEB_BASE_URL ? new DiscordOAuth({ clientId, clientSecret, redirectUri: `${env.WEB_BASE_URL}/auth/callback` }) : null;
  if (!oauth) {
    logger.warn("Discord OAuth disabled (set DISCORD_CLIENT_ID, DISCORD_CLIENT_SECRET and WEB_BASE_URL to enable it)");
  }

  const states = new OAuthStateStore();
  const sessions = new SessionService(env.SESSION_TTL_HOURS);
  const adminAccess = new AdminAccess({
    ownerIds: env.OWNER_IDS,
    configStore: roster.configStore,
    isGuildAdministrator: guildAdministratorCheck(lib.thingGetter, env.GUILD_ID),
  });

  const callbackHandlers = new Map<OAuthPurpose, CallbackHandler>();
  callbackHandlers.set("admin", createAdminLoginHandler(adminAccess, sessions));

  apiManager.setSessionAuthenticator((token) => sessions.authenticate(token));

  const deps = { oauth, states, sessions, callbackHandlers };
  apiManager.registerRouter({
    pluginName: "auth",
    prefix: "/auth",
    router: createPublicAuthRoutes(deps),
    swaggerPaths: [path.join(pluginPath, "api", "*.ts")],
    public: true,
  });
  apiManager.registerRouter({
    pluginName: "auth",
    prefix: "/auth",
    router: createAdminAuthRoutes(deps),
  });

  const purgeTimer = setInterval(() => {
    const removed = states.purgeExpired() + sessions.purgeExpired();
    if (removed > 0) logger.debug(`Purged ${removed} expired OAuth state(s) and session(s)`);
  }, PURGE_INTERVAL_MS);
  purgeTimer.unref();

  logger.info(`✅ Auth plugin loaded (OAuth ${oauth ? "enabled" : "disabled"})`);

  return {
    version: "1.0.0",
    oauth,
    states,
    sessions,
    adminAccess,
    registerCallbackHandler: (purpose, handler) => {
      callbackHandlers.set(purpose, handler);
    },
    createAuthorizeUrl: (purpose, verificationId) => (oauth ? oauth.authorizeUrl(states.create(purpose, verificationId)) : null),
    stopPurging: () => clearInterval(purgeTimer),
  };
}

export async function onDisable(logger: PluginLogger, api: AuthPluginAPI): Promise<void> {
  api.stopPurging();
  logger.info("🛑 Auth plugin unloaded");
}
