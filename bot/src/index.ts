/**
 * Rollcall - Main Entry Point
 * Plugin-based Discord bot with phased initialization
 */

import dotenv from "dotenv";
dotenv.config(); // Load environment variables from .env file FIRST

// Initialize Sentry before anything else can throw
import { initializeSentry, captureException, flush as flushSentry } from "./utils/sentry";

initializeSentry({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV || "production",
  tracesSampleRate: 0.1,
  enabled: process.env.SENTRY_ENABLED !== "false",
});

import { Client, Events, GatewayIntentBits, Partials, PermissionFlagsBits, type ChatInputCommandInteraction } from "discord.js";
import * as path from "path";
import { fileURLToPath } from "url";
import { envLoader } from "./utils/env";
import log from "./utils/logger";
import { toRollcallClient, type RollcallClient } from "./types/Client";
import { PluginLoader } from "./core/PluginLoader";
import { ComponentCallbackService } from "./core/services/ComponentCallbackService";
import { CommandManager } from "./core/CommandManager";
import { EventManager } from "./core/EventManager";
import { ApiManager } from "./core/ApiManager";
import { WebSocketManager } from "./core/WebSocketManager";
import { InteractionHandler } from "./core/InteractionHandler";
import type { RosterPluginAPI } from "../plugins/roster/index";
import type { AuthPluginAPI } from "../plugins/auth/index";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// ============================================================================
// Phase 1: Load and validate environment
// ============================================================================
log.info("🚀 Rollcall starting...");
log.debug("Phase 1: Loading environment variables...");

const env = envLoader.loadGlobalEnv();

// ============================================================================
// Phase 2: Discord client and core services
// ============================================================================

const baseClient = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers, GatewayIntentBits.DirectMessages, GatewayIntentBits.MessageContent],
  partials: [Partials.Channel, Partials.Message, Partials.User, Partials.GuildMember],
});

const componentCallbackService = new ComponentCallbackService(env.NANOID_LENGTH);
const apiManager = new ApiManager({ port: env.API_PORT, apiKey: env.INTERNAL_API_KEY });
const webSocketManager = new WebSocketManager({
  port: env.WS_PORT,
  // The stream takes an API key or an admin session token
  authenticate: (token) => apiManager.authenticate(token, token),
});

let pluginLoader: PluginLoader | null = null;
let eventManager: EventManager | null = null;

/**
 * Command admin check: owners, members with Manage Server, configured maintainers
 */
function createAdminCheck(client: RollcallClient): (interaction: ChatInputCommandInteraction) => Promise<boolean> {
  return async (interaction) => {
    if (interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild)) return true;

    const auth = client.plugins.get("auth") as AuthPluginAPI | undefined;
    if (auth) {
      return auth.adminAccess.isAdmin(interaction.user.id, interaction.user.username);
    }

    if (env.OWNER_IDS.includes(interaction.user.id)) return true;
    const roster = client.plugins.get("roster") as RosterPluginAPI | undefined;
    return roster?.configStore.isMaintainer(interaction.user.id, interaction.user.username) ?? false;
  };
}

// ============================================================================
// Phase 3: Ready event handler
// ============================================================================

baseClient.once(Events.ClientReady, async (readyClient) => {
  log.info(`✅ Ready as ${readyClient.user.tag}`);

  if (!readyClient.guilds.cache.has(env.GUILD_ID)) {
    log.warn(`The bot is not a member of guild ${env.GUILD_ID}; commands and sync will fail until it is invited`);
  }

  const client = toRollcallClient(readyClient);
  const commandManager = new CommandManager(client, env.BOT_TOKEN);
  eventManager = new EventManager(client);

  // Plugins load after login so Discord entities are fetchable during init
  log.debug("Phase 3: Loading plugins...");
  pluginLoader = new PluginLoader({
    pluginsDir: path.join(__dirname, "..", "plugins"),
    client,
    env,
    componentCallbackService,
    commandManager,
    eventManager,
    apiManager,
  });

  try {
    await pluginLoader.loadAll();
    log.info(`✅ Loaded ${pluginLoader.getAllPlugins().size} plugin(s)`);
  } catch (error) {
    log.error("Plugin loading failed:", error);
    captureException(error, { context: "Plugin Loading" });
  }

  const interactionHandler = new InteractionHandler({
    client,
    commandManager,
    componentCallbackService,
    isAdmin: createAdminCheck(client),
  });
  interactionHandler.attach();

  // Attach events after plugins have registered them
  eventManager.attachEvents();

  try {
    await commandManager.registerCommandsToGuild(env.GUILD_ID);
    log.info(`✅ Commands registered (${commandManager.getStats().total} total)`);
  } catch (error) {
    log.error("Failed to register commands:", error);
    captureException(error, { context: "Command Registration" });
  }

  try {
    await apiManager.start();
    await webSocketManager.start();
  } catch (error) {
    log.error("Failed to start API servers:", error);
    captureException(error, { context: "API Server Start" });
  }
});

// ============================================================================
// Phase 4: Error handling
// ============================================================================

baseClient.on(Events.Error, (error) => {
  log.error("Discord client error:", error);
  captureException(error, { context: "Discord Client Error" });
});

process.on("unhandledRejection", (error) => {
  log.error("Unhandled promise rejection:", error);
  captureException(error, { context: "Unhandled Promise Rejection" });
});

process.on("uncaughtException", (error) => {
  log.error("Uncaught exception:", error);
  captureException(error, { context: "Uncaught Exception" });
  // Allow Sentry to send the error before exiting
  setTimeout(() => process.exit(1), 1000);
});

// ============================================================================
// Phase 5: Graceful shutdown
// ============================================================================

async function shutdown(signal: string): Promise<void> {
  log.info(`Received ${signal}, shutting down gracefully...`);

  try {
    await webSocketManager.stop();
    await apiManager.stop();

    eventManager?.detachEvents();

    // Plugins flush their state (user database) on unload
    if (pluginLoader) {
      await pluginLoader.unloadAll();
      log.debug("Plugins unloaded");
    }

    componentCallbackService.clear();
    await baseClient.destroy();
    log.debug("Discord client destroyed");

    await flushSentry();

    log.info("✅ Shutdown complete");
    process.exit(0);
  } catch (error) {
    log.error("Error during shutdown:", error);
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

// ============================================================================
// Phase 6: Startup sequence
// ============================================================================

async function start(): Promise<void> {
  try {
    log.debug("Phase 2: Logging in to Discord...");
    await baseClient.login(env.BOT_TOKEN);
  } catch (error) {
    log.error("Failed to start bot:", error);
    captureException(error, { context: "Bot Startup" });
    await flushSentry();
    process.exit(1);
  }
}

void start();
