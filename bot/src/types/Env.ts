/**
 * Environment Types
 */

/**
 * Global environment variables required for the bot to function
 */
export interface GlobalEnv {
  BOT_TOKEN: string;
  /** The single guild this bot manages */
  GUILD_ID: string;
  OWNER_IDS: string[];
  /** Shared secret for admin API auth (X-API-Key header) */
  INTERNAL_API_KEY: string;
  /** Root of the config tree (global/, seasons/) */
  DATA_DIR: string;
  /** Directory holding user_database.json */
  STATE_DIR: string;
  DEBUG_LOG: boolean;
  SENTRY_DSN?: string;
  SENTRY_ENABLED: boolean;
  API_PORT: number;
  WS_PORT: number;
  NANOID_LENGTH: number;
  STAGING_TIMEOUT_SECONDS: number;
  SESSION_TTL_HOURS: number;
  /** Public base URL; enables OAuth verification links when set */
  WEB_BASE_URL?: string;
}

/**
 * Plugin environment requirement definition
 */
export interface PluginEnvRequirement {
  key: string;
  required: boolean;
  description?: string;
}
