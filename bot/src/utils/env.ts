/**
 * Environment Loader
 * Loads and validates environment variables; exits the process on bad config
 */

import { SnowflakeUtil } from "discord.js";
import log from "./logger";
import type { GlobalEnv } from "../types/Env";

const DISCORD_EPOCH = 1420070400000;

/** Returns an error message, or null when the value is acceptable */
type EnvCheck = (env: GlobalEnv) => string | null;

function checkSnowflake(id: string): boolean {
  if (!/^\d{17,20}$/.test(id)) return false;
  try {
    return SnowflakeUtil.deconstruct(id).timestamp >= DISCORD_EPOCH;
  } catch {
    return false;
  }
}

function checkRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

class EnvLoader {
  private globalEnv: GlobalEnv | null = null;

  private readonly checks: Record<string, EnvCheck> = {
    BOT_TOKEN: (env) => (env.BOT_TOKEN.split(".").length === 3 ? null : "Discord bot tokens have 3 parts separated by dots"),
    GUILD_ID: (env) => (checkSnowflake(env.GUILD_ID) ? null : `not a valid Discord snowflake: ${env.GUILD_ID}`),
    OWNER_IDS: (env) => {
      const bad = env.OWNER_IDS.filter((id) => !checkSnowflake(id));
      return bad.length === 0 ? null : `invalid Discord snowflake(s): ${bad.join(", ")}`;
    },
    API_PORT: (env) => (checkRange(env.API_PORT, 1, 65535) ? null : `must be a port number. Got: ${env.API_PORT}`),
    WS_PORT: (env) => (checkRange(env.WS_PORT, 1, 65535) ? null : `must be a port number. Got: ${env.WS_PORT}`),
    NANOID_LENGTH: (env) => (checkRange(env.NANOID_LENGTH, 1, 64) ? null : `must be a number between 1 and 64. Got: ${env.NANOID_LENGTH}`),
    STAGING_TIMEOUT_SECONDS: (env) =>
      checkRange(env.STAGING_TIMEOUT_SECONDS, 10, 86_400) ? null : `must be between 10 and 86400 seconds. Got: ${env.STAGING_TIMEOUT_SECONDS}`,
    SESSION_TTL_HOURS: (env) => (checkRange(env.SESSION_TTL_HOURS, 1, 720) ? null : `must be between 1 and 720 hours. Got: ${env.SESSION_TTL_HOURS}`),
    WEB_BASE_URL: (env) => {
      if (!env.WEB_BASE_URL) return null;
      try {
        const parsed = new URL(env.WEB_BASE_URL);
        return parsed.protocol === "http:" || parsed.protocol === "https:" ? null : `must use http: or https:. Got: ${parsed.protocol}`;
      } catch {
        return `is not a valid URL: ${env.WEB_BASE_URL}`;
      }
    },
  };

  /**
   * Load and validate global environment variables.
   * This must succeed or the bot won't start.
   */
  loadGlobalEnv(source: NodeJS.ProcessEnv = process.env): GlobalEnv {
    if (this.globalEnv) {
      return this.globalEnv;
    }

    log.info("Loading global environment variables...");

    const env = this.readEnv(source);
    const problems = this.validate(env);

    if (problems.length > 0) {
      for (const problem of problems) {
        log.error(problem);
      }
      log.error("These are required for the bot to start. Please check your .env file.");
      process.exit(1);
    }

    this.globalEnv = env;
    log.info("Global environment loaded and validated successfully");

    return env;
  }

  /**
   * Parse raw variables into a GlobalEnv without validating
   */
  readEnv(source: NodeJS.ProcessEnv): GlobalEnv {
    const webBaseUrl = source.WEB_BASE_URL?.trim().replace(/\/+$/, "");
    return {
      BOT_TOKEN: source.BOT_TOKEN ?? "",
      GUILD_ID: (source.GUILD_ID ?? "").trim(),
      OWNER_IDS: (source.OWNER_IDS ?? "")
        .split(",")
        .map((id) => id.trim())
        .filter(Boolean),
      INTERNAL_API_KEY: source.INTERNAL_API_KEY ?? "",
      DATA_DIR: source.DATA_DIR || "data",
      STATE_DIR: source.STATE_DIR || "state",
      DEBUG_LOG: source.DEBUG_LOG === "true",
      SENTRY_DSN: source.SENTRY_DSN || undefined,
      SENTRY_ENABLED: source.SENTRY_ENABLED !== "false",
      API_PORT: parseInt(source.API_PORT || "3001", 10),
      WS_PORT: parseInt(source.WS_PORT || "3002", 10),
      NANOID_LENGTH: parseInt(source.NANOID_LENGTH || "12", 10),
      STAGING_TIMEOUT_SECONDS: parseInt(source.STAGING_TIMEOUT_SECONDS || "120", 10),
      SESSION_TTL_HOURS: parseInt(source.SESSION_TTL_HOURS || "12", 10),
      WEB_BASE_URL: webBaseUrl || undefined,
    };
  }

  /**
   * Every problem with the given env, one message per variable
   */
  validate(env: GlobalEnv): string[] {
    const problems: string[] = [];
    const required: (keyof GlobalEnv)[] = ["BOT_TOKEN", "GUILD_ID", "OWNER_IDS", "INTERNAL_API_KEY"];

    for (const key of required) {
      const value = env[key];
      if (value === undefined || value === "" || (Array.isArray(value) && value.length === 0)) {
        problems.push(`${key} is missing`);
      }
    }
    if (problems.length > 0) return problems;

    for (const [key, check] of Object.entries(this.checks)) {
      const message = check(env);
      if (message) problems.push(`${key} ${message}`);
    }

    return problems;
  }

  /**
   * Get global environment (must be loaded first)
   */
  getGlobalEnv(): GlobalEnv {
    if (!this.globalEnv) {
      throw new Error("Global environment not loaded. Call loadGlobalEnv() first.");
    }
    return this.globalEnv;
  }
}

export { EnvLoader };
export const envLoader = new EnvLoader();
export default envLoader;
