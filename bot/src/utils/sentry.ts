/**
 * Sentry error tracking
 * Every helper is a no-op until initializeSentry() succeeded
 */

import * as Sentry from "@sentry/node";
import log from "./logger";

let isInitialized = false;

export interface SentryOptions {
  dsn?: string;
  /** development, staging, production */
  environment?: string;
  /** Fraction of transactions to sample (0.0 to 1.0) */
  tracesSampleRate?: number;
  enabled?: boolean;
}

export function initializeSentry(options: SentryOptions): void {
  if (isInitialized) {
    log.warn("Sentry already initialized, skipping...");
    return;
  }

  const { dsn, environment = process.env.NODE_ENV || "development", tracesSampleRate = 0.1, enabled = true } = options;

  if (!enabled) {
    log.info("Sentry is disabled");
    return;
  }

  if (!dsn) {
    log.warn("Sentry DSN not provided, error tracking will be disabled");
    return;
  }

  try {
    Sentry.init({
      dsn,
      environment,
      tracesSampleRate,
      release: process.env.SENTRY_RELEASE || undefined,

      beforeSend(event) {
        if (event.request?.headers) {
          delete event.request.headers["authorization"];
          delete event.request.headers["cookie"];
          delete event.request.headers["x-api-key"];
        }
        event.tags = { ...event.tags, bot: "rollcall" };
        return event;
      },

      ignoreErrors: [/DiscordAPIError/, /Request timed out/, /ECONNRESET/, /ETIMEDOUT/, /ENOTFOUND/, /Unknown interaction/, /Interaction has already been acknowledged/],
    });

    isInitialized = true;
    log.info(`✅ Sentry initialized (environment: ${environment})`);
  } catch (error) {
    log.error("Failed to initialize Sentry:", error);
  }
}

export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!isInitialized) return;
  Sentry.captureException(error, { extra: context });
}

/**
 * Flush pending events before shutdown
 */
export async function flush(timeout: number = 2000): Promise<void> {
  if (!isInitialized) return;

  try {
    await Sentry.close(timeout);
    log.info("✅ Sentry flushed");
  } catch (error) {
    log.error("Failed to flush Sentry:", error);
  }
}
