/**
 * Root logger for the host process
 */

import { createLogger, LogLevel } from "../core/Logger";

const log = createLogger("rollcall", {
  minLevel: process.env.DEBUG_LOG === "true" ? LogLevel.DEBUG : LogLevel.INFO,
  enableFileLogging: process.env.LOG_TO_FILE === "true",
  timestampFormat: "locale",
});

export default log;

export { createLogger, LogLevel } from "../core/Logger";
export type { LoggerConfig, LoggerFunction } from "../core/Logger";
