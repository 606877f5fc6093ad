/**
 * Core Logger
 * Coloured console output, optional file output, and a copy of every line
 * in the shared LogBuffer for the live log viewer.
 * Format: [time] [packagename] [LEVEL] [location]: message
 */

import * as fs from "fs";
import * as path from "path";
import { logBuffer, type LogBuffer, type LogLevelName } from "./LogBuffer";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LoggerConfig {
  /** The package/module name shown in logs */
  packageName: string;
  /** Minimum log level to output */
  minLevel: LogLevel;
  /** Append lines to logFilePath */
  enableFileLogging: boolean;
  /** Defaults to logs/<packageName>.log under the working directory */
  logFilePath: string;
  timestampFormat: "locale" | "iso";
  /** Show caller file and line info */
  showCallerInfo: boolean;
  /** Number of path components to show in caller info */
  callerPathDepth: number;
  enableColors: boolean;
  /** Buffer receiving plain-text copies of emitted lines; null disables */
  buffer: LogBuffer | null;
}

const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
};

const levelStyles: Record<LogLevel, { name: LogLevelName; color: string }> = {
  [LogLevel.DEBUG]: { name: "DEBUG", color: colors.magenta },
  [LogLevel.INFO]: { name: "INFO", color: colors.cyan },
  [LogLevel.WARN]: { name: "WARN", color: colors.yellow },
  [LogLevel.ERROR]: { name: "ERROR", color: colors.red },
};

function resolveConfig(packageName: string, overrides?: Partial<LoggerConfig>): LoggerConfig {
  return {
    packageName,
    minLevel: overrides?.minLevel ?? LogLevel.INFO,
    enableFileLogging: overrides?.enableFileLogging ?? false,
    logFilePath: overrides?.logFilePath ?? path.join(process.cwd(), `logs/${packageName}.log`),
    timestampFormat: overrides?.timestampFormat ?? "locale",
    showCallerInfo: overrides?.showCallerInfo ?? false,
    callerPathDepth: overrides?.callerPathDepth ?? 2,
    enableColors: overrides?.enableColors ?? true,
    buffer: overrides?.buffer === undefined ? logBuffer : overrides.buffer,
  };
}

class Logger {
  private config: LoggerConfig;

  constructor(packageName: string, initialConfig?: Partial<LoggerConfig>) {
    this.config = resolveConfig(packageName, initialConfig);
  }

  private formatTime(): string {
    return this.config.timestampFormat === "locale" ? new Date().toLocaleTimeString() : new Date().toISOString();
  }

  private getCallerInfo(): string {
    if (!this.config.showCallerInfo) return "";

    const stack = new Error().stack?.split("\n");
    const callerLine = stack?.[4] ?? stack?.[3] ?? "";
    const callerMatch = callerLine.match(/at\s+(.*)\s+\((.*):(\d+):(\d+)\)/) ?? callerLine.match(/at\s+()(.*):(\d+):(\d+)/);
    if (!callerMatch) return "";

    const [, , filePath, line] = callerMatch;
    const parts = filePath?.split(/[/\\]/) ?? [];
    const displayPath = parts.slice(-Math.max(1, Math.min(this.config.callerPathDepth, parts.length))).join("/");

    return `[${displayPath}:${line}]`;
  }

  private formatMessage(args: unknown[]): string {
    return args
      .map((arg) => {
        if (arg instanceof Error) {
          return `${arg.message}\n${arg.stack ?? ""}`;
        }
        if (typeof arg === "object" && arg !== null) {
          try {
            return JSON.stringify(arg, null, 2);
          } catch {
            return String(arg);
          }
        }
        return String(arg);
      })
      .join(" ");
  }

  private writeToFile(line: string): void {
    if (!this.config.enableFileLogging) return;

    try {
      fs.mkdirSync(path.dirname(this.config.logFilePath), { recursive: true });
      fs.appendFileSync(this.config.logFilePath, line + "\n");
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.error(`Failed to write to log file: ${errorMessage}`);
    }
  }

  private log(level: LogLevel, args: unknown[]): void {
    if (this.config.minLevel > level) return;

    const { name, color } = levelStyles[level];
    const timestamp = this.formatTime();
    const callerInfo = this.getCallerInfo();
    const text = this.formatMessage(args);
    const plain = `[${timestamp}] [${this.config.packageName}] [${name}] ${callerInfo}: ${text}`;
    const output = this.config.enableColors
      ? `${colors.dim}[${timestamp}]${colors.reset} ${colors.blue}[${this.config.packageName}]${colors.reset} ${color}[${name}]${colors.reset} ${colors.dim}${callerInfo}${colors.reset}: ${text}`
      : plain;

    const write = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : level === LogLevel.DEBUG ? console.debug : console.log;
    write(output);

    this.writeToFile(plain);
    this.config.buffer?.push(name, this.config.packageName, text);
  }

  info(...args: unknown[]): void {
    this.log(LogLevel.INFO, args);
  }

  warn(...args: unknown[]): void {
    this.log(LogLevel.WARN, args);
  }

  error(...args: unknown[]): void {
    this.log(LogLevel.ERROR, args);
  }

  debug(...args: unknown[]): void {
    this.log(LogLevel.DEBUG, args);
  }

  configure(newConfig: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...newConfig };
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

/**
 * Callable logger: `log("x")` is `log.info("x")`
 */
export interface LoggerFunction {
  (...args: unknown[]): void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  configure: (newConfig: Partial<LoggerConfig>) => void;
  getConfig: () => LoggerConfig;
  child: (childPackageName: string) => LoggerFunction;
  LogLevel: typeof LogLevel;
}

/**
 * Module loggers share the root settings from the environment
 */
const sharedDefaults: Partial<LoggerConfig> = {
  minLevel: process.env.DEBUG_LOG === "true" ? LogLevel.DEBUG : LogLevel.INFO,
  enableFileLogging: process.env.LOG_TO_FILE === "true",
};

export function createLogger(packageName: string, config?: Partial<LoggerConfig>): LoggerFunction {
  const logger = new Logger(packageName, { ...sharedDefaults, ...config });

  return Object.assign((...args: unknown[]) => logger.info(...args), {
    info: (...args: unknown[]) => logger.info(...args),
    warn: (...args: unknown[]) => logger.warn(...args),
    error: (...args: unknown[]) => logger.error(...args),
    debug: (...args: unknown[]) => logger.debug(...args),
    configure: (newConfig: Partial<LoggerConfig>) => logger.configure(newConfig),
    getConfig: () => logger.getConfig(),
    child: (childPackageName: string) => {
      const { packageName: _parent, logFilePath: _file, ...inherited } = logger.getConfig();
      return createLogger(childPackageName, inherited);
    },
    LogLevel,
  });
}

export { Logger };
