/**
 * Plugin System Types
 */

import type { RollcallClient } from "./Client";
import type { GlobalEnv } from "./Env";
import type { ComponentCallbackService } from "../core/services/ComponentCallbackService";
import type { ApiManager } from "../core/ApiManager";

/**
 * Plugin manifest (manifest.json), after defaults are applied
 */
export interface PluginManifest {
  /** Unique plugin identifier */
  name: string;
  /** Semver version string */
  version: string;
  description: string;
  /** Entry file relative to plugin root (default: "index.ts") */
  main: string;
  /** Required plugins that must be loaded first */
  dependencies: string[];
  /** Optional plugins loaded first if present */
  optionalDependencies: string[];
  /** Environment variables that must exist */
  requiredEnv: string[];
  /** Environment variables that may exist */
  optionalEnv: string[];
  /** Skip loading this plugin */
  disabled: boolean;
}

/**
 * Context passed to plugin onLoad function
 */
export interface PluginContext {
  client: RollcallClient;
  /** Validated global environment */
  env: GlobalEnv;
  /** Plugin's own manifest */
  manifest: PluginManifest;
  /** Absolute path to plugin directory */
  pluginPath: string;
  /** Logger instance scoped to plugin */
  logger: PluginLogger;
  /** APIs from dependency plugins */
  dependencies: Map<string, PluginAPI>;
  /** Raw lookup for plugin-specific variables outside GlobalEnv */
  getEnv: (key: string) => string | undefined;

  componentCallbackService: ComponentCallbackService;
  apiManager: ApiManager;
}

export interface PluginLogger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/**
 * API surface exposed by a plugin to dependents
 */
export interface PluginAPI {
  [key: string]: unknown;
}

/**
 * Plugin entry module exports
 */
export interface PluginModule {
  /** Called when plugin loads - return API for dependents */
  onLoad: (context: PluginContext) => Promise<PluginAPI>;
  /** Called when plugin unloads (bot shutdown) with the API its onLoad returned */
  onDisable?: (logger: PluginLogger, api: PluginAPI) => Promise<void>;
  /** Path to commands directory (relative to plugin) */
  commands?: string;
  /** Path to events directory (relative to plugin) */
  events?: string;
}

export interface LoadedPlugin {
  manifest: PluginManifest;
  /** Absolute path to plugin directory */
  path: string;
  module: PluginModule;
  /** API returned from onLoad */
  api: PluginAPI;
  logger: PluginLogger;
}

/**
 * Configuration override file (plugins.json)
 */
export interface PluginsConfig {
  /** Explicit list of plugins to load */
  plugins?: string[];
  /** Plugins to skip even if present */
  disabled?: string[];
}
