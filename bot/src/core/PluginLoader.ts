/**
 * PluginLoader - Scans, resolves dependencies, and loads plugins
 */

import * as fs from "fs";
import * as path from "path";
import { pathToFileURL } from "url";
import { z } from "zod";
import type { ClientEvents } from "discord.js";
import log from "../utils/logger";
import type { PluginManifest, PluginContext, PluginModule, PluginAPI, LoadedPlugin, PluginLogger } from "../types/Plugin";
import type { RollcallClient } from "../types/Client";
import type { GlobalEnv } from "../types/Env";
import type { ComponentCallbackService } from "./services/ComponentCallbackService";
import type { CommandManager, PluginCommand } from "./CommandManager";
import type { EventManager } from "./EventManager";
import type { ApiManager } from "./ApiManager";

export interface PluginLoaderOptions {
  pluginsDir: string;
  client: RollcallClient;
  env: GlobalEnv;
  componentCallbackService: ComponentCallbackService;
  commandManager: CommandManager;
  eventManager: EventManager;
  apiManager: ApiManager;
}

const ManifestSchema = z.object({
  name: z.string().regex(/^[a-z0-9-]+$/, "lowercase letters, digits and dashes only"),
  version: z.string(),
  description: z.string().default(""),
  main: z.string().default("index.ts"),
  dependencies: z.array(z.string()).default([]),
  optionalDependencies: z.array(z.string()).default([]),
  requiredEnv: z.array(z.string()).default([]),
  optionalEnv: z.array(z.string()).default([]),
  disabled: z.boolean().default(false),
});

const PluginsConfigSchema = z.object({
  plugins: z.array(z.string()).optional(),
  disabled: z.array(z.string()).optional(),
});

const PluginModuleSchema = z.object({
  onLoad: z.function(),
  onDisable: z.function().optional(),
  commands: z.string().optional(),
  events: z.string().optional(),
});

const CommandModuleSchema = z.object({
  data: z.object({ name: z.string(), toJSON: z.function() }),
  config: z.object({ adminOnly: z.boolean().optional() }).optional(),
  execute: z.function(),
  autocomplete: z.function().optional(),
});

const EventModuleSchema = z.object({
  event: z.string(),
  once: z.boolean().optional(),
  execute: z.function(),
});

/**
 * Topological sort (Kahn's algorithm). Dependencies only count when
 * present. Throws on a cycle.
 */
export function resolveLoadOrder(manifests: Map<string, Pick<PluginManifest, "dependencies" | "optionalDependencies">>): string[] {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const name of manifests.keys()) {
    inDegree.set(name, 0);
    dependents.set(name, []);
  }

  for (const [name, manifest] of manifests) {
    // Missing required dependencies are reported by validation, not here
    const edges = [...manifest.dependencies, ...manifest.optionalDependencies].filter((dep) => manifests.has(dep));
    for (const dep of edges) {
      dependents.get(dep)?.push(name);
      inDegree.set(name, (inDegree.get(name) ?? 0) + 1);
    }
  }

  // Sorted so load order is stable across filesystems
  const queue = [...inDegree].filter(([, degree]) => degree === 0).map(([name]) => name).sort();
  const result: string[] = [];

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    result.push(current);
    for (const dependent of dependents.get(current) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) queue.push(dependent);
    }
  }

  if (result.length !== manifests.size) {
    const stuck = [...manifests.keys()].filter((name) => !result.includes(name));
    throw new Error(`Circular dependency detected involving: ${stuck.join(", ")}`);
  }

  return result;
}

export class PluginLoader {
  private readonly options: PluginLoaderOptions;
  private manifests: Map<string, PluginManifest> = new Map();
  private pluginPaths: Map<string, string> = new Map();
  private loadedPlugins: Map<string, LoadedPlugin> = new Map();
  private loadOrder: string[] = [];

  constructor(options: PluginLoaderOptions) {
    this.options = options;
  }

  /**
   * Scan, resolve and load every plugin. Fails fast on the first broken plugin.
   */
  async loadAll(): Promise<Map<string, LoadedPlugin>> {
    this.scanPlugins();
    this.applyConfigOverrides();
    this.validatePlugins();

    this.loadOrder = resolveLoadOrder(this.manifests);
    if (this.loadOrder.length > 0) {
      log.info(`Plugin load order: ${this.loadOrder.join(" → ")}`);
    }

    for (const name of this.loadOrder) {
      try {
        const loaded = await this.loadPlugin(name);
        this.loadedPlugins.set(name, loaded);
        this.options.client.plugins.set(name, loaded.api);
        log.info(`✅ Loaded plugin: ${name}`);
      } catch (error) {
        log.error(`❌ Failed to load plugin ${name}:`, error);
        throw error;
      }
    }

    return this.loadedPlugins;
  }

  private scanPlugins(): void {
    const { pluginsDir } = this.options;
    log.debug(`Scanning plugins directory: ${pluginsDir}`);

    if (!fs.existsSync(pluginsDir)) {
      log.warn(`Plugins directory does not exist: ${pluginsDir}`);
      return;
    }

    for (const entry of fs.readdirSync(pluginsDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || entry.name.startsWith(".")) continue;

      const pluginPath = path.join(pluginsDir, entry.name);
      const manifestPath = path.join(pluginPath, "manifest.json");

      if (!fs.existsSync(manifestPath)) {
        log.warn(`Plugin ${entry.name} has no manifest.json, skipping`);
        continue;
      }

      try {
        const manifest = ManifestSchema.parse(JSON.parse(fs.readFileSync(manifestPath, "utf-8")));
        if (manifest.disabled) {
          log.debug(`Plugin ${manifest.name} is disabled, skipping`);
          continue;
        }
        this.manifests.set(manifest.name, manifest);
        this.pluginPaths.set(manifest.name, pluginPath);
        log.debug(`Found plugin: ${manifest.name} v${manifest.version}`);
      } catch (error) {
        log.error(`Failed to parse manifest for ${entry.name}:`, error);
      }
    }

    log.info(`Found ${this.manifests.size} plugin(s)`);
  }

  /**
   * Apply plugins.json (next to the plugins directory) if present
   */
  private applyConfigOverrides(): void {
    const configPath = path.join(path.dirname(this.options.pluginsDir), "plugins.json");
    if (!fs.existsSync(configPath)) return;

    try {
      const config = PluginsConfigSchema.parse(JSON.parse(fs.readFileSync(configPath, "utf-8")));
      const allowed = config.plugins ? new Set(config.plugins) : null;
      const disabled = new Set(config.disabled ?? []);

      for (const name of [...this.manifests.keys()]) {
        if (disabled.has(name) || (allowed && !allowed.has(name))) {
          log.debug(`Plugin ${name} excluded by plugins.json`);
          this.manifests.delete(name);
          this.pluginPaths.delete(name);
        }
      }
    } catch (error) {
      log.error("Failed to parse plugins.json:", error);
    }
  }

  private validatePlugins(): void {
    const errors: string[] = [];

    for (const [name, manifest] of this.manifests) {
      for (const dep of manifest.dependencies) {
        if (!this.manifests.has(dep)) {
          errors.push(`Plugin "${name}" requires "${dep}" which is not available`);
        }
      }
      for (const envKey of manifest.requiredEnv) {
        if (!process.env[envKey]) {
          errors.push(`Plugin "${name}" requires env var "${envKey}" which is not set`);
        }
      }
    }

    if (errors.length > 0) {
      for (const error of errors) {
        log.error(error);
      }
      throw new Error(`Plugin validation failed with ${errors.length} error(s)`);
    }
  }

  private async loadPlugin(name: string): Promise<LoadedPlugin> {
    const manifest = this.manifests.get(name);
    const pluginPath = this.pluginPaths.get(name);
    if (!manifest || !pluginPath) {
      throw new Error(`Plugin ${name} was not scanned`);
    }

    const entryPath = path.join(pluginPath, manifest.main);
    log.debug(`Loading plugin ${name} from ${entryPath}`);

    const imported: unknown = await import(pathToFileURL(entryPath).href);
    const shape = PluginModuleSchema.safeParse(imported);
    if (!shape.success) {
      throw new Error(`Plugin ${name} does not export an onLoad function`);
    }
    // The schema only proves the exports exist; their signatures are the plugin's contract
    const module = imported as PluginModule;

    const dependencies = new Map<string, PluginAPI>();
    for (const dep of [...manifest.dependencies, ...manifest.optionalDependencies]) {
      const depPlugin = this.loadedPlugins.get(dep);
      if (depPlugin) dependencies.set(dep, depPlugin.api);
    }

    const logger = this.createPluginLogger(name);
    const api = await module.onLoad(this.createPluginContext(manifest, pluginPath, dependencies, logger));

    if (module.commands) {
      await this.loadPluginCommands(name, path.join(pluginPath, module.commands));
    }
    if (module.events) {
      await this.loadPluginEvents(name, path.join(pluginPath, module.events));
    }

    return { manifest, path: pluginPath, module, api, logger };
  }

  private async loadPluginCommands(pluginName: string, dir: string): Promise<void> {
    if (!fs.existsSync(dir)) {
      log.warn(`Plugin ${pluginName} commands path does not exist: ${dir}`);
      return;
    }

    for (const file of this.scanDirectory(dir)) {
      const imported: unknown = await import(pathToFileURL(file).href);
      const parsed = CommandModuleSchema.safeParse(imported);
      if (!parsed.success) {
        log.warn(`Command file ${file} missing data or execute export, skipping`);
        continue;
      }

      const commandModule = imported as Pick<PluginCommand, "execute" | "autocomplete"> & { data: { toJSON(): PluginCommand["data"] } };
      this.options.commandManager.registerCommand({
        data: commandModule.data.toJSON(),
        config: { pluginName, adminOnly: parsed.data.config?.adminOnly ?? false },
        execute: commandModule.execute,
        autocomplete: commandModule.autocomplete,
      });
      log.debug(`Loaded command: /${parsed.data.data.name} from plugin ${pluginName}`);
    }
  }

  private async loadPluginEvents(pluginName: string, dir: string): Promise<void> {
    if (!fs.existsSync(dir)) {
      log.warn(`Plugin ${pluginName} events path does not exist: ${dir}`);
      return;
    }

    for (const file of this.scanDirectory(dir)) {
      const imported: unknown = await import(pathToFileURL(file).href);
      const parsed = EventModuleSchema.safeParse(imported);
      if (!parsed.success) {
        log.warn(`Event file ${file} missing event or execute export, skipping`);
        continue;
      }

      const eventModule = imported as { event: keyof ClientEvents; once?: boolean; execute: (client: RollcallClient, ...args: ClientEvents[keyof ClientEvents]) => Promise<void> };
      this.options.eventManager.registerEvent({
        event: eventModule.event,
        once: eventModule.once ?? false,
        pluginName,
        execute: eventModule.execute,
      });
      log.debug(`Loaded event: ${eventModule.event} from plugin ${pluginName}`);
    }
  }

  /**
   * Recursively list .ts/.js files, skipping tests and declarations
   */
  private scanDirectory(dir: string): string[] {
    const results: string[] = [];

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        results.push(...this.scanDirectory(fullPath));
      } else if (/\.(ts|js)$/.test(entry.name) && !/\.(d|test|spec)\.ts$/.test(entry.name)) {
        results.push(fullPath);
      }
    }

    return results.sort();
  }

  private createPluginContext(manifest: PluginManifest, pluginPath: string, dependencies: Map<string, PluginAPI>, logger: PluginLogger): PluginContext {
    return {
      client: this.options.client,
      env: this.options.env,
      manifest,
      pluginPath,
      logger,
      dependencies,
      getEnv: (key: string) => process.env[key] || undefined,
      componentCallbackService: this.options.componentCallbackService,
      apiManager: this.options.apiManager,
    };
  }

  private createPluginLogger(pluginName: string): PluginLogger {
    const prefix = `[${pluginName}]`;
    return {
      info: (...args) => log.info(prefix, ...args),
      warn: (...args) => log.warn(prefix, ...args),
      error: (...args) => log.error(prefix, ...args),
      debug: (...args) => log.debug(prefix, ...args),
    };
  }

  getPlugin(name: string): LoadedPlugin | undefined {
    return this.loadedPlugins.get(name);
  }

  getAllPlugins(): Map<string, LoadedPlugin> {
    return this.loadedPlugins;
  }

  /**
   * Call onDisable in reverse load order
   */
  async unloadAll(): Promise<void> {
    for (const name of [...this.loadOrder].reverse()) {
      const plugin = this.loadedPlugins.get(name);
      if (!plugin?.module.onDisable) continue;
      try {
        await plugin.module.onDisable(plugin.logger, plugin.api);
        log.debug(`Plugin ${name} unloaded`);
      } catch (error) {
        log.error(`Failed to unload plugin ${name}:`, error);
      }
    }
  }
}
