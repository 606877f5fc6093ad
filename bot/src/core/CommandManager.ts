/**
 * CommandManager - Collects slash commands from plugins and registers them
 * to the managed guild (guild-scoped for instant updates)
 */

import { REST, Routes, type ChatInputCommandInteraction, type AutocompleteInteraction, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { RollcallClient } from "../types/Client";
import type { PluginAPI } from "../types/Plugin";
import log from "../utils/logger";

export interface PluginCommandConfig {
  /** Which plugin owns this command */
  pluginName: string;
  /** Restrict to owners, maintainers and members with Manage Server */
  adminOnly?: boolean;
}

export interface CommandContext {
  interaction: ChatInputCommandInteraction;
  client: RollcallClient;
  /** Get a loaded plugin's API by name */
  getPluginAPI: <T = PluginAPI>(pluginName: string) => T | undefined;
}

export interface AutocompleteContext extends Omit<CommandContext, "interaction"> {
  interaction: AutocompleteInteraction;
}

export interface PluginCommand {
  data: RESTPostAPIChatInputApplicationCommandsJSONBody;
  config: PluginCommandConfig;
  execute: (context: CommandContext) => Promise<void>;
  autocomplete?: (context: AutocompleteContext) => Promise<void>;
}

export class CommandManager {
  private rest: REST;
  private commands: Map<string, PluginCommand> = new Map();

  constructor(
    private readonly client: RollcallClient,
    botToken: string,
  ) {
    this.rest = new REST({ version: "10" }).setToken(botToken);
  }

  registerCommand(command: PluginCommand): void {
    const name = command.data.name;
    if (this.commands.has(name)) {
      log.warn(`Command "${name}" already registered, overwriting`);
    }
    this.commands.set(name, command);
    log.debug(`Registered command: ${name} (plugin: ${command.config.pluginName})`);
  }

  getCommand(name: string): PluginCommand | undefined {
    return this.commands.get(name);
  }

  getAllCommands(): Map<string, PluginCommand> {
    return this.commands;
  }

  /**
   * Replace the guild's command set with every registered command
   */
  async registerCommandsToGuild(guildId: string): Promise<void> {
    const clientId = this.client.user.id;
    const body = [...this.commands.values()].map((command) => command.data);

    if (body.length === 0) {
      log.warn("No commands to register");
      return;
    }

    log.info(`Registering ${body.length} command(s) to guild ${guildId}...`);
    await this.rest.put(Routes.applicationGuildCommands(clientId, guildId), { body });
    log.info(`✅ Registered ${body.length} command(s) for guild ${guildId}`);
  }

  getStats(): { total: number; adminOnly: number; byPlugin: Record<string, string[]> } {
    const byPlugin: Record<string, string[]> = {};
    let adminOnly = 0;

    for (const command of this.commands.values()) {
      (byPlugin[command.config.pluginName] ??= []).push(command.data.name);
      if (command.config.adminOnly) adminOnly++;
    }

    return { total: this.commands.size, adminOnly, byPlugin };
  }
}
