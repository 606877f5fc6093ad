/**
 * InteractionHandler - Routes Discord interactions to commands and components
 *
 * - Slash commands → CommandManager (admin-only commands pass the access check first)
 * - Buttons / select menus → ComponentCallbackService
 * - Autocomplete → the command's autocomplete handler
 */

import { Events, type Interaction, type ChatInputCommandInteraction, type AutocompleteInteraction } from "discord.js";
import type { RollcallClient } from "../types/Client";
import type { CommandManager, CommandContext, AutocompleteContext } from "./CommandManager";
import type { ComponentCallbackService } from "./services/ComponentCallbackService";
import type { PluginAPI } from "../types/Plugin";
import log from "../utils/logger";
import { captureException } from "../utils/sentry";

/**
 * Decides whether the invoking user may run admin-only commands
 */
export type AdminCheck = (interaction: ChatInputCommandInteraction) => Promise<boolean>;

export interface InteractionHandlerOptions {
  client: RollcallClient;
  commandManager: CommandManager;
  componentCallbackService: ComponentCallbackService;
  isAdmin: AdminCheck;
}

const ERROR_REPLY = { content: "❌ An error occurred while executing this command.", ephemeral: true } as const;

export class InteractionHandler {
  private readonly client: RollcallClient;
  private readonly commandManager: CommandManager;
  private readonly componentCallbackService: ComponentCallbackService;
  private readonly isAdmin: AdminCheck;

  constructor(options: InteractionHandlerOptions) {
    this.client = options.client;
    this.commandManager = options.commandManager;
    this.componentCallbackService = options.componentCallbackService;
    this.isAdmin = options.isAdmin;
  }

  attach(): void {
    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((error: unknown) => {
        log.error("Unhandled interaction error:", error);
        captureException(error, { context: "InteractionHandler" });
      });
    });

    log.info("InteractionHandler attached");
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleCommand(interaction);
      return;
    }

    if (interaction.isButton() || interaction.isAnySelectMenu()) {
      await this.componentCallbackService.execute(interaction);
      return;
    }

    if (interaction.isAutocomplete()) {
      await this.handleAutocomplete(interaction);
    }
  }

  private createContext(interaction: ChatInputCommandInteraction): CommandContext {
    return {
      interaction,
      client: this.client,
      // Plugin APIs are registered untyped; callers name the API type they expect
      getPluginAPI: <T = PluginAPI>(name: string) => this.client.plugins.get(name) as T | undefined,
    };
  }

  private async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const command = this.commandManager.getCommand(interaction.commandName);

    if (!command) {
      log.warn(`Unknown command: ${interaction.commandName}`);
      await this.safeReply(interaction, { content: "❌ This command is not available.", ephemeral: true });
      return;
    }

    if (command.config.adminOnly && !(await this.isAdmin(interaction))) {
      log.info(`Denied /${interaction.commandName} to ${interaction.user.tag} (${interaction.user.id})`);
      await this.safeReply(interaction, { content: "❌ You do not have permission to use this command.", ephemeral: true });
      return;
    }

    try {
      await command.execute(this.createContext(interaction));
    } catch (error) {
      log.error(`Command ${interaction.commandName} execution failed:`, error);
      captureException(error, {
        context: "Command Execution",
        command: interaction.commandName,
        guild: interaction.guildId,
        user: interaction.user.id,
      });
      await this.safeReply(interaction, ERROR_REPLY);
    }
  }

  private async handleAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
    const command = this.commandManager.getCommand(interaction.commandName);

    const context: AutocompleteContext = {
      interaction,
      client: this.client,
      getPluginAPI: <T = PluginAPI>(name: string) => this.client.plugins.get(name) as T | undefined,
    };

    try {
      if (command?.autocomplete) {
        await command.autocomplete(context);
      } else {
        await interaction.respond([]);
      }
    } catch (error) {
      log.error(`Autocomplete for ${interaction.commandName} failed:`, error);
      await interaction.respond([]).catch((respondError: unknown) => log.debug("Autocomplete fallback failed:", respondError));
    }
  }

  /**
   * Reply, or edit the deferred reply, without throwing
   */
  private async safeReply(interaction: ChatInputCommandInteraction, reply: { content: string; ephemeral: boolean }): Promise<void> {
    try {
      if (interaction.deferred) {
        await interaction.editReply({ content: reply.content });
      } else if (!interaction.replied) {
        await interaction.reply(reply);
      }
    } catch (error) {
      log.debug(`Could not reply to /${interaction.commandName}:`, error);
    }
  }
}
