import { ButtonBuilder, type ButtonInteraction } from "discord.js";
import type { ComponentCallbackService, ComponentInteraction } from "../../../../src/core/services/ComponentCallbackService.js";

type ButtonCallback = (interaction: ButtonInteraction) => Promise<void>;

/**
 * Button bound to an inline callback that expires after `ttl` seconds
 *
 * @example
 * ```ts
 * const commit = lib.createButtonBuilder(async (i) => {
 *   await i.update({ content: "Committed" });
 * }, 120)
 *   .setLabel("Commit")
 *   .setStyle(ButtonStyle.Success);
 * const row = new ActionRowBuilder<ButtonBuilder>().addComponents(commit);
 * ```
 */
export class RollcallButtonBuilder extends ButtonBuilder {
  private static callbackService: ComponentCallbackService | null = null;

  /** Called by the lib plugin on load */
  static setCallbackService(service: ComponentCallbackService | null): void {
    RollcallButtonBuilder.callbackService = service;
  }

  constructor(callback: ButtonCallback, ttl?: number) {
    super();

    const service = RollcallButtonBuilder.callbackService;
    if (!service) {
      throw new Error("RollcallButtonBuilder: Callback service not initialized. Is the lib plugin loaded?");
    }

    const onInteraction = async (interaction: ComponentInteraction) => {
      if (!interaction.isButton()) return;
      await callback(interaction);
    };

    this.setCustomId(service.register(onInteraction, ttl));
  }
}
