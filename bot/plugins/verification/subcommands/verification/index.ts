/**
 * /verification subcommand router
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { VerificationPluginAPI } from "../../index.js";
import { handleLookup } from "./lookup.js";
import { handleRevoke } from "./revoke.js";

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const subcommand = interaction.options.getSubcommand();

  const pluginAPI = getPluginAPI<VerificationPluginAPI>("verification");
  if (!pluginAPI) {
    await interaction.reply({ content: "❌ Verification plugin not loaded.", ephemeral: true });
    return;
  }

  switch (subcommand) {
    case "lookup":
      await handleLookup(context, pluginAPI);
      break;
    case "revoke":
      await handleRevoke(context, pluginAPI);
      break;
    default:
      await interaction.reply({ content: "❌ Unknown subcommand.", ephemeral: true });
  }
}
