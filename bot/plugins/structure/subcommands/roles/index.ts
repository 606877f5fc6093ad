/**
 * /roles sync and /roles assignments
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { StructurePluginAPI } from "../../index.js";
import { buildAssignmentSyncEmbed, buildRoleSyncEmbed } from "../../utils/summaryEmbed.js";

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;

  const pluginAPI = getPluginAPI<StructurePluginAPI>("structure");
  if (!pluginAPI) {
    await interaction.reply({ content: "❌ Structure plugin not loaded.", ephemeral: true });
    return;
  }
  const { service, lib } = pluginAPI;

  switch (interaction.options.getSubcommand()) {
    case "sync": {
      await interaction.deferReply({ ephemeral: true });
      const summary = await service.syncRoles();
      await interaction.editReply({ embeds: [buildRoleSyncEmbed(lib, summary)] });
      break;
    }
    case "assignments": {
      if (!service.canSyncAssignments) {
        await interaction.reply({ content: "❌ Assignment sync needs the verification plugin.", ephemeral: true });
        return;
      }
      await interaction.deferReply({ ephemeral: true });
      const summary = await service.syncAssignments();
      await interaction.editReply({ embeds: [buildAssignmentSyncEmbed(lib, summary)] });
      break;
    }
    default:
      await interaction.reply({ content: "❌ Unknown subcommand.", ephemeral: true });
  }
}
