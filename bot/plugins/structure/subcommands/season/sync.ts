import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { StructurePluginAPI } from "../../index.js";
import { isRollcallError } from "../../../lib/utils/errors.js";
import { buildSeasonSyncEmbed } from "../../utils/summaryEmbed.js";

export async function handleSync(context: CommandContext, pluginAPI: StructurePluginAPI): Promise<void> {
  const { interaction } = context;
  const seasonId = interaction.options.getString("season", true).trim();

  await interaction.deferReply({ ephemeral: true });

  try {
    const summary = await pluginAPI.service.syncSeason(seasonId);
    await interaction.editReply({ embeds: [buildSeasonSyncEmbed(pluginAPI.lib, summary)] });
  } catch (error) {
    if (isRollcallError(error) && error.code === "CONFIG_NOT_FOUND") {
      await interaction.editReply(`❌ Season \`${seasonId}\` is not loaded. Check /season list.`);
      return;
    }
    throw error;
  }
}
