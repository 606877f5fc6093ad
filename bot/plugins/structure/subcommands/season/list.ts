import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { StructurePluginAPI } from "../../index.js";

export async function handleList(context: CommandContext, pluginAPI: StructurePluginAPI): Promise<void> {
  const { interaction } = context;
  const { roster, lib } = pluginAPI;

  const seasons = roster.configStore.getAllSeasons();
  if (seasons.length === 0) {
    await interaction.reply({ content: "📭 No seasons are loaded.", ephemeral: true });
    return;
  }

  const lines = seasons.map((season) => {
    const status = season.active ? "🟢" : "⚪";
    return `${status} **${season.seasonId}** ${season.displayName} · ${season.roster.length} users · ${season.channels.length} channels · @${season.memberRoleName}`;
  });

  const embed = lib
    .createEmbedBuilder()
    .setTitle(`📅 Seasons (${seasons.length})`)
    .setDescription(lines.join("\n").slice(0, 4096));
  await interaction.reply({ embeds: [embed], ephemeral: true });
}
