/**
 * /config status and /config diff
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { RosterPluginAPI } from "../../index.js";
import { buildDiffEmbed, isEmptyDiff } from "../../utils/diffEmbed.js";

export async function handleStatus(context: CommandContext, pluginAPI: RosterPluginAPI): Promise<void> {
  const { interaction } = context;
  const { configStore, stagingArea, lib } = pluginAPI;

  const seasons = configStore.getAllSeasons();
  const report = configStore.getLastReport();

  const seasonLines = seasons.map((s) => `${s.active ? "🟢" : "⚪"} **${s.seasonId}** — ${s.displayName}: ${s.roster.length} users, ${s.channels.length} channels`);

  const embed = lib
    .createEmbedBuilder()
    .setTitle("⚙️ Configuration status")
    .addFields(
      { name: `Seasons (${seasons.length})`, value: seasonLines.join("\n").slice(0, 1024) || "No seasons loaded" },
      { name: "Default member role", value: configStore.getDefaultMemberRoleName(), inline: true },
      { name: "Global roles", value: String(configStore.getGlobalConfig().roles.length), inline: true },
      { name: "Staged", value: stagingArea.getSummary(), inline: false },
    );

  const problems = [
    ...report.globalErrors.map((e) => `• ${e.file}: ${e.reason}`),
    ...report.skipped.map((s) => `• season ${s.seasonId} skipped (${s.file}): ${s.reason}`),
    ...report.duplicates.map((d) => `• ${d.verificationId} in ${d.seasons.join(", ")}`),
  ];
  if (problems.length > 0) {
    embed.addFields({ name: "⚠️ Load warnings", value: problems.join("\n").slice(0, 1024) });
  }

  await interaction.reply({ embeds: [embed], ephemeral: true });
}

export async function handleDiff(context: CommandContext, pluginAPI: RosterPluginAPI): Promise<void> {
  const { interaction } = context;
  const { stagingArea, lib } = pluginAPI;

  const diff = stagingArea.getDiff();
  if (isEmptyDiff(diff)) {
    await interaction.reply({ content: "📭 Nothing is staged. Use `/config upload` to stage a file.", ephemeral: true });
    return;
  }

  await interaction.reply({ embeds: [buildDiffEmbed(lib, diff, stagingArea.getSummary())], ephemeral: true });
}
