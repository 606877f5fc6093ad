/**
 * /config reload - Re-read the config tree from disk
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { RosterPluginAPI } from "../../index.js";

export async function handleReload(context: CommandContext, pluginAPI: RosterPluginAPI): Promise<void> {
  const { interaction } = context;
  const { RollcallEmbedBuilder } = pluginAPI.lib.builders;

  await interaction.deferReply({ ephemeral: true });

  const report = await pluginAPI.configStore.reload();
  const warnings = report.globalErrors.length + report.skipped.length + report.duplicates.length;

  const embed =
    warnings === 0
      ? RollcallEmbedBuilder.success(`Reloaded ${report.seasons.length} season(s)`)
      : RollcallEmbedBuilder.warning(`Reloaded ${report.seasons.length} season(s) with ${warnings} warning(s). See \`/config status\`.`);

  await interaction.editReply({ embeds: [embed] });
}
