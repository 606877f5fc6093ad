/**
 * /config commit and /config cancel
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { RosterPluginAPI } from "../../index.js";
import { isRollcallError } from "../../../lib/utils/errors.js";
import { buildCommitEmbed } from "../../utils/diffEmbed.js";

export async function handleCommit(context: CommandContext, pluginAPI: RosterPluginAPI): Promise<void> {
  const { interaction } = context;
  const { stagingArea, lib } = pluginAPI;

  await interaction.deferReply({ ephemeral: true });

  try {
    const result = await stagingArea.commit();
    await interaction.editReply({ embeds: [buildCommitEmbed(lib, result)] });
  } catch (error) {
    if (isRollcallError(error) && error.code === "NO_STAGED_CONFIG") {
      await interaction.editReply("📭 Nothing is staged, nothing to commit.");
      return;
    }
    throw error;
  }
}

export async function handleCancel(context: CommandContext, pluginAPI: RosterPluginAPI): Promise<void> {
  const { interaction } = context;

  const discarded = pluginAPI.stagingArea.clear();
  await interaction.reply({
    content: discarded ? "🗑️ Staged configuration discarded." : "📭 Nothing was staged.",
    ephemeral: true,
  });
}
