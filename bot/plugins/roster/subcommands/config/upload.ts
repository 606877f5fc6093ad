/**
 * /config upload - Stage an attached JSON file and offer Commit / Cancel
 */

import { ActionRowBuilder, ButtonStyle, type ButtonBuilder, type ButtonInteraction } from "discord.js";
import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { RosterPluginAPI } from "../../index.js";
import { createLogger } from "../../../../src/core/Logger.js";
import { ConfigValidationError, isRollcallError } from "../../../lib/utils/errors.js";
import { buildCommitEmbed, buildDiffEmbed } from "../../utils/diffEmbed.js";

const log = createLogger("roster:upload");

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

async function downloadAttachment(url: string): Promise<string> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Attachment download failed with HTTP ${response.status}`);
  }
  return response.text();
}

export async function handleUpload(context: CommandContext, pluginAPI: RosterPluginAPI): Promise<void> {
  const { interaction } = context;
  const { stagingArea, lib } = pluginAPI;
  const { RollcallEmbedBuilder } = lib.builders;

  const file = interaction.options.getAttachment("file", true);
  const type = interaction.options.getString("type", true);
  const seasonId = interaction.options.getString("season")?.trim();

  if (type === "season" && !seasonId) {
    await interaction.reply({ content: "❌ A `season` id is required when uploading a roster.", ephemeral: true });
    return;
  }
  if (file.size > MAX_UPLOAD_BYTES) {
    await interaction.reply({ content: "❌ File is larger than 5 MB.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const actor = interaction.user.username;
  const text = await downloadAttachment(file.url);

  try {
    if (type === "season" && seasonId) {
      stagingArea.stageSeasonUsers(seasonId, text, actor);
    } else {
      stagingArea.stageSpecialMembers(text, actor);
    }
  } catch (error) {
    if (!isRollcallError(error)) throw error;
    const details = error instanceof ConfigValidationError ? error.issues.slice(0, 10).map((i) => `• ${i.path || "(root)"}: ${i.message}`) : [];
    await interaction.editReply({
      embeds: [RollcallEmbedBuilder.error(`Could not stage **${file.name}**\n${details.length > 0 ? details.join("\n") : error.message}`)],
    });
    return;
  }

  const ttl = stagingArea.timeoutSeconds;

  const commitButton = lib
    .createButtonBuilder(async (button: ButtonInteraction) => {
      await button.deferUpdate();
      try {
        const result = await stagingArea.commit();
        await button.editReply({ embeds: [buildCommitEmbed(lib, result)], components: [] });
      } catch (error) {
        if (isRollcallError(error) && error.code === "NO_STAGED_CONFIG") {
          await button.editReply({ embeds: [RollcallEmbedBuilder.warning("Nothing is staged anymore (expired or cancelled).")], components: [] });
          return;
        }
        log.error("Commit from upload button failed:", error);
        throw error;
      }
    }, ttl)
    .setLabel("Commit")
    .setEmoji("✅")
    .setStyle(ButtonStyle.Success);

  const cancelButton = lib
    .createButtonBuilder(async (button: ButtonInteraction) => {
      stagingArea.clear();
      await button.update({ embeds: [RollcallEmbedBuilder.info("Staged configuration discarded.")], components: [] });
    }, ttl)
    .setLabel("Cancel")
    .setEmoji("🗑️")
    .setStyle(ButtonStyle.Danger);

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(commitButton, cancelButton);
  const embed = buildDiffEmbed(lib, stagingArea.getDiff(), stagingArea.getSummary()).addFields({
    name: "Expires",
    value: `Staged content is discarded <t:${Math.floor(Date.now() / 1000) + ttl}:R> unless committed.`,
  });

  await interaction.editReply({ embeds: [embed], components: [row] });
}
