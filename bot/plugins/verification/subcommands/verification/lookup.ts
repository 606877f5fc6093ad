/**
 * /verification lookup <user|id>
 */

import { time } from "discord.js";
import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { VerificationPluginAPI } from "../../index.js";
import type { TrackedUser } from "../../models/TrackedUser.js";

const STATUS_ICONS: Record<TrackedUser["status"], string> = {
  pending: "⏳",
  verified: "✅",
  revoked: "⛔",
  expired: "⌛",
};

export async function handleLookup(context: CommandContext, pluginAPI: VerificationPluginAPI): Promise<void> {
  const { interaction } = context;
  const { engine, roster, lib } = pluginAPI;

  const user = interaction.options.getUser("user");
  const claimedId = interaction.options.getString("id")?.trim();
  if (!user && !claimedId) {
    await interaction.reply({ content: "❌ Give a user or a verification id.", ephemeral: true });
    return;
  }

  const record = user ? engine.getUser(user.id) : claimedId ? engine.findByVerificationId(claimedId) : undefined;
  const rosterMatch = claimedId ? roster.configStore.findUserByVerificationId(claimedId) : undefined;

  const embed = lib.createEmbedBuilder().setTitle("🔎 Verification lookup");

  if (rosterMatch) {
    embed.addFields({ name: "Roster", value: `**${rosterMatch.entry.displayName}** in ${rosterMatch.season.seasonId}`, inline: false });
  } else if (claimedId) {
    embed.addFields({ name: "Roster", value: `\`${claimedId}\` is not in any active season`, inline: false });
  }

  if (!record) {
    embed.setDescription(user ? `<@${user.id}> has no verification record.` : "No account is bound to this id.");
    await interaction.reply({ embeds: [embed], ephemeral: true });
    return;
  }

  const seasons = Object.entries(record.verificationIds)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([seasonId, id]) => `**${seasonId}**: \`${id}\``);

  embed.setDescription(`<@${record.discordId}> — ${STATUS_ICONS[record.status]} ${record.status}`).addFields(
    { name: "Display name", value: record.displayName, inline: true },
    { name: "Verified", value: time(new Date(record.verifiedAt), "R"), inline: true },
    { name: "Seasons", value: seasons.join("\n").slice(0, 1024) || "None", inline: false },
    { name: "Special roles", value: record.specialRoles.join(", ") || "None", inline: false },
  );
  if (record.notes) {
    embed.addFields({ name: "Notes", value: record.notes.slice(0, 1024) });
  }

  await interaction.reply({ embeds: [embed], ephemeral: true });
}
