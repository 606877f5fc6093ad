/**
 * /verification revoke <user> [reason]
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { VerificationPluginAPI } from "../../index.js";

export async function handleRevoke(context: CommandContext, pluginAPI: VerificationPluginAPI): Promise<void> {
  const { interaction } = context;
  const { engine } = pluginAPI;

  const user = interaction.options.getUser("user", true);
  const reason = interaction.options.getString("reason") ?? `Revoked by ${interaction.user.username}`;

  await interaction.deferReply({ ephemeral: true });

  const revoked = await engine.revoke(user.id, reason);
  if (!revoked) {
    await interaction.editReply(`❌ <@${user.id}> has no verification record.`);
    return;
  }

  const saved = await engine.saveDatabase();
  await interaction.editReply(
    `⛔ Revoked verification of <@${user.id}> (${revoked.displayName}). Their roles were not removed.` + (saved ? "" : "\n⚠️ The user database could not be saved; the change is held in memory."),
  );
}
