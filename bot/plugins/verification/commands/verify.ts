/**
 * /verify [id] - verify with a roster id
 *
 * With web verification enabled and an id given, hands out the OAuth link.
 * Without it, verifies on the spot. Without an id, starts the DM flow.
 */

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { createLogger } from "../../../src/core/Logger.js";
import { describeError } from "../../lib/utils/errors.js";
import type { VerificationPluginAPI } from "../index.js";
import { verificationPrompt } from "../utils/messages.js";
import { outcomeMessage } from "../utils/outcome.js";

const log = createLogger("verification:verify");

export const data = new SlashCommandBuilder()
  .setName("verify")
  .setDescription("Verify your identity to get access to the server")
  .addStringOption((opt) => opt.setName("id").setDescription("Your user ID from the roster").setMaxLength(128));

export const config = {
  adminOnly: false,
};

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;

  const pluginAPI = getPluginAPI<VerificationPluginAPI>("verification");
  if (!pluginAPI) {
    await interaction.reply({ content: "❌ Verification plugin not loaded.", ephemeral: true });
    return;
  }

  const { engine, flow, lib } = pluginAPI;
  const claimedId = interaction.options.getString("id")?.trim();

  if (!claimedId) {
    if (pluginAPI.webVerification) {
      await interaction.reply({ content: "Run `/verify id:<your user ID>` to get your verification link.", ephemeral: true });
      return;
    }
    await startDmVerification(context, pluginAPI);
    return;
  }

  const failure = await engine.precheck(claimedId, interaction.user.id);
  if (failure) {
    await interaction.reply({ content: `❌ ${failure.message}`, ephemeral: true });
    return;
  }

  const link = pluginAPI.verificationLink(claimedId);
  if (link) {
    const row = new ActionRowBuilder<ButtonBuilder>().addComponents(new ButtonBuilder().setLabel("Verify with Discord").setStyle(ButtonStyle.Link).setURL(link));
    await interaction.reply({
      embeds: [lib.createEmbedBuilder().setTitle("🔐 Verification").setDescription("Open the link below and sign in with Discord to finish verifying.")],
      components: [row],
      ephemeral: true,
    });
    return;
  }

  await interaction.deferReply({ ephemeral: true });
  const outcome = await flow.verify(interaction.user.id, claimedId);
  await interaction.editReply(outcomeMessage(outcome));
}

async function startDmVerification(context: CommandContext, pluginAPI: VerificationPluginAPI): Promise<void> {
  const { interaction } = context;
  const { engine, lib } = pluginAPI;

  if (engine.isVerified(interaction.user.id)) {
    await interaction.reply({ content: "✅ You are already verified.", ephemeral: true });
    return;
  }

  const dm = await lib.tryCatch(interaction.user.createDM());
  if (dm.error !== null) {
    log.warn(`Could not open a DM with ${interaction.user.id}: ${describeError(dm.error)}`);
    await interaction.reply({ content: "❌ I couldn't send you a DM. Enable DMs from server members and try again.", ephemeral: true });
    return;
  }

  const pending = engine.startVerification(interaction.user.id, dm.data.id);
  if (pending) {
    await interaction.reply({ content: `⏳ ${pending.message}`, ephemeral: true });
    return;
  }

  try {
    await interaction.user.send(verificationPrompt(lib.thingGetter.getMemberName(interaction.user)));
  } catch (error) {
    engine.cancelVerification(interaction.user.id);
    log.warn(`Could not DM ${interaction.user.id}: ${describeError(error)}`);
    await interaction.reply({ content: "❌ I couldn't send you a DM. Enable DMs from server members and try again.", ephemeral: true });
    return;
  }

  await interaction.reply({ content: "📨 Check your DMs and reply with your user ID.", ephemeral: true });
}
