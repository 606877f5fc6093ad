/**
 * DM verification - a DM from a member with a pending prompt is their claimed id
 */

import { Events, type Message } from "discord.js";
import type { RollcallClient } from "../../../../src/types/Client.js";
import { createLogger } from "../../../../src/core/Logger.js";
import type { VerificationPluginAPI } from "../../index.js";
import { outcomeMessage } from "../../utils/outcome.js";

const log = createLogger("verification:dm");

export const event = Events.MessageCreate;
export const pluginName = "verification";

export async function execute(client: RollcallClient, message: Message): Promise<void> {
  if (message.author.bot || message.inGuild()) return;

  const pluginAPI = client.plugins.get("verification") as VerificationPluginAPI | undefined;
  if (!pluginAPI || !pluginAPI.engine.isPending(message.author.id)) return;

  const claimedId = message.content.trim();
  if (!claimedId) return;

  log.debug(`Verification attempt from ${message.author.username} via DM`);
  const outcome = await pluginAPI.flow.verify(message.author.id, claimedId);
  await message.reply(outcomeMessage(outcome, { dm: true }));
}
