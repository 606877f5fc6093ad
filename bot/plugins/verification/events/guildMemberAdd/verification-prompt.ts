/**
 * guildMemberAdd event - DM new members a verification prompt, restore returning ones
 */

import { Events, type GuildMember } from "discord.js";
import type { RollcallClient } from "../../../../src/types/Client.js";
import { createLogger } from "../../../../src/core/Logger.js";
import { describeError } from "../../../lib/utils/errors.js";
import type { VerificationPluginAPI } from "../../index.js";
import { verificationPrompt } from "../../utils/messages.js";

const log = createLogger("verification:member-add");

export const event = Events.GuildMemberAdd;
export const pluginName = "verification";

export async function execute(client: RollcallClient, member: GuildMember): Promise<void> {
  const pluginAPI = client.plugins.get("verification") as VerificationPluginAPI | undefined;
  if (!pluginAPI || member.user.bot || member.guild.id !== pluginAPI.guildId) return;

  const { engine, flow, lib } = pluginAPI;

  if (engine.isVerified(member.id)) {
    const { error } = await lib.tryCatch(flow.restore(member.guild, member.id));
    if (error) {
      log.error(`Failed to restore roles for returning member ${member.id}: ${describeError(error)}`);
    }
    return;
  }

  // A fresh join always gets a fresh prompt
  engine.cancelVerification(member.id);

  try {
    const dm = await member.createDM();
    await dm.send(verificationPrompt(lib.thingGetter.getMemberName(member)));
    engine.startVerification(member.id, dm.id);
    log.info(`Sent verification prompt to ${member.user.username} (${member.id})`);
  } catch (error) {
    log.warn(`Could not DM ${member.user.username} (${member.id}), they can use /verify: ${describeError(error)}`);
  }
}
