/**
 * RoleApplier - applies a successful verification to the guild member
 *
 * Roles are looked up by name. A role missing from the guild is reported,
 * not fatal; the nickname is best effort since Discord refuses to rename
 * the guild owner or members above the bot.
 */

import type { Guild, GuildMember, Role } from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { DiscordApiError, describeError } from "../../lib/utils/errors.js";
import type { ThingGetter } from "../../lib/utils/ThingGetter.js";

const log = createLogger("verification:roles");

/** Discord's nickname limit */
const MAX_NICKNAME_LENGTH = 32;

export interface RoleApplyResult {
  applied: string[];
  missing: string[];
  nicknameSet: boolean;
}

export class RoleApplier {
  constructor(private readonly thingGetter: ThingGetter) {}

  async apply(guild: Guild, discordId: string, displayName: string, roleNames: string[]): Promise<RoleApplyResult> {
    const member = await this.thingGetter.getMember(guild, discordId);
    if (!member) {
      throw new DiscordApiError(`Member ${discordId} is not in ${guild.name}`);
    }

    const nicknameSet = await this.setNickname(member, displayName);

    const roles: Role[] = [];
    const missing: string[] = [];
    for (const name of roleNames) {
      const role = await this.thingGetter.getRoleByName(guild, name);
      if (role) {
        roles.push(role);
      } else {
        missing.push(name);
      }
    }

    if (missing.length > 0) {
      log.warn(`Roles not found in ${guild.name}: ${missing.join(", ")}. Run /roles sync to create them.`);
    }

    const toAdd = roles.filter((role) => !member.roles.cache.has(role.id));
    if (toAdd.length > 0) {
      try {
        await member.roles.add(toAdd, "Verified");
      } catch (error) {
        throw new DiscordApiError(`Failed to assign roles to ${discordId}`, error);
      }
    }

    return { applied: roles.map((role) => role.name), missing, nicknameSet };
  }

  private async setNickname(member: GuildMember, displayName: string): Promise<boolean> {
    const nickname = displayName.slice(0, MAX_NICKNAME_LENGTH);
    if (member.nickname === nickname) return true;
    if (!member.manageable) {
      log.debug(`Cannot rename ${member.id}: member is above the bot`);
      return false;
    }
    try {
      await member.setNickname(nickname, "Verified");
      return true;
    } catch (error) {
      log.warn(`Failed to set nickname for ${member.id}: ${describeError(error)}`);
      return false;
    }
  }
}
