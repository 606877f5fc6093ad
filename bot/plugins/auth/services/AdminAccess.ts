/**
 * AdminAccess - who may use the admin API and admin-only commands
 *
 * Owners (OWNER_IDS), maintainers listed in global/assignments.json, and
 * members of the managed guild holding Administrator.
 */

import { PermissionFlagsBits } from "discord.js";
import type { ConfigStore } from "../../roster/services/ConfigStore.js";
import type { ThingGetter } from "../../lib/utils/ThingGetter.js";

/** Resolves whether a user holds Administrator in the managed guild */
export type GuildAdminCheck = (userId: string) => Promise<boolean>;

export interface AdminAccessOptions {
  ownerIds: readonly string[];
  configStore: Pick<ConfigStore, "isMaintainer">;
  isGuildAdministrator: GuildAdminCheck;
}

export type AdminReason = "owner" | "maintainer" | "administrator";

export class AdminAccess {
  constructor(private readonly options: AdminAccessOptions) {}

  /**
   * Why the user is an admin, or null if they are not
   */
  async check(userId: string, username?: string): Promise<AdminReason | null> {
    if (this.options.ownerIds.includes(userId)) return "owner";
    if (this.options.configStore.isMaintainer(userId, username)) return "maintainer";
    if (await this.options.isGuildAdministrator(userId)) return "administrator";
    return null;
  }

  async isAdmin(userId: string, username?: string): Promise<boolean> {
    return (await this.check(userId, username)) !== null;
  }
}

/**
 * GuildAdminCheck backed by the bot's view of the guild
 */
export function guildAdministratorCheck(thingGetter: ThingGetter, guildId: string): GuildAdminCheck {
  return async (userId) => {
    const guild = await thingGetter.getGuild(guildId);
    if (!guild) return false;
    const member = await thingGetter.getMember(guild, userId);
    return member?.permissions.has(PermissionFlagsBits.Administrator) ?? false;
  };
}
