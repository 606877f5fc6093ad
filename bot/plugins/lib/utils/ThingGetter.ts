import type { Client, Guild, GuildMember, User, Role, GuildBasedChannel, ChannelType } from "discord.js";

/**
 * ThingGetter - Cache-first Discord entity lookup
 *
 * Discord.js caches are not always populated, so every getter checks the
 * cache first and then falls back to the API. Lookups return null on
 * failure instead of throwing.
 */
export class ThingGetter {
  constructor(private readonly client: Client) {}

  async getUser(userId: string): Promise<User | null> {
    try {
      return this.client.users.cache.get(userId) ?? (await this.client.users.fetch(userId));
    } catch {
      return null;
    }
  }

  async getGuild(guildId: string): Promise<Guild | null> {
    try {
      return this.client.guilds.cache.get(guildId) ?? (await this.client.guilds.fetch(guildId));
    } catch {
      return null;
    }
  }

  async getMember(guild: Guild, userId: string): Promise<GuildMember | null> {
    try {
      return guild.members.cache.get(userId) ?? (await guild.members.fetch(userId));
    } catch {
      return null;
    }
  }

  /**
   * Roles are addressed by name in config files. Names are compared exactly;
   * the first match by position wins when a guild has duplicates.
   */
  async getRoleByName(guild: Guild, name: string): Promise<Role | null> {
    const find = () =>
      guild.roles.cache
        .filter((role) => role.name === name)
        .sort((a, b) => b.position - a.position)
        .first() ?? null;

    const cached = find();
    if (cached) return cached;

    try {
      await guild.roles.fetch();
      return find();
    } catch {
      return null;
    }
  }

  /**
   * Find a channel by name and type, optionally under a given category
   */
  async getChannelByName(guild: Guild, name: string, type: ChannelType, parentId?: string | null): Promise<GuildBasedChannel | null> {
    const find = () =>
      guild.channels.cache.find((channel) => channel.name === name && channel.type === type && (parentId === undefined || channel.parentId === parentId)) ?? null;

    const cached = find();
    if (cached) return cached;

    try {
      await guild.channels.fetch();
      return find();
    } catch {
      return null;
    }
  }

  /**
   * Nickname if member, otherwise global name or username
   */
  getMemberName(userOrMember: User | GuildMember): string {
    if ("nickname" in userOrMember && userOrMember.nickname) {
      return userOrMember.nickname;
    }
    if ("user" in userOrMember) {
      return userOrMember.user.globalName ?? userOrMember.user.username;
    }
    return userOrMember.globalName ?? userOrMember.username;
  }
}
