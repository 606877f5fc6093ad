/**
 * GuildStructureService - applies StructurePlanner output to the guild
 *
 * Every sync is idempotent: existing roles and channels are matched by name
 * and only changed when they differ from the plan. One failing role or
 * channel does not stop the rest; failures are collected in the summary.
 */

import {
  ChannelType,
  DiscordAPIError,
  OverwriteType,
  RESTJSONErrorCodes,
  type CategoryChannel,
  type Guild,
  type NonThreadGuildBasedChannel,
  type PermissionOverwriteManager,
  type Role,
} from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { ConfigNotFoundError, DiscordApiError, describeError } from "../../lib/utils/errors.js";
import type { ThingGetter } from "../../lib/utils/ThingGetter.js";
import type { ConfigStore } from "../../roster/services/ConfigStore.js";
import type { ChannelKind } from "../../roster/models/types.js";
import { planAssignments, planRoles, planSeason, type OverwriteSpec, type RoleSpec } from "./StructurePlanner.js";

const log = createLogger("structure:sync");

const CHANNEL_TYPES = {
  text: ChannelType.GuildText,
  voice: ChannelType.GuildVoice,
  forum: ChannelType.GuildForum,
  announcement: ChannelType.GuildAnnouncement,
} as const satisfies Record<ChannelKind, ChannelType>;

export interface RoleSyncSummary {
  created: string[];
  updated: string[];
  unchanged: string[];
  errors: string[];
  warnings: string[];
}

export interface SeasonSyncSummary {
  seasonId: string;
  category: "created" | "updated" | "unchanged";
  created: string[];
  updated: string[];
  unchanged: string[];
  errors: string[];
  warnings: string[];
}

export interface AssignmentSyncSummary {
  updated: string[];
  unchanged: number;
  notInGuild: string[];
  missingRoles: string[];
  unmatched: string[];
  errors: string[];
}

interface ResolvedOverwrite {
  id: string;
  type: OverwriteType;
  allow: bigint;
  deny: bigint;
}

/** Who holds which verification id; provided by the verification plugin */
export type VerificationLookup = (verificationId: string) => string | undefined;

export interface GuildStructureServiceOptions {
  configStore: ConfigStore;
  thingGetter: ThingGetter;
  guildId: string;
  /** Absent when the verification plugin is not loaded */
  lookupVerified?: VerificationLookup;
}

function formatError(name: string, error: unknown): string {
  if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.MissingPermissions) {
    return `${name}: role hierarchy issue, move the bot's role above it in server settings`;
  }
  return `${name}: ${describeError(error)}`;
}

function overwritesDiffer(manager: PermissionOverwriteManager, desired: ResolvedOverwrite[]): boolean {
  if (manager.cache.size !== desired.length) return true;
  return desired.some((want) => {
    const have = manager.cache.get(want.id);
    return !have || have.allow.bitfield !== want.allow || have.deny.bitfield !== want.deny;
  });
}

export class GuildStructureService {
  constructor(private readonly options: GuildStructureServiceOptions) {}

  private async guild(): Promise<Guild> {
    const guild = await this.options.thingGetter.getGuild(this.options.guildId);
    if (!guild) throw new DiscordApiError(`Guild ${this.options.guildId} is not reachable`);
    return guild;
  }

  // ── Roles ──────────────────────────────────────────────

  async syncRoles(): Promise<RoleSyncSummary> {
    const { configStore } = this.options;
    const plan = await configStore.lock.read(() => planRoles(configStore.getGlobalConfig(), configStore.getAllSeasons(), configStore.getDefaultMemberRoleName()));
    const guild = await this.guild();

    const summary: RoleSyncSummary = { created: [], updated: [], unchanged: [], errors: [], warnings: plan.warnings };
    for (const spec of plan.roles) {
      try {
        const outcome = await this.syncRole(guild, spec);
        summary[outcome].push(spec.name);
      } catch (error) {
        summary.errors.push(formatError(spec.name, error));
      }
    }

    log.info(`Role sync: ${summary.created.length} created, ${summary.updated.length} updated, ${summary.unchanged.length} unchanged, ${summary.errors.length} failed`);
    return summary;
  }

  private async syncRole(guild: Guild, spec: RoleSpec): Promise<"created" | "updated" | "unchanged"> {
    const existing = await this.options.thingGetter.getRoleByName(guild, spec.name);
    const fields = {
      color: spec.color,
      hoist: spec.hoist,
      mentionable: spec.mentionable,
      ...(spec.permissions !== null ? { permissions: spec.permissions } : {}),
    };

    if (!existing) {
      await guild.roles.create({ name: spec.name, ...fields, reason: "Role sync" });
      return "created";
    }

    const differs =
      existing.color !== spec.color ||
      existing.hoist !== spec.hoist ||
      existing.mentionable !== spec.mentionable ||
      (spec.permissions !== null && existing.permissions.bitfield !== spec.permissions);
    if (!differs) return "unchanged";

    await existing.edit({ ...fields, reason: "Role sync" });
    return "updated";
  }

  // ── Seasons ────────────────────────────────────────────

  async syncSeason(seasonId: string): Promise<SeasonSyncSummary> {
    const { configStore } = this.options;
    const plan = await configStore.lock.read(() => {
      const season = configStore.getSeason(seasonId);
      if (!season) throw new ConfigNotFoundError(`Season ${seasonId}`);
      return planSeason(season, configStore.getPermissionDefinitions(seasonId));
    });
    const guild = await this.guild();

    const summary: SeasonSyncSummary = { seasonId, category: "unchanged", created: [], updated: [], unchanged: [], errors: [], warnings: [...plan.warnings] };

    await guild.channels.fetch();
    const categoryOverwrites = await this.resolveOverwrites(guild, plan.categoryOverwrites, summary.warnings);
    const { category, outcome } = await this.ensureCategory(guild, plan.categoryName, categoryOverwrites, `Season ${seasonId} sync`);
    summary.category = outcome;

    const parentId = category.id;
    for (const spec of plan.channels) {
      try {
        const type = CHANNEL_TYPES[spec.type];
        const overwrites = await this.resolveOverwrites(guild, spec.overwrites, summary.warnings);
        const existing = guild.channels.cache.find((c): c is NonThreadGuildBasedChannel => !c.isThread() && c.type === type && c.name === spec.name && c.parentId === parentId);

        if (!existing) {
          await guild.channels.create({
            name: spec.name,
            type,
            parent: parentId,
            ...(spec.topic !== undefined && type !== ChannelType.GuildVoice ? { topic: spec.topic } : {}),
            permissionOverwrites: overwrites,
            reason: `Season ${seasonId} sync`,
          });
          summary.created.push(spec.name);
          continue;
        }

        let changed = false;
        if (overwritesDiffer(existing.permissionOverwrites, overwrites)) {
          await existing.permissionOverwrites.set(overwrites, `Season ${seasonId} sync`);
          changed = true;
        }
        if (
          spec.topic !== undefined &&
          (existing.type === ChannelType.GuildText || existing.type === ChannelType.GuildAnnouncement || existing.type === ChannelType.GuildForum) &&
          existing.topic !== spec.topic
        ) {
          await existing.setTopic(spec.topic, `Season ${seasonId} sync`);
          changed = true;
        }
        (changed ? summary.updated : summary.unchanged).push(spec.name);
      } catch (error) {
        summary.errors.push(formatError(`#${spec.name}`, error));
      }
    }

    log.info(`Season ${seasonId} sync: category ${summary.category}, ${summary.created.length} created, ${summary.updated.length} updated, ${summary.errors.length} failed`);
    return summary;
  }

  private async ensureCategory(
    guild: Guild,
    name: string,
    overwrites: ResolvedOverwrite[],
    reason: string,
  ): Promise<{ category: CategoryChannel; outcome: SeasonSyncSummary["category"] }> {
    const existing = guild.channels.cache.find((c): c is CategoryChannel => c.type === ChannelType.GuildCategory && c.name === name);
    try {
      if (!existing) {
        const category = await guild.channels.create({ name, type: ChannelType.GuildCategory, permissionOverwrites: overwrites, reason });
        return { category, outcome: "created" };
      }
      if (overwritesDiffer(existing.permissionOverwrites, overwrites)) {
        await existing.permissionOverwrites.set(overwrites, reason);
        return { category: existing, outcome: "updated" };
      }
      return { category: existing, outcome: "unchanged" };
    } catch (error) {
      throw new DiscordApiError(`Could not set up category "${name}"`, error);
    }
  }

  private async resolveOverwrites(guild: Guild, specs: OverwriteSpec[], warnings: string[]): Promise<ResolvedOverwrite[]> {
    const resolved: ResolvedOverwrite[] = [];
    for (const spec of specs) {
      const { target } = spec;
      if (target.kind === "everyone") {
        resolved.push({ id: guild.roles.everyone.id, type: OverwriteType.Role, allow: spec.allow, deny: spec.deny });
      } else if (target.kind === "bot") {
        resolved.push({ id: guild.client.user.id, type: OverwriteType.Member, allow: spec.allow, deny: spec.deny });
      } else {
        const role = await this.options.thingGetter.getRoleByName(guild, target.name);
        if (!role) {
          if (!warnings.includes(`Role "${target.name}" does not exist, run /roles sync`)) {
            warnings.push(`Role "${target.name}" does not exist, run /roles sync`);
          }
          continue;
        }
        resolved.push({ id: role.id, type: OverwriteType.Role, allow: spec.allow, deny: spec.deny });
      }
    }
    return resolved;
  }

  // ── Special-role assignments ───────────────────────────

  get canSyncAssignments(): boolean {
    return this.options.lookupVerified !== undefined;
  }

  async syncAssignments(): Promise<AssignmentSyncSummary> {
    const { configStore, lookupVerified } = this.options;
    if (!lookupVerified) {
      throw new DiscordApiError("Assignment sync needs the verification plugin");
    }

    const plan = await configStore.lock.read(() => planAssignments(configStore.getSpecialMembers()?.roles ?? {}, lookupVerified));
    const guild = await this.guild();
    const summary: AssignmentSyncSummary = { updated: [], unchanged: 0, notInGuild: [], missingRoles: [], unmatched: plan.unmatched, errors: [] };

    for (const assignment of plan.members) {
      const member = await this.options.thingGetter.getMember(guild, assignment.discordId);
      if (!member) {
        summary.notInGuild.push(assignment.discordId);
        continue;
      }

      const toAdd: Role[] = [];
      for (const name of assignment.roles) {
        const role = await this.options.thingGetter.getRoleByName(guild, name);
        if (!role) {
          if (!summary.missingRoles.includes(name)) summary.missingRoles.push(name);
        } else if (!member.roles.cache.has(role.id)) {
          toAdd.push(role);
        }
      }

      if (toAdd.length === 0) {
        summary.unchanged++;
        continue;
      }
      try {
        await member.roles.add(toAdd, "Special role assignment sync");
        summary.updated.push(assignment.discordId);
      } catch (error) {
        summary.errors.push(formatError(`<@${assignment.discordId}>`, error));
      }
    }

    log.info(`Assignment sync: ${summary.updated.length} members updated, ${summary.unchanged} unchanged, ${summary.unmatched.length} ids unbound`);
    return summary;
  }
}
