/**
 * StructurePlanner - turns config into the roles, categories, channels and
 * assignments the guild should have. Pure: no Discord calls, so the
 * appliers stay thin and the planning is testable.
 */

import { PermissionFlagsBits } from "discord.js";
import { resolvePermissionBits } from "../../roster/models/permissions.js";
import type { ChannelKind, GlobalConfig, PermissionSet, RoleDefinition, Season } from "../../roster/models/types.js";

/** Season categories and channels are hidden from everyone but the season */
export const ISOLATION_DENY = PermissionFlagsBits.ViewChannel | PermissionFlagsBits.Connect;
export const BOT_ALLOW = PermissionFlagsBits.ViewChannel | PermissionFlagsBits.ManageChannels | PermissionFlagsBits.SendMessages | PermissionFlagsBits.Connect;
export const MEMBER_CATEGORY_ALLOW = PermissionFlagsBits.ViewChannel | PermissionFlagsBits.Connect;

export interface RoleSpec {
  name: string;
  color: number;
  hoist: boolean;
  mentionable: boolean;
  /** null leaves the role's permissions alone */
  permissions: bigint | null;
  source: "global" | "default" | "season";
}

export type OverwriteTarget = { kind: "everyone" } | { kind: "bot" } | { kind: "role"; name: string };

export interface OverwriteSpec {
  target: OverwriteTarget;
  allow: bigint;
  deny: bigint;
}

export interface ChannelSpec {
  name: string;
  type: ChannelKind;
  topic?: string;
  overwrites: OverwriteSpec[];
}

export interface SeasonPlan {
  seasonId: string;
  categoryName: string;
  memberRoleName: string;
  categoryOverwrites: OverwriteSpec[];
  channels: ChannelSpec[];
  warnings: string[];
}

export interface RolePlan {
  roles: RoleSpec[];
  warnings: string[];
}

export interface MemberAssignment {
  discordId: string;
  roles: string[];
}

export interface AssignmentPlan {
  members: MemberAssignment[];
  /** Assigned verification ids no verified account holds yet */
  unmatched: string[];
}

export function parseColor(color: string | undefined): number {
  return color ? parseInt(color.slice(1), 16) : 0;
}

function roleSpec(role: RoleDefinition, warnings: string[]): RoleSpec {
  let permissions: bigint | null = null;
  if (!role.skipPermissionSync) {
    const resolved = resolvePermissionBits(role.permissions);
    permissions = resolved.bits;
    for (const name of resolved.unknown) {
      warnings.push(`Role "${role.name}": unknown permission ${name}`);
    }
  }
  return { name: role.name, color: parseColor(role.color), hoist: role.hoist, mentionable: role.mentionable, permissions, source: "global" };
}

/**
 * Global roles in file order, then the default member role and every
 * season member role that roles.json does not define.
 */
export function planRoles(global: GlobalConfig, seasons: readonly Season[], defaultMemberRole: string): RolePlan {
  const warnings: string[] = [];
  const roles = global.roles.map((role) => roleSpec(role, warnings));
  const names = new Set(roles.map((role) => role.name));

  const addGenerated = (name: string, source: RoleSpec["source"]) => {
    if (names.has(name)) return;
    names.add(name);
    roles.push({ name, color: 0, hoist: false, mentionable: false, permissions: null, source });
  };

  addGenerated(defaultMemberRole, "default");
  for (const season of [...seasons].sort((a, b) => a.seasonId.localeCompare(b.seasonId))) {
    addGenerated(season.memberRoleName, "season");
  }

  return { roles, warnings };
}

function targetKey(target: OverwriteTarget): string {
  return target.kind === "role" ? `role:${target.name}` : target.kind;
}

function resolveTarget(key: string, memberRoleName: string): OverwriteTarget {
  if (key === "@everyone") return { kind: "everyone" };
  if (key === "@member") return { kind: "role", name: memberRoleName };
  return { kind: "role", name: key };
}

function resolveLevel(set: PermissionSet, context: string, warnings: string[]): { allow: bigint; deny: bigint } {
  const allow = resolvePermissionBits(set.allow);
  const deny = resolvePermissionBits(set.deny);
  for (const name of [...allow.unknown, ...deny.unknown]) {
    warnings.push(`${context}: unknown permission ${name}`);
  }
  return { allow: allow.bits, deny: deny.bits };
}

/**
 * Category and channels for one season. Channel overwrites start from the
 * isolation defaults; configured entries replace the default for the same target.
 */
export function planSeason(season: Season, definitions: Readonly<Record<string, PermissionSet>>): SeasonPlan {
  const warnings: string[] = [];
  const isolation = (): OverwriteSpec[] => [
    { target: { kind: "everyone" }, allow: 0n, deny: ISOLATION_DENY },
    { target: { kind: "bot" }, allow: BOT_ALLOW, deny: 0n },
  ];

  const categoryOverwrites: OverwriteSpec[] = [...isolation(), { target: { kind: "role", name: season.memberRoleName }, allow: MEMBER_CATEGORY_ALLOW, deny: 0n }];

  const channels = season.channels.map((channel): ChannelSpec => {
    const overwrites = new Map<string, OverwriteSpec>(isolation().map((o) => [targetKey(o.target), o]));

    for (const [key, level] of Object.entries(channel.permissions).sort(([a], [b]) => a.localeCompare(b))) {
      const context = `#${channel.name}`;
      const set = definitions[level];
      if (!set) {
        warnings.push(`${context}: unknown permission level "${level}" for ${key}`);
        continue;
      }
      const target = resolveTarget(key, season.memberRoleName);
      overwrites.set(targetKey(target), { target, ...resolveLevel(set, context, warnings) });
    }

    return {
      name: channel.name,
      type: channel.type,
      ...(channel.topic !== undefined ? { topic: channel.topic } : {}),
      overwrites: [...overwrites.values()],
    };
  });

  return { seasonId: season.seasonId, categoryName: season.categoryName, memberRoleName: season.memberRoleName, categoryOverwrites, channels, warnings };
}

/**
 * Which verified accounts should hold which special roles
 */
export function planAssignments(roles: Readonly<Record<string, string[]>>, findDiscordId: (verificationId: string) => string | undefined): AssignmentPlan {
  const byMember = new Map<string, Set<string>>();
  const unmatched = new Set<string>();

  for (const [roleName, ids] of Object.entries(roles)) {
    for (const id of ids) {
      const discordId = findDiscordId(id);
      if (!discordId) {
        unmatched.add(id);
        continue;
      }
      const held = byMember.get(discordId) ?? new Set<string>();
      held.add(roleName);
      byMember.set(discordId, held);
    }
  }

  const members = [...byMember.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([discordId, held]) => ({ discordId, roles: [...held].sort() }));

  return { members, unmatched: [...unmatched].sort() };
}
