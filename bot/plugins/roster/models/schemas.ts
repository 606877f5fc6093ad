/**
 * Zod schemas for the on-disk config tree and the mapping into domain types.
 *
 * data/global/roles.json         { roles: RoleDefinition[] }
 * data/global/permissions.json   { definitions: Record<level, {allow, deny}> }
 * data/global/assignments.json   { roles: Record<roleName, verificationId[]>, maintainers }
 * data/seasons/<id>/season.json  { name?, active?, member_role?, category_name?, channels?, permission_overrides? }
 * data/seasons/<id>/users.json   [{ Name, DiscordId, Email? }]  or  { users: [...] }
 */

import { z } from "zod";
import { ConfigValidationError } from "../../lib/utils/errors.js";
import { parseWith } from "../../lib/utils/schema.js";
import { resolvePermissionFlag } from "./permissions.js";
import { CHANNEL_KINDS, type PermissionSet, type RoleDefinition, type RosterEntry, type Season, type SpecialMembersConfig } from "./types.js";

export const SEASON_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
export const DEFAULT_MEMBER_ROLE = "Member";

export { parseWith };

export function isValidSeasonId(seasonId: string): boolean {
  return SEASON_ID_PATTERN.test(seasonId);
}

// ── Rosters ────────────────────────────────────────────────

const RosterEntryFileSchema = z.object({
  Name: z.string().trim().min(1, "Name is required"),
  DiscordId: z.string().trim().min(1, "DiscordId is required"),
  Email: z.string().trim().nullish(),
});

type RosterEntryFile = z.infer<typeof RosterEntryFileSchema>;

const RosterUsersSchema = z.array(RosterEntryFileSchema).superRefine((users, ctx) => {
  const firstIndex = new Map<string, number>();
  users.forEach((user, index) => {
    const first = firstIndex.get(user.DiscordId);
    if (first === undefined) {
      firstIndex.set(user.DiscordId, index);
      return;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [index, "DiscordId"],
      message: `Duplicate verification id "${user.DiscordId}" (first seen at index ${first})`,
    });
  });
});

const WrappedRosterSchema = z.object({
  users: RosterUsersSchema,
  season_id: z.string().optional(),
  name: z.string().optional(),
  active: z.boolean().optional(),
});

/**
 * Both accepted users.json layouts. The wrapper's metadata is informational;
 * season.json stays authoritative.
 */
export type RosterInput =
  | { kind: "bare"; users: RosterEntryFile[] }
  | { kind: "wrapped"; users: RosterEntryFile[]; seasonId?: string; name?: string; active?: boolean };

export function parseRosterInput(value: unknown, source: string): RosterInput {
  if (Array.isArray(value)) {
    return { kind: "bare", users: parseWith(RosterUsersSchema, value, source) };
  }
  if (typeof value === "object" && value !== null) {
    const wrapped = parseWith(WrappedRosterSchema, value, source);
    return { kind: "wrapped", users: wrapped.users, seasonId: wrapped.season_id, name: wrapped.name, active: wrapped.active };
  }
  throw new ConfigValidationError(source, [{ path: "", message: "Expected an array of users or an object with a users array" }]);
}

export function normalizeRoster(input: RosterInput): RosterEntry[] {
  return input.users.map((user) => ({
    displayName: user.Name,
    verificationId: user.DiscordId,
    ...(user.Email ? { email: user.Email } : {}),
  }));
}

export function parseRoster(value: unknown, source: string): RosterEntry[] {
  return normalizeRoster(parseRosterInput(value, source));
}

/**
 * The users.json representation written on commit (always the bare array form)
 */
export function rosterToFile(roster: readonly RosterEntry[]): RosterEntryFile[] {
  return roster.map((entry) => ({
    Name: entry.displayName,
    DiscordId: entry.verificationId,
    ...(entry.email ? { Email: entry.email } : {}),
  }));
}

// ── Permissions ────────────────────────────────────────────

const PermissionNameSchema = z
  .string()
  .trim()
  .refine(
    (name) => resolvePermissionFlag(name) !== undefined,
    (name) => ({ message: `Unknown Discord permission "${name}"` }),
  );

const PermissionSetSchema = z.object({
  allow: z.array(PermissionNameSchema).default([]),
  deny: z.array(PermissionNameSchema).default([]),
});

export const PermissionsFileSchema = z.object({
  definitions: z.record(PermissionSetSchema),
});

export function toPermissionDefinitions(file: z.infer<typeof PermissionsFileSchema>): Record<string, PermissionSet> {
  return { ...file.definitions };
}

// ── Roles ──────────────────────────────────────────────────

const RoleDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, "Expected a colour like #1abc9c")
    .optional(),
  hoist: z.boolean().default(false),
  mentionable: z.boolean().default(false),
  permissions: z.array(PermissionNameSchema).default([]),
  is_default_member_role: z.boolean().default(false),
  skip_permission_sync: z.boolean().default(false),
});

export const RolesFileSchema = z
  .object({
    roles: z.array(RoleDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.roles.forEach((role, index) => {
      const key = role.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["roles", index, "name"], message: `Duplicate role "${role.name}"` });
      }
      seen.add(key);
    });

    if (file.roles.filter((role) => role.is_default_member_role).length > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["roles"], message: "Only one role may set is_default_member_role" });
    }
  });

export function toRoleDefinitions(file: z.infer<typeof RolesFileSchema>): RoleDefinition[] {
  return file.roles.map((role) => ({
    name: role.name,
    ...(role.color ? { color: role.color } : {}),
    hoist: role.hoist,
    mentionable: role.mentionable,
    permissions: role.permissions,
    isDefaultMemberRole: role.is_default_member_role,
    skipPermissionSync: role.skip_permission_sync,
  }));
}

// ── Special members ────────────────────────────────────────

export const AssignmentsFileSchema = z.object({
  roles: z.record(z.array(z.string().trim().min(1))).default({}),
  maintainers: z.array(z.string().trim().min(1)).default([]),
});

export function toSpecialMembers(file: z.infer<typeof AssignmentsFileSchema>): SpecialMembersConfig {
  return { roles: file.roles, maintainers: file.maintainers };
}

export function specialMembersToFile(config: SpecialMembersConfig): z.input<typeof AssignmentsFileSchema> {
  return { roles: config.roles, maintainers: config.maintainers };
}

// ── Seasons ────────────────────────────────────────────────

const ChannelDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  type: z.enum(CHANNEL_KINDS).default("text"),
  topic: z.string().optional(),
  permissions: z.record(z.string()).default({}),
});

export const SeasonFileSchema = z.object({
  name: z.string().trim().min(1).optional(),
  active: z.boolean().default(true),
  member_role: z.string().trim().min(1).optional(),
  category_name: z.string().trim().min(1).optional(),
  channels: z.array(ChannelDefinitionSchema).default([]),
  permission_overrides: z.record(PermissionSetSchema).default({}),
});

export type SeasonFile = z.infer<typeof SeasonFileSchema>;

/**
 * Assemble a Season; a missing season.json means every default applies
 */
export function buildSeason(seasonId: string, file: SeasonFile | undefined, roster: RosterEntry[]): Season {
  const displayName = file?.name ?? seasonId;
  return {
    seasonId,
    displayName,
    active: file?.active ?? true,
    memberRoleName: file?.member_role ?? `${DEFAULT_MEMBER_ROLE} ${seasonId}`,
    categoryName: file?.category_name ?? displayName,
    channels: (file?.channels ?? []).map((channel) => ({
      name: channel.name,
      type: channel.type,
      ...(channel.topic ? { topic: channel.topic } : {}),
      permissions: channel.permissions,
    })),
    permissionOverrides: file?.permission_overrides ?? {},
    roster,
  };
}
