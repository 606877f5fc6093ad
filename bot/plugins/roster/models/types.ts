/**
 * Roster domain types: seasons, their rosters and the global config tree.
 *
 * These are the in-memory shapes. The on-disk JSON (snake_case keys, the
 * legacy `Name`/`DiscordId` roster fields) is mapped in ./schemas.ts.
 */

export interface RosterEntry {
  displayName: string;
  /** Pre-issued opaque token, usually a UUID. Not a Discord snowflake. */
  verificationId: string;
  email?: string;
}

export const CHANNEL_KINDS = ["text", "voice", "forum", "announcement"] as const;
export type ChannelKind = (typeof CHANNEL_KINDS)[number];

export interface ChannelDefinition {
  name: string;
  type: ChannelKind;
  topic?: string;
  /** Role name (or `@everyone` / `@member`) → permission level name */
  permissions: Record<string, string>;
}

export interface PermissionSet {
  allow: string[];
  deny: string[];
}

export interface RoleDefinition {
  name: string;
  /** "#rrggbb" */
  color?: string;
  hoist: boolean;
  mentionable: boolean;
  /** Discord permission flag names, SCREAMING_SNAKE_CASE */
  permissions: string[];
  isDefaultMemberRole: boolean;
  skipPermissionSync: boolean;
}

export interface Season {
  seasonId: string;
  displayName: string;
  active: boolean;
  memberRoleName: string;
  categoryName: string;
  channels: ChannelDefinition[];
  permissionOverrides: Record<string, PermissionSet>;
  roster: RosterEntry[];
}

export interface SpecialMembersConfig {
  /** Role name → verification ids holding it */
  roles: Record<string, string[]>;
  /** Discord user ids or usernames with admin API access */
  maintainers: string[];
}

export interface GlobalConfig {
  roles: RoleDefinition[];
  permissionDefinitions: Record<string, PermissionSet>;
  specialMembers: SpecialMembersConfig | null;
}

export type ChangeType = "add" | "modify" | "remove";
export type EntityType = "season" | "special_members";

export interface ConfigChange {
  changeType: ChangeType;
  entityType: EntityType;
  entityName: string;
  details: string;
}

export interface ConfigDiff {
  additions: ConfigChange[];
  modifications: ConfigChange[];
  deletions: ConfigChange[];
}

export interface CommitFailure {
  entityType: EntityType;
  entityName: string;
  error: string;
}

export interface CommitResult {
  changes: ConfigChange[];
  failures: CommitFailure[];
}

export interface SkippedSeason {
  seasonId: string;
  file: string;
  reason: string;
}

export interface LoadReport {
  seasons: string[];
  skipped: SkippedSeason[];
  globalErrors: { file: string; reason: string }[];
  /** Verification ids present in more than one active season */
  duplicates: { verificationId: string; seasons: string[] }[];
}

export interface RosterMatch {
  season: Season;
  entry: RosterEntry;
}
