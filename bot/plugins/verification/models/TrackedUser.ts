/**
 * TrackedUser - durable record of an account's verification history
 *
 * On disk (state/user_database.json, schema version 3):
 * {
 *   "version": 3,
 *   "last_updated": "<ISO>",
 *   "users": { "<discordId>": { "discord_id", "verification_ids", "display_name", "verified_at",
 *              "special_roles", "current_roles", "verification_status", "last_seen"?, "notes"? } }
 * }
 */

import { z } from "zod";

export const USER_DATABASE_VERSION = 3;

/** Season assumed for single-id records written before per-season ids existed */
export const LEGACY_SEASON_ID = "2024E";

export const VERIFICATION_STATUSES = ["pending", "verified", "revoked", "expired"] as const;
export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

export interface TrackedUser {
  discordId: string;
  /** seasonId → verification id */
  verificationIds: Record<string, string>;
  displayName: string;
  /** ISO timestamp */
  verifiedAt: string;
  specialRoles: string[];
  currentRoles: string[];
  status: VerificationStatus;
  lastSeen?: string;
  notes?: string;
}

const TrackedUserFileSchema = z.object({
  discord_id: z.string().min(1),
  verification_ids: z.record(z.string()),
  display_name: z.string(),
  verified_at: z.string(),
  special_roles: z.array(z.string()).default([]),
  current_roles: z.array(z.string()).default([]),
  verification_status: z.enum(VERIFICATION_STATUSES),
  last_seen: z.string().nullish(),
  notes: z.string().nullish(),
});

export const DatabaseFileSchema = z.object({
  version: z.literal(USER_DATABASE_VERSION),
  last_updated: z.string(),
  users: z.record(TrackedUserFileSchema),
});

export type TrackedUserFile = z.infer<typeof TrackedUserFileSchema>;
export type DatabaseFile = z.infer<typeof DatabaseFileSchema>;

export function fromFile(file: TrackedUserFile): TrackedUser {
  return {
    discordId: file.discord_id,
    verificationIds: { ...file.verification_ids },
    displayName: file.display_name,
    verifiedAt: file.verified_at,
    specialRoles: [...file.special_roles],
    currentRoles: [...file.current_roles],
    status: file.verification_status,
    ...(file.last_seen ? { lastSeen: file.last_seen } : {}),
    ...(file.notes ? { notes: file.notes } : {}),
  };
}

export function toFile(user: TrackedUser): TrackedUserFile {
  return {
    discord_id: user.discordId,
    verification_ids: user.verificationIds,
    display_name: user.displayName,
    verified_at: user.verifiedAt,
    special_roles: user.specialRoles,
    current_roles: user.currentRoles,
    verification_status: user.status,
    ...(user.lastSeen ? { last_seen: user.lastSeen } : {}),
    ...(user.notes ? { notes: user.notes } : {}),
  };
}

// ── Migration ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Older files stored Unix seconds */
function toIsoTimestamp(value: unknown): { value: unknown; converted: boolean } {
  return typeof value === "number" ? { value: new Date(value * 1000).toISOString(), converted: true } : { value, converted: false };
}

export interface MigrationResult {
  data: unknown;
  fromVersion: number;
  /** Anything was rewritten; the database should be saved */
  changed: boolean;
}

/**
 * Bring raw database JSON up to the current schema before validation.
 *
 * - version < 2: a single `verification_id` becomes `verification_ids`
 *   keyed by the first entry of `seasons` (or the legacy season)
 * - version < 3: `seasons` and `verification_id` are dropped
 * - numeric timestamps become ISO strings
 *
 * A current-version file with ISO timestamps is returned unchanged.
 */
export function migrateDatabase(raw: unknown): MigrationResult {
  if (!isRecord(raw)) {
    return { data: raw, fromVersion: 0, changed: false };
  }

  const fromVersion = typeof raw.version === "number" ? raw.version : 0;
  let changed = fromVersion < USER_DATABASE_VERSION;

  const users: Record<string, unknown> = {};
  for (const [key, rawUser] of Object.entries(isRecord(raw.users) ? raw.users : {})) {
    if (!isRecord(rawUser)) {
      users[key] = rawUser;
      continue;
    }

    const user: Record<string, unknown> = { ...rawUser };

    if (fromVersion < USER_DATABASE_VERSION) {
      if (!isRecord(user.verification_ids)) {
        const ids: Record<string, string> = {};
        if (typeof user.verification_id === "string") {
          const seasons: unknown = user.seasons;
          const firstSeason: unknown = Array.isArray(seasons) ? seasons[0] : undefined;
          ids[typeof firstSeason === "string" ? firstSeason : LEGACY_SEASON_ID] = user.verification_id;
        }
        user.verification_ids = ids;
      }
      delete user.seasons;
      delete user.verification_id;
    }

    for (const field of ["verified_at", "last_seen"]) {
      const { value, converted } = toIsoTimestamp(user[field]);
      if (converted) {
        user[field] = value;
        changed = true;
      }
    }

    users[key] = user;
  }

  const lastUpdated = toIsoTimestamp(raw.last_updated ?? new Date().toISOString());
  if (lastUpdated.converted) changed = true;

  if (!changed) {
    return { data: raw, fromVersion, changed: false };
  }

  return {
    data: { ...raw, version: USER_DATABASE_VERSION, last_updated: lastUpdated.value, users },
    fromVersion,
    changed: true,
  };
}
