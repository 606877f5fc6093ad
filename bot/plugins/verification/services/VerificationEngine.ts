/**
 * VerificationEngine - binds claimed verification ids to Discord accounts
 *
 * Per (discordId, seasonId): unverified → verified once the claimed id
 * resolves in an active season roster, is not bound to another account and
 * the account has no id for that season yet. The whole check-then-write
 * runs under the database write lock and the config read lock, so two
 * accounts racing for one id cannot both win.
 *
 * Also owns the pending-DM registry (who was prompted, where, when).
 */

import { createLogger } from "../../../src/core/Logger.js";
import { describeError } from "../../lib/utils/errors.js";
import type { ConfigStore } from "../../roster/services/ConfigStore.js";
import type { TrackedUser } from "../models/TrackedUser.js";
import type { UserDatabase } from "./UserDatabase.js";
import { ID_ALREADY_USED_MESSAGE, VERIFICATION_PENDING_MESSAGE, VERIFICATION_REVOKED_MESSAGE, alreadyVerifiedMessage, notFoundMessage } from "../utils/messages.js";

const log = createLogger("verification:engine");

export const DEFAULT_PENDING_MAX_AGE_MS = 60 * 60 * 1000;

export type VerificationErrorCode = "NOT_FOUND" | "ID_ALREADY_USED" | "ALREADY_VERIFIED" | "VERIFICATION_REVOKED" | "VERIFICATION_PENDING";

export interface VerificationFailure {
  code: VerificationErrorCode;
  message: string;
}

export interface VerificationSuccess {
  success: true;
  discordId: string;
  verificationId: string;
  displayName: string;
  seasonId: string;
  seasonName: string;
  /** Every season the account now holds an id for, sorted */
  seasons: string[];
  rolesToAssign: string[];
  specialRoles: string[];
}

export type VerificationResult =
  | VerificationSuccess
  | {
      success: false;
      discordId: string;
      verificationId: string;
      error: VerificationFailure;
    };

export interface PendingVerification {
  discordId: string;
  /** DM channel the prompt was sent to */
  channelId: string;
  startedAt: number;
}

export interface VerificationEngineOptions {
  database: UserDatabase;
  configStore: ConfigStore;
  /** Where saveDatabase() writes */
  databasePath: string;
  now?: () => Date;
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

export class VerificationEngine {
  private readonly database: UserDatabase;
  private readonly configStore: ConfigStore;
  private readonly databasePath: string;
  private readonly now: () => Date;
  private readonly pending = new Map<string, PendingVerification>();
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(options: VerificationEngineOptions) {
    this.database = options.database;
    this.configStore = options.configStore;
    this.databasePath = options.databasePath;
    this.now = options.now ?? (() => new Date());
  }

  // ── Verification ───────────────────────────────────────

  async attemptVerification(discordId: string, claimedId: string): Promise<VerificationResult> {
    const verificationId = claimedId.trim();
    return this.database.lock.write(() => this.configStore.lock.read(() => this.verifyLocked(discordId, verificationId)));
  }

  private verifyLocked(discordId: string, verificationId: string): VerificationResult {
    const failure = this.checkClaim(discordId, verificationId);
    const match = this.configStore.findUserByVerificationId(verificationId);
    if (failure || !match) {
      const error: VerificationFailure = failure ?? { code: "NOT_FOUND", message: notFoundMessage(verificationId) };
      log.info(`Verification of ${discordId} with ${verificationId} failed: ${error.code}`);
      return { success: false, discordId, verificationId, error };
    }

    const { season, entry } = match;
    const specialRoles = this.configStore.getSpecialRolesForUser(verificationId);
    const rolesToAssign = dedupe([this.configStore.getDefaultMemberRoleName(), season.memberRoleName, ...specialRoles]);
    const timestamp = this.now().toISOString();

    const existing = this.database.findByDiscordId(discordId);
    const user: TrackedUser = existing
      ? {
          ...existing,
          verificationIds: { ...existing.verificationIds, [season.seasonId]: verificationId },
          specialRoles: dedupe([...existing.specialRoles, ...specialRoles]),
          displayName: entry.displayName,
          status: "verified",
          lastSeen: timestamp,
        }
      : {
          discordId,
          verificationIds: { [season.seasonId]: verificationId },
          displayName: entry.displayName,
          verifiedAt: timestamp,
          specialRoles,
          currentRoles: [],
          status: "verified",
          lastSeen: timestamp,
        };

    this.database.upsertUser(user);
    this.pending.delete(discordId);
    log.info(`Verified ${discordId} as ${entry.displayName} for season ${season.seasonId}`);

    return {
      success: true,
      discordId,
      verificationId,
      displayName: entry.displayName,
      seasonId: season.seasonId,
      seasonName: season.displayName,
      seasons: Object.keys(user.verificationIds).sort(),
      rolesToAssign,
      specialRoles,
    };
  }

  /**
   * The claim checks of a verification without mutating anything. Callers hold the locks.
   */
  private checkClaim(discordId: string | null, verificationId: string): VerificationFailure | null {
    const match = this.configStore.findUserByVerificationId(verificationId);
    if (!match) {
      return { code: "NOT_FOUND", message: notFoundMessage(verificationId) };
    }

    const owner = this.database.findByVerificationId(verificationId);
    if (owner && owner.discordId !== discordId) {
      return { code: "ID_ALREADY_USED", message: ID_ALREADY_USED_MESSAGE };
    }

    if (discordId !== null) {
      const existing = this.database.findByDiscordId(discordId);
      if (existing && match.season.seasonId in existing.verificationIds) {
        return { code: "ALREADY_VERIFIED", message: alreadyVerifiedMessage(match.season.seasonId) };
      }
      // Only an admin can lift a revoke; a new season's id does not
      if (existing?.status === "revoked") {
        return { code: "VERIFICATION_REVOKED", message: VERIFICATION_REVOKED_MESSAGE };
      }
    }

    return null;
  }

  /**
   * Would attemptVerification fail right now? Used before handing out OAuth links.
   * Pass null as discordId when the account is not known yet.
   */
  async precheck(claimedId: string, discordId: string | null = null): Promise<VerificationFailure | null> {
    const verificationId = claimedId.trim();
    return this.database.lock.read(() => this.configStore.lock.read(() => this.checkClaim(discordId, verificationId)));
  }

  /**
   * Remember the Discord roles actually applied after a verification
   */
  async recordAppliedRoles(discordId: string, roles: string[]): Promise<void> {
    await this.database.lock.write(() => {
      const user = this.database.findByDiscordId(discordId);
      if (!user) return;
      this.database.upsertUser({ ...user, currentRoles: dedupe([...user.currentRoles, ...roles]) });
    });
  }

  /**
   * Persist the database. Failures are logged; the in-memory state stays dirty.
   */
  async saveDatabase(): Promise<boolean> {
    try {
      await this.database.lock.read(() => this.database.save(this.databasePath));
      return true;
    } catch (error) {
      log.error(`User database not saved, will retry on next change: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Mark an account revoked. Its id bindings stay, so the ids cannot be reused.
   */
  async revoke(discordId: string, reason?: string): Promise<TrackedUser | undefined> {
    return this.database.lock.write(() => {
      const user = this.database.findByDiscordId(discordId);
      if (!user) return undefined;
      const revoked: TrackedUser = { ...user, status: "revoked", ...(reason ? { notes: reason } : {}) };
      this.database.upsertUser(revoked);
      log.info(`Revoked verification of ${discordId}${reason ? `: ${reason}` : ""}`);
      return revoked;
    });
  }

  // ── Pending DM verifications ───────────────────────────

  /**
   * Record that a DM prompt was sent. Returns VERIFICATION_PENDING when a
   * fresh prompt is already outstanding.
   */
  startVerification(discordId: string, channelId: string): VerificationFailure | null {
    const existing = this.pending.get(discordId);
    if (existing && this.now().getTime() - existing.startedAt < DEFAULT_PENDING_MAX_AGE_MS) {
      return { code: "VERIFICATION_PENDING", message: VERIFICATION_PENDING_MESSAGE };
    }
    this.pending.set(discordId, { discordId, channelId, startedAt: this.now().getTime() });
    log.debug(`Pending verification started for ${discordId}`);
    return null;
  }

  /** Periodically drop stale prompts until stopPendingCleanup() */
  startPendingCleanup(intervalMs: number): void {
    this.stopPendingCleanup();
    const timer = setInterval(() => this.cleanupStalePending(), intervalMs);
    timer.unref();
    this.cleanupTimer = timer;
  }

  stopPendingCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  isPending(discordId: string): boolean {
    return this.pending.has(discordId);
  }

  getPending(discordId: string): PendingVerification | undefined {
    return this.pending.get(discordId);
  }

  cancelVerification(discordId: string): boolean {
    return this.pending.delete(discordId);
  }

  /** Drop prompts older than maxAgeMs; returns how many were dropped */
  cleanupStalePending(maxAgeMs: number = DEFAULT_PENDING_MAX_AGE_MS): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const [discordId, pending] of this.pending) {
      if (pending.startedAt < cutoff) {
        this.pending.delete(discordId);
        removed++;
      }
    }
    if (removed > 0) log.debug(`Dropped ${removed} stale pending verification(s)`);
    return removed;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  // ── Queries ────────────────────────────────────────────

  isVerified(discordId: string): boolean {
    return this.database.isVerified(discordId);
  }

  getVerifiedUser(discordId: string): TrackedUser | undefined {
    const user = this.database.findByDiscordId(discordId);
    return user?.status === "verified" ? user : undefined;
  }

  getUser(discordId: string): TrackedUser | undefined {
    return this.database.findByDiscordId(discordId);
  }

  /**
   * Roles a verified account should hold under the current config, or null if it is not verified
   */
  async rolesFor(discordId: string): Promise<string[] | null> {
    return this.database.lock.read(() =>
      this.configStore.lock.read(() => {
        const user = this.getVerifiedUser(discordId);
        if (!user) return null;
        const seasonRoles = Object.keys(user.verificationIds)
          .sort()
          .flatMap((seasonId) => this.configStore.getSeason(seasonId)?.memberRoleName ?? []);
        return dedupe([this.configStore.getDefaultMemberRoleName(), ...seasonRoles, ...user.specialRoles]);
      }),
    );
  }

  findByVerificationId(verificationId: string): TrackedUser | undefined {
    return this.database.findByVerificationId(verificationId.trim());
  }

  getAllUsers(): TrackedUser[] {
    return this.database.getAllUsers();
  }

  getUserCount(): number {
    return this.database.userCount();
  }

  exportDatabase(): Buffer {
    return this.database.export();
  }
}
