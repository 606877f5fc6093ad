/**
 * StagingArea - uploaded config held in memory until an admin commits or cancels
 *
 * Each stage call replaces whatever was staged for the same slot. Commit
 * writes each entry to disk on its own (temp file + rename), folds the
 * successful ones into the ConfigStore and leaves failed ones staged.
 * Untouched staging is discarded after the configured timeout.
 */

import { createLogger } from "../../../src/core/Logger.js";
import { parseJson, writeJsonAtomic } from "../../lib/utils/jsonFile.js";
import { ConfigValidationError, NoStagedConfigError, describeError } from "../../lib/utils/errors.js";
import {
  AssignmentsFileSchema,
  SEASON_ID_PATTERN,
  isValidSeasonId,
  parseRoster,
  parseWith,
  rosterToFile,
  specialMembersToFile,
  toSpecialMembers,
} from "../models/schemas.js";
import type { CommitFailure, CommitResult, ConfigChange, ConfigDiff, RosterEntry, SpecialMembersConfig } from "../models/types.js";
import type { ConfigStore } from "./ConfigStore.js";

const log = createLogger("roster:staging");

export const ASSIGNMENTS_FILE = "global/assignments.json";

export interface StagingAreaOptions {
  store: ConfigStore;
  /** Staged content is discarded after this many seconds without activity */
  timeoutSeconds: number;
}

export interface StagedSeasonSummary {
  seasonId: string;
  users: number;
}

function decode(data: Buffer | string): string {
  return typeof data === "string" ? data : data.toString("utf-8");
}

function signed(n: number): string {
  return n >= 0 ? `+${n}` : String(n);
}

function describeSpecialMembers(config: SpecialMembersConfig): string {
  const assignments = Object.values(config.roles).reduce((sum, ids) => sum + ids.length, 0);
  return `${Object.keys(config.roles).length} roles, ${assignments} assignments, ${config.maintainers.length} maintainers`;
}

export function seasonUsersFile(seasonId: string): string {
  return `seasons/${seasonId}/users.json`;
}

export class StagingArea {
  private readonly store: ConfigStore;
  private readonly timeoutMs: number;

  private seasons = new Map<string, RosterEntry[]>();
  private specialMembers: SpecialMembersConfig | null = null;
  private stagedAt: Date | null = null;
  private stagedBy: string | null = null;
  private expiryTimer: NodeJS.Timeout | null = null;

  constructor(options: StagingAreaOptions) {
    this.store = options.store;
    this.timeoutMs = options.timeoutSeconds * 1000;
  }

  get timeoutSeconds(): number {
    return this.timeoutMs / 1000;
  }

  // ── Staging ────────────────────────────────────────────

  /**
   * Stage a users.json payload for a season, replacing any earlier upload for it
   */
  stageSeasonUsers(seasonId: string, data: Buffer | string, actor?: string): RosterEntry[] {
    if (!isValidSeasonId(seasonId)) {
      throw new ConfigValidationError("season id", [{ path: "seasonId", message: `Season ids must match ${SEASON_ID_PATTERN}` }]);
    }

    const source = `staged ${seasonUsersFile(seasonId)}`;
    const roster = parseRoster(parseJson(decode(data), source), source);

    this.seasons.set(seasonId, roster);
    this.touch(actor);
    log.info(`Staged season ${seasonId} with ${roster.length} users${actor ? ` (by ${actor})` : ""}`);
    return roster;
  }

  /**
   * Stage an assignments.json payload, replacing the whole staged block
   */
  stageSpecialMembers(data: Buffer | string, actor?: string): SpecialMembersConfig {
    const source = `staged ${ASSIGNMENTS_FILE}`;
    const config = toSpecialMembers(parseWith(AssignmentsFileSchema, parseJson(decode(data), source), source));

    this.specialMembers = config;
    this.touch(actor);
    log.info(`Staged special members: ${describeSpecialMembers(config)}${actor ? ` (by ${actor})` : ""}`);
    return config;
  }

  private touch(actor: string | undefined): void {
    this.stagedAt = new Date();
    this.stagedBy = actor ?? null;
    this.scheduleExpiry(this.timeoutMs);
  }

  /**
   * (Re)arm the timer that discards staged content
   */
  scheduleExpiry(ms: number): void {
    this.cancelExpiry();
    const timer = setTimeout(() => {
      this.expiryTimer = null;
      if (this.hasStaged()) {
        log.info(`Staged configuration expired after ${Math.round(ms / 1000)}s without a commit`);
        this.clear();
      }
    }, ms);
    timer.unref();
    this.expiryTimer = timer;
  }

  private cancelExpiry(): void {
    if (this.expiryTimer) {
      clearTimeout(this.expiryTimer);
      this.expiryTimer = null;
    }
  }

  // ── Inspection ─────────────────────────────────────────

  hasStaged(): boolean {
    return this.seasons.size > 0 || this.specialMembers !== null;
  }

  getStagedAt(): Date | null {
    return this.stagedAt;
  }

  getStagedBy(): string | null {
    return this.stagedBy;
  }

  getStagedSeasons(): StagedSeasonSummary[] {
    return [...this.seasons.entries()].map(([seasonId, roster]) => ({ seasonId, users: roster.length })).sort((a, b) => (a.seasonId < b.seasonId ? -1 : 1));
  }

  getStagedSpecialMembers(): SpecialMembersConfig | null {
    return this.specialMembers;
  }

  getSummary(): string {
    if (!this.hasStaged()) return "Nothing staged";

    const lines: string[] = [];
    if (this.seasons.size > 0) {
      lines.push(`Seasons: ${this.getStagedSeasons().map((s) => s.seasonId).join(", ")}`);
    }
    if (this.specialMembers) {
      lines.push("Special Members");
    }
    return lines.join("\n");
  }

  /**
   * Compare staged content against what the store currently serves
   */
  getDiff(): ConfigDiff {
    const diff: ConfigDiff = { additions: [], modifications: [], deletions: [] };

    for (const { seasonId } of this.getStagedSeasons()) {
      const staged = this.seasons.get(seasonId) ?? [];
      const loaded = this.store.getSeason(seasonId);

      if (!loaded) {
        diff.additions.push({ changeType: "add", entityType: "season", entityName: seasonId, details: `${staged.length} users` });
        continue;
      }

      const before = new Set(loaded.roster.map((e) => e.verificationId));
      const after = new Set(staged.map((e) => e.verificationId));
      const added = [...after].filter((id) => !before.has(id)).length;
      const removed = [...before].filter((id) => !after.has(id)).length;
      const delta = staged.length - loaded.roster.length;

      diff.modifications.push({
        changeType: "modify",
        entityType: "season",
        entityName: seasonId,
        details: `${staged.length} users (${signed(delta)} change), ${added} added, ${removed} removed`,
      });
    }

    if (this.specialMembers) {
      const change: ConfigChange = {
        changeType: this.store.getSpecialMembers() ? "modify" : "add",
        entityType: "special_members",
        entityName: "Special Members",
        details: describeSpecialMembers(this.specialMembers),
      };
      (change.changeType === "add" ? diff.additions : diff.modifications).push(change);
    }

    return diff;
  }

  // ── Commit / cancel ────────────────────────────────────

  /**
   * Write every staged entry to disk and fold it into the store.
   * Throws NoStagedConfigError without touching any file when nothing is staged.
   */
  async commit(): Promise<CommitResult> {
    if (!this.hasStaged()) {
      throw new NoStagedConfigError();
    }

    return this.store.lock.write(async () => {
      // A commit queued behind another may find everything already written
      if (!this.hasStaged()) {
        throw new NoStagedConfigError();
      }

      const changes: ConfigChange[] = [];
      const failures: CommitFailure[] = [];

      for (const { seasonId } of this.getStagedSeasons()) {
        const roster = this.seasons.get(seasonId);
        if (!roster) continue;
        const file = seasonUsersFile(seasonId);

        try {
          await writeJsonAtomic(this.store.resolve(file), rosterToFile(roster));
        } catch (error) {
          log.error(`Failed to commit season ${seasonId}:`, error);
          failures.push({ entityType: "season", entityName: seasonId, error: describeError(error) });
          continue;
        }

        const existed = this.store.getSeason(seasonId) !== undefined;
        this.store.upsertSeasonRoster(seasonId, roster);
        // A re-stage during the write keeps the newer upload staged
        if (this.seasons.get(seasonId) === roster) {
          this.seasons.delete(seasonId);
        }
        changes.push({
          changeType: existed ? "modify" : "add",
          entityType: "season",
          entityName: seasonId,
          details: `Saved ${roster.length} users to ${file}`,
        });
      }

      const specialMembers = this.specialMembers;
      if (specialMembers) {
        try {
          await writeJsonAtomic(this.store.resolve(ASSIGNMENTS_FILE), specialMembersToFile(specialMembers));
          const existed = this.store.getSpecialMembers() !== null;
          this.store.replaceSpecialMembers(specialMembers);
          if (this.specialMembers === specialMembers) {
            this.specialMembers = null;
          }
          changes.push({
            changeType: existed ? "modify" : "add",
            entityType: "special_members",
            entityName: "Special Members",
            details: `Saved ${describeSpecialMembers(specialMembers)} to ${ASSIGNMENTS_FILE}`,
          });
        } catch (error) {
          log.error("Failed to commit special members:", error);
          failures.push({ entityType: "special_members", entityName: "Special Members", error: describeError(error) });
        }
      }

      if (!this.hasStaged()) {
        this.reset();
      }

      log.info(`Commit finished: ${changes.length} applied, ${failures.length} failed`);
      return { changes, failures };
    });
  }

  /**
   * Discard everything staged. Returns false when there was nothing to discard.
   */
  clear(): boolean {
    const had = this.hasStaged();
    this.reset();
    if (had) log.info("Staged configuration discarded");
    return had;
  }

  private reset(): void {
    this.seasons.clear();
    this.specialMembers = null;
    this.stagedAt = null;
    this.stagedBy = null;
    this.cancelExpiry();
  }

  dispose(): void {
    this.cancelExpiry();
  }
}
