/**
 * ConfigStore - in-memory view of the data/ config tree
 *
 * Loads the global files and every season directory, answers roster lookups
 * and is the only holder of season/global config at runtime. Callers that
 * need a consistent view across several reads take `lock` themselves.
 */

import { promises as fs, type Dirent } from "fs";
import * as path from "path";
import type { z } from "zod";
import { createLogger } from "../../../src/core/Logger.js";
import { RwLock } from "../../lib/utils/RwLock.js";
import { isNotFound, readJsonFile } from "../../lib/utils/jsonFile.js";
import { describeError } from "../../lib/utils/errors.js";
import { DEFAULT_PERMISSION_DEFINITIONS } from "../models/permissions.js";
import {
  AssignmentsFileSchema,
  DEFAULT_MEMBER_ROLE,
  PermissionsFileSchema,
  RolesFileSchema,
  SeasonFileSchema,
  buildSeason,
  isValidSeasonId,
  parseRoster,
  parseWith,
  toPermissionDefinitions,
  toRoleDefinitions,
  toSpecialMembers,
} from "../models/schemas.js";
import type { GlobalConfig, LoadReport, PermissionSet, RoleDefinition, RosterEntry, RosterMatch, Season, SpecialMembersConfig } from "../models/types.js";

const log = createLogger("roster:store");

function defaultRoles(): RoleDefinition[] {
  return [
    {
      name: DEFAULT_MEMBER_ROLE,
      hoist: false,
      mentionable: false,
      permissions: [],
      isDefaultMemberRole: true,
      skipPermissionSync: false,
    },
  ];
}

function emptyReport(): LoadReport {
  return { seasons: [], skipped: [], globalErrors: [], duplicates: [] };
}

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class ConfigStore {
  /** Readers: verification. Writers: reload, commit, file edits. */
  readonly lock = new RwLock();

  private seasons = new Map<string, Season>();
  private global: GlobalConfig = { roles: defaultRoles(), permissionDefinitions: {}, specialMembers: null };
  /** verificationId → first match in ascending active season order */
  private index = new Map<string, RosterMatch>();
  private lastReport: LoadReport = emptyReport();

  constructor(readonly dataDir: string) {}

  /**
   * Absolute path of a file inside the data directory
   */
  resolve(relativePath: string): string {
    return path.join(this.dataDir, ...relativePath.split("/"));
  }

  /**
   * Read the whole tree and swap it in. Per-file problems are reported, never thrown.
   */
  async loadAll(): Promise<LoadReport> {
    const report = emptyReport();

    const global = await this.loadGlobal(report);
    const seasons = await this.loadSeasons(report);

    this.global = global;
    this.seasons = seasons;
    this.rebuildIndex();

    report.seasons = [...seasons.keys()].sort(byId);
    report.duplicates = this.findDuplicates();

    if (report.skipped.length > 0) {
      const detail = report.skipped.map((s) => `${s.seasonId} (${s.file}: ${s.reason})`).join("; ");
      log.warn(`Skipped ${report.skipped.length} season(s): ${detail}`);
    }
    for (const duplicate of report.duplicates) {
      log.warn(`Verification id ${duplicate.verificationId} appears in active seasons ${duplicate.seasons.join(", ")}; ${duplicate.seasons[0]} takes precedence`);
    }

    log.info(
      `Config loaded: ${report.seasons.length} season(s), ${this.global.roles.length} role(s), special members ${this.global.specialMembers ? "present" : "absent"}`,
    );

    this.lastReport = report;
    return report;
  }

  /**
   * loadAll under the write lock
   */
  async reload(): Promise<LoadReport> {
    return this.lock.write(() => this.loadAll());
  }

  getLastReport(): LoadReport {
    return this.lastReport;
  }

  private async loadGlobalFile<S extends z.ZodTypeAny>(file: string, schema: S, report: LoadReport): Promise<z.output<S> | undefined> {
    const relative = `global/${file}`;
    try {
      const raw = await readJsonFile(this.resolve(relative));
      return raw === undefined ? undefined : parseWith(schema, raw, relative);
    } catch (error) {
      const reason = describeError(error);
      report.globalErrors.push({ file: relative, reason });
      log.warn(`Using defaults for ${relative}: ${reason}`);
      return undefined;
    }
  }

  private async loadGlobal(report: LoadReport): Promise<GlobalConfig> {
    const roles = await this.loadGlobalFile("roles.json", RolesFileSchema, report);
    const permissions = await this.loadGlobalFile("permissions.json", PermissionsFileSchema, report);
    const assignments = await this.loadGlobalFile("assignments.json", AssignmentsFileSchema, report);

    return {
      roles: roles ? toRoleDefinitions(roles) : defaultRoles(),
      permissionDefinitions: permissions ? toPermissionDefinitions(permissions) : {},
      specialMembers: assignments ? toSpecialMembers(assignments) : null,
    };
  }

  private async loadSeasons(report: LoadReport): Promise<Map<string, Season>> {
    const seasons = new Map<string, Season>();
    const seasonsDir = this.resolve("seasons");

    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(seasonsDir, { withFileTypes: true });
    } catch (error) {
      if (!isNotFound(error)) {
        report.globalErrors.push({ file: "seasons", reason: describeError(error) });
        log.error(`Could not list ${seasonsDir}:`, error);
      }
      return seasons;
    }

    const ids = dirents
      .filter((d) => d.isDirectory())
      .map((d) => d.name)
      .sort(byId);

    for (const seasonId of ids) {
      if (!isValidSeasonId(seasonId)) {
        report.skipped.push({ seasonId, file: "", reason: "directory name is not a valid season id" });
        continue;
      }

      let file = "season.json";
      try {
        const seasonRaw = await readJsonFile(this.resolve(`seasons/${seasonId}/season.json`));
        const seasonFile = seasonRaw === undefined ? undefined : parseWith(SeasonFileSchema, seasonRaw, `seasons/${seasonId}/season.json`);

        file = "users.json";
        const usersRaw = await readJsonFile(this.resolve(`seasons/${seasonId}/users.json`));
        const roster = usersRaw === undefined ? [] : parseRoster(usersRaw, `seasons/${seasonId}/users.json`);

        seasons.set(seasonId, buildSeason(seasonId, seasonFile, roster));
        log.debug(`Loaded season ${seasonId} with ${roster.length} users`);
      } catch (error) {
        report.skipped.push({ seasonId, file, reason: describeError(error) });
      }
    }

    return seasons;
  }

  private activeSeasons(): Season[] {
    return this.getAllSeasons().filter((season) => season.active);
  }

  private rebuildIndex(): void {
    const index = new Map<string, RosterMatch>();
    for (const season of this.activeSeasons()) {
      for (const entry of season.roster) {
        if (!index.has(entry.verificationId)) {
          index.set(entry.verificationId, { season, entry });
        }
      }
    }
    this.index = index;
  }

  private findDuplicates(): LoadReport["duplicates"] {
    const seen = new Map<string, string[]>();
    for (const season of this.activeSeasons()) {
      for (const entry of season.roster) {
        const list = seen.get(entry.verificationId);
        if (list) {
          list.push(season.seasonId);
        } else {
          seen.set(entry.verificationId, [season.seasonId]);
        }
      }
    }
    return [...seen.entries()]
      .filter(([, seasons]) => seasons.length > 1)
      .map(([verificationId, seasons]) => ({ verificationId, seasons }))
      .sort((a, b) => byId(a.verificationId, b.verificationId));
  }

  // ── Queries ────────────────────────────────────────────

  /**
   * Resolve a claimed id against active rosters. Ids are trimmed first; an id
   * present in several seasons resolves to the lowest season id.
   */
  findUserByVerificationId(verificationId: string): RosterMatch | undefined {
    const id = verificationId.trim();
    if (!id) return undefined;
    return this.index.get(id);
  }

  /** Role names whose assignment list contains the id, sorted */
  getSpecialRolesForUser(verificationId: string): string[] {
    const id = verificationId.trim();
    const roles = this.global.specialMembers?.roles ?? {};
    return Object.keys(roles)
      .filter((role) => roles[role]?.includes(id))
      .sort(byId);
  }

  getDefaultMemberRoleName(): string {
    return this.global.roles.find((role) => role.isDefaultMemberRole)?.name ?? DEFAULT_MEMBER_ROLE;
  }

  getSeason(seasonId: string): Season | undefined {
    return this.seasons.get(seasonId);
  }

  getAllSeasons(): Season[] {
    return [...this.seasons.values()].sort((a, b) => byId(a.seasonId, b.seasonId));
  }

  getGlobalConfig(): GlobalConfig {
    return this.global;
  }

  getSpecialMembers(): SpecialMembersConfig | null {
    return this.global.specialMembers;
  }

  /**
   * Built-in presets, overridden by permissions.json, then by the season's overrides
   */
  getPermissionDefinitions(seasonId?: string): Record<string, PermissionSet> {
    const season = seasonId ? this.seasons.get(seasonId) : undefined;
    return {
      ...DEFAULT_PERMISSION_DEFINITIONS,
      ...this.global.permissionDefinitions,
      ...(season?.permissionOverrides ?? {}),
    };
  }

  /**
   * Maintainers are listed by Discord id or username, compared case-insensitively
   */
  isMaintainer(userId: string, username?: string): boolean {
    const candidates = [userId, username].filter((c): c is string => Boolean(c)).map((c) => c.toLowerCase());
    return (this.global.specialMembers?.maintainers ?? []).some((m) => candidates.includes(m.toLowerCase()));
  }

  // ── Mutators (commit path) ─────────────────────────────

  upsertSeasonRoster(seasonId: string, roster: RosterEntry[]): Season {
    const existing = this.seasons.get(seasonId);
    const season: Season = existing ? { ...existing, roster } : buildSeason(seasonId, undefined, roster);
    this.seasons.set(seasonId, season);
    this.rebuildIndex();
    return season;
  }

  replaceSpecialMembers(config: SpecialMembersConfig): void {
    this.global = { ...this.global, specialMembers: config };
  }
}
