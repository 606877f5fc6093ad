/**
 * UserDatabase - Discord id → TrackedUser, persisted as one JSON file
 *
 * Mutations only touch memory and mark the database dirty; callers persist
 * with save(). A failed save leaves the instance usable and still dirty.
 */

import { promises as fs } from "fs";
import { createLogger } from "../../../src/core/Logger.js";
import { RwLock } from "../../lib/utils/RwLock.js";
import { isNotFound, parseJson, writeJsonAtomic } from "../../lib/utils/jsonFile.js";
import { parseWith } from "../../lib/utils/schema.js";
import { StateLoadError, StateSaveError } from "../../lib/utils/errors.js";
import { DatabaseFileSchema, USER_DATABASE_VERSION, fromFile, migrateDatabase, toFile, type DatabaseFile, type TrackedUser } from "../models/TrackedUser.js";

const log = createLogger("verification:database");

export class UserDatabase {
  /** Writers: verification, revoke. Readers: lookups that span several calls. */
  readonly lock = new RwLock();

  private users = new Map<string, TrackedUser>();
  private lastUpdated: string;
  private revision = 0;
  private savedRevision = 0;

  constructor(lastUpdated: string = new Date().toISOString()) {
    this.lastUpdated = lastUpdated;
  }

  /**
   * Load and migrate a database file. A missing file yields an empty database.
   */
  static async load(filePath: string): Promise<UserDatabase> {
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        log.info(`No user database at ${filePath}, starting empty`);
        return new UserDatabase();
      }
      throw new StateLoadError(filePath, error);
    }

    const migration = migrateDatabase(parseJson(text, filePath));
    const file = parseWith(DatabaseFileSchema, migration.data, filePath);

    const db = new UserDatabase(file.last_updated);
    for (const user of Object.values(file.users)) {
      db.users.set(user.discord_id, fromFile(user));
    }

    if (migration.changed) {
      db.revision = 1;
      log.info(`Migrated user database from version ${migration.fromVersion} to ${USER_DATABASE_VERSION}`);
    }

    log.info(`Loaded ${db.users.size} tracked users from ${filePath}`);
    return db;
  }

  /**
   * Write to `<path>.tmp` and rename over the target
   */
  async save(filePath: string): Promise<void> {
    const revision = this.revision;
    try {
      await writeJsonAtomic(filePath, this.toFile());
    } catch (error) {
      throw new StateSaveError(filePath, error);
    }
    this.savedRevision = Math.max(this.savedRevision, revision);
    log.debug(`Saved ${this.users.size} tracked users to ${filePath}`);
  }

  isDirty(): boolean {
    return this.revision !== this.savedRevision;
  }

  getLastUpdated(): string {
    return this.lastUpdated;
  }

  // ── Mutations ──────────────────────────────────────────

  /** Insert or replace by discordId */
  upsertUser(user: TrackedUser): void {
    this.users.set(user.discordId, user);
    this.lastUpdated = new Date().toISOString();
    this.revision++;
  }

  // ── Queries ────────────────────────────────────────────

  findByDiscordId(discordId: string): TrackedUser | undefined {
    return this.users.get(discordId);
  }

  findByVerificationId(verificationId: string): TrackedUser | undefined {
    for (const user of this.users.values()) {
      if (Object.values(user.verificationIds).includes(verificationId)) {
        return user;
      }
    }
    return undefined;
  }

  getUsersBySeason(seasonId: string): TrackedUser[] {
    return this.getAllUsers().filter((user) => seasonId in user.verificationIds);
  }

  isVerified(discordId: string): boolean {
    return this.users.get(discordId)?.status === "verified";
  }

  /** Sorted by Discord id */
  getAllUsers(): TrackedUser[] {
    return [...this.users.values()].sort((a, b) => (a.discordId < b.discordId ? -1 : a.discordId > b.discordId ? 1 : 0));
  }

  userCount(): number {
    return this.users.size;
  }

  toFile(): DatabaseFile {
    const users: DatabaseFile["users"] = {};
    for (const user of this.getAllUsers()) {
      users[user.discordId] = toFile(user);
    }
    return { version: USER_DATABASE_VERSION, last_updated: this.lastUpdated, users };
  }

  /** Pretty JSON dump for download */
  export(): Buffer {
    return Buffer.from(JSON.stringify(this.toFile(), null, 2), "utf-8");
  }
}
