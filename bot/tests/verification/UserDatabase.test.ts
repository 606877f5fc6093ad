import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import * as path from "path";
import { UserDatabase } from "../../plugins/verification/services/UserDatabase.js";
import { migrateDatabase, type TrackedUser } from "../../plugins/verification/models/TrackedUser.js";
import { readJson, removeTree, writeConfigTree } from "../helpers/configTree.js";

const LEGACY_FILE = {
  version: 1,
  last_updated: 1700000000,
  users: {
    "111111111111111111": {
      discord_id: "111111111111111111",
      verification_id: "uuid-old-1",
      seasons: ["2025E", "2024F"],
      display_name: "Old Timer",
      verified_at: 1700000000,
      verification_status: "verified",
    },
    "222222222222222222": {
      discord_id: "222222222222222222",
      verification_id: "uuid-old-2",
      display_name: "No Seasons",
      verified_at: "2024-01-01T00:00:00.000Z",
      verification_status: "revoked",
    },
  },
};

function user(overrides: Partial<TrackedUser> & Pick<TrackedUser, "discordId">): TrackedUser {
  return {
    verificationIds: {},
    displayName: "Someone",
    verifiedAt: "2025-01-01T00:00:00.000Z",
    specialRoles: [],
    currentRoles: [],
    status: "verified",
    ...overrides,
  };
}

describe("migrateDatabase", () => {
  it("moves single ids under their first season and converts timestamps", () => {
    const result = migrateDatabase(LEGACY_FILE);

    expect(result.changed).toBe(true);
    expect(result.fromVersion).toBe(1);
    expect(result.data).toEqual({
      version: 3,
      last_updated: "2023-11-14T22:13:20.000Z",
      users: {
        "111111111111111111": {
          discord_id: "111111111111111111",
          verification_ids: { "2025E": "uuid-old-1" },
          display_name: "Old Timer",
          verified_at: "2023-11-14T22:13:20.000Z",
          verification_status: "verified",
        },
        "222222222222222222": {
          discord_id: "222222222222222222",
          verification_ids: { "2024E": "uuid-old-2" },
          display_name: "No Seasons",
          verified_at: "2024-01-01T00:00:00.000Z",
          verification_status: "revoked",
        },
      },
    });
  });

  it("leaves a migrated file alone", () => {
    const once = migrateDatabase(LEGACY_FILE);
    const twice = migrateDatabase(once.data);

    expect(twice.changed).toBe(false);
    expect(twice.data).toBe(once.data);
  });
});

describe("UserDatabase", () => {
  let root: string;

  beforeEach(async () => {
    root = await writeConfigTree({ "state/user_database.json": LEGACY_FILE });
  });

  afterEach(async () => {
    await removeTree(root);
  });

  it("starts empty when the file is missing", async () => {
    const db = await UserDatabase.load(path.join(root, "missing.json"));
    expect(db.userCount()).toBe(0);
    expect(db.isDirty()).toBe(false);
  });

  it("loads a legacy file dirty and is clean once saved", async () => {
    const file = path.join(root, "state", "user_database.json");
    const db = await UserDatabase.load(file);

    expect(db.isDirty()).toBe(true);
    expect(db.findByVerificationId("uuid-old-1")?.discordId).toBe("111111111111111111");
    expect(db.getUsersBySeason("2024E").map((u) => u.displayName)).toEqual(["No Seasons"]);
    expect(db.isVerified("222222222222222222")).toBe(false);

    await db.save(file);
    expect(db.isDirty()).toBe(false);

    const saved = await readJson(root, "state/user_database.json");
    expect(saved).toMatchObject({ version: 3, users: { "111111111111111111": { verification_ids: { "2025E": "uuid-old-1" } } } });

    const reloaded = await UserDatabase.load(file);
    expect(reloaded.isDirty()).toBe(false);
    expect(reloaded.userCount()).toBe(2);
  });

  it("rejects a file that does not match the schema", async () => {
    const file = path.join(root, "bad.json");
    await fs.writeFile(file, JSON.stringify({ version: 3, last_updated: "x", users: { a: { discord_id: "a" } } }));

    await expect(UserDatabase.load(file)).rejects.toMatchObject({ code: "CONFIG_VALIDATION" });
  });

  it("marks upserts dirty and lists users by Discord id", () => {
    const db = new UserDatabase();
    db.upsertUser(user({ discordId: "300", verificationIds: { "2025E": "uuid-c" } }));
    db.upsertUser(user({ discordId: "100", verificationIds: { "2025E": "uuid-a", "2024F": "uuid-a-old" } }));

    expect(db.isDirty()).toBe(true);
    expect(db.getAllUsers().map((u) => u.discordId)).toEqual(["100", "300"]);
    expect(db.findByVerificationId("uuid-a-old")?.discordId).toBe("100");
    expect(db.getUsersBySeason("2024F").map((u) => u.discordId)).toEqual(["100"]);
    expect(Object.keys(db.toFile().users)).toEqual(["100", "300"]);
  });
});
