import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as path from "path";
import { ConfigStore } from "../../plugins/roster/services/ConfigStore.js";
import { UserDatabase } from "../../plugins/verification/services/UserDatabase.js";
import { VerificationEngine, type VerificationResult } from "../../plugins/verification/services/VerificationEngine.js";
import { ALICE_ID, BOB_ID, CAROL_ID, readJson, removeTree, sampleTree, writeConfigTree } from "../helpers/configTree.js";

const DISCORD_A = "100000000000000001";
const DISCORD_B = "100000000000000002";

let root: string;
let store: ConfigStore;
let database: UserDatabase;
let engine: VerificationEngine;
let clock: number;

beforeEach(async () => {
  root = await writeConfigTree(sampleTree());
  store = new ConfigStore(root);
  await store.loadAll();
  database = new UserDatabase();
  clock = Date.parse("2025-03-01T12:00:00.000Z");
  engine = new VerificationEngine({
    database,
    configStore: store,
    databasePath: path.join(root, "state", "user_database.json"),
    now: () => new Date(clock),
  });
});

afterEach(async () => {
  engine.stopPendingCleanup();
  vi.useRealTimers();
  await removeTree(root);
});

function errorCode(result: VerificationResult): string | null {
  return result.success ? null : result.error.code;
}

describe("VerificationEngine.attemptVerification", () => {
  it("binds a roster id and lists the roles to assign", async () => {
    const result = await engine.attemptVerification(DISCORD_A, `  ${ALICE_ID} `);

    expect(result).toEqual({
      success: true,
      discordId: DISCORD_A,
      verificationId: ALICE_ID,
      displayName: "Alice",
      seasonId: "2025E",
      seasonName: "Spring 2025",
      seasons: ["2025E"],
      rolesToAssign: ["Verified", "Member 2025E", "Mentor", "Organizer"],
      specialRoles: ["Mentor", "Organizer"],
    });
    expect(engine.getUser(DISCORD_A)).toEqual({
      discordId: DISCORD_A,
      verificationIds: { "2025E": ALICE_ID },
      displayName: "Alice",
      verifiedAt: "2025-03-01T12:00:00.000Z",
      specialRoles: ["Mentor", "Organizer"],
      currentRoles: [],
      status: "verified",
      lastSeen: "2025-03-01T12:00:00.000Z",
    });
  });

  it("reports an unknown id", async () => {
    const result = await engine.attemptVerification(DISCORD_A, CAROL_ID);

    expect(result).toEqual({
      success: false,
      discordId: DISCORD_A,
      verificationId: CAROL_ID,
      error: { code: "NOT_FOUND", message: `Could not find ID '${CAROL_ID}' in our records. Please check your ID and try again.` },
    });
    expect(database.userCount()).toBe(0);
  });

  it("refuses an id already bound to another account", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);
    const result = await engine.attemptVerification(DISCORD_B, ALICE_ID);

    expect(result.success).toBe(false);
    expect(!result.success && result.error).toEqual({ code: "ID_ALREADY_USED", message: "This ID has already been used to verify another account." });
    expect(engine.getUser(DISCORD_B)).toBeUndefined();
  });

  it("refuses a second verification for the same season", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);
    const result = await engine.attemptVerification(DISCORD_A, BOB_ID);

    expect(!result.success && result.error).toEqual({ code: "ALREADY_VERIFIED", message: "You are already verified for season 2025E!" });
    expect(engine.findByVerificationId(BOB_ID)).toBeUndefined();
  });

  it("lets exactly one of two racing accounts win an id", async () => {
    const results = await Promise.all([engine.attemptVerification(DISCORD_A, ALICE_ID), engine.attemptVerification(DISCORD_B, ALICE_ID)]);

    expect(results.map(errorCode)).toEqual([null, "ID_ALREADY_USED"]);
    expect(engine.findByVerificationId(ALICE_ID)?.discordId).toBe(DISCORD_A);
  });

  it("adds a new season to an existing record", async () => {
    await engine.attemptVerification(DISCORD_A, BOB_ID);
    await store.lock.write(() => store.upsertSeasonRoster("2025F", [{ displayName: "Bob Again", verificationId: "uuid-bob-fall" }]));
    clock += 60_000;

    const result = await engine.attemptVerification(DISCORD_A, "uuid-bob-fall");

    expect(result.success && result.seasons).toEqual(["2025E", "2025F"]);
    expect(result.success && result.rolesToAssign).toEqual(["Verified", "Member 2025F"]);
    const record = engine.getUser(DISCORD_A);
    expect(record?.verificationIds).toEqual({ "2025E": BOB_ID, "2025F": "uuid-bob-fall" });
    expect(record?.displayName).toBe("Bob Again");
    expect(record?.verifiedAt).toBe("2025-03-01T12:00:00.000Z");
    expect(record?.lastSeen).toBe("2025-03-01T12:01:00.000Z");
  });

  it("clears the pending DM entry on success", async () => {
    engine.startVerification(DISCORD_A, "dm-1");
    await engine.attemptVerification(DISCORD_A, ALICE_ID);
    expect(engine.isPending(DISCORD_A)).toBe(false);
  });
});

describe("VerificationEngine pending cleanup", () => {
  it("drops stale prompts on the interval until stopped", () => {
    vi.useFakeTimers();
    engine.startPendingCleanup(60_000);

    engine.startVerification(DISCORD_A, "dm-1");
    clock += 2 * 60 * 60 * 1000;
    vi.advanceTimersByTime(60_000);
    expect(engine.isPending(DISCORD_A)).toBe(false);

    engine.stopPendingCleanup();
    engine.startVerification(DISCORD_B, "dm-2");
    clock += 2 * 60 * 60 * 1000;
    vi.advanceTimersByTime(60_000);
    expect(engine.isPending(DISCORD_B)).toBe(true);
  });
});

describe("VerificationEngine.precheck", () => {
  it("matches what a verification would report", async () => {
    expect(await engine.precheck(ALICE_ID)).toBeNull();
    expect((await engine.precheck("nope"))?.code).toBe("NOT_FOUND");

    await engine.attemptVerification(DISCORD_A, ALICE_ID);
    expect((await engine.precheck(ALICE_ID))?.code).toBe("ID_ALREADY_USED");
    expect((await engine.precheck(ALICE_ID, DISCORD_A))?.code).toBe("ALREADY_VERIFIED");
    expect((await engine.precheck(BOB_ID, DISCORD_A))?.code).toBe("ALREADY_VERIFIED");
    expect(await engine.precheck(BOB_ID, DISCORD_B)).toBeNull();
  });
});

describe("VerificationEngine revoke and roles", () => {
  it("revokes without freeing the id", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);
    const revoked = await engine.revoke(DISCORD_A, "Left the program");

    expect(revoked?.status).toBe("revoked");
    expect(revoked?.notes).toBe("Left the program");
    expect(engine.isVerified(DISCORD_A)).toBe(false);
    expect(errorCode(await engine.attemptVerification(DISCORD_B, ALICE_ID))).toBe("ID_ALREADY_USED");
    expect(await engine.revoke(DISCORD_B)).toBeUndefined();
  });

  it("keeps a revoked account revoked when it claims a new season's id", async () => {
    await engine.attemptVerification(DISCORD_A, BOB_ID);
    await engine.revoke(DISCORD_A, "Left the program");
    await store.lock.write(() => store.upsertSeasonRoster("2025F", [{ displayName: "Bob Again", verificationId: "uuid-bob-fall" }]));

    const result = await engine.attemptVerification(DISCORD_A, "uuid-bob-fall");

    expect(!result.success && result.error).toEqual({
      code: "VERIFICATION_REVOKED",
      message: "Your verification was revoked by an administrator. Please contact them to restore access.",
    });
    expect(engine.getUser(DISCORD_A)?.status).toBe("revoked");
    expect(engine.getUser(DISCORD_A)?.verificationIds).toEqual({ "2025E": BOB_ID });
    expect(engine.findByVerificationId("uuid-bob-fall")).toBeUndefined();
    expect((await engine.precheck("uuid-bob-fall", DISCORD_A))?.code).toBe("VERIFICATION_REVOKED");
  });

  it("computes current roles for verified accounts only", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);

    expect(await engine.rolesFor(DISCORD_A)).toEqual(["Verified", "Member 2025E", "Mentor", "Organizer"]);
    expect(await engine.rolesFor(DISCORD_B)).toBeNull();
  });

  it("records applied roles without duplicates", async () => {
    await engine.attemptVerification(DISCORD_A, BOB_ID);
    await engine.recordAppliedRoles(DISCORD_A, ["Verified", "Member 2025E"]);
    await engine.recordAppliedRoles(DISCORD_A, ["Verified"]);

    expect(engine.getUser(DISCORD_A)?.currentRoles).toEqual(["Verified", "Member 2025E"]);
  });
});

describe("VerificationEngine pending prompts", () => {
  it("refuses a second prompt within the hour", () => {
    expect(engine.startVerification(DISCORD_A, "dm-1")).toBeNull();
    expect(engine.startVerification(DISCORD_A, "dm-1")?.code).toBe("VERIFICATION_PENDING");

    clock += 60 * 60 * 1000;
    expect(engine.startVerification(DISCORD_A, "dm-2")).toBeNull();
    expect(engine.getPending(DISCORD_A)?.channelId).toBe("dm-2");
  });

  it("drops stale prompts", () => {
    engine.startVerification(DISCORD_A, "dm-1");
    clock += 30 * 60 * 1000;
    engine.startVerification(DISCORD_B, "dm-2");
    clock += 31 * 60 * 1000;

    expect(engine.cleanupStalePending()).toBe(1);
    expect(engine.isPending(DISCORD_A)).toBe(false);
    expect(engine.isPending(DISCORD_B)).toBe(true);
    expect(engine.cancelVerification(DISCORD_B)).toBe(true);
    expect(engine.pendingCount()).toBe(0);
  });
});

describe("VerificationEngine.saveDatabase", () => {
  it("writes the database and clears the dirty flag", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);

    expect(await engine.saveDatabase()).toBe(true);
    expect(database.isDirty()).toBe(false);
    expect(await readJson(root, "state/user_database.json")).toMatchObject({
      version: 3,
      users: { [DISCORD_A]: { verification_ids: { "2025E": ALICE_ID }, verification_status: "verified" } },
    });
  });

  it("reports a failed save and stays dirty", async () => {
    const blocked = new VerificationEngine({
      database,
      configStore: store,
      databasePath: path.join(root, "global", "roles.json", "user_database.json"),
    });
    await blocked.attemptVerification(DISCORD_A, ALICE_ID);

    expect(await blocked.saveDatabase()).toBe(false);
    expect(database.isDirty()).toBe(true);
  });
});
