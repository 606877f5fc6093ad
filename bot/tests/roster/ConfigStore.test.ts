import { afterEach, describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import { ConfigStore } from "../../plugins/roster/services/ConfigStore.js";
import { ALICE_ID, BOB_ID, CAROL_ID, removeTree, sampleTree, writeConfigTree, type ConfigTree } from "../helpers/configTree.js";

const roots: string[] = [];

async function loadStore(tree: ConfigTree): Promise<ConfigStore> {
  const root = await writeConfigTree(tree);
  roots.push(root);
  const store = new ConfigStore(root);
  await store.loadAll();
  return store;
}

afterEach(async () => {
  await Promise.all(roots.splice(0).map(removeTree));
});

describe("ConfigStore", () => {
  it("loads every season directory in id order", async () => {
    const store = await loadStore(sampleTree());

    expect(store.getAllSeasons().map((season) => season.seasonId)).toEqual(["2024F", "2025E"]);
    expect(store.getLastReport()).toEqual({ seasons: ["2024F", "2025E"], skipped: [], globalErrors: [], duplicates: [] });
  });

  it("reads files that start with a byte order mark", async () => {
    const store = await loadStore({ ...sampleTree(), "seasons/2025E/users.json": "\uFEFF" + JSON.stringify([{ Name: "Alice", DiscordId: ALICE_ID }]) });

    expect(store.getLastReport().skipped).toEqual([]);
    expect(store.getSeason("2025E")?.roster).toEqual([{ displayName: "Alice", verificationId: ALICE_ID }]);
  });

  it("maps season.json and applies defaults where it is missing", async () => {
    const store = await loadStore({ ...sampleTree(), "seasons/S1/users.json": [] });

    const spring = store.getSeason("2025E");
    expect(spring?.displayName).toBe("Spring 2025");
    expect(spring?.memberRoleName).toBe("Member 2025E");
    expect(spring?.categoryName).toBe("Spring 2025");
    expect(spring?.channels).toEqual([{ name: "general", type: "text", permissions: { "@member": "readwrite" } }]);

    const bare = store.getSeason("S1");
    expect(bare?.displayName).toBe("S1");
    expect(bare?.active).toBe(true);
    expect(bare?.memberRoleName).toBe("Member S1");
    expect(bare?.categoryName).toBe("S1");
  });

  it("resolves ids against active seasons only, trimming input", async () => {
    const store = await loadStore(sampleTree());

    const match = store.findUserByVerificationId(`  ${ALICE_ID}\n`);
    expect(match?.season.seasonId).toBe("2025E");
    expect(match?.entry.displayName).toBe("Alice");
    expect(store.findUserByVerificationId(CAROL_ID)).toBeUndefined();
    expect(store.findUserByVerificationId("   ")).toBeUndefined();
  });

  it("prefers the lowest season id when an id is in two active seasons", async () => {
    const tree = sampleTree();
    delete tree["seasons/2024F/season.json"];
    const store = await loadStore(tree);

    expect(store.findUserByVerificationId(ALICE_ID)?.season.seasonId).toBe("2024F");
    expect(store.getLastReport().duplicates).toEqual([{ verificationId: ALICE_ID, seasons: ["2024F", "2025E"] }]);
  });

  it("skips bad season directories and keeps the rest", async () => {
    const store = await loadStore({
      ...sampleTree(),
      "seasons/bad.id/users.json": [],
      "seasons/2026E/users.json": "{ not json",
      "seasons/2026F/users.json": [{ Name: "", DiscordId: "x" }],
    });

    const report = store.getLastReport();
    expect(report.seasons).toEqual(["2024F", "2025E"]);
    expect(report.skipped.map((s) => [s.seasonId, s.file])).toEqual([
      ["2026E", "users.json"],
      ["2026F", "users.json"],
      ["bad.id", ""],
    ]);
    expect(report.skipped[0]?.reason).toMatch(/^Invalid JSON in .*2026E.users\.json: /);
    expect(report.skipped[1]?.reason).toBe("Invalid seasons/2026F/users.json: 0.Name: Name is required");
    expect(report.skipped[2]?.reason).toBe("directory name is not a valid season id");
  });

  it("rejects a roster that repeats a verification id", async () => {
    const store = await loadStore({
      "seasons/2025E/users.json": [
        { Name: "Alice", DiscordId: ALICE_ID },
        { Name: "Alice Again", DiscordId: ALICE_ID },
      ],
    });

    expect(store.getAllSeasons()).toEqual([]);
    expect(store.getLastReport().skipped[0]?.reason).toBe(`Invalid seasons/2025E/users.json: 1.DiscordId: Duplicate verification id "${ALICE_ID}" (first seen at index 0)`);
  });

  it("falls back to default roles when roles.json is missing or invalid", async () => {
    const missing = await loadStore({});
    expect(missing.getDefaultMemberRoleName()).toBe("Member");
    expect(missing.getSpecialMembers()).toBeNull();

    const invalid = await loadStore({ "global/roles.json": { roles: [{ name: "X", permissions: ["FLY"] }] } });
    expect(invalid.getDefaultMemberRoleName()).toBe("Member");
    expect(invalid.getLastReport().globalErrors).toEqual([{ file: "global/roles.json", reason: 'Invalid global/roles.json: roles.0.permissions.0: Unknown Discord permission "FLY"' }]);
  });

  it("answers special-role and maintainer questions", async () => {
    const store = await loadStore(sampleTree());

    expect(store.getDefaultMemberRoleName()).toBe("Verified");
    expect(store.getSpecialRolesForUser(ALICE_ID)).toEqual(["Mentor", "Organizer"]);
    expect(store.getSpecialRolesForUser(BOB_ID)).toEqual([]);
    expect(store.isMaintainer("123", "admin.user")).toBe(true);
    expect(store.isMaintainer("123", "someone")).toBe(false);
  });

  it("layers permission definitions: presets, permissions.json, season overrides", async () => {
    const tree = sampleTree();
    tree["global/permissions.json"] = { definitions: { read: { allow: ["VIEW_CHANNEL"] }, staff: { allow: ["MANAGE_MESSAGES"] } } };
    tree["seasons/2025E/season.json"] = { permission_overrides: { staff: { allow: ["VIEW_CHANNEL"], deny: ["SEND_MESSAGES"] } } };
    const store = await loadStore(tree);

    const global = store.getPermissionDefinitions();
    expect(global.read).toEqual({ allow: ["VIEW_CHANNEL"], deny: [] });
    expect(global.none).toEqual({ allow: [], deny: ["VIEW_CHANNEL", "CONNECT"] });
    expect(global.staff).toEqual({ allow: ["MANAGE_MESSAGES"], deny: [] });
    expect(store.getPermissionDefinitions("2025E").staff).toEqual({ allow: ["VIEW_CHANNEL"], deny: ["SEND_MESSAGES"] });
  });

  it("reload picks up changed files", async () => {
    const root = await writeConfigTree(sampleTree());
    roots.push(root);
    const store = new ConfigStore(root);
    await store.loadAll();

    await fs.writeFile(store.resolve("seasons/2025E/users.json"), JSON.stringify([{ Name: "Carol", DiscordId: CAROL_ID }]));
    await store.reload();

    expect(store.findUserByVerificationId(CAROL_ID)?.entry.displayName).toBe("Carol");
    expect(store.findUserByVerificationId(BOB_ID)).toBeUndefined();
  });
});
