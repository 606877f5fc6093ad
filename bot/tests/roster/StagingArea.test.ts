import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { promises as fs } from "fs";
import { ConfigStore } from "../../plugins/roster/services/ConfigStore.js";
import { StagingArea } from "../../plugins/roster/services/StagingArea.js";
import { ConfigFileService } from "../../plugins/roster/services/ConfigFileService.js";
import { onDisable, type RosterPluginAPI } from "../../plugins/roster/index.js";
import type { LibAPI } from "../../plugins/lib/index.js";
import { isRollcallError } from "../../plugins/lib/utils/errors.js";
import { ALICE_ID, BOB_ID, CAROL_ID, readJson, removeTree, sampleTree, writeConfigTree } from "../helpers/configTree.js";

let root: string;
let store: ConfigStore;
let staging: StagingArea;

beforeEach(async () => {
  root = await writeConfigTree(sampleTree());
  store = new ConfigStore(root);
  await store.loadAll();
  staging = new StagingArea({ store, timeoutSeconds: 120 });
});

afterEach(async () => {
  staging.dispose();
  vi.useRealTimers();
  await removeTree(root);
});

const roster = (...entries: [string, string][]) => JSON.stringify(entries.map(([Name, DiscordId]) => ({ Name, DiscordId })));

describe("StagingArea", () => {
  it("reports a new season as an addition", () => {
    staging.stageSeasonUsers("2025F", roster(["Carol", CAROL_ID], ["Dan", "uuid-dan"]), "admin");

    expect(staging.getDiff()).toEqual({
      additions: [{ changeType: "add", entityType: "season", entityName: "2025F", details: "2 users" }],
      modifications: [],
      deletions: [],
    });
    expect(staging.getStagedBy()).toBe("admin");
  });

  it("describes roster changes by id, not by count", () => {
    staging.stageSeasonUsers("2025E", roster(["Alice", ALICE_ID], ["Carol", CAROL_ID]));

    expect(staging.getDiff().modifications).toEqual([
      { changeType: "modify", entityType: "season", entityName: "2025E", details: "2 users (+0 change), 1 added, 1 removed" },
    ]);
  });

  it("accepts the wrapped layout and a byte order mark", () => {
    const wrapped = "\uFEFF" + JSON.stringify({ season_id: "2025E", users: [{ Name: "Bob", DiscordId: BOB_ID }] });
    const staged = staging.stageSeasonUsers("2025E", Buffer.from(wrapped, "utf-8"));

    expect(staged).toEqual([{ displayName: "Bob", verificationId: BOB_ID }]);
    expect(staging.getStagedSeasons()).toEqual([{ seasonId: "2025E", users: 1 }]);
  });

  it("rejects bad payloads without staging anything", () => {
    expect(() => staging.stageSeasonUsers("2025E", "[{")).toThrow(/^Invalid JSON in staged seasons\/2025E\/users\.json/);
    expect(() => staging.stageSeasonUsers("../etc", roster(["A", "a"]))).toThrow("Invalid season id");
    expect(staging.hasStaged()).toBe(false);
  });

  it("reports an empty diff when nothing is staged", () => {
    expect(staging.getDiff()).toEqual({ additions: [], modifications: [], deletions: [] });
  });

  it("reports an identical roster as a modification without changes", () => {
    staging.stageSeasonUsers("2025E", roster(["Alice", ALICE_ID], ["Bob", BOB_ID]));

    expect(staging.getDiff()).toEqual({
      additions: [],
      modifications: [{ changeType: "modify", entityType: "season", entityName: "2025E", details: "2 users (+0 change), 0 added, 0 removed" }],
      deletions: [],
    });
  });

  it("refuses to commit when nothing is staged and leaves the tree alone", async () => {
    const usersFile = store.resolve("seasons/2025E/users.json");
    const contentBefore = await fs.readFile(usersFile, "utf-8");
    const mtimeBefore = (await fs.stat(usersFile)).mtimeMs;

    const error = await staging.commit().catch((e: unknown) => e);

    expect(isRollcallError(error) && error.code).toBe("NO_STAGED_CONFIG");
    expect(await fs.readFile(usersFile, "utf-8")).toBe(contentBefore);
    expect((await fs.stat(usersFile)).mtimeMs).toBe(mtimeBefore);
    expect((await fs.readdir(store.resolve("seasons/2025E"))).sort()).toEqual(["season.json", "users.json"]);
  });

  it("lets only one of two concurrent commits apply the staged content", async () => {
    staging.stageSeasonUsers("2025F", roster(["Carol", CAROL_ID]));

    const [first, second] = await Promise.allSettled([staging.commit(), staging.commit()]);

    expect(first.status === "fulfilled" && first.value.changes.map((c) => c.entityName)).toEqual(["2025F"]);
    expect(second.status === "rejected" && isRollcallError(second.reason) && second.reason.code).toBe("NO_STAGED_CONFIG");
  });

  it("commits a roster that a fresh store reads back from disk", async () => {
    staging.stageSeasonUsers("2025F", roster(["Carol", CAROL_ID], ["Dan", "uuid-dan"]));
    await staging.commit();

    const reloaded = new ConfigStore(root);
    await reloaded.loadAll();

    const ids = reloaded.getSeason("2025F")?.roster.map((entry) => `${entry.displayName}:${entry.verificationId}`);
    expect(new Set(ids)).toEqual(new Set([`Carol:${CAROL_ID}`, "Dan:uuid-dan"]));
  });

  it("writes staged rosters and assignments and serves them immediately", async () => {
    staging.stageSeasonUsers("2025E", roster(["Alice", ALICE_ID], ["Carol", CAROL_ID]));
    staging.stageSpecialMembers(JSON.stringify({ roles: { Mentor: [CAROL_ID] } }));

    const result = await staging.commit();

    expect(result.failures).toEqual([]);
    expect(result.changes.map((c) => [c.changeType, c.entityType, c.entityName])).toEqual([
      ["modify", "season", "2025E"],
      ["modify", "special_members", "Special Members"],
    ]);
    expect(await readJson(root, "seasons/2025E/users.json")).toEqual([
      { Name: "Alice", DiscordId: ALICE_ID },
      { Name: "Carol", DiscordId: CAROL_ID },
    ]);
    expect(await readJson(root, "global/assignments.json")).toEqual({ roles: { Mentor: [CAROL_ID] }, maintainers: [] });
    expect(store.findUserByVerificationId(CAROL_ID)?.season.seasonId).toBe("2025E");
    expect(store.getSpecialRolesForUser(CAROL_ID)).toEqual(["Mentor"]);
    expect(staging.hasStaged()).toBe(false);
  });

  it("keeps a failed entry staged and commits the rest", async () => {
    // A file where the season directory should be makes the write fail
    await fs.writeFile(store.resolve("seasons/2026E"), "blocker");
    staging.stageSeasonUsers("2026E", roster(["Carol", CAROL_ID]));
    staging.stageSeasonUsers("2025F", roster(["Dan", "uuid-dan"]));

    const result = await staging.commit();

    expect(result.changes.map((c) => c.entityName)).toEqual(["2025F"]);
    expect(result.failures.map((f) => f.entityName)).toEqual(["2026E"]);
    expect(staging.getStagedSeasons()).toEqual([{ seasonId: "2026E", users: 1 }]);
    expect(store.getSeason("2025F")?.memberRoleName).toBe("Member 2025F");
  });

  it("reports special members as added when none were loaded", async () => {
    await fs.rm(store.resolve("global/assignments.json"));
    await store.reload();

    staging.stageSpecialMembers(JSON.stringify({ roles: { Mentor: [ALICE_ID, BOB_ID] } }));
    expect(staging.getDiff().additions).toEqual([
      { changeType: "add", entityType: "special_members", entityName: "Special Members", details: "1 roles, 2 assignments, 0 maintainers" },
    ]);
  });

  it("clear reports whether anything was discarded", () => {
    staging.stageSeasonUsers("2025E", roster(["Alice", ALICE_ID]));
    expect(staging.clear()).toBe(true);
    expect(staging.clear()).toBe(false);
    expect(staging.getSummary()).toBe("Nothing staged");
  });

  it("discards staged content after the timeout", () => {
    vi.useFakeTimers();
    staging.stageSeasonUsers("2025E", roster(["Alice", ALICE_ID]));

    vi.advanceTimersByTime(119_000);
    expect(staging.hasStaged()).toBe(true);

    vi.advanceTimersByTime(1_000);
    expect(staging.hasStaged()).toBe(false);
  });

  it("stops the expiry timer when the plugin is disabled", async () => {
    vi.useFakeTimers();
    staging.stageSeasonUsers("2025E", roster(["Alice", ALICE_ID]));
    const api = {
      version: "1.0.0",
      configStore: store,
      stagingArea: staging,
      configFiles: new ConfigFileService(store),
      lib: {} as unknown as LibAPI,
    } satisfies RosterPluginAPI;
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

    await onDisable(logger, api);
    vi.advanceTimersByTime(120_000);

    expect(staging.hasStaged()).toBe(true);
    expect(logger.info).toHaveBeenCalledWith("🛑 Roster plugin unloaded");
  });
});
