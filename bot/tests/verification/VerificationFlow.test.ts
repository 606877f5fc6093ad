import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import * as path from "path";
import type { Guild } from "discord.js";
import { ConfigStore } from "../../plugins/roster/services/ConfigStore.js";
import { UserDatabase } from "../../plugins/verification/services/UserDatabase.js";
import { VerificationEngine } from "../../plugins/verification/services/VerificationEngine.js";
import { VerificationFlow } from "../../plugins/verification/services/VerificationFlow.js";
import type { RoleApplier } from "../../plugins/verification/services/RoleApplier.js";
import { DiscordApiError } from "../../plugins/lib/utils/errors.js";
import { outcomeMessage, outcomeResponse } from "../../plugins/verification/utils/outcome.js";
import { RETRY_HINT, successMessage } from "../../plugins/verification/utils/messages.js";
import { ALICE_ID, BOB_ID, CAROL_ID, removeTree, sampleTree, writeConfigTree } from "../helpers/configTree.js";

const DISCORD_A = "100000000000000001";
const DISCORD_B = "100000000000000002";
const ALICE_ROLES = ["Verified", "Member 2025E", "Mentor", "Organizer"];

const guild = { id: "guild-1" } as unknown as Guild;

let root: string;
let engine: VerificationEngine;
let apply: Mock<RoleApplier["apply"]>;
let currentGuild: Guild | null;
let flow: VerificationFlow;

beforeEach(async () => {
  root = await writeConfigTree(sampleTree());
  const store = new ConfigStore(root);
  await store.loadAll();
  engine = new VerificationEngine({ database: new UserDatabase(), configStore: store, databasePath: path.join(root, "state", "user_database.json") });
  apply = vi.fn<RoleApplier["apply"]>();
  currentGuild = guild;
  flow = new VerificationFlow({ engine, roleApplier: { apply }, getGuild: async () => currentGuild });
});

afterEach(async () => {
  await removeTree(root);
});

describe("VerificationFlow.verify", () => {
  it("applies roles, records them and saves", async () => {
    apply.mockResolvedValueOnce({ applied: ["Verified", "Member 2025E"], missing: ["Mentor", "Organizer"], nicknameSet: true });

    const outcome = await flow.verify(DISCORD_A, ALICE_ID);

    expect(apply).toHaveBeenCalledWith(guild, DISCORD_A, "Alice", ALICE_ROLES);
    expect(outcome.saved).toBe(true);
    expect(outcome.applyError).toBeUndefined();
    expect(engine.getUser(DISCORD_A)?.currentRoles).toEqual(["Verified", "Member 2025E"]);
    expect(outcomeMessage(outcome)).toBe(`${successMessage("Alice", "Spring 2025", ALICE_ROLES)}\n\n⚠️ Some roles do not exist yet: Mentor, Organizer`);
  });

  it("keeps the verification when Discord refuses the changes", async () => {
    apply.mockRejectedValueOnce(new DiscordApiError("Could not add roles"));

    const outcome = await flow.verify(DISCORD_A, BOB_ID);

    expect(outcome.applyError).toBe("Could not add roles");
    expect(engine.isVerified(DISCORD_A)).toBe(true);
    expect(outcomeResponse(outcome)).toEqual({
      status: 200,
      body: {
        success: true,
        data: {
          discordId: DISCORD_A,
          displayName: "Bob",
          seasonId: "2025E",
          seasons: ["2025E"],
          rolesToAssign: ["Verified", "Member 2025E"],
          appliedRoles: [],
          missingRoles: [],
          applyError: "Could not add roles",
          saved: true,
        },
      },
    });
  });

  it("reports an unreachable guild without calling Discord", async () => {
    currentGuild = null;

    const outcome = await flow.verify(DISCORD_A, BOB_ID);

    expect(apply).not.toHaveBeenCalled();
    expect(outcome.applyError).toBe("The server could not be reached");
  });

  it("returns failures untouched and unsaved", async () => {
    await flow.verify(DISCORD_A, ALICE_ID);
    const taken = await flow.verify(DISCORD_B, ALICE_ID);
    const unknown = await flow.verify(DISCORD_B, CAROL_ID);

    expect(taken.saved).toBe(false);
    expect(outcomeResponse(taken).status).toBe(409);
    expect(outcomeResponse(unknown).status).toBe(404);
    expect(outcomeMessage(taken, { dm: true })).toBe("❌ This ID has already been used to verify another account.");
    expect(outcomeMessage(unknown, { dm: true })).toBe(
      `❌ Could not find ID '${CAROL_ID}' in our records. Please check your ID and try again.\n\n${RETRY_HINT}`,
    );
    expect(apply).toHaveBeenCalledTimes(1);
  });
});

describe("VerificationFlow.restore", () => {
  it("re-applies the current roles of a verified member", async () => {
    apply.mockResolvedValue({ applied: ALICE_ROLES, missing: [], nicknameSet: true });
    await flow.verify(DISCORD_A, ALICE_ID);

    const restored = await flow.restore(guild, DISCORD_A);

    expect(restored?.applied).toEqual(ALICE_ROLES);
    expect(apply).toHaveBeenLastCalledWith(guild, DISCORD_A, "Alice", ALICE_ROLES);
  });

  it("does nothing for unknown or revoked members", async () => {
    apply.mockResolvedValue({ applied: [], missing: [], nicknameSet: false });
    await flow.verify(DISCORD_A, ALICE_ID);
    await engine.revoke(DISCORD_A);

    expect(await flow.restore(guild, DISCORD_A)).toBeNull();
    expect(await flow.restore(guild, DISCORD_B)).toBeNull();
    expect(apply).toHaveBeenCalledTimes(1);
  });
});
