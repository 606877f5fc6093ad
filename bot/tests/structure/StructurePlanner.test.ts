import { describe, it, expect } from "vitest";
import { PermissionFlagsBits } from "discord.js";
import {
  BOT_ALLOW,
  ISOLATION_DENY,
  MEMBER_CATEGORY_ALLOW,
  parseColor,
  planAssignments,
  planRoles,
  planSeason,
} from "../../plugins/structure/services/StructurePlanner.js";
import { DEFAULT_PERMISSION_DEFINITIONS } from "../../plugins/roster/models/permissions.js";
import type { GlobalConfig, Season } from "../../plugins/roster/models/types.js";

const { ViewChannel, ReadMessageHistory, SendMessages, AttachFiles, AddReactions, ManageMessages, ManageChannels } = PermissionFlagsBits;

function season(overrides: Partial<Season> & Pick<Season, "seasonId">): Season {
  return {
    displayName: overrides.seasonId,
    active: true,
    memberRoleName: `Member ${overrides.seasonId}`,
    categoryName: overrides.seasonId,
    channels: [],
    permissionOverrides: {},
    roster: [],
    ...overrides,
  };
}

const GLOBAL: GlobalConfig = {
  roles: [
    { name: "Verified", color: "#2ecc71", hoist: false, mentionable: false, permissions: ["VIEW_CHANNEL"], isDefaultMemberRole: true, skipPermissionSync: false },
    { name: "Mentor", hoist: true, mentionable: true, permissions: ["SEND_MESSAGES", "TELEPORT"], isDefaultMemberRole: false, skipPermissionSync: false },
    { name: "Booster", hoist: false, mentionable: false, permissions: ["ADMINISTRATOR"], isDefaultMemberRole: false, skipPermissionSync: true },
  ],
  permissionDefinitions: {},
  specialMembers: null,
};

describe("parseColor", () => {
  it("reads #rrggbb and treats a missing colour as 0", () => {
    expect(parseColor("#2ecc71")).toBe(0x2ecc71);
    expect(parseColor(undefined)).toBe(0);
  });
});

describe("planRoles", () => {
  it("keeps configured roles first and generates missing member roles", () => {
    const plan = planRoles(GLOBAL, [season({ seasonId: "2025E" }), season({ seasonId: "2024F", memberRoleName: "Verified" })], "Verified");

    expect(plan.roles).toEqual([
      { name: "Verified", color: 0x2ecc71, hoist: false, mentionable: false, permissions: ViewChannel, source: "global" },
      { name: "Mentor", color: 0, hoist: true, mentionable: true, permissions: SendMessages, source: "global" },
      { name: "Booster", color: 0, hoist: false, mentionable: false, permissions: null, source: "global" },
      { name: "Member 2025E", color: 0, hoist: false, mentionable: false, permissions: null, source: "season" },
    ]);
    expect(plan.warnings).toEqual(['Role "Mentor": unknown permission TELEPORT']);
  });

  it("adds the default member role when roles.json lacks it", () => {
    const plan = planRoles({ ...GLOBAL, roles: [] }, [], "Member");
    expect(plan.roles).toEqual([{ name: "Member", color: 0, hoist: false, mentionable: false, permissions: null, source: "default" }]);
  });
});

describe("planSeason", () => {
  const spring = season({
    seasonId: "2025E",
    categoryName: "Spring 2025",
    channels: [
      { name: "general", type: "text", topic: "Chat", permissions: { "@member": "readwrite", Mentor: "admin" } },
      { name: "lobby", type: "voice", permissions: { "@everyone": "read", Ghost: "secret" } },
    ],
  });

  it("isolates the category and opens it to the season role", () => {
    const plan = planSeason(spring, DEFAULT_PERMISSION_DEFINITIONS);

    expect(plan.categoryName).toBe("Spring 2025");
    expect(plan.categoryOverwrites).toEqual([
      { target: { kind: "everyone" }, allow: 0n, deny: ISOLATION_DENY },
      { target: { kind: "bot" }, allow: BOT_ALLOW, deny: 0n },
      { target: { kind: "role", name: "Member 2025E" }, allow: MEMBER_CATEGORY_ALLOW, deny: 0n },
    ]);
  });

  it("layers configured levels over the isolation defaults", () => {
    const [general, lobby] = planSeason(spring, DEFAULT_PERMISSION_DEFINITIONS).channels;

    expect(general).toEqual({
      name: "general",
      type: "text",
      topic: "Chat",
      overwrites: [
        { target: { kind: "everyone" }, allow: 0n, deny: ISOLATION_DENY },
        { target: { kind: "bot" }, allow: BOT_ALLOW, deny: 0n },
        { target: { kind: "role", name: "Member 2025E" }, allow: ViewChannel | ReadMessageHistory | SendMessages | AttachFiles | AddReactions, deny: 0n },
        { target: { kind: "role", name: "Mentor" }, allow: ViewChannel | ReadMessageHistory | SendMessages | ManageMessages | ManageChannels, deny: 0n },
      ],
    });
    expect(lobby?.overwrites[0]).toEqual({ target: { kind: "everyone" }, allow: ViewChannel | ReadMessageHistory, deny: SendMessages });
    expect(lobby?.overwrites).toHaveLength(2);
  });

  it("warns about levels that are not defined", () => {
    expect(planSeason(spring, DEFAULT_PERMISSION_DEFINITIONS).warnings).toEqual(['#lobby: unknown permission level "secret" for Ghost']);
  });
});

describe("planAssignments", () => {
  it("groups roles per verified account and lists unbound ids", () => {
    const owners: Record<string, string> = { "uuid-a": "200", "uuid-b": "100" };
    const plan = planAssignments({ Organizer: ["uuid-a", "uuid-x"], Mentor: ["uuid-b", "uuid-a"] }, (id) => owners[id]);

    expect(plan).toEqual({
      members: [
        { discordId: "100", roles: ["Mentor"] },
        { discordId: "200", roles: ["Mentor", "Organizer"] },
      ],
      unmatched: ["uuid-x"],
    });
  });
});
