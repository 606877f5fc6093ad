import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

export type ConfigTree = Record<string, unknown>;

/**
 * Write a data/ tree into a fresh temp directory. Keys are relative paths;
 * string values are written as-is, anything else as JSON.
 */
export async function writeConfigTree(files: ConfigTree): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "rollcall-test-"));
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, ...relative.split("/"));
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, typeof content === "string" ? content : JSON.stringify(content, null, 2), "utf-8");
  }
  return root;
}

export async function removeTree(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

export async function readJson(root: string, relative: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(path.join(root, ...relative.split("/")), "utf-8"));
}

export const ALICE_ID = "uuid-alice-0001";
export const BOB_ID = "uuid-bob-0002";
export const CAROL_ID = "uuid-carol-0003";

/** An active and an archived season, special roles for Alice, a maintainer */
export function sampleTree(): ConfigTree {
  return {
    "global/roles.json": {
      roles: [
        { name: "Verified", color: "#2ecc71", permissions: ["VIEW_CHANNEL"], is_default_member_role: true },
        { name: "Mentor", hoist: true, mentionable: true },
        { name: "Booster", skip_permission_sync: true, permissions: ["SEND_MESSAGES"] },
      ],
    },
    "global/assignments.json": {
      roles: { Mentor: [ALICE_ID], Organizer: [ALICE_ID, CAROL_ID] },
      maintainers: ["Admin.User"],
    },
    "seasons/2025E/season.json": {
      name: "Spring 2025",
      member_role: "Member 2025E",
      channels: [{ name: "general", permissions: { "@member": "readwrite" } }],
    },
    "seasons/2025E/users.json": [
      { Name: "Alice", DiscordId: ALICE_ID },
      { Name: "Bob", DiscordId: BOB_ID },
    ],
    "seasons/2024F/season.json": { name: "Fall 2024", active: false },
    "seasons/2024F/users.json": [{ Name: "Alice From Fall", DiscordId: ALICE_ID }],
  };
}
