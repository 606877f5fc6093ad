import { PermissionFlagsBits } from "discord.js";
import type { PermissionSet } from "./types.js";

/**
 * Presets used for any level name that permissions.json does not define
 */
export const DEFAULT_PERMISSION_DEFINITIONS: Readonly<Record<string, PermissionSet>> = {
  none: { allow: [], deny: ["VIEW_CHANNEL", "CONNECT"] },
  read: { allow: ["VIEW_CHANNEL", "READ_MESSAGE_HISTORY"], deny: ["SEND_MESSAGES"] },
  readwrite: {
    allow: ["VIEW_CHANNEL", "READ_MESSAGE_HISTORY", "SEND_MESSAGES", "ATTACH_FILES", "ADD_REACTIONS"],
    deny: [],
  },
  admin: {
    allow: ["VIEW_CHANNEL", "READ_MESSAGE_HISTORY", "SEND_MESSAGES", "MANAGE_MESSAGES", "MANAGE_CHANNELS"],
    deny: [],
  },
};

// "SENDTTSMESSAGES" → "SendTTSMessages", so both VIEW_CHANNEL and ViewChannel resolve
const flagsByNormalizedName = new Map<string, { key: string; bit: bigint }>(
  Object.entries(PermissionFlagsBits).map(([key, bit]) => [key.toUpperCase(), { key, bit }]),
);

function normalize(name: string): string {
  return name.trim().replace(/_/g, "").toUpperCase();
}

/**
 * discord.js flag key for a permission name, e.g. VIEW_CHANNEL → ViewChannel
 */
export function toPermissionFlagName(name: string): string | undefined {
  return flagsByNormalizedName.get(normalize(name))?.key;
}

export function resolvePermissionFlag(name: string): bigint | undefined {
  return flagsByNormalizedName.get(normalize(name))?.bit;
}

/**
 * OR together every known flag; unknown names are returned separately
 */
export function resolvePermissionBits(names: readonly string[]): { bits: bigint; unknown: string[] } {
  let bits = 0n;
  const unknown: string[] = [];
  for (const name of names) {
    const bit = resolvePermissionFlag(name);
    if (bit === undefined) {
      unknown.push(name);
    } else {
      bits |= bit;
    }
  }
  return { bits, unknown };
}
