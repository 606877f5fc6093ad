/**
 * Embeds for sync summaries
 */

import type { LibAPI } from "../../lib/index.js";
import type { RollcallEmbedBuilder } from "../../lib/utils/components/RollcallEmbedBuilder.js";
import type { AssignmentSyncSummary, RoleSyncSummary, SeasonSyncSummary } from "../services/GuildStructureService.js";

const FIELD_LIMIT = 1024;

function listField(items: readonly string[], format: (item: string) => string = (item) => item): string {
  return items.map((item) => `• ${format(item)}`).join("\n").slice(0, FIELD_LIMIT);
}

function addList(embed: RollcallEmbedBuilder, title: string, items: readonly string[], format?: (item: string) => string): void {
  if (items.length > 0) {
    embed.addFields({ name: `${title} (${items.length})`, value: listField(items, format) });
  }
}

export function buildRoleSyncEmbed(lib: LibAPI, summary: RoleSyncSummary): RollcallEmbedBuilder {
  const embed = lib.createEmbedBuilder().setTitle("🎭 Role sync");
  if (summary.created.length === 0 && summary.updated.length === 0 && summary.errors.length === 0) {
    embed.setDescription("All roles are already in sync with the configuration.");
  }
  addList(embed, "Created", summary.created, (name) => `@${name}`);
  addList(embed, "Updated", summary.updated, (name) => `@${name}`);
  addList(embed, "Errors", summary.errors);
  addList(embed, "Warnings", summary.warnings);
  if (summary.unchanged.length > 0) {
    embed.setFooter({ text: `${summary.unchanged.length} role(s) unchanged` });
  }
  return embed;
}

export function buildSeasonSyncEmbed(lib: LibAPI, summary: SeasonSyncSummary): RollcallEmbedBuilder {
  const embed = lib
    .createEmbedBuilder()
    .setTitle(`📁 Season ${summary.seasonId} sync`)
    .setDescription(`Category ${summary.category}, ${summary.unchanged.length} channel(s) unchanged`);
  addList(embed, "Created", summary.created, (name) => `#${name}`);
  addList(embed, "Updated", summary.updated, (name) => `#${name}`);
  addList(embed, "Errors", summary.errors);
  addList(embed, "Warnings", summary.warnings);
  return embed;
}

export function buildAssignmentSyncEmbed(lib: LibAPI, summary: AssignmentSyncSummary): RollcallEmbedBuilder {
  const embed = lib
    .createEmbedBuilder()
    .setTitle("⭐ Special role sync")
    .setDescription(`${summary.updated.length} member(s) updated, ${summary.unchanged} already up to date`);
  addList(embed, "Updated", summary.updated, (id) => `<@${id}>`);
  addList(embed, "Missing roles", summary.missingRoles);
  addList(embed, "Not in server", summary.notInGuild, (id) => `<@${id}>`);
  if (summary.unmatched.length > 0) {
    embed.addFields({ name: "Not yet verified", value: `${summary.unmatched.length} assigned id(s) are not bound to an account` });
  }
  addList(embed, "Errors", summary.errors);
  return embed;
}
