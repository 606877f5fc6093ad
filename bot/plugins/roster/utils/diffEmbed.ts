import type { EmbedBuilder } from "discord.js";
import type { LibAPI } from "../../lib/index.js";
import type { CommitResult, ConfigChange, ConfigDiff } from "../models/types.js";

const FIELD_LIMIT = 1024;

function formatChanges(changes: ConfigChange[]): string {
  const text = changes.map((c) => `• **${c.entityName}** — ${c.details}`).join("\n");
  return text.length > FIELD_LIMIT ? `${text.slice(0, FIELD_LIMIT - 1)}…` : text;
}

export function isEmptyDiff(diff: ConfigDiff): boolean {
  return diff.additions.length + diff.modifications.length + diff.deletions.length === 0;
}

export function buildDiffEmbed(lib: LibAPI, diff: ConfigDiff, summary: string): EmbedBuilder {
  const embed = lib.createEmbedBuilder().setTitle("📋 Staged configuration").setDescription(summary);

  if (diff.additions.length > 0) {
    embed.addFields({ name: "➕ Additions", value: formatChanges(diff.additions) });
  }
  if (diff.modifications.length > 0) {
    embed.addFields({ name: "✏️ Modifications", value: formatChanges(diff.modifications) });
  }
  if (diff.deletions.length > 0) {
    embed.addFields({ name: "➖ Deletions", value: formatChanges(diff.deletions) });
  }
  return embed;
}

export function buildCommitEmbed(lib: LibAPI, result: CommitResult): EmbedBuilder {
  const { RollcallEmbedBuilder } = lib.builders;
  const embed =
    result.failures.length === 0
      ? RollcallEmbedBuilder.success(`Committed ${result.changes.length} change(s)`)
      : RollcallEmbedBuilder.warning(`Committed ${result.changes.length} change(s), ${result.failures.length} failed and remain staged`);

  if (result.changes.length > 0) {
    embed.addFields({ name: "Applied", value: formatChanges(result.changes) });
  }
  if (result.failures.length > 0) {
    embed.addFields({
      name: "Failed",
      value: result.failures.map((f) => `• **${f.entityName}** — ${f.error}`).join("\n").slice(0, FIELD_LIMIT),
    });
  }
  return embed;
}
