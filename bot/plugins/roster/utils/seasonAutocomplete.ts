/**
 * Autocomplete for any "season" option: loaded season ids matching the typed prefix
 */

import type { AutocompleteContext } from "../../../src/core/CommandManager.js";
import type { RosterPluginAPI } from "../index.js";

export async function autocompleteSeason(context: AutocompleteContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const focused = interaction.options.getFocused(true);
  const roster = getPluginAPI<RosterPluginAPI>("roster");

  if (focused.name !== "season" || !roster) {
    await interaction.respond([]);
    return;
  }

  const query = focused.value.toLowerCase();
  const choices = roster.configStore
    .getAllSeasons()
    .filter((season) => season.seasonId.toLowerCase().startsWith(query) || season.displayName.toLowerCase().includes(query))
    .slice(0, 25)
    .map((season) => ({
      name: season.displayName === season.seasonId ? season.seasonId : `${season.seasonId} (${season.displayName})`,
      value: season.seasonId,
    }));

  await interaction.respond(choices);
}
