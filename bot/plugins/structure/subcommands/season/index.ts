/**
 * /season subcommand router
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { StructurePluginAPI } from "../../index.js";
import { handleList } from "./list.js";
import { handleSync } from "./sync.js";

export { autocompleteSeason as autocomplete } from "../../../roster/utils/seasonAutocomplete.js";

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;

  const pluginAPI = getPluginAPI<StructurePluginAPI>("structure");
  if (!pluginAPI) {
    await interaction.reply({ content: "❌ Structure plugin not loaded.", ephemeral: true });
    return;
  }

  switch (interaction.options.getSubcommand()) {
    case "list":
      await handleList(context, pluginAPI);
      break;
    case "sync":
      await handleSync(context, pluginAPI);
      break;
    default:
      await interaction.reply({ content: "❌ Unknown subcommand.", ephemeral: true });
  }
}
