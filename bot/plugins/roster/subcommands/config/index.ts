/**
 * /config subcommand router
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import type { RosterPluginAPI } from "../../index.js";
import { handleStatus, handleDiff } from "./status.js";
import { handleCommit, handleCancel } from "./commit.js";
import { handleReload } from "./reload.js";
import { handleUpload } from "./upload.js";

export { autocompleteSeason as autocomplete } from "../../utils/seasonAutocomplete.js";

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const subcommand = interaction.options.getSubcommand();

  const pluginAPI = getPluginAPI<RosterPluginAPI>("roster");
  if (!pluginAPI) {
    await interaction.reply({ content: "❌ Roster plugin not loaded.", ephemeral: true });
    return;
  }

  switch (subcommand) {
    case "status":
      await handleStatus(context, pluginAPI);
      break;
    case "diff":
      await handleDiff(context, pluginAPI);
      break;
    case "commit":
      await handleCommit(context, pluginAPI);
      break;
    case "cancel":
      await handleCancel(context, pluginAPI);
      break;
    case "reload":
      await handleReload(context, pluginAPI);
      break;
    case "upload":
      await handleUpload(context, pluginAPI);
      break;
    default:
      await interaction.reply({ content: "❌ Unknown subcommand.", ephemeral: true });
  }
}
