/**
 * /season command - list loaded seasons and build their channels
 */

import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";

export const data = new SlashCommandBuilder()
  .setName("season")
  .setDescription("Inspect seasons and set up their channels")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sub) => sub.setName("list").setDescription("List loaded seasons"))
  .addSubcommand((sub) =>
    sub
      .setName("sync")
      .setDescription("Create or update a season's category and channels")
      .addStringOption((opt) => opt.setName("season").setDescription("Season id, e.g. 2025E").setRequired(true).setMaxLength(64).setAutocomplete(true)),
  );

export const config = {
  adminOnly: true,
};

export { execute, autocomplete } from "../subcommands/season/index.js";
