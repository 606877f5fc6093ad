/**
 * /config command - Stage, inspect, commit and reload roster configuration
 */

import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";

export const data = new SlashCommandBuilder()
  .setName("config")
  .setDescription("Manage season rosters and special-member assignments")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sub) => sub.setName("status").setDescription("Show loaded seasons and what is staged"))
  .addSubcommand((sub) => sub.setName("diff").setDescription("Compare staged configuration with the loaded one"))
  .addSubcommand((sub) => sub.setName("commit").setDescription("Write staged configuration to disk"))
  .addSubcommand((sub) => sub.setName("cancel").setDescription("Discard staged configuration"))
  .addSubcommand((sub) => sub.setName("reload").setDescription("Reload all configuration from disk"))
  .addSubcommand((sub) =>
    sub
      .setName("upload")
      .setDescription("Stage a users.json or assignments.json file")
      .addAttachmentOption((opt) => opt.setName("file").setDescription("JSON file to stage").setRequired(true))
      .addStringOption((opt) =>
        opt
          .setName("type")
          .setDescription("What the file contains")
          .setRequired(true)
          .addChoices({ name: "Season roster (users.json)", value: "season" }, { name: "Special members (assignments.json)", value: "assignments" }),
      )
      .addStringOption((opt) => opt.setName("season").setDescription("Season id for a roster, e.g. 2025E").setMaxLength(64).setAutocomplete(true)),
  );

export const config = {
  adminOnly: true,
};

// Execution handled by subcommands/config/index.ts
export { execute, autocomplete } from "../subcommands/config/index.js";
