/**
 * /roles command - role and special-role sync
 */

import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";

export const data = new SlashCommandBuilder()
  .setName("roles")
  .setDescription("Keep server roles in line with the configuration")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .addSubcommand((sub) => sub.setName("sync").setDescription("Create or update every configured role"))
  .addSubcommand((sub) => sub.setName("assignments").setDescription("Give verified members their special roles"));

export const config = {
  adminOnly: true,
};

export { execute } from "../subcommands/roles/index.js";
