/**
 * /verification command - Inspect and revoke verifications
 */

import { SlashCommandBuilder, PermissionFlagsBits } from "discord.js";

export const data = new SlashCommandBuilder()
  .setName("verification")
  .setDescription("Look up or revoke member verifications")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sub) =>
    sub
      .setName("lookup")
      .setDescription("Show the verification record of a member or roster id")
      .addUserOption((opt) => opt.setName("user").setDescription("Member to look up"))
      .addStringOption((opt) => opt.setName("id").setDescription("Verification id to look up").setMaxLength(128)),
  )
  .addSubcommand((sub) =>
    sub
      .setName("revoke")
      .setDescription("Revoke a member's verification (their ids stay bound)")
      .addUserOption((opt) => opt.setName("user").setDescription("Member to revoke").setRequired(true))
      .addStringOption((opt) => opt.setName("reason").setDescription("Stored in the record's notes").setMaxLength(500)),
  );

export const config = {
  adminOnly: true,
};

// Execution handled by subcommands/verification/index.ts
export { execute } from "../subcommands/verification/index.js";
