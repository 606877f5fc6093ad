/**
 * User-facing verification texts
 */

export function verificationPrompt(name: string): string {
  return (
    `👋 **Hello, ${name}!**\n\n` +
    `🔐 **Identity Verification Required**\n\n` +
    `To gain full access to the server, you need to verify your identity.\n` +
    `Please provide your user ID by replying to this message.\n\n` +
    `**Simply reply with your user ID.**\n\n` +
    `Example: \`123e4567-e89b-12d3-a456-426614174000\`\n\n` +
    `If you don't know your user ID or need help, please contact an administrator in the server.`
  );
}

export function successMessage(displayName: string, seasonName: string, roles: string[]): string {
  return (
    `✅ **Verification Successful!**\n\n` +
    `Welcome, **${displayName}**!\n\n` +
    `Your identity has been verified for **${seasonName}** and I'm now updating your server access:\n` +
    `• Setting your nickname to: **${displayName}**\n` +
    `• Assigning roles: ${roles.map((r) => `**${r}**`).join(", ")}\n\n` +
    `If you encounter any issues, please contact an administrator.`
  );
}

export function notFoundMessage(verificationId: string): string {
  return `Could not find ID '${verificationId}' in our records. Please check your ID and try again.`;
}

export const ID_ALREADY_USED_MESSAGE = "This ID has already been used to verify another account.";

export function alreadyVerifiedMessage(seasonId: string): string {
  return `You are already verified for season ${seasonId}!`;
}

export const VERIFICATION_REVOKED_MESSAGE = "Your verification was revoked by an administrator. Please contact them to restore access.";

export const VERIFICATION_PENDING_MESSAGE = "A verification is already in progress. Check your DMs and reply with your user ID.";

export const RETRY_HINT = "**Simply reply with your correct user ID to try again.**";
