import type { VerificationOutcome } from "../services/VerificationFlow.js";
import { RETRY_HINT, successMessage } from "./messages.js";

/**
 * Reply text for a verification attempt. DM replies get a retry hint on NOT_FOUND.
 */
export function outcomeMessage(outcome: VerificationOutcome, options: { dm?: boolean } = {}): string {
  const { result } = outcome;
  if (!result.success) {
    return options.dm && result.error.code === "NOT_FOUND" ? `❌ ${result.error.message}\n\n${RETRY_HINT}` : `❌ ${result.error.message}`;
  }

  const lines = [successMessage(result.displayName, result.seasonName, result.rolesToAssign)];
  if (outcome.applyError) {
    lines.push(`\n⚠️ Your verification was recorded but I could not update your server profile. Please contact an administrator.`);
  } else if (outcome.roles && outcome.roles.missing.length > 0) {
    lines.push(`\n⚠️ Some roles do not exist yet: ${outcome.roles.missing.join(", ")}`);
  }
  return lines.join("\n");
}

/**
 * HTTP status and JSON body for a verification attempt made through the web
 */
export function outcomeResponse(outcome: VerificationOutcome): { status: number; body: unknown } {
  const { result } = outcome;
  if (!result.success) {
    return {
      status: result.error.code === "NOT_FOUND" ? 404 : 409,
      body: { success: false, error: result.error },
    };
  }

  return {
    status: 200,
    body: {
      success: true,
      data: {
        discordId: result.discordId,
        displayName: result.displayName,
        seasonId: result.seasonId,
        seasons: result.seasons,
        rolesToAssign: result.rolesToAssign,
        appliedRoles: outcome.roles?.applied ?? [],
        missingRoles: outcome.roles?.missing ?? [],
        applyError: outcome.applyError ?? null,
        saved: outcome.saved,
      },
    },
  };
}
