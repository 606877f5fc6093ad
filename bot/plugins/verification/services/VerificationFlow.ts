/**
 * VerificationFlow - what every front end does with a claimed id:
 * verify, apply nickname and roles in the managed guild, persist.
 */

import type { Guild } from "discord.js";
import { createLogger } from "../../../src/core/Logger.js";
import { describeError } from "../../lib/utils/errors.js";
import type { RoleApplier, RoleApplyResult } from "./RoleApplier.js";
import type { VerificationEngine, VerificationResult } from "./VerificationEngine.js";

const log = createLogger("verification:flow");

export interface VerificationOutcome {
  result: VerificationResult;
  /** Set when roles were applied */
  roles?: RoleApplyResult;
  /** Set when the verification succeeded but Discord refused the changes */
  applyError?: string;
  saved: boolean;
}

export interface VerificationFlowOptions {
  engine: VerificationEngine;
  roleApplier: Pick<RoleApplier, "apply">;
  /** The managed guild, or null when the bot cannot see it */
  getGuild: () => Promise<Guild | null>;
}

export class VerificationFlow {
  constructor(private readonly options: VerificationFlowOptions) {}

  async verify(discordId: string, claimedId: string): Promise<VerificationOutcome> {
    const { engine } = this.options;
    const result = await engine.attemptVerification(discordId, claimedId);
    if (!result.success) {
      return { result, saved: false };
    }

    let roles: RoleApplyResult | undefined;
    let applyError: string | undefined;
    const guild = await this.options.getGuild();
    if (!guild) {
      applyError = "The server could not be reached";
    } else {
      try {
        roles = await this.options.roleApplier.apply(guild, discordId, result.displayName, result.rolesToAssign);
        await engine.recordAppliedRoles(discordId, roles.applied);
      } catch (error) {
        applyError = describeError(error);
        log.error(`Verified ${discordId} but could not update Discord: ${applyError}`);
      }
    }

    const saved = await engine.saveDatabase();
    return { result, ...(roles ? { roles } : {}), ...(applyError ? { applyError } : {}), saved };
  }

  /**
   * Re-apply nickname and roles to a verified account that rejoined.
   * Returns null when the account is not verified.
   */
  async restore(guild: Guild, discordId: string): Promise<RoleApplyResult | null> {
    const { engine } = this.options;
    const user = engine.getVerifiedUser(discordId);
    const roleNames = await engine.rolesFor(discordId);
    if (!user || !roleNames) return null;

    const roles = await this.options.roleApplier.apply(guild, discordId, user.displayName, roleNames);
    await engine.recordAppliedRoles(discordId, roles.applied);
    await engine.saveDatabase();
    log.info(`Restored ${roles.applied.length} role(s) for returning member ${discordId}`);
    return roles;
  }
}
