/**
 * OAuthStateStore - single-use `state` values for the OAuth round trip
 *
 * Each state remembers why the login was started (admin session or a
 * verification) and expires after ten minutes.
 */

import { nanoid } from "nanoid";

export const OAUTH_STATE_TTL_MS = 10 * 60 * 1000;

export type OAuthPurpose = "admin" | "verify";

export interface OAuthState {
  purpose: OAuthPurpose;
  /** Claimed verification id for purpose "verify" */
  verificationId?: string;
  createdAt: number;
}

export class OAuthStateStore {
  private readonly states = new Map<string, OAuthState>();

  constructor(private readonly now: () => number = Date.now) {}

  create(purpose: OAuthPurpose, verificationId?: string): string {
    this.purgeExpired();
    const state = nanoid(32);
    this.states.set(state, { purpose, ...(verificationId ? { verificationId } : {}), createdAt: this.now() });
    return state;
  }

  /**
   * Look up and forget a state. Unknown or expired states return undefined.
   */
  consume(state: string): OAuthState | undefined {
    const entry = this.states.get(state);
    if (!entry) return undefined;
    this.states.delete(state);
    return this.now() - entry.createdAt > OAUTH_STATE_TTL_MS ? undefined : entry;
  }

  purgeExpired(): number {
    const cutoff = this.now() - OAUTH_STATE_TTL_MS;
    let removed = 0;
    for (const [state, entry] of this.states) {
      if (entry.createdAt < cutoff) {
        this.states.delete(state);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.states.size;
  }
}
