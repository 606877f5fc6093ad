/**
 * SessionService - in-memory admin sessions behind Bearer tokens
 *
 * Sessions do not survive a restart; admins log in again.
 */

import { nanoid } from "nanoid";
import type { AdminIdentity } from "../../../src/core/ApiManager.js";
import { createLogger } from "../../../src/core/Logger.js";

const log = createLogger("auth:sessions");

const SESSION_TOKEN_LENGTH = 32;

export interface AdminSession {
  token: string;
  userId: string;
  username: string;
  createdAt: string;
  expiresAt: string;
}

export class SessionService {
  private readonly sessions = new Map<string, AdminSession>();
  private readonly ttlMs: number;

  constructor(
    ttlHours: number,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = ttlHours * 60 * 60 * 1000;
  }

  create(userId: string, username: string): AdminSession {
    const createdAt = this.now();
    const session: AdminSession = {
      token: nanoid(SESSION_TOKEN_LENGTH),
      userId,
      username,
      createdAt: new Date(createdAt).toISOString(),
      expiresAt: new Date(createdAt + this.ttlMs).toISOString(),
    };
    this.sessions.set(session.token, session);
    log.info(`Admin session started for ${username} (${userId})`);
    return session;
  }

  get(token: string): AdminSession | undefined {
    const session = this.sessions.get(token);
    if (!session) return undefined;
    if (Date.parse(session.expiresAt) <= this.now()) {
      this.sessions.delete(token);
      return undefined;
    }
    return session;
  }

  /**
   * SessionAuthenticator for the ApiManager and the log stream
   */
  authenticate(token: string): AdminIdentity | null {
    const session = this.get(token);
    return session ? { via: "session", userId: session.userId, username: session.username } : null;
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (Date.parse(session.expiresAt) <= now) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
