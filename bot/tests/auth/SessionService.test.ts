import { describe, it, expect } from "vitest";
import { SessionService } from "../../plugins/auth/services/SessionService.js";
import { AdminAccess } from "../../plugins/auth/services/AdminAccess.js";

const HOUR = 60 * 60 * 1000;

describe("SessionService", () => {
  it("creates sessions that authenticate until they expire", () => {
    let now = Date.parse("2025-03-01T00:00:00.000Z");
    const sessions = new SessionService(12, () => now);
    const session = sessions.create("100", "admin");

    expect(session.createdAt).toBe("2025-03-01T00:00:00.000Z");
    expect(session.expiresAt).toBe("2025-03-01T12:00:00.000Z");
    expect(sessions.authenticate(session.token)).toEqual({ via: "session", userId: "100", username: "admin" });

    now += 12 * HOUR;
    expect(sessions.authenticate(session.token)).toBeNull();
    expect(sessions.size).toBe(0);
  });

  it("revokes a session", () => {
    const sessions = new SessionService(1);
    const { token } = sessions.create("100", "admin");

    expect(sessions.revoke(token)).toBe(true);
    expect(sessions.get(token)).toBeUndefined();
    expect(sessions.revoke(token)).toBe(false);
  });

  it("purges only expired sessions", () => {
    let now = 0;
    const sessions = new SessionService(1, () => now);
    sessions.create("100", "first");
    now = HOUR / 2;
    sessions.create("200", "second");
    now = HOUR;

    expect(sessions.purgeExpired()).toBe(1);
    expect(sessions.size).toBe(1);
  });
});

describe("AdminAccess", () => {
  const access = new AdminAccess({
    ownerIds: ["1"],
    configStore: { isMaintainer: (userId, username) => userId === "2" || username === "maint" },
    isGuildAdministrator: async (userId) => userId === "3",
  });

  it("names the reason a user is an admin", async () => {
    expect(await access.check("1")).toBe("owner");
    expect(await access.check("2")).toBe("maintainer");
    expect(await access.check("9", "maint")).toBe("maintainer");
    expect(await access.check("3")).toBe("administrator");
    expect(await access.check("4")).toBeNull();
    expect(await access.isAdmin("4")).toBe(false);
  });
});
