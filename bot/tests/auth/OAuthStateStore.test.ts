import { describe, it, expect } from "vitest";
import { OAUTH_STATE_TTL_MS, OAuthStateStore } from "../../plugins/auth/services/OAuthStateStore.js";

describe("OAuthStateStore", () => {
  it("hands out a state once", () => {
    const store = new OAuthStateStore(() => 1_000);
    const state = store.create("verify", "uuid-alice");

    expect(state).toHaveLength(32);
    expect(store.consume(state)).toEqual({ purpose: "verify", verificationId: "uuid-alice", createdAt: 1_000 });
    expect(store.consume(state)).toBeUndefined();
  });

  it("leaves verificationId out for admin logins", () => {
    const store = new OAuthStateStore(() => 0);
    expect(store.consume(store.create("admin"))).toEqual({ purpose: "admin", createdAt: 0 });
  });

  it("expires states after ten minutes", () => {
    let now = 0;
    const store = new OAuthStateStore(() => now);
    const fresh = store.create("admin");
    const stale = store.create("admin");

    now = OAUTH_STATE_TTL_MS;
    expect(store.consume(fresh)).toEqual({ purpose: "admin", createdAt: 0 });

    now = OAUTH_STATE_TTL_MS + 1;
    expect(store.consume(stale)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("purges expired states", () => {
    let now = 0;
    const store = new OAuthStateStore(() => now);
    store.create("admin");
    now = OAUTH_STATE_TTL_MS / 2;
    store.create("verify", "uuid-bob");
    now = OAUTH_STATE_TTL_MS + 1;

    expect(store.purgeExpired()).toBe(1);
    expect(store.size).toBe(1);
  });
});
