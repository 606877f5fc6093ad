import { describe, it, expect, vi } from "vitest";
import { DiscordOAuth } from "../../plugins/auth/services/DiscordOAuth.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function client(fetchImpl: typeof fetch): DiscordOAuth {
  return new DiscordOAuth({ clientId: "client-1", clientSecret: "test-secret", redirectUri: "https://verify.example.com/auth/callback", fetchImpl });
}

describe("DiscordOAuth", () => {
  it("builds the authorize URL", () => {
    const url = new URL(client(vi.fn<typeof fetch>()).authorizeUrl("state-1"));

    expect(url.origin + url.pathname).toBe("https://discord.com/oauth2/authorize");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      client_id: "client-1",
      response_type: "code",
      redirect_uri: "https://verify.example.com/auth/callback",
      scope: "identify",
      state: "state-1",
      prompt: "none",
    });
  });

  it("exchanges the code and fetches the user", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ access_token: "access-1", token_type: "Bearer" }))
      .mockResolvedValueOnce(jsonResponse({ id: "100", username: "alice", global_name: "Alice" }));

    expect(await client(fetchImpl).identify("code-1")).toEqual({ id: "100", username: "alice", globalName: "Alice" });

    const [tokenUrl, tokenInit] = fetchImpl.mock.calls[0] ?? [];
    expect(tokenUrl).toBe("https://discord.com/api/oauth2/token");
    expect(tokenInit?.body).toBe("grant_type=authorization_code&code=code-1&redirect_uri=https%3A%2F%2Fverify.example.com%2Fauth%2Fcallback");
    expect(tokenInit?.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
      Authorization: `Basic ${Buffer.from("client-1:test-secret").toString("base64")}`,
    });

    const [userUrl, userInit] = fetchImpl.mock.calls[1] ?? [];
    expect(userUrl).toBe("https://discord.com/api/v10/users/@me");
    expect(userInit?.headers).toEqual({ Authorization: "Bearer access-1" });
  });

  it("maps a missing global name to null", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ access_token: "access-1", token_type: "Bearer" }))
      .mockResolvedValueOnce(jsonResponse({ id: "100", username: "alice" }));

    expect((await client(fetchImpl).identify("code-1")).globalName).toBeNull();
  });

  it("raises a Discord error on a rejected code", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ error: "invalid_grant" }, 400));

    await expect(client(fetchImpl).identify("bad")).rejects.toMatchObject({ code: "DISCORD_API", message: "Discord OAuth request failed (400)" });
  });

  it("raises a Discord error when the network fails", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValueOnce(new Error("offline"));

    await expect(client(fetchImpl).identify("code-1")).rejects.toMatchObject({ code: "DISCORD_API", message: "Failed to reach Discord: offline" });
  });
});
