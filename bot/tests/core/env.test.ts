import { describe, it, expect } from "vitest";
import { EnvLoader } from "../../src/utils/env";

const valid = {
  BOT_TOKEN: "test.bot.token",
  GUILD_ID: "123456789012345678",
  OWNER_IDS: "223456789012345678",
  INTERNAL_API_KEY: "test-secret",
};

describe("EnvLoader", () => {
  it("applies defaults and trims list and URL values", () => {
    const env = new EnvLoader().readEnv({
      ...valid,
      OWNER_IDS: " 223456789012345678, 323456789012345678 ,,",
      WEB_BASE_URL: " https://verify.example.com// ",
    });

    expect(env.OWNER_IDS).toEqual(["223456789012345678", "323456789012345678"]);
    expect(env.WEB_BASE_URL).toBe("https://verify.example.com");
    expect(env.DATA_DIR).toBe("data");
    expect(env.STATE_DIR).toBe("state");
    expect(env.API_PORT).toBe(3001);
    expect(env.WS_PORT).toBe(3002);
    expect(env.STAGING_TIMEOUT_SECONDS).toBe(120);
    expect(env.SESSION_TTL_HOURS).toBe(12);
    expect(env.SENTRY_ENABLED).toBe(true);
  });

  it("accepts a complete environment", () => {
    const loader = new EnvLoader();
    expect(loader.validate(loader.readEnv(valid))).toEqual([]);
  });

  it("reports missing required variables before anything else", () => {
    const loader = new EnvLoader();
    const problems = loader.validate(loader.readEnv({ ...valid, BOT_TOKEN: "", GUILD_ID: "not-a-snowflake" }));
    expect(problems).toEqual(["BOT_TOKEN is missing"]);
  });

  it("reports malformed values one per variable", () => {
    const loader = new EnvLoader();
    const problems = loader.validate(loader.readEnv({ ...valid, GUILD_ID: "abc", API_PORT: "70000", WEB_BASE_URL: "ftp://example.com" }));
    expect(problems).toEqual([
      "GUILD_ID not a valid Discord snowflake: abc",
      "API_PORT must be a port number. Got: 70000",
      "WEB_BASE_URL must use http: or https:. Got: ftp:",
    ]);
  });
});
