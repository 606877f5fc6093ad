import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as path from "path";
import request from "supertest";
import type { Application } from "express";
import { ApiManager } from "../../src/core/ApiManager";
import { LogBuffer } from "../../src/core/LogBuffer";
import { ConfigStore } from "../../plugins/roster/services/ConfigStore.js";
import { StagingArea } from "../../plugins/roster/services/StagingArea.js";
import { ConfigFileService } from "../../plugins/roster/services/ConfigFileService.js";
import { createConfigRouter, createStagingRouter } from "../../plugins/roster/api/index.js";
import type { RosterPluginAPI } from "../../plugins/roster/index.js";
import type { LibAPI } from "../../plugins/lib/index.js";
import { UserDatabase } from "../../plugins/verification/services/UserDatabase.js";
import { VerificationEngine } from "../../plugins/verification/services/VerificationEngine.js";
import { createUsersRouter } from "../../plugins/verification/api/index.js";
import { ALICE_ID, CAROL_ID, removeTree, sampleTree, writeConfigTree } from "../helpers/configTree.js";

const API_KEY = "test-secret";
const DISCORD_A = "100000000000000001";

let root: string;
let staging: StagingArea;
let engine: VerificationEngine;
let logs: LogBuffer;
let apiManager: ApiManager;
let app: Application;

beforeEach(async () => {
  root = await writeConfigTree(sampleTree());
  const configStore = new ConfigStore(root);
  await configStore.loadAll();
  staging = new StagingArea({ store: configStore, timeoutSeconds: 120 });

  const database = new UserDatabase();
  engine = new VerificationEngine({ database, configStore, databasePath: path.join(root, "state", "user_database.json") });

  const roster = {
    version: "1.0.0",
    configStore,
    stagingArea: staging,
    configFiles: new ConfigFileService(configStore),
    lib: {} as unknown as LibAPI,
  } satisfies RosterPluginAPI;

  logs = new LogBuffer();
  apiManager = new ApiManager({ port: 0, apiKey: API_KEY, logs });
  apiManager.registerRouter({ pluginName: "roster", prefix: "/staging", router: createStagingRouter(roster) });
  apiManager.registerRouter({ pluginName: "roster", prefix: "/config", router: createConfigRouter(roster) });
  apiManager.registerRouter({ pluginName: "verification", prefix: "/users", router: createUsersRouter({ engine, database }) });
  app = apiManager.prepare();
});

afterEach(async () => {
  staging.dispose();
  await removeTree(root);
});

describe("ApiManager auth", () => {
  it("serves the health check without credentials", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
  });

  it("rejects admin routes without credentials", async () => {
    const res = await request(app).get("/api/users");

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ success: false, error: { code: "UNAUTHORIZED", message: "Admin credentials required" } });
  });

  it("rejects a wrong API key", async () => {
    const res = await request(app).get("/api/users").set("X-API-Key", "wrong-key");

    expect(res.status).toBe(401);
  });

  it("accepts a Bearer token the session authenticator knows", async () => {
    apiManager.setSessionAuthenticator((token) => (token === "session-1" ? { via: "session", userId: "200", username: "admin" } : null));

    const ok = await request(app).get("/api/users").set("Authorization", "Bearer session-1");
    const denied = await request(app).get("/api/users").set("Authorization", "Bearer session-2");

    expect(ok.status).toBe(200);
    expect(denied.status).toBe(401);
  });

  it("resolves identities for the log stream", () => {
    expect(apiManager.authenticate(API_KEY, undefined)).toEqual({ via: "api-key", userId: null, username: "api-key" });
    expect(apiManager.authenticate(undefined, "anything")).toBeNull();
  });

  it("refuses routers registered after prepare", () => {
    expect(() => apiManager.registerRouter({ pluginName: "late", prefix: "/late", router: createUsersRouter({ engine, database: new UserDatabase() }) })).toThrow(
      "Cannot register /late after the API has been prepared",
    );
  });

  it("answers unknown routes with a JSON 404", async () => {
    const res = await request(app).get("/api/nope").set("X-API-Key", API_KEY);

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });
});

describe("users routes", () => {
  it("lists verified users", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);

    const res = await request(app).get("/api/users").set("X-API-Key", API_KEY);

    expect(res.status).toBe(200);
    expect(res.body.data.count).toBe(1);
    expect(res.body.data.users[0].discordId).toBe(DISCORD_A);
  });

  it("returns 404 for untracked users", async () => {
    const res = await request(app).get("/api/users/999").set("X-API-Key", API_KEY);

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "USER_NOT_FOUND", message: "No tracked user 999" });
  });

  it("revokes a user and saves the database", async () => {
    await engine.attemptVerification(DISCORD_A, ALICE_ID);

    const res = await request(app).post(`/api/users/${DISCORD_A}/revoke`).set("X-API-Key", API_KEY).send({});

    expect(res.status).toBe(200);
    expect(res.body.data.saved).toBe(true);
    expect(res.body.data.user.status).toBe("revoked");
    expect(res.body.data.user.notes).toBe("Revoked by api-key");
  });

  it("validates the revoke body", async () => {
    const res = await request(app)
      .post(`/api/users/${DISCORD_A}/revoke`)
      .set("X-API-Key", API_KEY)
      .send({ reason: 42 });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.details[0].path).toBe("reason");
  });
});

describe("staging routes", () => {
  it("returns 409 when committing with nothing staged", async () => {
    const res = await request(app).post("/api/staging/commit").set("X-API-Key", API_KEY);

    expect(res.status).toBe(409);
    expect(res.body.error).toEqual({ code: "NO_STAGED_CONFIG", message: "No staged configuration to commit" });
  });

  it("stages a roster and reports the diff", async () => {
    const res = await request(app)
      .post("/api/staging/seasons/2025F")
      .set("X-API-Key", API_KEY)
      .send([{ Name: "Carol", DiscordId: CAROL_ID }]);

    expect(res.status).toBe(200);
    expect(res.body.data.hasStaged).toBe(true);
    expect(res.body.data.summary).toBe("Seasons: 2025F");
    expect(res.body.data.stagedBy).toBe("api-key");
    expect(res.body.data.diff.additions).toEqual([{ changeType: "add", entityType: "season", entityName: "2025F", details: "1 users" }]);
  });

  it("maps an invalid roster to 400", async () => {
    const res = await request(app).post("/api/staging/seasons/2025F").set("X-API-Key", API_KEY).send({ users: "nope" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("CONFIG_VALIDATION");
    expect(staging.hasStaged()).toBe(false);
  });

  it("discards staged config", async () => {
    staging.stageSeasonUsers("2025F", JSON.stringify([{ Name: "Carol", DiscordId: CAROL_ID }]));

    const res = await request(app).delete("/api/staging").set("X-API-Key", API_KEY);

    expect(res.body.data).toEqual({ discarded: true });
    expect(staging.hasStaged()).toBe(false);
  });
});

describe("GET /api/logs", () => {
  it("pages through buffered entries", async () => {
    logs.push("INFO", "core", "one");
    logs.push("WARN", "roster", "two");

    const res = await request(app).get("/api/logs?after=1").set("X-API-Key", API_KEY);

    expect(res.status).toBe(200);
    expect(res.body.data.latestSeq).toBe(2);
    expect(res.body.data.entries.map((entry: { message: string }) => entry.message)).toEqual(["two"]);
  });
});
