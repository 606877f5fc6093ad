/**
 * ApiManager - Mounts plugin routes and generates OpenAPI docs
 *
 * Handles:
 * - Express server setup (rate limits, CORS, request timing)
 * - Admin auth: X-API-Key or a Bearer session token, on everything under /api
 * - Plugin route mounting: admin routers under /api{prefix}, public routers at {prefix}
 * - OpenAPI/Swagger documentation generation
 * - Health check and buffered log endpoints
 */

import express, { type Application, type Request, type Response, type NextFunction, type RequestHandler, type Router } from "express";
import type { Server } from "http";
import crypto from "crypto";
import cors from "cors";
import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import swaggerJSDoc from "swagger-jsdoc";
import swaggerUi from "swagger-ui-express";
import { z } from "zod";
import log from "../utils/logger";
import { captureException } from "../utils/sentry";
import { validateQuery } from "../utils/validate";
import { logBuffer, type LogBuffer } from "./LogBuffer";
import { httpStatusFor, isRollcallError, ConfigValidationError } from "../../plugins/lib/utils/errors.js";

export interface PluginRouter {
  /** Which plugin owns this router */
  pluginName: string;
  /** Route prefix (e.g., "/staging") */
  prefix: string;
  router: Router;
  /** Paths to swagger JSDoc files for documentation */
  swaggerPaths?: string[];
  /** Mount at {prefix} without admin auth instead of /api{prefix} */
  public?: boolean;
  /** JSON body size limit (default "1mb") */
  bodyLimit?: string;
}

/**
 * Who is calling an admin route
 */
export interface AdminIdentity {
  via: "api-key" | "session";
  /** Discord user id; null for the shared API key */
  userId: string | null;
  username: string;
}

/**
 * Resolves a Bearer token to an admin identity, or null if the token is not a live admin session
 */
export type SessionAuthenticator = (token: string) => AdminIdentity | null;

export interface ApiManagerOptions {
  port: number;
  apiKey: string;
  /** Log source for GET /api/logs (default: the process-wide buffer) */
  logs?: LogBuffer;
}

const identities = new WeakMap<Request, AdminIdentity>();

/**
 * The admin identity attached by the auth middleware, if any
 */
export function getAdminIdentity(req: Request): AdminIdentity | null {
  return identities.get(req) ?? null;
}

const LogsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(200),
});

function hasHttpStatus(err: unknown): err is { status: number; message?: string } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

export class ApiManager {
  private app: Application;
  private routers: PluginRouter[] = [];
  private readonly port: number;
  private readonly apiKey: string;
  private readonly logs: LogBuffer;
  private sessionAuthenticator: SessionAuthenticator | null = null;
  private prepared = false;
  private started = false;
  private server: Server | null = null;

  constructor(options: ApiManagerOptions) {
    this.port = options.port;
    this.apiKey = options.apiKey;
    this.logs = options.logs ?? logBuffer;
    this.app = express();

    this.validateApiKeyStrength(options.apiKey);
    this.setupMiddleware();
  }

  /**
   * Warn about keys that are short, repetitive or guessable
   */
  private validateApiKeyStrength(key: string): void {
    const warnings: string[] = [];

    if (key.length < 32) {
      warnings.push(`INTERNAL_API_KEY is only ${key.length} chars (minimum 32 recommended)`);
    }
    if (new Set(key).size < 8) {
      warnings.push("INTERNAL_API_KEY has very low character diversity");
    }
    if (["password", "secret", "changeme", "1234"].some((t) => key.toLowerCase().includes(t))) {
      warnings.push("INTERNAL_API_KEY contains a trivially guessable pattern");
    }

    if (warnings.length > 0) {
      log.warn("⚠️  Weak INTERNAL_API_KEY detected:");
      for (const w of warnings) {
        log.warn(`   - ${w}`);
      }
    }
  }

  /**
   * Constant-time API key comparison
   */
  private verifyApiKey(key: string): boolean {
    const keyBuf = Buffer.from(key);
    const expectedBuf = Buffer.from(this.apiKey);
    if (keyBuf.length !== expectedBuf.length) return false;
    return crypto.timingSafeEqual(keyBuf, expectedBuf);
  }

  /**
   * Install the resolver for Bearer session tokens (provided by the auth plugin)
   */
  setSessionAuthenticator(authenticator: SessionAuthenticator): void {
    this.sessionAuthenticator = authenticator;
  }

  /**
   * Resolve credentials from either header. Also used by the log stream.
   */
  authenticate(apiKey: string | undefined, bearerToken: string | undefined): AdminIdentity | null {
    if (apiKey && this.verifyApiKey(apiKey)) {
      return { via: "api-key", userId: null, username: "api-key" };
    }
    if (bearerToken && this.sessionAuthenticator) {
      return this.sessionAuthenticator(bearerToken);
    }
    return null;
  }

  private readonly requireAdmin: RequestHandler = (req, res, next) => {
    const authorization = req.header("Authorization");
    const bearer = authorization?.startsWith("Bearer ") ? authorization.slice("Bearer ".length).trim() : undefined;
    const identity = this.authenticate(req.header("X-API-Key"), bearer);

    if (!identity) {
      res.status(401).json({ success: false, error: { code: "UNAUTHORIZED", message: "Admin credentials required" } });
      return;
    }

    identities.set(req, identity);
    next();
  };

  private setupMiddleware(): void {
    // Defaults to 1 (first upstream proxy) for Docker/nginx setups
    const trustProxyRaw = (process.env.TRUST_PROXY ?? "1").trim().toLowerCase();
    const trustProxy: boolean | number | string = trustProxyRaw === "true" ? true : trustProxyRaw === "false" ? false : /^\d+$/.test(trustProxyRaw) ? Number(trustProxyRaw) : trustProxyRaw;
    this.app.set("trust proxy", trustProxy);

    const keyByIp = (req: Request) => ipKeyGenerator(req.ip ?? "unknown");
    const limiter = (max: number, message: string) =>
      rateLimit({
        windowMs: 60_000,
        limit: max,
        standardHeaders: true,
        legacyHeaders: false,
        keyGenerator: keyByIp,
        message: { success: false, error: { code: "RATE_LIMITED", message } },
      });

    this.app.use(limiter(100, "Too many requests, please try again later"));
    this.app.use("/auth", limiter(20, "Too many login attempts, please try again later"));

    const mutationLimiter = limiter(30, "Too many write requests, please try again later");
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (["POST", "PUT", "PATCH", "DELETE"].includes(req.method)) {
        mutationLimiter(req, res, next);
        return;
      }
      next();
    });

    const slowRequestMs = Number(process.env.SLOW_REQUEST_THRESHOLD_MS ?? 500);
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      log.debug(`[API] ${req.method} ${req.path}`);
      res.on("finish", () => {
        const ms = Date.now() - start;
        if (ms >= slowRequestMs) {
          log.warn(`[API] SLOW ${req.method} ${req.path} (${ms}ms, status ${res.statusCode})`);
        }
      });
      next();
    });

    const dashboardUrl = process.env.DASHBOARD_URL || "http://localhost:3000";
    this.app.use(
      cors({
        origin: dashboardUrl,
        methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
        allowedHeaders: ["Origin", "Content-Type", "Accept", "Authorization", "X-API-Key"],
        credentials: true,
      }),
    );
  }

  registerRouter(pluginRouter: PluginRouter): void {
    if (this.prepared) {
      throw new Error(`Cannot register ${pluginRouter.prefix} after the API has been prepared`);
    }
    this.routers.push(pluginRouter);
    log.debug(`Registered API router: ${pluginRouter.prefix} (plugin: ${pluginRouter.pluginName}${pluginRouter.public ? ", public" : ""})`);
  }

  private mountRoutes(): void {
    this.app.get("/", (_req: Request, res: Response) => {
      res.json({ status: "ok" });
    });

    this.app.get("/api/health", (_req: Request, res: Response) => {
      res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    for (const { prefix, router, pluginName, bodyLimit } of this.routers.filter((r) => r.public)) {
      this.app.use(prefix, express.json({ limit: bodyLimit ?? "1mb" }), router);
      log.debug(`Mounted public route: ${prefix} (${pluginName})`);
    }

    this.app.use("/api", this.requireAdmin);

    this.app.get("/api/logs", validateQuery(LogsQuerySchema), (req: Request, res: Response) => {
      const { after, limit } = LogsQuerySchema.parse(req.query);
      res.json({ success: true, data: { entries: this.logs.since(after, limit), latestSeq: this.logs.latestSeq() } });
    });

    for (const { prefix, router, pluginName, bodyLimit } of this.routers.filter((r) => !r.public)) {
      const fullPath = `/api${prefix}`;
      this.app.use(fullPath, express.json({ limit: bodyLimit ?? "1mb" }), router);
      log.debug(`Mounted route: ${fullPath} (${pluginName})`);
    }
  }

  private setupSwagger(): void {
    const swaggerSpec = swaggerJSDoc({
      definition: {
        openapi: "3.1.0",
        info: {
          title: "Rollcall Admin API",
          version: "1.0.0",
          description: "Season roster staging, verification records and guild structure sync",
        },
        servers: [{ url: "/" }],
        components: {
          securitySchemes: {
            ApiKey: { type: "apiKey", in: "header", name: "X-API-Key" },
            Session: { type: "http", scheme: "bearer" },
          },
        },
        security: [{ ApiKey: [] }, { Session: [] }],
      },
      apis: this.routers.flatMap((r) => r.swaggerPaths ?? []),
    });

    this.app.use("/api-docs", this.requireAdmin, swaggerUi.serve, swaggerUi.setup(swaggerSpec));
    this.app.get("/api-docs.json", this.requireAdmin, (_req: Request, res: Response) => {
      res.json(swaggerSpec);
    });

    log.debug("Swagger documentation mounted at /api-docs (auth required)");
  }

  private setupErrorHandling(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ success: false, error: { code: "NOT_FOUND", message: "Not found" } });
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (isRollcallError(err)) {
        const status = httpStatusFor(err);
        if (status >= 500) {
          log.error(`[API] ${req.method} ${req.path} failed:`, err);
          captureException(err, { context: "API", path: req.path });
        }
        res.status(status).json({
          success: false,
          error: {
            code: err.code,
            message: err.message,
            ...(err instanceof ConfigValidationError ? { details: err.issues } : {}),
          },
        });
        return;
      }

      // body-parser rejections (malformed JSON, oversized payloads)
      if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ success: false, error: { code: "BAD_REQUEST", message: err.message ?? "Bad request" } });
        return;
      }

      log.error("[API] Unhandled error:", err);
      captureException(err, { context: "API", path: req.path });
      res.status(500).json({ success: false, error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
    });
  }

  /**
   * Mount everything registered so far. Idempotent; start() calls it.
   */
  prepare(): Application {
    if (!this.prepared) {
      this.mountRoutes();
      this.setupSwagger();
      this.setupErrorHandling();
      this.prepared = true;
    }
    return this.app;
  }

  async start(): Promise<void> {
    if (this.started) {
      log.warn("API server already started");
      return;
    }

    this.prepare();

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.started = true;
        log.info(`✅ API server running on port ${this.port}`);
        resolve();
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  getApp(): Application {
    return this.app;
  }

  isStarted(): boolean {
    return this.started;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.server = null;
    this.started = false;
    log.debug("API server stopped");
  }

  getStats(): { routers: number; byPlugin: Record<string, string[]> } {
    const byPlugin: Record<string, string[]> = {};
    for (const router of this.routers) {
      (byPlugin[router.pluginName] ??= []).push(router.prefix);
    }
    return { routers: this.routers.length, byPlugin };
  }
}
