import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import crypto from "crypto";
import { isUserState, type Subscriber } from "@shared/schema";
import { api, errorSchemas, type SubscriberSummary } from "@shared/routes";
import type { BackupResult } from "./backup";
import { AppError } from "./errors";
import { describeError, logJson, type Logger } from "./logger";
import type { CycleReport } from "./pipeline";
import type { IStorage } from "./storage";

const SERVICE_NAME = "xui-usage-bot";

export type RouteDeps = {
  storage: Pick<IStorage, "listSubscribers" | "getSubscriber">;
  adminApiToken: string | null;
  checkDatabase: () => Promise<void>;
  runPoll: () => Promise<CycleReport>;
  createBackup?: ((createdBy: string) => Promise<BackupResult>) | null;
  webhook?: { path: string; handler: RequestHandler } | null;
  version?: string;
  logger?: Logger;
};

export function toSubscriberSummary(row: Subscriber): SubscriberSummary {
  return {
    id: row.id,
    clientId: row.clientId,
    telegramId: row.telegramId,
    state: isUserState(row.lastState) ? row.lastState : null,
    usedBytes: row.lastObservedBytes,
    dataCapBytes: row.dataCapBytes,
    expiresAt: row.expiresAt ? row.expiresAt.toISOString() : null,
    lastCheckedAt: row.lastCheckedAt ? row.lastCheckedAt.toISOString() : null,
  };
}

function tokensMatch(expected: string, provided: string) {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function requireAdminToken(adminApiToken: string | null): RequestHandler {
  return (req, res, next) => {
    if (!adminApiToken) {
      return res.status(503).json(errorSchemas.unavailable.parse({ message: "Admin API is disabled" }));
    }
    const header = req.headers.authorization ?? "";
    const match = header.match(/^Bearer\s+(.+)$/i);
    if (!match || !tokensMatch(adminApiToken, match[1].trim())) {
      return res.status(401).json(errorSchemas.unauthorized.parse({ message: "Unauthorized" }));
    }
    next();
  };
}

function registerHealthRoutes(app: Express, deps: RouteDeps) {
  const logger = deps.logger ?? console;
  const payload = () => ({
    ok: true,
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    version: deps.version ?? "unknown",
    service: SERVICE_NAME,
  });
  app.get(api.health.path, (_req, res) => {
    res.status(200).json(api.health.responses[200].parse(payload()));
  });
  app.get("/healthz", (_req, res) => {
    res.status(200).json(api.health.responses[200].parse(payload()));
  });
  app.get("/db-health", async (_req, res) => {
    try {
      await deps.checkDatabase();
      res.status(200).json({ ok: true, timestamp: new Date().toISOString() });
    } catch (error) {
      logger.error("DB health check failed:", error);
      res.status(503).json({
        ok: false,
        timestamp: new Date().toISOString(),
        error: "DB_UNAVAILABLE",
      });
    }
  });
}

export function registerRoutes(app: Express, deps: RouteDeps) {
  const logger = deps.logger ?? console;
  const adminOnly = requireAdminToken(deps.adminApiToken);

  registerHealthRoutes(app, deps);

  if (deps.webhook) {
    const { path, handler } = deps.webhook;
    app.post(path, handler);
    logger.log(`[telegram] Webhook path: ${path}`);
  }

  app.get(api.subscribers.list.path, adminOnly, async (req, res, next) => {
    try {
      const input = api.subscribers.list.input.safeParse(
        Object.keys(req.query).length ? req.query : undefined,
      );
      if (!input.success) {
        return res.status(400).json({ message: input.error.issues[0]?.message ?? "Invalid query" });
      }
      const rows = await deps.storage.listSubscribers();
      const state = input.data?.state;
      const items = rows
        .filter((row) => !state || row.lastState === state)
        .map(toSubscriberSummary);
      res.status(200).json(api.subscribers.list.responses[200].parse(items));
    } catch (error) {
      next(error);
    }
  });

  app.get(api.subscribers.get.path, adminOnly, async (req, res, next) => {
    try {
      const id = Number(req.params.id);
      const row = Number.isSafeInteger(id) ? await deps.storage.getSubscriber(id) : undefined;
      if (!row) {
        return res
          .status(404)
          .json(api.subscribers.get.responses[404].parse({ message: "Subscriber not found" }));
      }
      res.status(200).json(api.subscribers.get.responses[200].parse(toSubscriberSummary(row)));
    } catch (error) {
      next(error);
    }
  });

  app.post(api.poll.run.path, adminOnly, async (_req, res, next) => {
    try {
      const report = await deps.runPoll();
      res.status(200).json(
        api.poll.run.responses[200].parse({
          ...report,
          startedAt: report.startedAt.toISOString(),
          finishedAt: report.finishedAt.toISOString(),
        }),
      );
    } catch (error) {
      next(error);
    }
  });

  app.post(api.backups.create.path, adminOnly, async (_req, res, next) => {
    const createBackup = deps.createBackup;
    if (!createBackup) {
      return res
        .status(503)
        .json(api.backups.create.responses[503].parse({ message: "Backups are disabled" }));
    }
    try {
      const result = await createBackup("api");
      res.status(201).json(api.backups.create.responses[201].parse(result));
    } catch (error) {
      next(error);
    }
  });
}

export function createErrorHandler(logger: Logger = console) {
  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = err instanceof AppError ? err.status : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";

    logJson("error", "http.request_failed", { status, error: describeError(err) }, logger);

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json(errorSchemas.internal.parse({ message }));
  };
}
