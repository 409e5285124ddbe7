import "dotenv/config";
import express, { type Express } from "express";
import { createServer } from "http";
import { BackupManager } from "./backup";
import { createBot } from "./bot";
import { BotCommands } from "./commands";
import { loadConfig } from "./config";
import { checkDatabaseReady, closeDatabase, runDatabaseMigrations, waitForDatabase } from "./db";
import { createGracefulShutdown, type Stoppable } from "./lifecycle";
import { log } from "./logger";
import { createQueueWorker } from "./queue-worker";
import { createErrorHandler, registerRoutes } from "./routes";
import { createTicker } from "./scheduler";
import { createPollServices } from "./services";
import { storage } from "./storage";
import { startTelegramRuntime } from "./telegram";

function createApp(): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });

    next();
  });

  return app;
}

async function startServer() {
  log("Starting server...");

  const config = loadConfig();
  const app = createApp();
  const httpServer = createServer(app);

  const dbReady = await waitForDatabase({ logger: console });
  if (!dbReady) {
    console.error("Database not ready after retries. Exiting.");
    process.exit(1);
  }
  await runDatabaseMigrations();

  const { pollTicker, panel } = createPollServices(config, storage);
  const runtime = config.botToken
    ? createBot({
        token: config.botToken,
        storage,
        commands: new BotCommands({
          storage,
          panel,
          adminTelegramIds: config.adminTelegramIds,
          runPoll: () => pollTicker.runNow(),
          createBackup: (createdBy) => requireBackups().createBackup("manual", createdBy),
        }),
      })
    : null;

  const backups = config.backup.enabled
    ? new BackupManager({
        storage,
        directory: config.backup.directory,
        maxBackups: config.backup.maxBackups,
        adminTelegramIds: config.adminTelegramIds,
        sender: runtime?.bot.telegram ?? null,
      })
    : null;
  function requireBackups(): BackupManager {
    if (!backups) throw new Error("Backups are disabled (BACKUP_ENABLED=false)");
    return backups;
  }
  const backupTicker = backups
    ? createTicker({
        name: "backup",
        intervalMs: config.backup.intervalMs,
        task: () => backups.createBackup("scheduled"),
      })
    : null;

  const queueWorker = runtime
    ? createQueueWorker({
        storage,
        sender: runtime.bot.telegram,
        ratePerSec: config.queue.ratePerSec,
        batchSize: config.queue.batchSize,
        retryLimit: config.queue.retryLimit,
        retryBaseMs: config.queue.retryBaseMs,
      })
    : null;

  registerRoutes(app, {
    storage,
    adminApiToken: config.adminApiToken,
    checkDatabase: checkDatabaseReady,
    runPoll: () => pollTicker.runNow(),
    createBackup: backups ? (createdBy) => backups.createBackup("manual", createdBy) : null,
    webhook: runtime
      ? { path: config.webhookPath, handler: runtime.bot.webhookCallback(config.webhookPath) }
      : null,
    version: process.env.npm_package_version,
  });
  app.use(createErrorHandler());

  if (runtime) {
    await startTelegramRuntime({
      bot: runtime.bot,
      webhookUrl: config.webhookUrl,
      webhookPath: config.webhookPath,
      isProduction: config.isProduction,
    });
    runtime.publishCommands().catch((error: unknown) => {
      console.error("[telegram] setMyCommands failed:", error);
    });
    queueWorker?.start();
  } else {
    console.warn("[telegram] BOT_TOKEN missing. Bot and message delivery disabled.");
  }

  pollTicker.start();
  backupTicker?.start();

  const stoppables: Stoppable[] = [
    { name: "poll", stop: () => pollTicker.stop() },
    ...(backupTicker ? [{ name: "backup", stop: () => backupTicker.stop() }] : []),
    ...(queueWorker ? [{ name: "queue", stop: () => queueWorker.stop() }] : []),
  ];
  const shutdown = createGracefulShutdown({
    bot: runtime?.bot ?? null,
    httpServer,
    stoppables,
    onClosed: closeDatabase,
  });
  const exitAfter = (signal: string) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => exitAfter("SIGINT"));
  process.once("SIGTERM", () => exitAfter("SIGTERM"));

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`Listening on PORT=${config.port}`);
  });
}

startServer().catch((error) => {
  console.error("Server startup failed:", error);
  process.exit(1);
});
