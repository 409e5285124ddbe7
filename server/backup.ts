import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { gzip } from "node:zlib";
import type { Telegram } from "telegraf";
import { describeError, logJson, type Logger } from "./logger";
import type { IStorage } from "./storage";

const gzipAsync = promisify(gzip);

const BACKUP_FILE_PATTERN = /^backup_.+\.json\.gz$/;
const EVENT_LOG_EXPORT_LIMIT = 1000;

export type BackupTrigger = "scheduled" | "manual";

export interface DocumentSender {
  sendDocument(
    chatId: string,
    document: { source: Buffer; filename: string },
    extra?: Parameters<Telegram["sendDocument"]>[2],
  ): Promise<unknown>;
}

export type BackupStorage = Pick<
  IStorage,
  "listSubscribers" | "listTelegramUsers" | "listEventLogs" | "createBackupRecord" | "updateBackupRecord"
>;

export type BackupManagerOptions = {
  storage: BackupStorage;
  directory: string;
  maxBackups: number;
  adminTelegramIds: string[];
  sender?: DocumentSender | null;
  logger?: Logger;
  now?: () => Date;
};

export type BackupResult = {
  fileName: string;
  filePath: string;
  sizeBytes: number;
  removed: string[];
  delivered: number;
};

export function backupFileName(at: Date) {
  return `backup_${at.toISOString().replace(/[:.]/g, "-")}.json.gz`;
}

export class BackupManager {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private inFlight: Promise<BackupResult> | null = null;

  constructor(private readonly options: BackupManagerOptions) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  /** Concurrent callers share the backup already being written. */
  createBackup(trigger: BackupTrigger, createdBy?: string): Promise<BackupResult> {
    if (!this.inFlight) {
      this.inFlight = this.writeBackup(trigger, createdBy ?? null).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async writeBackup(trigger: BackupTrigger, createdBy: string | null): Promise<BackupResult> {
    const { storage } = this.options;
    const startedAt = this.now();
    const fileName = backupFileName(startedAt);
    const filePath = path.join(this.options.directory, fileName);
    const record = await storage.createBackupRecord({
      fileName,
      trigger,
      status: "in_progress",
      createdBy,
    });

    let compressed: Buffer;
    try {
      const [subscriberRows, telegramUserRows, eventLogRows] = await Promise.all([
        storage.listSubscribers(),
        storage.listTelegramUsers(),
        storage.listEventLogs(EVENT_LOG_EXPORT_LIMIT),
      ]);
      const document = {
        version: 1,
        createdAt: startedAt.toISOString(),
        subscribers: subscriberRows,
        telegramUsers: telegramUserRows,
        eventLogs: eventLogRows,
      };
      compressed = await gzipAsync(Buffer.from(JSON.stringify(document), "utf8"));

      await mkdir(this.options.directory, { recursive: true });
      await writeFile(filePath, compressed);
      await storage.updateBackupRecord(record.id, {
        status: "completed",
        sizeBytes: compressed.length,
        completedAt: this.now(),
      });
    } catch (error) {
      await storage.updateBackupRecord(record.id, {
        status: "failed",
        errorMessage: describeError(error),
        completedAt: this.now(),
      });
      logJson("error", "backup.failed", { fileName, trigger, error: describeError(error) }, this.logger);
      throw error;
    }

    // The file is written; retention and delivery problems no longer fail the backup.
    let removed: string[] = [];
    try {
      removed = await this.prune();
    } catch (error) {
      logJson("warn", "backup.prune_failed", { fileName, error: describeError(error) }, this.logger);
    }
    const delivered = await this.deliver(fileName, compressed, startedAt);
    logJson(
      "log",
      "backup.completed",
      { fileName, trigger, sizeBytes: compressed.length, removed: removed.length, delivered },
      this.logger,
    );
    return { fileName, filePath, sizeBytes: compressed.length, removed, delivered };
  }

  /** Keeps the newest `maxBackups` files and returns the names it deleted. */
  async prune(): Promise<string[]> {
    const entries = await readdir(this.options.directory);
    const backups = entries.filter((name) => BACKUP_FILE_PATTERN.test(name)).sort().reverse();
    const stale = backups.slice(Math.max(1, this.options.maxBackups));
    for (const name of stale) {
      await rm(path.join(this.options.directory, name), { force: true });
    }
    return stale;
  }

  private async deliver(fileName: string, content: Buffer, createdAt: Date) {
    const sender = this.options.sender;
    if (!sender) return 0;
    let delivered = 0;
    for (const adminId of this.options.adminTelegramIds) {
      try {
        await sender.sendDocument(
          adminId,
          { source: content, filename: fileName },
          { caption: `Backup ${createdAt.toISOString()}` },
        );
        delivered += 1;
      } catch (error) {
        logJson(
          "warn",
          "backup.delivery_failed",
          { adminId, fileName, error: describeError(error) },
          this.logger,
        );
      }
    }
    return delivered;
  }
}
