import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackupManager, backupFileName } from "../backup";
import { createLogger, loggedEvents } from "./helpers";
import { MemoryStorage } from "./memory-storage";

const NOW = new Date("2026-03-01T12:00:00Z");
const FILE_NAME = "backup_2026-03-01T12-00-00-000Z.json.gz";

let workDir = "";

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), "usage-backup-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

function setup(options: { directory?: string; maxBackups?: number; admins?: string[] } = {}) {
  const storage = new MemoryStorage();
  const sender = {
    sendDocument: vi.fn(async (chatId: string) => {
      if (chatId === "901") throw new Error("chat not found");
      return {};
    }),
  };
  const logger = createLogger();
  const manager = new BackupManager({
    storage,
    directory: options.directory ?? path.join(workDir, "backups"),
    maxBackups: options.maxBackups ?? 7,
    adminTelegramIds: options.admins ?? ["900"],
    sender,
    logger,
    now: () => NOW,
  });
  return { storage, sender, logger, manager };
}

describe("backupFileName", () => {
  it("builds a sortable file name from the timestamp", () => {
    expect(backupFileName(NOW)).toBe(FILE_NAME);
  });
});

describe("BackupManager", () => {
  it("keeps a written backup completed when pruning old files fails", async () => {
    const { storage, logger, manager } = setup();
    vi.spyOn(manager, "prune").mockRejectedValueOnce(new Error("EACCES: permission denied"));

    const result = await manager.createBackup("scheduled");

    expect(result.removed).toEqual([]);
    expect(result.delivered).toBe(1);
    await expect(readdir(path.join(workDir, "backups"))).resolves.toEqual([FILE_NAME]);
    expect(storage.backups).toEqual([
      expect.objectContaining({ status: "completed", errorMessage: null }),
    ]);
    expect(loggedEvents(logger.warn)).toEqual([
      expect.objectContaining({
        message: "backup.prune_failed",
        fileName: FILE_NAME,
        error: "EACCES: permission denied",
      }),
    ]);
  });

  it("writes a gzipped export and records it", async () => {
    const { storage, manager } = setup();
    storage.addSubscriber({ clientId: "alice", telegramId: "1001" });
    await storage.createEventLog({ eventType: "command.start", telegramId: "1001" });

    const result = await manager.createBackup("manual", "900");

    expect(result.fileName).toBe(FILE_NAME);
    expect(result.filePath).toBe(path.join(workDir, "backups", FILE_NAME));
    const content = await readFile(result.filePath);
    expect(content.length).toBe(result.sizeBytes);
    const document: unknown = JSON.parse(gunzipSync(content).toString("utf8"));
    expect(document).toMatchObject({
      version: 1,
      createdAt: "2026-03-01T12:00:00.000Z",
      subscribers: [expect.objectContaining({ clientId: "alice", telegramId: "1001" })],
      telegramUsers: [],
      eventLogs: [expect.objectContaining({ eventType: "command.start" })],
    });
    expect(storage.backups).toEqual([
      expect.objectContaining({
        fileName: FILE_NAME,
        trigger: "manual",
        createdBy: "900",
        status: "completed",
        sizeBytes: result.sizeBytes,
        completedAt: NOW,
      }),
    ]);
  });

  it("keeps only the newest backups", async () => {
    const directory = path.join(workDir, "backups");
    const { manager } = setup({ directory, maxBackups: 2 });
    await mkdir(directory, { recursive: true });
    await writeFile(path.join(directory, "backup_2026-01-01T00-00-00-000Z.json.gz"), "old");
    await writeFile(path.join(directory, "backup_2026-02-01T00-00-00-000Z.json.gz"), "newer");
    await writeFile(path.join(directory, "notes.txt"), "keep me");

    const result = await manager.createBackup("scheduled");

    expect(result.removed).toEqual(["backup_2026-01-01T00-00-00-000Z.json.gz"]);
    expect((await readdir(directory)).sort()).toEqual([
      "backup_2026-02-01T00-00-00-000Z.json.gz",
      FILE_NAME,
      "notes.txt",
    ]);
  });

  it("sends the file to every admin and tolerates delivery failures", async () => {
    const { sender, logger, manager } = setup({ admins: ["900", "901"] });

    const result = await manager.createBackup("scheduled");

    expect(result.delivered).toBe(1);
    expect(sender.sendDocument).toHaveBeenCalledTimes(2);
    expect(sender.sendDocument).toHaveBeenCalledWith(
      "900",
      { source: expect.any(Buffer), filename: FILE_NAME },
      { caption: "Backup 2026-03-01T12:00:00.000Z" },
    );
    expect(loggedEvents(logger.warn)).toEqual([
      expect.objectContaining({ message: "backup.delivery_failed", adminId: "901" }),
    ]);
  });

  it("shares a backup that is already being written", async () => {
    const { storage, manager } = setup();

    const [first, second] = await Promise.all([
      manager.createBackup("scheduled"),
      manager.createBackup("manual", "900"),
    ]);

    expect(first).toBe(second);
    expect(storage.backups).toHaveLength(1);
  });

  it("marks the record failed and rethrows when the file cannot be written", async () => {
    const blocker = path.join(workDir, "blocker");
    await writeFile(blocker, "not a directory");
    const { storage, logger, manager } = setup({ directory: path.join(blocker, "backups") });

    await expect(manager.createBackup("manual", "900")).rejects.toThrow();

    expect(storage.backups[0]).toMatchObject({ status: "failed", completedAt: NOW });
    expect(storage.backups[0]?.errorMessage).toBeTruthy();
    expect(loggedEvents(logger.error)).toEqual([
      expect.objectContaining({ message: "backup.failed", trigger: "manual" }),
    ]);
  });
});
