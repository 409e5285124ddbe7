import { describe, expect, it, vi } from "vitest";
import type { BackupResult } from "../backup";
import {
  ALREADY_LINKED_TEXT,
  BROADCAST_USAGE_TEXT,
  BotCommands,
  CLIENT_NOT_FOUND_TEXT,
  INVALID_LINK_TEXT,
  NO_SUBSCRIPTIONS_TEXT,
  parseCapArgs,
  parseExpiryArgs,
} from "../commands";
import type { ClientTraffic } from "../panel/client-api";
import type { CycleReport } from "../pipeline";
import { MemoryStorage } from "./memory-storage";

const MB = 1024 * 1024;
const GB = 1024 * MB;
const NOW = new Date("2026-03-01T12:00:00Z");
const UUID = "0b3e5b86-5c61-4d6f-9f1e-3f6c2a7b8d90";
const LINK = `vless://${UUID}@vpn.example.com:443?security=reality#main-alice`;
const OTHER_UUID = "11111111-1111-4111-8111-111111111111";

const ALICE_STATUS = [
  "<b>Subscription</b> <code>alice</code>",
  "State: Active",
  "Used: 400.00 MB",
  "Limit: 1.00 GB",
  "Remaining: 624.00 MB",
  "Expires: Never",
].join("\n");

const traffic = (clientId: string, uploadBytes: number, capBytes: number | null): ClientTraffic => ({
  record: { clientId, uploadBytes, downloadBytes: 300 * MB, enabled: true, panelExpiryTimestamp: 0 },
  capBytes,
});

const report = (overrides: Partial<CycleReport> = {}): CycleReport => ({
  startedAt: NOW,
  finishedAt: NOW,
  fetched: 10,
  reconciled: 8,
  failures: [{ userId: 4, clientId: "dave", stage: "persist", message: "db down" }],
  notified: 2,
  unmatched: 1,
  missing: 1,
  ...overrides,
});

function setup() {
  const storage = new MemoryStorage();
  const panel = {
    getClientTrafficById: vi.fn(async (): Promise<ClientTraffic | null> => traffic("alice", 100 * MB, GB)),
    getClientTraffic: vi.fn(async (): Promise<ClientTraffic | null> => traffic("alice", 100 * MB, GB)),
    getOnlineClients: vi.fn(async (): Promise<string[]> => []),
  };
  const runPoll = vi.fn(async () => report());
  const createBackup = vi.fn(
    async (): Promise<BackupResult> => ({
      fileName: "backup_test.json.gz",
      filePath: "backups/backup_test.json.gz",
      sizeBytes: 1024,
      removed: [],
      delivered: 1,
    }),
  );
  const commands = new BotCommands({
    storage,
    panel,
    adminTelegramIds: ["900"],
    runPoll,
    createBackup,
    now: () => NOW,
    systemInfo: () => ({
      platform: "linux",
      release: "6.1.0",
      nodeVersion: "v20.11.1",
      pid: 4242,
      uptimeSeconds: 93_784,
      loadAverage: [0.5, 0.25, 0.1],
      memoryTotalBytes: 8 * GB,
      memoryFreeBytes: 5 * GB,
      rssBytes: 120 * MB,
    }),
  });
  return { storage, panel, runPoll, createBackup, commands };
}

describe("argument parsing", () => {
  it("parses data limits in gigabytes", () => {
    expect(parseCapArgs("alice 10")).toEqual({ clientId: "alice", capBytes: 10 * GB });
    expect(parseCapArgs(" alice  1.5 ")).toEqual({ clientId: "alice", capBytes: 1610612736 });
    expect(parseCapArgs("alice 0")).toEqual({ clientId: "alice", capBytes: null });
    expect(parseCapArgs("alice -1")).toBeNull();
    expect(parseCapArgs("alice")).toBeNull();
    expect(parseCapArgs("alice 1 extra")).toBeNull();
  });

  it("parses expiry days", () => {
    expect(parseExpiryArgs("alice 30")).toEqual({ clientId: "alice", days: 30 });
    expect(parseExpiryArgs("alice 1.5")).toBeNull();
    expect(parseExpiryArgs("")).toBeNull();
  });
});

describe("BotCommands", () => {
  it("registers the user on start", async () => {
    const { storage, commands } = setup();

    const reply = await commands.start({ telegramId: "900", firstName: "<Ann>" });

    expect(reply.text).toBe(
      "Welcome, &lt;Ann&gt;! Send your subscription link to see your traffic and expiry.",
    );
    expect(storage.telegramUsers[0]).toMatchObject({
      telegramId: "900",
      firstName: "<Ann>",
      isAdmin: true,
    });
  });

  it("links a subscription from a shared link", async () => {
    const { storage, panel, commands } = setup();

    const reply = await commands.link("1001", `here you go ${LINK}`);

    expect(panel.getClientTrafficById).toHaveBeenCalledWith(UUID);
    expect(panel.getClientTraffic).toHaveBeenCalledWith({ uuid: UUID, email: "alice" });
    expect(storage.subscribers[0]).toMatchObject({
      id: 1,
      clientId: "alice",
      clientUuid: UUID,
      telegramId: "1001",
      dataCapBytes: GB,
    });
    expect(reply).toEqual({ text: ALICE_STATUS, subscriberId: 1 });
  });

  it("explains invalid or unknown links", async () => {
    const { storage, panel, commands } = setup();

    await expect(commands.link("1001", "hello")).resolves.toEqual({ text: INVALID_LINK_TEXT });
    panel.getClientTrafficById.mockResolvedValueOnce(null);
    await expect(commands.link("1001", LINK)).resolves.toEqual({ text: CLIENT_NOT_FOUND_TEXT });
    expect(storage.subscribers).toHaveLength(0);
  });

  it("never links by the remark when the UUID is unknown", async () => {
    const { storage, panel, commands } = setup();
    await commands.link("100", LINK);

    panel.getClientTrafficById.mockResolvedValueOnce(null);
    const reply = await commands.link("666", `vless://${OTHER_UUID}@vpn.example.com:443#x-alice`);

    expect(reply).toEqual({ text: CLIENT_NOT_FOUND_TEXT });
    expect(panel.getClientTrafficById).toHaveBeenLastCalledWith(OTHER_UUID);
    expect(panel.getClientTraffic).not.toHaveBeenCalledWith({ uuid: OTHER_UUID, email: "alice" });
    expect(storage.subscribers).toHaveLength(1);
    expect(storage.subscribers[0]?.telegramId).toBe("100");
    await expect(commands.status("666")).resolves.toEqual([{ text: NO_SUBSCRIPTIONS_TEXT }]);
  });

  it("refuses to move a subscription that another account owns", async () => {
    const { storage, commands } = setup();
    await commands.link("100", LINK);

    await expect(commands.link("666", LINK)).resolves.toEqual({ text: ALREADY_LINKED_TEXT });
    expect(storage.subscribers[0]?.telegramId).toBe("100");
    await expect(commands.link("100", LINK)).resolves.toEqual({ text: ALICE_STATUS, subscriberId: 1 });
  });

  it("keeps the first owner when two links race past the ownership check", async () => {
    const { storage } = setup();
    await storage.upsertSubscriber({ clientId: "alice", telegramId: "100" });

    const row = await storage.upsertSubscriber({ clientId: "alice", clientUuid: UUID, telegramId: "666" });

    expect(row).toMatchObject({ telegramId: "100", clientUuid: UUID });
  });

  it("shows each linked subscription", async () => {
    const { storage, panel, commands } = setup();
    storage.addSubscriber({ clientId: "alice", telegramId: "1001", dataCapBytes: GB });
    storage.addSubscriber({ clientId: "bob", telegramId: "1001" });
    panel.getClientTraffic.mockResolvedValueOnce(traffic("alice", 100 * MB, GB)).mockResolvedValueOnce(null);

    const replies = await commands.status("1001");

    expect(replies).toEqual([
      { text: ALICE_STATUS, subscriberId: 1 },
      { text: "<code>bob</code>: not found on the panel.", subscriberId: 2 },
    ]);
    await expect(commands.status("2002")).resolves.toEqual([{ text: NO_SUBSCRIPTIONS_TEXT }]);
  });

  it("follows a client whose email was renamed on the panel", async () => {
    const { storage, panel, commands } = setup();
    storage.addSubscriber({ clientId: "alice", clientUuid: UUID, telegramId: "1001", dataCapBytes: GB });
    panel.getClientTraffic.mockResolvedValueOnce(traffic("alice-new", 100 * MB, GB));

    const replies = await commands.status("1001");

    expect(replies).toEqual([
      { text: ALICE_STATUS.replace("<code>alice</code>", "<code>alice-new</code>"), subscriberId: 1 },
    ]);
    expect(storage.subscribers[0]?.clientId).toBe("alice-new");
  });

  it("explains a rename that collides with another subscriber", async () => {
    const { storage, panel, commands } = setup();
    storage.addSubscriber({ clientId: "alice", clientUuid: UUID, telegramId: "1001" });
    storage.addSubscriber({ clientId: "alice-new", telegramId: "2002" });
    panel.getClientTraffic.mockResolvedValueOnce(traffic("alice-new", 100 * MB, GB));

    await expect(commands.status("1001")).resolves.toEqual([
      {
        text: "<code>alice</code>: renamed on the panel to <code>alice-new</code>, which is linked separately.",
        subscriberId: 1,
      },
    ]);
    expect(storage.subscribers[0]?.clientId).toBe("alice");
  });

  it("explains usage the panel reported in an unreadable form", async () => {
    const { storage, panel, commands } = setup();
    storage.addSubscriber({ clientId: "alice", telegramId: "1001" });
    panel.getClientTraffic.mockResolvedValueOnce(traffic("alice", -1, GB));

    await expect(commands.status("1001")).resolves.toEqual([
      {
        text: "<code>alice</code>: the panel reported usage that could not be read (alice: uploadBytes must be a non-negative integer, got -1).",
        subscriberId: 1,
      },
    ]);
  });

  it("summarises data usage for each linked subscription", async () => {
    const { storage, panel, commands } = setup();
    storage.addSubscriber({ clientId: "alice", telegramId: "1001", dataCapBytes: GB });
    storage.addSubscriber({ clientId: "bob", telegramId: "1001" });
    storage.addSubscriber({ clientId: "carol", telegramId: "1001" });
    panel.getClientTraffic
      .mockResolvedValueOnce(traffic("alice", 100 * MB, GB))
      .mockResolvedValueOnce(traffic("bob", 724 * MB, null))
      .mockResolvedValueOnce(null);

    await expect(commands.usage("1001")).resolves.toEqual({
      text: [
        "<b>Data usage</b>",
        "<code>alice</code>: 400.00 MB of 1.00 GB (39.1%)",
        "<code>bob</code>: 1.00 GB used, no limit",
        "<code>carol</code>: not found on the panel",
      ].join("\n"),
    });
    await expect(commands.usage("2002")).resolves.toEqual({ text: NO_SUBSCRIPTIONS_TEXT });
  });

  it("refreshes only the owner's subscription unless the caller is an admin", async () => {
    const { storage, commands } = setup();
    storage.addSubscriber({ clientId: "alice", telegramId: "1001", dataCapBytes: GB });

    await expect(commands.refresh("2002", 1)).resolves.toEqual({ text: "Subscription not found." });
    await expect(commands.refresh("1001", 1)).resolves.toEqual({ text: ALICE_STATUS, subscriberId: 1 });
    await expect(commands.refresh("900", 1)).resolves.toEqual({ text: ALICE_STATUS, subscriberId: 1 });
    await expect(commands.refresh("900", 99)).resolves.toEqual({ text: "Subscription not found." });
  });

  it("lists subscribers for admins", async () => {
    const { storage, commands } = setup();
    await expect(commands.users()).resolves.toEqual({ text: "No subscribers yet." });

    storage.addSubscriber({
      clientId: "alice",
      dataCapBytes: GB,
      lastObservedBytes: 2 * GB,
      lastState: "over_quota",
    });
    storage.addSubscriber({ clientId: "bob" });

    await expect(commands.users()).resolves.toEqual({
      text: [
        "<b>Subscribers (2)</b>",
        "#1 <code>alice</code> Over quota 2.00 GB / 1.00 GB",
        "#2 <code>bob</code> Unchecked 0 B / ∞",
      ].join("\n"),
    });
  });

  it("lists online clients", async () => {
    const { panel, commands } = setup();
    await expect(commands.online()).resolves.toEqual({ text: "No clients are online." });

    panel.getOnlineClients.mockResolvedValueOnce(["alice", "b<b"]);
    await expect(commands.online()).resolves.toEqual({
      text: "<b>Online (2)</b>\n<code>alice</code>\n<code>b&lt;b</code>",
    });
  });

  it("sets and clears data limits", async () => {
    const { storage, commands } = setup();
    storage.addSubscriber({ clientId: "alice" });

    await expect(commands.setCap("")).resolves.toEqual({ text: "Usage: /setcap <client> <GB|0>" });
    await expect(commands.setCap("ghost 5")).resolves.toEqual({ text: "Unknown client ghost." });
    await expect(commands.setCap("alice 10")).resolves.toEqual({
      text: "Data limit for <code>alice</code> set to 10.00 GB.",
    });
    expect(storage.subscribers[0]?.dataCapBytes).toBe(10 * GB);
    await expect(commands.setCap("alice 0")).resolves.toEqual({
      text: "Data limit for <code>alice</code> set to unlimited.",
    });
    expect(storage.subscribers[0]?.dataCapBytes).toBeNull();
  });

  it("sets and clears expiry dates", async () => {
    const { storage, commands } = setup();
    storage.addSubscriber({ clientId: "alice" });

    await expect(commands.setExpiry("alice 30")).resolves.toEqual({
      text: "Expiry for <code>alice</code> set to 2026-03-31.",
    });
    expect(storage.subscribers[0]?.expiresAt).toEqual(new Date("2026-03-31T12:00:00Z"));
    await expect(commands.setExpiry("alice 0")).resolves.toEqual({
      text: "Expiry for <code>alice</code> set to never.",
    });
    expect(storage.subscribers[0]?.expiresAt).toBeNull();
    await expect(commands.setExpiry("alice soon")).resolves.toEqual({
      text: "Usage: /setexpiry <client> <days|0>",
    });
  });

  it("summarises a manual usage check", async () => {
    const { runPoll, commands } = setup();

    await expect(commands.poll()).resolves.toEqual({
      text: [
        "<b>Usage check finished</b>",
        "Fetched: 10",
        "Updated: 8",
        "Failed: 1",
        "Notified: 2",
        "Not on panel: 1",
      ].join("\n"),
    });

    runPoll.mockResolvedValueOnce(report({ error: "Panel login rejected with HTTP 401" }));
    await expect(commands.poll()).resolves.toEqual({
      text: "Usage check failed: Panel login rejected with HTTP 401",
    });
  });

  it("reports a created backup", async () => {
    const { createBackup, commands } = setup();

    await expect(commands.backup("900")).resolves.toEqual({
      text: "Backup backup_test.json.gz created (1.00 KB).",
    });
    expect(createBackup).toHaveBeenCalledWith("900");
  });

  it("shows the latest events first", async () => {
    const { storage, commands } = setup();
    await expect(commands.logs()).resolves.toEqual({ text: "No events recorded." });

    await storage.createEventLog({ eventType: "command.start", telegramId: "1001", message: "/start" });
    await storage.createEventLog({ level: "error", eventType: "poll.failed", message: "a<b" });

    await expect(commands.logs()).resolves.toEqual({
      text: [
        "<b>Recent events</b>",
        "2026-01-01 00:00 [error] poll.failed a&lt;b",
        "2026-01-01 00:00 [info] command.start 1001 /start",
      ].join("\n"),
    });
  });

  it("queues a broadcast for every user who has not blocked the bot", async () => {
    const { storage, commands } = setup();
    await expect(commands.broadcast("hello")).resolves.toEqual({
      text: "No active users to broadcast to.",
    });

    await storage.upsertTelegramUser({ telegramId: "1001" });
    await storage.upsertTelegramUser({ telegramId: "1002" });
    await storage.upsertTelegramUser({ telegramId: "1003" });
    await storage.updateTelegramUserStatus("1002", "blocked");

    await expect(commands.broadcast("   ")).resolves.toEqual({ text: BROADCAST_USAGE_TEXT });
    await expect(commands.broadcast("  Maintenance <tonight>  ")).resolves.toEqual({
      text: "Broadcast queued for 2 users.",
    });
    expect(
      storage.messages.map(({ type, telegramId, payload, status }) => ({ type, telegramId, payload, status })),
    ).toEqual([
      { type: "broadcast", telegramId: "1001", payload: '{"text":"Maintenance &lt;tonight&gt;"}', status: "pending" },
      { type: "broadcast", telegramId: "1003", payload: '{"text":"Maintenance &lt;tonight&gt;"}', status: "pending" },
    ]);
  });

  it("reports host and process status", () => {
    const { commands } = setup();

    expect(commands.system()).toEqual({
      text: [
        "<b>System</b>",
        "OS: linux 6.1.0",
        "Node.js: v20.11.1 (pid 4242)",
        "Uptime: 1d 2h 3m",
        "Load: 0.50 0.25 0.10",
        "Memory: 3.00 GB of 8.00 GB (37.5%)",
        "Process memory: 120.00 MB",
      ].join("\n"),
    });
  });
});
