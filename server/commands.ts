import { USER_STATE_LABELS, isUserState, type Subscriber } from "@shared/schema";
import type { BackupResult } from "./backup";
import { ReconciliationError } from "./errors";
import {
  escapeHtml,
  formatBytes,
  formatDuration,
  formatPercent,
  formatStatusMessage,
  formatUsageLine,
} from "./format";
import type { PanelApi } from "./panel/client-api";
import { extractClientIdentifier, findSubscriptionLink } from "./panel/links";
import type { CycleReport } from "./pipeline";
import { reconcile, toPersistedSubscription, type UserStatus } from "./reconciler";
import type { IStorage } from "./storage";
import { readSystemInfo, type SystemInfo } from "./system-info";
import type { QueuePayload } from "./queue-worker";

const GIB = 1024 ** 3;
const DAY_MS = 86_400_000;
const USER_LIST_LIMIT = 50;
const LOG_LIST_LIMIT = 10;

export type Reply = {
  text: string;
  /** Attach a refresh button for this subscriber. */
  subscriberId?: number;
};

export type TelegramProfile = {
  telegramId: string;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  languageCode?: string | null;
};

export type CommandStorage = Pick<
  IStorage,
  | "upsertTelegramUser"
  | "getSubscriber"
  | "getSubscriberByClientId"
  | "listSubscribers"
  | "listSubscribersByTelegramId"
  | "upsertSubscriber"
  | "updateSubscriber"
  | "listEventLogs"
  | "listTelegramUsers"
  | "enqueueMessage"
>;

export type BotCommandsOptions = {
  storage: CommandStorage;
  panel: Pick<PanelApi, "getClientTrafficById" | "getClientTraffic" | "getOnlineClients">;
  adminTelegramIds: string[];
  runPoll: () => Promise<CycleReport>;
  createBackup: (createdBy: string) => Promise<BackupResult>;
  now?: () => Date;
  systemInfo?: () => SystemInfo;
};

type SubscriptionLookup =
  | { status: UserStatus; subscriber: Subscriber }
  | { problem: string; subscriber: Subscriber };

export const INVALID_LINK_TEXT =
  "That does not look like a subscription link. Send your vless://, vmess:// or trojan:// link.";
export const CLIENT_NOT_FOUND_TEXT = "No client with that link was found on the panel.";
export const NO_SUBSCRIPTIONS_TEXT =
  "You have no linked subscriptions yet. Send your subscription link to link one.";
export const ALREADY_LINKED_TEXT =
  "This subscription is already linked to another Telegram account. Ask an administrator for help.";
export const BROADCAST_USAGE_TEXT = "Usage: /broadcast <message>";

export function parseCapArgs(args: string): { clientId: string; capBytes: number | null } | null {
  const [clientId, amount, ...rest] = args.trim().split(/\s+/);
  if (!clientId || !amount || rest.length > 0) return null;
  const gigabytes = Number(amount);
  if (!Number.isFinite(gigabytes) || gigabytes < 0) return null;
  return { clientId, capBytes: gigabytes === 0 ? null : Math.round(gigabytes * GIB) };
}

export function parseExpiryArgs(args: string): { clientId: string; days: number } | null {
  const [clientId, amount, ...rest] = args.trim().split(/\s+/);
  if (!clientId || !amount || rest.length > 0 || !/^\d+$/.test(amount)) return null;
  return { clientId, days: Number(amount) };
}

export class BotCommands {
  private readonly now: () => Date;
  private readonly systemInfo: () => SystemInfo;

  constructor(private readonly options: BotCommandsOptions) {
    this.now = options.now ?? (() => new Date());
    this.systemInfo = options.systemInfo ?? readSystemInfo;
  }

  isAdmin(telegramId: string) {
    return this.options.adminTelegramIds.includes(telegramId);
  }

  async start(profile: TelegramProfile): Promise<Reply> {
    await this.options.storage.upsertTelegramUser({
      telegramId: profile.telegramId,
      username: profile.username ?? null,
      firstName: profile.firstName ?? null,
      lastName: profile.lastName ?? null,
      languageCode: profile.languageCode ?? null,
      isAdmin: this.isAdmin(profile.telegramId),
    });
    const name = profile.firstName ? `, ${escapeHtml(profile.firstName)}` : "";
    return {
      text: `Welcome${name}! Send your subscription link to see your traffic and expiry.`,
    };
  }

  /**
   * Links the client behind a subscription link to the Telegram user and reports its status.
   * Only the client's UUID (or trojan password) proves ownership; the remark is never trusted.
   */
  async link(telegramId: string, text: string): Promise<Reply> {
    const identifier = extractClientIdentifier(findSubscriptionLink(text));
    if (!identifier?.uuid) {
      return { text: INVALID_LINK_TEXT };
    }
    const traffic = await this.options.panel.getClientTrafficById(identifier.uuid);
    if (!traffic) {
      return { text: CLIENT_NOT_FOUND_TEXT };
    }
    const existing = await this.options.storage.getSubscriberByClientId(traffic.record.clientId);
    if (existing?.telegramId && existing.telegramId !== telegramId) {
      return { text: ALREADY_LINKED_TEXT };
    }
    const subscriber = await this.options.storage.upsertSubscriber({
      clientId: traffic.record.clientId,
      clientUuid: identifier.uuid,
      telegramId,
      dataCapBytes: traffic.capBytes,
    });
    if (subscriber.telegramId !== telegramId) {
      return { text: ALREADY_LINKED_TEXT };
    }
    return this.describe(subscriber);
  }

  async status(telegramId: string): Promise<Reply[]> {
    const linked = await this.options.storage.listSubscribersByTelegramId(telegramId);
    if (linked.length === 0) {
      return [{ text: NO_SUBSCRIPTIONS_TEXT }];
    }
    const replies: Reply[] = [];
    for (const subscriber of linked) {
      replies.push(await this.describe(subscriber));
    }
    return replies;
  }

  /** Compact traffic summary for every subscription the user has linked. */
  async usage(telegramId: string): Promise<Reply> {
    const linked = await this.options.storage.listSubscribersByTelegramId(telegramId);
    if (linked.length === 0) {
      return { text: NO_SUBSCRIPTIONS_TEXT };
    }
    const lines = ["<b>Data usage</b>"];
    for (const subscriber of linked) {
      const lookup = await this.lookup(subscriber);
      lines.push(
        "status" in lookup
          ? formatUsageLine(lookup.status)
          : `<code>${escapeHtml(lookup.subscriber.clientId)}</code>: ${lookup.problem}`,
      );
    }
    return { text: lines.join("\n") };
  }

  async refresh(telegramId: string, subscriberId: number): Promise<Reply> {
    const subscriber = await this.options.storage.getSubscriber(subscriberId);
    if (!subscriber || (subscriber.telegramId !== telegramId && !this.isAdmin(telegramId))) {
      return { text: "Subscription not found." };
    }
    return this.describe(subscriber);
  }

  async users(): Promise<Reply> {
    const rows = await this.options.storage.listSubscribers();
    if (rows.length === 0) {
      return { text: "No subscribers yet." };
    }
    const lines = rows.slice(0, USER_LIST_LIMIT).map((row) => {
      const state = isUserState(row.lastState) ? USER_STATE_LABELS[row.lastState] : "Unchecked";
      const cap = row.dataCapBytes === null ? "∞" : formatBytes(row.dataCapBytes);
      return `#${row.id} <code>${escapeHtml(row.clientId)}</code> ${state} ${formatBytes(row.lastObservedBytes)} / ${cap}`;
    });
    if (rows.length > USER_LIST_LIMIT) {
      lines.push(`…and ${rows.length - USER_LIST_LIMIT} more`);
    }
    return { text: [`<b>Subscribers (${rows.length})</b>`, ...lines].join("\n") };
  }

  async online(): Promise<Reply> {
    const clients = await this.options.panel.getOnlineClients();
    if (clients.length === 0) {
      return { text: "No clients are online." };
    }
    return {
      text: [
        `<b>Online (${clients.length})</b>`,
        ...clients.map((client) => `<code>${escapeHtml(client)}</code>`),
      ].join("\n"),
    };
  }

  async setCap(args: string): Promise<Reply> {
    const parsed = parseCapArgs(args);
    if (!parsed) {
      return { text: "Usage: /setcap <client> <GB|0>" };
    }
    const subscriber = await this.options.storage.getSubscriberByClientId(parsed.clientId);
    if (!subscriber) {
      return { text: `Unknown client ${escapeHtml(parsed.clientId)}.` };
    }
    await this.options.storage.updateSubscriber(subscriber.id, { dataCapBytes: parsed.capBytes });
    const limit = parsed.capBytes === null ? "unlimited" : formatBytes(parsed.capBytes);
    return { text: `Data limit for <code>${escapeHtml(parsed.clientId)}</code> set to ${limit}.` };
  }

  async setExpiry(args: string): Promise<Reply> {
    const parsed = parseExpiryArgs(args);
    if (!parsed) {
      return { text: "Usage: /setexpiry <client> <days|0>" };
    }
    const subscriber = await this.options.storage.getSubscriberByClientId(parsed.clientId);
    if (!subscriber) {
      return { text: `Unknown client ${escapeHtml(parsed.clientId)}.` };
    }
    const expiresAt =
      parsed.days === 0 ? null : new Date(this.now().getTime() + parsed.days * DAY_MS);
    await this.options.storage.updateSubscriber(subscriber.id, { expiresAt });
    const when = expiresAt ? expiresAt.toISOString().slice(0, 10) : "never";
    return { text: `Expiry for <code>${escapeHtml(parsed.clientId)}</code> set to ${when}.` };
  }

  async poll(): Promise<Reply> {
    const report = await this.options.runPoll();
    if (report.error) {
      return { text: `Usage check failed: ${escapeHtml(report.error)}` };
    }
    return {
      text: [
        "<b>Usage check finished</b>",
        `Fetched: ${report.fetched}`,
        `Updated: ${report.reconciled}`,
        `Failed: ${report.failures.length}`,
        `Notified: ${report.notified}`,
        `Not on panel: ${report.missing}`,
      ].join("\n"),
    };
  }

  async backup(createdBy: string): Promise<Reply> {
    const result = await this.options.createBackup(createdBy);
    return { text: `Backup ${escapeHtml(result.fileName)} created (${formatBytes(result.sizeBytes)}).` };
  }

  /** Queues a message for every Telegram user that has not blocked the bot. */
  async broadcast(message: string): Promise<Reply> {
    const text = message.trim();
    if (!text) {
      return { text: BROADCAST_USAGE_TEXT };
    }
    const recipients = (await this.options.storage.listTelegramUsers()).filter(
      (user) => (user.telegramStatus ?? "active") === "active",
    );
    if (recipients.length === 0) {
      return { text: "No active users to broadcast to." };
    }
    const payload: QueuePayload = { text: escapeHtml(text) };
    for (const user of recipients) {
      await this.options.storage.enqueueMessage({
        type: "broadcast",
        telegramId: user.telegramId,
        payload: JSON.stringify(payload),
        status: "pending",
      });
    }
    return {
      text: `Broadcast queued for ${recipients.length} user${recipients.length === 1 ? "" : "s"}.`,
    };
  }

  system(): Reply {
    const info = this.systemInfo();
    const usedMemory = Math.max(0, info.memoryTotalBytes - info.memoryFreeBytes);
    return {
      text: [
        "<b>System</b>",
        `OS: ${escapeHtml(`${info.platform} ${info.release}`)}`,
        `Node.js: ${escapeHtml(info.nodeVersion)} (pid ${info.pid})`,
        `Uptime: ${formatDuration(info.uptimeSeconds)}`,
        `Load: ${info.loadAverage.map((value) => value.toFixed(2)).join(" ")}`,
        `Memory: ${formatBytes(usedMemory)} of ${formatBytes(info.memoryTotalBytes)} (${formatPercent(usedMemory, info.memoryTotalBytes)})`,
        `Process memory: ${formatBytes(info.rssBytes)}`,
      ].join("\n"),
    };
  }

  async logs(): Promise<Reply> {
    const entries = await this.options.storage.listEventLogs(LOG_LIST_LIMIT);
    if (entries.length === 0) {
      return { text: "No events recorded." };
    }
    const lines = entries.map((entry) => {
      const at = entry.createdAt ? entry.createdAt.toISOString().slice(0, 16).replace("T", " ") : "-";
      const who = entry.telegramId ? ` ${entry.telegramId}` : "";
      return `${at} [${entry.level}] ${escapeHtml(entry.eventType)}${who} ${escapeHtml(entry.message ?? "")}`.trimEnd();
    });
    return { text: ["<b>Recent events</b>", ...lines].join("\n") };
  }

  private async describe(subscriber: Subscriber): Promise<Reply> {
    const lookup = await this.lookup(subscriber);
    if ("problem" in lookup) {
      return {
        text: `<code>${escapeHtml(lookup.subscriber.clientId)}</code>: ${lookup.problem}.`,
        subscriberId: subscriber.id,
      };
    }
    return { text: formatStatusMessage(lookup.status, this.now()), subscriberId: subscriber.id };
  }

  private async lookup(subscriber: Subscriber): Promise<SubscriptionLookup> {
    const traffic = await this.options.panel.getClientTraffic({
      uuid: subscriber.clientUuid,
      email: subscriber.clientId,
    });
    if (!traffic) {
      return { problem: "not found on the panel", subscriber };
    }

    let current = subscriber;
    const panelClientId = traffic.record.clientId;
    if (panelClientId !== subscriber.clientId) {
      // The UUID still matches, so the client's email was renamed on the panel.
      const taken = await this.options.storage.getSubscriberByClientId(panelClientId);
      if (taken) {
        return {
          problem: `renamed on the panel to <code>${escapeHtml(panelClientId)}</code>, which is linked separately`,
          subscriber,
        };
      }
      current =
        (await this.options.storage.updateSubscriber(subscriber.id, { clientId: panelClientId })) ??
        { ...subscriber, clientId: panelClientId };
    }

    try {
      return {
        status: reconcile(traffic.record, toPersistedSubscription(current), this.now()),
        subscriber: current,
      };
    } catch (error) {
      if (!(error instanceof ReconciliationError)) throw error;
      return {
        problem: `the panel reported usage that could not be read (${escapeHtml(error.message)})`,
        subscriber: current,
      };
    }
  }
}
