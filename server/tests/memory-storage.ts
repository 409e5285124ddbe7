import {
  isUserState,
  type Backup,
  type EventLog,
  type InsertBackup,
  type InsertEventLog,
  type InsertMessageQueue,
  type InsertSubscriber,
  type InsertTelegramUser,
  type MessageQueue,
  type Subscriber,
  type TelegramUser,
  type UserState,
} from "@shared/schema";
import type { IStorage, SubscriberObservation } from "../storage";

const EPOCH = new Date("2026-01-01T00:00:00Z");

/** In-process IStorage with the same conflict and ordering rules as DatabaseStorage. */
export class MemoryStorage implements IStorage {
  readonly subscribers: Subscriber[] = [];
  readonly telegramUsers: TelegramUser[] = [];
  readonly eventLogs: EventLog[] = [];
  readonly messages: MessageQueue[] = [];
  readonly backups: Backup[] = [];
  addSubscriber(entry: Partial<Subscriber> & Pick<Subscriber, "clientId">): Subscriber {
    const row: Subscriber = {
      id: this.subscribers.length + 1,
      clientUuid: null,
      telegramId: null,
      dataCapBytes: null,
      expiresAt: null,
      lastObservedBytes: 0,
      lastState: null,
      lastNotifiedState: null,
      lastCheckedAt: null,
      createdAt: EPOCH,
      updatedAt: EPOCH,
      ...entry,
    };
    this.subscribers.push(row);
    return row;
  }

  async listSubscribers() {
    return [...this.subscribers].sort((a, b) => a.id - b.id);
  }

  async getSubscriber(id: number) {
    return this.subscribers.find((row) => row.id === id);
  }

  async getSubscriberByClientId(clientId: string) {
    return this.subscribers.find((row) => row.clientId === clientId);
  }

  async listSubscribersByTelegramId(telegramId: string) {
    return this.subscribers.filter((row) => row.telegramId === telegramId);
  }

  async upsertSubscriber(entry: InsertSubscriber) {
    const existing = await this.getSubscriberByClientId(entry.clientId);
    if (existing) {
      existing.clientUuid = entry.clientUuid ?? existing.clientUuid;
      existing.telegramId = existing.telegramId ?? entry.telegramId ?? null;
      return existing;
    }
    return this.addSubscriber({
      clientId: entry.clientId,
      clientUuid: entry.clientUuid ?? null,
      telegramId: entry.telegramId ?? null,
      dataCapBytes: entry.dataCapBytes ?? null,
      expiresAt: entry.expiresAt ?? null,
    });
  }

  async updateSubscriber(id: number, updates: Partial<InsertSubscriber>) {
    const row = await this.getSubscriber(id);
    if (row) Object.assign(row, updates);
    return row;
  }

  async recordObservation(id: number, observation: SubscriberObservation) {
    const row = await this.getSubscriber(id);
    if (row) Object.assign(row, observation);
  }

  async getLastNotifiedState(userId: number): Promise<UserState | null> {
    const value = (await this.getSubscriber(userId))?.lastNotifiedState;
    return isUserState(value) ? value : null;
  }

  async setLastNotifiedState(userId: number, state: UserState) {
    const row = await this.getSubscriber(userId);
    if (row) row.lastNotifiedState = state;
  }

  private findTelegramUser(telegramId: string) {
    return this.telegramUsers.find((row) => row.telegramId === telegramId);
  }

  async upsertTelegramUser(entry: InsertTelegramUser) {
    const existing = this.findTelegramUser(entry.telegramId);
    if (existing) {
      Object.assign(existing, {
        username: entry.username ?? null,
        firstName: entry.firstName ?? null,
        lastName: entry.lastName ?? null,
        languageCode: entry.languageCode ?? null,
        isAdmin: entry.isAdmin ?? false,
        telegramStatus: "active",
      });
      return existing;
    }
    const row: TelegramUser = {
      id: this.telegramUsers.length + 1,
      telegramId: entry.telegramId,
      username: entry.username ?? null,
      firstName: entry.firstName ?? null,
      lastName: entry.lastName ?? null,
      languageCode: entry.languageCode ?? null,
      isAdmin: entry.isAdmin ?? false,
      telegramStatus: "active",
      totalCommands: 0,
      lastSeen: null,
      createdAt: EPOCH,
      updatedAt: EPOCH,
    };
    this.telegramUsers.push(row);
    return row;
  }

  async touchTelegramUser(telegramId: string, seenAt: Date) {
    const row = this.findTelegramUser(telegramId);
    if (row) {
      row.lastSeen = seenAt;
      row.totalCommands += 1;
    }
  }

  async updateTelegramUserStatus(telegramId: string, status: string) {
    const row = this.findTelegramUser(telegramId);
    if (row) row.telegramStatus = status;
  }

  async listTelegramUsers() {
    return [...this.telegramUsers];
  }

  async createEventLog(entry: InsertEventLog) {
    const row: EventLog = {
      id: this.eventLogs.length + 1,
      level: entry.level ?? "info",
      eventType: entry.eventType,
      telegramId: entry.telegramId ?? null,
      message: entry.message ?? null,
      details: entry.details ?? null,
      createdAt: EPOCH,
    };
    this.eventLogs.push(row);
    return row;
  }

  async listEventLogs(limit: number) {
    return [...this.eventLogs].sort((a, b) => b.id - a.id).slice(0, limit);
  }

  async enqueueMessage(entry: InsertMessageQueue) {
    const row: MessageQueue = {
      id: this.messages.length + 1,
      type: entry.type,
      subscriberId: entry.subscriberId ?? null,
      telegramId: entry.telegramId ?? null,
      payload: entry.payload,
      status: entry.status ?? "pending",
      attempts: entry.attempts ?? 0,
      lastErrorCode: entry.lastErrorCode ?? null,
      lastErrorMessage: entry.lastErrorMessage ?? null,
      nextAttemptAt: entry.nextAttemptAt ?? null,
      deliveredAt: entry.deliveredAt ?? null,
      createdAt: EPOCH,
      updatedAt: EPOCH,
    };
    this.messages.push(row);
    return row;
  }

  async listPendingMessages(params: { limit: number; now: Date }) {
    return this.messages
      .filter(
        (row) =>
          row.status === "pending" &&
          (row.nextAttemptAt === null || row.nextAttemptAt.getTime() <= params.now.getTime()),
      )
      .sort((a, b) => a.id - b.id)
      .slice(0, params.limit);
  }

  async updateMessage(id: number, updates: Partial<InsertMessageQueue>) {
    const row = this.messages.find((entry) => entry.id === id);
    if (row) Object.assign(row, updates);
    return row;
  }

  async createBackupRecord(entry: InsertBackup) {
    const row: Backup = {
      id: this.backups.length + 1,
      fileName: entry.fileName,
      trigger: entry.trigger ?? "scheduled",
      status: entry.status ?? "in_progress",
      sizeBytes: entry.sizeBytes ?? null,
      errorMessage: entry.errorMessage ?? null,
      createdBy: entry.createdBy ?? null,
      createdAt: EPOCH,
      completedAt: entry.completedAt ?? null,
    };
    this.backups.push(row);
    return row;
  }

  async updateBackupRecord(id: number, updates: Partial<InsertBackup>) {
    const row = this.backups.find((entry) => entry.id === id);
    if (row) Object.assign(row, updates);
    return row;
  }
}
