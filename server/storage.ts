import { db } from "./db";
import {
  subscribers,
  telegramUsers,
  eventLogs,
  messageQueue,
  backups,
  isUserState,
  type Subscriber,
  type InsertSubscriber,
  type TelegramUser,
  type InsertTelegramUser,
  type EventLog,
  type InsertEventLog,
  type MessageQueue,
  type InsertMessageQueue,
  type Backup,
  type InsertBackup,
  type UserState,
} from "@shared/schema";
import { eq, and, or, desc, asc, isNull, lte, sql } from "drizzle-orm";
import type { NotificationStateStore } from "./notification-gate";

export type SubscriberObservation = {
  lastObservedBytes: number;
  lastState: UserState;
  lastCheckedAt: Date;
};

export interface IStorage extends NotificationStateStore {
  listSubscribers(): Promise<Subscriber[]>;
  getSubscriber(id: number): Promise<Subscriber | undefined>;
  getSubscriberByClientId(clientId: string): Promise<Subscriber | undefined>;
  listSubscribersByTelegramId(telegramId: string): Promise<Subscriber[]>;
  upsertSubscriber(entry: InsertSubscriber): Promise<Subscriber>;
  updateSubscriber(id: number, updates: Partial<InsertSubscriber>): Promise<Subscriber | undefined>;
  recordObservation(id: number, observation: SubscriberObservation): Promise<void>;

  upsertTelegramUser(entry: InsertTelegramUser): Promise<TelegramUser>;
  touchTelegramUser(telegramId: string, seenAt: Date): Promise<void>;
  updateTelegramUserStatus(telegramId: string, status: string): Promise<void>;
  listTelegramUsers(): Promise<TelegramUser[]>;

  createEventLog(entry: InsertEventLog): Promise<EventLog>;
  listEventLogs(limit: number): Promise<EventLog[]>;

  enqueueMessage(entry: InsertMessageQueue): Promise<MessageQueue>;
  listPendingMessages(params: { limit: number; now: Date }): Promise<MessageQueue[]>;
  updateMessage(id: number, updates: Partial<InsertMessageQueue>): Promise<MessageQueue | undefined>;

  createBackupRecord(entry: InsertBackup): Promise<Backup>;
  updateBackupRecord(id: number, updates: Partial<InsertBackup>): Promise<Backup | undefined>;
}

export class DatabaseStorage implements IStorage {
  async listSubscribers(): Promise<Subscriber[]> {
    return db.select().from(subscribers).orderBy(asc(subscribers.id));
  }

  async getSubscriber(id: number): Promise<Subscriber | undefined> {
    const [row] = await db.select().from(subscribers).where(eq(subscribers.id, id));
    return row;
  }

  async getSubscriberByClientId(clientId: string): Promise<Subscriber | undefined> {
    const [row] = await db.select().from(subscribers).where(eq(subscribers.clientId, clientId));
    return row;
  }

  async listSubscribersByTelegramId(telegramId: string): Promise<Subscriber[]> {
    return db
      .select()
      .from(subscribers)
      .where(eq(subscribers.telegramId, telegramId))
      .orderBy(asc(subscribers.id));
  }

  async upsertSubscriber(entry: InsertSubscriber): Promise<Subscriber> {
    const [row] = await db
      .insert(subscribers)
      .values(entry)
      .onConflictDoUpdate({
        target: subscribers.clientId,
        set: {
          clientUuid: sql`coalesce(excluded.client_uuid, ${subscribers.clientUuid})`,
          telegramId: sql`coalesce(${subscribers.telegramId}, excluded.telegram_id)`,
          updatedAt: new Date(),
        },
      })
      .returning();
    return row;
  }

  async updateSubscriber(
    id: number,
    updates: Partial<InsertSubscriber>,
  ): Promise<Subscriber | undefined> {
    const [row] = await db
      .update(subscribers)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(subscribers.id, id))
      .returning();
    return row;
  }

  async recordObservation(id: number, observation: SubscriberObservation): Promise<void> {
    await db
      .update(subscribers)
      .set({ ...observation, updatedAt: new Date() })
      .where(eq(subscribers.id, id));
  }

  async getLastNotifiedState(userId: number): Promise<UserState | null> {
    const [row] = await db
      .select({ lastNotifiedState: subscribers.lastNotifiedState })
      .from(subscribers)
      .where(eq(subscribers.id, userId));
    const value = row?.lastNotifiedState;
    return isUserState(value) ? value : null;
  }

  async setLastNotifiedState(userId: number, state: UserState): Promise<void> {
    await db
      .update(subscribers)
      .set({ lastNotifiedState: state, updatedAt: new Date() })
      .where(eq(subscribers.id, userId));
  }

  async upsertTelegramUser(entry: InsertTelegramUser): Promise<TelegramUser> {
    const [row] = await db
      .insert(telegramUsers)
      .values(entry)
      .onConflictDoUpdate({
        target: telegramUsers.telegramId,
        set: {
          username: entry.username,
          firstName: entry.firstName,
          lastName: entry.lastName,
          languageCode: entry.languageCode,
          isAdmin: entry.isAdmin,
          telegramStatus: "active",
          updatedAt: new Date(),
        },
      })
      .returning();
    return row;
  }

  async touchTelegramUser(telegramId: string, seenAt: Date): Promise<void> {
    await db
      .update(telegramUsers)
      .set({
        lastSeen: seenAt,
        totalCommands: sql`${telegramUsers.totalCommands} + 1`,
        updatedAt: new Date(),
      })
      .where(eq(telegramUsers.telegramId, telegramId));
  }

  async updateTelegramUserStatus(telegramId: string, status: string): Promise<void> {
    await db
      .update(telegramUsers)
      .set({ telegramStatus: status, updatedAt: new Date() })
      .where(eq(telegramUsers.telegramId, telegramId));
  }

  async listTelegramUsers(): Promise<TelegramUser[]> {
    return db.select().from(telegramUsers).orderBy(desc(telegramUsers.createdAt));
  }

  async createEventLog(entry: InsertEventLog): Promise<EventLog> {
    const [row] = await db.insert(eventLogs).values(entry).returning();
    return row;
  }

  async listEventLogs(limit: number): Promise<EventLog[]> {
    return db.select().from(eventLogs).orderBy(desc(eventLogs.id)).limit(limit);
  }

  async enqueueMessage(entry: InsertMessageQueue): Promise<MessageQueue> {
    const [row] = await db.insert(messageQueue).values(entry).returning();
    return row;
  }

  async listPendingMessages(params: { limit: number; now: Date }): Promise<MessageQueue[]> {
    return db
      .select()
      .from(messageQueue)
      .where(
        and(
          eq(messageQueue.status, "pending"),
          or(isNull(messageQueue.nextAttemptAt), lte(messageQueue.nextAttemptAt, params.now)),
        ),
      )
      .orderBy(asc(messageQueue.id))
      .limit(params.limit);
  }

  async updateMessage(
    id: number,
    updates: Partial<InsertMessageQueue>,
  ): Promise<MessageQueue | undefined> {
    const [row] = await db
      .update(messageQueue)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(messageQueue.id, id))
      .returning();
    return row;
  }

  async createBackupRecord(entry: InsertBackup): Promise<Backup> {
    const [row] = await db.insert(backups).values(entry).returning();
    return row;
  }

  async updateBackupRecord(id: number, updates: Partial<InsertBackup>): Promise<Backup | undefined> {
    const [row] = await db.update(backups).set(updates).where(eq(backups.id, id)).returning();
    return row;
  }
}

export const storage = new DatabaseStorage();
