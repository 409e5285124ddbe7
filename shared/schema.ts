import {
  pgTable,
  serial,
  text,
  integer,
  bigint,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { relations } from "drizzle-orm";

export const USER_STATES = ["active", "expired", "over_quota", "disabled"] as const;

export const USER_STATE_LABELS: Record<(typeof USER_STATES)[number], string> = {
  active: "Active",
  expired: "Expired",
  over_quota: "Over quota",
  disabled: "Disabled",
};

export const NOTIFICATION_KINDS = [
  "expired",
  "over_quota",
  "disabled",
  "reactivated",
] as const;

export const MESSAGE_TYPES = ["notification", "admin_alert", "broadcast"] as const;

export const MESSAGE_STATUSES = ["pending", "sent", "failed"] as const;

export const BACKUP_STATUSES = ["in_progress", "completed", "failed"] as const;

export const EVENT_LEVELS = ["info", "warn", "error"] as const;

export const telegramUsers = pgTable(
  "telegram_users",
  {
    id: serial("id").primaryKey(),
    telegramId: text("telegram_id").notNull(),
    username: text("username"),
    firstName: text("first_name"),
    lastName: text("last_name"),
    languageCode: text("language_code"),
    isAdmin: boolean("is_admin").default(false).notNull(),
    telegramStatus: text("telegram_status").default("active"),
    totalCommands: integer("total_commands").default(0).notNull(),
    lastSeen: timestamp("last_seen", { mode: "date" }),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow(),
    updatedAt: timestamp("updated_at", { mode: "date" }).defaultNow(),
  },
  (table) => ({
    telegramUsersTelegramIdUnique: uniqueIndex("telegram_users_telegram_id_unique").on(
      table.telegramId,
    ),
  }),
);

export const subscribers = pgTable(
  "subscribers",
  {
    id: serial("id").primaryKey(),
    clientId: text("client_id").notNull(),
    clientUuid: text("client_uuid"),
    telegramId: text("telegram_id"),
    dataCapBytes: bigint("data_cap_bytes", { mode: "number" }),
    expiresAt: timestamp("expires_at", { mode: "date" }),
    lastObservedBytes: bigint("last_observed_bytes", { mode: "number" }).default(0).notNull(),
    lastState: text("last_state"),
    lastNotifiedState: text("last_notified_state"),
    lastCheckedAt: timestamp("last_checked_at", { mode: "date" }),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow(),
    updatedAt: timestamp("updated_at", { mode: "date" }).defaultNow(),
  },
  (table) => ({
    subscribersClientIdUnique: uniqueIndex("subscribers_client_id_unique").on(table.clientId),
    subscribersTelegramIdIndex: index("subscribers_telegram_id_index").on(table.telegramId),
    subscribersLastStateIndex: index("subscribers_last_state_index").on(table.lastState),
  }),
);

export const eventLogs = pgTable(
  "event_logs",
  {
    id: serial("id").primaryKey(),
    level: text("level", { enum: EVENT_LEVELS }).default("info").notNull(),
    eventType: text("event_type").notNull(),
    telegramId: text("telegram_id"),
    message: text("message"),
    details: text("details"),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow(),
  },
  (table) => ({
    eventLogsCreatedAtIndex: index("event_logs_created_at_index").on(table.createdAt),
    eventLogsEventTypeIndex: index("event_logs_event_type_index").on(table.eventType),
  }),
);

export const messageQueue = pgTable(
  "message_queue",
  {
    id: serial("id").primaryKey(),
    type: text("type", { enum: MESSAGE_TYPES }).notNull(),
    subscriberId: integer("subscriber_id").references(() => subscribers.id),
    telegramId: text("telegram_id"),
    payload: text("payload").notNull(),
    status: text("status", { enum: MESSAGE_STATUSES }).default("pending").notNull(),
    attempts: integer("attempts").default(0),
    lastErrorCode: integer("last_error_code"),
    lastErrorMessage: text("last_error_message"),
    nextAttemptAt: timestamp("next_attempt_at", { mode: "date" }),
    deliveredAt: timestamp("delivered_at", { mode: "date" }),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow(),
    updatedAt: timestamp("updated_at", { mode: "date" }).defaultNow(),
  },
  (table) => ({
    messageQueueStatusIndex: index("message_queue_status_index").on(
      table.status,
      table.nextAttemptAt,
    ),
  }),
);

export const backups = pgTable(
  "backups",
  {
    id: serial("id").primaryKey(),
    fileName: text("file_name").notNull(),
    trigger: text("trigger").default("scheduled").notNull(),
    status: text("status", { enum: BACKUP_STATUSES }).default("in_progress").notNull(),
    sizeBytes: integer("size_bytes"),
    errorMessage: text("error_message"),
    createdBy: text("created_by"),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow(),
    completedAt: timestamp("completed_at", { mode: "date" }),
  },
  (table) => ({
    backupsCreatedAtIndex: index("backups_created_at_index").on(table.createdAt),
  }),
);

export const subscribersRelations = relations(subscribers, ({ many }) => ({
  messages: many(messageQueue),
}));

export const messageQueueRelations = relations(messageQueue, ({ one }) => ({
  subscriber: one(subscribers, {
    fields: [messageQueue.subscriberId],
    references: [subscribers.id],
  }),
}));

export const insertTelegramUserSchema = createInsertSchema(telegramUsers).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertSubscriberSchema = createInsertSchema(subscribers).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertEventLogSchema = createInsertSchema(eventLogs).omit({
  id: true,
  createdAt: true,
});

export const insertMessageQueueSchema = createInsertSchema(messageQueue).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertBackupSchema = createInsertSchema(backups).omit({
  id: true,
  createdAt: true,
});

export type UserState = (typeof USER_STATES)[number];
export type NotificationKind = (typeof NOTIFICATION_KINDS)[number];
export type TelegramUser = typeof telegramUsers.$inferSelect;
export type InsertTelegramUser = z.infer<typeof insertTelegramUserSchema>;
export type Subscriber = typeof subscribers.$inferSelect;
export type InsertSubscriber = z.infer<typeof insertSubscriberSchema>;
export type EventLog = typeof eventLogs.$inferSelect;
export type InsertEventLog = z.infer<typeof insertEventLogSchema>;
export type MessageQueue = typeof messageQueue.$inferSelect;
export type InsertMessageQueue = z.infer<typeof insertMessageQueueSchema>;
export type Backup = typeof backups.$inferSelect;
export type InsertBackup = z.infer<typeof insertBackupSchema>;

export function isUserState(value: unknown): value is UserState {
  return USER_STATES.some((state) => state === value);
}
