import { z } from "zod";
import { ConfigError } from "./errors";
import type { RetryPolicy } from "./retry";

export type PanelCredentials = Readonly<{
  url: string;
  username: string;
  password: string;
}>;

const csv = z
  .string()
  .optional()
  .transform((value) =>
    (value || "")
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  );

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ""
        ? fallback
        : ["1", "true", "yes", "on"].includes(value.trim().toLowerCase()),
    );

const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(fallback));

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: positiveInt(5000),
  BOT_TOKEN: z.string().trim().optional(),
  ADMIN_TELEGRAM_IDS: csv,
  ADMIN_API_TOKEN: z.string().trim().optional(),
  WEBHOOK_URL: z.string().trim().optional(),
  WEBHOOK_PATH: z.string().trim().optional().default("/telegraf"),
  PANEL_URL: z.string().trim().url(),
  PANEL_USERNAME: z.string().min(1),
  PANEL_PASSWORD: z.string().min(1),
  PANEL_TIMEOUT_MS: positiveInt(30_000),
  PANEL_RETRY_ATTEMPTS: positiveInt(3),
  PANEL_RETRY_BASE_MS: positiveInt(500),
  PANEL_RETRY_MAX_MS: positiveInt(10_000),
  PANEL_SESSION_TTL_SECONDS: positiveInt(3600),
  PANEL_SESSION_SKEW_SECONDS: nonNegativeInt(60),
  PANEL_PAGE_CONCURRENCY: positiveInt(4),
  POLL_INTERVAL_MINUTES: positiveInt(5),
  POLL_USER_CONCURRENCY: positiveInt(8),
  NOTIFICATIONS_ENABLED: flag(true),
  NOTIFY_ADMINS: flag(true),
  BACKUP_ENABLED: flag(true),
  BACKUP_INTERVAL_HOURS: positiveInt(24),
  BACKUP_DIR: z.string().trim().optional().default("backups"),
  MAX_BACKUPS: positiveInt(7),
  QUEUE_RATE_PER_SEC: positiveInt(25),
  QUEUE_BATCH_SIZE: positiveInt(50),
  QUEUE_RETRY_LIMIT: nonNegativeInt(2),
  QUEUE_RETRY_BASE_MS: positiveInt(1000),
}).superRefine((values, ctx) => {
  // A skew at or above the TTL would force a fresh login before every request.
  if (values.PANEL_SESSION_SKEW_SECONDS >= values.PANEL_SESSION_TTL_SECONDS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["PANEL_SESSION_SKEW_SECONDS"],
      message: `must be lower than PANEL_SESSION_TTL_SECONDS (${values.PANEL_SESSION_TTL_SECONDS})`,
    });
  }
});

export type AppConfig = {
  isProduction: boolean;
  port: number;
  botToken: string | null;
  adminTelegramIds: string[];
  adminApiToken: string | null;
  webhookUrl?: string;
  webhookPath: string;
  panel: {
    credentials: PanelCredentials;
    timeoutMs: number;
    retry: RetryPolicy;
    sessionTtlMs: number;
    sessionSkewMs: number;
    pageConcurrency: number;
  };
  poll: {
    intervalMs: number;
    userConcurrency: number;
  };
  notifications: {
    enabled: boolean;
    notifyAdmins: boolean;
  };
  backup: {
    enabled: boolean;
    intervalMs: number;
    directory: string;
    maxBackups: number;
  };
  queue: {
    ratePerSec: number;
    batchSize: number;
    retryLimit: number;
    retryBaseMs: number;
  };
};

function normalizeWebhookPath(pathValue: string) {
  const trimmed = pathValue.trim();
  if (!trimmed) return "/telegraf";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

function normalizeUrl(value?: string) {
  if (!value) return undefined;
  return value.trim().replace(/\/+$/, "") || undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  const values = parsed.data;

  return {
    isProduction: values.NODE_ENV === "production",
    port: values.PORT,
    botToken: values.BOT_TOKEN?.replace(/^["']|["']$/g, "") || null,
    adminTelegramIds: values.ADMIN_TELEGRAM_IDS,
    adminApiToken: values.ADMIN_API_TOKEN || null,
    webhookUrl: normalizeUrl(values.WEBHOOK_URL),
    webhookPath: normalizeWebhookPath(values.WEBHOOK_PATH),
    panel: {
      credentials: Object.freeze({
        url: normalizeUrl(values.PANEL_URL) ?? values.PANEL_URL,
        username: values.PANEL_USERNAME,
        password: values.PANEL_PASSWORD,
      }),
      timeoutMs: values.PANEL_TIMEOUT_MS,
      retry: {
        maxAttempts: values.PANEL_RETRY_ATTEMPTS,
        baseDelayMs: values.PANEL_RETRY_BASE_MS,
        maxDelayMs: Math.max(values.PANEL_RETRY_BASE_MS, values.PANEL_RETRY_MAX_MS),
        jitterRatio: 0.2,
      },
      sessionTtlMs: values.PANEL_SESSION_TTL_SECONDS * 1000,
      sessionSkewMs: values.PANEL_SESSION_SKEW_SECONDS * 1000,
      pageConcurrency: values.PANEL_PAGE_CONCURRENCY,
    },
    poll: {
      intervalMs: values.POLL_INTERVAL_MINUTES * 60_000,
      userConcurrency: values.POLL_USER_CONCURRENCY,
    },
    notifications: {
      enabled: values.NOTIFICATIONS_ENABLED,
      notifyAdmins: values.NOTIFY_ADMINS,
    },
    backup: {
      enabled: values.BACKUP_ENABLED,
      intervalMs: values.BACKUP_INTERVAL_HOURS * 3_600_000,
      directory: values.BACKUP_DIR,
      maxBackups: values.MAX_BACKUPS,
    },
    queue: {
      ratePerSec: values.QUEUE_RATE_PER_SEC,
      batchSize: Math.min(200, values.QUEUE_BATCH_SIZE),
      retryLimit: values.QUEUE_RETRY_LIMIT,
      retryBaseMs: values.QUEUE_RETRY_BASE_MS,
    },
  };
}
