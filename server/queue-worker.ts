import { setTimeout as delay } from "node:timers/promises";
import type { Telegram } from "telegraf";
import { z } from "zod";
import type { MessageQueue } from "@shared/schema";
import { describeError, logJson, type Logger } from "./logger";
import type { IStorage } from "./storage";
import { buildRefreshKeyboard } from "./telegram-messages";

export type SendExtra = Parameters<Telegram["sendMessage"]>[2];

export interface MessageSender {
  sendMessage(chatId: string, text: string, extra?: SendExtra): Promise<unknown>;
}

export type QueueStorage = Pick<
  IStorage,
  "listPendingMessages" | "updateMessage" | "updateTelegramUserStatus"
>;

export const queuePayloadSchema = z.object({
  text: z.string().min(1),
  subscriberId: z.number().int().positive().optional(),
});

export type QueuePayload = z.infer<typeof queuePayloadSchema>;

export type SendFailure = {
  errorCode: number | null;
  networkCode: string | null;
  errorMessage: string;
};

export function describeSendError(error: unknown): SendFailure {
  let errorCode: number | null = null;
  let networkCode: string | null = null;
  let errorMessage = error instanceof Error && error.message ? error.message : "unknown_error";

  if (error && typeof error === "object") {
    const response: unknown = "response" in error ? error.response : undefined;
    if (response && typeof response === "object") {
      if ("error_code" in response && typeof response.error_code === "number") {
        errorCode = response.error_code;
      }
      if ("description" in response && typeof response.description === "string") {
        errorMessage = response.description;
      }
    }
    if ("code" in error && typeof error.code === "string") {
      networkCode = error.code;
    }
  }
  return { errorCode, networkCode, errorMessage };
}

export function isTransientFailure(failure: SendFailure) {
  const code = failure.errorCode;
  if (code === 429) return true;
  if (code !== null && code >= 500 && code <= 599) return true;
  return failure.networkCode === "ETIMEDOUT" || failure.networkCode === "ECONNRESET";
}

export function resolveTelegramStatus(failure: SendFailure) {
  if (failure.errorCode === 403) return "blocked";
  if (failure.errorCode === 400) return "inactive";
  return null;
}

function readPayload(raw: string): QueuePayload | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = queuePayloadSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

export type QueueWorkerOptions = {
  storage: QueueStorage;
  sender: MessageSender;
  ratePerSec: number;
  batchSize: number;
  retryLimit: number;
  retryBaseMs: number;
  idleDelayMs?: number;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
};

export function createQueueWorker(options: QueueWorkerOptions) {
  const { storage, sender } = options;
  const logger = options.logger ?? console;
  const now = options.now ?? (() => new Date());
  const sleep = options.sleep ?? delay;
  const ratePerSec = Math.max(1, options.ratePerSec);
  const batchSize = Math.max(1, options.batchSize);
  const retryLimit = Math.max(0, options.retryLimit);
  const retryBaseMs = Math.max(250, options.retryBaseMs);
  const idleDelayMs = options.idleDelayMs ?? 500;

  let stopped = true;
  let loopPromise: Promise<void> | null = null;

  const deliver = async (entry: MessageQueue) => {
    const payload = readPayload(entry.payload);
    if (!payload || !entry.telegramId) {
      const reason = payload ? "missing_telegram_id" : "invalid_payload";
      logJson("error", "queue.send_failed", { queueId: entry.id, errorMessage: reason }, logger);
      await storage.updateMessage(entry.id, { status: "failed", lastErrorMessage: reason });
      return;
    }

    const attempts = (entry.attempts ?? 0) + 1;
    try {
      await sender.sendMessage(entry.telegramId, payload.text, {
        parse_mode: "HTML",
        ...(payload.subscriberId
          ? { reply_markup: buildRefreshKeyboard(payload.subscriberId).reply_markup }
          : {}),
      });
      await storage.updateMessage(entry.id, {
        status: "sent",
        attempts,
        lastErrorCode: null,
        lastErrorMessage: null,
        nextAttemptAt: null,
        deliveredAt: now(),
      });
    } catch (error) {
      const failure = describeSendError(error);
      const transient = isTransientFailure(failure);
      const logPayload = {
        queueId: entry.id,
        telegramId: entry.telegramId,
        errorCode: failure.errorCode,
        errorMessage: failure.errorMessage,
        attempts,
      };

      if (failure.errorCode === 429) {
        logJson("warn", "queue.rate_limited", logPayload, logger);
      } else if (!transient) {
        logJson("error", "queue.send_failed", logPayload, logger);
      }

      if (transient && attempts <= retryLimit) {
        const backoffMs = retryBaseMs * 2 ** (attempts - 1);
        await storage.updateMessage(entry.id, {
          status: "pending",
          attempts,
          lastErrorCode: failure.errorCode,
          lastErrorMessage: failure.errorMessage,
          nextAttemptAt: new Date(now().getTime() + backoffMs),
        });
        return;
      }

      await storage.updateMessage(entry.id, {
        status: "failed",
        attempts,
        lastErrorCode: failure.errorCode,
        lastErrorMessage: failure.errorMessage,
        nextAttemptAt: null,
      });

      const telegramStatus = resolveTelegramStatus(failure);
      if (telegramStatus) {
        await storage.updateTelegramUserStatus(entry.telegramId, telegramStatus);
      }
    }
  };

  /** Delivers one batch of due messages and returns how many were handled. */
  const processOnce = async () => {
    const pending = await storage.listPendingMessages({ limit: batchSize, now: now() });
    for (const entry of pending) {
      await deliver(entry);
    }
    if (pending.length > 0) {
      await sleep(Math.ceil((pending.length / ratePerSec) * 1000));
    }
    return pending.length;
  };

  const loop = async () => {
    while (!stopped) {
      let processed = 0;
      try {
        processed = await processOnce();
      } catch (error) {
        logJson("error", "queue.worker_failed", { error: describeError(error) }, logger);
      }
      if (processed === 0 && !stopped) {
        await sleep(idleDelayMs);
      }
    }
  };

  return {
    processOnce,
    start() {
      if (loopPromise) return;
      stopped = false;
      loopPromise = loop();
    },
    async stop() {
      stopped = true;
      if (loopPromise) {
        await loopPromise;
        loopPromise = null;
        logger.log("[queue] worker stopped");
      }
    },
  };
}

export type QueueWorker = ReturnType<typeof createQueueWorker>;
