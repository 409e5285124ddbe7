import type { Logger } from "./logger";

export type TelegramApiLike = {
  deleteWebhook: (options: { drop_pending_updates: boolean }) => Promise<unknown>;
  setWebhook: (url: string) => Promise<unknown>;
};

export type TelegramBotLike = {
  telegram: TelegramApiLike;
  launch: (options: { dropPendingUpdates: boolean }) => Promise<void>;
};

export type TelegramMode = "webhook" | "polling" | "disabled";

/**
 * Webhook in production when WEBHOOK_URL is set, long polling outside production.
 * Polling runs in the background; launch failures are logged.
 */
export async function startTelegramRuntime(options: {
  bot: TelegramBotLike;
  webhookUrl?: string;
  webhookPath: string;
  isProduction: boolean;
  logger?: Logger;
}): Promise<TelegramMode> {
  const { bot, webhookUrl, webhookPath, isProduction } = options;
  const logger = options.logger ?? console;

  if (isProduction && webhookUrl) {
    logger.log("Bot mode: webhook");
    try {
      await bot.telegram.deleteWebhook({ drop_pending_updates: true });
      await bot.telegram.setWebhook(`${webhookUrl}${webhookPath}`);
      logger.log(`Webhook registered: ${webhookUrl}${webhookPath}`);
    } catch (error) {
      logger.error("Failed to configure Telegram webhook:", error);
    }
    return "webhook";
  }

  if (!isProduction) {
    if (webhookUrl) {
      logger.warn("WEBHOOK_URL is set but NODE_ENV is not production. Polling mode enabled.");
    }
    logger.log("Bot mode: polling");
    bot.launch({ dropPendingUpdates: true }).catch((error: unknown) => {
      logger.error("Telegram polling stopped with an error:", error);
    });
    return "polling";
  }

  logger.warn("[telegram] BOT_TOKEN set but WEBHOOK_URL missing in production. Bot not started.");
  return "disabled";
}
