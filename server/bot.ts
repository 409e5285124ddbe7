import { Telegraf, type Context } from "telegraf";
import { parseRefreshCallback } from "./callback-data";
import type { BotCommands, Reply } from "./commands";
import { describeError, logJson, type Logger } from "./logger";
import type { IStorage } from "./storage";
import { ADMIN_HELP_TEXT, HELP_TEXT, buildRefreshKeyboard } from "./telegram-messages";

export const FAILURE_TEXT = "Something went wrong. Please try again later.";
export const ADMIN_ONLY_TEXT = "This command is for administrators only.";

type BotCommandDefinition = {
  command: string;
  description: string;
  adminOnly: boolean;
};

export type CreateBotOptions = {
  token: string;
  commands: BotCommands;
  storage: Pick<IStorage, "createEventLog" | "touchTelegramUser">;
  logger?: Logger;
};

export function replyExtra(reply: Reply) {
  return {
    parse_mode: "HTML" as const,
    ...(reply.subscriberId
      ? { reply_markup: buildRefreshKeyboard(reply.subscriberId).reply_markup }
      : {}),
  };
}

export function createBot(options: CreateBotOptions) {
  const { commands, storage } = options;
  const logger = options.logger ?? console;
  const bot = new Telegraf(options.token);
  const definitions: BotCommandDefinition[] = [];

  const send = async (ctx: Context, replies: Reply | Reply[]) => {
    for (const reply of Array.isArray(replies) ? replies : [replies]) {
      await ctx.reply(reply.text, replyExtra(reply));
    }
  };

  const recordEvent = async (
    telegramId: string,
    eventType: string,
    message: string,
    level: "info" | "error" = "info",
  ) => {
    try {
      await storage.createEventLog({ level, eventType, telegramId, message });
      await storage.touchTelegramUser(telegramId, new Date());
    } catch (error) {
      logJson("warn", "bot.event_log_failed", { eventType, error: describeError(error) }, logger);
    }
  };

  const run = async (
    ctx: Context,
    eventType: string,
    handler: (telegramId: string) => Promise<void>,
  ) => {
    if (!ctx.from) return;
    const telegramId = String(ctx.from.id);
    const text = ctx.message && "text" in ctx.message ? ctx.message.text : eventType;
    await recordEvent(telegramId, eventType, text);
    try {
      await handler(telegramId);
    } catch (error) {
      logJson(
        "error",
        "bot.handler_failed",
        { eventType, telegramId, error: describeError(error) },
        logger,
      );
      await recordEvent(telegramId, `${eventType}.failed`, describeError(error), "error");
      await ctx.reply(FAILURE_TEXT);
    }
  };

  const addCommand = (
    command: string,
    description: string,
    handler: (ctx: Context & { payload: string }, telegramId: string) => Promise<void>,
    adminOnly = false,
  ) => {
    definitions.push({ command, description, adminOnly });
    bot.command(command, (ctx) =>
      run(ctx, `command.${command}`, async (telegramId) => {
        if (adminOnly && !commands.isAdmin(telegramId)) {
          await ctx.reply(ADMIN_ONLY_TEXT);
          return;
        }
        await handler(ctx, telegramId);
      }),
    );
  };

  bot.catch((error, ctx) => {
    logJson(
      "error",
      "bot.update_failed",
      { updateId: ctx.update.update_id, error: describeError(error) },
      logger,
    );
  });

  addCommand("start", "Register with the bot", async (ctx, telegramId) => {
    await send(
      ctx,
      await commands.start({
        telegramId,
        username: ctx.from?.username,
        firstName: ctx.from?.first_name,
        lastName: ctx.from?.last_name,
        languageCode: ctx.from?.language_code,
      }),
    );
  });

  addCommand("help", "List commands", async (ctx, telegramId) => {
    const text = commands.isAdmin(telegramId) ? `${HELP_TEXT}\n\n${ADMIN_HELP_TEXT}` : HELP_TEXT;
    await ctx.reply(text, { parse_mode: "HTML" });
  });

  addCommand("status", "Show subscription usage", async (ctx, telegramId) => {
    const replies = ctx.payload.trim()
      ? await commands.link(telegramId, ctx.payload)
      : await commands.status(telegramId);
    await send(ctx, replies);
  });

  addCommand("usage", "Show data used against the limit", async (ctx, telegramId) => {
    const reply = ctx.payload.trim()
      ? await commands.link(telegramId, ctx.payload)
      : await commands.usage(telegramId);
    await send(ctx, reply);
  });

  addCommand("users", "List subscribers", async (ctx) => send(ctx, await commands.users()), true);
  addCommand("online", "Online clients", async (ctx) => send(ctx, await commands.online()), true);
  addCommand(
    "setcap",
    "Set a data limit in GB",
    async (ctx) => send(ctx, await commands.setCap(ctx.payload)),
    true,
  );
  addCommand(
    "setexpiry",
    "Set expiry in days",
    async (ctx) => send(ctx, await commands.setExpiry(ctx.payload)),
    true,
  );
  addCommand("poll", "Check usage now", async (ctx) => send(ctx, await commands.poll()), true);
  addCommand(
    "backup",
    "Create a backup",
    async (ctx, telegramId) => send(ctx, await commands.backup(telegramId)),
    true,
  );
  addCommand("logs", "Recent events", async (ctx) => send(ctx, await commands.logs()), true);
  addCommand(
    "broadcast",
    "Message every user",
    async (ctx) => send(ctx, await commands.broadcast(ctx.payload)),
    true,
  );
  addCommand("system", "Server status", async (ctx) => send(ctx, commands.system()), true);

  bot.hears(/(?:vless|vmess|trojan):\/\//i, (ctx) =>
    run(ctx, "link", async (telegramId) => {
      await send(ctx, await commands.link(telegramId, ctx.message.text));
    }),
  );

  bot.on("callback_query", (ctx) =>
    run(ctx, "callback.refresh", async (telegramId) => {
      const data = "data" in ctx.callbackQuery ? ctx.callbackQuery.data : undefined;
      const parsed = parseRefreshCallback(data);
      if (!parsed) {
        await ctx.answerCbQuery();
        return;
      }
      const reply = await commands.refresh(telegramId, parsed.subscriberId);
      await ctx.answerCbQuery("Updated");
      try {
        await ctx.editMessageText(reply.text, replyExtra(reply));
      } catch (error) {
        // Unchanged text is rejected by Telegram; send a fresh message instead.
        logJson("warn", "bot.edit_failed", { error: describeError(error) }, logger);
        await send(ctx, reply);
      }
    }),
  );

  const publishCommands = () =>
    bot.telegram.setMyCommands(
      definitions
        .filter((definition) => !definition.adminOnly)
        .map(({ command, description }) => ({ command, description })),
    );

  return { bot, definitions, publishCommands };
}

export type BotRuntime = ReturnType<typeof createBot>;
