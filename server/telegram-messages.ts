import { Markup } from "telegraf";
import { buildRefreshCallback } from "./callback-data";

export function buildRefreshKeyboard(subscriberId: number) {
  return Markup.inlineKeyboard([
    [Markup.button.callback("🔄 Refresh", buildRefreshCallback(subscriberId))],
  ]);
}

export const HELP_TEXT = [
  "<b>Commands</b>",
  "/start - register with the bot",
  "/status - show your linked subscriptions",
  "/status &lt;link&gt; - link a subscription and show its usage",
  "/usage - data used against each limit",
  "/help - this message",
  "",
  "You can also send your vless://, vmess:// or trojan:// link directly.",
].join("\n");

export const ADMIN_HELP_TEXT = [
  "<b>Admin commands</b>",
  "/users - list subscribers",
  "/online - clients connected right now",
  "/setcap &lt;client&gt; &lt;GB|0&gt; - set the data limit, 0 removes it",
  "/setexpiry &lt;client&gt; &lt;days|0&gt; - set expiry from today, 0 removes it",
  "/poll - run a usage check now",
  "/backup - create a backup now",
  "/logs - recent events",
  "/broadcast &lt;message&gt; - send a message to every user",
  "/system - server status",
].join("\n");
