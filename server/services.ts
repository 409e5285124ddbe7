import type { AppConfig } from "./config";
import type { Logger } from "./logger";
import { NotificationGate } from "./notification-gate";
import { QueueNotificationDispatcher } from "./notifier";
import { PanelApi } from "./panel/client-api";
import { PanelSession } from "./panel/session";
import { UsageFetcher } from "./panel/usage-fetcher";
import { UsagePipeline } from "./pipeline";
import { createTicker } from "./scheduler";
import type { IStorage } from "./storage";

/** Wires the panel session, usage pipeline and poll ticker from configuration. */
export function createPollServices(config: AppConfig, storage: IStorage, logger: Logger = console) {
  const session = new PanelSession({
    credentials: config.panel.credentials,
    timeoutMs: config.panel.timeoutMs,
    sessionTtlMs: config.panel.sessionTtlMs,
    skewMs: config.panel.sessionSkewMs,
    retry: config.panel.retry,
    logger,
  });
  const pipeline = new UsagePipeline({
    session,
    fetcher: new UsageFetcher({ pageConcurrency: config.panel.pageConcurrency, logger }),
    storage,
    gate: new NotificationGate(storage),
    dispatcher: new QueueNotificationDispatcher({
      storage,
      adminTelegramIds: config.adminTelegramIds,
      notifyAdmins: config.notifications.notifyAdmins,
    }),
    userConcurrency: config.poll.userConcurrency,
    notificationsEnabled: config.notifications.enabled,
    logger,
  });
  const pollTicker = createTicker({
    name: "poll",
    intervalMs: config.poll.intervalMs,
    task: () => pipeline.runCycle(),
    runOnStart: true,
    logger,
  });
  return { session, pipeline, pollTicker, panel: new PanelApi(session) };
}
