import type { NotificationKind } from "@shared/schema";
import { formatAdminAlert, formatNotification } from "./format";
import type { UserStatus } from "./reconciler";
import type { IStorage } from "./storage";
import type { QueuePayload } from "./queue-worker";

export interface NotificationDispatcher {
  /** Queues the messages for one transition and returns how many were queued. */
  dispatch(kind: NotificationKind, status: UserStatus, telegramId: string | null): Promise<number>;
}

export type QueueNotificationDispatcherOptions = {
  storage: Pick<IStorage, "enqueueMessage">;
  adminTelegramIds: string[];
  notifyAdmins: boolean;
};

export class QueueNotificationDispatcher implements NotificationDispatcher {
  constructor(private readonly options: QueueNotificationDispatcherOptions) {}

  async dispatch(kind: NotificationKind, status: UserStatus, telegramId: string | null) {
    let queued = 0;

    if (telegramId) {
      const payload: QueuePayload = {
        text: formatNotification(kind, status),
        subscriberId: status.userId,
      };
      await this.options.storage.enqueueMessage({
        type: "notification",
        subscriberId: status.userId,
        telegramId,
        payload: JSON.stringify(payload),
        status: "pending",
      });
      queued += 1;
    }

    if (this.options.notifyAdmins) {
      const payload: QueuePayload = { text: formatAdminAlert(kind, status, telegramId) };
      for (const adminId of this.options.adminTelegramIds) {
        await this.options.storage.enqueueMessage({
          type: "admin_alert",
          subscriberId: status.userId,
          telegramId: adminId,
          payload: JSON.stringify(payload),
          status: "pending",
        });
        queued += 1;
      }
    }

    return queued;
  }
}
