import type { NotificationKind, UserState } from "@shared/schema";
import type { UserStatus } from "./reconciler";

export interface NotificationStateStore {
  getLastNotifiedState(userId: number): Promise<UserState | null>;
  setLastNotifiedState(userId: number, state: UserState): Promise<void>;
}

function kindForTransition(from: UserState | null, to: UserState): NotificationKind | null {
  if (from === to) return null;
  if (to === "active") return from === null ? null : "reactivated";
  return to;
}

/**
 * Returns the message to send for a status change, or null when nothing changed.
 * A user seen for the first time is only reported when not active.
 */
export function shouldNotify(previous: UserStatus | null, current: UserStatus): NotificationKind | null {
  return kindForTransition(previous?.state ?? null, current.state);
}

export class NotificationGate {
  constructor(private readonly store: NotificationStateStore) {}

  async evaluate(previous: UserStatus | null, current: UserStatus): Promise<NotificationKind | null> {
    const lastNotified = await this.store.getLastNotifiedState(current.userId);
    const baseline = previous?.state ?? lastNotified;
    const kind = kindForTransition(baseline, current.state);
    if (!kind) return null;
    // Already told about this state, e.g. before a restart.
    if (lastNotified === current.state) return null;
    return kind;
  }

  /** Records a delivered notification; call only after the dispatch succeeded. */
  acknowledge(userId: number, state: UserState) {
    return this.store.setLastNotifiedState(userId, state);
  }
}
