import PQueue from "p-queue";
import { describeError, logJson, type Logger } from "./logger";
import type { NotificationGate } from "./notification-gate";
import type { NotificationDispatcher } from "./notifier";
import type { PanelSession } from "./panel/session";
import type { UsageFetcher } from "./panel/usage-fetcher";
import { reconcileBatch, toPersistedSubscription, type UserStatus } from "./reconciler";
import type { IStorage } from "./storage";

export type CycleFailure = {
  userId: number;
  clientId: string;
  stage: "reconcile" | "persist" | "notify";
  message: string;
};

export type CycleReport = {
  startedAt: Date;
  finishedAt: Date;
  fetched: number;
  reconciled: number;
  failures: CycleFailure[];
  notified: number;
  unmatched: number;
  missing: number;
  /** Set when the cycle could not fetch usage at all. */
  error?: string;
};

export type PipelineStorage = Pick<IStorage, "listSubscribers" | "recordObservation">;

export type UsagePipelineOptions = {
  session: PanelSession;
  fetcher: Pick<UsageFetcher, "fetchAll">;
  storage: PipelineStorage;
  gate: NotificationGate;
  dispatcher: NotificationDispatcher;
  userConcurrency?: number;
  notificationsEnabled?: boolean;
  logger?: Logger;
  now?: () => Date;
};

export class UsagePipeline {
  private readonly previous = new Map<number, UserStatus>();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly userConcurrency: number;
  private readonly notificationsEnabled: boolean;
  private lastReport: CycleReport | null = null;

  constructor(private readonly options: UsagePipelineOptions) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.userConcurrency = Math.max(1, options.userConcurrency ?? 8);
    this.notificationsEnabled = options.notificationsEnabled ?? true;
  }

  get latestReport() {
    return this.lastReport;
  }

  /** Last snapshot that was fully processed for the user. */
  snapshot(userId: number) {
    return this.previous.get(userId) ?? null;
  }

  async runCycle(): Promise<CycleReport> {
    const startedAt = this.now();
    const report: CycleReport = {
      startedAt,
      finishedAt: startedAt,
      fetched: 0,
      reconciled: 0,
      failures: [],
      notified: 0,
      unmatched: 0,
      missing: 0,
    };

    try {
      const [records, rows] = await Promise.all([
        this.options.fetcher.fetchAll(this.options.session),
        this.options.storage.listSubscribers(),
      ]);
      report.fetched = records.length;

      const batch = reconcileBatch(records, rows.map(toPersistedSubscription), startedAt);
      report.unmatched = batch.unmatched.length;
      report.missing = batch.missing.length;
      for (const failure of batch.failures) {
        report.failures.push({
          userId: failure.userId,
          clientId: failure.clientId,
          stage: "reconcile",
          message: failure.error.message,
        });
        logJson(
          "warn",
          "poll.reconcile_failed",
          { userId: failure.userId, error: failure.error.message },
          this.logger,
        );
      }

      const owners = new Map(rows.map((row) => [row.id, row.telegramId] as const));
      const queue = new PQueue({ concurrency: this.userConcurrency });
      await Promise.all(
        batch.statuses.map((status) =>
          queue.add(() => this.processUser(status, owners.get(status.userId) ?? null, report), {
            throwOnTimeout: true,
          }),
        ),
      );
    } catch (error) {
      report.error = describeError(error);
    }

    report.finishedAt = this.now();
    this.lastReport = report;
    logJson(
      report.error ? "error" : "log",
      report.error ? "poll.cycle_failed" : "poll.cycle_completed",
      {
        durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
        fetched: report.fetched,
        reconciled: report.reconciled,
        failed: report.failures.length,
        notified: report.notified,
        unmatched: report.unmatched,
        missing: report.missing,
        ...(report.error ? { error: report.error } : {}),
      },
      this.logger,
    );
    return report;
  }

  private async processUser(status: UserStatus, telegramId: string | null, report: CycleReport) {
    let stage: CycleFailure["stage"] = "persist";
    try {
      await this.options.storage.recordObservation(status.userId, {
        lastObservedBytes: status.totalBytesUsed,
        lastState: status.state,
        lastCheckedAt: this.now(),
      });
      if (status.counterReset) {
        logJson(
          "warn",
          "poll.counter_reset",
          { userId: status.userId, totalBytesUsed: status.totalBytesUsed },
          this.logger,
        );
      }

      if (this.notificationsEnabled) {
        stage = "notify";
        const kind = await this.options.gate.evaluate(this.snapshot(status.userId), status);
        if (kind) {
          await this.options.dispatcher.dispatch(kind, status, telegramId);
          await this.options.gate.acknowledge(status.userId, status.state);
          report.notified += 1;
        }
      }

      this.previous.set(status.userId, status);
      report.reconciled += 1;
    } catch (error) {
      report.failures.push({
        userId: status.userId,
        clientId: status.clientId,
        stage,
        message: describeError(error),
      });
      logJson(
        "error",
        "poll.user_failed",
        { userId: status.userId, stage, error: describeError(error) },
        this.logger,
      );
    }
  }
}
