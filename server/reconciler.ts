import type { Subscriber, UserState } from "@shared/schema";
import { ReconciliationError } from "./errors";
import type { RawClientRecord } from "./panel/usage-fetcher";

/** Storage-agnostic view of a subscriber row. */
export type PersistedSubscription = Readonly<{
  userId: number;
  clientId: string;
  dataCapBytes: number | null;
  expiresAt: Date | null;
  lastObservedBytes: number;
}>;

export type UserStatus = Readonly<{
  userId: number;
  clientId: string;
  totalBytesUsed: number;
  dataCapBytes: number | null;
  expiresAt: Date | null;
  state: UserState;
  /** The panel counter went backwards since the last observation. */
  counterReset: boolean;
}>;

export type ReconciliationFailure = {
  userId: number;
  clientId: string;
  error: ReconciliationError;
};

export type BatchResult = {
  statuses: UserStatus[];
  failures: ReconciliationFailure[];
  /** Panel clients with no local subscriber. */
  unmatched: string[];
  /** Subscribers the panel did not report. */
  missing: PersistedSubscription[];
};

export function toPersistedSubscription(
  row: Pick<Subscriber, "id" | "clientId" | "dataCapBytes" | "expiresAt" | "lastObservedBytes">,
): PersistedSubscription {
  return Object.freeze({
    userId: row.id,
    clientId: row.clientId,
    dataCapBytes: row.dataCapBytes,
    expiresAt: row.expiresAt,
    lastObservedBytes: row.lastObservedBytes,
  });
}

function requireCounter(clientId: string, name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ReconciliationError(clientId, `${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function isValidDate(value: Date) {
  return !Number.isNaN(value.getTime());
}

function resolveExpiry(raw: RawClientRecord, stored: PersistedSubscription): Date | null {
  if (stored.expiresAt) {
    if (!isValidDate(stored.expiresAt)) {
      throw new ReconciliationError(raw.clientId, "stored expiry is not a valid date");
    }
    return stored.expiresAt;
  }
  if (!Number.isFinite(raw.panelExpiryTimestamp)) {
    throw new ReconciliationError(raw.clientId, "panel expiry is not a number");
  }
  return raw.panelExpiryTimestamp > 0 ? new Date(raw.panelExpiryTimestamp) : null;
}

export function deriveState(
  enabled: boolean,
  totalBytesUsed: number,
  dataCapBytes: number | null,
  expiresAt: Date | null,
  now: Date,
): UserState {
  if (!enabled) return "disabled";
  if (expiresAt && now.getTime() > expiresAt.getTime()) return "expired";
  if (dataCapBytes !== null && totalBytesUsed >= dataCapBytes) return "over_quota";
  return "active";
}

/**
 * Merges one panel record with the stored subscription. Pure: the result depends only on the
 * arguments, and the returned snapshot is frozen.
 */
export function reconcile(raw: RawClientRecord, stored: PersistedSubscription, now: Date): UserStatus {
  if (raw.clientId !== stored.clientId) {
    throw new ReconciliationError(
      raw.clientId,
      `record does not belong to subscription ${stored.clientId}`,
    );
  }
  if (!isValidDate(now)) {
    throw new ReconciliationError(raw.clientId, "reconciliation time is not a valid date");
  }

  const upload = requireCounter(raw.clientId, "uploadBytes", raw.uploadBytes);
  const download = requireCounter(raw.clientId, "downloadBytes", raw.downloadBytes);
  const previous = requireCounter(raw.clientId, "lastObservedBytes", stored.lastObservedBytes);
  const rawTotal = requireCounter(raw.clientId, "total usage", upload + download);

  const cap = stored.dataCapBytes;
  if (cap !== null && (!Number.isSafeInteger(cap) || cap < 0)) {
    throw new ReconciliationError(raw.clientId, `data cap must be a non-negative integer, got ${cap}`);
  }

  const expiresAt = resolveExpiry(raw, stored);

  return Object.freeze({
    userId: stored.userId,
    clientId: stored.clientId,
    totalBytesUsed: rawTotal,
    dataCapBytes: cap,
    expiresAt,
    state: deriveState(raw.enabled, rawTotal, cap, expiresAt, now),
    counterReset: rawTotal < previous,
  });
}

export function reconcileBatch(
  records: readonly RawClientRecord[],
  subscriptions: readonly PersistedSubscription[],
  now: Date,
): BatchResult {
  const byClient = new Map(
    subscriptions.map((subscription) => [subscription.clientId, subscription] as const),
  );
  const seen = new Set<string>();
  const result: BatchResult = { statuses: [], failures: [], unmatched: [], missing: [] };

  for (const record of records) {
    seen.add(record.clientId);
    const stored = byClient.get(record.clientId);
    if (!stored) {
      result.unmatched.push(record.clientId);
      continue;
    }
    try {
      result.statuses.push(reconcile(record, stored, now));
    } catch (error) {
      if (!(error instanceof ReconciliationError)) throw error;
      result.failures.push({ userId: stored.userId, clientId: stored.clientId, error });
    }
  }

  result.missing = subscriptions.filter((subscription) => !seen.has(subscription.clientId));
  return result;
}
