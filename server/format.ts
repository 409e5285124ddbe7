import { USER_STATE_LABELS, type NotificationKind } from "@shared/schema";
import type { UserStatus } from "./reconciler";

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"];
const DAY_MS = 86_400_000;

export function escapeHtml(value: string) {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatBytes(bytes: number) {
  if (!Number.isFinite(bytes) || bytes < 1024) {
    return `${Math.max(0, Math.round(bytes) || 0)} B`;
  }
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatExpiry(expiresAt: Date | null, now: Date) {
  if (!expiresAt) return "Never";
  const day = expiresAt.toISOString().slice(0, 10);
  const remainingMs = expiresAt.getTime() - now.getTime();
  if (remainingMs <= 0) return `${day} (expired)`;
  const days = Math.ceil(remainingMs / DAY_MS);
  return `${day} (${days} day${days === 1 ? "" : "s"} left)`;
}

export function formatPercent(part: number, whole: number) {
  if (whole <= 0) return "100.0%";
  return `${((part / whole) * 100).toFixed(1)}%`;
}

export function formatDuration(seconds: number) {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return days > 0 ? `${days}d ${hours}h ${minutes}m` : `${hours}h ${minutes}m`;
}

export function formatStatusMessage(status: UserStatus, now: Date) {
  const lines = [
    `<b>Subscription</b> <code>${escapeHtml(status.clientId)}</code>`,
    `State: ${USER_STATE_LABELS[status.state]}`,
    `Used: ${formatBytes(status.totalBytesUsed)}`,
    `Limit: ${status.dataCapBytes === null ? "Unlimited" : formatBytes(status.dataCapBytes)}`,
  ];
  if (status.dataCapBytes !== null) {
    lines.push(`Remaining: ${formatBytes(Math.max(0, status.dataCapBytes - status.totalBytesUsed))}`);
  }
  lines.push(`Expires: ${formatExpiry(status.expiresAt, now)}`);
  return lines.join("\n");
}

export function formatNotification(kind: NotificationKind, status: UserStatus) {
  const client = `<code>${escapeHtml(status.clientId)}</code>`;
  switch (kind) {
    case "expired":
      return `⛔ Subscription ${client} has expired.`;
    case "over_quota":
      return `⚠️ Subscription ${client} has used its data limit (${formatBytes(status.totalBytesUsed)} of ${formatBytes(status.dataCapBytes ?? 0)}).`;
    case "disabled":
      return `🚫 Subscription ${client} was disabled on the panel.`;
    case "reactivated":
      return `✅ Subscription ${client} is active again.`;
  }
}

export function formatAdminAlert(kind: NotificationKind, status: UserStatus, telegramId: string | null) {
  return [
    `🔔 <b>${kind}</b> <code>${escapeHtml(status.clientId)}</code>`,
    `State: ${USER_STATE_LABELS[status.state]}`,
    `Used: ${formatBytes(status.totalBytesUsed)}`,
    `Owner: ${telegramId ?? "not linked"}`,
  ].join("\n");
}

export function formatUsageLine(status: UserStatus) {
  const client = `<code>${escapeHtml(status.clientId)}</code>`;
  const used = formatBytes(status.totalBytesUsed);
  if (status.dataCapBytes === null) {
    return `${client}: ${used} used, no limit`;
  }
  return `${client}: ${used} of ${formatBytes(status.dataCapBytes)} (${formatPercent(status.totalBytesUsed, status.dataCapBytes)})`;
}
