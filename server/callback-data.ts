export const REFRESH_PREFIX = "usage:refresh:";

export function buildRefreshCallback(subscriberId: number) {
  return `${REFRESH_PREFIX}${subscriberId}`;
}

export function parseRefreshCallback(data?: string | null): { subscriberId: number } | null {
  if (!data || !data.startsWith(REFRESH_PREFIX)) return null;
  const raw = data.slice(REFRESH_PREFIX.length);
  if (!/^\d+$/.test(raw)) return null;
  const subscriberId = Number(raw);
  if (!Number.isSafeInteger(subscriberId) || subscriberId <= 0) return null;
  return { subscriberId };
}
