import { vi } from "vitest";

export const createLogger = () => ({
  log: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

/** Parses the JSON lines written by logJson to one logger method. */
export function loggedEvents(method: { mock: { calls: unknown[][] } }) {
  return method.mock.calls.flatMap(([line]) => {
    if (typeof line !== "string" || !line.startsWith("{")) return [];
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "object" && parsed !== null ? [parsed] : [];
  });
}

export const noSleep = () => Promise.resolve();
