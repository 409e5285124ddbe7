import { describe, expect, it } from "vitest";
import { buildRefreshCallback, parseRefreshCallback } from "../callback-data";

describe("refresh callback data", () => {
  it("builds and parses a subscriber id", () => {
    expect(buildRefreshCallback(12)).toBe("usage:refresh:12");
    expect(parseRefreshCallback("usage:refresh:12")).toEqual({ subscriberId: 12 });
  });

  it("rejects foreign or malformed payloads", () => {
    expect(parseRefreshCallback(undefined)).toBeNull();
    expect(parseRefreshCallback("task_status:1:DONE")).toBeNull();
    expect(parseRefreshCallback("usage:refresh:")).toBeNull();
    expect(parseRefreshCallback("usage:refresh:0")).toBeNull();
    expect(parseRefreshCallback("usage:refresh:-3")).toBeNull();
    expect(parseRefreshCallback("usage:refresh:1.5")).toBeNull();
    expect(parseRefreshCallback("usage:refresh:99999999999999999999")).toBeNull();
  });
});
