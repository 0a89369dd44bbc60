import { describe, it, expect } from "vitest";
import { createRunId, formatRunTimestamp } from "../../src/utils/run-id.js";

describe("Run identifiers", () => {
  const now = new Date("2026-10-18T09:45:12.345Z");

  it("should format a compact UTC timestamp", () => {
    expect(formatRunTimestamp(now)).toBe("20261018T094512Z");
  });

  it("should combine the timestamp with a random suffix", () => {
    expect(createRunId(now)).toMatch(/^20261018T094512Z-[0-9a-f]{12}$/);
  });

  it("should not collide for runs started at the same instant", () => {
    const ids = new Set(Array.from({ length: 200 }, () => createRunId(now)));

    expect(ids.size).toBe(200);
  });
});
