import { describe, expect, it } from "vitest";

import { daysSince, formatCompactStamp, formatDate, formatTime, parseRecordDate } from "../../../src/memory/clock.js";

describe("clock helpers", () => {
  const at = new Date(2026, 0, 5, 7, 3, 9);

  it("formats local date, time and backup stamp", () => {
    expect(formatDate(at)).toBe("2026-01-05");
    expect(formatTime(at)).toBe("07:03:09");
    expect(formatCompactStamp(at)).toBe("20260105_070309");
  });

  it("parses record dates with either time separator", () => {
    expect(parseRecordDate("2026-01-05", "07:03:09")?.getTime()).toBe(at.getTime());
    expect(parseRecordDate("2026-01-05", "07-03-09")?.getTime()).toBe(at.getTime());
    expect(parseRecordDate("unknown")).toBeNull();
    expect(parseRecordDate("2026-01-05", "later")).toBeNull();
  });

  it("counts whole days since the start of the date", () => {
    expect(daysSince("2026-01-05", at)).toBe(0);
    expect(daysSince("2025-12-29", at)).toBe(7);
    expect(daysSince("not a date", at)).toBeNull();
  });
});
