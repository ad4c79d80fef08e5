import dayjs from "dayjs";
import { describe, expect, it } from "vitest";
import {
  firstMondayOnOrAfter,
  parseIsoDate,
  parseWholeNumber,
  weekStartDates,
  weekTitle,
} from "./convert";

describe("week dates", () => {
  it("moves to the next Monday, or stays on a Monday", () => {
    expect(firstMondayOnOrAfter(dayjs("2026-10-21")).format("YYYY-MM-DD")).toBe("2026-10-26");
    expect(firstMondayOnOrAfter(dayjs("2026-10-19")).format("YYYY-MM-DD")).toBe("2026-10-19");
    expect(firstMondayOnOrAfter(dayjs("2026-10-25")).format("YYYY-MM-DD")).toBe("2026-10-26");
  });

  it("lists one start date per week, seven days apart", () => {
    expect(weekStartDates(dayjs("2026-10-21"), 3)).toEqual([
      "2026-10-26",
      "2026-11-02",
      "2026-11-09",
    ]);
  });

  it("formats the week title line", () => {
    expect(weekTitle("2026-10-26")).toBe("Week Plan — Week of 2026-10-26");
  });
});

describe("parseIsoDate", () => {
  it("accepts strict YYYY-MM-DD only", () => {
    expect(parseIsoDate("2026-10-21")?.format("YYYY-MM-DD")).toBe("2026-10-21");
    expect(parseIsoDate("2026-02-30")).toBeNull();
    expect(parseIsoDate("21/10/2026")).toBeNull();
  });
});

describe("parseWholeNumber", () => {
  it("parses digits and passes undefined through", () => {
    expect(parseWholeNumber("weeks", "6")).toBe(6);
    expect(parseWholeNumber("weeks", undefined)).toBeUndefined();
  });

  it("rejects anything else", () => {
    expect(() => parseWholeNumber("weeks", "six")).toThrow(
      '--weeks expects a whole number, got "six"'
    );
  });
});
