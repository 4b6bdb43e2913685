import { describe, expect, it } from "vitest";

import {
  compareSlackTimestamps,
  isSlackTimestamp,
  normalizeSlackTimestamp,
  slackTimestampToDate,
} from "@utils/slackTimestamp";

describe("slackTimestamp", () => {
  describe("isSlackTimestamp", () => {
    it("should accept seconds with up to six fractional digits", () => {
      expect(isSlackTimestamp("1700000000.000100")).toBe(true);
      expect(isSlackTimestamp("1700000000.1")).toBe(true);
      expect(isSlackTimestamp("1700000000")).toBe(true);
    });

    it("should reject other shapes", () => {
      expect(isSlackTimestamp("1700000000.1234567")).toBe(false);
      expect(isSlackTimestamp("-1.5")).toBe(false);
      expect(isSlackTimestamp("abc")).toBe(false);
      expect(isSlackTimestamp("")).toBe(false);
    });
  });

  describe("normalizeSlackTimestamp", () => {
    it("should pad the fraction to six digits", () => {
      expect(normalizeSlackTimestamp("1700000000.1")).toBe("1700000000.100000");
      expect(normalizeSlackTimestamp("1700000000")).toBe("1700000000.000000");
      expect(normalizeSlackTimestamp("1700000000.000100")).toBe(
        "1700000000.000100"
      );
    });

    it("should strip leading zeros from the seconds", () => {
      expect(normalizeSlackTimestamp("01.5")).toBe("1.500000");
      expect(normalizeSlackTimestamp("0.5")).toBe("0.500000");
    });

    it("should throw on invalid input", () => {
      expect(() => normalizeSlackTimestamp("soon")).toThrow(
        "Invalid Slack timestamp: soon"
      );
    });
  });

  describe("compareSlackTimestamps", () => {
    it("should compare by value, not by string", () => {
      expect(compareSlackTimestamps("1700000000.000100", "1700000000.0001")).toBe(0);
      expect(compareSlackTimestamps("1700000000.000099", "1700000000.0001")).toBe(-1);
      expect(compareSlackTimestamps("1700000001", "1700000000.999999")).toBe(1);
      expect(compareSlackTimestamps("999999999.9", "1000000000")).toBe(-1);
    });
  });

  it("should convert to a millisecond Date", () => {
    expect(slackTimestampToDate("1700000000.000100").toISOString()).toBe(
      "2023-11-14T22:13:20.000Z"
    );
    expect(slackTimestampToDate("1700000000.250000").getTime()).toBe(
      1700000000250
    );
  });
});
