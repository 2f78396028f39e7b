/**
 * Tests for timestamp parsing
 */
import { afterEach, describe, it, expect, vi } from "vitest";

import { daysBetween, parseTimestamp } from "../../src/utils/time";

const ISO = "2024-06-01T00:00:00.000Z";

describe("parseTimestamp", () => {
  it("reads epoch seconds and milliseconds by magnitude", () => {
    expect(parseTimestamp(1717200000)?.toISOString()).toBe(ISO);
    expect(parseTimestamp(1717200000000)?.toISOString()).toBe(ISO);
    expect(parseTimestamp("1717200000")?.toISOString()).toBe(ISO);
  });

  it("reads ISO text and treats zone-less text as UTC", () => {
    expect(parseTimestamp("2024-06-01T02:00:00+02:00")?.toISOString()).toBe(ISO);
    expect(parseTimestamp("2024-06-01T00:00:00")?.toISOString()).toBe(ISO);
  });

  describe("with a non-UTC host zone", () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it("reads space-separated date-times as UTC", () => {
      vi.stubEnv("TZ", "America/New_York");

      expect(parseTimestamp("2024-03-05 10:00:00")?.toISOString()).toBe("2024-03-05T10:00:00.000Z");
      expect(parseTimestamp("2024-03-05T10:00:00")?.toISOString()).toBe("2024-03-05T10:00:00.000Z");
      expect(parseTimestamp("2024-03-05 12:00:00+02:00")?.toISOString()).toBe("2024-03-05T10:00:00.000Z");
    });
  });

  it("copies Date instances", () => {
    const date = new Date(ISO);
    const parsed = parseTimestamp(date);

    expect(parsed).toEqual(date);
    expect(parsed).not.toBe(date);
  });

  it("returns null for unusable input", () => {
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp("yesterday")).toBeNull();
    expect(parseTimestamp(0)).toBeNull();
    expect(parseTimestamp(new Date("nope"))).toBeNull();
  });
});

describe("daysBetween", () => {
  it("returns fractional days", () => {
    expect(daysBetween(new Date(ISO), new Date("2024-06-02T12:00:00.000Z"))).toBe(1.5);
  });
});
