import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration, parseSize } from "../../src/utils/format";

describe("formatBytes", () => {
  test("formats zero and plain bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
  });

  test("uses binary units with two decimals", () => {
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(2 * 1024 ** 3)).toBe("2.00 GB");
  });
});

describe("formatDuration", () => {
  test("milliseconds below a second", () => {
    expect(formatDuration(500)).toBe("500ms");
  });

  test("seconds with one decimal", () => {
    expect(formatDuration(1500)).toBe("1.5s");
  });

  test("minutes and seconds", () => {
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("parseSize", () => {
  test("plain numbers are bytes", () => {
    expect(parseSize("512")).toBe(512);
    expect(parseSize("0")).toBe(0);
  });

  test("units are binary multiples, case-insensitive", () => {
    expect(parseSize("200MB")).toBe(209_715_200);
    expect(parseSize("1.5 GB")).toBe(1_610_612_736);
    expect(parseSize("4kb")).toBe(4096);
  });

  test("anything else is null", () => {
    expect(parseSize("abc")).toBeNull();
    expect(parseSize("5PB")).toBeNull();
    expect(parseSize("-1MB")).toBeNull();
  });
});
