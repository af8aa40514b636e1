import { describe, expect, test } from "vitest";
import { generateShortId, generateUUID } from "../../src/utils/crypto";

describe("crypto utilities", () => {
  test("generateShortId gives six lowercase alphanumerics", () => {
    expect(generateShortId()).toMatch(/^[a-z0-9]{6}$/);
  });

  test("generateShortId varies between calls", () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateShortId()));
    expect(ids.size).toBeGreaterThan(45);
  });

  test("generateUUID gives a v4 UUID", () => {
    expect(generateUUID()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
