import { afterEach, describe, expect, test, vi } from "vitest";
import { EngineEvents } from "../../src/core/events";
import type { EngineEvent } from "../../src/types";

const USAGE: EngineEvent = { type: "usage", path: "/backups/Navezgane/Test", bytes: 42 };

describe("EngineEvents", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("delivers events to every subscriber", () => {
    const events = new EngineEvents();
    const a: EngineEvent[] = [];
    const b: EngineEvent[] = [];
    events.subscribe((event) => a.push(event));
    events.subscribe((event) => b.push(event));

    events.emit(USAGE);

    expect(a).toEqual([USAGE]);
    expect(b).toEqual([USAGE]);
    expect(events.subscriberCount).toBe(2);
  });

  test("unsubscribe stops delivery", () => {
    const events = new EngineEvents();
    const seen: EngineEvent[] = [];
    const unsubscribe = events.subscribe((event) => seen.push(event));

    unsubscribe();
    events.emit(USAGE);

    expect(seen).toEqual([]);
    expect(events.subscriberCount).toBe(0);
  });

  test("a throwing subscriber does not stop the others", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const events = new EngineEvents();
    const seen: EngineEvent[] = [];
    events.subscribe(() => {
      throw new Error("subscriber broke");
    });
    events.subscribe((event) => seen.push(event));

    expect(() => events.emit(USAGE)).not.toThrow();
    expect(seen).toEqual([USAGE]);
  });
});
