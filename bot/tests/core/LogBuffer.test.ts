import { describe, it, expect, vi } from "vitest";
import { LogBuffer } from "../../src/core/LogBuffer";

describe("LogBuffer", () => {
  it("numbers entries and returns those after a sequence", () => {
    const buffer = new LogBuffer();
    buffer.push("INFO", "core", "one");
    buffer.push("WARN", "core", "two");
    buffer.push("ERROR", "roster", "three");

    expect(buffer.latestSeq()).toBe(3);
    expect(buffer.since(1).map((entry) => entry.message)).toEqual(["two", "three"]);
    expect(buffer.since(0, 1).map((entry) => entry.seq)).toEqual([1]);
  });

  it("drops the oldest entries beyond capacity but keeps counting", () => {
    const buffer = new LogBuffer(2);
    buffer.push("INFO", "core", "a");
    buffer.push("INFO", "core", "b");
    buffer.push("INFO", "core", "c");

    expect(buffer.size()).toBe(2);
    expect(buffer.since().map((entry) => `${entry.seq}:${entry.message}`)).toEqual(["2:b", "3:c"]);
  });

  it("notifies subscribers until they unsubscribe", () => {
    const buffer = new LogBuffer();
    const listener = vi.fn();
    const unsubscribe = buffer.subscribe(listener);

    const entry = buffer.push("DEBUG", "auth", "hello");
    unsubscribe();
    buffer.push("DEBUG", "auth", "ignored");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(entry);
  });

  it("keeps the sequence after clear", () => {
    const buffer = new LogBuffer();
    buffer.push("INFO", "core", "a");
    buffer.clear();
    const next = buffer.push("INFO", "core", "b");

    expect(buffer.size()).toBe(1);
    expect(next.seq).toBe(2);
  });
});
