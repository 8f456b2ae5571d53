import { describe, expect, it } from "vitest";
import { ManualClock, systemClock } from "./Time.js";

describe("ManualClock", () => {
  it("moves only on advance and sleep", async () => {
    const clock = new ManualClock(5, 1000);
    expect(clock.now()).toBe(5);
    expect(clock.wallNow()).toBe(1005);

    clock.advance(10);
    await clock.sleep(3);
    expect(clock.now()).toBe(18);
    expect(clock.sleeps).toEqual([3]);
  });
});

describe("systemClock", () => {
  it("sleeps for at least the requested time", async () => {
    const before = systemClock.now();
    await systemClock.sleep(5);
    expect(systemClock.now() - before).toBeGreaterThanOrEqual(4);
  });
});
