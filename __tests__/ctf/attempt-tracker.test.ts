import { describe, it, expect } from "vitest";
import { AttemptTracker } from "@/lib/ctf/attempt-tracker";

function trackerWithClock(windowMs: number) {
  let t = 1_000_000;
  const tracker = new AttemptTracker({ windowMs, now: () => t });
  return {
    tracker,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("AttemptTracker", () => {
  it("counts attempts per key", () => {
    const { tracker } = trackerWithClock(5_000);
    expect(tracker.record("a")).toBe(1);
    expect(tracker.record("a")).toBe(2);
    expect(tracker.record("b")).toBe(1);
    expect(tracker.count("a")).toBe(2);
  });

  it("drops attempts that leave the window", () => {
    const { tracker, advance } = trackerWithClock(5_000);
    tracker.record("a");
    advance(3_000);
    tracker.record("a");
    advance(2_500);
    // first attempt is now 5.5 s old
    expect(tracker.count("a")).toBe(1);
    expect(tracker.record("a")).toBe(2);
  });

  it("treats an attempt exactly one window old as expired", () => {
    const { tracker, advance } = trackerWithClock(5_000);
    tracker.record("a");
    advance(5_000);
    expect(tracker.count("a")).toBe(0);
  });

  it("reset and clear forget attempts", () => {
    const { tracker } = trackerWithClock(5_000);
    tracker.record("a");
    tracker.record("b");
    tracker.reset("a");
    expect(tracker.count("a")).toBe(0);
    expect(tracker.count("b")).toBe(1);
    tracker.clear();
    expect(tracker.count("b")).toBe(0);
  });
});
