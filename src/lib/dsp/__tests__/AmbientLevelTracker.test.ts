import { describe, it, expect, vi, afterEach } from "vitest";
import { AmbientLevelTracker, DEFAULT_AMBIENT_LEVEL, ambientThresholds } from "../AmbientLevelTracker";
import type { AmbientSnapshot } from "@/types/impact";
import { logger } from "@/lib/logger";

function feed(tracker: AmbientLevelTracker, values: number[]) {
  for (const v of values) tracker.addReading(v);
}

describe("AmbientLevelTracker", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts at the default level, uncalibrated", () => {
    const tracker = new AmbientLevelTracker();
    expect(tracker.getSnapshot()).toEqual({
      ambientLevel: DEFAULT_AMBIENT_LEVEL,
      calibrated: false,
      readingCount: 0,
    });
  });

  it("keeps the default until 20 readings arrive", () => {
    const tracker = new AmbientLevelTracker();
    feed(tracker, Array.from({ length: 19 }, () => 55));
    expect(tracker.ambientLevel).toBe(30);
    expect(tracker.calibrated).toBe(false);
    expect(tracker.getSnapshot().readingCount).toBe(19);
  });

  it("averages the quietest 10% once calibrated", () => {
    const tracker = new AmbientLevelTracker();
    // 25 readings spread evenly over 30..50, fed loudest first
    const readings = Array.from({ length: 25 }, (_, i) => 30 + (i * 20) / 24).reverse();
    feed(tracker, readings);

    const snapshot = tracker.getSnapshot();
    expect(snapshot.calibrated).toBe(true);
    expect(snapshot.readingCount).toBe(25);
    // floor(25 * 0.1) = 2 → mean of the three lowest
    expect(snapshot.ambientLevel).toBeCloseTo((30 + 30 + 20 / 24 + 30 + 40 / 24) / 3, 10);
    expect(snapshot.ambientLevel).toBeGreaterThanOrEqual(30);
    expect(snapshot.ambientLevel).toBeLessThanOrEqual(50);
  });

  it("evicts readings older than the window", () => {
    const tracker = new AmbientLevelTracker();
    feed(tracker, Array.from({ length: 20 }, () => 10));
    expect(tracker.ambientLevel).toBe(10);
    feed(tracker, Array.from({ length: 100 }, () => 60));
    expect(tracker.ambientLevel).toBe(60);
    expect(tracker.getSnapshot().readingCount).toBe(100);
  });

  it("ignores non-finite readings", () => {
    const tracker = new AmbientLevelTracker();
    tracker.addReading(Number.NaN);
    tracker.addReading(Number.POSITIVE_INFINITY);
    expect(tracker.getSnapshot().readingCount).toBe(0);
  });

  it("publishes frozen snapshots and never mutates an old one", () => {
    const tracker = new AmbientLevelTracker({ minimumReadings: 1 });
    const seen: AmbientSnapshot[] = [];
    const unsubscribe = tracker.subscribe((s) => seen.push(s));

    tracker.addReading(40);
    const first = tracker.getSnapshot();
    tracker.addReading(20);

    expect(Object.isFrozen(first)).toBe(true);
    expect(first.ambientLevel).toBe(40);
    expect(seen.map((s) => s.ambientLevel)).toEqual([40, 20]);

    unsubscribe();
    tracker.addReading(10);
    expect(seen).toHaveLength(2);
  });

  it("keeps publishing when a subscriber throws", () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => {});
    const tracker = new AmbientLevelTracker({ minimumReadings: 1 });
    const seen: number[] = [];
    tracker.subscribe(() => {
      throw new Error("reader failed");
    });
    tracker.subscribe((s) => seen.push(s.ambientLevel));

    expect(() => tracker.addReading(42)).not.toThrow();
    expect(() => tracker.reset()).not.toThrow();
    expect(seen).toEqual([42, 30]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it("resets to the uncalibrated default", () => {
    const tracker = new AmbientLevelTracker();
    feed(tracker, Array.from({ length: 30 }, () => 45));
    tracker.reset();
    expect(tracker.getSnapshot()).toEqual({ ambientLevel: 30, calibrated: false, readingCount: 0 });
  });

  it("derives tier floors from ambient and offset", () => {
    expect(ambientThresholds(30, 2)).toEqual({ mild: 37, medium: 42, hard: 47, extreme: 52 });
    expect(new AmbientLevelTracker().getThresholds()).toEqual({
      mild: 35,
      medium: 40,
      hard: 45,
      extreme: 50,
    });
  });
});
