import { describe, it, expect } from "vitest";
import {
  countByTimeSlot,
  countByType,
  peakActivitySlots,
  summarizeLevels,
  summarizeSession,
  type TimedClassification,
} from "../sessionStats";
import type { ImpactType } from "@/types/impact";

function event(
  timestamp: number,
  type: ImpactType,
  decibelLevel = 50,
  intervalFromPrevious: number | null = null
): TimedClassification {
  return {
    timestamp,
    classification: { type, confidence: 0.8, decibelLevel, dominantFrequency: 45, intervalFromPrevious },
  };
}

const EVENTS: TimedClassification[] = [
  event(10, "mild", 40),
  event(20, "hard", 60, 10),
  event(650, "extreme", 70, 630),
  event(660, "running", 66, 0.12),
  event(670, "mild", 44, 10),
  event(1900, "unknown", 50),
];

describe("sessionStats", () => {
  it("counts every type, including absent ones", () => {
    expect(countByType(EVENTS)).toEqual({
      mild: 2,
      medium: 0,
      hard: 1,
      extreme: 1,
      running: 1,
      unknown: 1,
    });
  });

  it("groups events into 10-minute slots", () => {
    const slots = countByTimeSlot(EVENTS);
    expect(slots.map((s) => [s.slot, s.startSeconds, s.total])).toEqual([
      [0, 0, 2],
      [1, 600, 3],
      [3, 1800, 1],
    ]);
    expect(slots[1].counts.running).toBe(1);
  });

  it("skips events without a usable timestamp", () => {
    const slots = countByTimeSlot([event(-1, "mild"), event(Number.NaN, "mild"), event(5, "mild")], 60);
    expect(slots.map((s) => s.total)).toEqual([1]);
  });

  it("ranks busy slots, earlier first on ties", () => {
    const slots = countByTimeSlot(EVENTS);
    expect(peakActivitySlots(slots).map((s) => s.slot)).toEqual([1, 0, 3]);
    expect(peakActivitySlots(slots, 1).map((s) => s.slot)).toEqual([1]);
  });

  it("summarizes levels and intervals", () => {
    expect(summarizeLevels(EVENTS)).toEqual({
      count: 6,
      meanDb: 55,
      maxDb: 70,
      meanIntervalSeconds: (10 + 630 + 0.12 + 10) / 4,
    });
    expect(summarizeLevels([])).toEqual({
      count: 0,
      meanDb: null,
      maxDb: null,
      meanIntervalSeconds: null,
    });
  });

  it("builds a full session summary", () => {
    const summary = summarizeSession(EVENTS);
    expect(summary.byType.mild).toBe(2);
    expect(summary.slots).toHaveLength(3);
    expect(summary.peakSlots[0].slot).toBe(1);
    expect(summary.levels.maxDb).toBe(70);
  });
});
