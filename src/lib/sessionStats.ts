/**
 * Aggregates over a session's classified events for report collaborators:
 * counts by type, activity per time slot, peak slots and a level summary.
 */

import type { Classification, ImpactType } from "@/types/impact";

export interface TimedClassification {
  /** Seconds since session start */
  timestamp: number;
  classification: Classification;
}

export interface TimeSlotActivity {
  slot: number;
  startSeconds: number;
  counts: Record<ImpactType, number>;
  total: number;
}

export interface LevelSummary {
  count: number;
  meanDb: number | null;
  maxDb: number | null;
  meanIntervalSeconds: number | null;
}

export interface SessionSummary {
  byType: Record<ImpactType, number>;
  slots: TimeSlotActivity[];
  peakSlots: TimeSlotActivity[];
  levels: LevelSummary;
}

/** 10-minute slots, matching the daily report granularity */
export const DEFAULT_SLOT_SECONDS = 600;
const PEAK_SLOT_COUNT = 3;

function zeroCounts(): Record<ImpactType, number> {
  return { mild: 0, medium: 0, hard: 0, extreme: 0, running: 0, unknown: 0 };
}

export function countByType(events: readonly TimedClassification[]): Record<ImpactType, number> {
  const counts = zeroCounts();
  for (const e of events) counts[e.classification.type]++;
  return counts;
}

/** Only slots containing at least one event are returned, in time order */
export function countByTimeSlot(
  events: readonly TimedClassification[],
  slotSeconds = DEFAULT_SLOT_SECONDS
): TimeSlotActivity[] {
  const width = slotSeconds > 0 ? slotSeconds : DEFAULT_SLOT_SECONDS;
  const slots = new Map<number, TimeSlotActivity>();

  for (const e of events) {
    if (!Number.isFinite(e.timestamp) || e.timestamp < 0) continue;
    const slot = Math.floor(e.timestamp / width);
    let entry = slots.get(slot);
    if (!entry) {
      entry = { slot, startSeconds: slot * width, counts: zeroCounts(), total: 0 };
      slots.set(slot, entry);
    }
    entry.counts[e.classification.type]++;
    entry.total++;
  }

  return [...slots.values()].sort((a, b) => a.slot - b.slot);
}

/** Busiest slots first; ties go to the earlier slot */
export function peakActivitySlots(
  slots: readonly TimeSlotActivity[],
  limit = PEAK_SLOT_COUNT
): TimeSlotActivity[] {
  return [...slots]
    .filter((s) => s.total > 0)
    .sort((a, b) => b.total - a.total || a.slot - b.slot)
    .slice(0, Math.max(0, limit));
}

export function summarizeLevels(events: readonly TimedClassification[]): LevelSummary {
  if (events.length === 0) {
    return { count: 0, meanDb: null, maxDb: null, meanIntervalSeconds: null };
  }
  let sum = 0;
  let max = Number.NEGATIVE_INFINITY;
  let intervalSum = 0;
  let intervalCount = 0;
  for (const { classification: c } of events) {
    sum += c.decibelLevel;
    max = Math.max(max, c.decibelLevel);
    if (c.intervalFromPrevious !== null) {
      intervalSum += c.intervalFromPrevious;
      intervalCount++;
    }
  }
  return {
    count: events.length,
    meanDb: sum / events.length,
    maxDb: max,
    meanIntervalSeconds: intervalCount > 0 ? intervalSum / intervalCount : null,
  };
}

export function summarizeSession(
  events: readonly TimedClassification[],
  slotSeconds = DEFAULT_SLOT_SECONDS
): SessionSummary {
  const slots = countByTimeSlot(events, slotSeconds);
  return {
    byType: countByType(events),
    slots,
    peakSlots: peakActivitySlots(slots),
    levels: summarizeLevels(events),
  };
}
