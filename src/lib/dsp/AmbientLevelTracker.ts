/**
 * Rolling estimate of the background noise floor.
 *
 * Keeps the last 100 dB readings; once 20 are present the ambient level is the
 * mean of the sorted readings between the 0th and 10th percentile indices.
 * Every update publishes a new frozen snapshot, so readers on another
 * execution context (UI, diagnostics) never observe a half-computed estimate.
 */

import type { AmbientSnapshot, AmbientThresholds } from "@/types/impact";
import { logger } from "@/lib/logger";

export const DEFAULT_AMBIENT_LEVEL = 30;

export interface AmbientTrackerOptions {
  windowSize?: number;
  minimumReadings?: number;
  /** Upper percentile of the averaged range (0-1) */
  upperPercentile?: number;
}

const INITIAL_SNAPSHOT: AmbientSnapshot = Object.freeze({
  ambientLevel: DEFAULT_AMBIENT_LEVEL,
  calibrated: false,
  readingCount: 0,
});

export class AmbientLevelTracker {
  private readonly windowSize: number;
  private readonly minimumReadings: number;
  private readonly upperPercentile: number;
  private readings: number[] = [];
  private snapshot: AmbientSnapshot = INITIAL_SNAPSHOT;
  private listeners = new Set<(snapshot: AmbientSnapshot) => void>();

  constructor(options: AmbientTrackerOptions = {}) {
    this.windowSize = Math.max(1, Math.floor(options.windowSize ?? 100));
    this.minimumReadings = Math.max(1, Math.floor(options.minimumReadings ?? 20));
    this.upperPercentile = Math.max(0, Math.min(1, options.upperPercentile ?? 0.1));
  }

  get ambientLevel(): number {
    return this.snapshot.ambientLevel;
  }

  get calibrated(): boolean {
    return this.snapshot.calibrated;
  }

  getSnapshot(): AmbientSnapshot {
    return this.snapshot;
  }

  addReading(db: number): void {
    if (!Number.isFinite(db)) return;

    this.readings.push(db);
    if (this.readings.length > this.windowSize) this.readings.shift();

    const count = this.readings.length;
    if (count < this.minimumReadings) {
      this.publish({ ...this.snapshot, readingCount: count });
      return;
    }

    const sorted = [...this.readings].sort((a, b) => a - b);
    const upperIndex = Math.min(count - 1, Math.floor(count * this.upperPercentile));
    let sum = 0;
    for (let i = 0; i <= upperIndex; i++) sum += sorted[i];

    this.publish({
      ambientLevel: sum / (upperIndex + 1),
      calibrated: true,
      readingCount: count,
    });
  }

  reset(): void {
    this.readings = [];
    this.publish(INITIAL_SNAPSHOT);
  }

  /** Ambient-relative tier floors, shifted by the sensitivity offset */
  getThresholds(offsetDb = 0): AmbientThresholds {
    return ambientThresholds(this.snapshot.ambientLevel, offsetDb);
  }

  subscribe(listener: (snapshot: AmbientSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private publish(next: AmbientSnapshot): void {
    this.snapshot = Object.freeze(next);
    for (const listener of this.listeners) {
      try {
        listener(this.snapshot);
      } catch (err) {
        logger.error("[AmbientLevelTracker] listener failed:", err);
      }
    }
  }
}

export function ambientThresholds(ambientLevel: number, offsetDb = 0): AmbientThresholds {
  const base = ambientLevel + offsetDb;
  return {
    mild: base + 5,
    medium: base + 10,
    hard: base + 15,
    extreme: base + 20,
  };
}
