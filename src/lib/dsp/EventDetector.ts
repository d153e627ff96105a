/**
 * PeakEventDetector: cheap per-buffer gate that flags possible impacts.
 *
 * A buffer becomes a candidate when its RMS clears the detection threshold,
 * at least 100ms have passed since the previous candidate, and it shows a
 * transient: the loudest 512-sample window stands out from the quietest one.
 */

import { computeRms } from "./decibels";
import {
  usableFrames,
  type DetectionResult,
  type EventDetector,
  type PcmBuffer,
} from "./types";

export interface DetectorOptions {
  /** RMS amplitude gate (lower = more sensitive) */
  threshold?: number;
  minEventIntervalSeconds?: number;
  peakWindowSize?: number;
  minPeakProminence?: number;
}

export const DEFAULT_DETECTION_THRESHOLD = 0.0075;

/** Sensitivity 0..1 → RMS threshold 0.012..0.003 (inverted) */
export function detectionThresholdForSensitivity(sensitivity: number): number {
  const s = Number.isFinite(sensitivity) ? Math.max(0, Math.min(1, sensitivity)) : 0.5;
  const least = 0.012;
  const most = 0.003;
  return least - s * (least - most);
}

export interface PeakAnalysis {
  prominence: number;
  hasPeak: boolean;
}

/**
 * Peak prominence over fixed windows of |x|. Buffers shorter than one window
 * fall back to "any sample above threshold".
 */
export function analyzePeaks(
  samples: Float32Array,
  frameCount: number,
  threshold: number,
  windowSize: number,
  minProminence: number
): PeakAnalysis {
  if (frameCount < windowSize) {
    let peak = 0;
    for (let i = 0; i < frameCount; i++) peak = Math.max(peak, Math.abs(samples[i]));
    return { prominence: peak, hasPeak: peak > threshold };
  }

  const windowCount = Math.floor(frameCount / windowSize);
  let maxPeak = 0;
  let minValley = Number.POSITIVE_INFINITY;

  for (let w = 0; w < windowCount; w++) {
    const start = w * windowSize;
    for (let i = start; i < start + windowSize; i++) {
      const abs = Math.abs(samples[i]);
      if (abs > maxPeak) maxPeak = abs;
      if (abs < minValley) minValley = abs;
    }
  }

  const prominence = Number.isFinite(minValley) ? maxPeak - minValley : 0;
  return {
    prominence,
    hasPeak: prominence >= minProminence && maxPeak > threshold,
  };
}

export class PeakEventDetector implements EventDetector {
  private _threshold: number;
  private readonly minInterval: number;
  private readonly windowSize: number;
  private readonly minProminence: number;
  private lastEventTime: number | null = null;

  constructor(options: DetectorOptions = {}) {
    this._threshold = clampThreshold(options.threshold ?? DEFAULT_DETECTION_THRESHOLD);
    this.minInterval = options.minEventIntervalSeconds ?? 0.1;
    this.windowSize = Math.max(1, Math.floor(options.peakWindowSize ?? 512));
    this.minProminence = options.minPeakProminence ?? 0.1;
  }

  get threshold(): number {
    return this._threshold;
  }

  get lastCandidateTime(): number | null {
    return this.lastEventTime;
  }

  setThreshold(threshold: number): void {
    this._threshold = clampThreshold(threshold);
  }

  reset(): void {
    this.lastEventTime = null;
  }

  detect(buffer: PcmBuffer): DetectionResult {
    const frames = usableFrames(buffer);
    if (frames === 0 || !Number.isFinite(buffer.timestamp)) {
      return { type: "none", reason: "invalid-buffer" };
    }

    const rms = computeRms(buffer.samples, frames);
    if (!(rms > this._threshold)) return { type: "none", reason: "below-threshold" };

    if (this.lastEventTime !== null && buffer.timestamp - this.lastEventTime < this.minInterval) {
      return { type: "none", reason: "too-soon" };
    }

    const peaks = analyzePeaks(
      buffer.samples,
      frames,
      this._threshold,
      this.windowSize,
      this.minProminence
    );
    if (!peaks.hasPeak) return { type: "none", reason: "no-peak" };

    this.lastEventTime = buffer.timestamp;
    return {
      type: "candidate",
      candidate: {
        timestamp: buffer.timestamp,
        rmsAmplitude: rms,
        peakProminence: peaks.prominence,
        buffer,
      },
    };
  }
}

function clampThreshold(t: number): number {
  if (!Number.isFinite(t)) return DEFAULT_DETECTION_THRESHOLD;
  return Math.max(0, Math.min(1, t));
}
