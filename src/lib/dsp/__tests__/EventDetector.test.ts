import { describe, it, expect } from "vitest";
import {
  DEFAULT_DETECTION_THRESHOLD,
  PeakEventDetector,
  detectionThresholdForSensitivity,
} from "../EventDetector";
import { createPcmBuffer } from "../types";
import { SAMPLE_RATE, sineBuffer } from "./signals";

describe("detectionThresholdForSensitivity", () => {
  it("maps 0..1 onto 0.012..0.003", () => {
    expect(detectionThresholdForSensitivity(0)).toBeCloseTo(0.012, 10);
    expect(detectionThresholdForSensitivity(1)).toBeCloseTo(0.003, 10);
    expect(detectionThresholdForSensitivity(0.5)).toBeCloseTo(DEFAULT_DETECTION_THRESHOLD, 10);
  });

  it("clamps out-of-range input", () => {
    expect(detectionThresholdForSensitivity(5)).toBeCloseTo(0.003, 10);
    expect(detectionThresholdForSensitivity(Number.NaN)).toBeCloseTo(0.0075, 10);
  });
});

describe("PeakEventDetector", () => {
  it("flags a loud transient", () => {
    const detector = new PeakEventDetector();
    const result = detector.detect(sineBuffer(60, 0.5, 0));
    expect(result.type).toBe("candidate");
    if (result.type !== "candidate") return;
    expect(result.candidate.timestamp).toBe(0);
    expect(result.candidate.rmsAmplitude).toBeCloseTo(0.354, 2);
    expect(result.candidate.peakProminence).toBeGreaterThan(0.45);
    expect(detector.lastCandidateTime).toBe(0);
  });

  it("ignores quiet buffers", () => {
    const detector = new PeakEventDetector();
    expect(detector.detect(createPcmBuffer(new Float32Array(4096), SAMPLE_RATE, 0))).toEqual({
      type: "none",
      reason: "below-threshold",
    });
  });

  it("rejects unusable buffers", () => {
    const detector = new PeakEventDetector();
    expect(detector.detect(createPcmBuffer(new Float32Array(0), SAMPLE_RATE, 0))).toEqual({
      type: "none",
      reason: "invalid-buffer",
    });
    expect(detector.detect(sineBuffer(60, 0.5, Number.NaN)).type).toBe("none");
  });

  it("enforces 100ms between candidates", () => {
    const detector = new PeakEventDetector();
    expect(detector.detect(sineBuffer(60, 0.5, 0)).type).toBe("candidate");
    expect(detector.detect(sineBuffer(60, 0.5, 0.05))).toEqual({ type: "none", reason: "too-soon" });
    expect(detector.detect(sineBuffer(60, 0.5, 0.1)).type).toBe("candidate");
    expect(detector.lastCandidateTime).toBe(0.1);
  });

  it("forgets spacing after reset", () => {
    const detector = new PeakEventDetector();
    detector.detect(sineBuffer(60, 0.5, 0));
    detector.reset();
    expect(detector.lastCandidateTime).toBeNull();
    expect(detector.detect(sineBuffer(60, 0.5, 0.01)).type).toBe("candidate");
  });

  it("needs a transient, not just a steady level", () => {
    const detector = new PeakEventDetector();
    const steady = createPcmBuffer(new Float32Array(1024).fill(0.05), SAMPLE_RATE, 0);
    expect(detector.detect(steady)).toEqual({ type: "none", reason: "no-peak" });
  });

  it("falls back to a peak check for buffers shorter than one window", () => {
    const detector = new PeakEventDetector();
    const short = createPcmBuffer(new Float32Array(100).fill(0.02), SAMPLE_RATE, 0);
    const result = detector.detect(short);
    expect(result.type).toBe("candidate");
    if (result.type === "candidate") expect(result.candidate.peakProminence).toBeCloseTo(0.02, 6);
  });

  it("clamps the threshold to 0..1", () => {
    const detector = new PeakEventDetector();
    detector.setThreshold(2);
    expect(detector.threshold).toBe(1);
    detector.setThreshold(Number.NaN);
    expect(detector.threshold).toBe(DEFAULT_DETECTION_THRESHOLD);
  });
});
