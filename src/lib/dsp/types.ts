/**
 * Core DSP type definitions for the impact pipeline.
 * The detector, analyzer, classifier and orchestrator share these types.
 */

import type { Classification, EventMark, SensitivityConfig } from "@/types/impact";

// ── Input buffers ─────────────────────────────────────────────────

/** One mono block from the capture collaborator. Borrowed for a single call. */
export interface PcmBuffer {
  readonly samples: Float32Array;
  readonly frameCount: number;
  readonly sampleRate: number;
  /** Seconds since session start */
  readonly timestamp: number;
}

/**
 * Factory for PcmBuffer. frameCount defaults to samples.length and is
 * capped to it so downstream loops never read past the array.
 */
export function createPcmBuffer(
  samples: Float32Array,
  sampleRate: number,
  timestamp: number,
  frameCount = samples.length
): PcmBuffer {
  return Object.freeze({
    samples,
    frameCount: Math.max(0, Math.min(Math.floor(frameCount), samples.length)),
    sampleRate,
    timestamp,
  });
}

/** Multi-channel input: only channel 0 is analysed. */
export function pcmBufferFromChannels(
  channels: Float32Array[],
  sampleRate: number,
  timestamp: number
): PcmBuffer {
  if (channels.length === 0) {
    throw new Error("pcmBufferFromChannels: channels array is empty");
  }
  return createPcmBuffer(channels[0], sampleRate, timestamp);
}

/** Frames that can actually be read, or 0 when the buffer is unusable. */
export function usableFrames(buffer: PcmBuffer): number {
  if (!Number.isFinite(buffer.sampleRate) || buffer.sampleRate <= 0) return 0;
  if (!Number.isFinite(buffer.frameCount) || buffer.frameCount <= 0) return 0;
  return Math.min(Math.floor(buffer.frameCount), buffer.samples.length);
}

// ── Spectrum ──────────────────────────────────────────────────────

export interface FrequencySpectrum {
  readonly impactEnergy: number;
  readonly lowMidEnergy: number;
  readonly midEnergy: number;
  readonly highMidEnergy: number;
  readonly highEnergy: number;
  readonly dominantFrequency: number;
  readonly spectralCentroid: number;
}

export function totalBandEnergy(s: FrequencySpectrum): number {
  return s.impactEnergy + s.lowMidEnergy + s.midEnergy + s.highMidEnergy + s.highEnergy;
}

/** Share of band energy in the 20-100 Hz impact band; 0 for a silent spectrum */
export function impactEnergyRatio(s: FrequencySpectrum): number {
  const total = totalBandEnergy(s);
  if (!(total > 0) || !Number.isFinite(total)) return 0;
  return Math.max(0, Math.min(1, s.impactEnergy / total));
}

// ── Detection ─────────────────────────────────────────────────────

export interface CandidateEvent {
  readonly timestamp: number;
  readonly rmsAmplitude: number;
  readonly peakProminence: number;
  readonly buffer: PcmBuffer;
}

export type DetectionMiss = "invalid-buffer" | "below-threshold" | "too-soon" | "no-peak";

export type DetectionResult =
  | { type: "candidate"; candidate: CandidateEvent }
  | { type: "none"; reason: DetectionMiss };

// ── Classification ────────────────────────────────────────────────

export interface BoundaryFrequencyRule {
  lowHz: number;
  highHz: number;
  /** Always a footstep at or above this level */
  loudDb: number;
  /** Footstep at or above this level only when the impact ratio is below maxImpactRatio */
  moderateDb: number;
  maxImpactRatio: number;
}

export interface ClassifierConfig {
  lowFrequencyCutoffHz: number;
  minImpactRatio: number;
  boundary: BoundaryFrequencyRule;
  runningIntervalSeconds: number;
  echoWindowSeconds: number;
  echoDropDb: number;
}

export type RejectionReason = "invalid-buffer" | "below-threshold" | "echo";

export type ClassificationOutcome =
  | { type: "classified"; classification: Classification; impactRatio: number }
  | { type: "rejected"; reason: RejectionReason; decibelLevel: number };

export interface ClassifierInput {
  candidate: CandidateEvent;
  spectrum: FrequencySpectrum;
  ambientLevel: number;
  sensitivity: SensitivityConfig;
  config: ClassifierConfig;
  lastConfirmed: EventMark | null;
  lastLoud: EventMark | null;
  /** Defaults to the candidate's timestamp */
  now?: number;
}

// ── Pipeline stage contracts ──────────────────────────────────────

export interface SpectrumAnalyzer {
  analyze(buffer: PcmBuffer): FrequencySpectrum | null;
}

export interface EventDetector {
  readonly threshold: number;
  detect(buffer: PcmBuffer): DetectionResult;
  setThreshold(threshold: number): void;
  reset(): void;
}

export interface EventClassifier {
  classify(input: ClassifierInput): ClassificationOutcome;
}
