/**
 * HeuristicEventClassifier: decides whether a candidate is a footstep, which
 * loudness tier it belongs to, and whether it is part of a run.
 *
 * Order of checks:
 *  1. Level gate: below ambient + offset + 5 dB → rejected
 *  2. Echo: much quieter than a loud event < 0.5s ago → rejected
 *  3. Footstep candidacy from dominant frequency + impact-band energy ratio
 *  4. Ambient-relative tier (mild / medium / hard / extreme)
 *  5. Running override for steps ≤ 0.15s after the previous confirmed one
 *
 * Never throws: "no event" is a rejected outcome, "not a footstep" is a
 * classified outcome with type unknown.
 */

import type { Classification, TierType } from "@/types/impact";
import { calculateDecibelsSpl } from "./decibels";
import {
  impactEnergyRatio,
  usableFrames,
  type ClassificationOutcome,
  type ClassifierConfig,
  type ClassifierInput,
  type EventClassifier,
  type FrequencySpectrum,
} from "./types";

export const DEFAULT_CLASSIFIER_CONFIG: Readonly<ClassifierConfig> = Object.freeze({
  lowFrequencyCutoffHz: 65,
  minImpactRatio: 0.7,
  boundary: Object.freeze({
    lowHz: 60,
    highHz: 70,
    loudDb: 43,
    moderateDb: 38,
    maxImpactRatio: 0.57,
  }),
  runningIntervalSeconds: 0.15,
  echoWindowSeconds: 0.5,
  echoDropDb: 12,
});

export const UNKNOWN_CONFIDENCE = 0.3;
export const MAX_CONFIDENCE = 0.95;
const RUNNING_BOOST = 0.1;

interface Tier {
  type: TierType;
  /** dB above ambient + offset where the tier starts */
  fromDb: number;
  /** dB where confidence reaches confHigh (tier end, or the cap for extreme) */
  toDb: number;
  confLow: number;
  confHigh: number;
}

/** Loudest first */
const TIERS: readonly Tier[] = [
  { type: "extreme", fromDb: 20, toDb: 40, confLow: 0.88, confHigh: MAX_CONFIDENCE },
  { type: "hard", fromDb: 15, toDb: 20, confLow: 0.82, confHigh: 0.88 },
  { type: "medium", fromDb: 10, toDb: 15, confLow: 0.75, confHigh: 0.82 },
  { type: "mild", fromDb: 5, toDb: 10, confLow: 0.7, confHigh: 0.75 },
];

const MILD_FLOOR_DB = 5;

function clamp01(v: number): number {
  return Math.max(0, Math.min(1, v));
}

function finiteOr(v: number, fallback: number): number {
  return Number.isFinite(v) ? v : fallback;
}

/** Tier and base confidence for a level measured relative to ambient + offset */
export function selectTier(relativeDb: number): { type: TierType; confidence: number } | null {
  for (const tier of TIERS) {
    if (relativeDb >= tier.fromDb) {
      const t = clamp01((relativeDb - tier.fromDb) / (tier.toDb - tier.fromDb));
      return { type: tier.type, confidence: tier.confLow + t * (tier.confHigh - tier.confLow) };
    }
  }
  return null;
}

/**
 * Low-frequency, impact-heavy sounds qualify. Dominant frequencies near the
 * cutoff (60-70 Hz by default) follow the boundary rule instead, which filters
 * tonal hums that happen to sit there.
 */
export function isFootstepCandidate(
  spectrum: FrequencySpectrum,
  decibelLevel: number,
  config: ClassifierConfig
): boolean {
  const ratio = impactEnergyRatio(spectrum);
  const freq = spectrum.dominantFrequency;
  const { boundary } = config;

  if (freq >= boundary.lowHz && freq <= boundary.highHz) {
    if (decibelLevel >= boundary.loudDb) return true;
    return decibelLevel >= boundary.moderateDb && ratio < boundary.maxImpactRatio;
  }

  return freq <= config.lowFrequencyCutoffHz && ratio >= config.minImpactRatio;
}

export function classifyCandidate(input: ClassifierInput): ClassificationOutcome {
  const { candidate, spectrum, sensitivity, config, lastConfirmed, lastLoud } = input;
  const buffer = candidate.buffer;

  if (usableFrames(buffer) === 0) {
    return { type: "rejected", reason: "invalid-buffer", decibelLevel: 0 };
  }

  const now = finiteOr(input.now ?? candidate.timestamp, candidate.timestamp);
  const decibelLevel = calculateDecibelsSpl(buffer, sensitivity.calibrationDb);
  const base = finiteOr(input.ambientLevel, 0) + finiteOr(sensitivity.offsetDb, 0);
  const relativeDb = decibelLevel - base;

  // 1. Level gate
  if (!(relativeDb >= MILD_FLOOR_DB)) {
    return { type: "rejected", reason: "below-threshold", decibelLevel };
  }

  // 2. Echo of a recent louder event
  if (lastLoud) {
    const sinceLoud = now - lastLoud.timestamp;
    const drop = lastLoud.decibelLevel - decibelLevel;
    if (sinceLoud >= 0 && sinceLoud <= config.echoWindowSeconds && drop >= config.echoDropDb) {
      return { type: "rejected", reason: "echo", decibelLevel };
    }
  }

  const nyquist = buffer.sampleRate / 2;
  const dominantFrequency = Math.max(0, Math.min(nyquist, finiteOr(spectrum.dominantFrequency, 0)));
  const impactRatio = impactEnergyRatio(spectrum);
  const interval = lastConfirmed ? now - lastConfirmed.timestamp : null;

  const build = (type: Classification["type"], confidence: number): ClassificationOutcome => ({
    type: "classified",
    impactRatio,
    classification: Object.freeze({
      type,
      confidence: clamp01(finiteOr(confidence, 0)),
      decibelLevel,
      dominantFrequency,
      intervalFromPrevious: interval,
    }),
  });

  // 3-4. Candidacy
  if (!isFootstepCandidate(spectrum, decibelLevel, config)) {
    return build("unknown", UNKNOWN_CONFIDENCE);
  }

  // 5. Tier
  const tier = selectTier(relativeDb);
  if (!tier) return { type: "rejected", reason: "below-threshold", decibelLevel };

  // 6. Running override
  if (interval !== null && interval >= 0 && interval <= config.runningIntervalSeconds) {
    return build("running", Math.min(MAX_CONFIDENCE, tier.confidence + RUNNING_BOOST));
  }

  return build(tier.type, tier.confidence);
}

export class HeuristicEventClassifier implements EventClassifier {
  classify(input: ClassifierInput): ClassificationOutcome {
    return classifyCandidate(input);
  }
}
