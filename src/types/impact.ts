// ── Impact types ──
export const IMPACT_TYPES = [
  "mild",
  "medium",
  "hard",
  "extreme",
  "running",
  "unknown",
] as const;

export type ImpactType = (typeof IMPACT_TYPES)[number];

/** Types that count as a footstep tier (ordered by loudness). */
export type TierType = Exclude<ImpactType, "running" | "unknown">;

export const IMPACT_TYPE_LABELS: Record<ImpactType, string> = {
  mild: "Mild Stomping",
  medium: "Medium Stomping",
  hard: "Hard Stomping",
  extreme: "Extreme Stomping",
  running: "Running",
  unknown: "Unknown",
};

// ── Classification ──
export interface Classification {
  readonly type: ImpactType;
  /** 0-1 */
  readonly confidence: number;
  /** Approximate dB SPL, 0-130 */
  readonly decibelLevel: number;
  readonly dominantFrequency: number;
  /** Seconds since the previous confirmed event, null for the first one */
  readonly intervalFromPrevious: number | null;
}

// ── Session ──
export interface AnalysisSession {
  id: string;
  startedAt: Date;
  label?: string;
}

export type AnalysisStatus = "idle" | "analyzing";

/** A timestamped decibel reading kept as classifier context. */
export interface EventMark {
  readonly timestamp: number;
  readonly decibelLevel: number;
}

export interface SessionAnalysisState {
  lastConfirmed: EventMark | null;
  /** Echo reference */
  lastLoud: EventMark | null;
}

// ── Settings ──
export interface SensitivityConfig {
  /** Shifts every ambient-relative threshold, dB (-10 to +10) */
  offsetDb: number;
  /** Microphone calibration added to the dBFS → SPL offset (-20 to +20) */
  calibrationDb: number;
  /** 0 (least sensitive) to 1 (most sensitive); drives the detector RMS gate */
  sensitivity: number;
}

export interface AmbientSnapshot {
  readonly ambientLevel: number;
  readonly calibrated: boolean;
  readonly readingCount: number;
}

export interface AmbientThresholds {
  mild: number;
  medium: number;
  hard: number;
  extreme: number;
}
