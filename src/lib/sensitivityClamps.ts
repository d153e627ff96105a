import type { SensitivityConfig } from "@/types/impact";

export const DEFAULT_SENSITIVITY: Readonly<SensitivityConfig> = Object.freeze({
  offsetDb: 0,
  calibrationDb: 0,
  sensitivity: 0.5,
});

export const SENSITIVITY_LIMITS = {
  offsetDb: { min: -10, max: 10 },
  calibrationDb: { min: -20, max: 20 },
  sensitivity: { min: 0, max: 1 },
} as const;

export interface ClampedSensitivity {
  config: SensitivityConfig;
  clampsApplied: string[];
}

const LABELS: Record<keyof SensitivityConfig, string> = {
  offsetDb: "Sensitivity offset",
  calibrationDb: "Calibration offset",
  sensitivity: "Sensitivity",
};

const UNITS: Record<keyof SensitivityConfig, string> = {
  offsetDb: "dB",
  calibrationDb: "dB",
  sensitivity: "",
};

function clampField(
  key: keyof SensitivityConfig,
  value: number,
  clamps: string[]
): number {
  const { min, max } = SENSITIVITY_LIMITS[key];
  const unit = UNITS[key];
  if (!Number.isFinite(value)) {
    clamps.push(`${LABELS[key]} ${value} is not a number; reset to ${DEFAULT_SENSITIVITY[key]}${unit}`);
    return DEFAULT_SENSITIVITY[key];
  }
  if (value < min) {
    clamps.push(`${LABELS[key]} clamped from ${value}${unit} to ${min}${unit}`);
    return min;
  }
  if (value > max) {
    clamps.push(`${LABELS[key]} clamped from ${value}${unit} to ${max}${unit}`);
    return max;
  }
  return value;
}

/** Out-of-range settings are clamped, never rejected. */
export function applySensitivityClamps(raw: Partial<SensitivityConfig>): ClampedSensitivity {
  const clamps: string[] = [];
  const config: SensitivityConfig = {
    offsetDb: clampField("offsetDb", raw.offsetDb ?? DEFAULT_SENSITIVITY.offsetDb, clamps),
    calibrationDb: clampField(
      "calibrationDb",
      raw.calibrationDb ?? DEFAULT_SENSITIVITY.calibrationDb,
      clamps
    ),
    sensitivity: clampField(
      "sensitivity",
      raw.sensitivity ?? DEFAULT_SENSITIVITY.sensitivity,
      clamps
    ),
  };
  return { config, clampsApplied: clamps };
}
