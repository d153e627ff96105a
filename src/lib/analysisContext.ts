/**
 * AnalysisContext: the settings and calibration state one orchestrator reads.
 *
 * Each context owns its own ambient tracker and sensitivity, so parallel
 * sessions (and tests) never share hidden state. Setters clamp out-of-range
 * values and return the clamp messages; changes apply to later buffers only.
 */

import type { AmbientSnapshot, SensitivityConfig } from "@/types/impact";
import { AmbientLevelTracker, type AmbientTrackerOptions } from "@/lib/dsp/AmbientLevelTracker";
import { applySensitivityClamps, DEFAULT_SENSITIVITY } from "@/lib/sensitivityClamps";
import { logger } from "@/lib/logger";

export interface AnalysisContextOptions {
  sensitivity?: Partial<SensitivityConfig>;
  ambient?: AmbientTrackerOptions;
}

export class AnalysisContext {
  readonly ambient: AmbientLevelTracker;
  private sensitivity: Readonly<SensitivityConfig>;

  constructor(options: AnalysisContextOptions = {}) {
    this.ambient = new AmbientLevelTracker(options.ambient);
    this.sensitivity = DEFAULT_SENSITIVITY;
    if (options.sensitivity) this.update(options.sensitivity);
  }

  /** Frozen; safe to hold on to as the settings in force at a given moment */
  getSensitivity(): Readonly<SensitivityConfig> {
    return this.sensitivity;
  }

  getAmbient(): AmbientSnapshot {
    return this.ambient.getSnapshot();
  }

  setSensitivityOffset(offsetDb: number): string[] {
    return this.update({ offsetDb });
  }

  setCalibrationOffset(calibrationDb: number): string[] {
    return this.update({ calibrationDb });
  }

  setSensitivity(sensitivity: number): string[] {
    return this.update({ sensitivity });
  }

  resetAmbient(): void {
    this.ambient.reset();
  }

  /** Restores the offset and detector sensitivity; calibration is kept */
  resetSensitivity(): void {
    this.update({
      offsetDb: DEFAULT_SENSITIVITY.offsetDb,
      sensitivity: DEFAULT_SENSITIVITY.sensitivity,
    });
  }

  resetCalibration(): void {
    this.update({ calibrationDb: DEFAULT_SENSITIVITY.calibrationDb });
  }

  resetAll(): void {
    this.sensitivity = DEFAULT_SENSITIVITY;
    this.ambient.reset();
  }

  private update(patch: Partial<SensitivityConfig>): string[] {
    const { config, clampsApplied } = applySensitivityClamps({ ...this.sensitivity, ...patch });
    for (const msg of clampsApplied) logger.warn(`[AnalysisContext] ${msg}`);
    this.sensitivity = Object.freeze(config);
    return clampsApplied;
  }
}
