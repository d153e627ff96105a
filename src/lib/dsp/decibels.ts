/**
 * Amplitude → decibel conversion, dBFS and approximate dB SPL.
 *
 * The SPL scale is dBFS plus a base offset of 75 dB (quiet room ≈ -45 dBFS
 * reads ≈ 30 dB SPL) plus the user's microphone calibration.
 */

import { usableFrames, type PcmBuffer } from "./types";

export const BASE_DBFS_TO_SPL_OFFSET = 75;

export const MIN_DBFS = -160;
export const MAX_DBFS = 0;
export const MIN_SPL = 0;
export const MAX_SPL = 130;

/** Avoids log10(0) */
const MIN_AMPLITUDE = 1e-8;

/** Level-meter display range */
const DISPLAY_MIN_SPL = 30;
const DISPLAY_MAX_SPL = 100;

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

export function computeRms(samples: Float32Array, frameCount = samples.length): number {
  const n = Math.min(Math.floor(frameCount), samples.length);
  if (!(n > 0)) return 0;
  let sum = 0;
  for (let i = 0; i < n; i++) sum += samples[i] * samples[i];
  const rms = Math.sqrt(sum / n);
  return Number.isFinite(rms) ? rms : 0;
}

export function computePeak(samples: Float32Array, frameCount = samples.length): number {
  const n = Math.min(Math.floor(frameCount), samples.length);
  let peak = 0;
  for (let i = 0; i < n; i++) {
    const abs = Math.abs(samples[i]);
    if (abs > peak) peak = abs;
  }
  return peak;
}

export function rmsToDbfs(rms: number): number {
  if (!Number.isFinite(rms)) return MIN_DBFS;
  const db = 20 * Math.log10(Math.max(Math.abs(rms), MIN_AMPLITUDE));
  return clamp(db, MIN_DBFS, MAX_DBFS);
}

export function decibelsToAmplitude(dbfs: number): number {
  if (!Number.isFinite(dbfs)) return 0;
  return Math.pow(10, clamp(dbfs, MIN_DBFS, MAX_DBFS) / 20);
}

export function dbfsToSpl(dbfs: number, calibrationDb = 0): number {
  const spl = dbfs + BASE_DBFS_TO_SPL_OFFSET + calibrationDb;
  if (!Number.isFinite(spl)) return MIN_SPL;
  return clamp(spl, MIN_SPL, MAX_SPL);
}

export function splToDbfs(spl: number, calibrationDb = 0): number {
  return spl - BASE_DBFS_TO_SPL_OFFSET - calibrationDb;
}

/** Calibrated RMS level of a buffer. Empty or malformed buffers read as the 0 dB floor. */
export function calculateDecibelsSpl(buffer: PcmBuffer, calibrationDb = 0): number {
  const n = usableFrames(buffer);
  if (n === 0) return MIN_SPL;
  return dbfsToSpl(rmsToDbfs(computeRms(buffer.samples, n)), calibrationDb);
}

export function calculatePeakDecibelsSpl(buffer: PcmBuffer, calibrationDb = 0): number {
  const n = usableFrames(buffer);
  if (n === 0) return MIN_SPL;
  return dbfsToSpl(rmsToDbfs(computePeak(buffer.samples, n)), calibrationDb);
}

/** Map 30-100 dB SPL onto 0-1 for level meters */
export function normalizeSplForDisplay(spl: number): number {
  if (!Number.isFinite(spl)) return 0;
  return clamp((spl - DISPLAY_MIN_SPL) / (DISPLAY_MAX_SPL - DISPLAY_MIN_SPL), 0, 1);
}
