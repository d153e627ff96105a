/**
 * FftSpectrumAnalyzer: single-frame spectral summary of a candidate buffer.
 *
 * Band energy is the RMS of the bin amplitudes mapped to each band, so bands
 * of different widths stay comparable.
 */

import { amplitudeSpectrum, isPowerOfTwo } from "./fft";
import { BANDS, DOMINANT_SEARCH_FLOOR_HZ, bandBinRange, type FrequencyBand } from "./frequencyBands";
import { usableFrames, type FrequencySpectrum, type PcmBuffer, type SpectrumAnalyzer } from "./types";

export const DEFAULT_FFT_SIZE = 2048;

function bandEnergy(amplitudes: Float64Array, band: FrequencyBand, binHz: number): number {
  const { lowBin, highBin } = bandBinRange(band, binHz, amplitudes.length);
  if (lowBin >= highBin) return 0;
  let energy = 0;
  for (let k = lowBin; k <= highBin; k++) energy += amplitudes[k] * amplitudes[k];
  return Math.sqrt(energy / (highBin - lowBin + 1));
}

function dominantFrequency(amplitudes: Float64Array, binHz: number): number {
  const startBin = Math.max(1, Math.floor(DOMINANT_SEARCH_FLOOR_HZ / binHz));
  let peakBin = 0;
  let peakVal = 0;
  for (let k = startBin; k < amplitudes.length; k++) {
    if (amplitudes[k] > peakVal) {
      peakVal = amplitudes[k];
      peakBin = k;
    }
  }
  return peakBin * binHz;
}

function spectralCentroid(amplitudes: Float64Array, binHz: number): number {
  let weighted = 0;
  let total = 0;
  for (let k = 0; k < amplitudes.length; k++) {
    weighted += k * binHz * amplitudes[k];
    total += amplitudes[k];
  }
  return total > 0 ? weighted / total : 0;
}

export class FftSpectrumAnalyzer implements SpectrumAnalyzer {
  readonly fftSize: number;

  constructor(fftSize = DEFAULT_FFT_SIZE) {
    if (!isPowerOfTwo(fftSize) || fftSize < 2) {
      throw new Error(`FftSpectrumAnalyzer: fftSize ${fftSize} must be a power of 2`);
    }
    this.fftSize = fftSize;
  }

  analyze(buffer: PcmBuffer): FrequencySpectrum | null {
    const frames = usableFrames(buffer);
    if (frames === 0) return null;

    const amplitudes = amplitudeSpectrum(buffer.samples, frames, this.fftSize);
    const binHz = buffer.sampleRate / this.fftSize;

    return Object.freeze({
      impactEnergy: bandEnergy(amplitudes, BANDS.impact, binHz),
      lowMidEnergy: bandEnergy(amplitudes, BANDS.lowMid, binHz),
      midEnergy: bandEnergy(amplitudes, BANDS.mid, binHz),
      highMidEnergy: bandEnergy(amplitudes, BANDS.highMid, binHz),
      highEnergy: bandEnergy(amplitudes, BANDS.high, binHz),
      dominantFrequency: dominantFrequency(amplitudes, binHz),
      spectralCentroid: spectralCentroid(amplitudes, binHz),
    });
  }
}
