/**
 * Centralized frequency band definitions for impact analysis.
 * SpectrumAnalyzer and the classifier both read these.
 */

export interface FrequencyBand {
  readonly low: number;
  readonly high: number;
}

export const BANDS = {
  impact:  { low: 20,   high: 100 },  // sub-bass thud of a heel strike through the floor
  lowMid:  { low: 100,  high: 300 },
  mid:     { low: 300,  high: 1000 },
  highMid: { low: 1000, high: 3000 }, // shuffling, scraping
  high:    { low: 3000, high: 8000 }, // transients
} as const satisfies Record<string, FrequencyBand>;

export type BandName = keyof typeof BANDS;

/** Lowest frequency considered for the dominant-frequency search (DC/rumble exclusion) */
export const DOMINANT_SEARCH_FLOOR_HZ = 20;

/** Inclusive bin range covering a band, clamped to the available bins */
export function bandBinRange(
  band: FrequencyBand,
  binHz: number,
  numBins: number
): { lowBin: number; highBin: number } {
  const lowBin = Math.max(0, Math.floor(band.low / binHz));
  const highBin = Math.min(numBins - 1, Math.floor(band.high / binHz));
  return { lowBin, highBin };
}
