import { describe, it, expect } from "vitest";
import { FftSpectrumAnalyzer } from "../SpectrumAnalyzer";
import { createPcmBuffer, impactEnergyRatio } from "../types";
import { SAMPLE_RATE, makeSine } from "./signals";

const BIN_HZ = SAMPLE_RATE / 2048;

describe("FftSpectrumAnalyzer", () => {
  const analyzer = new FftSpectrumAnalyzer();

  it("rejects an FFT size that is not a power of two", () => {
    expect(() => new FftSpectrumAnalyzer(1000)).toThrow(/power of 2/);
  });

  it("returns null for unusable buffers", () => {
    expect(analyzer.analyze(createPcmBuffer(new Float32Array(0), SAMPLE_RATE, 0))).toBeNull();
    expect(analyzer.analyze(createPcmBuffer(new Float32Array(2048), 0, 0))).toBeNull();
  });

  it("puts a 60 Hz thump in the impact band", () => {
    const buffer = createPcmBuffer(makeSine(60, SAMPLE_RATE, 0.15, 0.8), SAMPLE_RATE, 0);
    const spectrum = analyzer.analyze(buffer);
    expect(spectrum).not.toBeNull();
    if (!spectrum) return;

    expect(spectrum.dominantFrequency).toBe(3 * BIN_HZ);
    expect(impactEnergyRatio(spectrum)).toBeGreaterThanOrEqual(0.7);
    expect(spectrum.impactEnergy).toBeGreaterThan(spectrum.lowMidEnergy);
    expect(spectrum.spectralCentroid).toBeGreaterThan(0);
    expect(spectrum.spectralCentroid).toBeLessThan(SAMPLE_RATE / 2);
  });

  it("keeps a 1 kHz tone out of the impact band", () => {
    const buffer = createPcmBuffer(makeSine(1000, SAMPLE_RATE, 0.1, 0.5), SAMPLE_RATE, 0);
    const spectrum = analyzer.analyze(buffer);
    if (!spectrum) throw new Error("expected a spectrum");

    expect(spectrum.dominantFrequency).toBe(46 * BIN_HZ);
    expect(impactEnergyRatio(spectrum)).toBeLessThan(0.1);
  });

  it("reports zeros for digital silence", () => {
    const spectrum = analyzer.analyze(createPcmBuffer(new Float32Array(2048), SAMPLE_RATE, 0));
    expect(spectrum).toEqual({
      impactEnergy: 0,
      lowMidEnergy: 0,
      midEnergy: 0,
      highMidEnergy: 0,
      highEnergy: 0,
      dominantFrequency: 0,
      spectralCentroid: 0,
    });
  });

  it("zero-pads buffers shorter than the FFT", () => {
    const buffer = createPcmBuffer(makeSine(60, SAMPLE_RATE, 0.01, 0.5), SAMPLE_RATE, 0);
    const spectrum = analyzer.analyze(buffer);
    expect(spectrum).not.toBeNull();
    expect(spectrum?.impactEnergy).toBeGreaterThan(0);
  });

  it("returns frozen spectra", () => {
    const spectrum = analyzer.analyze(
      createPcmBuffer(makeSine(60, SAMPLE_RATE, 0.05, 0.5), SAMPLE_RATE, 0)
    );
    expect(Object.isFrozen(spectrum)).toBe(true);
  });
});
