/**
 * Shared radix-2 Cooley-Tukey FFT with cached Hann windows and twiddle factors.
 */

// ── Cached resources ──────────────────────────────────────────────
const hannCache = new Map<number, Float32Array>();
const twiddleCache = new Map<number, { cosTable: Float64Array; sinTable: Float64Array }>();

/** Get or compute a Hann window of the given size. */
export function getHannWindow(size: number): Float32Array {
  let w = hannCache.get(size);
  if (w) return w;
  w = new Float32Array(size);
  if (size === 1) {
    w[0] = 1;
  } else {
    for (let i = 0; i < size; i++) {
      w[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / (size - 1)));
    }
  }
  hannCache.set(size, w);
  return w;
}

function getTwiddles(N: number) {
  let t = twiddleCache.get(N);
  if (t) return t;
  const cosTable = new Float64Array(N / 2);
  const sinTable = new Float64Array(N / 2);
  for (let i = 0; i < N / 2; i++) {
    const angle = (-2 * Math.PI * i) / N;
    cosTable[i] = Math.cos(angle);
    sinTable[i] = Math.sin(angle);
  }
  t = { cosTable, sinTable };
  twiddleCache.set(N, t);
  return t;
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * In-place radix-2 Cooley-Tukey FFT.
 * re and im must be the same length and a power of 2.
 */
export function forwardFFT(re: Float64Array, im: Float64Array): void {
  const N = re.length;
  const { cosTable, sinTable } = getTwiddles(N);

  // Bit-reversal permutation
  for (let i = 1, j = 0; i < N; i++) {
    let bit = N >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      let tmp = re[i]; re[i] = re[j]; re[j] = tmp;
      tmp = im[i]; im[i] = im[j]; im[j] = tmp;
    }
  }

  // Butterfly stages
  for (let len = 2; len <= N; len <<= 1) {
    const half = len >> 1;
    const step = N / len;
    for (let i = 0; i < N; i += len) {
      for (let j = 0; j < half; j++) {
        const twIdx = j * step;
        const tRe = cosTable[twIdx] * re[i + j + half] - sinTable[twIdx] * im[i + j + half];
        const tIm = cosTable[twIdx] * im[i + j + half] + sinTable[twIdx] * re[i + j + half];
        re[i + j + half] = re[i + j] - tRe;
        im[i + j + half] = im[i + j] - tIm;
        re[i + j] += tRe;
        im[i + j] += tIm;
      }
    }
  }
}

/**
 * Single-sided amplitude spectrum of a Hann-windowed, zero-padded frame.
 *
 * Windows the first min(length, fftSize) samples and returns fftSize / 2 bins
 * scaled by 2/N. Non-finite samples are treated as silence.
 */
export function amplitudeSpectrum(
  signal: Float32Array,
  length: number,
  fftSize: number
): Float64Array {
  if (!isPowerOfTwo(fftSize)) {
    throw new Error(`amplitudeSpectrum: fftSize ${fftSize} is not a power of 2`);
  }
  const N = fftSize;
  const hann = getHannWindow(N);
  const re = new Float64Array(N);
  const im = new Float64Array(N);

  const available = Math.min(N, length, signal.length);
  for (let i = 0; i < available; i++) {
    const s = signal[i];
    re[i] = Number.isFinite(s) ? s * hann[i] : 0;
  }

  forwardFFT(re, im);

  const half = N / 2;
  const scale = 2 / N;
  const amplitudes = new Float64Array(half);
  for (let k = 0; k < half; k++) {
    amplitudes[k] = Math.sqrt(re[k] * re[k] + im[k] * im[k]) * scale;
  }
  return amplitudes;
}
