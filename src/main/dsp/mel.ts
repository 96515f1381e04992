/**
 * Voice Reshaper - Mel Cepstrum
 * Mel filterbank, log power compression and DCT-II for MFCCs
 */

const melScale = (f: number): number => 2595 * Math.log10(1 + f / 700);
const invMelScale = (m: number): number => 700 * (Math.pow(10, m / 2595) - 1);

export interface MelOptions {
  sampleRate: number;
  nFft: number;
  nMels: number;
  nMfcc: number;
  /** Dynamic range kept below the loudest bin (dB) */
  topDb: number;
}

export const DEFAULT_MEL_OPTIONS: MelOptions = {
  sampleRate: 22050,
  nFft: 2048,
  nMels: 128,
  nMfcc: 13,
  topDb: 80,
};

const filterbankCache = new Map<string, Float64Array[]>();

/**
 * Triangular, area-normalised mel filters over the nFft/2 + 1 STFT bins
 */
export function melFilterbank(sampleRate: number, nFft: number, nMels: number): Float64Array[] {
  const key = `${sampleRate}:${nFft}:${nMels}`;
  const cached = filterbankCache.get(key);
  if (cached) return cached;

  const bins = nFft / 2 + 1;
  const minMel = melScale(0);
  const maxMel = melScale(sampleRate / 2);
  const melPoints: number[] = [];
  for (let i = 0; i <= nMels + 1; i++) {
    melPoints.push(invMelScale(minMel + (i * (maxMel - minMel)) / (nMels + 1)));
  }

  const filters: Float64Array[] = [];
  for (let m = 0; m < nMels; m++) {
    const lower = melPoints[m];
    const centre = melPoints[m + 1];
    const upper = melPoints[m + 2];
    const norm = 2 / (upper - lower);
    const filter = new Float64Array(bins);

    for (let k = 0; k < bins; k++) {
      const freq = (k * sampleRate) / nFft;
      const rising = (freq - lower) / (centre - lower);
      const falling = (upper - freq) / (upper - centre);
      filter[k] = Math.max(0, Math.min(rising, falling)) * norm;
    }
    filters.push(filter);
  }

  filterbankCache.set(key, filters);
  return filters;
}

/**
 * Orthonormal DCT-II of `input`, first `count` coefficients
 */
export function dct2(input: ArrayLike<number>, count: number): Float64Array {
  const n = input.length;
  const out = new Float64Array(count);
  if (n === 0) return out;
  for (let k = 0; k < count; k++) {
    let acc = 0;
    for (let i = 0; i < n; i++) {
      acc += input[i] * Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
    out[k] = acc * (k === 0 ? Math.sqrt(1 / n) : Math.sqrt(2 / n));
  }
  return out;
}

/**
 * MFCC per frame from magnitude STFT frames
 */
export function melCepstrum(
  magnitudeFrames: readonly Float64Array[],
  options: MelOptions = DEFAULT_MEL_OPTIONS
): Float64Array[] {
  if (magnitudeFrames.length === 0) return [];
  const filters = melFilterbank(options.sampleRate, options.nFft, options.nMels);

  // Mel power in dB, then clamp to topDb below the global maximum
  let peakDb = -Infinity;
  const melDb = magnitudeFrames.map((mag) => {
    const bands = new Float64Array(filters.length);
    for (let m = 0; m < filters.length; m++) {
      const filter = filters[m];
      let energy = 0;
      for (let k = 0; k < mag.length; k++) {
        energy += filter[k] * mag[k] * mag[k];
      }
      bands[m] = 10 * Math.log10(Math.max(1e-10, energy));
      if (bands[m] > peakDb) peakDb = bands[m];
    }
    return bands;
  });

  const floorDb = peakDb - options.topDb;
  return melDb.map((bands) => {
    for (let m = 0; m < bands.length; m++) {
      if (bands[m] < floorDb) bands[m] = floorDb;
    }
    return dct2(bands, options.nMfcc);
  });
}
