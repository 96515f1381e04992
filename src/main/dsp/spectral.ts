/**
 * Voice Reshaper - Spectral Statistics
 * Per-frame centroid, roll-off, bandwidth and zero-crossing rate
 */

export interface SpectralStats {
  centroid: Float64Array;
  rolloff: Float64Array;
  bandwidth: Float64Array;
}

/**
 * Spectral shape of each magnitude frame.
 * Silent frames report 0 for every statistic.
 */
export function spectralStats(
  magnitudeFrames: readonly Float64Array[],
  frequencies: Float64Array,
  rolloffPercent: number = 0.85
): SpectralStats {
  const frames = magnitudeFrames.length;
  const centroid = new Float64Array(frames);
  const rolloff = new Float64Array(frames);
  const bandwidth = new Float64Array(frames);

  for (let t = 0; t < frames; t++) {
    const mag = magnitudeFrames[t];
    let total = 0;
    let weighted = 0;
    for (let k = 0; k < mag.length; k++) {
      total += mag[k];
      weighted += frequencies[k] * mag[k];
    }
    if (total <= 0) continue;

    const c = weighted / total;
    centroid[t] = c;

    let spread = 0;
    for (let k = 0; k < mag.length; k++) {
      const delta = frequencies[k] - c;
      spread += (mag[k] / total) * delta * delta;
    }
    bandwidth[t] = Math.sqrt(spread);

    const threshold = rolloffPercent * total;
    let cumulative = 0;
    for (let k = 0; k < mag.length; k++) {
      cumulative += mag[k];
      if (cumulative >= threshold) {
        rolloff[t] = frequencies[k];
        break;
      }
    }
  }

  return { centroid, rolloff, bandwidth };
}

/**
 * Fraction of sign changes per centred frame (edge padded); zero counts as positive
 */
export function zeroCrossingRate(
  samples: ArrayLike<number>,
  frameLength: number = 2048,
  hopLength: number = 512
): Float64Array {
  const n = samples.length;
  if (n === 0) return new Float64Array(0);

  const pad = Math.floor(frameLength / 2);
  const at = (index: number): number => samples[Math.min(n - 1, Math.max(0, index - pad))];
  const frames = 1 + Math.floor(n / hopLength);
  const rates = new Float64Array(frames);

  for (let t = 0; t < frames; t++) {
    const start = t * hopLength;
    let crossings = 0;
    let previousNegative = at(start) < 0;
    for (let i = 1; i < frameLength; i++) {
      const negative = at(start + i) < 0;
      if (negative !== previousNegative) crossings++;
      previousNegative = negative;
    }
    rates[t] = crossings / frameLength;
  }

  return rates;
}
