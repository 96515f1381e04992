/**
 * Voice Reshaper - Short-Time Fourier Transform
 * Framing, windowing, STFT/ISTFT and phase-vocoder time stretching
 */

import { fft, isPowerOfTwo, MAX_CACHED_FFT_SIZE } from './fft';

// ============================================================================
// Types
// ============================================================================

export interface StftOptions {
  /** Frame length and FFT size (power of two) */
  nFft: number;
  /** Samples between frame starts */
  hopLength: number;
  /** Pad nFft/2 on both sides so frame t is centred on sample t*hop */
  center: boolean;
}

export const DEFAULT_STFT_OPTIONS: StftOptions = {
  nFft: 2048,
  hopLength: 512,
  center: true,
};

/**
 * One STFT column holding the non-negative frequency bins (nFft/2 + 1)
 */
export interface SpectrumFrame {
  re: Float64Array;
  im: Float64Array;
}

// ============================================================================
// Windowing & framing
// ============================================================================

const hannWindowCache = new Map<number, Float64Array>();

/**
 * Periodic Hann window (suited to overlap-add at hop = length/4)
 */
export function hannWindow(length: number): Float64Array {
  let win = hannWindowCache.get(length);
  if (!win) {
    win = new Float64Array(length);
    for (let i = 0; i < length; i++) {
      win[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / length);
    }
    if (length <= MAX_CACHED_FFT_SIZE) {
      hannWindowCache.set(length, win);
    }
  }
  return win;
}

/**
 * Reflect-pad `pad` samples on both sides. Signals too short to reflect are zero-padded.
 */
export function padCenter(signal: ArrayLike<number>, pad: number): Float64Array {
  const n = signal.length;
  const out = new Float64Array(n + 2 * pad);
  for (let i = 0; i < n; i++) {
    out[pad + i] = signal[i];
  }
  if (n > pad) {
    for (let i = 0; i < pad; i++) {
      out[pad - 1 - i] = signal[i + 1];
      out[pad + n + i] = signal[n - 2 - i];
    }
  }
  return out;
}

/**
 * Number of frames produced for a signal of `length` samples
 */
export function frameCount(length: number, options: StftOptions): number {
  const padded = options.center ? length + options.nFft : length;
  if (padded < options.nFft) return 0;
  return 1 + Math.floor((padded - options.nFft) / options.hopLength);
}

function toFloat64(signal: ArrayLike<number>): Float64Array {
  const out = new Float64Array(signal.length);
  for (let i = 0; i < signal.length; i++) {
    out[i] = signal[i];
  }
  return out;
}

// ============================================================================
// Transforms
// ============================================================================

export function stft(
  signal: ArrayLike<number>,
  options: StftOptions = DEFAULT_STFT_OPTIONS
): SpectrumFrame[] {
  const { nFft, hopLength, center } = options;
  if (!isPowerOfTwo(nFft)) {
    throw new RangeError(`nFft must be a power of two, got ${nFft}`);
  }

  const padded = center ? padCenter(signal, nFft / 2) : toFloat64(signal);
  const frames = frameCount(signal.length, options);
  const window = hannWindow(nFft);
  const bins = nFft / 2 + 1;
  const result: SpectrumFrame[] = [];
  const buffer = new Float64Array(nFft * 2);

  for (let t = 0; t < frames; t++) {
    const start = t * hopLength;
    buffer.fill(0);
    for (let i = 0; i < nFft; i++) {
      buffer[i * 2] = padded[start + i] * window[i];
    }
    fft(buffer);

    const re = new Float64Array(bins);
    const im = new Float64Array(bins);
    for (let k = 0; k < bins; k++) {
      re[k] = buffer[k * 2];
      im[k] = buffer[k * 2 + 1];
    }
    result.push({ re, im });
  }

  return result;
}

/**
 * Weighted overlap-add inverse of stft(); output is cut or zero-extended to `length`
 */
export function istft(
  frames: readonly SpectrumFrame[],
  length: number,
  options: StftOptions = DEFAULT_STFT_OPTIONS
): Float64Array {
  const { nFft, hopLength, center } = options;
  const window = hannWindow(nFft);
  const total = nFft + hopLength * Math.max(0, frames.length - 1);
  const signal = new Float64Array(total);
  const windowSum = new Float64Array(total);
  const buffer = new Float64Array(nFft * 2);
  const bins = nFft / 2 + 1;

  for (let t = 0; t < frames.length; t++) {
    const frame = frames[t];
    buffer.fill(0);
    for (let k = 0; k < bins; k++) {
      buffer[k * 2] = frame.re[k];
      buffer[k * 2 + 1] = frame.im[k];
    }
    // Hermitian mirror for a real-valued result
    for (let k = bins; k < nFft; k++) {
      buffer[k * 2] = frame.re[nFft - k];
      buffer[k * 2 + 1] = -frame.im[nFft - k];
    }
    fft(buffer, true);

    const start = t * hopLength;
    for (let i = 0; i < nFft; i++) {
      signal[start + i] += buffer[i * 2] * window[i];
      windowSum[start + i] += window[i] * window[i];
    }
  }

  for (let i = 0; i < total; i++) {
    if (windowSum[i] > 1e-10) {
      signal[i] /= windowSum[i];
    }
  }

  const offset = center ? nFft / 2 : 0;
  const out = new Float64Array(length);
  const count = Math.min(length, Math.max(0, total - offset));
  for (let i = 0; i < count; i++) {
    out[i] = signal[offset + i];
  }
  return out;
}

/**
 * Magnitude of every bin, frame by frame
 */
export function magnitudes(frames: readonly SpectrumFrame[]): Float64Array[] {
  return frames.map(({ re, im }) => {
    const mag = new Float64Array(re.length);
    for (let k = 0; k < re.length; k++) {
      mag[k] = Math.hypot(re[k], im[k]);
    }
    return mag;
  });
}

/**
 * Centre frequency (Hz) of every non-negative STFT bin
 */
export function binFrequencies(sampleRate: number, nFft: number): Float64Array {
  const bins = nFft / 2 + 1;
  const freqs = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    freqs[k] = (k * sampleRate) / nFft;
  }
  return freqs;
}

// ============================================================================
// Phase vocoder
// ============================================================================

function wrapPhase(phase: number): number {
  return phase - 2 * Math.PI * Math.round(phase / (2 * Math.PI));
}

/**
 * Resample an STFT along time by `rate` (>1 shortens, <1 lengthens),
 * interpolating magnitudes and accumulating phase advance per bin.
 */
export function phaseVocoder(
  frames: readonly SpectrumFrame[],
  rate: number,
  hopLength: number
): SpectrumFrame[] {
  if (frames.length === 0) return [];
  const bins = frames[0].re.length;
  const nFft = (bins - 1) * 2;

  const expectedAdvance = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    expectedAdvance[k] = (2 * Math.PI * hopLength * k) / nFft;
  }

  const phaseAcc = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    phaseAcc[k] = Math.atan2(frames[0].im[k], frames[0].re[k]);
  }

  const silent: SpectrumFrame = { re: new Float64Array(bins), im: new Float64Array(bins) };
  const columnAt = (index: number): SpectrumFrame =>
    index < frames.length ? frames[index] : silent;

  const out: SpectrumFrame[] = [];
  for (let step = 0; step < frames.length; step += rate) {
    const base = Math.floor(step);
    const alpha = step - base;
    const left = columnAt(base);
    const right = columnAt(base + 1);

    const re = new Float64Array(bins);
    const im = new Float64Array(bins);
    for (let k = 0; k < bins; k++) {
      const magLeft = Math.hypot(left.re[k], left.im[k]);
      const magRight = Math.hypot(right.re[k], right.im[k]);
      const mag = (1 - alpha) * magLeft + alpha * magRight;
      re[k] = mag * Math.cos(phaseAcc[k]);
      im[k] = mag * Math.sin(phaseAcc[k]);

      const deviation = wrapPhase(
        Math.atan2(right.im[k], right.re[k]) -
          Math.atan2(left.im[k], left.re[k]) -
          expectedAdvance[k]
      );
      phaseAcc[k] += expectedAdvance[k] + deviation;
    }
    out.push({ re, im });
  }

  return out;
}

/**
 * Change duration by 1/rate without changing pitch
 */
export function timeStretch(
  signal: ArrayLike<number>,
  rate: number,
  options: StftOptions = DEFAULT_STFT_OPTIONS
): Float64Array {
  if (!(rate > 0)) {
    throw new RangeError(`Stretch rate must be positive, got ${rate}`);
  }
  const frames = stft(signal, options);
  const stretched = phaseVocoder(frames, rate, options.hopLength);
  return istft(stretched, Math.round(signal.length / rate), options);
}
