/**
 * Voice Reshaper - DSP Toolkit
 * Analysis and resynthesis primitives shared by the voice engines
 */

import { fft, nextPowerOfTwo, toComplex, realPart } from './fft';
import {
  stft,
  istft,
  magnitudes,
  binFrequencies,
  timeStretch,
  DEFAULT_STFT_OPTIONS,
  type StftOptions,
  type SpectrumFrame,
} from './stft';
import { pitchTrack, DEFAULT_PITCH_TRACK_OPTIONS, type PitchTrack, type PitchTrackOptions } from './pitch';
import { melCepstrum, DEFAULT_MEL_OPTIONS, type MelOptions } from './mel';
import { spectralStats, zeroCrossingRate, type SpectralStats } from './spectral';

/**
 * Primitive operations the feature extractor and signal transformer depend on.
 * Swappable so engines can run against an alternative implementation.
 */
export interface DspToolkit {
  pitchTrack(samples: ArrayLike<number>, sampleRate: number, options?: PitchTrackOptions): PitchTrack;
  stft(signal: ArrayLike<number>, options?: StftOptions): SpectrumFrame[];
  istft(frames: readonly SpectrumFrame[], length: number, options?: StftOptions): Float64Array;
  timeStretch(signal: ArrayLike<number>, rate: number, options?: StftOptions): Float64Array;
  melCepstrum(magnitudeFrames: readonly Float64Array[], options?: MelOptions): Float64Array[];
  spectralStats(
    magnitudeFrames: readonly Float64Array[],
    frequencies: Float64Array,
    rolloffPercent?: number
  ): SpectralStats;
  zeroCrossingRate(samples: ArrayLike<number>, frameLength?: number, hopLength?: number): Float64Array;
  /** Scale frequency bins of the whole signal with a gain function of |f| */
  applySpectralGain(
    signal: ArrayLike<number>,
    sampleRate: number,
    gainAt: (frequencyHz: number) => number
  ): Float64Array;
}

/**
 * Whole-signal FFT filter: zero-pad to a power of two, weight each bin by
 * the gain at its absolute frequency, invert and truncate.
 */
export function applySpectralGain(
  signal: ArrayLike<number>,
  sampleRate: number,
  gainAt: (frequencyHz: number) => number
): Float64Array {
  const length = signal.length;
  if (length === 0) return new Float64Array(0);

  const size = nextPowerOfTwo(length);
  const data = toComplex(signal, size);
  fft(data);

  for (let k = 0; k < size; k++) {
    // Bins above size/2 are the negative frequencies
    const frequency = (Math.min(k, size - k) * sampleRate) / size;
    const gain = gainAt(frequency);
    if (gain !== 1) {
      data[k * 2] *= gain;
      data[k * 2 + 1] *= gain;
    }
  }

  fft(data, true);
  return realPart(data, length);
}

export const defaultDspToolkit: DspToolkit = {
  pitchTrack,
  stft,
  istft,
  timeStretch,
  melCepstrum,
  spectralStats,
  zeroCrossingRate,
  applySpectralGain,
};

export {
  fft,
  nextPowerOfTwo,
  magnitudes,
  binFrequencies,
  DEFAULT_STFT_OPTIONS,
  DEFAULT_PITCH_TRACK_OPTIONS,
  DEFAULT_MEL_OPTIONS,
};
export type { StftOptions, SpectrumFrame, PitchTrack, PitchTrackOptions, MelOptions, SpectralStats };
