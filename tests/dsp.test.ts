/**
 * DSP Primitive Tests
 * FFT, STFT/ISTFT, phase vocoder, YIN, mel cepstrum and spectral statistics
 */

import { describe, it, expect } from 'vitest';
import {
  fft,
  isPowerOfTwo,
  nextPowerOfTwo,
  toComplex,
  realPart,
  cachedTwiddleSizes,
  MAX_CACHED_FFT_SIZE,
} from '../src/main/dsp/fft';
import {
  stft,
  istft,
  padCenter,
  frameCount,
  hannWindow,
  timeStretch,
  binFrequencies,
  DEFAULT_STFT_OPTIONS,
} from '../src/main/dsp/stft';
import { pitchTrack, DEFAULT_PITCH_TRACK_OPTIONS } from '../src/main/dsp/pitch';
import { dct2, melFilterbank, melCepstrum } from '../src/main/dsp/mel';
import { spectralStats, zeroCrossingRate } from '../src/main/dsp/spectral';
import { applySpectralGain } from '../src/main/dsp';
import { rms } from '../src/shared/utils';
import { noise, sine } from './helpers/signals';

function maxAbsDifference(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let max = 0;
  for (let i = 0; i < a.length; i++) {
    max = Math.max(max, Math.abs(a[i] - b[i]));
  }
  return max;
}

describe('fft', () => {
  it('should recognise powers of two', () => {
    expect(isPowerOfTwo(1)).toBe(true);
    expect(isPowerOfTwo(1024)).toBe(true);
    expect(isPowerOfTwo(0)).toBe(false);
    expect(isPowerOfTwo(12)).toBe(false);
    expect(isPowerOfTwo(2.5)).toBe(false);
  });

  it('should round sizes up to the next power of two', () => {
    expect(nextPowerOfTwo(0)).toBe(1);
    expect(nextPowerOfTwo(1)).toBe(1);
    expect(nextPowerOfTwo(5)).toBe(8);
    expect(nextPowerOfTwo(8)).toBe(8);
    expect(nextPowerOfTwo(22050)).toBe(32768);
  });

  it('should transform an impulse into a flat spectrum', () => {
    const data = toComplex([1, 0, 0, 0], 4);
    fft(data);
    for (let k = 0; k < 4; k++) {
      expect(data[k * 2]).toBeCloseTo(1, 12);
      expect(data[k * 2 + 1]).toBeCloseTo(0, 12);
    }
  });

  it('should place a cosine in its positive and negative bins', () => {
    const signal = Array.from({ length: 8 }, (_, n) => Math.cos((2 * Math.PI * 2 * n) / 8));
    const data = toComplex(signal, 8);
    fft(data);

    for (let k = 0; k < 8; k++) {
      const magnitude = Math.hypot(data[k * 2], data[k * 2 + 1]);
      expect(magnitude).toBeCloseTo(k === 2 || k === 6 ? 4 : 0, 10);
    }
  });

  it('should invert the forward transform', () => {
    const signal = noise(64);
    const data = toComplex(signal, 64);
    fft(data);
    fft(data, true);
    expect(maxAbsDifference(realPart(data), signal)).toBeLessThan(1e-12);
  });

  it('should reject sizes that are not a power of two', () => {
    expect(() => fft(new Float64Array(12))).toThrow(RangeError);
  });
});

describe('stft', () => {
  it('should reflect-pad around the signal', () => {
    expect(Array.from(padCenter([1, 2, 3, 4], 2))).toEqual([3, 2, 1, 2, 3, 4, 3, 2]);
  });

  it('should zero-pad signals too short to reflect', () => {
    expect(Array.from(padCenter([1, 2], 2))).toEqual([0, 0, 1, 2, 0, 0]);
  });

  it('should use a periodic Hann window', () => {
    const win = hannWindow(4);
    expect(win[0]).toBe(0);
    expect(win[1]).toBeCloseTo(0.5, 12);
    expect(win[2]).toBeCloseTo(1, 12);
    expect(win[3]).toBeCloseTo(0.5, 12);
  });

  it('should produce one centred frame per hop plus one', () => {
    expect(frameCount(22050, DEFAULT_STFT_OPTIONS)).toBe(44);
    expect(frameCount(1000, { nFft: 2048, hopLength: 512, center: false })).toBe(0);

    const frames = stft(new Float32Array(22050));
    expect(frames).toHaveLength(44);
    expect(frames[0].re).toHaveLength(1025);
  });

  it('should reconstruct the input through istft', () => {
    const signal = noise(5000, 0.5, 7);
    const rebuilt = istft(stft(signal), signal.length);
    expect(rebuilt).toHaveLength(5000);
    expect(maxAbsDifference(rebuilt, signal)).toBeLessThan(1e-9);
  });

  it('should report bin centre frequencies', () => {
    const freqs = binFrequencies(22050, 2048);
    expect(freqs).toHaveLength(1025);
    expect(freqs[0]).toBe(0);
    expect(freqs[1024]).toBe(11025);
  });

  it('should change duration by the inverse of the stretch rate', () => {
    const signal = sine(200, 0.5);
    expect(timeStretch(signal, 2)).toHaveLength(Math.round(signal.length / 2));
    expect(timeStretch(signal, 0.5)).toHaveLength(signal.length * 2);
  });

  it('should reject a non-positive stretch rate', () => {
    expect(() => timeStretch(sine(200, 0.1), 0)).toThrow(RangeError);
  });
});

describe('pitchTrack', () => {
  it('should track a steady 150 Hz tone', () => {
    const track = pitchTrack(sine(150, 1), 22050);
    expect(track.f0).toHaveLength(40);
    expect(track.voiced.every(Boolean)).toBe(true);
    for (const f0 of track.f0) {
      expect(f0).toBeCloseTo(150, 0);
    }
  });

  it('should mark silence as unvoiced', () => {
    const track = pitchTrack(new Float32Array(22050), 22050);
    expect(track.voiced.some(Boolean)).toBe(false);
    expect(Array.from(track.f0).every((f0) => f0 === 0)).toBe(true);
  });

  it('should reject a fundamental below the search range', () => {
    const track = pitchTrack(sine(50, 1), 22050, DEFAULT_PITCH_TRACK_OPTIONS);
    expect(track.voiced.some(Boolean)).toBe(false);
  });

  it('should return an empty track for input shorter than one frame', () => {
    const track = pitchTrack(sine(150, 0.01), 22050);
    expect(track.f0).toHaveLength(0);
    expect(track.voiced).toEqual([]);
  });
});

describe('mel cepstrum', () => {
  it('should compute an orthonormal DCT-II', () => {
    const out = dct2([1, 1, 1, 1], 3);
    expect(out[0]).toBeCloseTo(2, 12);
    expect(out[1]).toBeCloseTo(0, 12);
    expect(out[2]).toBeCloseTo(0, 12);
  });

  it('should build non-negative triangular filters over every bin', () => {
    const filters = melFilterbank(22050, 2048, 128);
    expect(filters).toHaveLength(128);
    expect(filters[0]).toHaveLength(1025);
    for (const filter of filters) {
      expect(Array.from(filter).every((w) => w >= 0)).toBe(true);
      expect(Array.from(filter).some((w) => w > 0)).toBe(true);
    }
  });

  it('should floor silent frames at the minimum log power', () => {
    const cepstra = melCepstrum([new Float64Array(1025)]);
    expect(cepstra).toHaveLength(1);
    expect(cepstra[0]).toHaveLength(13);
    expect(cepstra[0][0]).toBeCloseTo(-100 * Math.sqrt(128), 6);
    expect(cepstra[0][1]).toBeCloseTo(0, 6);
  });
});

describe('spectral statistics', () => {
  it('should compute centroid, bandwidth and roll-off', () => {
    const freqs = Float64Array.from([0, 100, 200, 300]);
    const stats = spectralStats([Float64Array.from([0, 1, 0, 1])], freqs, 0.85);
    expect(stats.centroid[0]).toBe(200);
    expect(stats.bandwidth[0]).toBe(100);
    expect(stats.rolloff[0]).toBe(300);
  });

  it('should report zeros for a silent frame', () => {
    const stats = spectralStats([new Float64Array(4)], Float64Array.from([0, 100, 200, 300]));
    expect(stats.centroid[0]).toBe(0);
    expect(stats.bandwidth[0]).toBe(0);
    expect(stats.rolloff[0]).toBe(0);
  });

  it('should count zero crossings per edge-padded frame', () => {
    const alternating = [1, -1, 1, -1, 1, -1, 1, -1];
    expect(Array.from(zeroCrossingRate(alternating, 4, 2))).toEqual([0.25, 0.75, 0.75, 0.75, 0.25]);
  });

  it('should return no frames for empty input', () => {
    expect(zeroCrossingRate([])).toHaveLength(0);
  });
});

describe('applySpectralGain', () => {
  it('should leave the signal unchanged at unit gain', () => {
    const signal = noise(1000);
    const out = applySpectralGain(signal, 22050, () => 1);
    expect(out).toHaveLength(1000);
    expect(maxAbsDifference(out, signal)).toBeLessThan(1e-12);
  });

  it('should remove a band when its gain is zero', () => {
    const low = sine(200, 1, 0.3);
    const high = sine(5000, 1, 0.3);
    const mixed = low.map((value, i) => value + high[i]);

    const out = applySpectralGain(mixed, 22050, (f) => (f >= 2000 ? 0 : 1));
    expect(out).toHaveLength(mixed.length);
    expect(Math.abs(rms(out) - rms(low))).toBeLessThan(0.01);
  });

  it('should only cache twiddle tables up to the frame-sized limit', () => {
    fft(toComplex([1, 2, 3, 4, 5, 6, 7, 8], 8));
    // 30000 samples transform at 32768 points
    applySpectralGain(noise(30000), 22050, (f) => (f > 4000 ? 0.5 : 1));

    const sizes = cachedTwiddleSizes();
    expect(sizes).toContain(8);
    expect(sizes).not.toContain(32768);
    expect(Math.max(...sizes)).toBeLessThanOrEqual(MAX_CACHED_FFT_SIZE);
  });
});
