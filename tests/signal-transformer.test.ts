/**
 * Signal Transformer Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SignalTransformer } from '../src/main/voice/signal-transformer';
import { FeatureExtractor } from '../src/main/voice/feature-extractor';
import { createAudioBuffer } from '../src/main/audio/buffer';
import { ProcessingError } from '../src/main/utils/errors';
import { peakAmplitude, rms } from '../src/shared/utils';
import { sine, tone } from './helpers/signals';

describe('SignalTransformer', () => {
  let transformer: SignalTransformer;

  beforeEach(() => {
    transformer = new SignalTransformer();
  });

  describe('configuration', () => {
    it('should use default DSP constants', () => {
      const config = transformer.getConfig();
      expect(config.pitchSkipSemitones).toBe(0.1);
      expect(config.formantBandLowHz).toBe(300);
      expect(config.formantBandHighHz).toBe(3000);
      expect(config.brightnessCutoffHz).toBe(2000);
      expect(config.normalizePeak).toBe(0.95);
    });

    it('should accept overrides', () => {
      const custom = new SignalTransformer({ brightnessCutoffHz: 4000 });
      expect(custom.getConfig().brightnessCutoffHz).toBe(4000);
      expect(custom.getConfig().pitchSkipSemitones).toBe(0.1);
    });
  });

  describe('pitchShift()', () => {
    it('should return the input when the shift is below the skip threshold', () => {
      const buffer = tone(150, 0.5);
      // 12 * log2(1.005) = 0.086 semitones
      expect(transformer.pitchShift(buffer, 1.005, 1)).toBe(buffer);
      expect(transformer.pitchShift(buffer, 1, 1)).toBe(buffer);
      expect(transformer.pitchShift(buffer, 2, 0)).toBe(buffer);
    });

    it('should keep length and sample rate', () => {
      const buffer = tone(150, 0.5);
      const shifted = transformer.pitchShift(buffer, 1.25, 1);
      expect(shifted).not.toBe(buffer);
      expect(shifted.samples).toHaveLength(buffer.samples.length);
      expect(shifted.sampleRate).toBe(22050);
    });

    it('should raise the fundamental by the ratio', () => {
      const shifted = transformer.pitchShift(tone(150, 1), 2, 1);
      const profile = new FeatureExtractor().extract(shifted);
      expect(Math.abs(profile.f0Median - 300)).toBeLessThan(3);
    });

    it('should be deterministic', () => {
      const buffer = tone(150, 0.5);
      const first = transformer.pitchShift(buffer, 0.85, 0.8);
      const second = transformer.pitchShift(buffer, 0.85, 0.8);
      expect(Array.from(first.samples)).toEqual(Array.from(second.samples));
    });

    it('should reject a non-positive ratio', () => {
      const buffer = tone(150, 0.1);
      expect(() => transformer.pitchShift(buffer, 0, 1)).toThrow(ProcessingError);
      expect(() => transformer.pitchShift(buffer, -1, 1)).toThrow(ProcessingError);
    });
  });

  describe('bandReweight()', () => {
    it('should return the input for a unit gain', () => {
      const buffer = tone(150, 0.2);
      expect(transformer.bandReweight(buffer, 1, 1, 300, 3000)).toBe(buffer);
      expect(transformer.bandReweight(buffer, 2, 0, 300, 3000)).toBe(buffer);
    });

    it('should return the input for an inverted band', () => {
      const buffer = tone(150, 0.2);
      expect(transformer.bandReweight(buffer, 2, 1, 3000, 300)).toBe(buffer);
    });

    it('should remove the band when the gain is zero', () => {
      const low = sine(200, 1, 0.3);
      const high = sine(5000, 1, 0.3);
      const mixed = createAudioBuffer(low.map((value, i) => value + high[i]), 22050);

      const out = transformer.bandReweight(mixed, 0, 1, 2000, 11025);
      expect(out.samples).toHaveLength(mixed.samples.length);
      expect(Math.abs(rms(out.samples) - rms(low))).toBeLessThan(0.01);
    });

    it('should blend the gain toward unity', () => {
      const buffer = tone(5000, 1, 0.4);
      // gain = 0 * 0.5 + (1 - 0.5)
      const out = transformer.bandReweight(buffer, 0, 0.5, 2000, 11025);
      expect(Math.abs(rms(out.samples) - rms(buffer.samples) / 2)).toBeLessThan(0.01);
    });

    it('should reject a negative factor', () => {
      expect(() => transformer.bandReweight(tone(150, 0.1), -1, 1, 300, 3000)).toThrow(
        ProcessingError
      );
    });
  });

  describe('energyScale()', () => {
    it('should scale to the target RMS', () => {
      const buffer = createAudioBuffer(new Float32Array(100).fill(0.1), 22050);
      const out = transformer.energyScale(buffer, 0.2, 1);
      expect(out.samples[0]).toBeCloseTo(0.2, 6);
      expect(rms(out.samples)).toBeCloseTo(0.2, 6);
    });

    it('should blend the multiplier', () => {
      const buffer = createAudioBuffer(new Float32Array(100).fill(0.1), 22050);
      // multiplier = 2 * 0.5 + 0.5
      const out = transformer.energyScale(buffer, 0.2, 0.5);
      expect(out.samples[0]).toBeCloseTo(0.15, 6);
    });

    it('should leave silent input unchanged', () => {
      const buffer = createAudioBuffer(new Float32Array(100), 22050);
      expect(transformer.energyScale(buffer, 0.5, 1)).toBe(buffer);
    });

    it('should return the input when the multiplier is one', () => {
      const buffer = createAudioBuffer(new Float32Array(100).fill(0.1), 22050);
      expect(transformer.energyScale(buffer, 0.2, 0)).toBe(buffer);
    });
  });

  describe('normalize()', () => {
    it('should scale the peak down to 0.95', () => {
      const out = transformer.normalize(createAudioBuffer([2, -1, 0.5], 22050));
      expect(out.samples[0]).toBeCloseTo(0.95, 6);
      expect(out.samples[1]).toBeCloseTo(-0.475, 6);
      expect(out.samples[2]).toBeCloseTo(0.2375, 6);
    });

    it('should leave quieter audio untouched', () => {
      const buffer = tone(150, 0.1, 0.5);
      expect(transformer.normalize(buffer)).toBe(buffer);
    });

    it('should bound the peak of loud audio', () => {
      const out = transformer.normalize(tone(150, 0.1, 1.5));
      expect(peakAmplitude(out.samples)).toBeLessThanOrEqual(0.95 + 1e-6);
    });
  });
});
