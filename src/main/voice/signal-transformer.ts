/**
 * Voice Reshaper - Signal Transformer
 * Pure buffer-to-buffer voice transforms, each blended toward the input by a factor in [0, 1]
 */

import type { AudioBuffer } from '../../shared/types/audio';
import { DEFAULT_VOICE_DSP_CONFIG, type VoiceDspConfig } from '../../shared/types/voice';
import { clamp01, peakAmplitude, rms } from '../../shared/utils';
import { defaultDspToolkit, type DspToolkit } from '../dsp';
import { resampleToLength, withSamples } from '../audio/buffer';
import { ProcessingError } from '../utils/errors';

const SILENCE_RMS = 1e-8;

export class SignalTransformer {
  private config: VoiceDspConfig;
  private dsp: DspToolkit;

  constructor(config?: Partial<VoiceDspConfig>, dsp: DspToolkit = defaultDspToolkit) {
    this.config = { ...DEFAULT_VOICE_DSP_CONFIG, ...config };
    this.dsp = dsp;
  }

  getConfig(): VoiceDspConfig {
    return { ...this.config };
  }

  /**
   * Shift pitch by `12·log2(ratio)·blend` semitones, keeping duration.
   * Shifts below the skip threshold return the input buffer itself.
   */
  pitchShift(buffer: AudioBuffer, ratio: number, blend: number): AudioBuffer {
    if (!(ratio > 0) || !Number.isFinite(ratio)) {
      throw new ProcessingError(`Pitch ratio must be a positive number, got ${ratio}`);
    }
    const semitones = 12 * Math.log2(ratio) * clamp01(blend);
    if (Math.abs(semitones) < this.config.pitchSkipSemitones || buffer.samples.length === 0) {
      return buffer;
    }

    const rate = 1 / Math.pow(2, semitones / 12);
    const stretched = this.dsp.timeStretch(buffer.samples, rate, {
      nFft: 2048,
      hopLength: 512,
      center: true,
    });
    return withSamples(buffer, resampleToLength(stretched, buffer.samples.length));
  }

  /**
   * Multiply every frequency bin with lowHz <= |f| <= highHz by
   * `factor·blend + (1 - blend)`. A unit gain returns the input buffer itself.
   */
  bandReweight(
    buffer: AudioBuffer,
    factor: number,
    blend: number,
    lowHz: number,
    highHz: number
  ): AudioBuffer {
    if (!Number.isFinite(factor) || factor < 0) {
      throw new ProcessingError(`Band gain factor must be a non-negative number, got ${factor}`);
    }
    const b = clamp01(blend);
    const gain = factor * b + (1 - b);
    if (gain === 1 || lowHz > highHz || buffer.samples.length === 0) {
      return buffer;
    }

    const filtered = this.dsp.applySpectralGain(buffer.samples, buffer.sampleRate, (frequency) =>
      frequency >= lowHz && frequency <= highHz ? gain : 1
    );
    return withSamples(buffer, filtered);
  }

  /**
   * Scale amplitude toward `targetRms`. Silent input is returned unchanged.
   */
  energyScale(buffer: AudioBuffer, targetRms: number, blend: number): AudioBuffer {
    const currentRms = rms(buffer.samples);
    if (currentRms < SILENCE_RMS || !Number.isFinite(targetRms) || targetRms < 0) {
      return buffer;
    }
    const b = clamp01(blend);
    const multiplier = (targetRms / currentRms) * b + (1 - b);
    if (multiplier === 1) {
      return buffer;
    }
    return withSamples(
      buffer,
      buffer.samples.map((sample) => sample * multiplier)
    );
  }

  /**
   * Rescale so the peak does not exceed the configured ceiling (0.95)
   */
  normalize(buffer: AudioBuffer): AudioBuffer {
    const peak = peakAmplitude(buffer.samples);
    if (peak <= this.config.normalizePeak) {
      return buffer;
    }
    const scale = this.config.normalizePeak / peak;
    return withSamples(
      buffer,
      buffer.samples.map((sample) => sample * scale)
    );
  }
}
