/**
 * Voice Reshaper - Feature Extractor
 * Reduces an utterance to a fixed-size VoiceProfile
 *
 * Measures:
 * - F0 statistics from a YIN pitch track (voiced frames only)
 * - Spectral centroid, roll-off and bandwidth from the magnitude STFT
 * - RMS energy and zero-crossing rate
 * - 13 MFCCs from a mel power spectrogram
 *
 * Every field is finite for any well-formed input; silent or empty audio
 * falls back to fixed F0 statistics and zeros.
 */

import type { AudioBuffer } from '../../shared/types/audio';
import {
  DEFAULT_FEATURE_EXTRACTION_CONFIG,
  F0_FALLBACK,
  type FeatureExtractionConfig,
  type VoiceProfile,
} from '../../shared/types/voice';
import { average, median, minMax, rms, standardDeviation } from '../../shared/utils';
import { defaultDspToolkit, magnitudes, binFrequencies, type DspToolkit } from '../dsp';
import { toMono } from '../audio/buffer';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('FeatureExtractor');

/**
 * Profile of an empty buffer
 */
function emptyProfile(mfccCount: number): VoiceProfile {
  return {
    f0Mean: F0_FALLBACK.mean,
    f0Std: F0_FALLBACK.std,
    f0Median: F0_FALLBACK.median,
    f0Range: F0_FALLBACK.range,
    spectralCentroid: 0,
    spectralRolloff: 0,
    spectralBandwidth: 0,
    rmsEnergy: 0,
    zeroCrossingRate: 0,
    mfcc: new Array<number>(mfccCount).fill(0),
    durationSeconds: 0,
    voicedFrameRatio: 0,
  };
}

/**
 * Replace non-finite values with 0
 */
function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export class FeatureExtractor {
  private config: FeatureExtractionConfig;
  private dsp: DspToolkit;

  constructor(config?: Partial<FeatureExtractionConfig>, dsp: DspToolkit = defaultDspToolkit) {
    this.config = { ...DEFAULT_FEATURE_EXTRACTION_CONFIG, ...config };
    this.dsp = dsp;
  }

  /**
   * Compute the voice profile of a buffer (down-mixed first if needed)
   */
  extract(input: AudioBuffer): VoiceProfile {
    const buffer = toMono(input);
    const { samples, sampleRate } = buffer;

    if (samples.length === 0) {
      logger.debug('Empty buffer, returning fallback profile');
      return emptyProfile(this.config.mfccCount);
    }

    const done = logger.time('Feature extraction');
    const { frameSize, hopSize } = this.config;

    // Pitch
    const track = this.dsp.pitchTrack(samples, sampleRate, {
      frameLength: frameSize,
      hopLength: hopSize,
      fMin: this.config.fMin,
      fMax: this.config.fMax,
      threshold: this.config.yinThreshold,
      silenceRms: 1e-4,
    });
    const voicedF0: number[] = [];
    for (let i = 0; i < track.f0.length; i++) {
      if (track.voiced[i]) voicedF0.push(track.f0[i]);
    }

    let f0Mean: number = F0_FALLBACK.mean;
    let f0Std: number = F0_FALLBACK.std;
    let f0Median: number = F0_FALLBACK.median;
    let f0Range: number = F0_FALLBACK.range;
    if (voicedF0.length > 0) {
      const { min, max } = minMax(voicedF0);
      f0Mean = average(voicedF0);
      f0Std = standardDeviation(voicedF0);
      f0Median = median(voicedF0);
      f0Range = max - min;
    }

    // Spectral shape
    const stftOptions = { nFft: frameSize, hopLength: hopSize, center: true };
    const mags = magnitudes(this.dsp.stft(samples, stftOptions));
    const stats = this.dsp.spectralStats(
      mags,
      binFrequencies(sampleRate, frameSize),
      this.config.rolloffPercent
    );

    // Timbre
    const cepstra = this.dsp.melCepstrum(mags, {
      sampleRate,
      nFft: frameSize,
      nMels: this.config.melBands,
      nMfcc: this.config.mfccCount,
      topDb: 80,
    });
    const mfcc: number[] = [];
    for (let k = 0; k < this.config.mfccCount; k++) {
      mfcc.push(finite(average(cepstra.map((frame) => frame[k]))));
    }

    const profile: VoiceProfile = {
      f0Mean: finite(f0Mean),
      f0Std: finite(f0Std),
      f0Median: finite(f0Median),
      f0Range: finite(f0Range),
      spectralCentroid: finite(average(stats.centroid)),
      spectralRolloff: finite(average(stats.rolloff)),
      spectralBandwidth: finite(average(stats.bandwidth)),
      rmsEnergy: finite(rms(samples)),
      zeroCrossingRate: finite(average(this.dsp.zeroCrossingRate(samples, frameSize, hopSize))),
      mfcc,
      durationSeconds: samples.length / sampleRate,
      voicedFrameRatio: track.f0.length > 0 ? voicedF0.length / track.f0.length : 0,
    };

    done();
    logger.debug('Voice profile extracted', {
      f0Mean: Math.round(profile.f0Mean),
      centroid: Math.round(profile.spectralCentroid),
      voicedFrameRatio: Number(profile.voicedFrameRatio.toFixed(2)),
      durationSeconds: Number(profile.durationSeconds.toFixed(2)),
    });

    return profile;
  }
}
