/**
 * Voice Reshaper - Cloning Engine
 * Moves a target utterance toward the measured characteristics of a reference voice
 */

import type { AudioBuffer } from '../../shared/types/audio';
import type { VoiceProfile } from '../../shared/types/voice';
import { clamp, clamp01, rms } from '../../shared/utils';
import { createModuleLogger } from '../utils/logger';
import { FeatureExtractor } from './feature-extractor';
import { SignalTransformer } from './signal-transformer';

const logger = createModuleLogger('CloningEngine');

export interface CloneResult {
  buffer: AudioBuffer;
  /** Profile of the reference voice */
  profile: VoiceProfile;
}

export class CloningEngine {
  private extractor: FeatureExtractor;
  private transformer: SignalTransformer;

  constructor(
    extractor: FeatureExtractor = new FeatureExtractor(),
    transformer: SignalTransformer = new SignalTransformer()
  ) {
    this.extractor = extractor;
    this.transformer = transformer;
  }

  /**
   * Transfer F0, spectral shape and energy from `reference` onto `target`,
   * blended by `similarity`
   */
  clone(reference: AudioBuffer, target: AudioBuffer, similarity: number): CloneResult {
    const blend = clamp01(similarity);
    const config = this.transformer.getConfig();
    const [minRatio, maxRatio] = config.spectralRatioLimits;
    const nyquist = target.sampleRate / 2;

    const refProfile = this.extractor.extract(reference);
    const targetProfile = this.extractor.extract(target);

    let current = target;

    // F0 transfer
    const f0Difference = Math.abs(targetProfile.f0Mean - refProfile.f0Mean);
    if (f0Difference > config.minF0DifferenceHz && targetProfile.f0Mean > 0) {
      current = this.transformer.pitchShift(
        current,
        refProfile.f0Mean / targetProfile.f0Mean,
        blend
      );
    }

    // Brightness from centroid ratio
    const centroidDifference = Math.abs(refProfile.spectralCentroid - targetProfile.spectralCentroid);
    if (centroidDifference > config.centroidThresholdHz && targetProfile.spectralCentroid > 0) {
      const ratio = clamp(
        refProfile.spectralCentroid / targetProfile.spectralCentroid,
        minRatio,
        maxRatio
      );
      current = this.transformer.bandReweight(
        current,
        ratio,
        blend,
        config.brightnessCutoffHz,
        nyquist
      );
    }

    // High band from roll-off ratio
    const rolloffDifference = Math.abs(refProfile.spectralRolloff - targetProfile.spectralRolloff);
    if (rolloffDifference > config.rolloffThresholdHz && targetProfile.spectralRolloff > 0) {
      const ratio = clamp(
        refProfile.spectralRolloff / targetProfile.spectralRolloff,
        minRatio,
        maxRatio
      );
      current = this.transformer.bandReweight(
        current,
        ratio,
        blend,
        Math.min(refProfile.spectralRolloff, targetProfile.spectralRolloff),
        nyquist
      );
    }

    current = this.transformer.energyScale(current, refProfile.rmsEnergy, blend);
    current = this.transformer.normalize(current);

    logger.debug('Clone applied', {
      similarity: blend,
      refF0: Math.round(refProfile.f0Mean),
      targetF0: Math.round(targetProfile.f0Mean),
      outputRms: Number(rms(current.samples).toFixed(4)),
    });

    return { buffer: current, profile: refProfile };
  }
}
