/**
 * Voice Reshaper - Conversion Engine
 * Reshapes an utterance toward a built-in speaker preset
 */

import type { AudioBuffer } from '../../shared/types/audio';
import type { SpeakerPreset } from '../../shared/types/voice';
import { clamp01 } from '../../shared/utils';
import { createModuleLogger } from '../utils/logger';
import { SignalTransformer } from './signal-transformer';
import { DEFAULT_SPEAKER_ID, SPEAKER_PRESETS, getSpeakerPreset, listSpeakerPresets } from './speaker-presets';

const logger = createModuleLogger('ConversionEngine');

export class ConversionEngine {
  private transformer: SignalTransformer;

  constructor(transformer: SignalTransformer = new SignalTransformer()) {
    this.transformer = transformer;
  }

  /**
   * Resolve a speaker id; unknown ids fall back to the default preset
   */
  resolvePreset(speakerId: string): SpeakerPreset {
    const preset = getSpeakerPreset(speakerId);
    if (preset) return preset;

    logger.warn('Unknown speaker id, using default preset', {
      speakerId,
      fallback: DEFAULT_SPEAKER_ID,
    });
    return SPEAKER_PRESETS[DEFAULT_SPEAKER_ID];
  }

  listSpeakers(): SpeakerPreset[] {
    return listSpeakerPresets();
  }

  /**
   * Apply pitch, formant-band and brightness-band adjustments blended by
   * `strength`, then normalize
   */
  convert(buffer: AudioBuffer, speakerId: string, strength: number): AudioBuffer {
    const preset = this.resolvePreset(speakerId);
    const blend = clamp01(strength);
    const config = this.transformer.getConfig();
    const nyquist = buffer.sampleRate / 2;

    logger.debug('Converting', { speaker: preset.id, strength: blend });

    let current = this.transformer.pitchShift(buffer, preset.pitchShiftRatio, blend);
    current = this.transformer.bandReweight(
      current,
      preset.formantShiftRatio,
      blend,
      config.formantBandLowHz,
      config.formantBandHighHz
    );
    current = this.transformer.bandReweight(
      current,
      preset.brightnessFactor,
      blend,
      config.brightnessCutoffHz,
      nyquist
    );

    return this.transformer.normalize(current);
  }
}
