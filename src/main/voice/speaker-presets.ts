/**
 * Voice Reshaper - Speaker Presets
 * Built-in conversion targets
 */

import type { SpeakerPreset } from '../../shared/types/voice';

export const DEFAULT_SPEAKER_ID = 'custom';

export const SPEAKER_PRESETS: Readonly<Record<string, SpeakerPreset>> = {
  speaker_001: {
    id: 'speaker_001',
    name: 'Male Voice A',
    description: 'Deep male voice',
    pitchShiftRatio: 0.85,
    formantShiftRatio: 1.05,
    brightnessFactor: 0.9,
  },
  speaker_002: {
    id: 'speaker_002',
    name: 'Female Voice A',
    description: 'Bright female voice',
    pitchShiftRatio: 1.25,
    formantShiftRatio: 0.95,
    brightnessFactor: 1.2,
  },
  speaker_003: {
    id: 'speaker_003',
    name: 'Male Voice B',
    description: 'Warm male voice',
    pitchShiftRatio: 0.9,
    formantShiftRatio: 1.02,
    brightnessFactor: 0.95,
  },
  speaker_004: {
    id: 'speaker_004',
    name: 'Female Voice B',
    description: 'Soft female voice',
    pitchShiftRatio: 1.18,
    formantShiftRatio: 0.97,
    brightnessFactor: 1.1,
  },
  custom: {
    id: 'custom',
    name: 'Custom Voice',
    description: 'Identity preset; leaves pitch and timbre unchanged',
    pitchShiftRatio: 1.0,
    formantShiftRatio: 1.0,
    brightnessFactor: 1.0,
  },
};

/**
 * Look up a preset by id
 */
export function getSpeakerPreset(id: string): SpeakerPreset | undefined {
  return Object.prototype.hasOwnProperty.call(SPEAKER_PRESETS, id) ? SPEAKER_PRESETS[id] : undefined;
}

export function listSpeakerPresets(): SpeakerPreset[] {
  return Object.values(SPEAKER_PRESETS).map((preset) => ({ ...preset }));
}
