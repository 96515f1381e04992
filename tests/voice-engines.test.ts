/**
 * Conversion and Cloning Engine Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConversionEngine } from '../src/main/voice/conversion-engine';
import { CloningEngine } from '../src/main/voice/cloning-engine';
import { FeatureExtractor } from '../src/main/voice/feature-extractor';
import {
  DEFAULT_SPEAKER_ID,
  getSpeakerPreset,
  listSpeakerPresets,
} from '../src/main/voice/speaker-presets';
import { peakAmplitude, rms } from '../src/shared/utils';
import { tone } from './helpers/signals';

describe('Speaker presets', () => {
  it('should list the built-in speakers', () => {
    const ids = listSpeakerPresets().map((preset) => preset.id);
    expect(ids).toEqual(['speaker_001', 'speaker_002', 'speaker_003', 'speaker_004', 'custom']);
  });

  it('should look up a preset by id', () => {
    expect(getSpeakerPreset('speaker_002')).toEqual({
      id: 'speaker_002',
      name: 'Female Voice A',
      description: 'Bright female voice',
      pitchShiftRatio: 1.25,
      formantShiftRatio: 0.95,
      brightnessFactor: 1.2,
    });
    expect(getSpeakerPreset('nobody')).toBeUndefined();
  });

  it('should hand out copies', () => {
    const [first] = listSpeakerPresets();
    first.pitchShiftRatio = 3;
    expect(getSpeakerPreset('speaker_001')?.pitchShiftRatio).toBe(0.85);
  });
});

describe('ConversionEngine', () => {
  let engine: ConversionEngine;

  beforeEach(() => {
    engine = new ConversionEngine();
  });

  it('should fall back to the default preset for an unknown speaker', () => {
    expect(engine.resolvePreset('speaker_999').id).toBe(DEFAULT_SPEAKER_ID);
  });

  it('should leave audio untouched for the neutral preset', () => {
    const buffer = tone(150, 0.5);
    expect(engine.convert(buffer, 'custom', 1)).toBe(buffer);
    expect(engine.convert(buffer, 'speaker_999', 1)).toBe(buffer);
  });

  it('should leave audio untouched at zero strength', () => {
    const buffer = tone(150, 0.5);
    expect(engine.convert(buffer, 'speaker_002', 0)).toBe(buffer);
  });

  it('should move the pitch toward the preset', () => {
    const converted = engine.convert(tone(150, 1), 'speaker_002', 1);
    const profile = new FeatureExtractor().extract(converted);

    expect(converted.samples).toHaveLength(22050);
    expect(converted.sampleRate).toBe(22050);
    expect(Math.abs(profile.f0Median - 187.5)).toBeLessThan(3);
    expect(peakAmplitude(converted.samples)).toBeLessThanOrEqual(0.95 + 1e-6);
  });

  it('should be deterministic', () => {
    const buffer = tone(160, 0.5);
    const first = engine.convert(buffer, 'speaker_001', 0.8);
    const second = engine.convert(buffer, 'speaker_001', 0.8);
    expect(Array.from(first.samples)).toEqual(Array.from(second.samples));
  });
});

describe('CloningEngine', () => {
  let engine: CloningEngine;
  let extractor: FeatureExtractor;

  beforeEach(() => {
    extractor = new FeatureExtractor();
    engine = new CloningEngine(extractor);
  });

  it('should return the target unchanged at zero similarity', () => {
    const reference = tone(220, 0.5, 0.2);
    const target = tone(150, 0.5, 0.5);
    const result = engine.clone(reference, target, 0);
    expect(result.buffer).toBe(target);
  });

  it('should leave a voice cloned onto itself unchanged', () => {
    const voice = tone(150, 0.5, 0.5);
    const result = engine.clone(voice, voice, 1);
    expect(result.buffer).toBe(voice);
    expect(result.profile).toEqual(extractor.extract(voice));
  });

  it('should transfer pitch and energy from the reference', () => {
    const reference = tone(200, 1, 0.2);
    const target = tone(150, 1, 0.5);
    const result = engine.clone(reference, target, 1);
    const output = extractor.extract(result.buffer);

    expect(result.profile.f0Mean).toBeCloseTo(200, 0);
    expect(Math.abs(output.f0Median - 200)).toBeLessThan(3);
    expect(rms(result.buffer.samples)).toBeCloseTo(rms(reference.samples), 4);
    expect(result.buffer.samples).toHaveLength(target.samples.length);
  });

  it('should be deterministic', () => {
    const reference = tone(200, 0.5, 0.2);
    const target = tone(150, 0.5, 0.5);
    const first = engine.clone(reference, target, 0.7);
    const second = engine.clone(reference, target, 0.7);
    expect(Array.from(first.buffer.samples)).toEqual(Array.from(second.buffer.samples));
    expect(first.profile).toEqual(second.profile);
  });
});
