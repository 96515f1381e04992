/**
 * Signal Test Helpers
 * Deterministic test audio
 */

import type { AudioBuffer } from '../../src/shared/types/audio';
import { createAudioBuffer } from '../../src/main/audio/buffer';
import { encodeWav } from '../../src/main/audio/wav';

export const TEST_SAMPLE_RATE = 22050;

/**
 * Samples of a sine wave
 */
export function sine(
  frequency: number,
  seconds: number,
  amplitude: number = 0.5,
  sampleRate: number = TEST_SAMPLE_RATE
): Float32Array {
  const length = Math.round(seconds * sampleRate);
  const samples = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
  }
  return samples;
}

/**
 * Mono sine-wave buffer
 */
export function tone(
  frequency: number,
  seconds: number,
  amplitude: number = 0.5,
  sampleRate: number = TEST_SAMPLE_RATE
): AudioBuffer {
  return createAudioBuffer(sine(frequency, seconds, amplitude, sampleRate), sampleRate);
}

/**
 * 16-bit WAV file of a sine wave
 */
export function toneWav(
  frequency: number,
  seconds: number,
  amplitude: number = 0.5,
  sampleRate: number = TEST_SAMPLE_RATE
): Buffer {
  return encodeWav(tone(frequency, seconds, amplitude, sampleRate));
}

/**
 * Pseudo-random but repeatable noise in [-amplitude, amplitude]
 */
export function noise(length: number, amplitude: number = 0.5, seed: number = 1): Float64Array {
  const out = new Float64Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    // Park-Miller LCG
    state = (state * 16807) % 2147483647;
    out[i] = amplitude * ((state / 2147483647) * 2 - 1);
  }
  return out;
}

export interface WavFixture {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitDepth: number;
  data: Buffer;
  /** Chunks inserted between fmt and data */
  extraChunks?: Array<{ id: string; body: Buffer }>;
  /** Write a 40-byte WAVE_FORMAT_EXTENSIBLE fmt chunk carrying formatTag as sub-format */
  extensible?: boolean;
}

/**
 * Hand-assemble a RIFF/WAVE file
 */
export function buildWav(fixture: WavFixture): Buffer {
  const blockAlign = (fixture.channels * fixture.bitDepth) / 8;
  const fmtSize = fixture.extensible ? 40 : 16;
  const fmt = Buffer.alloc(fmtSize);
  fmt.writeUInt16LE(fixture.extensible ? 0xfffe : fixture.formatTag, 0);
  fmt.writeUInt16LE(fixture.channels, 2);
  fmt.writeUInt32LE(fixture.sampleRate, 4);
  fmt.writeUInt32LE(fixture.sampleRate * blockAlign, 8);
  fmt.writeUInt16LE(blockAlign, 12);
  fmt.writeUInt16LE(fixture.bitDepth, 14);
  if (fixture.extensible) {
    fmt.writeUInt16LE(22, 16);
    fmt.writeUInt16LE(fixture.bitDepth, 18);
    fmt.writeUInt16LE(fixture.formatTag, 24);
  }

  const chunk = (id: string, body: Buffer): Buffer => {
    const header = Buffer.alloc(8);
    header.write(id, 0, 'ascii');
    header.writeUInt32LE(body.length, 4);
    const pad = body.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
    return Buffer.concat([header, body, pad]);
  };

  const chunks = [
    chunk('fmt ', fmt),
    ...(fixture.extraChunks ?? []).map(({ id, body }) => chunk(id, body)),
    chunk('data', fixture.data),
  ];
  const body = Buffer.concat(chunks);

  const riff = Buffer.alloc(12);
  riff.write('RIFF', 0, 'ascii');
  riff.writeUInt32LE(4 + body.length, 4);
  riff.write('WAVE', 8, 'ascii');
  return Buffer.concat([riff, body]);
}
