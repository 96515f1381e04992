/**
 * Voice Reshaper - Audio Buffer Helpers
 * Construction, down-mixing and resampling of immutable AudioBuffers
 */

import type { AudioBuffer } from '../../shared/types/audio';

/**
 * Build an AudioBuffer, copying the samples into a Float32Array
 */
export function createAudioBuffer(
  samples: ArrayLike<number>,
  sampleRate: number,
  channels: number = 1
): AudioBuffer {
  if (!(sampleRate > 0)) {
    throw new RangeError(`Sample rate must be positive, got ${sampleRate}`);
  }
  if (!Number.isInteger(channels) || channels < 1) {
    throw new RangeError(`Channel count must be a positive integer, got ${channels}`);
  }
  if (samples.length % channels !== 0) {
    throw new RangeError(`Sample count ${samples.length} is not a multiple of ${channels} channels`);
  }
  return {
    samples: Float32Array.from(samples),
    sampleRate,
    channels,
  };
}

/**
 * Samples per channel
 */
export function frameLength(buffer: AudioBuffer): number {
  return buffer.samples.length / buffer.channels;
}

export function durationSeconds(buffer: AudioBuffer): number {
  return frameLength(buffer) / buffer.sampleRate;
}

/**
 * Average interleaved channels into one. Mono input is returned as is.
 */
export function toMono(buffer: AudioBuffer): AudioBuffer {
  if (buffer.channels === 1) return buffer;

  const frames = frameLength(buffer);
  const mono = new Float32Array(frames);
  for (let i = 0; i < frames; i++) {
    let acc = 0;
    for (let c = 0; c < buffer.channels; c++) {
      acc += buffer.samples[i * buffer.channels + c];
    }
    mono[i] = acc / buffer.channels;
  }
  return { samples: mono, sampleRate: buffer.sampleRate, channels: 1 };
}

/**
 * Linear interpolation of `samples` onto `outputLength` evenly spaced points
 * spanning the same first-to-last extent
 */
export function resampleToLength(samples: ArrayLike<number>, outputLength: number): Float64Array {
  const out = new Float64Array(outputLength);
  const inputLength = samples.length;
  if (inputLength === 0 || outputLength === 0) return out;
  if (inputLength === 1 || outputLength === 1) {
    out.fill(samples[0]);
    return out;
  }

  const step = (inputLength - 1) / (outputLength - 1);
  for (let i = 0; i < outputLength; i++) {
    const position = i * step;
    const index = Math.floor(position);
    const frac = position - index;
    const next = index + 1 < inputLength ? samples[index + 1] : samples[index];
    out[i] = samples[index] * (1 - frac) + next * frac;
  }
  return out;
}

/**
 * Resample a mono buffer to `targetRate` by linear interpolation
 */
export function resample(buffer: AudioBuffer, targetRate: number): AudioBuffer {
  if (buffer.sampleRate === targetRate) return buffer;
  const mono = toMono(buffer);
  const outputLength = Math.round((mono.samples.length * targetRate) / mono.sampleRate);
  return createAudioBuffer(resampleToLength(mono.samples, outputLength), targetRate, 1);
}

/**
 * Replace the samples of a buffer, keeping its rate and channel layout
 */
export function withSamples(buffer: AudioBuffer, samples: ArrayLike<number>): AudioBuffer {
  return createAudioBuffer(samples, buffer.sampleRate, buffer.channels);
}
