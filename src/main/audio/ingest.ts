/**
 * Voice Reshaper - Audio Ingestion
 * Turns uploaded bytes into the mono working-rate buffer the engines expect
 */

import type { AudioBuffer, IngestOptions } from '../../shared/types/audio';
import { DEFAULT_INGEST_OPTIONS } from '../../shared/types/audio';
import { InputError } from '../utils/errors';
import { decodeWav } from './wav';
import { durationSeconds, resample, toMono } from './buffer';

/**
 * Decode, down-mix and resample an uploaded WAV file.
 * Empty, unreadable or over-long audio raises InputError.
 */
export function ingestAudio(
  bytes: Uint8Array,
  options: Partial<IngestOptions> = {}
): AudioBuffer {
  const { targetSampleRate, maxDurationSeconds } = { ...DEFAULT_INGEST_OPTIONS, ...options };

  if (bytes.byteLength === 0) {
    throw new InputError('No audio data provided');
  }

  const { buffer } = decodeWav(bytes);

  if (buffer.samples.length === 0) {
    throw new InputError('Audio contains no samples');
  }

  const seconds = durationSeconds(buffer);
  if (seconds > maxDurationSeconds) {
    throw new InputError(
      `Audio is ${seconds.toFixed(1)}s long; the limit is ${maxDurationSeconds}s`,
      { durationSeconds: seconds, maxDurationSeconds }
    );
  }

  const mono = resample(toMono(buffer), targetSampleRate);
  if (mono.samples.length === 0) {
    throw new InputError(`Audio is too short to resample to ${targetSampleRate} Hz`, {
      frames: buffer.samples.length / buffer.channels,
      sampleRate: buffer.sampleRate,
    });
  }
  return mono;
}
