/**
 * Voice Reshaper - Audio Types
 * Type definitions for audio buffers and the WAV container
 */

/**
 * Immutable block of PCM audio.
 * Samples are interleaved when `channels > 1`; every transform in the
 * pipeline works on mono buffers and returns a new instance.
 */
export interface AudioBuffer {
  /** Sample values, nominally in [-1, 1] */
  readonly samples: Float32Array;
  /** Samples per second (per channel) */
  readonly sampleRate: number;
  /** Number of interleaved channels */
  readonly channels: number;
}

/**
 * WAV sample encodings understood by the codec
 */
export type WavSampleFormat = 'pcm' | 'float';

/**
 * Parsed `fmt ` chunk of a RIFF/WAVE file
 */
export interface WavFormat {
  /** Integer PCM or IEEE float */
  sampleFormat: WavSampleFormat;
  /** Number of interleaved channels */
  channels: number;
  /** Samples per second */
  sampleRate: number;
  /** Bits per sample (8/16/24/32 for PCM, 32/64 for float) */
  bitDepth: number;
}

/**
 * Options for encoding a buffer as WAV
 */
export interface WavEncodeOptions {
  /** Output encoding (default: pcm) */
  sampleFormat?: WavSampleFormat;
  /** Output bit depth (default: 16) */
  bitDepth?: 16 | 24 | 32;
}

/**
 * Constraints applied when ingesting uploaded audio
 */
export interface IngestOptions {
  /** Working sample rate the decoded audio is resampled to */
  targetSampleRate: number;
  /** Longest accepted decoded duration in seconds */
  maxDurationSeconds: number;
}

/**
 * Default ingestion constraints
 */
export const DEFAULT_INGEST_OPTIONS: IngestOptions = {
  targetSampleRate: 22050,
  maxDurationSeconds: 600,
};
