/**
 * Voice Reshaper - Job Types
 * Job records, submission requests and job manager configuration
 */

import type { VoiceProfile } from './voice';

/**
 * Kind of work a job performs
 */
export type JobKind = 'convert' | 'clone';

/**
 * Job lifecycle state. `completed` and `failed` are terminal.
 */
export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

/**
 * Validated parameters of a conversion job
 */
export interface ConversionParams {
  /** Speaker preset id; unknown ids fall back to the default preset */
  targetSpeaker: string;
  /** Blend factor in [0, 1] */
  conversionStrength: number;
}

/**
 * Validated parameters of a cloning job
 */
export interface CloningParams {
  /** Blend factor in [0, 1] */
  similarityThreshold: number;
}

/**
 * Conversion submission: one utterance and a preset
 */
export interface ConversionRequest {
  kind: 'convert';
  /** Encoded WAV bytes */
  audio: Uint8Array;
  params: ConversionParams;
}

/**
 * Cloning submission: a reference voice and the utterance to reshape
 */
export interface CloningRequest {
  kind: 'clone';
  /** Encoded WAV bytes of the voice to imitate */
  reference: Uint8Array;
  /** Encoded WAV bytes of the utterance to reshape */
  target: Uint8Array;
  params: CloningParams;
}

export type JobRequest = ConversionRequest | CloningRequest;

/**
 * Tracked unit of asynchronous work
 */
export interface Job {
  /** UUID v4 */
  id: string;
  kind: JobKind;
  status: JobStatus;
  /** Percentage in [0, 100] */
  progress: number;
  /** Description of the current step */
  message: string;
  /** Result-store key, set only when completed */
  resultRef?: string;
  /** Failure description, set only when failed */
  error?: string;
  /** Reference voice profile (cloning jobs) */
  analysis?: VoiceProfile;
  params: ConversionParams | CloningParams;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  processingTimeMs?: number;
  /** Length of the produced audio */
  durationSeconds?: number;
}

/**
 * Returned by submit()
 */
export interface JobSubmission {
  jobId: string;
  status: JobStatus;
}

/**
 * Payload of the `job:updated` event
 */
export interface JobUpdate {
  jobId: string;
  status: JobStatus;
  progress: number;
  message: string;
}

/**
 * Job manager configuration
 */
export interface JobManagerConfig {
  /** Maximum jobs processing at once */
  maxConcurrentJobs: number;
  /** Per-job deadline in milliseconds */
  jobTimeoutMs: number;
  /** Working sample rate for decoded audio */
  sampleRate: number;
  /** Longest accepted decoded input in seconds */
  maxAudioSeconds: number;
}

/**
 * Default job manager configuration
 */
export const DEFAULT_JOB_MANAGER_CONFIG: JobManagerConfig = {
  maxConcurrentJobs: 2,
  jobTimeoutMs: 300000,
  sampleRate: 22050,
  maxAudioSeconds: 600,
};

/**
 * Queue statistics
 */
export interface JobManagerStats {
  queued: number;
  processing: number;
  completed: number;
  failed: number;
  total: number;
  /** Mean wall time of completed jobs */
  averageProcessingTimeMs: number;
  /** processing / maxConcurrentJobs, in [0, 1] */
  utilization: number;
  maxConcurrentJobs: number;
}
