/**
 * Voice Reshaper - Worker Thread Types
 * Messages exchanged between the job manager and its worker threads
 */

import type { JobRequest } from './job';
import type { VoiceDspConfig, VoiceProfile } from './voice';

/**
 * Data handed to each worker when it is spawned
 */
export interface JobWorkerData {
  role: 'job-worker';
  workerId: string;
  /** DSP constants for the worker's engines */
  voice: Partial<VoiceDspConfig>;
}

/**
 * One job's worth of processing, sent to a worker
 */
export interface JobTask {
  /** Job id, correlates every response with its task */
  id: string;
  request: JobRequest;
  /** Working sample rate for decoded audio */
  sampleRate: number;
  /** Longest accepted decoded input in seconds */
  maxAudioSeconds: number;
}

/**
 * Output of a finished task
 */
export interface JobTaskResult {
  /** Encoded mono 16-bit PCM WAV */
  wav: Uint8Array;
  durationSeconds: number;
}

/**
 * Error crossing the thread boundary
 */
export interface SerializedError {
  message: string;
  code: string;
  recoverable: boolean;
}

/**
 * Messages a worker posts back to the pool
 */
export type JobWorkerResponse =
  | { type: 'ready'; workerId: string }
  | { type: 'progress'; id: string; progress: number; message: string }
  | { type: 'analysis'; id: string; profile: VoiceProfile }
  | { type: 'result'; id: string; result: JobTaskResult; processingTime: number }
  | { type: 'error'; id: string; error: SerializedError; processingTime: number };

/**
 * Progress callbacks of a running task
 */
export interface JobTaskHandlers {
  onProgress?: (progress: number, message: string) => void;
  onAnalysis?: (profile: VoiceProfile) => void;
}

/**
 * Pool counters
 */
export interface WorkerPoolStats {
  /** Live workers, starting or ready */
  workers: number;
  /** Workers running a task */
  busy: number;
  /** Tasks waiting for a worker */
  queued: number;
  tasksProcessed: number;
  timeouts: number;
}

/**
 * Worker pool events
 */
export interface WorkerPoolEvents {
  'worker-started': (workerId: string) => void;
  'worker-exited': (workerId: string, code: number) => void;
  'task-timeout': (taskId: string, workerId: string) => void;
}

/**
 * Worker pool configuration
 */
export interface WorkerPoolConfig {
  /** Most workers alive at once */
  size: number;
  /** Per-task deadline in milliseconds, measured from dispatch */
  taskTimeout: number;
  /** DSP constants passed to every worker */
  voice: Partial<VoiceDspConfig>;
}

export const DEFAULT_WORKER_POOL_CONFIG: WorkerPoolConfig = {
  size: 2,
  taskTimeout: 300000,
  voice: {},
};
