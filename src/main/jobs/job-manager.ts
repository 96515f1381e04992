/**
 * Voice Reshaper - Job Manager
 * Queues conversion and cloning jobs, runs them with bounded concurrency
 * and publishes every state change as a `job:updated` event.
 *
 * Lifecycle: queued -> processing -> completed | failed. Terminal states
 * are final and failed jobs are never retried.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import type {
  CloningParams,
  CloningRequest,
  ConversionParams,
  ConversionRequest,
  Job,
  JobManagerConfig,
  JobManagerStats,
  JobRequest,
  JobSubmission,
  JobUpdate,
} from '../../shared/types/job';
import { DEFAULT_JOB_MANAGER_CONFIG } from '../../shared/types/job';
import type { VoiceDspConfig } from '../../shared/types/voice';
import { clamp100, getErrorMessage, yieldToEventLoop } from '../../shared/utils';
import { DEFAULT_SPEAKER_ID } from '../voice/speaker-presets';
import { JobWorkerPool } from '../workers/worker-pool';
import { InMemoryJobStore, type JobStore } from './job-store';
import { InMemoryResultStore, type ResultStore } from './result-store';
import {
  InputError,
  JobTimeoutError,
  NotFoundError,
  ReshaperError,
  toReshaperError,
} from '../utils/errors';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('JobManager');

export const DEFAULT_CONVERSION_STRENGTH = 0.8;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

/**
 * Job manager events
 */
export interface JobManagerEvents {
  /** Any status, progress or message change */
  'job:updated': (update: JobUpdate) => void;
  /** Job reached `completed` */
  'job:completed': (job: Job) => void;
  /** Job reached `failed` */
  'job:failed': (job: Job) => void;
}

/**
 * Collaborators, replaceable for tests or alternative backends
 */
export interface JobManagerDeps {
  store?: JobStore;
  results?: ResultStore;
  /** DSP constants for the worker threads' engines */
  voice?: Partial<VoiceDspConfig>;
  /** Clock used for timestamps and deadlines */
  now?: () => number;
}

function validateBlend(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InputError(`${name} must be between 0 and 1`, { [name]: value });
  }
}

/**
 * Job Manager
 * Owns the FIFO queue and worker slots; the JobStore owns the records and
 * the worker pool runs the DSP
 */
export class JobManager extends EventEmitter {
  private config: JobManagerConfig;
  private store: JobStore;
  private results: ResultStore;
  private pool: JobWorkerPool;
  private now: () => number;

  private queue: string[] = [];
  private payloads: Map<string, JobRequest> = new Map();
  private running: Map<string, Promise<void>> = new Map();
  private isShuttingDown = false;

  constructor(config: Partial<JobManagerConfig> = {}, deps: JobManagerDeps = {}) {
    super();
    this.config = { ...DEFAULT_JOB_MANAGER_CONFIG, ...config };
    this.store = deps.store ?? new InMemoryJobStore();
    this.results = deps.results ?? new InMemoryResultStore();
    this.pool = new JobWorkerPool({
      size: this.config.maxConcurrentJobs,
      taskTimeout: this.config.jobTimeoutMs,
      voice: deps.voice ?? {},
    });
    this.now = deps.now ?? Date.now;

    logger.info('Job manager initialized', {
      maxConcurrentJobs: this.config.maxConcurrentJobs,
      jobTimeoutMs: this.config.jobTimeoutMs,
    });
  }

  // ==========================================================================
  // Submission
  // ==========================================================================

  /**
   * Record a queued job and schedule it; returns before any processing happens
   */
  submit(request: JobRequest): JobSubmission {
    if (this.isShuttingDown) {
      throw new ReshaperError('Job manager is shutting down', 'SHUTTING_DOWN', false);
    }

    if (request.kind === 'convert') {
      validateBlend('conversionStrength', request.params.conversionStrength);
    } else {
      validateBlend('similarityThreshold', request.params.similarityThreshold);
    }

    const job: Job = {
      id: uuidv4(),
      kind: request.kind,
      status: 'queued',
      progress: 0,
      message: 'Job queued',
      params: { ...request.params },
      createdAt: this.now(),
    };

    this.store.create(job);
    this.payloads.set(job.id, request);
    this.queue.push(job.id);

    logger.info('Job submitted', {
      jobId: job.id,
      kind: job.kind,
      queueLength: this.queue.length,
    });
    this.publish(job);

    this.processQueue();
    return { jobId: job.id, status: job.status };
  }

  submitConversion(audio: Uint8Array, params: Partial<ConversionParams> = {}): JobSubmission {
    const request: ConversionRequest = {
      kind: 'convert',
      audio,
      params: {
        targetSpeaker: params.targetSpeaker ?? DEFAULT_SPEAKER_ID,
        conversionStrength: params.conversionStrength ?? DEFAULT_CONVERSION_STRENGTH,
      },
    };
    return this.submit(request);
  }

  submitCloning(
    reference: Uint8Array,
    target: Uint8Array,
    params: Partial<CloningParams> = {}
  ): JobSubmission {
    const request: CloningRequest = {
      kind: 'clone',
      reference,
      target,
      params: {
        similarityThreshold: params.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD,
      },
    };
    return this.submit(request);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Snapshot of a job. Unknown ids raise NotFoundError.
   */
  status(jobId: string): Job {
    const job = this.store.get(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  list(): Job[] {
    return this.store.list().sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Encoded result of a completed job; null while the job has not completed
   */
  async getResult(jobId: string): Promise<Buffer | null> {
    const job = this.status(jobId);
    if (job.status !== 'completed' || !job.resultRef) {
      return null;
    }
    const data = await this.results.get(job.resultRef);
    if (!data) {
      throw new NotFoundError('Result', job.resultRef);
    }
    return data;
  }

  getStats(): JobManagerStats {
    const counts = { queued: 0, processing: 0, completed: 0, failed: 0 };
    let totalTime = 0;
    let timed = 0;

    for (const job of this.store.list()) {
      counts[job.status]++;
      if (job.status === 'completed' && job.processingTimeMs !== undefined) {
        totalTime += job.processingTimeMs;
        timed++;
      }
    }

    return {
      ...counts,
      total: counts.queued + counts.processing + counts.completed + counts.failed,
      averageProcessingTimeMs: timed > 0 ? totalTime / timed : 0,
      utilization: this.running.size / this.config.maxConcurrentJobs,
      maxConcurrentJobs: this.config.maxConcurrentJobs,
    };
  }

  /**
   * Subscribe to job updates. Returns the unsubscribe function.
   */
  onChange(listener: (update: JobUpdate) => void): () => void {
    const guarded = (update: JobUpdate): void => {
      try {
        listener(update);
      } catch (error) {
        logger.warn('Job listener threw', { error: getErrorMessage(error) });
      }
    };
    this.on('job:updated', guarded);
    return () => {
      this.off('job:updated', guarded);
    };
  }

  /**
   * Resolve with the job once it is completed or failed
   */
  waitFor(jobId: string): Promise<Job> {
    const current = this.status(jobId);
    if (current.status === 'completed' || current.status === 'failed') {
      return Promise.resolve(current);
    }

    return new Promise((resolve) => {
      const unsubscribe = this.onChange((update) => {
        if (update.jobId === jobId && (update.status === 'completed' || update.status === 'failed')) {
          unsubscribe();
          resolve(this.status(jobId));
        }
      });
    });
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  /**
   * Start queued jobs while worker slots are free
   */
  private processQueue(): void {
    while (
      this.running.size < this.config.maxConcurrentJobs &&
      this.queue.length > 0 &&
      !this.isShuttingDown
    ) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;
      this.startJob(jobId);
    }
  }

  private startJob(jobId: string): void {
    const request = this.payloads.get(jobId);
    if (!request) {
      logger.warn('Queued job has no payload', { jobId });
      return;
    }

    // Run off the submitting call stack
    const run = yieldToEventLoop()
      .then(() => this.execute(jobId, request))
      .finally(() => {
        this.payloads.delete(jobId);
        this.running.delete(jobId);
        this.processQueue();
      });

    this.running.set(jobId, run);
  }

  /**
   * Run one job to a terminal state. Never rejects.
   */
  private async execute(jobId: string, request: JobRequest): Promise<void> {
    const startedAt = this.now();
    this.update(jobId, { status: 'processing', startedAt });

    try {
      const result = await this.pool.run(
        {
          id: jobId,
          request,
          sampleRate: this.config.sampleRate,
          maxAudioSeconds: this.config.maxAudioSeconds,
        },
        {
          onProgress: (progress, message) => this.update(jobId, { progress, message }),
          onAnalysis: (profile) => this.update(jobId, { analysis: profile }),
        }
      );

      if (this.now() - startedAt > this.config.jobTimeoutMs) {
        throw new JobTimeoutError(jobId, this.config.jobTimeoutMs);
      }
      this.update(jobId, { progress: 95, message: 'Saving result' });
      const resultRef = await this.results.put(jobId, result.wav);

      const completedAt = this.now();
      const job = this.update(jobId, {
        status: 'completed',
        progress: 100,
        message: request.kind === 'convert' ? 'Conversion completed' : 'Cloning completed',
        resultRef,
        completedAt,
        processingTimeMs: completedAt - startedAt,
        durationSeconds: result.durationSeconds,
      });

      logger.info('Job completed', {
        jobId,
        kind: request.kind,
        processingTimeMs: completedAt - startedAt,
      });
      if (job) this.emit('job:completed', job);
    } catch (error) {
      this.fail(jobId, toReshaperError(error, { jobId }), startedAt);
    }
  }

  private fail(jobId: string, error: ReshaperError, startedAt?: number): void {
    const completedAt = this.now();
    const job = this.update(jobId, {
      status: 'failed',
      error: error.message,
      message: `Processing failed: ${error.message}`,
      completedAt,
      processingTimeMs: startedAt !== undefined ? completedAt - startedAt : undefined,
    });

    logger.warn('Job failed', { jobId, code: error.code, error: error.message });
    if (job) this.emit('job:failed', job);
  }

  /**
   * Write a change to the store and publish it
   */
  private update(jobId: string, changes: Partial<Omit<Job, 'id' | 'kind'>>): Job | undefined {
    const normalized = { ...changes };
    if (normalized.progress !== undefined) {
      normalized.progress = clamp100(normalized.progress);
    }
    const job = this.store.update(jobId, normalized);
    if (!job) {
      logger.warn('Update for unknown job', { jobId });
      return undefined;
    }
    this.publish(job);
    return job;
  }

  private publish(job: Job): void {
    this.emit('job:updated', {
      jobId: job.id,
      status: job.status,
      progress: job.progress,
      message: job.message,
    });
  }

  // ==========================================================================
  // Shutdown
  // ==========================================================================

  /**
   * Stop accepting work, fail queued jobs and wait for running ones
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    const abandoned = this.queue.splice(0);
    for (const jobId of abandoned) {
      this.payloads.delete(jobId);
      this.fail(
        jobId,
        new ReshaperError('Job manager shut down before the job started', 'SHUTTING_DOWN', false)
      );
    }

    await Promise.all(this.running.values());
    await this.pool.shutdown();
    logger.info('Job manager shut down', { abandoned: abandoned.length });
    this.removeAllListeners();
  }

  // Type-safe event emitter methods
  on<K extends keyof JobManagerEvents>(event: K, listener: JobManagerEvents[K]): this {
    return super.on(event, listener);
  }

  off<K extends keyof JobManagerEvents>(event: K, listener: JobManagerEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof JobManagerEvents>(
    event: K,
    ...args: Parameters<JobManagerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let jobManagerInstance: JobManager | null = null;

/**
 * Get the singleton JobManager instance
 */
export function getJobManager(
  config?: Partial<JobManagerConfig>,
  deps?: JobManagerDeps
): JobManager {
  if (!jobManagerInstance) {
    jobManagerInstance = new JobManager(config, deps);
  }
  return jobManagerInstance;
}

/**
 * Shutdown the singleton JobManager
 */
export async function shutdownJobManager(): Promise<void> {
  if (jobManagerInstance) {
    const instance = jobManagerInstance;
    jobManagerInstance = null;
    await instance.shutdown();
  }
}
