/**
 * Voice Reshaper - Job Worker Pool
 * Runs job tasks on worker threads so DSP never blocks request handling
 */

import { Worker } from 'worker_threads';
import { EventEmitter } from 'events';
import * as path from 'path';
import { createModuleLogger } from '../utils/logger';
import { getErrorMessage } from '../../shared/utils';
import {
  JobTimeoutError,
  ProcessingError,
  ReshaperError,
  deserializeError,
} from '../utils/errors';
import {
  DEFAULT_WORKER_POOL_CONFIG,
  type JobTask,
  type JobTaskHandlers,
  type JobTaskResult,
  type JobWorkerData,
  type JobWorkerResponse,
  type WorkerPoolConfig,
  type WorkerPoolEvents,
  type WorkerPoolStats,
} from '../../shared/types/workers';

const logger = createModuleLogger('WorkerPool');

const WORKER_ENTRY = 'job-worker';

/**
 * Internal worker wrapper with metadata
 */
interface ManagedWorker {
  worker: Worker;
  id: string;
  /** Entry module loaded and listening */
  isReady: boolean;
  currentTaskId: string | null;
  tasksProcessed: number;
  /** Error raised before the worker exited */
  lastError: string | null;
  isTerminating: boolean;
}

/**
 * Task waiting for, or running on, a worker
 */
interface PendingTask {
  task: JobTask;
  handlers: JobTaskHandlers;
  resolve: (result: JobTaskResult) => void;
  reject: (error: Error) => void;
  timeoutHandle: NodeJS.Timeout | null;
  worker: ManagedWorker | null;
}

/**
 * Start a worker on the job-worker module beside this file. When running
 * from TypeScript sources the module is loaded through tsx.
 */
function createJobWorker(data: JobWorkerData): Worker {
  const extension = path.extname(__filename);
  const entry = path.join(__dirname, `${WORKER_ENTRY}${extension}`);
  if (extension !== '.ts') {
    return new Worker(entry, { workerData: data });
  }

  const loader = require.resolve('tsx/cjs');
  const source = `require(${JSON.stringify(loader)});\nrequire(${JSON.stringify(entry)});`;
  return new Worker(source, { eval: true, workerData: data });
}

/**
 * Job Worker Pool
 * Spawns workers on demand up to `size`; a task that outlives its deadline
 * has its worker terminated and is rejected with JobTimeoutError
 */
export class JobWorkerPool extends EventEmitter {
  private config: WorkerPoolConfig;
  private workers: Map<string, ManagedWorker> = new Map();
  private queue: PendingTask[] = [];
  private pendingTasks: Map<string, PendingTask> = new Map();
  private isShuttingDown = false;
  private spawned = 0;
  private totalTasksProcessed = 0;
  private totalTimeouts = 0;

  constructor(config?: Partial<WorkerPoolConfig>) {
    super();
    this.config = { ...DEFAULT_WORKER_POOL_CONFIG, ...config };
    this.config.size = Math.max(1, Math.floor(this.config.size));

    logger.info('WorkerPool created', {
      size: this.config.size,
      taskTimeout: this.config.taskTimeout,
    });
  }

  /**
   * Run a task on the next free worker
   */
  run(task: JobTask, handlers: JobTaskHandlers = {}): Promise<JobTaskResult> {
    if (this.isShuttingDown) {
      return Promise.reject(new ReshaperError('Worker pool is shut down', 'SHUTTING_DOWN', false));
    }
    if (this.pendingTasks.has(task.id)) {
      return Promise.reject(new ProcessingError(`Task ${task.id} is already running`));
    }

    return new Promise<JobTaskResult>((resolve, reject) => {
      const pending: PendingTask = {
        task,
        handlers,
        resolve,
        reject,
        timeoutHandle: null,
        worker: null,
      };
      this.pendingTasks.set(task.id, pending);
      this.queue.push(pending);
      this.dispatch();
    });
  }

  getStats(): WorkerPoolStats {
    let live = 0;
    let busy = 0;
    for (const managed of this.workers.values()) {
      if (managed.isTerminating) continue;
      live++;
      if (managed.currentTaskId) busy++;
    }
    return {
      workers: live,
      busy,
      queued: this.queue.length,
      tasksProcessed: this.totalTasksProcessed,
      timeouts: this.totalTimeouts,
    };
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Hand queued tasks to ready workers, spawning while under `size`
   */
  private dispatch(): void {
    while (this.queue.length > 0 && !this.isShuttingDown) {
      const idle = this.findIdleWorker();
      if (idle) {
        const next = this.queue.shift();
        if (next) this.executeTask(idle, next);
        continue;
      }

      const { workers } = this.getStats();
      const starting = this.countStartingWorkers();
      if (starting >= this.queue.length || workers >= this.config.size) {
        return;
      }
      this.spawnWorker();
    }
  }

  private findIdleWorker(): ManagedWorker | undefined {
    for (const managed of this.workers.values()) {
      if (managed.isReady && !managed.isTerminating && managed.currentTaskId === null) {
        return managed;
      }
    }
    return undefined;
  }

  private countStartingWorkers(): number {
    let count = 0;
    for (const managed of this.workers.values()) {
      if (!managed.isReady && !managed.isTerminating) count++;
    }
    return count;
  }

  private executeTask(managed: ManagedWorker, pending: PendingTask): void {
    managed.currentTaskId = pending.task.id;
    pending.worker = managed;
    managed.worker.ref();

    pending.timeoutHandle = setTimeout(() => {
      this.handleTaskTimeout(managed, pending);
    }, this.config.taskTimeout);

    logger.debug('Task dispatched', { taskId: pending.task.id, workerId: managed.id });
    managed.worker.postMessage(pending.task);
  }

  private handleTaskTimeout(managed: ManagedWorker, pending: PendingTask): void {
    const { id } = pending.task;
    logger.warn('Task timeout', { taskId: id, workerId: managed.id, timeout: this.config.taskTimeout });

    pending.timeoutHandle = null;
    this.pendingTasks.delete(id);
    managed.currentTaskId = null;
    this.totalTimeouts++;

    void this.terminateWorker(managed);
    this.emit('task-timeout', id, managed.id);
    pending.reject(new JobTimeoutError(id, this.config.taskTimeout));
    this.dispatch();
  }

  /**
   * Release the worker held by a finished task
   */
  private settleTask(managed: ManagedWorker, pending: PendingTask): void {
    if (pending.timeoutHandle) {
      clearTimeout(pending.timeoutHandle);
      pending.timeoutHandle = null;
    }
    this.pendingTasks.delete(pending.task.id);
    managed.currentTaskId = null;
    managed.tasksProcessed++;
    this.totalTasksProcessed++;
    managed.worker.unref();
  }

  // ==========================================================================
  // Worker Lifecycle
  // ==========================================================================

  private spawnWorker(): ManagedWorker {
    const workerId = `job-worker-${++this.spawned}`;
    const worker = createJobWorker({
      role: 'job-worker',
      workerId,
      voice: this.config.voice,
    });

    const managed: ManagedWorker = {
      worker,
      id: workerId,
      isReady: false,
      currentTaskId: null,
      tasksProcessed: 0,
      lastError: null,
      isTerminating: false,
    };

    worker.on('message', (response: JobWorkerResponse) => {
      this.handleWorkerMessage(managed, response);
    });
    worker.on('error', (error: Error) => {
      managed.lastError = error.message;
      logger.error('Worker error', { workerId, error: error.message });
    });
    worker.on('exit', (code: number) => {
      this.handleWorkerExit(managed, code);
    });

    this.workers.set(workerId, managed);
    this.emit('worker-started', workerId);
    logger.debug('Worker created', { workerId });
    return managed;
  }

  private handleWorkerMessage(managed: ManagedWorker, response: JobWorkerResponse): void {
    if (response.type === 'ready') {
      managed.isReady = true;
      managed.worker.unref();
      logger.debug('Worker ready', { workerId: managed.id });
      this.dispatch();
      return;
    }

    const pending = this.pendingTasks.get(response.id);
    if (!pending || pending.worker !== managed) {
      logger.debug('Response for a task no longer pending', { taskId: response.id });
      return;
    }

    switch (response.type) {
      case 'progress':
        pending.handlers.onProgress?.(response.progress, response.message);
        return;
      case 'analysis':
        pending.handlers.onAnalysis?.(response.profile);
        return;
      case 'result':
        this.settleTask(managed, pending);
        logger.debug('Task completed', {
          taskId: response.id,
          processingTime: Math.round(response.processingTime),
        });
        pending.resolve(response.result);
        break;
      case 'error':
        this.settleTask(managed, pending);
        pending.reject(deserializeError(response.error));
        break;
    }
    this.dispatch();
  }

  private handleWorkerExit(managed: ManagedWorker, code: number): void {
    this.workers.delete(managed.id);
    this.emit('worker-exited', managed.id, code);

    if (managed.isTerminating) {
      logger.debug('Worker terminated', { workerId: managed.id });
      return;
    }

    const reason = managed.lastError ?? `exit code ${code}`;
    logger.warn('Worker exited unexpectedly', { workerId: managed.id, code, reason });

    if (managed.currentTaskId) {
      const pending = this.pendingTasks.get(managed.currentTaskId);
      if (pending) {
        if (pending.timeoutHandle) clearTimeout(pending.timeoutHandle);
        this.pendingTasks.delete(managed.currentTaskId);
        pending.reject(new ProcessingError(`Job worker stopped: ${reason}`));
      }
    }

    if (!managed.isReady) {
      // A worker that cannot load will not load on retry either
      for (const pending of this.queue.splice(0)) {
        this.pendingTasks.delete(pending.task.id);
        pending.reject(new ProcessingError(`Job worker failed to start: ${reason}`));
      }
      return;
    }

    this.dispatch();
  }

  private terminateWorker(managed: ManagedWorker): Promise<void> {
    managed.isTerminating = true;
    return managed.worker.terminate().then(
      () => undefined,
      (error: unknown) => {
        logger.error('Failed to terminate worker', {
          workerId: managed.id,
          error: getErrorMessage(error),
        });
      }
    );
  }

  // ==========================================================================
  // Shutdown
  // ==========================================================================

  /**
   * Reject outstanding tasks and terminate every worker
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    for (const pending of this.pendingTasks.values()) {
      if (pending.timeoutHandle) clearTimeout(pending.timeoutHandle);
      pending.reject(new ReshaperError('Worker pool is shut down', 'SHUTTING_DOWN', false));
    }
    this.pendingTasks.clear();
    this.queue.length = 0;

    await Promise.all([...this.workers.values()].map((managed) => this.terminateWorker(managed)));
    this.workers.clear();

    logger.info('WorkerPool shut down', { tasksProcessed: this.totalTasksProcessed });
    this.removeAllListeners();
  }

  // Type-safe event emitter methods
  on<K extends keyof WorkerPoolEvents>(event: K, listener: WorkerPoolEvents[K]): this {
    return super.on(event, listener);
  }

  off<K extends keyof WorkerPoolEvents>(event: K, listener: WorkerPoolEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof WorkerPoolEvents>(
    event: K,
    ...args: Parameters<WorkerPoolEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
