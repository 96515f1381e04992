/**
 * Voice Reshaper - Job Worker
 * Decodes, converts or clones, and encodes one job at a time in a worker
 * thread, posting progress back to the pool as it goes
 */

import { parentPort, workerData } from 'worker_threads';
import type { AudioBuffer } from '../../shared/types/audio';
import type { VoiceDspConfig, VoiceProfile } from '../../shared/types/voice';
import type {
  JobTask,
  JobTaskResult,
  JobWorkerData,
  JobWorkerResponse,
} from '../../shared/types/workers';
import { ingestAudio } from '../audio/ingest';
import { durationSeconds } from '../audio/buffer';
import { encodeWav } from '../audio/wav';
import { CloningEngine, ConversionEngine, FeatureExtractor, SignalTransformer } from '../voice';
import { serializeError } from '../utils/errors';

export interface JobEngines {
  conversion: ConversionEngine;
  cloning: CloningEngine;
}

/**
 * Receives the milestones of a running task
 */
export interface TaskReporter {
  progress(progress: number, message: string): void;
  analysis(profile: VoiceProfile): void;
}

/**
 * Engines sharing one transformer configured with `voice`
 */
export function createEngines(voice: Partial<VoiceDspConfig> = {}): JobEngines {
  const transformer = new SignalTransformer(voice);
  return {
    conversion: new ConversionEngine(transformer),
    cloning: new CloningEngine(new FeatureExtractor(), transformer),
  };
}

/**
 * Run one task to an encoded WAV. Throws on bad input or processing failure.
 */
export function runJobTask(task: JobTask, engines: JobEngines, report: TaskReporter): JobTaskResult {
  const ingest = (bytes: Uint8Array): AudioBuffer =>
    ingestAudio(bytes, {
      targetSampleRate: task.sampleRate,
      maxDurationSeconds: task.maxAudioSeconds,
    });
  const { request } = task;

  report.progress(10, 'Starting processing');

  let output: AudioBuffer;
  if (request.kind === 'convert') {
    report.progress(15, 'Decoding audio');
    const audio = ingest(request.audio);
    report.progress(25, 'Audio decoded');
    report.progress(40, `Converting voice to ${request.params.targetSpeaker}`);
    output = engines.conversion.convert(
      audio,
      request.params.targetSpeaker,
      request.params.conversionStrength
    );
  } else {
    report.progress(15, 'Decoding reference audio');
    const reference = ingest(request.reference);
    report.progress(25, 'Decoding target audio');
    const target = ingest(request.target);
    report.progress(40, 'Analyzing and cloning voice');
    const cloned = engines.cloning.clone(reference, target, request.params.similarityThreshold);
    report.analysis(cloned.profile);
    output = cloned.buffer;
  }

  report.progress(85, 'Encoding result');
  return { wav: encodeWav(output), durationSeconds: durationSeconds(output) };
}

function isJobWorkerData(value: unknown): value is JobWorkerData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'role' in value &&
    value.role === 'job-worker' &&
    'workerId' in value &&
    typeof value.workerId === 'string' &&
    'voice' in value &&
    typeof value.voice === 'object'
  );
}

// ============================================================================
// Worker Entry Point
// ============================================================================

const port = parentPort;

if (port && isJobWorkerData(workerData)) {
  const { workerId, voice } = workerData;
  const engines = createEngines(voice);
  const post = (response: JobWorkerResponse): void => {
    port.postMessage(response);
  };

  port.on('message', (task: JobTask) => {
    const startTime = performance.now();
    try {
      const result = runJobTask(task, engines, {
        progress: (progress, message) => post({ type: 'progress', id: task.id, progress, message }),
        analysis: (profile) => post({ type: 'analysis', id: task.id, profile }),
      });
      post({
        type: 'result',
        id: task.id,
        result,
        processingTime: performance.now() - startTime,
      });
    } catch (error) {
      post({
        type: 'error',
        id: task.id,
        error: serializeError(error),
        processingTime: performance.now() - startTime,
      });
    }
  });

  post({ type: 'ready', workerId });
}
