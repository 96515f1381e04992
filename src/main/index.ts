/**
 * Voice Reshaper - Service Entry Point
 * Wires configuration, the job manager and the gateway, and handles shutdown
 */

import { getConfig, getConfigValidation } from './config';
import { mainLogger, shutdownLogger } from './utils/logger';
import { ConfigError, installGlobalErrorHandler } from './utils/errors';
import { getErrorMessage } from '../shared/utils';
import { FileResultStore, getJobManager, shutdownJobManager } from './jobs';
import { startGateway, stopGateway } from './gateway';

// Track if cleanup is in progress to prevent double cleanup
let isCleaningUp = false;

/**
 * Start the service
 */
export async function main(): Promise<void> {
  installGlobalErrorHandler({ onCritical: () => cleanup() });

  const config = getConfig();
  const validation = getConfigValidation();
  if (!validation.valid) {
    throw new ConfigError('Invalid configuration', { errors: validation.errors });
  }

  const jobs = getJobManager(
    {
      maxConcurrentJobs: config.maxConcurrentJobs,
      jobTimeoutMs: config.jobTimeoutMs,
      sampleRate: config.sampleRate,
      maxAudioSeconds: config.maxAudioSeconds,
    },
    {
      results: new FileResultStore(config.outputDir),
      voice: {
        pitchSkipSemitones: config.pitchSkipSemitones,
        brightnessCutoffHz: config.brightnessCutoffHz,
        minF0DifferenceHz: config.minF0DifferenceHz,
      },
    }
  );

  await startGateway(jobs, {
    host: config.host,
    port: config.port,
    maxUploadBytes: config.maxUploadBytes,
  });

  mainLogger.info('Voice Reshaper ready', {
    host: config.host,
    port: config.port,
    outputDir: config.outputDir,
    env: config.nodeEnv,
  });
}

/**
 * Stop the gateway, drain running jobs and flush logs
 */
export async function cleanup(): Promise<void> {
  if (isCleaningUp) return;
  isCleaningUp = true;

  mainLogger.info('Shutting down, cleaning up...');

  await Promise.all([
    stopGateway().catch((e: unknown) =>
      mainLogger.error('Gateway shutdown error', { error: getErrorMessage(e) })
    ),
    shutdownJobManager().catch((e: unknown) =>
      mainLogger.error('Job manager shutdown error', { error: getErrorMessage(e) })
    ),
  ]);

  mainLogger.info('Cleanup complete');
  await shutdownLogger();
}

function onSignal(signal: NodeJS.Signals): void {
  mainLogger.info('Received signal', { signal });
  cleanup()
    .then(() => process.exit(0))
    .catch((e: unknown) => {
      console.error('Cleanup failed:', e);
      process.exit(1);
    });
}

if (require.main === module) {
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  main().catch((error: unknown) => {
    mainLogger.error('Startup failed', { error: getErrorMessage(error) });
    shutdownLogger()
      .catch((e: unknown) => console.error('Logger shutdown error:', e))
      .finally(() => process.exit(1));
  });
}
