/**
 * Voice Reshaper - Configuration Types
 */

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Application configuration, loaded from environment variables
 */
export interface AppConfig {
  // Environment
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  logDir: string;
  logToFile: boolean;

  // Gateway
  host: string;
  port: number;
  maxUploadBytes: number;

  // Audio
  sampleRate: number;
  maxAudioSeconds: number;
  outputDir: string;

  // Jobs
  maxConcurrentJobs: number;
  jobTimeoutMs: number;

  // DSP
  pitchSkipSemitones: number;
  brightnessCutoffHz: number;
  minF0DifferenceHz: number;
}

/**
 * Configuration validation result
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Default configuration values (maxConcurrentJobs defaults to the CPU count at load time)
 */
export const DEFAULT_CONFIG: Omit<AppConfig, 'maxConcurrentJobs'> = {
  nodeEnv: 'development',
  logLevel: 'debug',
  logDir: '~/.voice-reshaper/logs',
  logToFile: true,
  host: '127.0.0.1',
  port: 8787,
  maxUploadBytes: 104857600,
  sampleRate: 22050,
  maxAudioSeconds: 600,
  outputDir: '~/.voice-reshaper/outputs',
  jobTimeoutMs: 300000,
  pitchSkipSemitones: 0.1,
  brightnessCutoffHz: 2000,
  minF0DifferenceHz: 10,
};
