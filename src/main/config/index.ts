/* eslint-disable no-console */
/**
 * Voice Reshaper Configuration Manager
 * Loads and validates environment configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import { homedir, cpus } from 'os';
import {
  AppConfig,
  ConfigValidationResult,
  DEFAULT_CONFIG,
  LogLevel,
  NodeEnv,
} from '../../shared/types/config';

// NOTE: The logger imports config to get logDir/logLevel, so config cannot
// import the logger. Warnings go to the console during load.

// Load .env file
dotenvConfig();

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Expand ~ to home directory
 */
function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return resolve(path);
}

/**
 * Parse boolean from environment variable
 */
function parseEnvBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse a number from an environment variable; unset or blank keeps the default.
 * Unparseable values yield NaN so validation can report them.
 */
function parseEnvNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  return Number(value);
}

function parseEnvEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T
): T {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? defaultValue;
}

/**
 * Load configuration from environment variables
 */
function loadConfig(): AppConfig {
  const nodeEnv = parseEnvEnum(process.env.NODE_ENV, NODE_ENVS, DEFAULT_CONFIG.nodeEnv);

  return {
    // Environment
    nodeEnv,
    logLevel: parseEnvEnum(process.env.LOG_LEVEL, LOG_LEVELS, DEFAULT_CONFIG.logLevel),
    logDir: expandPath(process.env.LOG_DIR || DEFAULT_CONFIG.logDir),
    logToFile: parseEnvBoolean(
      process.env.LOG_TO_FILE,
      nodeEnv === 'test' ? false : DEFAULT_CONFIG.logToFile
    ),

    // Gateway
    host: process.env.HOST || DEFAULT_CONFIG.host,
    port: parseEnvNumber(process.env.PORT, DEFAULT_CONFIG.port),
    maxUploadBytes: parseEnvNumber(process.env.MAX_UPLOAD_BYTES, DEFAULT_CONFIG.maxUploadBytes),

    // Audio
    sampleRate: parseEnvNumber(process.env.SAMPLE_RATE, DEFAULT_CONFIG.sampleRate),
    maxAudioSeconds: parseEnvNumber(process.env.MAX_AUDIO_SECONDS, DEFAULT_CONFIG.maxAudioSeconds),
    outputDir: expandPath(process.env.OUTPUT_DIR || DEFAULT_CONFIG.outputDir),

    // Jobs
    maxConcurrentJobs: parseEnvNumber(process.env.MAX_CONCURRENT_JOBS, Math.max(1, cpus().length)),
    jobTimeoutMs: parseEnvNumber(process.env.JOB_TIMEOUT_MS, DEFAULT_CONFIG.jobTimeoutMs),

    // DSP
    pitchSkipSemitones: parseEnvNumber(
      process.env.PITCH_SKIP_SEMITONES,
      DEFAULT_CONFIG.pitchSkipSemitones
    ),
    brightnessCutoffHz: parseEnvNumber(
      process.env.BRIGHTNESS_CUTOFF_HZ,
      DEFAULT_CONFIG.brightnessCutoffHz
    ),
    minF0DifferenceHz: parseEnvNumber(
      process.env.MIN_F0_DIFFERENCE_HZ,
      DEFAULT_CONFIG.minF0DifferenceHz
    ),
  };
}

/**
 * Validate configuration
 */
function validateConfig(config: AppConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('port must be an integer between 0 and 65535');
  }

  if (!Number.isInteger(config.maxConcurrentJobs) || config.maxConcurrentJobs < 1) {
    errors.push('maxConcurrentJobs must be a positive integer');
  }

  if (!(config.jobTimeoutMs > 0)) {
    errors.push('jobTimeoutMs must be positive');
  }

  if (!(config.maxUploadBytes > 0)) {
    errors.push('maxUploadBytes must be positive');
  }

  if (!(config.maxAudioSeconds > 0)) {
    errors.push('maxAudioSeconds must be positive');
  }

  if (!(config.sampleRate >= 8000 && config.sampleRate <= 48000)) {
    errors.push('sampleRate must be between 8000 and 48000');
  }

  if (!(config.pitchSkipSemitones >= 0)) {
    errors.push('pitchSkipSemitones must not be negative');
  }

  if (!(config.brightnessCutoffHz > 0)) {
    errors.push('brightnessCutoffHz must be positive');
  } else if (config.brightnessCutoffHz >= config.sampleRate / 2) {
    warnings.push('brightnessCutoffHz is at or above Nyquist; brightness transfer has no effect');
  }

  if (!(config.minF0DifferenceHz >= 0)) {
    errors.push('minF0DifferenceHz must not be negative');
  }

  if (config.sampleRate !== DEFAULT_CONFIG.sampleRate) {
    warnings.push(`sampleRate ${config.sampleRate} differs from the analysis default 22050`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// Singleton config instance
let configInstance: AppConfig | null = null;
let validationResult: ConfigValidationResult = { valid: true, errors: [], warnings: [] };

/**
 * Get configuration (loads once, caches result)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
    validationResult = validateConfig(configInstance);

    if (!validationResult.valid) {
      console.error('[Config] Invalid configuration:', validationResult.errors);
    }

    if (validationResult.warnings.length > 0 && configInstance.nodeEnv !== 'test') {
      console.warn('[Config] Configuration warnings:', validationResult.warnings);
    }
  }

  return configInstance;
}

/**
 * Get validation result
 */
export function getConfigValidation(): ConfigValidationResult {
  getConfig();
  return validationResult;
}

/**
 * Check if config is valid
 */
export function isConfigValid(): boolean {
  return getConfigValidation().valid;
}

/**
 * Get a specific config value
 */
export function getConfigValue<K extends keyof AppConfig>(key: K): AppConfig[K] {
  return getConfig()[key];
}

/**
 * Reload configuration (for testing or hot reload)
 */
export function reloadConfig(): AppConfig {
  configInstance = null;
  return getConfig();
}

export type { AppConfig, ConfigValidationResult };
