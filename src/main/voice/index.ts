/**
 * Voice Reshaper - Voice Module
 * Feature extraction, transforms and the conversion/cloning engines
 */

export * from './feature-extractor';
export * from './signal-transformer';
export * from './speaker-presets';
export * from './conversion-engine';
export * from './cloning-engine';
