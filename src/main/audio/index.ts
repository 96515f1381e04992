/**
 * Voice Reshaper - Audio Module
 */

export * from './buffer';
export * from './wav';
export * from './ingest';
