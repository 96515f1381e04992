/**
 * Voice Reshaper - Jobs Module
 */

export * from './job-store';
export * from './result-store';
export * from './job-manager';
